/**
 * Prefix trie over hierarchical class codes. Each entry remembers the order
 * it was added in so lookups return matches in configuration order no matter
 * how deep in the hierarchy they sit.
 */

interface IndexedEntry<T> {
  order: number;
  value: T;
}

interface TrieNode<T> {
  children: Map<string, TrieNode<T>>;
  entries: IndexedEntry<T>[];
}

function createNode<T>(): TrieNode<T> {
  return { children: new Map(), entries: [] };
}

export class ClassCodeIndex<T> {
  private readonly root: TrieNode<T> = createNode();
  private nextOrder = 0;

  add(prefix: string, value: T): void {
    let node = this.root;
    for (const ch of prefix) {
      let child = node.children.get(ch);
      if (!child) {
        child = createNode();
        node.children.set(ch, child);
      }
      node = child;
    }
    node.entries.push({ order: this.nextOrder++, value });
  }

  get size(): number {
    return this.nextOrder;
  }

  /** Every entry whose prefix is a prefix of `classCode`, in insertion order. */
  matchAll(classCode: string): T[] {
    return this.walk(classCode)
      .flatMap((node) => node.entries)
      .sort((a, b) => a.order - b.order)
      .map((e) => e.value);
  }

  /** Entries registered under the longest matching prefix. */
  matchLongest(classCode: string): T[] {
    const path = this.walk(classCode);
    for (let i = path.length - 1; i >= 0; i--) {
      if (path[i].entries.length > 0) return path[i].entries.map((e) => e.value);
    }
    return [];
  }

  private walk(classCode: string): TrieNode<T>[] {
    const path: TrieNode<T>[] = [];
    let node: TrieNode<T> | undefined = this.root;
    for (const ch of classCode) {
      node = node.children.get(ch);
      if (!node) break;
      path.push(node);
    }
    return path;
  }
}
