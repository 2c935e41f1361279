import type { DrugIdentifier, DrugTarget } from '@rxadjudicate/shared';
import { ClassCodeIndex } from './class-code-index.js';

type DrugKey = Pick<DrugIdentifier, 'ndc' | 'classCode'>;

export function matchesTarget(target: DrugTarget, drug: DrugKey): boolean {
  if ('ndc' in target) return target.ndc === drug.ndc;
  return drug.classCode !== undefined && drug.classCode.startsWith(target.classPrefix);
}

export function describeTarget(target: DrugTarget): string {
  return 'ndc' in target ? target.ndc : target.classPrefix;
}

interface Ordered<T> {
  order: number;
  value: T;
}

/** Read side of a rule index; snapshots only ever hand this out. */
export interface ReadonlyDrugRuleIndex<T> {
  readonly size: number;
  /** All rules matching by exact code or class prefix, in configuration order. */
  match(drug: DrugKey): T[];
  /** The most specific rule: exact code first, then the longest class prefix. */
  mostSpecific(drug: DrugKey): T | undefined;
}

/**
 * Resolves configured rules for a claim drug by exact product code or by
 * class-code prefix. A rule listing several targets is returned once.
 */
export class DrugRuleIndex<T> implements ReadonlyDrugRuleIndex<T> {
  private readonly byNdc = new Map<string, Ordered<T>[]>();
  private readonly byClass = new ClassCodeIndex<Ordered<T>>();
  private count = 0;

  static build<T>(rules: readonly T[], targetsOf: (rule: T) => readonly DrugTarget[]): DrugRuleIndex<T> {
    const index = new DrugRuleIndex<T>();
    rules.forEach((rule, order) => {
      for (const target of targetsOf(rule)) index.add(target, rule, order);
    });
    index.count = rules.length;
    return index;
  }

  private constructor() {}

  get size(): number {
    return this.count;
  }

  match(drug: DrugKey): T[] {
    const hits: Ordered<T>[] = [...(this.byNdc.get(drug.ndc) ?? [])];
    if (drug.classCode) hits.push(...this.byClass.matchAll(drug.classCode));
    hits.sort((a, b) => a.order - b.order);

    const seen = new Set<number>();
    const result: T[] = [];
    for (const hit of hits) {
      if (seen.has(hit.order)) continue;
      seen.add(hit.order);
      result.push(hit.value);
    }
    return result;
  }

  mostSpecific(drug: DrugKey): T | undefined {
    const exact = this.byNdc.get(drug.ndc);
    if (exact && exact.length > 0) return exact[0].value;
    if (!drug.classCode) return undefined;
    const longest = this.byClass.matchLongest(drug.classCode);
    return longest.length > 0 ? longest[0].value : undefined;
  }

  private add(target: DrugTarget, value: T, order: number): void {
    if ('ndc' in target) {
      const list = this.byNdc.get(target.ndc) ?? [];
      list.push({ order, value });
      this.byNdc.set(target.ndc, list);
    } else {
      this.byClass.add(target.classPrefix, { order, value });
    }
  }
}
