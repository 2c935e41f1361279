import { pino, type Logger } from 'pino';
import { getConfig } from '../config.js';

export type { Logger };

export function createLogger(level: string = getConfig().logLevel): Logger {
  return pino({
    name: 'rxadjudicate',
    level,
    base: { service: 'rxadjudicate-engine' },
    redact: ['member.labResults', 'member.diagnosisCodes', 'context.labResults', 'context.diagnosisCodes'],
  });
}

let rootLogger: Logger | undefined;

/**
 * Child logger bound to a module name. The root logger is created lazily
 * from the engine config on first use.
 */
export function moduleLogger(module: string): Logger {
  rootLogger ??= createLogger();
  return rootLogger.child({ module });
}
