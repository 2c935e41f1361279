import { z } from 'zod';
import { ConfigurationError } from './lib/errors.js';

const envSchema = z.object({
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  RULES_PATH: z.string().min(1).optional(),
  PA_APPEAL_WINDOW_DAYS: z.coerce.number().int().positive().default(60),
  PA_APPROVAL_DURATION_DAYS: z.coerce.number().int().positive().default(365),
  PA_EMERGENCY_APPROVAL_DAYS: z.coerce.number().int().positive().default(30),
  PA_DEFAULT_REFILLS: z.coerce.number().int().nonnegative().default(12),
  PA_PARTIAL_APPROVAL_REFILLS: z.coerce.number().int().nonnegative().default(3),
  PA_PARTIAL_APPROVAL_DAYS: z.coerce.number().int().positive().default(90),
  DUR_EARLY_REFILL_GRACE_DAYS: z.coerce.number().int().nonnegative().default(0),
});

export interface PriorAuthSettings {
  appealWindowDays: number;
  approvalDurationDays: number;
  emergencyApprovalDays: number;
  defaultRefills: number;
  partialApprovalRefills: number;
  partialApprovalDays: number;
}

export interface DurSettings {
  earlyRefillGraceDays: number;
}

export interface EngineConfig {
  logLevel: z.infer<typeof envSchema>['LOG_LEVEL'];
  rulesPath?: string;
  priorAuth: PriorAuthSettings;
  dur: DurSettings;
}

export function loadEngineConfig(env: Record<string, string | undefined> = process.env): EngineConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigurationError('Invalid engine configuration', result.error.flatten().fieldErrors);
  }
  const vars = result.data;
  return Object.freeze({
    logLevel: vars.LOG_LEVEL,
    rulesPath: vars.RULES_PATH,
    priorAuth: Object.freeze({
      appealWindowDays: vars.PA_APPEAL_WINDOW_DAYS,
      approvalDurationDays: vars.PA_APPROVAL_DURATION_DAYS,
      emergencyApprovalDays: vars.PA_EMERGENCY_APPROVAL_DAYS,
      defaultRefills: vars.PA_DEFAULT_REFILLS,
      partialApprovalRefills: vars.PA_PARTIAL_APPROVAL_REFILLS,
      partialApprovalDays: vars.PA_PARTIAL_APPROVAL_DAYS,
    }),
    dur: Object.freeze({
      earlyRefillGraceDays: vars.DUR_EARLY_REFILL_GRACE_DAYS,
    }),
  });
}

let _config: EngineConfig | undefined;

export function getConfig(): EngineConfig {
  _config ??= loadEngineConfig();
  return _config;
}
