import { z } from 'zod';
import { ConfigError } from './errors';
import { Logger } from './logger';

export const CostOptionsSchema = z.object({
  refFraction: z.number().gt(0).max(1).default(0.1),
  rangeFraction: z.number().gt(0).max(1).default(0.3),
  indexScanFactor: z.number().gt(0).max(1).default(0.5),
  minFilteredPercent: z.number().min(0).max(100).default(10),
}).strict();

export const EngineOptionsSchema = z.object({
  maxRecursionDepth: z.number().int().min(1).max(10000).default(100),
  btreeOrder: z.number().int().min(3).default(4),
  cost: CostOptionsSchema.default({}),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('warn'),
}).strict();

export type CostOptions = z.infer<typeof CostOptionsSchema>;
export type ResolvedOptions = z.infer<typeof EngineOptionsSchema>;

// Loggers are objects, not configuration, so they bypass the schema.
export type EngineOptions = z.input<typeof EngineOptionsSchema> & {
  logger?: Logger,
};

export interface EngineContext {
  options: ResolvedOptions,
  logger: Logger,
}

export function resolveOptions(input: EngineOptions = {}): EngineContext {
  let { logger, ...rest } = input;
  let result = EngineOptionsSchema.safeParse(rest);
  if (!result.success) {
    let issues = result.error.issues.map(issue => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    throw new ConfigError('Invalid engine options', issues);
  }
  return {
    options: result.data,
    logger: logger ?? new Logger({ level: result.data.logLevel }),
  };
}
