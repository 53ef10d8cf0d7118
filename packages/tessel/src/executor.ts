import type { ExecutionContext, LogicResult } from './types.js';
import { LogicExecutionError, MalformedResultError } from './errors.js';
import { KeyedLocks } from './locks.js';
import { logger } from './logger.js';

/**
 * One way of running a logic unit. Resolving to undefined means the strategy
 * does not apply (e.g. no precompiled artifact) and the next one is tried.
 */
export interface LogicStrategy {
  readonly name: string;
  execute(logicPath: string, context: ExecutionContext): Promise<LogicResult | undefined>;
}

/**
 * Normalize what a handler produced. No return value is an empty result;
 * anything other than a plain object is malformed.
 */
export function toLogicResult(value: unknown, source: string): LogicResult {
  if (value === undefined) return {};
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    const kind = value === null ? 'null' : Array.isArray(value) ? 'an array' : typeof value;
    throw new MalformedResultError(`${source} returned ${kind}, expected an object`);
  }
  return Object.fromEntries(Object.entries(value));
}

/**
 * Runs logic units through an ordered list of strategies. Calls for the same
 * logic unit are serialized; different units run in parallel.
 */
export class LogicExecutor {
  constructor(
    private readonly strategies: LogicStrategy[],
    private readonly locks: KeyedLocks = new KeyedLocks()
  ) {}

  execute(logicPath: string, context: ExecutionContext): Promise<LogicResult> {
    return this.locks.run(logicPath, () => this.runStrategies(logicPath, context));
  }

  private async runStrategies(
    logicPath: string,
    context: ExecutionContext
  ): Promise<LogicResult> {
    for (const strategy of this.strategies) {
      const result = await strategy.execute(logicPath, context);
      if (result !== undefined) {
        logger.debug(`Logic ${strategy.name}: ${logicPath}`);
        return result;
      }
    }
    throw new LogicExecutionError(`no strategy could run ${logicPath}`);
  }
}
