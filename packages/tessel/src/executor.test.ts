import { describe, expect, it } from 'vitest';
import { LogicExecutionError, MalformedResultError, NotFoundError } from './errors.js';
import { LogicExecutor, toLogicResult, type LogicStrategy } from './executor.js';
import type { ExecutionContext, LogicResult } from './types.js';

const context: ExecutionContext = {
  method: 'GET',
  url: '/posts/42',
  headers: {},
  body: '',
  host: 'localhost',
  remoteAddr: '127.0.0.1',
  params: { id: '42' },
};

function strategy(
  name: string,
  run: (logicPath: string, ctx: ExecutionContext) => Promise<LogicResult | undefined>
): LogicStrategy {
  return { name, execute: run };
}

/** Strategy that records how many runs overlap. */
function timedStrategy(delayMs: number) {
  let inFlight = 0;
  const stats = { maxInFlight: 0, runs: 0 };
  const s = strategy('timed', async (logicPath) => {
    inFlight++;
    stats.runs++;
    stats.maxInFlight = Math.max(stats.maxInFlight, inFlight);
    await new Promise((r) => setTimeout(r, delayMs));
    inFlight--;
    return { logicPath };
  });
  return { strategy: s, stats };
}

describe('toLogicResult', () => {
  it('treats undefined as an empty result', () => {
    expect(toLogicResult(undefined, 'unit')).toEqual({});
  });

  it('copies plain objects', () => {
    const value = { title: 'Hi', tags: ['a'] };
    const result = toLogicResult(value, 'unit');
    expect(result).toEqual(value);
    expect(result).not.toBe(value);
  });

  it.each([
    [null, 'null'],
    [[1, 2], 'an array'],
    ['text', 'string'],
    [42, 'number'],
  ])('rejects %j', (value, kind) => {
    expect(() => toLogicResult(value, 'unit')).toThrow(MalformedResultError);
    expect(() => toLogicResult(value, 'unit')).toThrow(`unit returned ${kind}, expected an object`);
  });
});

describe('LogicExecutor', () => {
  it('falls through strategies that do not apply', async () => {
    const tried: string[] = [];
    const executor = new LogicExecutor([
      strategy('first', async () => {
        tried.push('first');
        return undefined;
      }),
      strategy('second', async (_path, ctx) => {
        tried.push('second');
        return { id: ctx.params.id };
      }),
      strategy('third', async () => {
        tried.push('third');
        return { never: true };
      }),
    ]);

    expect(await executor.execute('routes/posts/_id/index.server.ts', context)).toEqual({ id: '42' });
    expect(tried).toEqual(['first', 'second']);
  });

  it('fails when no strategy applies', async () => {
    const executor = new LogicExecutor([strategy('none', async () => undefined)]);
    await expect(executor.execute('unit.ts', context)).rejects.toBeInstanceOf(LogicExecutionError);
  });

  it('propagates strategy errors unchanged', async () => {
    const executor = new LogicExecutor([
      strategy('throws', async () => {
        throw new NotFoundError();
      }),
    ]);
    await expect(executor.execute('unit.ts', context)).rejects.toBeInstanceOf(NotFoundError);
  });

  it('runs one call at a time for the same logic unit', async () => {
    const { strategy: s, stats } = timedStrategy(20);
    const executor = new LogicExecutor([s]);

    await Promise.all([
      executor.execute('same.ts', context),
      executor.execute('same.ts', context),
      executor.execute('same.ts', context),
    ]);

    expect(stats.runs).toBe(3);
    expect(stats.maxInFlight).toBe(1);
  });

  it('runs different logic units in parallel', async () => {
    const { strategy: s, stats } = timedStrategy(20);
    const executor = new LogicExecutor([s]);

    const results = await Promise.all([
      executor.execute('a.ts', context),
      executor.execute('b.ts', context),
    ]);

    expect(results).toEqual([{ logicPath: 'a.ts' }, { logicPath: 'b.ts' }]);
    expect(stats.maxInFlight).toBe(2);
  });

  it('keeps the lock usable after a failure', async () => {
    let calls = 0;
    const executor = new LogicExecutor([
      strategy('flaky', async () => {
        calls++;
        if (calls === 1) throw new Error('first call fails');
        return { ok: true };
      }),
    ]);

    await expect(executor.execute('unit.ts', context)).rejects.toThrow('first call fails');
    await expect(executor.execute('unit.ts', context)).resolves.toEqual({ ok: true });
  });
});
