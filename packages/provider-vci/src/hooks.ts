/**
 * @fileoverview Call hooks run around every public quote method.
 *
 * @module @vnquote/provider-vci/hooks
 */

import { startTimer } from '@vnquote/logger';
import type { Logger, PerfTimer } from '@vnquote/logger';
import type { QuoteCallContext, QuoteHook } from './types.js';

type HookStage = 'before' | 'after' | 'onError';

/**
 * Invoke one hook stage in order. A hook that throws or rejects is logged and
 * does not affect the call.
 */
async function notify(
  hooks: readonly QuoteHook[],
  stage: HookStage,
  logger: Logger,
  context: QuoteCallContext,
  invoke: (hook: QuoteHook) => void | Promise<void>
): Promise<void> {
  for (const hook of hooks) {
    try {
      await invoke(hook);
    } catch (error) {
      logger.warn('Quote hook failed', {
        stage,
        method: context.method,
        reason: error instanceof Error ? error.message : String(error),
      });
    }
  }
}

/**
 * Run `call` with every hook notified before it, after it resolves, or when
 * it rejects. The call's result or error is returned unchanged.
 *
 * @example
 * ```typescript
 * const frame = await runWithHooks(hooks, logger, { method: 'history', symbol: 'VCB', params }, () =>
 *   fetchHistory(params)
 * );
 * ```
 */
export async function runWithHooks<T>(
  hooks: readonly QuoteHook[],
  logger: Logger,
  context: QuoteCallContext,
  call: () => Promise<T>
): Promise<T> {
  if (hooks.length === 0) {
    return call();
  }

  await notify(hooks, 'before', logger, context, (hook) => hook.before?.(context));

  let result: T;
  try {
    result = await call();
  } catch (error) {
    await notify(hooks, 'onError', logger, context, (hook) => hook.onError?.(context, error));
    throw error;
  }

  await notify(hooks, 'after', logger, context, (hook) => hook.after?.(context, result));
  return result;
}

function rowCount(result: unknown): number | undefined {
  if (typeof result === 'object' && result !== null && 'rows' in result && Array.isArray(result.rows)) {
    return result.rows.length;
  }
  return undefined;
}

/**
 * Hook that logs each call's duration.
 */
export function createTimingHook(logger: Logger): QuoteHook {
  const timers = new WeakMap<QuoteCallContext, PerfTimer>();

  return {
    before(context) {
      timers.set(context, startTimer());
    },
    after(context, result) {
      logger.info(`${context.method} completed`, {
        symbol: context.symbol,
        rows: rowCount(result),
        duration_ms: timers.get(context)?.stop(),
      });
    },
    onError(context, error) {
      logger.warn(`${context.method} failed`, {
        symbol: context.symbol,
        code: typeof error === 'object' && error !== null && 'code' in error ? error.code : undefined,
        duration_ms: timers.get(context)?.stop(),
      });
    },
  };
}
