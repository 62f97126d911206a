import logger from '../../utils/logger';
import { AbortedError, TimeoutError, withTimeout } from '../../utils/async';
import { errorMessage } from '../../utils/errors';
import { Decision, Strategy, StrategyContext, hold } from './Strategy';

/**
 * Evaluates a strategy with a deadline. Timeouts, aborts and thrown errors
 * come back as HOLD.
 */
export async function evaluateStrategy(
  strategy: Strategy,
  context: Omit<StrategyContext, 'signal'>,
  timeoutMs: number,
  parent?: AbortSignal
): Promise<Decision> {
  try {
    return await withTimeout(
      (signal) => strategy.evaluate({ ...context, signal }),
      timeoutMs,
      `${strategy.id} evaluation for ${context.symbol}`,
      parent
    );
  } catch (error) {
    if (error instanceof TimeoutError) {
      logger.warn(`Strategy ${strategy.id} timed out on ${context.symbol}, holding`);
      return hold('timeout');
    }
    if (error instanceof AbortedError) {
      return hold('aborted');
    }
    logger.error(`Strategy ${strategy.id} failed on ${context.symbol}: ${errorMessage(error)}`);
    return hold('error');
  }
}
