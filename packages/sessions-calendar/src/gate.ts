import { SessionNotReadyError } from '@vnquote/contracts';
import type { MarketSessionStatus } from '@vnquote/contracts';

/**
 * Block intraday-sensitive requests while the exchange prepares a session.
 *
 * Only the combination of no trading and `preparing` data blocks; every other
 * status passes.
 *
 * @throws {SessionNotReadyError} Carries the clock reading of `status`
 */
export function checkSession(status: MarketSessionStatus): void {
  if (!status.isTradingHour && status.dataStatus === 'preparing') {
    throw new SessionNotReadyError(
      `Market data is not ready: the exchange is preparing the session (as of ${status.time})`,
      { time: status.time, tradingSession: status.tradingSession }
    );
  }
}
