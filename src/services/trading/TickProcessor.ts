/**
 * TickProcessor - the per-tick decision sequence shared by the live loop and the backtest.
 *
 * Risk triggers are read from the current open positions, strategies are evaluated
 * (async, bounded by a timeout), then every resulting ledger change for the tick is
 * applied in one engine transaction.
 */

import logger from '../../utils/logger';
import { LedgerTransaction } from '../ledger/LedgerTransaction';
import { SimulationEngine } from './SimulationEngine';
import { checkRiskTriggers } from './riskTriggers';
import { unrealizedPnl } from './pricing';
import { dec } from '../../utils/money';
import { Decision, SentimentReading, Strategy, StrategyPositionView, hold } from '../strategies/Strategy';
import { evaluateStrategy } from '../strategies/StrategyRunner';
import {
  Bar,
  OpenPositionRequest,
  Position,
  PriceObservation,
  Rejection,
  Trade,
  TriggerHit,
} from '../../types/trading';

export interface SymbolMarketState {
  symbol: string;
  bars: Bar[];
  /** Price used for marks, strategy exits and market fills. */
  price: number;
  /** What risk triggers are checked against: a price, or the latest bar. */
  observation: PriceObservation;
  fundingRate?: number;
  sentiment?: SentimentReading;
}

export interface TickSettings {
  maxOpenPositions: number;
  positionSizePercent: number;
  strategyTimeoutMs: number;
  leverage?: number;
}

export interface TickOptions {
  allowOpens: boolean;
  now: Date;
  signal?: AbortSignal;
}

export interface TickOutcome {
  opened: Position[];
  closed: Trade[];
  rejections: Rejection[];
  decisions: Record<string, Decision>;
}

interface SymbolPlan {
  market: SymbolMarketState;
  positionId?: string;
  trigger: TriggerHit | null;
  decision: Decision;
}

export function toStrategyView(position: Position, price: number): StrategyPositionView {
  return {
    id: position.id,
    direction: position.direction,
    size: position.size.toNumber(),
    entryPrice: position.entryPrice.toNumber(),
    leverage: position.leverage,
    openedAt: position.openedAt,
    unrealizedPnl: unrealizedPnl(position, dec(price)).toNumber(),
  };
}

/** Favorable extreme of the observation, used to advance trailing stops. */
function favorableExtreme(observation: PriceObservation, direction: Position['direction']): number {
  if (typeof observation === 'number') return observation;
  return direction === 'long' ? observation.high : observation.low;
}

export class TickProcessor {
  constructor(
    private readonly engine: SimulationEngine,
    private readonly strategy: Strategy,
    private readonly settings: TickSettings
  ) {}

  async process(markets: SymbolMarketState[], options: TickOptions): Promise<TickOutcome> {
    const plans = await this.plan(markets, options);

    if (options.signal?.aborted) {
      logger.info('Tick cancelled before ledger phase');
      return { opened: [], closed: [], rejections: [], decisions: {} };
    }

    const outcome = await this.engine.transaction((tx) => this.apply(tx, plans, options));

    for (const trade of outcome.closed) {
      this.strategy.onPositionClosed?.(trade.symbol, trade.closedAt);
    }
    return outcome;
  }

  private async plan(markets: SymbolMarketState[], options: TickOptions): Promise<SymbolPlan[]> {
    const plans: SymbolPlan[] = [];

    for (const market of markets) {
      const position = this.engine.getOpenPosition(market.symbol);
      const trigger = position ? checkRiskTriggers(position, market.observation) : null;

      let decision: Decision;
      if (trigger) {
        decision = hold(trigger.reason);
      } else if (!position && !options.allowOpens) {
        decision = hold('opens_disabled');
      } else {
        decision = await evaluateStrategy(
          this.strategy,
          {
            symbol: market.symbol,
            bars: market.bars,
            position: position ? toStrategyView(position, market.price) : null,
            now: options.now,
            fundingRate: market.fundingRate,
            sentiment: market.sentiment,
          },
          this.settings.strategyTimeoutMs,
          options.signal
        );
      }

      plans.push({ market, positionId: position?.id, trigger, decision });
    }

    return plans;
  }

  private apply(tx: LedgerTransaction, plans: SymbolPlan[], options: TickOptions): TickOutcome {
    const closed: Trade[] = [];
    const opened: Position[] = [];
    const decisions: Record<string, Decision> = {};

    for (const { market, positionId, trigger, decision } of plans) {
      decisions[market.symbol] = decision;
      const position = tx.findOpenPosition(market.symbol);

      if (position && position.id === positionId) {
        if (trigger) {
          const result = tx.close(position.id, trigger.referencePrice, trigger.reason);
          if (result.accepted) closed.push(result.value);
          continue;
        }

        tx.ratchetTrailingStop(position.id, favorableExtreme(market.observation, position.direction));
        tx.markToMarket(position.id, market.price);

        if (decision.kind === 'close') {
          const result = tx.close(position.id, market.price, 'strategy_signal');
          if (result.accepted) closed.push(result.value);
        }
        continue;
      }

      if (position || decision.kind !== 'open' || !options.allowOpens) {
        continue;
      }

      if (tx.openPositionCount() >= this.settings.maxOpenPositions) {
        logger.info(`Skipping ${market.symbol} open: ${tx.openPositionCount()} positions already open`);
        continue;
      }

      const request: OpenPositionRequest = {
        symbol: market.symbol,
        direction: decision.direction,
        sizing: { kind: 'balancePercent', percent: decision.sizePercent ?? this.settings.positionSizePercent },
        referencePrice: market.price,
        leverage: decision.leverage ?? this.settings.leverage,
        stopLoss: decision.stopLoss,
        takeProfit: decision.takeProfit,
        trailingStopPercent: decision.trailingStopPercent,
        strategyId: this.strategy.id,
        note: decision.reason,
      };
      const result = tx.open(request);
      if (result.accepted) opened.push(result.value);
    }

    return { opened, closed, rejections: tx.getRejections(), decisions };
  }

  /**
   * Closes every open position at the given prices in one transaction.
   */
  async closeAll(prices: Record<string, number>, reason: Trade['closeReason']): Promise<Trade[]> {
    const closed = await this.engine.transaction((tx) => {
      const trades: Trade[] = [];
      for (const position of tx.getOpenPositions()) {
        const price = prices[position.symbol] ?? position.markPrice?.toNumber();
        if (price === undefined) {
          logger.warn(`No price for ${position.symbol}, leaving position ${position.id} open`);
          continue;
        }
        const result = tx.close(position.id, price, reason);
        if (result.accepted) trades.push(result.value);
      }
      return trades;
    });

    for (const trade of closed) {
      this.strategy.onPositionClosed?.(trade.symbol, trade.closedAt);
    }
    return closed;
  }
}
