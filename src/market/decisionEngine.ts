import type { TradingConfig } from '../config/tradingConfig.js';
import { INTERVALS } from './constants.market.js';
import { silentLogger, type BotLogger } from './logging.js';
import {
  assertIntentWithinLimits,
  canOpenNewPosition,
  computeSize,
  computeThresholds,
  type ExposureView,
} from './riskPolicy.js';
import type { AccountSnapshot, ExitReason, OrderIntent, Recommendation } from './types.js';
import { ceilToCents } from './utils.js';

export type DecisionConfig = Pick<
  TradingConfig,
  | 'maxPositionSize'
  | 'maxPositions'
  | 'stopLossPct'
  | 'takeProfitPct'
  | 'minConfidence'
  | 'pollIntervalMinutes'
  | 'entryOrderType'
  | 'limitSlippagePct'
>;

export type HoldReason =
  | 'no_signal'
  | 'stale_recommendation'
  | 'low_confidence'
  | 'pending_order'
  | 'max_positions'
  | 'entries_blocked'
  | 'holding';

export type Decision =
  | { kind: 'entry'; intent: OrderIntent }
  | { kind: 'exit'; intent: OrderIntent; reason: ExitReason }
  | { kind: 'hold'; reason: HoldReason };

export interface DecisionInput {
  symbol: string;
  /** Undefined when analysis was unavailable: treated as HOLD. */
  recommendation: Recommendation | undefined;
  price: number;
  account: AccountSnapshot;
  ledger: ExposureView;
  now: number;
  /** False while the orchestrator is not RUNNING. */
  allowEntries: boolean;
  clientOrderId: string;
}

const hold = (reason: HoldReason): Decision => ({ kind: 'hold', reason });

/**
 * Turns one recommendation plus ledger state into zero or one order intent.
 * Risk bounds are always re-derived here; recommendation targets are ignored.
 * Throws InsufficientFunds (skip symbol) or RiskLimitExceeded (policy violation).
 */
export class DecisionEngine {
  constructor(
    private readonly config: DecisionConfig,
    private readonly log: BotLogger = silentLogger
  ) {}

  evaluate(input: DecisionInput): Decision {
    const { symbol, price, now, ledger } = input;
    const recommendation = this.freshRecommendation(input.recommendation, now);
    const position = ledger.getBySymbol(symbol);

    if (position) {
      if (position.status !== 'OPEN') return hold('pending_order');

      const exitReason = this.exitTrigger(position.stopLoss, position.takeProfit, price, recommendation);
      if (!exitReason) return hold('holding');

      const intent: OrderIntent = {
        symbol,
        side: 'SELL',
        quantity: position.quantity,
        orderType: 'market',
        stopLoss: position.stopLoss,
        takeProfit: position.takeProfit,
        reason: exitReason,
        clientOrderId: input.clientOrderId,
      };
      assertIntentWithinLimits(intent, input.account, ledger, this.config, price);
      this.log.info(`🏁 ${symbol} exit (${exitReason}) at ${price} | SL=${position.stopLoss} TP=${position.takeProfit}`);
      return { kind: 'exit', intent, reason: exitReason };
    }

    if (!recommendation) return hold(input.recommendation ? 'stale_recommendation' : 'no_signal');
    if (recommendation.action !== 'BUY') return hold('no_signal');
    if (recommendation.confidence < this.config.minConfidence) return hold('low_confidence');
    if (!input.allowEntries) return hold('entries_blocked');
    if (!canOpenNewPosition(ledger, symbol, this.config)) return hold('max_positions');

    const intent = this.buildEntry(input);
    assertIntentWithinLimits(intent, input.account, ledger, this.config, price);
    this.log.info(
      `🚀 ${symbol} entry ${intent.quantity} @ ${intent.limitPrice ?? price} | conf=${recommendation.confidence} SL=${intent.stopLoss} TP=${intent.takeProfit}`
    );
    return { kind: 'entry', intent };
  }

  private freshRecommendation(recommendation: Recommendation | undefined, now: number): Recommendation | undefined {
    if (!recommendation) return undefined;
    const maxAge = this.config.pollIntervalMinutes * INTERVALS.ONE_MIN;
    if (now - recommendation.timestamp > maxAge) {
      this.log.warn(
        `${recommendation.symbol} recommendation is ${Math.round((now - recommendation.timestamp) / 1000)}s old, ignoring`
      );
      return undefined;
    }
    return recommendation;
  }

  // Fixed priority: stop-loss, then take-profit, then the analysis signal
  private exitTrigger(
    stopLoss: number,
    takeProfit: number,
    price: number,
    recommendation: Recommendation | undefined
  ): ExitReason | undefined {
    if (price <= stopLoss) return 'stop_loss';
    if (price >= takeProfit) return 'take_profit';
    if (recommendation?.action === 'SELL' && recommendation.confidence >= this.config.minConfidence) {
      return 'signal';
    }
    return undefined;
  }

  private buildEntry(input: DecisionInput): OrderIntent {
    const { symbol, price, account } = input;
    const isLimit = this.config.entryOrderType === 'limit';
    const limitPrice = isLimit ? ceilToCents(price * (1 + this.config.limitSlippagePct)) : undefined;
    const quantity = computeSize(account, limitPrice ?? price, this.config, symbol);
    const { stopLoss, takeProfit } = computeThresholds(price, this.config, symbol);

    return {
      symbol,
      side: 'BUY',
      quantity,
      orderType: isLimit ? 'limit' : 'market',
      ...(limitPrice !== undefined ? { limitPrice } : {}),
      stopLoss,
      takeProfit,
      reason: 'entry',
      clientOrderId: input.clientOrderId,
    };
  }
}
