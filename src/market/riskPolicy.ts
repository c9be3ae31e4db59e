import type { TradingConfig } from '../config/tradingConfig.js';
import { InsufficientFunds, RiskLimitExceeded } from '../core/errors.js';
import type { AccountSnapshot, OrderIntent, Position } from './types.js';
import { ceilToCents, floorToCents } from './utils.js';

export type RiskConfig = Pick<
  TradingConfig,
  'maxPositionSize' | 'maxPositions' | 'stopLossPct' | 'takeProfitPct'
>;

/** What the risk rules need to know about current holdings. */
export interface ExposureView {
  activeCount(): number;
  hasExposure(symbol: string): boolean;
  getBySymbol(symbol: string): Position | undefined;
}

export interface Thresholds {
  stopLoss: number;
  takeProfit: number;
}

export const positionBudget = (account: AccountSnapshot, config: RiskConfig): number =>
  account.equity * config.maxPositionSize;

/**
 * Whole shares affordable within the per-position budget (and buying power).
 * Throws InsufficientFunds when that comes out as zero.
 */
export function computeSize(
  account: AccountSnapshot,
  price: number,
  config: RiskConfig,
  symbol = ''
): number {
  if (!Number.isFinite(price) || price <= 0) {
    throw new RiskLimitExceeded(symbol, `Cannot size ${symbol} at price ${price}`);
  }

  const budget = Math.min(positionBudget(account, config), account.buyingPower);
  let quantity = budget > 0 ? Math.floor(budget / price) : 0;
  while (quantity > 0 && quantity * price > budget) {
    quantity -= 1;
  }

  if (quantity <= 0) {
    throw new InsufficientFunds(
      symbol,
      `Budget $${budget.toFixed(2)} buys no ${symbol} shares at $${price.toFixed(2)}`
    );
  }
  return quantity;
}

export function computeThresholds(entryPrice: number, config: RiskConfig, symbol = ''): Thresholds {
  const stopLoss = floorToCents(entryPrice * (1 - config.stopLossPct));
  const takeProfit = ceilToCents(entryPrice * (1 + config.takeProfitPct));

  if (!(stopLoss > 0 && stopLoss < entryPrice && entryPrice < takeProfit)) {
    throw new RiskLimitExceeded(
      symbol,
      `Thresholds collapse at entry ${entryPrice}: stop=${stopLoss} take=${takeProfit}`
    );
  }
  return { stopLoss, takeProfit };
}

export function canOpenNewPosition(ledger: ExposureView, symbol: string, config: RiskConfig): boolean {
  return ledger.activeCount() < config.maxPositions && !ledger.hasExposure(symbol);
}

/**
 * Last gate before submission. Entry intents must fit the budget, capacity and
 * threshold invariant; exits must sell exactly what is held.
 */
export function assertIntentWithinLimits(
  intent: OrderIntent,
  account: AccountSnapshot,
  ledger: ExposureView,
  config: RiskConfig,
  referencePrice: number
): void {
  const { symbol } = intent;

  if (!Number.isInteger(intent.quantity) || intent.quantity <= 0) {
    throw new RiskLimitExceeded(symbol, `Quantity ${intent.quantity} is not a positive whole number`);
  }

  if (intent.side === 'SELL') {
    const position = ledger.getBySymbol(symbol);
    if (!position || position.status !== 'OPEN') {
      throw new RiskLimitExceeded(symbol, `No OPEN ${symbol} position to sell`);
    }
    if (position.quantity !== intent.quantity) {
      throw new RiskLimitExceeded(
        symbol,
        `Exit of ${intent.quantity} does not match held quantity ${position.quantity}`
      );
    }
    return;
  }

  if (!canOpenNewPosition(ledger, symbol, config)) {
    throw new RiskLimitExceeded(
      symbol,
      `Cannot open ${symbol}: ${ledger.activeCount()}/${config.maxPositions} positions or symbol already held`
    );
  }

  const price = intent.limitPrice ?? referencePrice;
  const cost = intent.quantity * price;
  const budget = positionBudget(account, config);
  if (cost > budget) {
    throw new RiskLimitExceeded(symbol, `Cost $${cost.toFixed(2)} exceeds budget $${budget.toFixed(2)}`);
  }

  if (!(intent.stopLoss < referencePrice && referencePrice < intent.takeProfit)) {
    throw new RiskLimitExceeded(
      symbol,
      `Thresholds stop=${intent.stopLoss} take=${intent.takeProfit} do not bracket ${referencePrice}`
    );
  }
}
