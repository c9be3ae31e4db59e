import { beforeEach, describe, expect, it } from 'vitest';

import { InsufficientFunds } from '../../src/core/errors.js';
import { DecisionEngine, type DecisionInput } from '../../src/market/decisionEngine.js';
import { PositionLedger } from '../../src/market/positionLedger.js';
import type { AccountSnapshot, OrderIntent, Recommendation, RecommendationAction } from '../../src/market/types.js';
import { MONDAY_10AM, testConfig } from '../support/config.js';

const NOW = MONDAY_10AM;
const config = testConfig();

const account: AccountSnapshot = {
  equity: 10_000,
  buyingPower: 10_000,
  cash: 10_000,
  openPositionCount: 0,
  takenAt: NOW,
};

const rec = (symbol: string, action: RecommendationAction, confidence: number, ageMs = 0): Recommendation => ({
  symbol,
  action,
  confidence,
  timestamp: NOW - ageMs,
});

function open(ledger: PositionLedger, symbol: string, price = 100, quantity = 10) {
  const intent: OrderIntent = {
    symbol,
    side: 'BUY',
    quantity,
    orderType: 'market',
    stopLoss: 95,
    takeProfit: 115,
    reason: 'entry',
    clientOrderId: `entry-${symbol}`,
  };
  ledger.trackEntryOrder(intent, price, NOW);
  ledger.recordEntry(intent.clientOrderId, { quantity, price, at: NOW });
}

describe('DecisionEngine', () => {
  let ledger: PositionLedger;
  let engine: DecisionEngine;

  const input = (overrides: Partial<DecisionInput>): DecisionInput => ({
    symbol: 'AAPL',
    recommendation: undefined,
    price: 50,
    account,
    ledger,
    now: NOW,
    allowEntries: true,
    clientOrderId: 'cid-1',
    ...overrides,
  });

  beforeEach(() => {
    ledger = new PositionLedger(config);
    engine = new DecisionEngine(config);
  });

  describe('entries', () => {
    it('sizes a confident BUY to a quarter of equity', () => {
      const decision = engine.evaluate(input({ recommendation: rec('AAPL', 'BUY', 0.8) }));
      expect(decision).toEqual({
        kind: 'entry',
        intent: {
          symbol: 'AAPL',
          side: 'BUY',
          quantity: 50,
          orderType: 'market',
          stopLoss: 47.5,
          takeProfit: 57.5,
          reason: 'entry',
          clientOrderId: 'cid-1',
        },
      });
    });

    it('enters at market by default', () => {
      const decision = new DecisionEngine(testConfig()).evaluate(input({ recommendation: rec('AAPL', 'BUY', 0.8) }));
      expect(decision).toMatchObject({ kind: 'entry', intent: { orderType: 'market', quantity: 50 } });
    });

    it('prices a limit entry slightly above the last trade and sizes at the limit', () => {
      const limitEngine = new DecisionEngine(testConfig({ entryOrderType: 'limit', limitSlippagePct: 0.002 }));
      const decision = limitEngine.evaluate(input({ recommendation: rec('AAPL', 'BUY', 0.8) }));
      expect(decision.kind).toBe('entry');
      if (decision.kind !== 'entry') return;
      expect(decision.intent).toMatchObject({ orderType: 'limit', limitPrice: 50.1, quantity: 49 });
    });

    it('ignores the recommendation targets and derives its own', () => {
      const decision = engine.evaluate(
        input({ recommendation: { ...rec('AAPL', 'BUY', 0.9), stopLoss: 10, targetPrice: 500 } })
      );
      expect(decision).toMatchObject({ kind: 'entry', intent: { stopLoss: 47.5, takeProfit: 57.5 } });
    });

    it('holds below the confidence threshold', () => {
      expect(engine.evaluate(input({ recommendation: rec('AAPL', 'BUY', 0.5) }))).toEqual({
        kind: 'hold',
        reason: 'low_confidence',
      });
    });

    it('treats a recommendation older than one poll interval as HOLD', () => {
      const stale = rec('AAPL', 'BUY', 0.9, 11 * 60_000);
      expect(engine.evaluate(input({ recommendation: stale }))).toEqual({
        kind: 'hold',
        reason: 'stale_recommendation',
      });
    });

    it('holds without a recommendation', () => {
      expect(engine.evaluate(input({}))).toEqual({ kind: 'hold', reason: 'no_signal' });
    });

    it('holds at max positions', () => {
      for (const symbol of ['MSFT', 'NVDA', 'AMD', 'META']) open(ledger, symbol);
      expect(engine.evaluate(input({ recommendation: rec('AAPL', 'BUY', 0.9) }))).toEqual({
        kind: 'hold',
        reason: 'max_positions',
      });
    });

    it('holds when entries are blocked', () => {
      expect(engine.evaluate(input({ recommendation: rec('AAPL', 'BUY', 0.9), allowEntries: false }))).toEqual({
        kind: 'hold',
        reason: 'entries_blocked',
      });
    });

    it('throws InsufficientFunds when one share is over budget', () => {
      expect(() => engine.evaluate(input({ recommendation: rec('AAPL', 'BUY', 0.9), price: 3000 }))).toThrow(
        InsufficientFunds
      );
    });
  });

  describe('exits', () => {
    beforeEach(() => {
      open(ledger, 'AAPL', 100);
    });

    it('stops out at the stop price even against a BUY signal', () => {
      const decision = engine.evaluate(input({ price: 94.99, recommendation: rec('AAPL', 'BUY', 0.95) }));
      expect(decision).toMatchObject({
        kind: 'exit',
        reason: 'stop_loss',
        intent: { side: 'SELL', quantity: 10, orderType: 'market', reason: 'stop_loss' },
      });
    });

    it('triggers the stop at exactly the stop price', () => {
      expect(engine.evaluate(input({ price: 95 }))).toMatchObject({ kind: 'exit', reason: 'stop_loss' });
    });

    it('takes profit at the target', () => {
      expect(engine.evaluate(input({ price: 115 }))).toMatchObject({ kind: 'exit', reason: 'take_profit' });
    });

    it('exits on a confident SELL', () => {
      expect(engine.evaluate(input({ price: 100, recommendation: rec('AAPL', 'SELL', 0.7) }))).toMatchObject({
        kind: 'exit',
        reason: 'signal',
      });
    });

    it('keeps holding on a weak SELL', () => {
      expect(engine.evaluate(input({ price: 100, recommendation: rec('AAPL', 'SELL', 0.4) }))).toEqual({
        kind: 'hold',
        reason: 'holding',
      });
    });

    it('waits while an order is pending', () => {
      ledger.trackExitOrder('entry-AAPL', {
        symbol: 'AAPL',
        side: 'SELL',
        quantity: 10,
        orderType: 'market',
        stopLoss: 95,
        takeProfit: 115,
        reason: 'signal',
        clientOrderId: 'exit-1',
      }, NOW);
      expect(engine.evaluate(input({ price: 90 }))).toEqual({ kind: 'hold', reason: 'pending_order' });
    });
  });
});
