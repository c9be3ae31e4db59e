import { describe, expect, it } from 'vitest';

import { formatOrders, formatPositions, formatStatus } from '../../src/bot/format.js';
import type { OrchestratorStatus } from '../../src/market/orchestrator.js';
import type { PendingOrderView } from '../../src/market/positionLedger.js';
import type { Position } from '../../src/market/types.js';
import { MONDAY_10AM } from '../support/config.js';

const running: OrchestratorStatus = {
  state: 'RUNNING',
  lastCycleTime: MONDAY_10AM,
  openPositions: 2,
  equity: 10250.5,
  paperTrading: true,
  inTradingWindow: true,
  consecutiveExecutionFailures: 0,
  emergencyReason: null,
  lastError: null,
  inconsistencies: [],
};

const aapl: Position = {
  id: 'cid-1',
  symbol: 'AAPL',
  quantity: 10,
  entryPrice: 100,
  entryTime: MONDAY_10AM,
  stopLoss: 95,
  takeProfit: 115,
  status: 'OPEN',
  markPrice: 97.5,
  unrealizedPnl: -25,
  realizedPnl: 0,
};

describe('formatStatus', () => {
  it('shows the essentials while running', () => {
    expect(formatStatus(running)).toBe(
      [
        '🟢 *RUNNING* (paper)',
        '📅 Last cycle: 2026-10-19 14:00 UTC',
        '💼 Open positions: 2',
        '💰 Equity: $10250.50',
        '🕘 Trading window: open',
      ].join('\n')
    );
  });

  it('adds the emergency details', () => {
    const status: OrchestratorStatus = {
      state: 'EMERGENCY_STOPPED',
      lastCycleTime: null,
      openPositions: 0,
      equity: null,
      paperTrading: false,
      inTradingWindow: null,
      consecutiveExecutionFailures: 3,
      emergencyReason: '3 consecutive brokerage failures',
      lastError: 'ExecutionUnavailable: timeout',
      inconsistencies: [{ positionId: 'cid-1', symbol: 'AAPL', message: 'missing', at: MONDAY_10AM }],
    };
    expect(formatStatus(status).split('\n')).toEqual([
      '🛑 *EMERGENCY_STOPPED* (LIVE)',
      '📅 Last cycle: never',
      '💼 Open positions: 0',
      '💰 Equity: unknown',
      '⚠️ Emergency reason: 3 consecutive brokerage failures',
      '📡 Brokerage failures in a row: 3',
      '❌ Last error: ExecutionUnavailable: timeout',
      '🔍 Ledger inconsistencies: 1',
    ]);
  });
});

describe('formatPositions', () => {
  it('lists each position with its thresholds', () => {
    const msft: Position = { ...aapl, id: 'cid-2', symbol: 'MSFT', markPrice: 101.25, unrealizedPnl: 12.5 };
    expect(formatPositions([aapl, msft])).toBe(
      [
        '*AAPL* OPEN',
        'Qty: 10 @ $100.00 | Mark: $97.50',
        'SL: $95.00 | TP: $115.00',
        'PnL: -$25.00',
        '',
        '*MSFT* OPEN',
        'Qty: 10 @ $100.00 | Mark: $101.25',
        'SL: $95.00 | TP: $115.00',
        'PnL: +$12.50',
      ].join('\n')
    );
  });

  it('says so when there is nothing open', () => {
    expect(formatPositions([])).toBe('📭 No open positions');
  });
});

describe('formatOrders', () => {
  const view: PendingOrderView = {
    positionId: 'cid-1',
    symbol: 'AAPL',
    status: 'PENDING_ENTRY',
    intent: {
      symbol: 'AAPL',
      side: 'BUY',
      quantity: 10,
      orderType: 'limit',
      limitPrice: 50.1,
      stopLoss: 47.5,
      takeProfit: 57.5,
      reason: 'entry',
      clientOrderId: 'cid-1',
    },
    submittedAt: MONDAY_10AM,
  };

  it('marks orders the broker has not confirmed', () => {
    expect(formatOrders([view])).toBe('*AAPL* BUY 10 limit $50.10 (entry)\nSince 2026-10-19 14:00 UTC | not confirmed');
  });

  it('shows the broker status once known', () => {
    const confirmed: PendingOrderView = {
      ...view,
      handle: {
        orderId: 'order-1',
        clientOrderId: 'cid-1',
        symbol: 'AAPL',
        side: 'BUY',
        quantity: 10,
        status: 'partially_filled',
        filledQuantity: 4,
        submittedAt: MONDAY_10AM,
      },
    };
    expect(formatOrders([confirmed]).split('\n')[1]).toBe('Since 2026-10-19 14:00 UTC | partially_filled, filled 4');
  });

  it('says so when nothing is pending', () => {
    expect(formatOrders([])).toBe('📭 No pending orders');
  });
});
