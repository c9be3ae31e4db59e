import dayjs from 'dayjs';
import utc from 'dayjs/plugin/utc.js';
import type { OrchestratorStatus } from '../market/orchestrator.js';
import type { PendingOrderView } from '../market/positionLedger.js';
import type { Position } from '../market/types.js';

dayjs.extend(utc);

const STATE_ICON = {
  RUNNING: '🟢',
  STOPPED: '⚪',
  EMERGENCY_STOPPED: '🛑',
} as const;

const money = (value: number) => `${value < 0 ? '-' : ''}$${Math.abs(value).toFixed(2)}`;
const signedMoney = (value: number) => `${value > 0 ? '+' : ''}${money(value)}`;
const stamp = (ms: number) => dayjs.utc(ms).format('YYYY-MM-DD HH:mm') + ' UTC';

export function formatStatus(status: OrchestratorStatus): string {
  const lines = [
    `${STATE_ICON[status.state]} *${status.state}* (${status.paperTrading ? 'paper' : 'LIVE'})`,
    `📅 Last cycle: ${status.lastCycleTime === null ? 'never' : stamp(status.lastCycleTime)}`,
    `💼 Open positions: ${status.openPositions}`,
    `💰 Equity: ${status.equity === null ? 'unknown' : money(status.equity)}`,
  ];
  if (status.inTradingWindow !== null) {
    lines.push(`🕘 Trading window: ${status.inTradingWindow ? 'open' : 'closed'}`);
  }
  if (status.emergencyReason) {
    lines.push(`⚠️ Emergency reason: ${status.emergencyReason}`);
  }
  if (status.consecutiveExecutionFailures > 0) {
    lines.push(`📡 Brokerage failures in a row: ${status.consecutiveExecutionFailures}`);
  }
  if (status.lastError) {
    lines.push(`❌ Last error: ${status.lastError}`);
  }
  if (status.inconsistencies.length > 0) {
    lines.push(`🔍 Ledger inconsistencies: ${status.inconsistencies.length}`);
  }
  return lines.join('\n');
}

export function formatPositions(positions: Position[]): string {
  if (positions.length === 0) return '📭 No open positions';

  return positions
    .map(p =>
      [
        `*${p.symbol}* ${p.status}`,
        `Qty: ${p.quantity} @ ${money(p.entryPrice)} | Mark: ${money(p.markPrice)}`,
        `SL: ${money(p.stopLoss)} | TP: ${money(p.takeProfit)}`,
        `PnL: ${signedMoney(p.unrealizedPnl)}`,
      ].join('\n')
    )
    .join('\n\n');
}

export function formatOrders(orders: PendingOrderView[]): string {
  if (orders.length === 0) return '📭 No pending orders';

  return orders
    .map(o => {
      const { intent } = o;
      const price = intent.limitPrice !== undefined ? ` limit ${money(intent.limitPrice)}` : ' market';
      const broker = o.handle ? `${o.handle.status}, filled ${o.handle.filledQuantity}` : 'not confirmed';
      return (
        `*${o.symbol}* ${intent.side} ${intent.quantity}${price} (${intent.reason})\n` +
        `Since ${stamp(o.submittedAt)} | ${broker}`
      );
    })
    .join('\n\n');
}
