import { LedgerInconsistency, RiskLimitExceeded } from '../core/errors.js';
import {
  FILL_GRACE_MS,
  MAX_CLOSED_HISTORY,
  MAX_INCONSISTENCIES_KEPT,
  ORDER_STATUS_GROUPS,
} from './constants.market.js';
import { isActive, isPending, positionStep, type PositionEvent } from './fsm.js';
import { silentLogger, type BotLogger } from './logging.js';
import { computeThresholds, type ExposureView, type RiskConfig, type Thresholds } from './riskPolicy.js';
import type {
  BrokerPosition,
  ExecutionSnapshot,
  ExitReason,
  Fill,
  OrderHandle,
  OrderIntent,
  Position,
  PositionStatus,
} from './types.js';
import { calcPnl } from './utils.js';

export interface LedgerChange {
  positionId: string;
  symbol: string;
  from: PositionStatus | null;
  to: PositionStatus;
  note: string;
}

export interface InconsistencyRecord {
  positionId: string;
  symbol: string;
  message: string;
  at: number;
}

export interface ReconcileReport {
  changes: LedgerChange[];
  inconsistencies: LedgerInconsistency[];
}

export interface PendingOrderView {
  positionId: string;
  symbol: string;
  status: PositionStatus;
  intent: OrderIntent;
  handle?: OrderHandle;
  submittedAt: number;
}

export interface LedgerJSON {
  positions: Position[];
  history: Position[];
  inconsistencies: InconsistencyRecord[];
}

const isDeadOrder = (handle: OrderHandle): boolean => ORDER_STATUS_GROUPS.dead.has(handle.status);

const sameJson = (a: unknown, b: unknown): boolean => JSON.stringify(a) === JSON.stringify(b);

/**
 * In-process mirror of positions. The broker is the system of record: every
 * reconcile moves the ledger toward it and reports each change it made.
 */
export class PositionLedger implements ExposureView {
  private readonly active = new Map<string, Position>();
  private history: Position[] = [];
  private inconsistencies: InconsistencyRecord[] = [];

  constructor(
    private readonly config: RiskConfig,
    private readonly log: BotLogger = silentLogger
  ) {}

  // =====================
  // Queries
  // =====================
  getActive(): Position[] {
    return [...this.active.values()].map(p => structuredClone(p));
  }

  getHistory(): Position[] {
    return this.history.map(p => structuredClone(p));
  }

  getById(id: string): Position | undefined {
    const position = this.active.get(id);
    return position ? structuredClone(position) : undefined;
  }

  getBySymbol(symbol: string): Position | undefined {
    const position = this.findBySymbol(symbol);
    return position ? structuredClone(position) : undefined;
  }

  activeCount(): number {
    return this.active.size;
  }

  hasExposure(symbol: string): boolean {
    return this.findBySymbol(symbol) !== undefined;
  }

  symbols(): string[] {
    return [...new Set([...this.active.values()].map(p => p.symbol))];
  }

  getInconsistencies(): InconsistencyRecord[] {
    return this.inconsistencies.map(r => ({ ...r }));
  }

  getPendingOrders(): PendingOrderView[] {
    const views: PendingOrderView[] = [];
    for (const p of this.active.values()) {
      if (!p.pendingOrder) continue;
      views.push({
        positionId: p.id,
        symbol: p.symbol,
        status: p.status,
        intent: structuredClone(p.pendingOrder.intent),
        ...(p.pendingOrder.handle ? { handle: structuredClone(p.pendingOrder.handle) } : {}),
        submittedAt: p.pendingOrder.submittedAt,
      });
    }
    return views;
  }

  /** Pending entries submitted more than `timeoutMs` ago. */
  staleEntries(now: number, timeoutMs: number): PendingOrderView[] {
    return this.getPendingOrders().filter(
      o => o.status === 'PENDING_ENTRY' && now - o.submittedAt > timeoutMs
    );
  }

  /** Pending exits submitted more than `timeoutMs` ago. */
  staleExits(now: number, timeoutMs: number): PendingOrderView[] {
    return this.getPendingOrders().filter(
      o => o.status === 'PENDING_EXIT' && now - o.submittedAt > timeoutMs
    );
  }

  // =====================
  // Order tracking
  // =====================
  trackEntryOrder(intent: OrderIntent, expectedPrice: number, now: number): Position {
    if (intent.side !== 'BUY' || intent.reason !== 'entry') {
      throw new RiskLimitExceeded(intent.symbol, `Not an entry intent: ${intent.side}/${intent.reason}`);
    }
    if (this.hasExposure(intent.symbol)) {
      throw new RiskLimitExceeded(intent.symbol, `${intent.symbol} already has an active position`);
    }

    const position: Position = {
      id: intent.clientOrderId,
      symbol: intent.symbol,
      quantity: intent.quantity,
      entryPrice: expectedPrice,
      entryTime: now,
      stopLoss: intent.stopLoss,
      takeProfit: intent.takeProfit,
      status: 'PENDING_ENTRY',
      markPrice: expectedPrice,
      unrealizedPnl: 0,
      realizedPnl: 0,
      pendingOrder: { intent: structuredClone(intent), submittedAt: now },
    };
    this.active.set(position.id, position);
    this.log.info(`📝 ${intent.symbol} PENDING_ENTRY qty=${intent.quantity} id=${position.id}`);
    return structuredClone(position);
  }

  attachHandle(id: string, handle: OrderHandle): void {
    const position = this.require(id);
    if (position.pendingOrder) {
      position.pendingOrder.handle = structuredClone(handle);
    }
  }

  trackExitOrder(id: string, intent: OrderIntent, now: number): LedgerChange {
    const position = this.require(id);
    const change = this.transition(position, 'exit_submitted', `exit (${intent.reason}) submitted`);
    position.pendingOrder = { intent: structuredClone(intent), submittedAt: now };
    return change;
  }

  /** PENDING_ENTRY -> OPEN once the broker confirms the fill. */
  recordEntry(id: string, fill: Fill): LedgerChange {
    const position = this.require(id);
    const thresholds = computeThresholds(fill.price, this.config, position.symbol);
    const change = this.transition(
      position,
      'fill_confirmed',
      `filled ${fill.quantity} @ ${fill.price}`
    );
    position.quantity = fill.quantity;
    position.entryPrice = fill.price;
    position.entryTime = fill.at;
    position.stopLoss = thresholds.stopLoss;
    position.takeProfit = thresholds.takeProfit;
    position.markPrice = fill.price;
    position.unrealizedPnl = 0;
    delete position.pendingOrder;
    return change;
  }

  /** Closes an OPEN or PENDING_EXIT position at the fill price. */
  recordExit(id: string, fill: Fill, reason: ExitReason): LedgerChange {
    const position = this.require(id);
    const event: PositionEvent = position.status === 'OPEN' ? 'exit_filled' : 'fill_confirmed';
    const change = this.transition(position, event, `exit (${reason}) filled @ ${fill.price}`);
    position.realizedPnl = calcPnl(position.entryPrice, fill.price, position.quantity);
    position.unrealizedPnl = 0;
    position.markPrice = fill.price;
    position.exitPrice = fill.price;
    position.exitTime = fill.at;
    position.exitReason = reason;
    delete position.pendingOrder;
    this.archive(position);
    return change;
  }

  /** Broker refused the pending order: entries become VOID, exits go back to OPEN. */
  rejectOrder(id: string, why: string): LedgerChange {
    const position = this.require(id);
    const change = this.transition(position, 'fill_rejected', why);
    delete position.pendingOrder;
    if (position.status === 'VOID') {
      position.voidReason = why;
      this.archive(position);
    }
    return change;
  }

  expireEntry(id: string, why: string): LedgerChange {
    const position = this.require(id);
    const change = this.transition(position, 'timeout', why);
    delete position.pendingOrder;
    position.voidReason = why;
    this.archive(position);
    return change;
  }

  // =====================
  // Reconciliation
  // =====================
  reconcile(snapshot: ExecutionSnapshot): ReconcileReport {
    const changes: LedgerChange[] = [];
    const inconsistencies: LedgerInconsistency[] = [];

    const brokerBySymbol = new Map<string, BrokerPosition>();
    for (const bp of snapshot.positions) {
      if (bp.quantity > 0) {
        brokerBySymbol.set(bp.symbol, bp);
      } else {
        this.log.warn(`Ignoring non-long broker position ${bp.symbol} qty=${bp.quantity}`);
      }
    }

    // 1. Resolve pending orders
    for (const position of [...this.active.values()]) {
      if (!isPending(position.status) || !position.pendingOrder) continue;

      const clientId = position.pendingOrder.intent.clientOrderId;
      const order = snapshot.orders[clientId];
      const broker = brokerBySymbol.get(position.symbol);

      if (position.status === 'PENDING_ENTRY') {
        const change = this.resolveEntry(position, order, broker, snapshot.takenAt);
        if (change) changes.push(change);
      } else {
        const change = this.resolveExit(position, order, broker, snapshot.takenAt);
        if (change) changes.push(change);
      }
    }

    // 2. OPEN positions follow the broker
    for (const position of [...this.active.values()]) {
      if (position.status !== 'OPEN') continue;
      const broker = brokerBySymbol.get(position.symbol);

      if (!broker) {
        if (snapshot.takenAt - position.entryTime < FILL_GRACE_MS) continue;
        const message = `${position.symbol} OPEN in ledger but absent at broker`;
        const error = new LedgerInconsistency(position.symbol, position.id, message);
        inconsistencies.push(error);
        changes.push(this.transition(position, 'vanished', message));
        position.voidReason = message;
        this.archive(position);
        this.remember({ positionId: position.id, symbol: position.symbol, message, at: snapshot.takenAt });
        this.log.error(`⚠️ ${message} -> VOID`);
        continue;
      }

      if (broker.quantity !== position.quantity) {
        this.log.warn(
          `${position.symbol} quantity ${position.quantity} -> ${broker.quantity} (broker record)`
        );
        position.quantity = broker.quantity;
      }
      position.markPrice = broker.marketPrice;
      position.unrealizedPnl = calcPnl(position.entryPrice, broker.marketPrice, position.quantity);
    }

    // 3. Adopt broker positions the ledger does not know
    for (const broker of brokerBySymbol.values()) {
      if (this.hasExposure(broker.symbol)) continue;
      const change = this.adopt(broker, snapshot.takenAt);
      if (change) changes.push(change);
    }

    return { changes, inconsistencies };
  }

  markToMarket(priceBySymbol: Readonly<Record<string, number>>): void {
    for (const position of this.active.values()) {
      if (position.status !== 'OPEN' && position.status !== 'PENDING_EXIT') continue;
      const price = priceBySymbol[position.symbol];
      if (price === undefined || !Number.isFinite(price) || price <= 0) continue;
      position.markPrice = price;
      position.unrealizedPnl = calcPnl(position.entryPrice, price, position.quantity);
    }
  }

  // =====================
  // Persistence
  // =====================
  toJSON(): LedgerJSON {
    return {
      positions: this.getActive(),
      history: this.getHistory(),
      inconsistencies: this.getInconsistencies(),
    };
  }

  static fromJSON(data: LedgerJSON, config: RiskConfig, log: BotLogger = silentLogger): PositionLedger {
    const ledger = new PositionLedger(config, log);
    for (const position of data.positions) {
      if (!isActive(position.status)) {
        throw new LedgerInconsistency(
          position.symbol,
          position.id,
          `Persisted active position ${position.id} is ${position.status}`
        );
      }
      if (ledger.hasExposure(position.symbol)) {
        throw new LedgerInconsistency(
          position.symbol,
          position.id,
          `Persisted state holds two ${position.symbol} positions`
        );
      }
      ledger.active.set(position.id, structuredClone(position));
    }
    ledger.history = data.history.map(p => structuredClone(p));
    ledger.inconsistencies = data.inconsistencies.map(r => ({ ...r }));
    return ledger;
  }

  // =====================
  // Internals
  // =====================
  private resolveEntry(
    position: Position,
    order: OrderHandle | undefined,
    broker: BrokerPosition | undefined,
    at: number
  ): LedgerChange | undefined {
    if (order && (order.status === 'filled' || (isDeadOrder(order) && order.filledQuantity > 0))) {
      const price = order.filledAvgPrice ?? broker?.avgEntryPrice ?? position.entryPrice;
      return this.recordEntry(position.id, { quantity: order.filledQuantity, price, at });
    }
    if (order && isDeadOrder(order)) {
      return this.rejectOrder(position.id, `entry order ${order.status}`);
    }
    if (!order && broker) {
      return this.recordEntry(position.id, { quantity: broker.quantity, price: broker.avgEntryPrice, at });
    }
    if (order && position.pendingOrder && !sameJson(order, position.pendingOrder.handle)) {
      position.pendingOrder.handle = structuredClone(order);
    }
    return undefined;
  }

  private resolveExit(
    position: Position,
    order: OrderHandle | undefined,
    broker: BrokerPosition | undefined,
    at: number
  ): LedgerChange | undefined {
    const reason = exitReasonOf(position);
    if (order?.status === 'filled') {
      const price = order.filledAvgPrice ?? position.markPrice;
      return this.recordExit(position.id, { quantity: order.filledQuantity, price, at }, reason);
    }
    if (order && isDeadOrder(order)) {
      return this.rejectOrder(position.id, `exit order ${order.status}`);
    }
    if (!order && !broker) {
      return this.recordExit(position.id, { quantity: position.quantity, price: position.markPrice, at }, reason);
    }
    // Still held and the broker never heard of the sell: the submission was lost
    if (!order && position.pendingOrder && at - position.pendingOrder.submittedAt >= FILL_GRACE_MS) {
      return this.rejectOrder(position.id, 'exit order never reached the broker');
    }
    if (order && position.pendingOrder && !sameJson(order, position.pendingOrder.handle)) {
      position.pendingOrder.handle = structuredClone(order);
    }
    return undefined;
  }

  private adopt(broker: BrokerPosition, at: number): LedgerChange | undefined {
    let thresholds: Thresholds;
    try {
      thresholds = computeThresholds(broker.avgEntryPrice, this.config, broker.symbol);
    } catch (err) {
      this.log.error(`Cannot adopt broker position ${broker.symbol}:`, err);
      return undefined;
    }

    const position: Position = {
      id: `adopted-${broker.symbol}-${at}`,
      symbol: broker.symbol,
      quantity: broker.quantity,
      entryPrice: broker.avgEntryPrice,
      entryTime: at,
      stopLoss: thresholds.stopLoss,
      takeProfit: thresholds.takeProfit,
      status: 'OPEN',
      markPrice: broker.marketPrice,
      unrealizedPnl: calcPnl(broker.avgEntryPrice, broker.marketPrice, broker.quantity),
      realizedPnl: 0,
    };
    this.active.set(position.id, position);
    const note = `adopted broker position ${broker.quantity} @ ${broker.avgEntryPrice}`;
    this.log.warn(`${broker.symbol} ${note}`);
    return { positionId: position.id, symbol: position.symbol, from: null, to: 'OPEN', note };
  }

  private transition(position: Position, event: PositionEvent, note: string): LedgerChange {
    const from = position.status;
    position.status = positionStep(from, event, position.symbol);
    this.log.info(`${position.symbol} ${from} -> ${position.status} (${note})`);
    return { positionId: position.id, symbol: position.symbol, from, to: position.status, note };
  }

  private archive(position: Position): void {
    this.active.delete(position.id);
    this.history.push(position);
    if (this.history.length > MAX_CLOSED_HISTORY) {
      this.history.shift();
    }
  }

  private remember(record: InconsistencyRecord): void {
    this.inconsistencies.push(record);
    if (this.inconsistencies.length > MAX_INCONSISTENCIES_KEPT) {
      this.inconsistencies.shift();
    }
  }

  private findBySymbol(symbol: string): Position | undefined {
    for (const position of this.active.values()) {
      if (position.symbol === symbol) return position;
    }
    return undefined;
  }

  private require(id: string): Position {
    const position = this.active.get(id);
    if (!position) {
      throw new LedgerInconsistency('', id, `Unknown active position ${id}`);
    }
    return position;
  }
}

function exitReasonOf(position: Position): ExitReason {
  const reason = position.pendingOrder?.intent.reason;
  return reason && reason !== 'entry' ? reason : 'signal';
}
