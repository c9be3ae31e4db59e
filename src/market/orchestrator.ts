import { randomUUID } from 'node:crypto';
import type { TradingConfig } from '../config/tradingConfig.js';
import { CommandChannel } from '../core/commandChannel.js';
import {
  AnalysisUnavailable,
  ClockMisconfiguration,
  describeError,
  ExecutionUnavailable,
  InsufficientFunds,
  NotInEmergencyState,
  OrderRejected,
  RiskLimitExceeded,
} from '../core/errors.js';
import { TradingState, type OrchestratorState } from '../core/tradingState.js';
import { FILL_GRACE_MS, INTERVALS, ORDER_STATUS_GROUPS, STATE_FILE_VERSION } from './constants.market.js';
import { DecisionEngine, type HoldReason } from './decisionEngine.js';
import type { LedgerStore } from './ledgerStore.js';
import { noopEventSink, type EventSink } from './logger.js';
import { silentLogger, type BotLogger } from './logging.js';
import {
  PositionLedger,
  type InconsistencyRecord,
  type PendingOrderView,
  type ReconcileReport,
} from './positionLedger.js';
import { TradingClock } from './tradingClock.js';
import type {
  AccountSnapshot,
  AnalysisGateway,
  ExecutionGateway,
  ExecutionSnapshot,
  OrderHandle,
  OrderIntent,
  Position,
  Recommendation,
} from './types.js';
import { AbortedError, sleep as abortableSleep, TimeoutError, withTimeout } from './utils.js';

export interface OrchestratorDeps {
  config: TradingConfig;
  analysis: AnalysisGateway;
  execution: ExecutionGateway;
  store?: LedgerStore;
  logger?: BotLogger;
  logEvent?: EventSink;
  onAlert?: (msg: string) => void;
  now?: () => number;
  sleep?: (ms: number, signal: AbortSignal) => Promise<void>;
  newClientOrderId?: (symbol: string) => string;
}

export interface OrchestratorStatus {
  state: OrchestratorState;
  lastCycleTime: number | null;
  openPositions: number;
  equity: number | null;
  paperTrading: boolean;
  inTradingWindow: boolean | null;
  consecutiveExecutionFailures: number;
  emergencyReason: string | null;
  lastError: string | null;
  inconsistencies: InconsistencyRecord[];
}

export interface Acknowledgement {
  accepted: true;
  state: OrchestratorState;
  at: number;
  message: string;
}

export type SymbolOutcome =
  | { kind: 'hold'; reason: HoldReason | 'no_price' | 'analysis_unavailable' }
  | { kind: 'submitted'; intent: OrderIntent }
  | { kind: 'rejected'; intent: OrderIntent; error: string }
  | { kind: 'pending'; intent: OrderIntent; error: string }
  | { kind: 'skipped'; error: string }
  | { kind: 'discarded' };

export interface CycleReport {
  startedAt: number;
  finishedAt: number;
  outcomes: Record<string, SymbolOutcome>;
  reconcile: ReconcileReport | null;
  expiredEntries: string[];
  reopenedExits: string[];
  aborted: boolean;
  error: string | null;
}

export interface LiquidationReport {
  at: number;
  cancelledEntries: string[];
  exitsSubmitted: string[];
  errors: Record<string, string>;
}

export type TickResult =
  | { kind: 'skipped' }
  | { kind: 'idle'; reason: 'stopped' | 'outside_window' }
  | { kind: 'cycle'; report: CycleReport }
  | { kind: 'liquidation'; report: LiquidationReport };

const MIN_SLEEP_MS = INTERVALS.ONE_SECOND;

const defaultClientOrderId = (symbol: string) =>
  `swing-${symbol.toLowerCase()}-${randomUUID().slice(0, 12)}`;

const isWorkingOrder = (handle: OrderHandle) => ORDER_STATUS_GROUPS.working.has(handle.status);

/**
 * The scheduling loop. It alone writes to the ledger and submits orders;
 * control requests reach it as commands.
 */
export class Orchestrator {
  private readonly config: TradingConfig;
  private readonly analysis: AnalysisGateway;
  private readonly execution: ExecutionGateway;
  private readonly store: LedgerStore | undefined;
  private readonly log: BotLogger;
  private readonly logEvent: EventSink;
  private readonly onAlert: (msg: string) => void;
  private readonly now: () => number;
  private readonly sleep: (ms: number, signal: AbortSignal) => Promise<void>;
  private readonly newClientOrderId: (symbol: string) => string;

  private readonly state: TradingState;
  private readonly ledger: PositionLedger;
  private readonly engine: DecisionEngine;
  private readonly commands = new CommandChannel();

  private clock: TradingClock | undefined;
  private loop: Promise<void> | undefined;
  private inFlight: Promise<TickResult> | undefined;
  private cycleAbort: AbortController | undefined;
  private stopRequested = false;

  private lastCycleTime: number | null = null;
  private account: AccountSnapshot | undefined;
  private consecutiveExecutionFailures = 0;
  private lastError: string | null = null;
  private emergencyReason: string | null = null;

  constructor(deps: OrchestratorDeps) {
    this.config = deps.config;
    this.analysis = deps.analysis;
    this.execution = deps.execution;
    this.store = deps.store;
    this.log = deps.logger ?? silentLogger;
    this.logEvent = deps.logEvent ?? noopEventSink;
    this.onAlert = deps.onAlert ?? (() => {});
    this.now = deps.now ?? Date.now;
    this.sleep = deps.sleep ?? abortableSleep;
    this.newClientOrderId = deps.newClientOrderId ?? defaultClientOrderId;

    const persisted = this.store?.load();
    const ledgerLog = this.log.child('ledger');
    this.ledger = persisted
      ? PositionLedger.fromJSON(persisted.ledger, this.config, ledgerLog)
      : new PositionLedger(this.config, ledgerLog);
    this.lastCycleTime = persisted?.lastCycleTime ?? null;

    // The loop itself only runs once start() is called
    this.state = new TradingState(persisted?.state ?? 'STOPPED', (from, to) => {
      this.log.info(`[TRADING] ${from} -> ${to}`);
      this.logEvent({ type: 'state', from, to });
    });
    this.engine = new DecisionEngine(this.config, this.log.child('decision'));

    if (persisted) {
      this.log.info(
        `Restored ${persisted.ledger.positions.length} active positions, state ${persisted.state} from ${this.store?.path}`
      );
    }
  }

  // =====================
  // Control surface
  // =====================
  start(): Acknowledgement {
    const now = this.now();
    if (this.state.is('RUNNING') && this.loop) {
      return this.ack('Already running');
    }

    try {
      this.clock ??= new TradingClock(this.config);
    } catch (err) {
      if (err instanceof ClockMisconfiguration) {
        this.lastError = describeError(err);
        this.log.error('❌ Refusing to start:', err.message);
        if (this.state.is('RUNNING')) {
          this.state.moveTo('STOPPED', now);
          this.persist();
        }
      }
      throw err;
    }

    this.stopRequested = false;
    if (this.state.is('EMERGENCY_STOPPED')) {
      this.ensureLoop();
      return this.ack('Emergency stop is still active; resume is required');
    }
    if (this.state.is('RUNNING')) {
      // restored from a run that never shut down
      this.ensureLoop();
      this.onAlert(`♻️ *Trading restored* (${this.config.paperTrading ? 'paper' : 'LIVE'})`);
      return this.ack('Trading restored');
    }

    this.state.moveTo('RUNNING', now);
    this.persist();
    this.ensureLoop();
    this.onAlert(`🚀 *Trading started* (${this.config.paperTrading ? 'paper' : 'LIVE'})`);
    return this.ack('Trading started');
  }

  triggerEmergencyStop(reason = 'operator request'): Acknowledgement {
    const now = this.now();
    if (!this.state.is('EMERGENCY_STOPPED')) {
      this.state.moveTo('EMERGENCY_STOPPED', now);
    }
    this.emergencyReason = reason;
    this.cycleAbort?.abort();
    this.commands.send({ type: 'liquidate', reason, at: now });
    this.log.error(`🛑 EMERGENCY STOP: ${reason}`);
    this.logEvent({ type: 'emergency_stop', reason });
    this.onAlert(`🛑 *EMERGENCY STOP*\nReason: ${reason}\nLiquidating all open positions.`);
    this.persist();
    this.stopRequested = false;
    this.ensureLoop();
    return this.ack(`Emergency stop engaged: ${reason}`);
  }

  resume(): Acknowledgement {
    if (!this.state.is('EMERGENCY_STOPPED')) {
      throw new NotInEmergencyState(this.state.value);
    }
    this.clock ??= new TradingClock(this.config);

    const now = this.now();
    this.state.moveTo('RUNNING', now);
    this.emergencyReason = null;
    this.consecutiveExecutionFailures = 0;
    this.commands.send({ type: 'resume', at: now });
    this.persist();
    this.stopRequested = false;
    this.ensureLoop();
    this.onAlert('✅ *Trading resumed*');
    return this.ack('Trading resumed');
  }

  /**
   * Ends the loop. An emergency stop stays in force across the shutdown, and
   * with `keepState` so does RUNNING, for the next process to pick up.
   */
  async shutdown(options: { keepState?: boolean } = {}): Promise<void> {
    this.stopRequested = true;
    if (this.state.is('RUNNING') && !options.keepState) {
      this.state.moveTo('STOPPED', this.now());
    }
    this.cycleAbort?.abort();
    this.commands.send({ type: 'shutdown', at: this.now() });
    await this.loop;
    await this.idle();
    this.persist();
  }

  /** Waits until no tick is in flight. */
  async idle(): Promise<void> {
    // give a freshly woken loop the chance to enter its next tick
    await new Promise<void>(resolve => setImmediate(resolve));
    while (this.inFlight) {
      try {
        await this.inFlight;
      } catch (err) {
        this.log.debug('Tick failed while waiting for idle:', err);
      }
      await new Promise<void>(resolve => setImmediate(resolve));
    }
  }

  getStatus(): OrchestratorStatus {
    return {
      state: this.state.value,
      lastCycleTime: this.lastCycleTime,
      openPositions: this.ledger.activeCount(),
      equity: this.account?.equity ?? null,
      paperTrading: this.config.paperTrading,
      inTradingWindow: this.clock ? this.clock.isTradingWindow(this.now()) : null,
      consecutiveExecutionFailures: this.consecutiveExecutionFailures,
      emergencyReason: this.emergencyReason,
      lastError: this.lastError,
      inconsistencies: this.ledger.getInconsistencies(),
    };
  }

  getPositions(): Position[] {
    return this.ledger.getActive();
  }

  getClosedPositions(): Position[] {
    return this.ledger.getHistory();
  }

  getOpenOrders(): PendingOrderView[] {
    return this.ledger.getPendingOrders();
  }

  // =====================
  // Loop
  // =====================
  async tick(): Promise<TickResult> {
    if (this.inFlight) {
      this.log.warn('⏭️ Previous cycle still in flight, skipping this one');
      this.logEvent({ type: 'cycle_skipped' });
      return { kind: 'skipped' };
    }

    const run = this.runTick();
    this.inFlight = run;
    try {
      return await run;
    } finally {
      this.inFlight = undefined;
      this.persist();
    }
  }

  private ensureLoop(): void {
    if (this.loop) return;
    this.loop = this.runLoop()
      .catch((err: unknown) => {
        this.lastError = describeError(err);
        this.log.error('❌ Scheduling loop crashed:', err);
        this.onAlert(`❌ *Scheduling loop crashed*: ${describeError(err)}`);
      })
      .finally(() => {
        this.loop = undefined;
      });
  }

  private async runLoop(): Promise<void> {
    while (!this.stopRequested && !this.state.is('STOPPED')) {
      try {
        const result = await this.tick();
        if (result.kind === 'skipped') {
          // someone else's tick is running; act on our commands once it ends
          await this.idle();
          continue;
        }
      } catch (err) {
        this.lastError = describeError(err);
        this.log.error('❌ Tick failed:', err);
      }
      if (this.stopRequested || this.state.is('STOPPED')) break;

      // Commands sent during the tick are still queued and wake us at once
      const wake = this.commands.wakeSignal();
      await this.sleep(this.nextDelay(), wake);
    }
  }

  private nextDelay(): number {
    const pollMs = this.config.pollIntervalMinutes * INTERVALS.ONE_MIN;
    if (this.state.is('EMERGENCY_STOPPED') || !this.clock) return pollMs;
    const now = this.now();
    return Math.max(MIN_SLEEP_MS, this.clock.nextWakeTime(now) - now);
  }

  private async runTick(): Promise<TickResult> {
    for (const command of this.commands.drain()) {
      this.log.debug('Command:', command);
    }

    if (this.state.is('EMERGENCY_STOPPED')) {
      return { kind: 'liquidation', report: await this.liquidate() };
    }
    if (this.state.is('STOPPED') || !this.clock) {
      return { kind: 'idle', reason: 'stopped' };
    }

    const now = this.now();
    if (!this.clock.isTradingWindow(now)) {
      this.log.debug('Outside trading window');
      return { kind: 'idle', reason: 'outside_window' };
    }
    return { kind: 'cycle', report: await this.runCycle(now) };
  }

  // =====================
  // Trading cycle
  // =====================
  private async runCycle(startedAt: number): Promise<CycleReport> {
    const abort = new AbortController();
    this.cycleAbort = abort;
    const report: CycleReport = {
      startedAt,
      finishedAt: startedAt,
      outcomes: {},
      reconcile: null,
      expiredEntries: [],
      reopenedExits: [],
      aborted: false,
      error: null,
    };

    try {
      let setup: { account: AccountSnapshot; prices: Record<string, number> };
      try {
        setup = await this.prepareCycle(startedAt, abort.signal, report);
      } catch (err) {
        // without a fresh picture of the account we do not trade
        report.aborted = true;
        report.error = describeError(err);
        this.log.error('❌ Cycle aborted before decisions:', report.error);
        return report;
      }
      const { prices } = setup;
      let account = setup.account;

      for (const symbol of this.trackedSymbols()) {
        if (!this.state.is('RUNNING') || abort.signal.aborted) {
          report.aborted = true;
          break;
        }
        try {
          const outcome = await this.processSymbol(symbol, prices[symbol], account, startedAt, abort.signal);
          report.outcomes[symbol] = outcome;
          if (outcome.kind === 'submitted' && outcome.intent.side === 'BUY') {
            account = this.afterEntry(account, outcome.intent, prices[symbol] ?? 0);
          }
        } catch (err) {
          report.outcomes[symbol] = this.symbolFailure(symbol, err);
        }
      }
      return report;
    } finally {
      this.cycleAbort = undefined;
      report.finishedAt = this.now();
      this.lastCycleTime = report.finishedAt;
      this.logEvent({ type: 'cycle', ...summarizeCycle(report) });
    }
  }

  private async prepareCycle(
    at: number,
    signal: AbortSignal,
    report: CycleReport
  ): Promise<{ account: AccountSnapshot; prices: Record<string, number> }> {
    const { account, snapshot } = await this.fetchExecutionState(at, signal);
    this.account = account;
    report.reconcile = this.applyReconcile(snapshot);

    const symbols = this.trackedSymbols();
    const prices = await this.execCall(() => this.execution.getLatestPrices(symbols), 'getLatestPrices', signal);
    this.ledger.markToMarket(prices);
    report.expiredEntries = await this.cancelStaleEntries(at, signal);
    report.reopenedExits = await this.cancelStaleExits(at, signal);
    return { account, prices };
  }

  private async processSymbol(
    symbol: string,
    latest: number | undefined,
    account: AccountSnapshot,
    now: number,
    signal: AbortSignal
  ): Promise<SymbolOutcome> {
    const position = this.ledger.getBySymbol(symbol);
    if (position && position.status !== 'OPEN') {
      return { kind: 'hold', reason: 'pending_order' };
    }

    // An open position still gets its exit checks against the last known mark
    const price = latest ?? position?.markPrice;
    if (price === undefined) {
      this.log.warn(`${symbol}: no price, skipping`);
      return { kind: 'hold', reason: 'no_price' };
    }
    if (latest === undefined) {
      this.log.warn(`${symbol}: no fresh price, using mark ${price}`);
    }

    let recommendation: Recommendation | undefined;
    try {
      recommendation = await withTimeout(
        this.analysis.getRecommendation(symbol, {
          price,
          equity: account.equity,
          ...(position ? { position } : {}),
          now,
        }),
        this.config.analysisTimeoutMs,
        `analysis ${symbol}`,
        signal
      );
    } catch (err) {
      if (err instanceof AbortedError) return { kind: 'discarded' };
      const reason = err instanceof AnalysisUnavailable ? err.message : describeError(err);
      this.log.warn(`${symbol}: analysis unavailable (${reason}), holding`);
      if (!position) return { kind: 'hold', reason: 'analysis_unavailable' };
    }

    // An emergency stop during the analysis call discards this symbol's work
    if (!this.state.is('RUNNING')) return { kind: 'discarded' };

    const decision = this.engine.evaluate({
      symbol,
      recommendation,
      price,
      account,
      ledger: this.ledger,
      now,
      allowEntries: this.state.is('RUNNING'),
      clientOrderId: this.newClientOrderId(symbol),
    });

    if (decision.kind === 'hold') {
      return { kind: 'hold', reason: decision.reason };
    }
    if (decision.kind === 'entry') {
      return this.submitEntry(decision.intent, price, signal);
    }
    if (!position) {
      throw new RiskLimitExceeded(symbol, 'Exit decided without a position');
    }
    return this.submitExit(position.id, decision.intent, signal);
  }

  private async submitEntry(intent: OrderIntent, price: number, signal?: AbortSignal): Promise<SymbolOutcome> {
    const now = this.now();
    const id = intent.clientOrderId;
    // Tracked before the call so a timeout still leaves a record to reconcile
    this.ledger.trackEntryOrder(intent, intent.limitPrice ?? price, now);
    this.logEvent({ type: 'intent', ...intent });

    let handle: OrderHandle;
    try {
      handle = await this.execCall(() => this.execution.submitOrder(intent), `submitOrder ${intent.symbol}`, signal);
    } catch (err) {
      if (err instanceof OrderRejected) {
        this.ledger.rejectOrder(id, err.message);
        this.log.warn(`❌ ${intent.symbol} entry rejected: ${err.message}`);
        return { kind: 'rejected', intent, error: err.message };
      }
      this.log.warn(`${intent.symbol} entry left PENDING_ENTRY for reconciliation: ${describeError(err)}`);
      return { kind: 'pending', intent, error: describeError(err) };
    }

    this.ledger.attachHandle(id, handle);
    if (handle.status === 'filled') {
      this.ledger.recordEntry(id, {
        quantity: handle.filledQuantity,
        price: handle.filledAvgPrice ?? intent.limitPrice ?? price,
        at: now,
      });
    } else if (!isWorkingOrder(handle)) {
      this.ledger.rejectOrder(id, `entry order ${handle.status}`);
      return { kind: 'rejected', intent, error: `order ${handle.status}` };
    }

    this.onAlert(
      `✅ *${intent.symbol}: entry submitted*\n` +
        `Qty: ${intent.quantity} @ ${intent.limitPrice ?? price}\n` +
        `SL: ${intent.stopLoss} | TP: ${intent.takeProfit}`
    );
    return { kind: 'submitted', intent };
  }

  private async submitExit(positionId: string, intent: OrderIntent, signal?: AbortSignal): Promise<SymbolOutcome> {
    const now = this.now();
    const reason = intent.reason === 'entry' ? 'signal' : intent.reason;
    this.ledger.trackExitOrder(positionId, intent, now);
    this.logEvent({ type: 'intent', ...intent });

    let handle: OrderHandle;
    try {
      handle = await this.execCall(() => this.execution.submitOrder(intent), `submitOrder ${intent.symbol}`, signal);
    } catch (err) {
      if (err instanceof OrderRejected) {
        this.ledger.rejectOrder(positionId, err.message);
        this.log.warn(`❌ ${intent.symbol} exit rejected, back to OPEN: ${err.message}`);
        return { kind: 'rejected', intent, error: err.message };
      }
      this.log.warn(`${intent.symbol} exit left PENDING_EXIT for reconciliation: ${describeError(err)}`);
      return { kind: 'pending', intent, error: describeError(err) };
    }

    this.ledger.attachHandle(positionId, handle);
    if (handle.status === 'filled' && handle.filledAvgPrice !== undefined) {
      const change = this.ledger.recordExit(
        positionId,
        { quantity: handle.filledQuantity, price: handle.filledAvgPrice, at: now },
        reason
      );
      const closed = this.ledger.getHistory().find(p => p.id === change.positionId);
      this.onAlert(
        `⚪ *${intent.symbol}: position closed*\n` +
          `Reason: ${reason}\n` +
          `PnL: ${closed ? closed.realizedPnl.toFixed(2) : '?'}$`
      );
    } else if (!isWorkingOrder(handle) && handle.status !== 'filled') {
      this.ledger.rejectOrder(positionId, `exit order ${handle.status}`);
      return { kind: 'rejected', intent, error: `order ${handle.status}` };
    } else {
      this.onAlert(`⏳ *${intent.symbol}*: exit (${reason}) submitted, qty ${intent.quantity}`);
    }
    return { kind: 'submitted', intent };
  }

  private async cancelStaleEntries(now: number, signal?: AbortSignal): Promise<string[]> {
    const timeoutMs = this.config.pendingOrderTimeoutMinutes * INTERVALS.ONE_MIN;
    const expired: string[] = [];
    for (const view of this.ledger.staleEntries(now, timeoutMs)) {
      if (await this.cancelPendingEntry(view, 'entry order timed out', signal)) {
        expired.push(view.symbol);
      }
    }
    return expired;
  }

  /** Cancels a pending entry at the broker; VOIDs it once nothing can fill any more. */
  private async cancelPendingEntry(view: PendingOrderView, why: string, signal?: AbortSignal): Promise<boolean> {
    const orderId =
      view.handle?.orderId ??
      (
        await this.execCall(
          () => this.execution.getOrderByClientId(view.intent.clientOrderId),
          `getOrder ${view.symbol}`,
          signal
        )
      )?.orderId;

    if (!orderId) {
      this.ledger.expireEntry(view.positionId, `${why}; order never reached the broker`);
      return true;
    }

    const cancelled = await this.execCall(() => this.execution.cancelOrder(orderId), `cancelOrder ${view.symbol}`, signal);
    if (cancelled) {
      // any partial fill shows up as a broker position and is adopted next reconcile
      this.ledger.expireEntry(view.positionId, `${why}; order ${orderId} cancelled`);
      return true;
    }
    this.log.warn(`${view.symbol}: could not cancel order ${orderId}, will reconcile`);
    return false;
  }

  private async cancelStaleExits(now: number, signal?: AbortSignal): Promise<string[]> {
    const timeoutMs = this.config.pendingOrderTimeoutMinutes * INTERVALS.ONE_MIN;
    const reopened: string[] = [];
    for (const view of this.ledger.staleExits(now, timeoutMs)) {
      if (await this.cancelPendingExit(view, 'exit order timed out', now, signal)) {
        reopened.push(view.symbol);
      }
    }
    return reopened;
  }

  /**
   * Withdraws a pending exit so the position is OPEN again and gets a fresh
   * exit decision. Filled or dead orders are left to reconciliation.
   */
  private async cancelPendingExit(
    view: PendingOrderView,
    why: string,
    now: number,
    signal?: AbortSignal
  ): Promise<boolean> {
    const order =
      view.handle ??
      (await this.execCall(
        () => this.execution.getOrderByClientId(view.intent.clientOrderId),
        `getOrder ${view.symbol}`,
        signal
      ));

    if (!order) {
      // the submission may still be on its way
      if (now - view.submittedAt < FILL_GRACE_MS) return false;
      this.ledger.rejectOrder(view.positionId, `${why}; order never reached the broker`);
      return true;
    }
    if (!isWorkingOrder(order)) return false;

    const cancelled = await this.execCall(
      () => this.execution.cancelOrder(order.orderId),
      `cancelOrder ${view.symbol}`,
      signal
    );
    if (cancelled) {
      this.ledger.rejectOrder(view.positionId, `${why}; order ${order.orderId} cancelled`);
      return true;
    }
    this.log.warn(`${view.symbol}: could not cancel exit order ${order.orderId}, will reconcile`);
    return false;
  }

  // =====================
  // Emergency liquidation
  // =====================
  private async liquidate(): Promise<LiquidationReport> {
    const at = this.now();
    const report: LiquidationReport = { at, cancelledEntries: [], exitsSubmitted: [], errors: {} };

    try {
      const { account, snapshot } = await this.fetchExecutionState(at);
      this.account = account;
      this.applyReconcile(snapshot);
    } catch (err) {
      report.errors._reconcile = describeError(err);
      this.log.error('Liquidation reconcile failed, using ledger state:', err);
    }

    for (const view of this.ledger.getPendingOrders()) {
      try {
        if (view.status === 'PENDING_ENTRY') {
          if (await this.cancelPendingEntry(view, 'cancelled by emergency stop')) {
            report.cancelledEntries.push(view.symbol);
          }
        } else if (!view.handle || !isWorkingOrder(view.handle)) {
          // a working sell is left to fill; anything else is replaced below
          await this.cancelPendingExit(view, 'replaced by emergency exit', at);
        }
      } catch (err) {
        report.errors[view.symbol] = describeError(err);
      }
    }

    for (const position of this.ledger.getActive()) {
      if (position.status !== 'OPEN') continue;
      const intent: OrderIntent = {
        symbol: position.symbol,
        side: 'SELL',
        quantity: position.quantity,
        orderType: 'market',
        stopLoss: position.stopLoss,
        takeProfit: position.takeProfit,
        reason: 'emergency',
        clientOrderId: this.newClientOrderId(position.symbol),
      };
      try {
        const outcome = await this.submitExit(position.id, intent);
        if (outcome.kind === 'submitted' || outcome.kind === 'pending') {
          report.exitsSubmitted.push(position.symbol);
        } else if (outcome.kind === 'rejected') {
          report.errors[position.symbol] = outcome.error;
        }
      } catch (err) {
        report.errors[position.symbol] = describeError(err);
      }
    }

    this.logEvent({ type: 'liquidation', ...report });
    return report;
  }

  // =====================
  // Helpers
  // =====================
  private async fetchExecutionState(
    at: number,
    signal?: AbortSignal
  ): Promise<{ account: AccountSnapshot; snapshot: ExecutionSnapshot }> {
    const account = await this.execCall(() => this.execution.getAccountSnapshot(), 'getAccountSnapshot', signal);
    const positions = await this.execCall(() => this.execution.getOpenPositions(), 'getOpenPositions', signal);

    const orders: Record<string, OrderHandle> = {};
    for (const view of this.ledger.getPendingOrders()) {
      const clientId = view.intent.clientOrderId;
      const order = await this.execCall(
        () => this.execution.getOrderByClientId(clientId),
        `getOrder ${view.symbol}`,
        signal
      );
      if (order) orders[clientId] = order;
    }

    return { account: Object.freeze({ ...account }), snapshot: { positions, orders, takenAt: at } };
  }

  private applyReconcile(snapshot: ExecutionSnapshot): ReconcileReport {
    const report = this.ledger.reconcile(snapshot);
    for (const change of report.changes) {
      this.logEvent({ type: 'ledger_change', ...change });
    }
    for (const inconsistency of report.inconsistencies) {
      this.logEvent({ type: 'ledger_inconsistency', symbol: inconsistency.symbol, message: inconsistency.message });
      this.onAlert(`⚠️ *${inconsistency.symbol}*: ${inconsistency.message}. Marked VOID.`);
    }
    return report;
  }

  /**
   * Runs a brokerage call with the execution timeout and tracks consecutive
   * outages. OrderRejected means the broker answered, so it resets the count.
   */
  private async execCall<T>(call: () => Promise<T>, label: string, signal?: AbortSignal): Promise<T> {
    if (signal?.aborted) throw new AbortedError(label);
    try {
      const result = await withTimeout(call(), this.config.executionTimeoutMs, label, signal);
      this.consecutiveExecutionFailures = 0;
      return result;
    } catch (err) {
      if (err instanceof AbortedError) throw err;
      if (err instanceof OrderRejected) {
        this.consecutiveExecutionFailures = 0;
        throw err;
      }
      const wrapped =
        err instanceof ExecutionUnavailable
          ? err
          : new ExecutionUnavailable(`${label}: ${describeError(err)}`, err);
      this.recordExecutionFailure(wrapped, err instanceof TimeoutError);
      throw wrapped;
    }
  }

  private recordExecutionFailure(err: ExecutionUnavailable, timedOut: boolean): void {
    this.consecutiveExecutionFailures += 1;
    this.lastError = describeError(err);
    this.log.error(
      `Execution failure ${this.consecutiveExecutionFailures}/${this.config.maxConsecutiveExecutionFailures}${timedOut ? ' (timeout)' : ''}:`,
      err.message
    );
    if (
      this.state.is('RUNNING') &&
      this.consecutiveExecutionFailures >= this.config.maxConsecutiveExecutionFailures
    ) {
      this.triggerEmergencyStop(
        `${this.consecutiveExecutionFailures} consecutive brokerage failures (last: ${err.message})`
      );
    }
  }

  private symbolFailure(symbol: string, err: unknown): SymbolOutcome {
    if (err instanceof InsufficientFunds) {
      this.log.info(`${symbol}: ${err.message}, skipped this cycle`);
      return { kind: 'skipped', error: err.message };
    }
    if (err instanceof RiskLimitExceeded) {
      this.log.warn(`🚫 ${symbol}: policy violation, not executed: ${err.message}`);
      this.logEvent({ type: 'risk_violation', symbol, message: err.message });
      return { kind: 'skipped', error: err.message };
    }
    if (err instanceof AbortedError) {
      return { kind: 'discarded' };
    }
    this.lastError = describeError(err);
    this.log.error(`❌ ${symbol}: unexpected error`, err);
    return { kind: 'skipped', error: describeError(err) };
  }

  private afterEntry(account: AccountSnapshot, intent: OrderIntent, price: number): AccountSnapshot {
    const cost = intent.quantity * (intent.limitPrice ?? price);
    return Object.freeze({
      ...account,
      buyingPower: account.buyingPower - cost,
      cash: account.cash - cost,
      openPositionCount: account.openPositionCount + 1,
    });
  }

  private trackedSymbols(): string[] {
    return [...new Set([...this.config.watchlist, ...this.ledger.symbols()])];
  }

  private persist(): void {
    if (!this.store) return;
    try {
      this.store.save({
        version: STATE_FILE_VERSION,
        state: this.state.value,
        lastCycleTime: this.lastCycleTime,
        ledger: this.ledger.toJSON(),
      });
    } catch (err) {
      this.lastError = describeError(err);
      this.log.error('❌ Failed to persist state:', err);
    }
  }

  private ack(message: string): Acknowledgement {
    return { accepted: true, state: this.state.value, at: this.now(), message };
  }
}

function summarizeCycle(report: CycleReport): Record<string, unknown> {
  const counts: Record<string, number> = {};
  for (const outcome of Object.values(report.outcomes)) {
    counts[outcome.kind] = (counts[outcome.kind] ?? 0) + 1;
  }
  return {
    startedAt: report.startedAt,
    finishedAt: report.finishedAt,
    outcomes: counts,
    changes: report.reconcile?.changes.length ?? 0,
    expiredEntries: report.expiredEntries,
    reopenedExits: report.reopenedExits,
    aborted: report.aborted,
    error: report.error,
  };
}
