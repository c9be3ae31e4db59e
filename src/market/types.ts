export type OrderSide = 'BUY' | 'SELL';
export type OrderType = 'market' | 'limit';
export type RecommendationAction = 'BUY' | 'SELL' | 'HOLD';

export type PositionStatus = 'PENDING_ENTRY' | 'OPEN' | 'PENDING_EXIT' | 'CLOSED' | 'VOID';

export type ExitReason = 'stop_loss' | 'take_profit' | 'signal' | 'emergency';
export type IntentReason = 'entry' | ExitReason;

export type OrderStatus =
  | 'new'
  | 'accepted'
  | 'pending'
  | 'partially_filled'
  | 'filled'
  | 'canceled'
  | 'expired'
  | 'rejected';

export interface AccountSnapshot {
  readonly equity: number;
  readonly buyingPower: number;
  readonly cash: number;
  readonly openPositionCount: number;
  readonly takenAt: number;
}

export interface Recommendation {
  symbol: string;
  action: RecommendationAction;
  confidence: number;
  targetPrice?: number;
  stopLoss?: number;
  reasoning?: string;
  timestamp: number;
}

export interface OrderIntent {
  symbol: string;
  side: OrderSide;
  quantity: number;
  orderType: OrderType;
  limitPrice?: number;
  stopLoss: number;
  takeProfit: number;
  reason: IntentReason;
  clientOrderId: string;
}

export interface OrderHandle {
  orderId: string;
  clientOrderId: string;
  symbol: string;
  side: OrderSide;
  quantity: number;
  status: OrderStatus;
  filledQuantity: number;
  filledAvgPrice?: number;
  submittedAt: number;
}

export interface PendingOrder {
  intent: OrderIntent;
  handle?: OrderHandle;
  submittedAt: number;
}

export interface Position {
  id: string;
  symbol: string;
  quantity: number;
  entryPrice: number;
  entryTime: number;
  stopLoss: number;
  takeProfit: number;
  status: PositionStatus;
  markPrice: number;
  unrealizedPnl: number;
  realizedPnl: number;
  exitPrice?: number;
  exitTime?: number;
  exitReason?: ExitReason;
  voidReason?: string;
  pendingOrder?: PendingOrder;
}

export interface Fill {
  quantity: number;
  price: number;
  at: number;
}

export interface BrokerPosition {
  symbol: string;
  quantity: number;
  avgEntryPrice: number;
  marketPrice: number;
  unrealizedPnl: number;
}

export interface ExecutionSnapshot {
  positions: BrokerPosition[];
  /** Orders the ledger is waiting on, keyed by client order id. */
  orders: Record<string, OrderHandle>;
  takenAt: number;
}

export interface MarketContext {
  price: number;
  equity: number;
  position?: Pick<Position, 'quantity' | 'entryPrice' | 'stopLoss' | 'takeProfit' | 'unrealizedPnl'>;
  now: number;
}

export interface AnalysisGateway {
  /** Rejects with AnalysisUnavailable. */
  getRecommendation(symbol: string, context: MarketContext): Promise<Recommendation>;
}

export interface ExecutionGateway {
  /** Rejects with OrderRejected when the broker refuses, ExecutionUnavailable on transport failure. */
  submitOrder(intent: OrderIntent): Promise<OrderHandle>;
  getAccountSnapshot(): Promise<AccountSnapshot>;
  getOpenPositions(): Promise<BrokerPosition[]>;
  getOrderByClientId(clientOrderId: string): Promise<OrderHandle | undefined>;
  getLatestPrices(symbols: string[]): Promise<Record<string, number>>;
  cancelOrder(orderId: string): Promise<boolean>;
}
