import axios, { isAxiosError, type AxiosInstance } from 'axios';
import { z } from 'zod';
import { ExecutionUnavailable, OrderRejected } from '../core/errors.js';
import type {
  AccountSnapshot,
  BrokerPosition,
  ExecutionGateway,
  OrderHandle,
  OrderIntent,
  OrderStatus,
} from '../market/types.js';

export const ALPACA_PAPER_URL = 'https://paper-api.alpaca.markets';
export const ALPACA_LIVE_URL = 'https://api.alpaca.markets';
export const ALPACA_DATA_URL = 'https://data.alpaca.markets';

const USER_AGENT = 'equity-swing-bot/1.0';

export interface AlpacaOptions {
  keyId: string;
  secretKey: string;
  paperTrading: boolean;
  timeoutMs: number;
  baseUrl?: string;
  dataUrl?: string;
  /** Market data feed; the free plan only carries `iex`. */
  dataFeed?: 'iex' | 'sip';
}

// Alpaca sends decimals as strings
const num = z.coerce.number();

const accountSchema = z.object({
  equity: num,
  buying_power: num,
  cash: num,
});

const positionSchema = z.object({
  symbol: z.string(),
  qty: num,
  avg_entry_price: num,
  current_price: num,
  unrealized_pl: num,
});

const orderSchema = z.object({
  id: z.string(),
  client_order_id: z.string(),
  symbol: z.string(),
  side: z.enum(['buy', 'sell']),
  qty: num.nullable(),
  status: z.string(),
  filled_qty: num,
  filled_avg_price: num.nullable(),
  submitted_at: z.string().nullable(),
  created_at: z.string(),
});

const latestTradesSchema = z.object({
  trades: z.record(z.object({ p: z.number() })),
});

type AlpacaOrder = z.infer<typeof orderSchema>;

// Alpaca has more order states than the ledger cares about
const STATUS_MAP: Record<string, OrderStatus> = {
  new: 'new',
  pending_new: 'pending',
  accepted: 'accepted',
  accepted_for_bidding: 'accepted',
  partially_filled: 'partially_filled',
  filled: 'filled',
  canceled: 'canceled',
  expired: 'expired',
  done_for_day: 'expired',
  rejected: 'rejected',
};

export function mapOrderStatus(status: string): OrderStatus {
  return STATUS_MAP[status] ?? 'pending';
}

function toHandle(order: AlpacaOrder): OrderHandle {
  const submitted = Date.parse(order.submitted_at ?? order.created_at);
  return {
    orderId: order.id,
    clientOrderId: order.client_order_id,
    symbol: order.symbol,
    side: order.side === 'buy' ? 'BUY' : 'SELL',
    quantity: order.qty ?? 0,
    status: mapOrderStatus(order.status),
    filledQuantity: order.filled_qty,
    ...(order.filled_avg_price !== null ? { filledAvgPrice: order.filled_avg_price } : {}),
    submittedAt: Number.isNaN(submitted) ? 0 : submitted,
  };
}

const extractMessage = (error: unknown): string => {
  if (isAxiosError(error)) {
    const status = error.response?.status;
    const data: unknown = error.response?.data;
    const details =
      typeof data === 'string' ? data : data && typeof data === 'object' ? JSON.stringify(data) : undefined;
    const parts = [status ? `status ${status}` : null, details ?? null].filter(Boolean);
    return parts.length ? parts.join(' - ') : error.message;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return typeof error === 'string' ? error : 'Unknown error';
};

const statusOf = (error: unknown): number | undefined =>
  isAxiosError(error) ? error.response?.status : undefined;

function parse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown, operation: string): T {
  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    throw new ExecutionUnavailable(`[alpaca] ${operation}: unexpected response (${parsed.error.issues[0]?.message})`);
  }
  return parsed.data;
}

/** ExecutionGateway over the Alpaca trading and market data REST APIs (v2). */
export class AlpacaExecutionGateway implements ExecutionGateway {
  constructor(
    private readonly http: AxiosInstance,
    private readonly dataHttp: AxiosInstance,
    private readonly dataFeed: 'iex' | 'sip' = 'iex',
    private readonly now: () => number = Date.now
  ) {}

  async submitOrder(intent: OrderIntent): Promise<OrderHandle> {
    const body = {
      symbol: intent.symbol,
      qty: String(intent.quantity),
      side: intent.side === 'BUY' ? 'buy' : 'sell',
      type: intent.orderType,
      time_in_force: 'day',
      client_order_id: intent.clientOrderId,
      ...(intent.orderType === 'limit' && intent.limitPrice !== undefined
        ? { limit_price: intent.limitPrice.toFixed(2) }
        : {}),
    };

    let data: unknown;
    try {
      ({ data } = await this.http.post('/v2/orders', body));
    } catch (err) {
      const status = statusOf(err);
      // 403: buying power or shortable checks; 422: invalid order
      if (status === 403 || status === 422) {
        throw new OrderRejected(intent.symbol, `[alpaca] order rejected: ${extractMessage(err)}`, err);
      }
      throw new ExecutionUnavailable(`[alpaca] submitOrder ${intent.symbol} failed: ${extractMessage(err)}`, err);
    }
    return toHandle(parse(orderSchema, data, 'submitOrder'));
  }

  async getAccountSnapshot(): Promise<AccountSnapshot> {
    const account = parse(accountSchema, await this.get(this.http, '/v2/account', 'getAccount'), 'getAccount');
    const positions = await this.getOpenPositions();
    return Object.freeze({
      equity: account.equity,
      buyingPower: account.buying_power,
      cash: account.cash,
      openPositionCount: positions.length,
      takenAt: this.now(),
    });
  }

  async getOpenPositions(): Promise<BrokerPosition[]> {
    const rows = parse(
      z.array(positionSchema),
      await this.get(this.http, '/v2/positions', 'getPositions'),
      'getPositions'
    );
    return rows.map(row => ({
      symbol: row.symbol,
      quantity: row.qty,
      avgEntryPrice: row.avg_entry_price,
      marketPrice: row.current_price,
      unrealizedPnl: row.unrealized_pl,
    }));
  }

  async getOrderByClientId(clientOrderId: string): Promise<OrderHandle | undefined> {
    let data: unknown;
    try {
      ({ data } = await this.http.get('/v2/orders:by_client_order_id', {
        params: { client_order_id: clientOrderId },
      }));
    } catch (err) {
      if (statusOf(err) === 404) return undefined;
      throw new ExecutionUnavailable(`[alpaca] getOrder ${clientOrderId} failed: ${extractMessage(err)}`, err);
    }
    return toHandle(parse(orderSchema, data, 'getOrder'));
  }

  async getLatestPrices(symbols: string[]): Promise<Record<string, number>> {
    if (symbols.length === 0) return {};
    const data = await this.get(this.dataHttp, '/v2/stocks/trades/latest', 'getLatestPrices', {
      symbols: symbols.join(','),
      feed: this.dataFeed,
    });
    const { trades } = parse(latestTradesSchema, data, 'getLatestPrices');

    const prices: Record<string, number> = {};
    for (const [symbol, trade] of Object.entries(trades)) {
      prices[symbol] = trade.p;
    }
    return prices;
  }

  async cancelOrder(orderId: string): Promise<boolean> {
    try {
      await this.http.delete(`/v2/orders/${encodeURIComponent(orderId)}`);
      return true;
    } catch (err) {
      // 404 unknown order, 422 already filled or cancelled
      const status = statusOf(err);
      if (status === 404 || status === 422) return false;
      throw new ExecutionUnavailable(`[alpaca] cancelOrder ${orderId} failed: ${extractMessage(err)}`, err);
    }
  }

  private async get(
    client: AxiosInstance,
    url: string,
    operation: string,
    params?: Record<string, string>
  ): Promise<unknown> {
    try {
      const { data } = await client.get<unknown>(url, params ? { params } : undefined);
      return data;
    } catch (err) {
      throw new ExecutionUnavailable(`[alpaca] ${operation} failed: ${extractMessage(err)}`, err);
    }
  }
}

export function createAlpacaGateway(options: AlpacaOptions): AlpacaExecutionGateway {
  const headers = {
    'user-agent': USER_AGENT,
    'APCA-API-KEY-ID': options.keyId,
    'APCA-API-SECRET-KEY': options.secretKey,
  };
  const http = axios.create({
    baseURL: options.baseUrl ?? (options.paperTrading ? ALPACA_PAPER_URL : ALPACA_LIVE_URL),
    timeout: options.timeoutMs,
    headers,
  });
  const dataHttp = axios.create({
    baseURL: options.dataUrl ?? ALPACA_DATA_URL,
    timeout: options.timeoutMs,
    headers,
  });
  return new AlpacaExecutionGateway(http, dataHttp, options.dataFeed);
}
