import axios, { AxiosError, type AxiosInstance, type AxiosResponse, type InternalAxiosRequestConfig } from 'axios';
import { describe, expect, it } from 'vitest';

import { ExecutionUnavailable, OrderRejected } from '../../src/core/errors.js';
import type { OrderIntent } from '../../src/market/types.js';
import { AlpacaExecutionGateway, mapOrderStatus } from '../../src/services/alpaca.js';

const NOW = Date.parse('2026-10-19T14:00:00Z');

type Reply = { status: number; data?: unknown } | 'timeout';
type Route = (config: InternalAxiosRequestConfig) => Reply;

/** axios instance answered in process by `route`. */
function stubHttp(route: Route, requests: InternalAxiosRequestConfig[] = []): AxiosInstance {
  return axios.create({
    baseURL: 'https://broker.test',
    adapter: async config => {
      requests.push(config);
      const reply = route(config);
      if (reply === 'timeout') {
        throw new AxiosError('timeout of 50ms exceeded', 'ECONNABORTED', config);
      }
      const response: AxiosResponse<unknown> = {
        data: reply.data ?? '',
        status: reply.status,
        statusText: String(reply.status),
        headers: {},
        config,
      };
      if (reply.status >= 400) {
        throw new AxiosError(`Request failed with status code ${reply.status}`, 'ERR_BAD_REQUEST', config, {}, response);
      }
      return response;
    },
  });
}

const unused = stubHttp(() => ({ status: 500 }));

const alpacaOrder = (overrides: Record<string, unknown> = {}) => ({
  id: 'order-1',
  client_order_id: 'cid-1',
  symbol: 'AAPL',
  side: 'buy',
  qty: '10',
  status: 'accepted',
  filled_qty: '0',
  filled_avg_price: null,
  submitted_at: '2026-10-19T14:00:05Z',
  created_at: '2026-10-19T14:00:04Z',
  type: 'limit',
  ...overrides,
});

const limitBuy: OrderIntent = {
  symbol: 'AAPL',
  side: 'BUY',
  quantity: 10,
  orderType: 'limit',
  limitPrice: 50.1,
  stopLoss: 47.5,
  takeProfit: 57.5,
  reason: 'entry',
  clientOrderId: 'cid-1',
};

describe('AlpacaExecutionGateway', () => {
  describe('submitOrder', () => {
    it('posts a day order and maps the reply', async () => {
      const requests: InternalAxiosRequestConfig[] = [];
      const gateway = new AlpacaExecutionGateway(stubHttp(() => ({ status: 200, data: alpacaOrder() }), requests), unused);

      const handle = await gateway.submitOrder(limitBuy);

      expect(requests[0]?.method).toBe('post');
      expect(requests[0]?.url).toBe('/v2/orders');
      expect(JSON.parse(String(requests[0]?.data))).toEqual({
        symbol: 'AAPL',
        qty: '10',
        side: 'buy',
        type: 'limit',
        time_in_force: 'day',
        client_order_id: 'cid-1',
        limit_price: '50.10',
      });
      expect(handle).toEqual({
        orderId: 'order-1',
        clientOrderId: 'cid-1',
        symbol: 'AAPL',
        side: 'BUY',
        quantity: 10,
        status: 'accepted',
        filledQuantity: 0,
        submittedAt: Date.parse('2026-10-19T14:00:05Z'),
      });
    });

    it('leaves the limit price off market orders', async () => {
      const requests: InternalAxiosRequestConfig[] = [];
      const gateway = new AlpacaExecutionGateway(stubHttp(() => ({ status: 200, data: alpacaOrder() }), requests), unused);

      await gateway.submitOrder({ ...limitBuy, orderType: 'market', side: 'SELL', reason: 'stop_loss' });

      const body: unknown = JSON.parse(String(requests[0]?.data));
      expect(body).toMatchObject({ side: 'sell', type: 'market' });
      expect(body).not.toHaveProperty('limit_price');
    });

    it('turns a 403 into OrderRejected', async () => {
      const gateway = new AlpacaExecutionGateway(
        stubHttp(() => ({ status: 403, data: { message: 'insufficient buying power' } })),
        unused
      );
      const attempt = gateway.submitOrder(limitBuy);
      await expect(attempt).rejects.toBeInstanceOf(OrderRejected);
      await expect(attempt).rejects.toThrow('[alpaca] order rejected: status 403 - {"message":"insufficient buying power"}');
    });

    it('turns a server error into ExecutionUnavailable', async () => {
      const gateway = new AlpacaExecutionGateway(stubHttp(() => ({ status: 503 })), unused);
      await expect(gateway.submitOrder(limitBuy)).rejects.toBeInstanceOf(ExecutionUnavailable);
    });
  });

  it('builds the account snapshot with the open position count', async () => {
    const http = stubHttp(config =>
      config.url === '/v2/account'
        ? { status: 200, data: { equity: '10250.5', buying_power: '20000', cash: '5000', status: 'ACTIVE' } }
        : {
            status: 200,
            data: [
              { symbol: 'AAPL', qty: '10', avg_entry_price: '100', current_price: '103.5', unrealized_pl: '35' },
            ],
          }
    );
    const gateway = new AlpacaExecutionGateway(http, unused, 'iex', () => NOW);

    expect(await gateway.getAccountSnapshot()).toEqual({
      equity: 10250.5,
      buyingPower: 20000,
      cash: 5000,
      openPositionCount: 1,
      takenAt: NOW,
    });
    expect(await gateway.getOpenPositions()).toEqual([
      { symbol: 'AAPL', quantity: 10, avgEntryPrice: 100, marketPrice: 103.5, unrealizedPnl: 35 },
    ]);
  });

  it('reports a timeout as ExecutionUnavailable', async () => {
    const gateway = new AlpacaExecutionGateway(stubHttp(() => 'timeout'), unused);
    await expect(gateway.getAccountSnapshot()).rejects.toThrow('[alpaca] getAccount failed: timeout of 50ms exceeded');
  });

  it('reports a body it cannot read as ExecutionUnavailable', async () => {
    const gateway = new AlpacaExecutionGateway(stubHttp(() => ({ status: 200, data: {} })), unused);
    await expect(gateway.getAccountSnapshot()).rejects.toThrow(/\[alpaca\] getAccount: unexpected response/);
  });

  describe('getOrderByClientId', () => {
    it('looks the order up by client id', async () => {
      const requests: InternalAxiosRequestConfig[] = [];
      const filled = alpacaOrder({ status: 'filled', filled_qty: '10', filled_avg_price: '50.05' });
      const gateway = new AlpacaExecutionGateway(stubHttp(() => ({ status: 200, data: filled }), requests), unused);

      const handle = await gateway.getOrderByClientId('cid-1');

      expect(requests[0]?.url).toBe('/v2/orders:by_client_order_id');
      expect(requests[0]?.params).toEqual({ client_order_id: 'cid-1' });
      expect(handle).toMatchObject({ status: 'filled', filledQuantity: 10, filledAvgPrice: 50.05 });
    });

    it('returns undefined for an unknown order', async () => {
      const gateway = new AlpacaExecutionGateway(stubHttp(() => ({ status: 404 })), unused);
      expect(await gateway.getOrderByClientId('cid-404')).toBeUndefined();
    });
  });

  describe('getLatestPrices', () => {
    it('reads the last trade price per symbol from the data API', async () => {
      const requests: InternalAxiosRequestConfig[] = [];
      const data = stubHttp(
        () => ({
          status: 200,
          data: { trades: { AAPL: { p: 50.12, s: 100 }, MSFT: { p: 410, s: 5 } } },
        }),
        requests
      );
      const gateway = new AlpacaExecutionGateway(unused, data);

      expect(await gateway.getLatestPrices(['AAPL', 'MSFT'])).toEqual({ AAPL: 50.12, MSFT: 410 });
      expect(requests[0]?.url).toBe('/v2/stocks/trades/latest');
      expect(requests[0]?.params).toEqual({ symbols: 'AAPL,MSFT', feed: 'iex' });
    });

    it('skips the request for no symbols', async () => {
      const requests: InternalAxiosRequestConfig[] = [];
      const gateway = new AlpacaExecutionGateway(unused, stubHttp(() => ({ status: 200 }), requests));
      expect(await gateway.getLatestPrices([])).toEqual({});
      expect(requests).toHaveLength(0);
    });
  });

  describe('cancelOrder', () => {
    it('deletes the order', async () => {
      const requests: InternalAxiosRequestConfig[] = [];
      const gateway = new AlpacaExecutionGateway(stubHttp(() => ({ status: 204 }), requests), unused);
      expect(await gateway.cancelOrder('order-1')).toBe(true);
      expect(requests[0]?.method).toBe('delete');
      expect(requests[0]?.url).toBe('/v2/orders/order-1');
    });

    it('returns false when the order can no longer be cancelled', async () => {
      const gateway = new AlpacaExecutionGateway(stubHttp(() => ({ status: 422 })), unused);
      expect(await gateway.cancelOrder('order-1')).toBe(false);
    });
  });
});

describe('mapOrderStatus', () => {
  it('folds Alpaca states into the ledger ones', () => {
    expect(mapOrderStatus('done_for_day')).toBe('expired');
    expect(mapOrderStatus('pending_new')).toBe('pending');
    expect(mapOrderStatus('replaced')).toBe('pending');
    expect(mapOrderStatus('filled')).toBe('filled');
  });
});
