import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { ConfigError } from '../../src/core/errors.js';
import { STATE_FILE_VERSION } from '../../src/market/constants.market.js';
import { LedgerStore, type PersistedState } from '../../src/market/ledgerStore.js';
import { PositionLedger } from '../../src/market/positionLedger.js';
import type { OrderIntent } from '../../src/market/types.js';
import { MONDAY_10AM, testConfig } from '../support/config.js';

const intent = (symbol: string): OrderIntent => ({
  symbol,
  side: 'BUY',
  quantity: 10,
  orderType: 'limit',
  limitPrice: 100.2,
  stopLoss: 95,
  takeProfit: 115,
  reason: 'entry',
  clientOrderId: `entry-${symbol}`,
});

describe('LedgerStore', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'ledger-store-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('returns undefined when nothing was saved yet', () => {
    expect(new LedgerStore(path.join(dir, 'state.json')).load()).toBeUndefined();
  });

  it('reads back what it saved, creating the directory', () => {
    const ledger = new PositionLedger(testConfig());
    ledger.trackEntryOrder(intent('AAPL'), 100.2, MONDAY_10AM);
    ledger.recordEntry('entry-AAPL', { quantity: 10, price: 100, at: MONDAY_10AM });
    ledger.trackEntryOrder(intent('MSFT'), 100.2, MONDAY_10AM);

    const state: PersistedState = {
      version: STATE_FILE_VERSION,
      state: 'EMERGENCY_STOPPED',
      lastCycleTime: MONDAY_10AM,
      ledger: ledger.toJSON(),
    };
    const store = new LedgerStore(path.join(dir, 'nested', 'state.json'));
    store.save(state);

    expect(store.load()).toEqual(state);
    expect(fs.existsSync(`${store.path}.tmp`)).toBe(false);
  });

  it('rejects a file that is not JSON', () => {
    const file = path.join(dir, 'state.json');
    fs.writeFileSync(file, '{ positions: [');
    expect(() => new LedgerStore(file).load()).toThrow(ConfigError);
    expect(() => new LedgerStore(file).load()).toThrow(/is not valid JSON/);
  });

  it('rejects a file from another version', () => {
    const file = path.join(dir, 'state.json');
    fs.writeFileSync(
      file,
      JSON.stringify({
        version: 99,
        state: 'STOPPED',
        lastCycleTime: null,
        ledger: { positions: [], history: [], inconsistencies: [] },
      })
    );
    expect(() => new LedgerStore(file).load()).toThrow(/is malformed: version/);
  });
});
