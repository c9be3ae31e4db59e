import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { ConfigError } from '../core/errors.js';
import type { OrchestratorState } from '../core/tradingState.js';
import { STATE_FILE_VERSION } from './constants.market.js';
import type { LedgerJSON } from './positionLedger.js';

export interface PersistedState {
  version: typeof STATE_FILE_VERSION;
  state: OrchestratorState;
  lastCycleTime: number | null;
  ledger: LedgerJSON;
}

const sideSchema = z.enum(['BUY', 'SELL']);
const orderStatusSchema = z.enum([
  'new',
  'accepted',
  'pending',
  'partially_filled',
  'filled',
  'canceled',
  'expired',
  'rejected',
]);
const exitReasonSchema = z.enum(['stop_loss', 'take_profit', 'signal', 'emergency']);

const intentSchema = z.object({
  symbol: z.string(),
  side: sideSchema,
  quantity: z.number(),
  orderType: z.enum(['market', 'limit']),
  limitPrice: z.number().optional(),
  stopLoss: z.number(),
  takeProfit: z.number(),
  reason: z.union([z.literal('entry'), exitReasonSchema]),
  clientOrderId: z.string(),
});

const handleSchema = z.object({
  orderId: z.string(),
  clientOrderId: z.string(),
  symbol: z.string(),
  side: sideSchema,
  quantity: z.number(),
  status: orderStatusSchema,
  filledQuantity: z.number(),
  filledAvgPrice: z.number().optional(),
  submittedAt: z.number(),
});

const positionSchema = z.object({
  id: z.string(),
  symbol: z.string(),
  quantity: z.number(),
  entryPrice: z.number(),
  entryTime: z.number(),
  stopLoss: z.number(),
  takeProfit: z.number(),
  status: z.enum(['PENDING_ENTRY', 'OPEN', 'PENDING_EXIT', 'CLOSED', 'VOID']),
  markPrice: z.number(),
  unrealizedPnl: z.number(),
  realizedPnl: z.number(),
  exitPrice: z.number().optional(),
  exitTime: z.number().optional(),
  exitReason: exitReasonSchema.optional(),
  voidReason: z.string().optional(),
  pendingOrder: z
    .object({
      intent: intentSchema,
      handle: handleSchema.optional(),
      submittedAt: z.number(),
    })
    .optional(),
});

const stateSchema = z.object({
  version: z.literal(STATE_FILE_VERSION),
  state: z.enum(['STOPPED', 'RUNNING', 'EMERGENCY_STOPPED']),
  lastCycleTime: z.number().nullable(),
  ledger: z.object({
    positions: z.array(positionSchema),
    history: z.array(positionSchema),
    inconsistencies: z.array(
      z.object({ positionId: z.string(), symbol: z.string(), message: z.string(), at: z.number() })
    ),
  }),
});

/** JSON file holding the ledger and orchestrator state between restarts. */
export class LedgerStore {
  constructor(private readonly file: string) {}

  get path(): string {
    return this.file;
  }

  load(): PersistedState | undefined {
    if (!fs.existsSync(this.file)) {
      return undefined;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(this.file, 'utf8'));
    } catch (err) {
      throw new ConfigError(`State file ${this.file} is not valid JSON: ${String(err)}`);
    }

    const parsed = stateSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
      throw new ConfigError(`State file ${this.file} is malformed: ${issues}`);
    }
    return parsed.data;
  }

  save(state: PersistedState): void {
    const dir = path.dirname(this.file);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
    // write-then-rename so a crash never leaves half a file
    const tmp = `${this.file}.tmp`;
    fs.writeFileSync(tmp, JSON.stringify(state, null, 2));
    fs.renameSync(tmp, this.file);
  }
}
