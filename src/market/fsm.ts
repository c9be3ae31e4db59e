// src/market/fsm.ts
import { InvalidTransition } from '../core/errors.js';
import type { PositionStatus } from './types.js';

export type PositionEvent =
  | 'fill_confirmed' // broker reports the pending order filled
  | 'fill_rejected' // broker refused / canceled / expired the pending order
  | 'timeout' // entry order never filled in time
  | 'exit_submitted'
  | 'exit_filled' // exit filled in the same call that submitted it
  | 'vanished'; // broker no longer holds an OPEN position

const TRANSITIONS: Record<PositionStatus, Partial<Record<PositionEvent, PositionStatus>>> = {
  PENDING_ENTRY: {
    fill_confirmed: 'OPEN',
    fill_rejected: 'VOID',
    timeout: 'VOID',
  },
  OPEN: {
    exit_submitted: 'PENDING_EXIT',
    exit_filled: 'CLOSED',
    vanished: 'VOID',
  },
  PENDING_EXIT: {
    fill_confirmed: 'CLOSED',
    // re-evaluated next cycle
    fill_rejected: 'OPEN',
  },
  CLOSED: {},
  VOID: {},
};

export function positionStep(status: PositionStatus, event: PositionEvent, symbol?: string): PositionStatus {
  const next = TRANSITIONS[status][event];
  if (!next) {
    throw new InvalidTransition(status, event, symbol);
  }
  return next;
}

export function canTransition(status: PositionStatus, event: PositionEvent): boolean {
  return TRANSITIONS[status][event] !== undefined;
}

export const isTerminal = (status: PositionStatus): boolean => status === 'CLOSED' || status === 'VOID';

export const isPending = (status: PositionStatus): boolean =>
  status === 'PENDING_ENTRY' || status === 'PENDING_EXIT';

/** OPEN or waiting on an order: counts as exposure in the symbol. */
export const isActive = (status: PositionStatus): boolean => !isTerminal(status);
