import { InvalidTransition } from './errors.js';

export type OrchestratorState = 'STOPPED' | 'RUNNING' | 'EMERGENCY_STOPPED';

const ALLOWED: Record<OrchestratorState, readonly OrchestratorState[]> = {
  STOPPED: ['RUNNING', 'EMERGENCY_STOPPED'],
  RUNNING: ['STOPPED', 'EMERGENCY_STOPPED'],
  // only an explicit resume leaves the emergency state
  EMERGENCY_STOPPED: ['RUNNING'],
};

export class TradingState {
  private current: OrchestratorState;
  private changedAt: number;

  constructor(
    initial: OrchestratorState = 'STOPPED',
    private readonly onChange?: (from: OrchestratorState, to: OrchestratorState) => void
  ) {
    this.current = initial;
    this.changedAt = 0;
  }

  get value(): OrchestratorState {
    return this.current;
  }

  get since(): number {
    return this.changedAt;
  }

  is(state: OrchestratorState): boolean {
    return this.current === state;
  }

  canMoveTo(next: OrchestratorState): boolean {
    return ALLOWED[this.current].includes(next);
  }

  moveTo(next: OrchestratorState, at: number): void {
    if (!this.canMoveTo(next)) {
      throw new InvalidTransition(this.current, next);
    }
    const from = this.current;
    this.current = next;
    this.changedAt = at;
    this.onChange?.(from, next);
  }
}
