export type ControlCommand =
  | { type: 'liquidate'; reason: string; at: number }
  | { type: 'resume'; at: number }
  | { type: 'shutdown'; at: number };

/**
 * Single-consumer queue of control messages. Producers (the control bot, the
 * outage detector) only send; the scheduling loop drains and acts.
 */
export class CommandChannel<C = ControlCommand> {
  private queue: C[] = [];
  private waker: AbortController | undefined;

  send(command: C): void {
    this.queue.push(command);
    this.waker?.abort();
  }

  drain(): C[] {
    const commands = this.queue;
    this.queue = [];
    return commands;
  }

  get size(): number {
    return this.queue.length;
  }

  /** Signal that aborts as soon as a command is waiting (immediately if one already is). */
  wakeSignal(): AbortSignal {
    this.waker = new AbortController();
    if (this.queue.length > 0) {
      this.waker.abort();
    }
    return this.waker.signal;
  }
}
