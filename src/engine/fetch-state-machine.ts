import type { FetchState } from '../types/index.js';

type StateTransition = [FetchState, FetchState];

/** Allowed transitions of one fetch job */
const VALID_TRANSITIONS: StateTransition[] = [
  ['STARTING', 'REQUESTING'],
  ['STARTING', 'FAILED'],          // corrupt resume state
  ['REQUESTING', 'WRITING'],
  ['REQUESTING', 'RETRYING'],
  ['REQUESTING', 'DONE'],          // end of data or past endTime
  ['REQUESTING', 'FAILED'],        // permanent error
  ['WRITING', 'REQUESTING'],
  ['WRITING', 'DONE'],
  ['WRITING', 'FAILED'],           // write failed
  ['RETRYING', 'REQUESTING'],
  ['RETRYING', 'FAILED'],          // retry ceiling
  // stop signal, between batches
  ['STARTING', 'CANCELLED'],
  ['REQUESTING', 'CANCELLED'],
  ['WRITING', 'CANCELLED'],
  ['RETRYING', 'CANCELLED'],
];

const TERMINAL: ReadonlySet<FetchState> = new Set<FetchState>(['DONE', 'FAILED', 'CANCELLED']);

export class FetchStateMachine {
  private state: FetchState = 'STARTING';
  private history: Array<{ from: FetchState; to: FetchState; at: number }> = [];

  get current(): FetchState {
    return this.state;
  }

  transition(to: FetchState): void {
    if (this.state === to) return; // noop

    if (!this.canTransition(to)) {
      throw new Error(`Invalid fetch state transition: ${this.state} → ${to}`);
    }

    this.history.push({ from: this.state, to, at: Date.now() });
    this.state = to;

    // a long job loops REQUESTING ↔ WRITING for every batch
    if (this.history.length > 100) {
      this.history = this.history.slice(-50);
    }
  }

  canTransition(to: FetchState): boolean {
    return VALID_TRANSITIONS.some(([from, target]) => from === this.state && target === to);
  }

  isTerminal(): boolean {
    return TERMINAL.has(this.state);
  }

  getHistory(): ReadonlyArray<{ from: FetchState; to: FetchState; at: number }> {
    return this.history;
  }
}
