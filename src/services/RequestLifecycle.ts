import { Logger } from '../utils/logger.js';

export type RequestState = 'received' | 'decoding' | 'governing' | 'fetching' | 'streaming' | 'closed';

const TRANSITIONS: Record<RequestState, RequestState[]> = {
  received: ['decoding', 'closed'],
  decoding: ['governing', 'fetching', 'closed'],
  governing: ['fetching', 'closed'],
  fetching: ['streaming', 'closed'],
  streaming: ['closed'],
  closed: []
};

export type CloseReason = 'completed' | 'client-disconnected' | 'failed';

/**
 * Tracks one proxied request through Received → Decoding → (Governing) → Fetching → Streaming → Closed.
 * Closed is reachable from every other state and is terminal.
 */
export class RequestLifecycle {
  private current: RequestState = 'received';
  private closeReason?: CloseReason;
  private readonly startedAt = Date.now();

  constructor(
    readonly requestId: string,
    private readonly logger: Logger
  ) {}

  get state(): RequestState {
    return this.current;
  }

  get reason(): CloseReason | undefined {
    return this.closeReason;
  }

  get isClosed(): boolean {
    return this.current === 'closed';
  }

  transition(next: RequestState): void {
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new Error(`Illegal request state transition ${this.current} -> ${next}`);
    }
    this.current = next;
  }

  /** Moves to Closed once; later calls are ignored so every exit path can call it. */
  close(reason: CloseReason): boolean {
    if (this.current === 'closed') {
      return false;
    }

    const from = this.current;
    this.current = 'closed';
    this.closeReason = reason;
    this.logger.debug('Request closed', {
      requestId: this.requestId,
      from,
      reason,
      durationMs: Date.now() - this.startedAt
    });
    return true;
  }
}
