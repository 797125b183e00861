export type MessageState = 'received' | 'processing' | 'acked' | 'retry-requested';

/**
 * One delivery of a queue message, as seen by a consumer stage.
 *
 * `received → processing → acked | retry-requested`; once settled the state
 * does not change again for this delivery.
 */
export class QueueMessage {
  private currentState: MessageState = 'received';
  private failure: unknown = null;

  constructor(
    readonly id: string,
    readonly body: unknown,
    readonly attempts = 1,
  ) {}

  get state(): MessageState {
    return this.currentState;
  }

  get retryReason(): unknown {
    return this.failure;
  }

  get settled(): boolean {
    return this.currentState === 'acked' || this.currentState === 'retry-requested';
  }

  begin(): void {
    if (this.currentState !== 'received') {
      throw new Error(`Message ${this.id} cannot begin processing from state ${this.currentState}`);
    }
    this.currentState = 'processing';
  }

  ack(): void {
    this.settle('acked');
  }

  retry(reason: unknown): void {
    this.failure = reason;
    this.settle('retry-requested');
  }

  private settle(next: 'acked' | 'retry-requested'): void {
    if (this.settled) {
      throw new Error(`Message ${this.id} is already ${this.currentState}`);
    }
    this.currentState = next;
  }
}
