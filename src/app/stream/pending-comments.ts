/**
 * Accepted comments waiting for an integrated response.
 */

export interface PendingComment {
  author: string;
  text: string;
  receivedAt: number;
}

export class PendingComments {
  private items: PendingComment[] = [];
  private responseRequested = false;

  constructor(private maxSize: number = 50) {}

  /**
   * Buffer a comment. The oldest comment is dropped once the buffer is full.
   */
  add(comment: PendingComment): number {
    this.items.push(comment);
    if (this.items.length > this.maxSize) {
      this.items.shift();
    }
    return this.items.length;
  }

  size(): number {
    return this.items.length;
  }

  peek(): readonly PendingComment[] {
    return [...this.items];
  }

  /**
   * Mark that a response has been requested for the current batch.
   * Returns false when one was already requested.
   */
  markResponseRequested(): boolean {
    if (this.responseRequested) {
      return false;
    }
    this.responseRequested = true;
    return true;
  }

  /**
   * Allow the current batch to be requested again, e.g. after a failed reply.
   */
  clearResponseRequest(): void {
    this.responseRequested = false;
  }

  isResponseRequested(): boolean {
    return this.responseRequested;
  }

  /**
   * Remove the oldest `count` comments and open a new batch.
   */
  take(count: number): PendingComment[] {
    const taken = this.items.slice(0, Math.max(0, count));
    this.items = this.items.slice(taken.length);
    this.responseRequested = false;
    return taken;
  }

  drain(): PendingComment[] {
    const drained = this.items;
    this.items = [];
    this.responseRequested = false;
    return drained;
  }
}
