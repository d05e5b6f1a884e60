/**
 * Handler Registry - routes each event kind to exactly one handler
 */

import type { StreamEvent, StreamEventKind } from '../../domain/stream/events.js';
import type { HandlerContext, HandlerOutcome, StreamHandler } from './handlers/types.js';

export class HandlerRegistry {
  private handlers = new Map<StreamEventKind, StreamHandler>();

  /**
   * Register a handler for every kind it declares
   */
  register(handler: StreamHandler): void {
    for (const kind of handler.kinds) {
      const existing = this.handlers.get(kind);
      if (existing) {
        throw new Error(`Event kind '${kind}' is already handled by '${existing.name}'`);
      }
    }

    for (const kind of handler.kinds) {
      this.handlers.set(kind, handler);
    }
  }

  unregister(kind: StreamEventKind): boolean {
    return this.handlers.delete(kind);
  }

  get(kind: StreamEventKind): StreamHandler | undefined {
    return this.handlers.get(kind);
  }

  has(kind: StreamEventKind): boolean {
    return this.handlers.has(kind);
  }

  /**
   * Run the handler for an event. Returns undefined when no handler is registered.
   */
  async dispatch(event: StreamEvent, ctx: HandlerContext): Promise<HandlerOutcome | undefined> {
    const handler = this.handlers.get(event.kind);
    if (!handler) {
      return undefined;
    }
    return handler.handle(event, ctx);
  }

  list(): Array<{ kind: StreamEventKind; handler: string }> {
    return Array.from(this.handlers.entries()).map(([kind, handler]) => ({
      kind,
      handler: handler.name,
    }));
  }
}
