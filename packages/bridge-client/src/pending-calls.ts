/**
 * @module @cmdbridge/client/pending-calls
 *
 * Table of in-flight calls keyed by invocation id.
 */

export type PendingCallHandler = (isSuccess: boolean, payload: string) => void;

export class PendingCalls {
  private nextId = 0;
  private readonly handlers = new Map<number, PendingCallHandler>();

  get size(): number {
    return this.handlers.size;
  }

  /**
   * Store a handler under a fresh id.
   */
  register(handler: PendingCallHandler): number {
    const id = this.nextId++;
    this.handlers.set(id, handler);
    return id;
  }

  /**
   * Hand the result to the call's handler and forget the call.
   *
   * @returns false for unknown (or already settled) ids
   */
  settle(id: number, isSuccess: boolean, payload: string): boolean {
    const handler = this.handlers.get(id);
    if (!handler) {
      return false;
    }
    this.handlers.delete(id);
    handler(isSuccess, payload);
    return true;
  }

  has(id: number): boolean {
    return this.handlers.has(id);
  }
}
