/**
 * Observer registry for clipboard change notifications.
 */
import type { Logger } from "../logger";

type Handler<T> = (payload: T) => void;

export class ChangeNotifier<T> {
  private handlers = new Map<number, Handler<T>>();
  private nextToken = 0;

  constructor(private readonly logger: Logger) {}

  /** @returns A function removing this registration. */
  subscribe(handler: Handler<T>): () => void {
    const token = this.nextToken++;
    this.handlers.set(token, handler);
    return () => {
      this.handlers.delete(token);
    };
  }

  /** Removes every registration of `handler`. */
  unsubscribe(handler: Handler<T>): void {
    for (const [token, h] of Array.from(this.handlers)) {
      if (h === handler) this.handlers.delete(token);
    }
  }

  get size(): number {
    return this.handlers.size;
  }

  clear(): void {
    this.handlers.clear();
  }

  // Iterates a snapshot so handlers may (un)subscribe while being called.
  emit(payload: T): void {
    for (const h of Array.from(this.handlers.values())) {
      try {
        h(payload);
      } catch (err) {
        this.logger.error("Change observer threw", err);
      }
    }
  }
}
