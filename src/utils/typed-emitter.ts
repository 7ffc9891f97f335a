import { EventEmitter } from "node:events";

type Listener<A extends unknown[]> = (...args: A) => void;

/**
 * EventEmitter wrapper keyed by an event map of argument tuples:
 * `{ message: [msg: NormalizedMessage]; connected: [] }`.
 */
export class TypedEventEmitter<T extends { [K in keyof T]: unknown[] }> {
  private readonly emitter = new EventEmitter();

  on<K extends string & keyof T>(event: K, listener: Listener<T[K]>): this {
    this.emitter.on(event, listener);
    return this;
  }

  off<K extends string & keyof T>(event: K, listener: Listener<T[K]>): this {
    this.emitter.off(event, listener);
    return this;
  }

  once<K extends string & keyof T>(event: K, listener: Listener<T[K]>): this {
    this.emitter.once(event, listener);
    return this;
  }

  emit<K extends string & keyof T>(event: K, ...args: T[K]): boolean {
    return this.emitter.emit(event, ...args);
  }

  removeAllListeners<K extends string & keyof T>(event?: K): this {
    this.emitter.removeAllListeners(event);
    return this;
  }

  listenerCount<K extends string & keyof T>(event: K): number {
    return this.emitter.listenerCount(event);
  }
}
