import { log } from '../log';

/** Synchronous listener set; a throwing listener is logged and skipped. */
export class Listeners<T extends unknown[]> {
  private readonly listeners = new Set<(...args: T) => void>();

  constructor(private readonly name: string) {}

  public add(listener: (...args: T) => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  public emit(...args: T): void {
    for (const listener of Array.from(this.listeners)) {
      try {
        listener(...args);
      } catch (error) {
        log.error({ err: error, event: 'listener_failed', listener: this.name }, 'listener failed');
      }
    }
  }
}
