import { log } from '../log';
import { incEvent } from '../metrics';
import type { AmiMessage } from './message';

export type EventHandler = (event: AmiMessage) => void;

/**
 * Delivers every event, in arrival order, to every subscriber before the read
 * loop continues. Handlers must hand long-running work off themselves.
 */
export class EventRouter {
  private readonly handlers = new Set<EventHandler>();

  public subscribe(handler: EventHandler): () => void {
    this.handlers.add(handler);
    return () => this.unsubscribe(handler);
  }

  public unsubscribe(handler: EventHandler): boolean {
    return this.handlers.delete(handler);
  }

  public get subscriberCount(): number {
    return this.handlers.size;
  }

  public dispatch(event: AmiMessage): void {
    if (event.kind !== 'EVENT') {
      return;
    }

    incEvent(event.eventName);

    // snapshot so a handler may unsubscribe itself mid-dispatch
    for (const handler of Array.from(this.handlers)) {
      try {
        handler(event);
      } catch (error) {
        log.error(
          { err: error, event: 'ami_event_handler_failed', ami_event: event.eventName },
          'ami event handler failed',
        );
      }
    }
  }
}
