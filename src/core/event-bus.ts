import type { Logger } from '../types/logger.js';
import type { RuntimeEvent } from '../types/pack.js';

/**
 * Event handler function type.
 */
export type EventHandler = (event: RuntimeEvent) => void | Promise<void>;

/**
 * Subscription options.
 */
export interface SubscriptionOptions {
  /** Only receive events with one of these names (absent = all) */
  names?: readonly string[];
}

interface Subscription {
  id: string;
  handler: EventHandler;
  names: ReadonlySet<string> | undefined;
}

/**
 * EventBus - pub/sub for runtime events that release deferred setups.
 *
 * Handler failures are logged and never reach the publisher.
 */
export class EventBus {
  private subscriptions: Subscription[] = [];
  private nextId = 1;
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger.child({ component: 'event-bus' });
  }

  /**
   * Subscribe to events matching the given options.
   *
   * @returns Subscription ID for unsubscribing
   */
  subscribe(handler: EventHandler, options: SubscriptionOptions = {}): string {
    const id = `sub_${String(this.nextId++)}`;
    this.subscriptions.push({
      id,
      handler,
      names: options.names ? new Set(options.names) : undefined,
    });

    this.logger.debug({ subscriptionId: id, names: options.names }, 'Subscription added');

    return id;
  }

  unsubscribe(subscriptionId: string): boolean {
    const index = this.subscriptions.findIndex((s) => s.id === subscriptionId);
    if (index >= 0) {
      this.subscriptions.splice(index, 1);
      this.logger.debug({ subscriptionId }, 'Subscription removed');
      return true;
    }
    return false;
  }

  /**
   * Publish an event to all matching subscribers.
   *
   * @returns Number of handlers that received the event
   */
  async publish(event: RuntimeEvent): Promise<number> {
    // Snapshot: handlers may unsubscribe while we deliver
    const matching = this.subscriptions.filter((sub) => !sub.names || sub.names.has(event.name));

    if (matching.length === 0) {
      return 0;
    }

    const results = await Promise.allSettled(
      matching.map(async (sub) => {
        await sub.handler(event);
      })
    );

    results.forEach((result, index) => {
      if (result.status === 'rejected') {
        this.logger.error(
          {
            subscriptionId: matching[index]?.id,
            event: event.name,
            error: result.reason instanceof Error ? result.reason.message : String(result.reason),
          },
          'Event handler failed'
        );
      }
    });

    return matching.length;
  }

  subscriptionCount(): number {
    return this.subscriptions.length;
  }

  clear(): void {
    this.subscriptions = [];
    this.logger.debug('All subscriptions cleared');
  }
}

export function createEventBus(logger: Logger): EventBus {
  return new EventBus(logger);
}
