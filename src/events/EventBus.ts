/**
 * In-memory pub/sub for lifecycle events.
 *
 * The coordinator publishes after every successful transition; the
 * notification service and any external collaborator subscribe. Delivery
 * is fire-and-forget: a subscriber that throws or rejects is logged and
 * never reaches the publisher.
 */
import { v4 as uuidv4 } from 'uuid';
import {
  Actor,
  LifecycleEvent,
  LifecycleEventType,
  RequestStatus,
  ServiceRequest,
  eventTypeFor
} from '../models/types';
import { Logger, logger as rootLogger } from '../utils/logger';

export type Subscriber = (event: LifecycleEvent) => void | Promise<void>;

/**
 * Build the event for a request that has just entered `request.status`.
 * The event holds its own copy of the request and actor; subscribers
 * never share objects with the caller of the transition.
 */
export function createLifecycleEvent(
  request: ServiceRequest,
  fromStatus: RequestStatus | null,
  actor: Actor,
  timestamp: Date,
  workerId?: string
): LifecycleEvent {
  return {
    id: uuidv4(),
    type: eventTypeFor(request.status),
    requestId: request.id,
    referenceCode: request.referenceCode,
    fromStatus,
    toStatus: request.status,
    actor: { id: actor.id, role: actor.role },
    workerId,
    timestamp,
    request: structuredClone(request)
  };
}

export class EventBus {
  private subscribers = new Map<LifecycleEventType, Set<Subscriber>>();
  private globalSubscribers = new Set<Subscriber>();
  private readonly logger: Logger;

  constructor(logger: Logger = rootLogger) {
    this.logger = logger.child('EventBus');
  }

  /** Subscribe to a specific event type. Returns unsubscribe function. */
  on(type: LifecycleEventType, fn: Subscriber): () => void {
    let subs = this.subscribers.get(type);
    if (!subs) {
      subs = new Set();
      this.subscribers.set(type, subs);
    }
    subs.add(fn);
    return () => { this.subscribers.get(type)?.delete(fn); };
  }

  /** Subscribe to ALL events. Returns unsubscribe function. */
  onAll(fn: Subscriber): () => void {
    this.globalSubscribers.add(fn);
    return () => { this.globalSubscribers.delete(fn); };
  }

  /** Publish an event to all matching subscribers. Never throws. */
  emit(event: LifecycleEvent): void {
    const targets = [
      ...(this.subscribers.get(event.type) ?? []),
      ...this.globalSubscribers
    ];
    for (const fn of targets) {
      this.deliver(fn, event);
    }
  }

  private deliver(fn: Subscriber, event: LifecycleEvent): void {
    const context = { eventId: event.id, type: event.type, requestId: event.requestId };
    try {
      const result = fn(event);
      if (result instanceof Promise) {
        result.catch(err => this.logger.error('Event subscriber rejected', err, context));
      }
    } catch (err) {
      this.logger.error('Event subscriber threw', err, context);
    }
  }

  /** Count of active subscribers (for monitoring). */
  get subscriberCount(): number {
    let count = this.globalSubscribers.size;
    for (const subs of this.subscribers.values()) {
      count += subs.size;
    }
    return count;
  }
}
