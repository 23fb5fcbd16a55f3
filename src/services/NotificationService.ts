/**
 * NotificationService - turns lifecycle events into user notifications
 *
 * Subscribes to the event bus and fans each event out to the people who
 * care about it:
 * - request.created   → available workers nearby, in their own radius
 * - request.accepted  → the customer
 * - request.started   → the customer
 * - request.completed → the customer
 * - request.cancelled → the customer and the released worker, minus
 *                       whoever cancelled
 *
 * Delivery goes to a NotificationSink. A failing sink is logged and
 * skipped; the transition that produced the event has already happened.
 */

import { v4 as uuidv4 } from 'uuid';
import { EventBus } from '../events/EventBus';
import { NotFoundError } from '../models/errors';
import { LifecycleEvent, LifecycleEventType, Worker } from '../models/types';
import { haversineDistance } from '../utils/geocoding';
import { Logger } from '../utils/logger';
import { WorkerRegistry } from './WorkerRegistry';

// =============================================================================
// TYPES
// =============================================================================

export type NotificationCategory = 'request' | 'workflow';

export interface Notification {
  id: string;
  recipientId: string;
  category: NotificationCategory;
  event: LifecycleEventType;
  requestId: string;
  title: string;
  body: string;
  data: Record<string, unknown>;
  read: boolean;
  readAt?: Date;
  createdAt: Date;
}

/** What a sink receives; it assigns identity and read state itself. */
export type OutgoingNotification = Omit<Notification, 'id' | 'read' | 'readAt' | 'createdAt'>;

export interface NotificationSink {
  deliver(notification: OutgoingNotification): void | Promise<void>;
}

// =============================================================================
// IN-MEMORY INBOX
// =============================================================================

/**
 * Keeps one notification per (recipient, event, request). Delivering the
 * same combination again replaces the content and marks it unread.
 */
export class NotificationInbox implements NotificationSink {
  private notifications = new Map<string, Notification>();

  constructor(private readonly clock: () => Date = () => new Date()) {}

  deliver(notification: OutgoingNotification): void {
    const key = `${notification.recipientId}:${notification.event}:${notification.requestId}`;
    const existing = this.notifications.get(key);
    this.notifications.set(key, {
      ...notification,
      id: existing?.id ?? uuidv4(),
      read: false,
      readAt: undefined,
      createdAt: existing?.createdAt ?? this.clock()
    });
  }

  /** Newest first. */
  list(recipientId: string, options: { unreadOnly?: boolean } = {}): Notification[] {
    return Array.from(this.notifications.values())
      .filter(n => n.recipientId === recipientId && (!options.unreadOnly || !n.read))
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
      .map(n => ({ ...n, data: { ...n.data } }));
  }

  unreadCount(recipientId: string): number {
    let count = 0;
    for (const n of this.notifications.values()) {
      if (n.recipientId === recipientId && !n.read) count += 1;
    }
    return count;
  }

  /**
   * Mark one of the recipient's notifications read. Someone else's
   * notification is reported as not found.
   */
  markRead(recipientId: string, notificationId: string): Notification {
    for (const n of this.notifications.values()) {
      if (n.id !== notificationId || n.recipientId !== recipientId) continue;
      if (!n.read) {
        n.read = true;
        n.readAt = this.clock();
      }
      return { ...n, data: { ...n.data } };
    }
    throw new NotFoundError('Notification', notificationId);
  }

  /** Returns how many notifications changed. */
  markAllRead(recipientId: string): number {
    const now = this.clock();
    let updated = 0;
    for (const n of this.notifications.values()) {
      if (n.recipientId !== recipientId || n.read) continue;
      n.read = true;
      n.readAt = now;
      updated += 1;
    }
    return updated;
  }
}

// =============================================================================
// SERVICE
// =============================================================================

export interface NotificationServiceDeps {
  events: EventBus;
  registry: WorkerRegistry;
  sink: NotificationSink;
  logger: Logger;
}

export class NotificationService {
  private readonly events: EventBus;
  private readonly registry: WorkerRegistry;
  private readonly sink: NotificationSink;
  private readonly logger: Logger;
  private unsubscribe?: () => void;

  constructor(deps: NotificationServiceDeps) {
    this.events = deps.events;
    this.registry = deps.registry;
    this.sink = deps.sink;
    this.logger = deps.logger.child('NotificationService');
  }

  /** Begin listening. Calling twice has no extra effect. */
  start(): void {
    if (this.unsubscribe) return;
    this.unsubscribe = this.events.onAll(event => this.handle(event));
  }

  stop(): void {
    this.unsubscribe?.();
    this.unsubscribe = undefined;
  }

  async handle(event: LifecycleEvent): Promise<void> {
    const outgoing = await this.notificationsFor(event);
    for (const notification of outgoing) {
      try {
        await this.sink.deliver(notification);
      } catch (err) {
        this.logger.error('Notification delivery failed', err, {
          recipientId: notification.recipientId,
          event: notification.event,
          requestId: notification.requestId
        });
      }
    }
    if (outgoing.length > 0) {
      this.logger.debug('Notifications sent', { event: event.type, requestId: event.requestId, count: outgoing.length });
    }
  }

  /**
   * Everything that should be sent for `event`, without sending it.
   */
  async notificationsFor(event: LifecycleEvent): Promise<OutgoingNotification[]> {
    const { request } = event;
    const base = { event: event.type, requestId: request.id };

    switch (event.type) {
      case 'request.created': {
        const workers = await this.registry.list();
        return this.nearbyWorkers(event, workers).map(({ worker, distanceKm }): OutgoingNotification => ({
          ...base,
          recipientId: worker.id,
          category: 'request',
          title: 'New service request nearby',
          body: `${request.title} requires attention.`,
          data: {
            requestId: request.id,
            referenceCode: request.referenceCode,
            distanceKm: Math.round(distanceKm * 100) / 100,
            priority: request.priority
          }
        }));
      }

      case 'request.accepted':
        return [{
          ...base,
          recipientId: request.customerId,
          category: 'request',
          title: `Request ${request.referenceCode} accepted`,
          body: `Worker ${event.workerId ?? 'unknown'} has accepted your request.`,
          data: { requestId: request.id, workerId: event.workerId }
        }];

      case 'request.started':
        return [{
          ...base,
          recipientId: request.customerId,
          category: 'workflow',
          title: `Request ${request.referenceCode} started`,
          body: 'Work on your request has started.',
          data: { requestId: request.id, workerId: event.workerId }
        }];

      case 'request.completed':
        return [{
          ...base,
          recipientId: request.customerId,
          category: 'workflow',
          title: `Request ${request.referenceCode} completed`,
          body: 'Your maintenance request has been marked as completed.',
          data: { requestId: request.id, workerId: event.workerId }
        }];

      case 'request.cancelled': {
        const recipients = [request.customerId, event.workerId]
          .filter((id): id is string => id !== undefined && id !== event.actor.id);
        return recipients.map((recipientId): OutgoingNotification => ({
          ...base,
          recipientId,
          category: 'request',
          title: `Request ${request.referenceCode} cancelled`,
          body: `The request was cancelled by ${event.actor.role} ${event.actor.id}.`,
          data: { requestId: request.id, cancelledBy: event.actor.id }
        }));
      }
    }
  }

  /**
   * Available workers with a known location whose own service radius
   * covers the request, filtered by category when the request has one.
   */
  private nearbyWorkers(event: LifecycleEvent, workers: Worker[]): Array<{ worker: Worker; distanceKm: number }> {
    const { request } = event;
    const matches: Array<{ worker: Worker; distanceKm: number }> = [];
    for (const worker of workers) {
      if (!worker.available || !worker.location) continue;
      if (request.categoryId !== undefined && worker.categoryId !== request.categoryId) continue;
      const distanceKm = haversineDistance(request.location, worker.location);
      if (distanceKm <= worker.serviceRadiusKm) {
        matches.push({ worker, distanceKm });
      }
    }
    return matches;
  }
}
