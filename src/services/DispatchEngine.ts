/**
 * DispatchEngine - the operations callers use
 *
 * Validates input with zod, applies the per-operation role rules, and
 * delegates to the component that owns each concern. Every method takes
 * the authenticated Actor explicitly; nothing is read from ambient state.
 */

import { DispatchConfig, resolveDispatchConfig } from '../config/config';
import { EventBus, createLifecycleEvent } from '../events/EventBus';
import { MatchingEngine } from '../matchers/MatchingEngine';
import {
  ForbiddenError,
  InvalidTransitionError,
  ValidationError
} from '../models/errors';
import {
  Actor,
  ActorRole,
  ActorSchema,
  AvailabilitySchema,
  Coordinates,
  CreateRequestInput,
  CreateRequestSchema,
  DeclinedRequest,
  DeclineInput,
  DeclineSchema,
  DispatchMetrics,
  NearbyQuery,
  NearbyQuerySchema,
  RankedCandidate,
  RegisterWorkerInput,
  RegisterWorkerSchema,
  RequestFilter,
  RequestFilterSchema,
  RequestStatus,
  ServiceRequest,
  TransitionOptions,
  TransitionOptionsSchema,
  Worker,
  WorkerDecline,
  WorkerMatch,
  WorkerSearch,
  WorkerSearchSchema,
  WorkerTracking,
  summarizeRequest
} from '../models/types';
import { DispatchStore, RequestQuery } from '../store/DispatchStore';
import { InMemoryDispatchStore } from '../store/InMemoryDispatchStore';
import { GeocodingService, haversineDistance } from '../utils/geocoding';
import { KeyedLock } from '../utils/keyedLock';
import { Logger, logger as rootLogger } from '../utils/logger';
import { parseInput } from '../utils/validation';
import { DispatchCoordinator } from './DispatchCoordinator';
import { MetricsAggregator } from './MetricsAggregator';
import { Notification, NotificationInbox, NotificationService } from './NotificationService';
import { RequestStore } from './RequestStore';
import { WorkerRegistry } from './WorkerRegistry';

// =============================================================================
// AUTHORISATION HELPERS
// =============================================================================

function requireRole(actor: Actor, roles: readonly ActorRole[], action: string): void {
  if (!roles.includes(actor.role)) {
    throw new ForbiddenError(`Only ${roles.join(' or ')} may ${action}`);
  }
}

/** The worker themselves, or an admin. */
function requireSelfOrAdmin(actor: Actor, workerId: string, action: string): void {
  if (actor.role === ActorRole.ADMIN) return;
  if (actor.role === ActorRole.WORKER && actor.id === workerId) return;
  throw new ForbiddenError(`${actor.role} ${actor.id} may not ${action} for worker ${workerId}`);
}

/**
 * Admins see everything, customers their own requests, workers what is
 * open or what they have been assigned.
 */
export function canView(actor: Actor, request: ServiceRequest): boolean {
  switch (actor.role) {
    case ActorRole.ADMIN:
      return true;
    case ActorRole.CUSTOMER:
      return request.customerId === actor.id;
    case ActorRole.WORKER:
      return (
        request.status === RequestStatus.PENDING ||
        request.assignedWorkerId === actor.id ||
        request.lastAssignedWorkerId === actor.id
      );
  }
}

// =============================================================================
// ENGINE
// =============================================================================

export interface DispatchEngineOptions {
  store?: DispatchStore;
  config?: Partial<DispatchConfig>;

  /** Source of "now"; tests pin it to make ordering deterministic */
  clock?: () => Date;
  logger?: Logger;

  /** Resolves addresses on request creation; without one, coordinates are required */
  geocoder?: GeocodingService;
  inbox?: NotificationInbox;
}

export class DispatchEngine {
  readonly config: DispatchConfig;
  readonly events: EventBus;
  readonly inbox: NotificationInbox;

  private readonly requests: RequestStore;
  private readonly registry: WorkerRegistry;
  private readonly matching: MatchingEngine;
  private readonly coordinator: DispatchCoordinator;
  private readonly metrics: MetricsAggregator;
  private readonly notifications: NotificationService;
  private readonly geocoder?: GeocodingService;
  private readonly clock: () => Date;
  private readonly logger: Logger;

  constructor(options: DispatchEngineOptions = {}) {
    const store = options.store ?? new InMemoryDispatchStore();
    const logger = options.logger ?? rootLogger;
    this.clock = options.clock ?? (() => new Date());
    this.config = resolveDispatchConfig(options.config);
    this.logger = logger.child('DispatchEngine');
    this.geocoder = options.geocoder;
    this.events = new EventBus(logger);
    this.inbox = options.inbox ?? new NotificationInbox(this.clock);

    const shared = { store, config: this.config, clock: this.clock, logger };
    this.requests = new RequestStore(shared);
    this.registry = new WorkerRegistry({ ...shared, locks: new KeyedLock() });
    this.matching = new MatchingEngine(this.requests, this.config, logger);
    this.coordinator = new DispatchCoordinator({
      requests: this.requests,
      registry: this.registry,
      events: this.events,
      clock: this.clock,
      logger
    });
    this.metrics = new MetricsAggregator({
      requests: this.requests,
      registry: this.registry,
      config: this.config,
      clock: this.clock
    });
    this.notifications = new NotificationService({
      events: this.events,
      registry: this.registry,
      sink: this.inbox,
      logger
    });
    this.notifications.start();
  }

  /** Detach internal subscribers from the event bus. */
  stop(): void {
    this.notifications.stop();
  }

  // ===========================================================================
  // WORKERS
  // ===========================================================================

  async registerWorker(actor: Actor, input: RegisterWorkerInput): Promise<Worker> {
    const caller = this.actor(actor);
    const data = parseInput(RegisterWorkerSchema, input, 'worker registration');
    requireSelfOrAdmin(caller, data.workerId, 'register');
    if (data.averageRating !== undefined) {
      requireRole(caller, [ActorRole.ADMIN], 'set a worker rating');
    }
    return this.registry.register(data);
  }

  async setAvailability(
    actor: Actor,
    workerId: string,
    input: { available: boolean; location?: Coordinates }
  ): Promise<Worker> {
    const caller = this.actor(actor);
    const data = parseInput(AvailabilitySchema, input, 'availability update');
    requireSelfOrAdmin(caller, workerId, 'change availability');
    // Locations are never cleared, so a stored one is still there for the write
    if (data.available && !data.location) {
      const current = await this.registry.get(workerId);
      if (!current.location) {
        const message = 'A location is required to go available';
        throw new ValidationError(`Invalid availability update: location: ${message}`, {
          issues: [{ path: 'location', message }]
        });
      }
    }
    return this.registry.setAvailability(workerId, data.available, data.location);
  }

  async getWorker(actor: Actor, workerId: string): Promise<Worker> {
    requireSelfOrAdmin(this.actor(actor), workerId, 'view the profile');
    return this.registry.get(workerId);
  }

  /**
   * Workers a customer can browse, filtered by category, rating and
   * distance, best first.
   */
  async searchWorkers(actor: Actor, filter: WorkerSearch = {}): Promise<Iterable<WorkerMatch>> {
    const caller = this.actor(actor);
    requireRole(caller, [ActorRole.CUSTOMER, ActorRole.ADMIN], 'search workers');
    const data = parseInput(WorkerSearchSchema, filter, 'worker search');
    const workers = await this.registry.list();
    return this.matching.searchWorkers(workers, data);
  }

  // ===========================================================================
  // REQUESTS
  // ===========================================================================

  /**
   * Open a new request in PENDING. Missing coordinates are geocoded from
   * the address; a missing address is filled in from the coordinates when
   * a geocoder is available.
   */
  async createRequest(actor: Actor, input: CreateRequestInput): Promise<ServiceRequest> {
    const caller = this.actor(actor);
    requireRole(caller, [ActorRole.CUSTOMER], 'create requests');
    const data = parseInput(CreateRequestSchema, input, 'service request');

    let { location, address, postcode } = data;
    if (!location) {
      const resolved = await this.geocodeAddress(address);
      location = resolved.coordinates;
      postcode = postcode || resolved.postcode;
    } else if (!address && this.geocoder) {
      try {
        const resolved = await this.geocoder.reverseGeocode(location);
        address = resolved.formattedAddress;
        postcode = postcode || resolved.postcode;
      } catch (err) {
        this.logger.warn('Reverse geocoding failed; continuing without address', {
          location,
          error: err instanceof Error ? err.message : String(err)
        });
      }
    }

    const request = await this.requests.create({
      customerId: caller.id,
      title: data.title,
      description: data.description,
      categoryId: data.categoryId,
      priority: data.priority,
      location,
      address,
      postcode,
      scheduledStart: data.scheduledStart,
      customerNotes: data.customerNotes,
      estimatedDurationMinutes: data.estimatedDurationMinutes
    });

    this.events.emit(createLifecycleEvent(request, null, caller, request.createdAt));
    return request;
  }

  async getRequest(actor: Actor, requestId: string): Promise<ServiceRequest> {
    const caller = this.actor(actor);
    const request = await this.requests.get(requestId);
    if (!canView(caller, request)) {
      throw new ForbiddenError(`${caller.role} ${caller.id} may not view request ${requestId}`);
    }
    return request;
  }

  /**
   * Newest first. Admins list everything, customers their own requests,
   * workers the requests they hold or last held.
   */
  async listRequests(actor: Actor, filter: RequestFilter = {}): Promise<ServiceRequest[]> {
    const caller = this.actor(actor);
    const data = parseInput(RequestFilterSchema, filter, 'request filter');
    const query: RequestQuery = {
      statuses: data.status ? [data.status] : undefined,
      priority: data.priority
    };
    if (caller.role === ActorRole.CUSTOMER) query.customerId = caller.id;
    if (caller.role === ActorRole.WORKER) query.workerId = caller.id;
    return this.requests.list(query);
  }

  /**
   * Pending requests the calling worker could take, best first.
   */
  async listNearbyPending(actor: Actor, query: NearbyQuery = {}): Promise<Iterable<RankedCandidate>> {
    const caller = this.actor(actor);
    requireRole(caller, [ActorRole.WORKER], 'search for nearby requests');
    const data = parseInput(NearbyQuerySchema, query, 'nearby query');
    const worker = await this.registry.get(caller.id);
    return this.matching.findCandidates(worker, data);
  }

  // ===========================================================================
  // LIFECYCLE
  // ===========================================================================

  async accept(actor: Actor, requestId: string, options: TransitionOptions = {}): Promise<ServiceRequest> {
    const caller = this.actor(actor);
    const { notes } = parseInput(TransitionOptionsSchema, options, 'transition options');
    return this.coordinator.accept(requestId, caller.id, caller, notes);
  }

  async start(actor: Actor, requestId: string, options: TransitionOptions = {}): Promise<ServiceRequest> {
    const caller = this.actor(actor);
    const { notes } = parseInput(TransitionOptionsSchema, options, 'transition options');
    return this.coordinator.start(requestId, caller, notes);
  }

  async complete(actor: Actor, requestId: string, options: TransitionOptions = {}): Promise<ServiceRequest> {
    const caller = this.actor(actor);
    const { notes } = parseInput(TransitionOptionsSchema, options, 'transition options');
    return this.coordinator.complete(requestId, caller, notes);
  }

  async cancel(actor: Actor, requestId: string, options: TransitionOptions = {}): Promise<ServiceRequest> {
    const caller = this.actor(actor);
    const { notes } = parseInput(TransitionOptionsSchema, options, 'transition options');
    return this.coordinator.cancel(requestId, caller, notes);
  }

  // ===========================================================================
  // DECLINES
  // ===========================================================================

  /**
   * Hide a pending request from the calling worker's nearby list. Other
   * workers still see it and the decliner may still accept it directly.
   */
  async decline(actor: Actor, requestId: string, input: DeclineInput = {}): Promise<WorkerDecline> {
    const caller = this.actor(actor);
    requireRole(caller, [ActorRole.WORKER], 'decline requests');
    const { reason } = parseInput(DeclineSchema, input, 'decline');
    await this.registry.get(caller.id);

    const decline = await this.requests.recordDecline(caller.id, requestId, reason);
    this.logger.info('Request declined', { requestId, workerId: caller.id });
    return decline;
  }

  async listDeclined(actor: Actor): Promise<DeclinedRequest[]> {
    const caller = this.actor(actor);
    requireRole(caller, [ActorRole.WORKER], 'list declined requests');
    const declines = await this.requests.declinesFor(caller.id);
    const result: DeclinedRequest[] = [];
    for (const decline of declines) {
      const request = await this.requests.find(decline.requestId);
      if (!request) continue;
      result.push({ request: summarizeRequest(request), reason: decline.reason, declinedAt: decline.declinedAt });
    }
    return result;
  }

  // ===========================================================================
  // TRACKING & METRICS
  // ===========================================================================

  /**
   * Where the assigned worker is, and how far from the job.
   */
  async trackWorker(actor: Actor, requestId: string): Promise<WorkerTracking> {
    const caller = this.actor(actor);
    const request = await this.requests.get(requestId);
    const allowed =
      caller.role === ActorRole.ADMIN ||
      (caller.role === ActorRole.CUSTOMER && caller.id === request.customerId) ||
      (caller.role === ActorRole.WORKER && caller.id === request.assignedWorkerId);
    if (!allowed) {
      throw new ForbiddenError(`${caller.role} ${caller.id} may not track request ${requestId}`);
    }

    const workerId = request.assignedWorkerId;
    if (!workerId) {
      throw new InvalidTransitionError(`Request ${requestId} has no assigned worker`, {
        requestId,
        status: request.status
      });
    }

    const worker = await this.registry.get(workerId);
    return {
      requestId,
      workerId,
      location: worker.location,
      lastLocationAt: worker.lastLocationAt,
      distanceKm: worker.location ? haversineDistance(worker.location, request.location) : null
    };
  }

  async getMetrics(actor: Actor): Promise<DispatchMetrics> {
    requireRole(this.actor(actor), [ActorRole.ADMIN], 'view metrics');
    return this.metrics.compute();
  }

  // ===========================================================================
  // NOTIFICATIONS
  // ===========================================================================

  listNotifications(actor: Actor, options: { unreadOnly?: boolean } = {}): {
    notifications: Notification[];
    unreadCount: number;
  } {
    const caller = this.actor(actor);
    return {
      notifications: this.inbox.list(caller.id, options),
      unreadCount: this.inbox.unreadCount(caller.id)
    };
  }

  markNotificationRead(actor: Actor, notificationId: string): Notification {
    return this.inbox.markRead(this.actor(actor).id, notificationId);
  }

  markAllNotificationsRead(actor: Actor): number {
    return this.inbox.markAllRead(this.actor(actor).id);
  }

  // ===========================================================================
  // INTERNALS
  // ===========================================================================

  private actor(actor: Actor): Actor {
    return parseInput(ActorSchema, actor, 'actor');
  }

  private async geocodeAddress(address: string) {
    if (!this.geocoder) {
      throw new ValidationError('Location coordinates are required', { address });
    }
    try {
      return await this.geocoder.geocode(address);
    } catch (err) {
      this.logger.warn('Geocoding failed', {
        address,
        error: err instanceof Error ? err.message : String(err)
      });
      throw new ValidationError('Unable to locate address', { address });
    }
  }
}

/**
 * Build an engine with in-memory storage unless a store is supplied.
 */
export function createDispatchEngine(options: DispatchEngineOptions = {}): DispatchEngine {
  return new DispatchEngine(options);
}
