/**
 * RequestStore - service requests and their activity history
 *
 * Creates requests in PENDING, answers reads and listings, and records
 * worker declines. Status, assignment and transition timestamps are
 * written only through `applyTransition`, which the dispatch coordinator
 * owns.
 */

import { v4 as uuidv4 } from 'uuid';
import { DispatchConfig } from '../config/config';
import { InvalidTransitionError, NotFoundError } from '../models/errors';
import {
  ActivityEntry,
  Coordinates,
  RequestPriority,
  RequestStatus,
  ServiceRequest,
  WorkerDecline
} from '../models/types';
import {
  ConditionalUpdate,
  DispatchStore,
  Mutation,
  RequestQuery
} from '../store/DispatchStore';
import { Logger } from '../utils/logger';

export interface RequestStoreDeps {
  store: DispatchStore;
  config: DispatchConfig;
  clock: () => Date;
  logger: Logger;
}

/**
 * Everything needed to open a request once its location is resolved.
 */
export interface NewRequest {
  customerId: string;
  title: string;
  description: string;
  categoryId?: string;
  priority: RequestPriority;
  location: Coordinates;
  address: string;
  postcode: string;
  scheduledStart?: Date;
  customerNotes: string;
  estimatedDurationMinutes?: number;
}

/**
 * Newest first; id breaks ties so listings are stable.
 */
export function newestFirst(a: ServiceRequest, b: ServiceRequest): number {
  const diff = b.createdAt.getTime() - a.createdAt.getTime();
  if (diff !== 0) return diff;
  return a.id < b.id ? 1 : a.id > b.id ? -1 : 0;
}

export function generateReferenceCode(): string {
  return uuidv4().replace(/-/g, '').slice(0, 12).toUpperCase();
}

export class RequestStore {
  private readonly store: DispatchStore;
  private readonly config: DispatchConfig;
  private readonly clock: () => Date;
  private readonly logger: Logger;

  constructor(deps: RequestStoreDeps) {
    this.store = deps.store;
    this.config = deps.config;
    this.clock = deps.clock;
    this.logger = deps.logger.child('RequestStore');
  }

  // ===========================================================================
  // CREATE & READ
  // ===========================================================================

  async create(input: NewRequest): Promise<ServiceRequest> {
    const now = this.clock();
    const request: ServiceRequest = {
      id: uuidv4(),
      referenceCode: generateReferenceCode(),
      customerId: input.customerId,
      title: input.title,
      description: input.description,
      categoryId: input.categoryId,
      priority: input.priority,
      location: input.location,
      address: input.address,
      postcode: input.postcode,
      scheduledStart: input.scheduledStart,
      customerNotes: input.customerNotes,
      estimatedDurationMinutes: input.estimatedDurationMinutes ?? this.config.defaultEstimatedDurationMinutes,
      status: RequestStatus.PENDING,
      createdAt: now,
      updatedAt: now,
      history: [{
        at: now,
        type: 'created',
        actorId: input.customerId,
        toStatus: RequestStatus.PENDING,
        message: `Request created with priority ${input.priority}.`
      }]
    };

    const stored = await this.store.insertRequest(request);
    this.logger.info('Request created', {
      requestId: stored.id,
      referenceCode: stored.referenceCode,
      priority: stored.priority
    });
    return stored;
  }

  async find(id: string): Promise<ServiceRequest | undefined> {
    return this.store.getRequest(id);
  }

  async get(id: string): Promise<ServiceRequest> {
    const request = await this.store.getRequest(id);
    if (!request) {
      throw new NotFoundError('Request', id);
    }
    return request;
  }

  /**
   * Matching requests, newest first.
   */
  async list(query: RequestQuery = {}): Promise<ServiceRequest[]> {
    const requests = await this.store.findRequests(query);
    return requests.sort(newestFirst);
  }

  /**
   * Unordered read for ranking and aggregation. Each call is a fresh
   * snapshot; nothing is cached between queries.
   */
  async snapshot(query: RequestQuery = {}): Promise<ServiceRequest[]> {
    return this.store.findRequests(query);
  }

  // ===========================================================================
  // TRANSITIONS (coordinator only)
  // ===========================================================================

  /**
   * Atomically apply `mutate` if the request is still in one of `expected`.
   */
  async applyTransition(
    id: string,
    expected: readonly RequestStatus[],
    mutate: Mutation<ServiceRequest>
  ): Promise<ConditionalUpdate<ServiceRequest>> {
    return this.store.updateRequestIf(id, expected, mutate);
  }

  // ===========================================================================
  // DECLINES
  // ===========================================================================

  /**
   * Remember that `workerId` does not want `requestId`. Only pending
   * requests can be declined; the status check and both writes are one
   * store step. Declining again replaces the reason.
   */
  async recordDecline(workerId: string, requestId: string, reason: string): Promise<WorkerDecline> {
    const now = this.clock();
    const decline: WorkerDecline = { workerId, requestId, reason, declinedAt: now };
    const entry: ActivityEntry = {
      at: now,
      type: 'declined',
      actorId: workerId,
      message: `Declined by worker ${workerId}. Reason: ${reason || 'Not interested'}`
    };

    const result = await this.store.saveDeclineIf(decline, [RequestStatus.PENDING], entry);
    if (result.ok) {
      return decline;
    }
    if (!result.current) {
      throw new NotFoundError('Request', requestId);
    }
    throw new InvalidTransitionError(
      `Cannot decline request ${requestId} while it is ${result.current.status}`,
      { requestId, status: result.current.status }
    );
  }

  async declinesFor(workerId: string): Promise<WorkerDecline[]> {
    const declines = await this.store.findDeclines(workerId);
    return declines.sort((a, b) => b.declinedAt.getTime() - a.declinedAt.getTime());
  }
}
