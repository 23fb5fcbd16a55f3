/**
 * Persistence boundary for the dispatch engine.
 *
 * The engine never holds its own copy of requests or workers: every
 * component receives a store and goes through it. A backing database must
 * provide the two guarantees below; the in-memory store provides them by
 * applying each update in a single synchronous step.
 *
 * 1. Conditional updates are atomic per entity. `updateRequestIf` checks
 *    the expected status and writes in one step (think
 *    `UPDATE ... WHERE id = ? AND status IN (...)`), so two callers can
 *    never both see `pending` and both win.
 * 2. Reads return snapshots. Mutating a returned object never changes
 *    stored state.
 */

import {
  ActivityEntry,
  RequestPriority,
  RequestStatus,
  ServiceRequest,
  Worker,
  WorkerDecline
} from '../models/types';
import { BoundingBox } from '../utils/geocoding';

/**
 * Filters for `findRequests`. All given fields must match.
 */
export interface RequestQuery {
  statuses?: readonly RequestStatus[];
  priority?: RequestPriority;
  customerId?: string;

  /** Matches the current or the most recent assignee */
  workerId?: string;

  /** Approximate location pre-filter; callers apply exact distance themselves */
  within?: BoundingBox;
}

/**
 * Outcome of a compare-and-set. On a miss, `current` is the state that
 * made the condition fail (absent if the entity does not exist).
 */
export type ConditionalUpdate<T> =
  | { ok: true; value: T }
  | { ok: false; current?: T };

/**
 * Pure, synchronous transformation applied atomically by the store.
 */
export type Mutation<T> = (current: T) => T;

export interface DispatchStore {
  // ----- Service requests -----

  /** Rejects if the id or reference code is already taken. */
  insertRequest(request: ServiceRequest): Promise<ServiceRequest>;

  getRequest(id: string): Promise<ServiceRequest | undefined>;

  findRequests(query?: RequestQuery): Promise<ServiceRequest[]>;

  /**
   * Apply `mutate` only if the request's status is one of `expected`.
   * This is the claim primitive every lifecycle transition goes through.
   */
  updateRequestIf(
    id: string,
    expected: readonly RequestStatus[],
    mutate: Mutation<ServiceRequest>
  ): Promise<ConditionalUpdate<ServiceRequest>>;


  // ----- Workers -----

  getWorker(id: string): Promise<Worker | undefined>;

  listWorkers(): Promise<Worker[]>;

  /**
   * Create the worker with `create()` if absent, otherwise apply `mutate`.
   */
  upsertWorker(id: string, create: () => Worker, mutate: Mutation<Worker>): Promise<Worker>;

  /** Resolves undefined if the worker does not exist. */
  updateWorker(id: string, mutate: Mutation<Worker>): Promise<Worker | undefined>;

  // ----- Declines -----

  /**
   * Save the decline and append `entry` to the request's history, only if
   * the request's status is one of `expected`. Both writes happen or
   * neither does. One decline per (worker, request); saving again
   * replaces it.
   */
  saveDeclineIf(
    decline: WorkerDecline,
    expected: readonly RequestStatus[],
    entry: ActivityEntry
  ): Promise<ConditionalUpdate<ServiceRequest>>;

  findDeclines(workerId: string): Promise<WorkerDecline[]>;
}
