/**
 * WorkerRegistry - availability, location and assignment of field workers
 *
 * The registry is the only writer of a worker's `available` flag and
 * location. The dispatch coordinator drives the two assignment side
 * effects (`markAssigned`, `release`) through it, always while holding
 * the worker's lock from `withWorkerLock`.
 *
 * Availability is tracked twice:
 * - `preferredAvailable` is what the worker last asked for
 * - `available` is what dispatch sees; forced to false during a job
 * Ending a job copies `preferredAvailable` back into `available`, so a
 * worker who went off duty mid-job stays off duty afterwards.
 */

import { DispatchConfig } from '../config/config';
import { NotFoundError } from '../models/errors';
import { Coordinates, Worker } from '../models/types';
import { DispatchStore } from '../store/DispatchStore';
import { KeyedLock } from '../utils/keyedLock';
import { Logger } from '../utils/logger';

export interface WorkerRegistryDeps {
  store: DispatchStore;
  locks: KeyedLock;
  config: DispatchConfig;
  clock: () => Date;
  logger: Logger;
}

export interface WorkerProfileInput {
  workerId: string;
  categoryId?: string;
  serviceRadiusKm?: number;
  averageRating?: number;
}

export class WorkerRegistry {
  private readonly store: DispatchStore;
  private readonly locks: KeyedLock;
  private readonly config: DispatchConfig;
  private readonly clock: () => Date;
  private readonly logger: Logger;

  constructor(deps: WorkerRegistryDeps) {
    this.store = deps.store;
    this.locks = deps.locks;
    this.config = deps.config;
    this.clock = deps.clock;
    this.logger = deps.logger.child('WorkerRegistry');
  }

  // ===========================================================================
  // PROFILE
  // ===========================================================================

  /**
   * Create a worker (off duty, no location) or update an existing one's
   * category, radius and rating. Availability and assignment are left alone.
   */
  async register(input: WorkerProfileInput): Promise<Worker> {
    const now = this.clock();
    return this.withWorkerLock(input.workerId, () =>
      this.store.upsertWorker(
        input.workerId,
        () => ({
          id: input.workerId,
          available: false,
          preferredAvailable: false,
          categoryId: input.categoryId,
          serviceRadiusKm: input.serviceRadiusKm ?? this.config.defaultSearchRadiusKm,
          averageRating: input.averageRating ?? 0,
          completedJobs: 0,
          createdAt: now,
          updatedAt: now
        }),
        current => ({
          ...current,
          categoryId: input.categoryId ?? current.categoryId,
          serviceRadiusKm: input.serviceRadiusKm ?? current.serviceRadiusKm,
          averageRating: input.averageRating ?? current.averageRating,
          updatedAt: now
        })
      )
    );
  }

  async get(workerId: string): Promise<Worker> {
    const worker = await this.store.getWorker(workerId);
    if (!worker) {
      throw new NotFoundError('Worker', workerId);
    }
    return worker;
  }

  async list(): Promise<Worker[]> {
    return this.store.listWorkers();
  }

  // ===========================================================================
  // AVAILABILITY
  // ===========================================================================

  /**
   * Record the worker's explicit on/off duty choice and, optionally, a new
   * location. While a job is active the choice is remembered but the
   * effective flag stays false.
   */
  async setAvailability(workerId: string, available: boolean, location?: Coordinates): Promise<Worker> {
    return this.withWorkerLock(workerId, async () => {
      const now = this.clock();
      const updated = await this.store.updateWorker(workerId, current => {
        const effective = current.currentRequestId ? false : available;
        return {
          ...current,
          preferredAvailable: available,
          available: effective,
          lastAvailableAt: effective
            ? (current.available ? current.lastAvailableAt : now)
            : undefined,
          location: location ?? current.location,
          lastLocationAt: location ? now : current.lastLocationAt,
          updatedAt: now
        };
      });
      if (!updated) {
        throw new NotFoundError('Worker', workerId);
      }
      this.logger.debug('Availability updated', {
        workerId,
        requested: available,
        effective: updated.available,
        hasLocation: updated.location !== undefined
      });
      return updated;
    });
  }

  /**
   * True when the worker may take on a new request right now.
   */
  isAssignable(worker: Worker): boolean {
    return worker.available && worker.currentRequestId === undefined;
  }

  // ===========================================================================
  // ASSIGNMENT SIDE EFFECTS (coordinator only, inside withWorkerLock)
  // ===========================================================================

  /**
   * Serialise work on one worker. Unrelated workers never wait on each other.
   */
  withWorkerLock<T>(workerId: string, task: () => Promise<T>): Promise<T> {
    return this.locks.run(`worker:${workerId}`, task);
  }

  /**
   * Bind the worker to a request and take them off the dispatch pool.
   */
  async markAssigned(workerId: string, requestId: string): Promise<Worker> {
    const now = this.clock();
    const updated = await this.store.updateWorker(workerId, current => {
      if (current.currentRequestId && current.currentRequestId !== requestId) {
        throw new Error(`Worker ${workerId} is already assigned to ${current.currentRequestId}`);
      }
      return {
        ...current,
        currentRequestId: requestId,
        available: false,
        updatedAt: now
      };
    });
    if (!updated) {
      throw new NotFoundError('Worker', workerId);
    }
    return updated;
  }

  /**
   * End the worker's assignment to `requestId` and restore their own
   * availability choice. A no-op if they are no longer on that request.
   */
  async release(workerId: string, requestId: string, completed: boolean): Promise<Worker | undefined> {
    const now = this.clock();
    return this.store.updateWorker(workerId, current => {
      if (current.currentRequestId !== requestId) {
        return current;
      }
      return {
        ...current,
        currentRequestId: undefined,
        available: current.preferredAvailable,
        lastAvailableAt: current.preferredAvailable ? now : undefined,
        completedJobs: completed ? current.completedJobs + 1 : current.completedJobs,
        updatedAt: now
      };
    });
  }
}
