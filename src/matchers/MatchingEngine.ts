/**
 * MatchingEngine - Which pending requests should a worker see, in what order,
 * and which workers a customer finds when searching
 *
 * KEY DESIGN DECISIONS:
 *
 * 1. Read-only: Ranking never mutates a request or a worker. Every query
 *    works on a fresh store snapshot, so a candidate may already be taken
 *    by the time the worker tries to accept it. Accept settles that race.
 *
 * 2. Cheap pre-filter: The store is asked for PENDING requests inside a
 *    bounding box around the origin; exact haversine distance is computed
 *    only for those.
 *
 * 3. Lazy and restartable: The result is an Iterable. Ordering happens on
 *    the first iteration and each new iteration starts from the top.
 */

import { DispatchConfig, effectiveRadius } from '../config/config';
import {
  Coordinates,
  RankedCandidate,
  RequestStatus,
  ServiceRequest,
  Worker,
  WorkerMatch,
  toWorkerProfile
} from '../models/types';
import { BoundingBox, boundingBoxAround, haversineDistance } from '../utils/geocoding';
import { Logger } from '../utils/logger';
import { DistanceContext, IMatcher, Matchable, MatcherContext, WorkerSearchContext } from './BaseMatcher';
import {
  compareCandidates,
  compareWorkerMatches,
  createMatchers,
  createWorkerMatchers,
  MatcherMap,
  WorkerMatcherMap
} from './implementations';

/**
 * Source of pending requests and of a worker's declines.
 */
export interface CandidateSource {
  snapshot(query: { statuses: readonly RequestStatus[]; within: BoundingBox }): Promise<ServiceRequest[]>;
  declinesFor(workerId: string): Promise<Array<{ requestId: string }>>;
}

export interface NearbyOptions {
  location?: Coordinates;
  radiusKm?: number;
  categoryId?: string;
}

export interface WorkerSearchOptions {
  categoryId?: string;
  minRating?: number;
  location?: Coordinates;
  maxDistanceKm?: number;
  availableOnly?: boolean;
}

/**
 * A ranked list that sorts on first use and can be iterated any number
 * of times.
 */
class RankedList<T> implements Iterable<T> {
  private ranked?: T[];

  constructor(
    private readonly unranked: T[],
    private readonly compare: (a: T, b: T) => number
  ) {}

  *[Symbol.iterator](): Iterator<T> {
    if (!this.ranked) {
      this.ranked = [...this.unranked].sort(this.compare);
    }
    yield* this.ranked;
  }
}

/**
 * Run every matcher in priority order; a candidate must pass them all.
 */
function applyMatchers<T extends Matchable, C extends DistanceContext>(
  matchers: Record<string, IMatcher<T, C>>,
  candidates: T[],
  context: C
): T[] {
  const ordered = Object.values(matchers).sort((a, b) => a.priority - b.priority);
  return ordered.reduce((remaining, matcher) => matcher.filterValid(remaining, context), candidates);
}

export class MatchingEngine {
  private readonly matchers: MatcherMap;
  private readonly workerMatchers: WorkerMatcherMap;
  private readonly source: CandidateSource;
  private readonly config: DispatchConfig;
  private readonly logger: Logger;

  constructor(source: CandidateSource, config: DispatchConfig, logger: Logger) {
    this.matchers = createMatchers();
    this.workerMatchers = createWorkerMatchers();
    this.source = source;
    this.config = config;
    this.logger = logger.child('MatchingEngine');
  }

  // ===========================================================================
  // MAIN ENTRY POINT
  // ===========================================================================

  /**
   * Pending requests the worker may take, best first.
   *
   * Origin falls back to the worker's last known location and radius to
   * their service radius; category falls back to their specialisation.
   * With no origin at all the result is empty.
   */
  async findCandidates(worker: Worker, options: NearbyOptions = {}): Promise<Iterable<RankedCandidate>> {
    const origin = options.location ?? worker.location;
    if (!origin) {
      this.logger.debug('No origin for nearby query', { workerId: worker.id });
      return new RankedList<RankedCandidate>([], compareCandidates);
    }

    const radiusKm = effectiveRadius(this.config, options.radiusKm, worker.serviceRadiusKm);
    const [pending, declines] = await Promise.all([
      this.source.snapshot({
        statuses: [RequestStatus.PENDING],
        within: boundingBoxAround(origin, radiusKm)
      }),
      this.source.declinesFor(worker.id)
    ]);

    const context: MatcherContext = {
      origin,
      radiusKm,
      categoryId: options.categoryId ?? worker.categoryId,
      declinedIds: new Set(declines.map(d => d.requestId)),
      distances: new Map(pending.map(r => [r.id, haversineDistance(origin, r.location)]))
    };

    const survivors = applyMatchers(this.matchers, pending, context);

    this.logger.debug('Nearby query', {
      workerId: worker.id,
      radiusKm,
      categoryId: context.categoryId,
      scanned: pending.length,
      matched: survivors.length
    });

    return new RankedList(
      survivors.map(request => ({
        request,
        distanceKm: context.distances.get(request.id) ?? Infinity
      })),
      compareCandidates
    );
  }

  // ===========================================================================
  // WORKER SEARCH
  // ===========================================================================

  /**
   * Workers matching a customer's search, best first.
   *
   * With a location, only workers who shared one and are within the
   * distance limit are returned, nearest first. Without one, distance is
   * not checked and results are ordered by rating then completed jobs.
   */
  searchWorkers(workers: Worker[], options: WorkerSearchOptions = {}): Iterable<WorkerMatch> {
    const origin = options.location;
    const distances = new Map<string, number>();
    if (origin) {
      for (const worker of workers) {
        if (worker.location) {
          distances.set(worker.id, haversineDistance(origin, worker.location));
        }
      }
    }

    const context: WorkerSearchContext = {
      origin,
      radiusKm: effectiveRadius(this.config, options.maxDistanceKm, this.config.workerSearchRadiusKm),
      categoryId: options.categoryId,
      minRating: options.minRating,
      availableOnly: options.availableOnly ?? false,
      distances
    };

    const survivors = applyMatchers(this.workerMatchers, workers, context);

    this.logger.debug('Worker search', {
      hasOrigin: origin !== undefined,
      radiusKm: context.radiusKm,
      categoryId: context.categoryId,
      minRating: context.minRating,
      scanned: workers.length,
      matched: survivors.length
    });

    return new RankedList(
      survivors.map(worker => ({
        worker: toWorkerProfile(worker),
        distanceKm: distances.get(worker.id) ?? null
      })),
      compareWorkerMatches
    );
  }
}
