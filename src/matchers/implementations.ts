/**
 * Matcher Implementations
 *
 * Hard constraints deciding which pending requests a worker is offered,
 * plus the comparator chain that orders the survivors.
 *
 * - PendingStatusMatcher: request must still be PENDING
 * - DeclinedMatcher: worker has not declined it
 * - CategoryMatcher: specialisation matches when one applies
 * - RadiusMatcher: within the effective search radius
 *
 * The same pattern, turned around, filters workers for a customer search.
 */

import { BaseMatcher, MatcherContext, WorkerSearchContext } from './BaseMatcher';
import {
  RankedCandidate,
  RequestPriority,
  RequestStatus,
  ServiceRequest,
  Worker,
  WorkerMatch
} from '../models/types';

// =============================================================================
// PENDING STATUS MATCHER
// =============================================================================
/**
 * Accepted, running and finished requests are never offered. The store
 * query already asks for PENDING only; this keeps the guarantee local.
 */
export class PendingStatusMatcher extends BaseMatcher {
  readonly name = 'pending_status';
  readonly priority = 0;

  accepts(request: ServiceRequest): boolean {
    return request.status === RequestStatus.PENDING;
  }
}

// =============================================================================
// DECLINED MATCHER
// =============================================================================
/**
 * A worker who declined a request stops seeing it. Other workers are
 * unaffected.
 */
export class DeclinedMatcher extends BaseMatcher {
  readonly name = 'declined';
  readonly priority = 1;

  accepts(request: ServiceRequest, context: MatcherContext): boolean {
    return !context.declinedIds.has(request.id);
  }
}

// =============================================================================
// CATEGORY MATCHER
// =============================================================================
/**
 * When the query has a category (explicit, or the worker's own), only
 * requests filed under that category pass. Without one, everything passes.
 */
export class CategoryMatcher extends BaseMatcher {
  readonly name = 'category';
  readonly priority = 2;

  accepts(request: ServiceRequest, context: MatcherContext): boolean {
    if (context.categoryId === undefined) return true;
    return request.categoryId === context.categoryId;
  }
}

// =============================================================================
// RADIUS MATCHER
// =============================================================================
/**
 * Straight-line distance must not exceed the search radius. The boundary
 * itself is inside.
 */
export class RadiusMatcher extends BaseMatcher {
  readonly name = 'radius';
  readonly priority = 3;

  accepts(request: ServiceRequest, context: MatcherContext): boolean {
    return this.getDistance(request, context) <= context.radiusKm;
  }
}

// =============================================================================
// RANKING
// =============================================================================

export type CandidateComparator = (a: RankedCandidate, b: RankedCandidate) => number;

const PRIORITY_RANK: Record<RequestPriority, number> = {
  [RequestPriority.EMERGENCY]: 0,
  [RequestPriority.STANDARD]: 1
};

/**
 * Ordered tie-break chain: emergency first, then nearest, then oldest,
 * then id so equal candidates always come out in the same order.
 */
export const RANKING: readonly CandidateComparator[] = [
  (a, b) => PRIORITY_RANK[a.request.priority] - PRIORITY_RANK[b.request.priority],
  (a, b) => a.distanceKm - b.distanceKm,
  (a, b) => a.request.createdAt.getTime() - b.request.createdAt.getTime(),
  (a, b) => byId(a.request.id, b.request.id)
];

function byId(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Run a comparator chain; the first non-zero result decides.
 */
export function compareBy<T>(chain: ReadonlyArray<(a: T, b: T) => number>): (a: T, b: T) => number {
  return (a, b) => {
    for (const compare of chain) {
      const result = compare(a, b);
      if (result !== 0) return result;
    }
    return 0;
  };
}

export const compareCandidates = compareBy(RANKING);

// =============================================================================
// WORKER SEARCH MATCHERS
// =============================================================================

/**
 * With `availableOnly`, workers off duty or on a job are left out.
 */
export class WorkerAvailabilityMatcher extends BaseMatcher<Worker, WorkerSearchContext> {
  readonly name = 'worker_availability';
  readonly priority = 0;

  accepts(worker: Worker, context: WorkerSearchContext): boolean {
    return !context.availableOnly || worker.available;
  }
}

export class WorkerCategoryMatcher extends BaseMatcher<Worker, WorkerSearchContext> {
  readonly name = 'worker_category';
  readonly priority = 1;

  accepts(worker: Worker, context: WorkerSearchContext): boolean {
    if (context.categoryId === undefined) return true;
    return worker.categoryId === context.categoryId;
  }
}

export class MinRatingMatcher extends BaseMatcher<Worker, WorkerSearchContext> {
  readonly name = 'min_rating';
  readonly priority = 2;

  accepts(worker: Worker, context: WorkerSearchContext): boolean {
    if (context.minRating === undefined) return true;
    return worker.averageRating >= context.minRating;
  }
}

/**
 * Only applies when the search has an origin. Workers who never shared a
 * location are then left out; the boundary is inside.
 */
export class WorkerRadiusMatcher extends BaseMatcher<Worker, WorkerSearchContext> {
  readonly name = 'worker_radius';
  readonly priority = 3;

  accepts(worker: Worker, context: WorkerSearchContext): boolean {
    if (!context.origin) return true;
    return this.getDistance(worker, context) <= context.radiusKm;
  }
}

// =============================================================================
// WORKER RANKING
// =============================================================================

export type WorkerComparator = (a: WorkerMatch, b: WorkerMatch) => number;

/**
 * Nearest first when the search has a location, then best rated, then
 * most experienced, then id.
 */
export const WORKER_RANKING: readonly WorkerComparator[] = [
  (a, b) => (a.distanceKm ?? 0) - (b.distanceKm ?? 0),
  (a, b) => b.worker.averageRating - a.worker.averageRating,
  (a, b) => b.worker.completedJobs - a.worker.completedJobs,
  (a, b) => byId(a.worker.id, b.worker.id)
];

export const compareWorkerMatches = compareBy(WORKER_RANKING);

// =============================================================================
// FACTORY FUNCTION
// =============================================================================

/**
 * Create all matcher instances, keyed by name.
 */
export const createMatchers = () => ({
  pending_status: new PendingStatusMatcher(),
  declined: new DeclinedMatcher(),
  category: new CategoryMatcher(),
  radius: new RadiusMatcher()
});

export type MatcherMap = ReturnType<typeof createMatchers>;

/**
 * Create the worker search matchers, keyed by name.
 */
export const createWorkerMatchers = () => ({
  worker_availability: new WorkerAvailabilityMatcher(),
  worker_category: new WorkerCategoryMatcher(),
  min_rating: new MinRatingMatcher(),
  worker_radius: new WorkerRadiusMatcher()
});

export type WorkerMatcherMap = ReturnType<typeof createWorkerMatchers>;
