/**
 * BaseMatcher - Foundation for all candidate filters
 *
 * Each matcher evaluates ONE hard constraint on a candidate. Two families
 * share this contract:
 *
 * Requests offered to a worker (MatcherContext):
 * - PendingStatusMatcher: Only requests still waiting for a worker
 * - DeclinedMatcher: Requests this worker already turned down are hidden
 * - CategoryMatcher: Specialisation must match when one applies
 * - RadiusMatcher: Within the worker's search radius
 *
 * Workers found by a customer search (WorkerSearchContext):
 * - WorkerAvailabilityMatcher, WorkerCategoryMatcher,
 *   MinRatingMatcher, WorkerRadiusMatcher
 *
 * A candidate survives only if every matcher accepts it. Ordering is not a
 * matcher concern; see the comparator chains in implementations.ts.
 */

import { Coordinates, ServiceRequest } from '../models/types';

// =============================================================================
// MATCHER CONTEXTS
// =============================================================================

/** Anything a matcher filters: distances are keyed by its id. */
export interface Matchable {
  id: string;
}

export interface DistanceContext {
  /**
   * Straight-line distance from the origin to each candidate, in km.
   * Filled once per query so matchers and ranking share the same numbers.
   */
  distances: Map<string, number>;
}

/**
 * Shared context passed to all request matchers during one nearby-pending query.
 */
export interface MatcherContext extends DistanceContext {
  /** Where the worker is searching from */
  origin: Coordinates;

  /** Effective search radius, already clamped to the configured maximum */
  radiusKm: number;

  /** Required specialisation, if any */
  categoryId?: string;

  /** Requests the querying worker has declined */
  declinedIds: ReadonlySet<string>;
}

/**
 * Shared context passed to all worker matchers during one customer search.
 */
export interface WorkerSearchContext extends DistanceContext {
  /** Without an origin no distance limit applies */
  origin?: Coordinates;
  radiusKm: number;
  categoryId?: string;
  minRating?: number;
  availableOnly: boolean;
}

// =============================================================================
// MATCHER INTERFACE
// =============================================================================

export interface IMatcher<T extends Matchable, C extends DistanceContext> {
  /** Unique name for this matcher (e.g., 'radius', 'category') */
  readonly name: string;

  /** Lower runs first; cheap checks go early */
  readonly priority: number;

  /**
   * False if this matcher rules the candidate out.
   */
  accepts(candidate: T, context: C): boolean;

  /**
   * Keep only candidates this matcher accepts.
   */
  filterValid(candidates: T[], context: C): T[];
}

// =============================================================================
// ABSTRACT BASE CLASS
// =============================================================================

/**
 * Concrete matchers extend this and implement accepts().
 * Defaults to the request family.
 */
export abstract class BaseMatcher<
  T extends Matchable = ServiceRequest,
  C extends DistanceContext = MatcherContext
> implements IMatcher<T, C> {
  abstract readonly name: string;
  abstract readonly priority: number;

  abstract accepts(candidate: T, context: C): boolean;

  filterValid(candidates: T[], context: C): T[] {
    return candidates.filter(c => this.accepts(c, context));
  }

  // ===========================================================================
  // UTILITY METHODS
  // ===========================================================================

  /**
   * Distance from the query origin to a candidate, or Infinity if it was
   * never measured.
   */
  protected getDistance(candidate: T, context: C): number {
    return context.distances.get(candidate.id) ?? Infinity;
  }
}
