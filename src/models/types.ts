import { z } from 'zod';

// =============================================================================
// ENUMS & CONSTANTS
// =============================================================================

/**
 * Lifecycle status of a service request.
 *
 * Happy path: PENDING → ACCEPTED → IN_PROGRESS → COMPLETED
 * CANCELLED is reachable from any non-terminal status.
 */
export enum RequestStatus {
  PENDING = 'pending',
  ACCEPTED = 'accepted',
  IN_PROGRESS = 'in_progress',
  COMPLETED = 'completed',
  CANCELLED = 'cancelled'
}

/**
 * Urgency of a service request.
 * EMERGENCY requests are always offered before STANDARD ones.
 */
export enum RequestPriority {
  STANDARD = 'standard',
  EMERGENCY = 'emergency'
}

/**
 * Role of an authenticated actor, as asserted by the identity layer.
 */
export enum ActorRole {
  CUSTOMER = 'customer',
  WORKER = 'worker',
  ADMIN = 'admin'
}

/**
 * State transitions driven by the dispatch coordinator.
 */
export enum Transition {
  ACCEPT = 'accept',
  START = 'start',
  COMPLETE = 'complete',
  CANCEL = 'cancel'
}

export const TERMINAL_STATUSES: ReadonlySet<RequestStatus> = new Set([
  RequestStatus.COMPLETED,
  RequestStatus.CANCELLED
]);

export const ACTIVE_STATUSES: ReadonlySet<RequestStatus> = new Set([
  RequestStatus.ACCEPTED,
  RequestStatus.IN_PROGRESS
]);

/**
 * Status a request must be in for each transition to apply.
 */
export const TRANSITION_SOURCES: Record<Transition, readonly RequestStatus[]> = {
  [Transition.ACCEPT]: [RequestStatus.PENDING],
  [Transition.START]: [RequestStatus.ACCEPTED],
  [Transition.COMPLETE]: [RequestStatus.IN_PROGRESS],
  [Transition.CANCEL]: [RequestStatus.PENDING, RequestStatus.ACCEPTED, RequestStatus.IN_PROGRESS]
};

export const TRANSITION_TARGETS: Record<Transition, RequestStatus> = {
  [Transition.ACCEPT]: RequestStatus.ACCEPTED,
  [Transition.START]: RequestStatus.IN_PROGRESS,
  [Transition.COMPLETE]: RequestStatus.COMPLETED,
  [Transition.CANCEL]: RequestStatus.CANCELLED
};

// =============================================================================
// LOCATION TYPES
// =============================================================================

/**
 * Geographic coordinates (latitude/longitude, decimal degrees).
 */
export interface Coordinates {
  lat: number;
  lng: number;
}

/**
 * A location resolved by a geocoding service.
 */
export interface GeocodedLocation {
  coordinates: Coordinates;
  formattedAddress: string;
  postcode: string;
}

// =============================================================================
// ACTORS & WORKERS
// =============================================================================

/**
 * The authenticated caller of an engine operation.
 * Credentials are verified upstream; the engine only sees id + role.
 */
export interface Actor {
  id: string;
  role: ActorRole;
}

/**
 * A field worker as tracked by the worker registry.
 */
export interface Worker {
  id: string;

  /** Effective availability. Always false while an assignment is active. */
  available: boolean;

  /**
   * The worker's last explicit availability setting.
   * Restored into `available` when an assignment ends.
   */
  preferredAvailable: boolean;

  location?: Coordinates;
  lastLocationAt?: Date;
  lastAvailableAt?: Date;

  /** The request this worker is currently assigned to, if any */
  currentRequestId?: string;

  /** Primary specialisation (e.g. plumbing, electrical) */
  categoryId?: string;

  /** How far this worker is willing to travel */
  serviceRadiusKm: number;

  /** 0 to 5; only admins set it */
  averageRating: number;

  completedJobs: number;

  createdAt: Date;
  updatedAt: Date;
}

// =============================================================================
// SERVICE REQUESTS
// =============================================================================

export type ActivityType = 'created' | 'accepted' | 'started' | 'completed' | 'cancelled' | 'declined';

/**
 * One line of a request's append-only activity history.
 */
export interface ActivityEntry {
  at: Date;
  type: ActivityType;
  actorId?: string;
  fromStatus?: RequestStatus;
  toStatus?: RequestStatus;
  message: string;
}

/**
 * A customer's repair job.
 */
export interface ServiceRequest {
  id: string;

  /** Short human-facing code, 12 upper-case hex characters */
  referenceCode: string;

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
  estimatedDurationMinutes: number;

  status: RequestStatus;

  /** Set while the request is ACCEPTED or IN_PROGRESS */
  assignedWorkerId?: string;

  /** The most recent assignee, kept after completion/cancellation */
  lastAssignedWorkerId?: string;

  cancelledBy?: Actor;

  createdAt: Date;
  acceptedAt?: Date;
  startedAt?: Date;
  completedAt?: Date;
  cancelledAt?: Date;
  updatedAt: Date;

  history: ActivityEntry[];
}

/**
 * A worker saying "not for me" to a pending request.
 * Declined requests no longer appear in that worker's nearby list.
 */
export interface WorkerDecline {
  workerId: string;
  requestId: string;
  reason: string;
  declinedAt: Date;
}

/**
 * A pending request offered to a worker, with its straight-line distance.
 */
export interface RankedCandidate {
  request: ServiceRequest;
  distanceKm: number;
}

/**
 * What a customer sees of a worker in search results.
 */
export interface WorkerProfile {
  id: string;
  categoryId?: string;
  available: boolean;
  serviceRadiusKm: number;
  averageRating: number;
  completedJobs: number;
  location?: Coordinates;
  lastAvailableAt?: Date;
}

/**
 * A worker found by a customer search.
 */
export interface WorkerMatch {
  worker: WorkerProfile;

  /** null when the search had no location */
  distanceKm: number | null;
}

/**
 * A request the worker declined, as shown back to that worker.
 */
export interface DeclinedRequest {
  request: RequestSummary;
  reason: string;
  declinedAt: Date;
}

/**
 * Where the assigned worker is relative to the job.
 */
export interface WorkerTracking {
  requestId: string;
  workerId: string;
  location?: Coordinates;
  lastLocationAt?: Date;

  /** null while the worker has not shared a location */
  distanceKm: number | null;
}

// =============================================================================
// LIFECYCLE EVENTS
// =============================================================================

export type LifecycleEventType =
  | 'request.created'
  | 'request.accepted'
  | 'request.started'
  | 'request.completed'
  | 'request.cancelled';

/**
 * Immutable record of a successful state change.
 * Carries the post-transition snapshot so consumers never re-query the store.
 */
export interface LifecycleEvent {
  id: string;
  type: LifecycleEventType;
  requestId: string;
  referenceCode: string;

  /** null for creation */
  fromStatus: RequestStatus | null;
  toStatus: RequestStatus;

  actor: Actor;

  /** Worker involved: the assignee, or the worker released by completion/cancellation */
  workerId?: string;

  timestamp: Date;
  request: ServiceRequest;
}

// =============================================================================
// METRICS
// =============================================================================

export interface RequestSummary {
  id: string;
  referenceCode: string;
  title: string;
  status: RequestStatus;
  priority: RequestPriority;
  createdAt: Date;
}

export interface DispatchMetrics {
  totalRequests: number;
  byStatus: Record<RequestStatus, number>;
  byPriority: Record<RequestPriority, number>;
  openRequests: number;
  openEmergencies: number;

  /** Mean of acceptedAt - createdAt over every request that was accepted; null if none */
  averageTimeToAcceptMs: number | null;

  registeredWorkers: number;
  availableWorkers: number;
  busyWorkers: number;

  /** Workers that are either available or on an active job */
  activeWorkers: number;

  topWorkers: { workerId: string; completedJobs: number }[];
  recentRequests: RequestSummary[];
  generatedAt: Date;
}

// =============================================================================
// ZOD VALIDATION SCHEMAS
// =============================================================================

export const CoordinatesSchema = z.object({
  lat: z.number().min(-90).max(90),
  lng: z.number().min(-180).max(180)
});

export const ActorSchema = z.object({
  id: z.string().min(1),
  role: z.nativeEnum(ActorRole)
});

export const CreateRequestSchema = z.object({
  title: z.string().trim().min(1).max(140),
  description: z.string().trim().min(1),
  categoryId: z.string().min(1).optional(),
  priority: z.nativeEnum(RequestPriority).default(RequestPriority.STANDARD),
  location: CoordinatesSchema.optional(),
  address: z.string().trim().max(255).default(''),
  postcode: z.string().trim().max(20).default(''),
  scheduledStart: z.coerce.date().optional(),
  customerNotes: z.string().default(''),
  estimatedDurationMinutes: z.number().int().positive().optional()
}).refine(input => input.location !== undefined || input.address.length > 0, {
  message: 'Either location or address is required',
  path: ['location']
});

export type CreateRequestInput = z.input<typeof CreateRequestSchema>;

export const RatingSchema = z.number().min(0).max(5);

export const RegisterWorkerSchema = z.object({
  workerId: z.string().min(1),
  categoryId: z.string().min(1).optional(),
  serviceRadiusKm: z.number().positive().optional(),
  averageRating: RatingSchema.optional()
});

export type RegisterWorkerInput = z.input<typeof RegisterWorkerSchema>;

export const AvailabilitySchema = z.object({
  available: z.boolean(),
  location: CoordinatesSchema.optional()
});

export const NearbyQuerySchema = z.object({
  location: CoordinatesSchema.optional(),
  radiusKm: z.number().positive().optional(),
  categoryId: z.string().min(1).optional()
});

export type NearbyQuery = z.input<typeof NearbyQuerySchema>;

export const WorkerSearchSchema = z.object({
  categoryId: z.string().min(1).optional(),
  minRating: RatingSchema.optional(),
  location: CoordinatesSchema.optional(),
  maxDistanceKm: z.number().positive().optional(),
  availableOnly: z.boolean().default(false)
});

export type WorkerSearch = z.input<typeof WorkerSearchSchema>;

export const RequestFilterSchema = z.object({
  status: z.nativeEnum(RequestStatus).optional(),
  priority: z.nativeEnum(RequestPriority).optional()
});

export type RequestFilter = z.input<typeof RequestFilterSchema>;

export const TransitionOptionsSchema = z.object({
  notes: z.string().trim().max(1000).optional()
});

export type TransitionOptions = z.input<typeof TransitionOptionsSchema>;

export const DeclineSchema = z.object({
  reason: z.string().trim().max(500).default('')
});

export type DeclineInput = z.input<typeof DeclineSchema>;

// =============================================================================
// UTILITY FUNCTIONS
// =============================================================================

/** ACCEPTED or IN_PROGRESS: a worker currently holds the request. */
export function isActive(status: RequestStatus): boolean {
  return ACTIVE_STATUSES.has(status);
}

/** Not yet completed or cancelled. */
export function isOpen(status: RequestStatus): boolean {
  return !TERMINAL_STATUSES.has(status);
}

/**
 * Event type emitted for a status a request has just entered.
 */
export function eventTypeFor(status: RequestStatus): LifecycleEventType {
  switch (status) {
    case RequestStatus.PENDING:
      return 'request.created';
    case RequestStatus.ACCEPTED:
      return 'request.accepted';
    case RequestStatus.IN_PROGRESS:
      return 'request.started';
    case RequestStatus.COMPLETED:
      return 'request.completed';
    case RequestStatus.CANCELLED:
      return 'request.cancelled';
  }
}

export function toWorkerProfile(worker: Worker): WorkerProfile {
  return {
    id: worker.id,
    categoryId: worker.categoryId,
    available: worker.available,
    serviceRadiusKm: worker.serviceRadiusKm,
    averageRating: worker.averageRating,
    completedJobs: worker.completedJobs,
    location: worker.location,
    lastAvailableAt: worker.lastAvailableAt
  };
}

export function summarizeRequest(request: ServiceRequest): RequestSummary {
  return {
    id: request.id,
    referenceCode: request.referenceCode,
    title: request.title,
    status: request.status,
    priority: request.priority,
    createdAt: request.createdAt
  };
}
