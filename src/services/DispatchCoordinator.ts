/**
 * DispatchCoordinator - Lifecycle transitions of service requests
 *
 * The coordinator is the only writer of a request's status, assignment
 * and transition timestamps. Each transition runs the same steps:
 *
 * 1. Load the request (NotFound)
 * 2. Check the current status permits the transition
 *    (InvalidTransition, or AlreadyAssigned for a request another worker
 *    currently holds)
 * 3. Check the actor with `canPerform` (Forbidden)
 * 4. Compare-and-set against the status read in step 1. If the status
 *    moved in between, start again from step 1 against the new state.
 * 5. Apply worker side effects under that worker's lock
 * 6. Publish exactly one lifecycle event
 *
 * Acceptance holds the accepting worker's lock for the whole operation,
 * so one worker can never end up holding two requests. Two workers
 * racing for one request hold different locks; the store's atomic claim
 * picks the winner.
 */

import { EventBus, createLifecycleEvent } from '../events/EventBus';
import {
  AlreadyAssignedError,
  DispatchError,
  ForbiddenError,
  InvalidTransitionError,
  NotFoundError
} from '../models/errors';
import {
  ActivityEntry,
  ActivityType,
  Actor,
  ActorRole,
  RequestStatus,
  ServiceRequest,
  Transition,
  TRANSITION_SOURCES,
  TRANSITION_TARGETS,
  isActive
} from '../models/types';
import { Logger } from '../utils/logger';
import { RequestStore } from './RequestStore';
import { WorkerRegistry } from './WorkerRegistry';

export interface DispatchCoordinatorDeps {
  requests: RequestStore;
  registry: WorkerRegistry;
  events: EventBus;
  clock: () => Date;
  logger: Logger;
}

const ACTIVITY_FOR: Record<Transition, ActivityType> = {
  [Transition.ACCEPT]: 'accepted',
  [Transition.START]: 'started',
  [Transition.COMPLETE]: 'completed',
  [Transition.CANCEL]: 'cancelled'
};

// =============================================================================
// AUTHORISATION
// =============================================================================

/**
 * Who may drive each transition.
 *
 * - accept: a worker, acting for themselves
 * - start / complete: the assigned worker
 * - cancel: the request's customer, any admin, or the assigned worker
 */
export function canPerform(
  transition: Transition,
  actor: Actor,
  request: ServiceRequest,
  workerId?: string
): boolean {
  const isAssignee = actor.role === ActorRole.WORKER && actor.id === request.assignedWorkerId;

  switch (transition) {
    case Transition.ACCEPT:
      return actor.role === ActorRole.WORKER && actor.id === workerId;
    case Transition.START:
    case Transition.COMPLETE:
      return isAssignee;
    case Transition.CANCEL:
      return (
        actor.role === ActorRole.ADMIN ||
        (actor.role === ActorRole.CUSTOMER && actor.id === request.customerId) ||
        isAssignee
      );
  }
}

/**
 * Why `request` cannot take `transition` in its current status, if it can't.
 */
export function statusError(transition: Transition, request: ServiceRequest): DispatchError | undefined {
  if (TRANSITION_SOURCES[transition].includes(request.status)) {
    return undefined;
  }
  if (transition === Transition.ACCEPT && isActive(request.status)) {
    return new AlreadyAssignedError(request.id);
  }
  return new InvalidTransitionError(
    `Cannot ${transition} request ${request.id} while it is ${request.status}`,
    { requestId: request.id, status: request.status, transition }
  );
}

function withNotes(message: string, notes?: string): string {
  return notes ? `${message} Notes: ${notes}` : message;
}

export class DispatchCoordinator {
  private readonly requests: RequestStore;
  private readonly registry: WorkerRegistry;
  private readonly events: EventBus;
  private readonly clock: () => Date;
  private readonly logger: Logger;

  constructor(deps: DispatchCoordinatorDeps) {
    this.requests = deps.requests;
    this.registry = deps.registry;
    this.events = deps.events;
    this.clock = deps.clock;
    this.logger = deps.logger.child('DispatchCoordinator');
  }

  // ===========================================================================
  // TRANSITIONS
  // ===========================================================================

  /**
   * Claim a pending request for `workerId`. Of any number of concurrent
   * accepts on one request exactly one succeeds; the rest reject with
   * AlreadyAssigned and leave their worker untouched.
   */
  async accept(requestId: string, workerId: string, actor: Actor, notes?: string): Promise<ServiceRequest> {
    return this.registry.withWorkerLock(workerId, async () => {
      const request = await this.requests.get(requestId);
      this.assertAllowed(Transition.ACCEPT, request, actor, workerId);

      const worker = await this.registry.get(workerId);
      if (!this.registry.isAssignable(worker)) {
        throw this.reject(new InvalidTransitionError(
          worker.currentRequestId
            ? `Worker ${workerId} is already working on request ${worker.currentRequestId}`
            : `Worker ${workerId} is not available`,
          { workerId, currentRequestId: worker.currentRequestId }
        ));
      }

      const { before, after, at } = await this.transition(Transition.ACCEPT, requestId, actor, workerId, (current, now) => ({
        ...current,
        status: RequestStatus.ACCEPTED,
        assignedWorkerId: workerId,
        lastAssignedWorkerId: workerId,
        acceptedAt: now,
        updatedAt: now,
        history: [...current.history, this.activity(Transition.ACCEPT, current, actor, now,
          withNotes(`Accepted by worker ${workerId}.`, notes))]
      }));

      await this.registry.markAssigned(workerId, requestId);
      this.publish(after, before.status, actor, at, workerId);
      return after;
    });
  }

  async start(requestId: string, actor: Actor, notes?: string): Promise<ServiceRequest> {
    const { before, after, at } = await this.transition(Transition.START, requestId, actor, undefined, (current, now) => ({
      ...current,
      status: RequestStatus.IN_PROGRESS,
      startedAt: now,
      updatedAt: now,
      history: [...current.history, this.activity(Transition.START, current, actor, now,
        withNotes('Work started.', notes))]
    }));

    this.publish(after, before.status, actor, at, after.assignedWorkerId);
    return after;
  }

  async complete(requestId: string, actor: Actor, notes?: string): Promise<ServiceRequest> {
    const { before, after, at } = await this.transition(Transition.COMPLETE, requestId, actor, undefined, (current, now) => ({
      ...current,
      status: RequestStatus.COMPLETED,
      assignedWorkerId: undefined,
      completedAt: now,
      updatedAt: now,
      history: [...current.history, this.activity(Transition.COMPLETE, current, actor, now,
        withNotes('Work completed.', notes))]
    }));

    const releasedWorkerId = before.assignedWorkerId;
    if (releasedWorkerId) {
      await this.releaseWorker(releasedWorkerId, requestId, true);
    }
    this.publish(after, before.status, actor, at, releasedWorkerId);
    return after;
  }

  async cancel(requestId: string, actor: Actor, notes?: string): Promise<ServiceRequest> {
    const { before, after, at } = await this.transition(Transition.CANCEL, requestId, actor, undefined, (current, now) => ({
      ...current,
      status: RequestStatus.CANCELLED,
      assignedWorkerId: undefined,
      cancelledAt: now,
      cancelledBy: { id: actor.id, role: actor.role },
      updatedAt: now,
      history: [...current.history, this.activity(Transition.CANCEL, current, actor, now,
        withNotes(`Cancelled by ${actor.role} ${actor.id}.`, notes))]
    }));

    const releasedWorkerId = before.assignedWorkerId;
    if (releasedWorkerId) {
      await this.releaseWorker(releasedWorkerId, requestId, false);
    }
    this.publish(after, before.status, actor, at, releasedWorkerId);
    return after;
  }

  // ===========================================================================
  // INTERNALS
  // ===========================================================================

  /**
   * Validate, then compare-and-set against the status that was validated.
   * Statuses only move forward, so the retry loop is bounded by the
   * length of the lifecycle.
   */
  private async transition(
    transition: Transition,
    requestId: string,
    actor: Actor,
    workerId: string | undefined,
    apply: (current: ServiceRequest, now: Date) => ServiceRequest
  ): Promise<{ before: ServiceRequest; after: ServiceRequest; at: Date }> {
    for (;;) {
      const before = await this.requests.get(requestId);
      this.assertAllowed(transition, before, actor, workerId);

      const now = this.clock();
      const result = await this.requests.applyTransition(requestId, [before.status], current => apply(current, now));
      if (result.ok) {
        this.logger.info(`Request ${ACTIVITY_FOR[transition]}`, {
          requestId,
          referenceCode: result.value.referenceCode,
          from: before.status,
          to: result.value.status,
          actorId: actor.id,
          actorRole: actor.role,
          workerId: workerId ?? before.assignedWorkerId
        });
        return { before, after: result.value, at: now };
      }
      if (!result.current) {
        throw this.reject(new NotFoundError('Request', requestId));
      }
      this.logger.debug('Request changed during transition, re-checking', {
        requestId,
        transition,
        expected: before.status,
        actual: result.current.status
      });
    }
  }

  private assertAllowed(transition: Transition, request: ServiceRequest, actor: Actor, workerId?: string): void {
    const invalid = statusError(transition, request);
    if (invalid) {
      throw this.reject(invalid);
    }
    if (!canPerform(transition, actor, request, workerId)) {
      throw this.reject(new ForbiddenError(
        `${actor.role} ${actor.id} may not ${transition} request ${request.id}`
      ));
    }
  }

  private reject<E extends DispatchError>(error: E): E {
    this.logger.debug('Transition rejected', { code: error.code, message: error.message });
    return error;
  }

  private activity(
    transition: Transition,
    current: ServiceRequest,
    actor: Actor,
    at: Date,
    message: string
  ): ActivityEntry {
    return {
      at,
      type: ACTIVITY_FOR[transition],
      actorId: actor.id,
      fromStatus: current.status,
      toStatus: TRANSITION_TARGETS[transition],
      message
    };
  }

  private async releaseWorker(workerId: string, requestId: string, completed: boolean): Promise<void> {
    await this.registry.withWorkerLock(workerId, async () => {
      const worker = await this.registry.release(workerId, requestId, completed);
      this.logger.debug('Worker released', {
        workerId,
        requestId,
        completed,
        available: worker?.available
      });
    });
  }

  private publish(
    request: ServiceRequest,
    fromStatus: RequestStatus,
    actor: Actor,
    at: Date,
    workerId?: string
  ): void {
    this.events.emit(createLifecycleEvent(request, fromStatus, actor, at, workerId));
  }
}
