/**
 * Lifecycle transitions: accept, start, complete, cancel
 *
 * Driven through the engine facade so role checks, worker side effects
 * and event publication are exercised together.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import {
  AlreadyAssignedError,
  ForbiddenError,
  InvalidTransitionError,
  NotFoundError
} from '../src/models/errors';
import { LifecycleEvent, RequestPriority, RequestStatus, ServiceRequest } from '../src/models/types';
import { DispatchEngine } from '../src/services/DispatchEngine';
import {
  admin,
  createClock,
  createTestEngine,
  customer,
  north,
  onDutyWorker,
  ORIGIN,
  requestInput,
  worker
} from './helpers';

describe('DispatchCoordinator', () => {
  let clock: ReturnType<typeof createClock>;
  let engine: DispatchEngine;
  let events: LifecycleEvent[];
  let request: ServiceRequest;

  beforeEach(async () => {
    clock = createClock();
    engine = createTestEngine({ clock: clock.now });
    events = [];
    engine.events.onAll(event => {
      events.push(event);
    });

    await onDutyWorker(engine, 'w1', north(ORIGIN, 1));
    await onDutyWorker(engine, 'w2', north(ORIGIN, 2));
    request = await engine.createRequest(customer(), requestInput());
    events.length = 0;
  });

  const workerState = (id: string) => engine.getWorker(admin(), id);

  // ---------------------------------------------------------------------------
  // Accept
  // ---------------------------------------------------------------------------

  describe('accept', () => {
    it('assigns the request and takes the worker off the pool', async () => {
      clock.advance(90_000);
      const accepted = await engine.accept(worker('w1'), request.id);

      expect(accepted.status).toBe(RequestStatus.ACCEPTED);
      expect(accepted.assignedWorkerId).toBe('w1');
      expect(accepted.lastAssignedWorkerId).toBe('w1');
      expect(accepted.acceptedAt).toEqual(clock.now());

      const w1 = await workerState('w1');
      expect(w1.available).toBe(false);
      expect(w1.currentRequestId).toBe(request.id);
    });

    it('lets exactly one of several concurrent workers win', async () => {
      await onDutyWorker(engine, 'w3', north(ORIGIN, 3));
      await onDutyWorker(engine, 'w4', north(ORIGIN, 4));
      await onDutyWorker(engine, 'w5', north(ORIGIN, 5));
      const contenders = ['w1', 'w2', 'w3', 'w4', 'w5'];

      const results = await Promise.allSettled(
        contenders.map(id => engine.accept(worker(id), request.id))
      );

      const winners = results.filter(r => r.status === 'fulfilled');
      const losers = results.flatMap(r => (r.status === 'rejected' ? [r.reason] : []));
      expect(winners).toHaveLength(1);
      expect(losers).toHaveLength(4);
      for (const reason of losers) {
        expect(reason).toBeInstanceOf(AlreadyAssignedError);
      }

      const stored = await engine.getRequest(admin(), request.id);
      const states = await Promise.all(contenders.map(workerState));
      const assigned = states.filter(w => w.currentRequestId === request.id);
      expect(assigned.map(w => w.id)).toEqual([stored.assignedWorkerId]);
      expect(states.filter(w => w.available)).toHaveLength(4);
      expect(events.filter(e => e.type === 'request.accepted')).toHaveLength(1);
    });

    it('keeps a worker to one active request under concurrent accepts', async () => {
      const second = await engine.createRequest(customer(), requestInput({ title: 'Second job' }));

      const results = await Promise.allSettled([
        engine.accept(worker('w1'), request.id),
        engine.accept(worker('w1'), second.id)
      ]);

      expect(results[0].status).toBe('fulfilled');
      expect(results[1].status).toBe('rejected');
      if (results[1].status === 'rejected') {
        expect(results[1].reason).toBeInstanceOf(InvalidTransitionError);
      }

      const untouched = await engine.getRequest(admin(), second.id);
      expect(untouched.status).toBe(RequestStatus.PENDING);
    });

    it('rejects a late accept with AlreadyAssigned and leaves the loser available', async () => {
      await engine.accept(worker('w1'), request.id);

      await expect(engine.accept(worker('w2'), request.id)).rejects.toBeInstanceOf(AlreadyAssignedError);

      const w2 = await workerState('w2');
      expect(w2.available).toBe(true);
      expect(w2.currentRequestId).toBeUndefined();
    });

    it('rejects workers who are off duty', async () => {
      await engine.setAvailability(worker('w1'), 'w1', { available: false });

      await expect(engine.accept(worker('w1'), request.id)).rejects.toThrow('Worker w1 is not available');
    });

    it('rejects unregistered workers', async () => {
      await expect(engine.accept(worker('stranger'), request.id)).rejects.toBeInstanceOf(NotFoundError);
    });

    it('only lets workers accept', async () => {
      await expect(engine.accept(customer(), request.id)).rejects.toBeInstanceOf(ForbiddenError);
      await expect(engine.accept(admin(), request.id)).rejects.toBeInstanceOf(ForbiddenError);
    });

    it('reports unknown requests as not found', async () => {
      await expect(engine.accept(worker('w1'), 'missing')).rejects.toBeInstanceOf(NotFoundError);
    });

    it('records notes in the history', async () => {
      const accepted = await engine.accept(worker('w1'), request.id, { notes: 'On my way' });

      expect(accepted.history.at(-1)).toMatchObject({
        type: 'accepted',
        actorId: 'w1',
        fromStatus: RequestStatus.PENDING,
        toStatus: RequestStatus.ACCEPTED,
        message: 'Accepted by worker w1. Notes: On my way'
      });
    });

    it('still accepts a request the worker declined earlier', async () => {
      await engine.decline(worker('w1'), request.id, { reason: 'Busy' });

      const accepted = await engine.accept(worker('w1'), request.id);

      expect(accepted.assignedWorkerId).toBe('w1');
    });
  });

  // ---------------------------------------------------------------------------
  // Start & complete
  // ---------------------------------------------------------------------------

  describe('start and complete', () => {
    beforeEach(async () => {
      await engine.accept(worker('w1'), request.id);
    });

    it('runs the happy path and frees the worker', async () => {
      clock.advance(60_000);
      const started = await engine.start(worker('w1'), request.id);
      expect(started.status).toBe(RequestStatus.IN_PROGRESS);
      expect(started.startedAt).toEqual(clock.now());

      clock.advance(60_000);
      const completed = await engine.complete(worker('w1'), request.id, { notes: 'Replaced washer' });
      expect(completed.status).toBe(RequestStatus.COMPLETED);
      expect(completed.completedAt).toEqual(clock.now());
      expect(completed.assignedWorkerId).toBeUndefined();
      expect(completed.lastAssignedWorkerId).toBe('w1');
      expect(completed.history.map(h => h.type)).toEqual(['created', 'accepted', 'started', 'completed']);
      expect(completed.history.at(-1)?.message).toBe('Work completed. Notes: Replaced washer');

      const w1 = await workerState('w1');
      expect(w1.available).toBe(true);
      expect(w1.currentRequestId).toBeUndefined();
      expect(w1.completedJobs).toBe(1);
    });

    it('only lets the assigned worker start or complete', async () => {
      await expect(engine.start(worker('w2'), request.id)).rejects.toBeInstanceOf(ForbiddenError);
      await expect(engine.start(customer(), request.id)).rejects.toBeInstanceOf(ForbiddenError);
      await expect(engine.start(admin(), request.id)).rejects.toBeInstanceOf(ForbiddenError);

      await engine.start(worker('w1'), request.id);
      await expect(engine.complete(worker('w2'), request.id)).rejects.toBeInstanceOf(ForbiddenError);
    });

    it('does not skip states', async () => {
      await expect(engine.complete(worker('w1'), request.id)).rejects.toBeInstanceOf(InvalidTransitionError);

      const stored = await engine.getRequest(admin(), request.id);
      expect(stored.status).toBe(RequestStatus.ACCEPTED);
    });

    it('does not start twice', async () => {
      await engine.start(worker('w1'), request.id);
      await expect(engine.start(worker('w1'), request.id)).rejects.toBeInstanceOf(InvalidTransitionError);
    });

    it('keeps an off-duty choice made during the job', async () => {
      await engine.setAvailability(worker('w1'), 'w1', { available: false });
      await engine.start(worker('w1'), request.id);
      await engine.complete(worker('w1'), request.id);

      const w1 = await workerState('w1');
      expect(w1.available).toBe(false);
      expect(w1.completedJobs).toBe(1);
    });
  });

  it('rejects completing a pending request', async () => {
    await expect(engine.complete(worker('w1'), request.id)).rejects.toBeInstanceOf(InvalidTransitionError);
  });

  // ---------------------------------------------------------------------------
  // Cancel
  // ---------------------------------------------------------------------------

  describe('cancel', () => {
    it('lets the customer cancel a pending request', async () => {
      const cancelled = await engine.cancel(customer(), request.id, { notes: 'Fixed it myself' });

      expect(cancelled.status).toBe(RequestStatus.CANCELLED);
      expect(cancelled.cancelledBy).toEqual(customer());
      expect(cancelled.history.at(-1)?.message).toBe(
        'Cancelled by customer customer-1. Notes: Fixed it myself'
      );
    });

    it('frees the assigned worker without counting a completed job', async () => {
      await engine.accept(worker('w1'), request.id);
      await engine.start(worker('w1'), request.id);

      await engine.cancel(admin(), request.id);

      const w1 = await workerState('w1');
      expect(w1.available).toBe(true);
      expect(w1.currentRequestId).toBeUndefined();
      expect(w1.completedJobs).toBe(0);
    });

    it('lets the assigned worker cancel', async () => {
      await engine.accept(worker('w1'), request.id);

      const cancelled = await engine.cancel(worker('w1'), request.id);

      expect(cancelled.cancelledBy).toEqual(worker('w1'));
    });

    it('refuses other customers and unassigned workers', async () => {
      await expect(engine.cancel(customer('someone-else'), request.id)).rejects.toBeInstanceOf(ForbiddenError);
      await expect(engine.cancel(worker('w2'), request.id)).rejects.toBeInstanceOf(ForbiddenError);
    });
  });

  // ---------------------------------------------------------------------------
  // Terminal states
  // ---------------------------------------------------------------------------

  describe('terminal states', () => {
    it('never leaves completed', async () => {
      await engine.accept(worker('w1'), request.id);
      await engine.start(worker('w1'), request.id);
      await engine.complete(worker('w1'), request.id);

      await expect(engine.cancel(admin(), request.id)).rejects.toBeInstanceOf(InvalidTransitionError);
      await expect(engine.start(worker('w1'), request.id)).rejects.toBeInstanceOf(InvalidTransitionError);
      await expect(engine.accept(worker('w2'), request.id)).rejects.toBeInstanceOf(InvalidTransitionError);

      const stored = await engine.getRequest(admin(), request.id);
      expect(stored.status).toBe(RequestStatus.COMPLETED);
    });

    it('refuses to accept a request cancelled after it was accepted', async () => {
      await engine.accept(worker('w1'), request.id);
      await engine.cancel(customer(), request.id);

      const attempt = engine.accept(worker('w2'), request.id);

      await expect(attempt).rejects.toBeInstanceOf(InvalidTransitionError);
      await expect(attempt).rejects.toThrow(`Cannot accept request ${request.id} while it is cancelled`);
      const w2 = await workerState('w2');
      expect(w2.available).toBe(true);
      expect(w2.currentRequestId).toBeUndefined();
    });

    it('leaves a finished request untouched by rejected attempts', async () => {
      await engine.accept(worker('w1'), request.id);
      await engine.cancel(customer(), request.id);
      const cancelled = await engine.getRequest(admin(), request.id);

      clock.advance(60_000);
      await expect(engine.complete(worker('w1'), request.id)).rejects.toBeInstanceOf(InvalidTransitionError);
      await expect(engine.cancel(admin(), request.id)).rejects.toBeInstanceOf(InvalidTransitionError);

      await expect(engine.getRequest(admin(), request.id)).resolves.toEqual(cancelled);
    });

    it('never leaves cancelled', async () => {
      await engine.cancel(customer(), request.id);

      await expect(engine.accept(worker('w1'), request.id)).rejects.toBeInstanceOf(InvalidTransitionError);
      await expect(engine.cancel(customer(), request.id)).rejects.toBeInstanceOf(InvalidTransitionError);
    });
  });

  // ---------------------------------------------------------------------------
  // Two workers racing for an emergency
  // ---------------------------------------------------------------------------

  it('gives a contested emergency to one worker and drops it from the other list', async () => {
    const siteX = north(ORIGIN, 3);
    await engine.setAvailability(worker('w1'), 'w1', { available: true, location: north(siteX, 1) });
    await engine.setAvailability(worker('w2'), 'w2', { available: true, location: north(siteX, 0.1) });
    const emergency = await engine.createRequest(customer(), requestInput({
      title: 'Gas smell',
      priority: RequestPriority.EMERGENCY,
      location: siteX
    }));

    const results = await Promise.allSettled([
      engine.accept(worker('w1'), emergency.id),
      engine.accept(worker('w2'), emergency.id)
    ]);

    expect(results.filter(r => r.status === 'fulfilled')).toHaveLength(1);
    const stored = await engine.getRequest(admin(), emergency.id);
    const winner = stored.assignedWorkerId;
    const loser = winner === 'w1' ? 'w2' : 'w1';
    expect(['w1', 'w2']).toContain(winner);

    const remaining = Array.from(await engine.listNearbyPending(worker(loser)), c => c.request.id);
    expect(remaining).not.toContain(emergency.id);
    expect(remaining).toContain(request.id);
  });

  // ---------------------------------------------------------------------------
  // Events
  // ---------------------------------------------------------------------------

  describe('events', () => {
    it('publishes one event per successful transition', async () => {
      await engine.accept(worker('w1'), request.id);
      await engine.start(worker('w1'), request.id);
      await engine.complete(worker('w1'), request.id);

      expect(events.map(e => [e.type, e.fromStatus, e.toStatus, e.workerId])).toEqual([
        ['request.accepted', RequestStatus.PENDING, RequestStatus.ACCEPTED, 'w1'],
        ['request.started', RequestStatus.ACCEPTED, RequestStatus.IN_PROGRESS, 'w1'],
        ['request.completed', RequestStatus.IN_PROGRESS, RequestStatus.COMPLETED, 'w1']
      ]);
      expect(events[2].request.status).toBe(RequestStatus.COMPLETED);
    });

    it('keeps the returned snapshot apart from the published one', async () => {
      engine.events.on('request.accepted', event => {
        event.request.title = 'Rewritten by a subscriber';
        event.request.history.length = 0;
      });

      const accepted = await engine.accept(worker('w1'), request.id);

      expect(events[0].request).not.toBe(accepted);
      expect(accepted.title).toBe(request.title);
      expect(accepted.history.map(h => h.type)).toEqual(['created', 'accepted']);
      await expect(engine.getRequest(admin(), request.id)).resolves.toEqual(accepted);
    });

    it('publishes nothing for a rejected transition', async () => {
      await expect(engine.start(worker('w1'), request.id)).rejects.toBeInstanceOf(InvalidTransitionError);

      expect(events).toEqual([]);
    });

    it('names the released worker on cancellation', async () => {
      await engine.accept(worker('w1'), request.id);
      await engine.cancel(customer(), request.id);

      const cancelled = events.at(-1);
      expect(cancelled?.type).toBe('request.cancelled');
      expect(cancelled?.workerId).toBe('w1');
      expect(cancelled?.actor).toEqual(customer());
    });

    it('succeeds even when a subscriber throws', async () => {
      engine.events.onAll(() => {
        throw new Error('downstream outage');
      });

      const accepted = await engine.accept(worker('w1'), request.id);

      expect(accepted.status).toBe(RequestStatus.ACCEPTED);
    });
  });
});
