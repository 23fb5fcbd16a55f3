import { describe, it, expect, beforeEach } from 'vitest';
import { DEFAULT_CONFIG } from '../src/config/config';
import { NotFoundError } from '../src/models/errors';
import { RequestPriority, RequestStatus } from '../src/models/types';
import { generateReferenceCode, NewRequest, RequestStore } from '../src/services/RequestStore';
import { InMemoryDispatchStore } from '../src/store/InMemoryDispatchStore';
import { createClock, ORIGIN, silentLogger } from './helpers';

// =============================================================================
// TEST DATA FACTORIES
// =============================================================================

const newRequest = (overrides: Partial<NewRequest> = {}): NewRequest => ({
  customerId: 'customer-1',
  title: 'Blocked drain',
  description: 'Bathroom sink will not drain',
  priority: RequestPriority.STANDARD,
  location: ORIGIN,
  address: '1 Test Street',
  postcode: 'E1 1AA',
  customerNotes: '',
  ...overrides
});

describe('RequestStore', () => {
  let clock: ReturnType<typeof createClock>;
  let requests: RequestStore;

  beforeEach(() => {
    clock = createClock();
    requests = new RequestStore({
      store: new InMemoryDispatchStore(),
      config: DEFAULT_CONFIG,
      clock: clock.now,
      logger: silentLogger
    });
  });

  it('generates 12 character upper-case hex reference codes', () => {
    expect(generateReferenceCode()).toMatch(/^[0-9A-F]{12}$/);
  });

  describe('create', () => {
    it('opens requests in pending with a creation entry', async () => {
      const request = await requests.create(newRequest({ priority: RequestPriority.EMERGENCY }));

      expect(request.status).toBe(RequestStatus.PENDING);
      expect(request.assignedWorkerId).toBeUndefined();
      expect(request.estimatedDurationMinutes).toBe(DEFAULT_CONFIG.defaultEstimatedDurationMinutes);
      expect(request.history).toEqual([{
        at: clock.now(),
        type: 'created',
        actorId: 'customer-1',
        toStatus: RequestStatus.PENDING,
        message: 'Request created with priority emergency.'
      }]);
    });

    it('returns copies that do not alias stored state', async () => {
      const request = await requests.create(newRequest());
      request.title = 'changed';

      const stored = await requests.get(request.id);
      expect(stored.title).toBe('Blocked drain');
    });
  });

  describe('reads', () => {
    it('throws NotFoundError for unknown ids', async () => {
      await expect(requests.get('missing')).rejects.toBeInstanceOf(NotFoundError);
      await expect(requests.find('missing')).resolves.toBeUndefined();
    });

    it('lists newest first', async () => {
      const first = await requests.create(newRequest({ title: 'first' }));
      clock.advance(1000);
      const second = await requests.create(newRequest({ title: 'second' }));

      const listed = await requests.list();
      expect(listed.map(r => r.id)).toEqual([second.id, first.id]);
    });

    it('filters by customer', async () => {
      await requests.create(newRequest({ customerId: 'c1' }));
      const mine = await requests.create(newRequest({ customerId: 'c2' }));

      const listed = await requests.list({ customerId: 'c2' });
      expect(listed.map(r => r.id)).toEqual([mine.id]);
    });
  });

  describe('applyTransition', () => {
    it('reports the current state when the expected status no longer holds', async () => {
      const request = await requests.create(newRequest());

      const result = await requests.applyTransition(request.id, [RequestStatus.ACCEPTED], current => ({
        ...current,
        status: RequestStatus.IN_PROGRESS
      }));

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.current?.status).toBe(RequestStatus.PENDING);
      }
    });

    it('has no current state for a missing request', async () => {
      const result = await requests.applyTransition('missing', [RequestStatus.PENDING], current => current);
      expect(result).toEqual({ ok: false });
    });
  });

  describe('declines', () => {
    it('records the decline and appends it to the history', async () => {
      const request = await requests.create(newRequest());
      clock.advance(5000);

      const decline = await requests.recordDecline('w1', request.id, '');
      const stored = await requests.get(request.id);

      expect(decline).toEqual({ workerId: 'w1', requestId: request.id, reason: '', declinedAt: clock.now() });
      expect(stored.history).toHaveLength(2);
      expect(stored.history[1]).toMatchObject({
        type: 'declined',
        actorId: 'w1',
        message: 'Declined by worker w1. Reason: Not interested'
      });
    });

    it('replaces an earlier decline and lists newest first', async () => {
      const a = await requests.create(newRequest());
      const b = await requests.create(newRequest());

      await requests.recordDecline('w1', a.id, 'too far');
      clock.advance(1000);
      await requests.recordDecline('w1', b.id, 'no parts');
      clock.advance(1000);
      await requests.recordDecline('w1', a.id, 'still too far');

      const declines = await requests.declinesFor('w1');
      expect(declines.map(d => [d.requestId, d.reason])).toEqual([
        [a.id, 'still too far'],
        [b.id, 'no parts']
      ]);
    });

    it('refuses a request that is no longer pending and records nothing', async () => {
      const request = await requests.create(newRequest());
      await requests.applyTransition(request.id, [RequestStatus.PENDING], current => ({
        ...current,
        status: RequestStatus.ACCEPTED
      }));

      await expect(requests.recordDecline('w1', request.id, 'too far')).rejects.toThrow(
        `Cannot decline request ${request.id} while it is accepted`
      );

      const stored = await requests.get(request.id);
      expect(stored.history).toHaveLength(1);
      await expect(requests.declinesFor('w1')).resolves.toEqual([]);
    });

    it('fails for an unknown request', async () => {
      await expect(requests.recordDecline('w1', 'missing', 'x')).rejects.toBeInstanceOf(NotFoundError);
    });
  });
});
