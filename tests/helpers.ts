/**
 * Shared factories for the test suites.
 */

import { Actor, ActorRole, Coordinates, CreateRequestInput, RequestPriority } from '../src/models/types';
import { createDispatchEngine, DispatchEngine, DispatchEngineOptions } from '../src/services/DispatchEngine';
import { Logger } from '../src/utils/logger';

export const silentLogger = new Logger('silent', 'test');

/** Somewhere in central London. */
export const ORIGIN: Coordinates = { lat: 51.5074, lng: -0.1278 };

const KM_PER_DEGREE_LAT = (6371 * Math.PI) / 180;

/**
 * A point `km` due north of `from` (negative for south). Along a meridian
 * the haversine distance equals the offset exactly.
 */
export const north = (from: Coordinates, km: number): Coordinates => ({
  lat: from.lat + km / KM_PER_DEGREE_LAT,
  lng: from.lng
});

/**
 * A manual clock. Time only moves when a test calls `advance`.
 */
export function createClock(start = new Date('2024-03-01T09:00:00.000Z')) {
  let current = start.getTime();
  return {
    now: () => new Date(current),
    advance(ms: number) {
      current += ms;
    }
  };
}

export const customer = (id = 'customer-1'): Actor => ({ id, role: ActorRole.CUSTOMER });
export const worker = (id = 'worker-1'): Actor => ({ id, role: ActorRole.WORKER });
export const admin = (id = 'admin-1'): Actor => ({ id, role: ActorRole.ADMIN });

export const requestInput = (overrides: Partial<CreateRequestInput> = {}): CreateRequestInput => ({
  title: 'Leaking kitchen tap',
  description: 'Water dripping under the sink',
  priority: RequestPriority.STANDARD,
  location: ORIGIN,
  address: '1 Test Street',
  ...overrides
});

export function createTestEngine(options: DispatchEngineOptions = {}): DispatchEngine {
  return createDispatchEngine({ logger: silentLogger, ...options });
}

/**
 * Register a worker and put them on duty at `location`.
 */
export async function onDutyWorker(
  engine: DispatchEngine,
  id: string,
  location: Coordinates,
  profile: { categoryId?: string; serviceRadiusKm?: number } = {}
) {
  await engine.registerWorker(admin(), { workerId: id, ...profile });
  return engine.setAvailability(worker(id), id, { available: true, location });
}
