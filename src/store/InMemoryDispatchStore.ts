import {
  ActivityEntry,
  RequestStatus,
  ServiceRequest,
  Worker,
  WorkerDecline
} from '../models/types';
import { isInsideBoundingBox } from '../utils/geocoding';
import {
  ConditionalUpdate,
  DispatchStore,
  Mutation,
  RequestQuery
} from './DispatchStore';

/**
 * Process-local store backed by Maps.
 *
 * Every method finishes its read-check-write before yielding, so on a
 * single event loop each update is atomic with respect to every other
 * store call. Values are deep-copied on the way in and out.
 */
export class InMemoryDispatchStore implements DispatchStore {
  private requests = new Map<string, ServiceRequest>();
  private referenceCodes = new Set<string>();
  private workers = new Map<string, Worker>();
  private declines = new Map<string, WorkerDecline>();

  // ===========================================================================
  // SERVICE REQUESTS
  // ===========================================================================

  async insertRequest(request: ServiceRequest): Promise<ServiceRequest> {
    if (this.requests.has(request.id)) {
      throw new Error(`Request ${request.id} already exists`);
    }
    if (this.referenceCodes.has(request.referenceCode)) {
      throw new Error(`Reference code ${request.referenceCode} already in use`);
    }
    this.requests.set(request.id, structuredClone(request));
    this.referenceCodes.add(request.referenceCode);
    return structuredClone(request);
  }

  async getRequest(id: string): Promise<ServiceRequest | undefined> {
    const request = this.requests.get(id);
    return request ? structuredClone(request) : undefined;
  }

  async findRequests(query: RequestQuery = {}): Promise<ServiceRequest[]> {
    const matches: ServiceRequest[] = [];
    for (const request of this.requests.values()) {
      if (query.statuses && !query.statuses.includes(request.status)) continue;
      if (query.priority && request.priority !== query.priority) continue;
      if (query.customerId && request.customerId !== query.customerId) continue;
      if (
        query.workerId &&
        request.assignedWorkerId !== query.workerId &&
        request.lastAssignedWorkerId !== query.workerId
      ) continue;
      if (query.within && !isInsideBoundingBox(request.location, query.within)) continue;
      matches.push(structuredClone(request));
    }
    return matches;
  }

  async updateRequestIf(
    id: string,
    expected: readonly RequestStatus[],
    mutate: Mutation<ServiceRequest>
  ): Promise<ConditionalUpdate<ServiceRequest>> {
    const current = this.requests.get(id);
    if (!current) {
      return { ok: false };
    }
    if (!expected.includes(current.status)) {
      return { ok: false, current: structuredClone(current) };
    }
    const next = mutate(structuredClone(current));
    if (next.id !== id || next.referenceCode !== current.referenceCode) {
      throw new Error(`Request ${id}: identity fields are immutable`);
    }
    this.requests.set(id, structuredClone(next));
    return { ok: true, value: structuredClone(next) };
  }

  // ===========================================================================
  // WORKERS
  // ===========================================================================

  async getWorker(id: string): Promise<Worker | undefined> {
    const worker = this.workers.get(id);
    return worker ? structuredClone(worker) : undefined;
  }

  async listWorkers(): Promise<Worker[]> {
    return Array.from(this.workers.values(), w => structuredClone(w));
  }

  async upsertWorker(id: string, create: () => Worker, mutate: Mutation<Worker>): Promise<Worker> {
    const current = this.workers.get(id);
    const next = current ? mutate(structuredClone(current)) : create();
    if (next.id !== id) {
      throw new Error(`Worker ${id}: id is immutable`);
    }
    this.workers.set(id, structuredClone(next));
    return structuredClone(next);
  }

  async updateWorker(id: string, mutate: Mutation<Worker>): Promise<Worker | undefined> {
    const current = this.workers.get(id);
    if (!current) return undefined;
    const next = mutate(structuredClone(current));
    if (next.id !== id) {
      throw new Error(`Worker ${id}: id is immutable`);
    }
    this.workers.set(id, structuredClone(next));
    return structuredClone(next);
  }

  // ===========================================================================
  // DECLINES
  // ===========================================================================

  async saveDeclineIf(
    decline: WorkerDecline,
    expected: readonly RequestStatus[],
    entry: ActivityEntry
  ): Promise<ConditionalUpdate<ServiceRequest>> {
    const current = this.requests.get(decline.requestId);
    if (!current) {
      return { ok: false };
    }
    if (!expected.includes(current.status)) {
      return { ok: false, current: structuredClone(current) };
    }
    current.history.push(structuredClone(entry));
    this.declines.set(`${decline.workerId}:${decline.requestId}`, structuredClone(decline));
    return { ok: true, value: structuredClone(current) };
  }

  async findDeclines(workerId: string): Promise<WorkerDecline[]> {
    const result: WorkerDecline[] = [];
    for (const decline of this.declines.values()) {
      if (decline.workerId === workerId) result.push(structuredClone(decline));
    }
    return result;
  }
}
