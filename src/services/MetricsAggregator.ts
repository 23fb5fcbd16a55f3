import { DispatchConfig } from '../config/config';
import {
  DispatchMetrics,
  RequestPriority,
  RequestStatus,
  ServiceRequest,
  Worker,
  isOpen,
  summarizeRequest
} from '../models/types';
import { newestFirst, RequestStore } from './RequestStore';
import { WorkerRegistry } from './WorkerRegistry';

export interface MetricsAggregatorDeps {
  requests: RequestStore;
  registry: WorkerRegistry;
  config: DispatchConfig;
  clock: () => Date;
}

/**
 * Dashboard numbers, recomputed from store snapshots on every call.
 * Nothing here is cached or persisted.
 */
export class MetricsAggregator {
  private readonly requests: RequestStore;
  private readonly registry: WorkerRegistry;
  private readonly config: DispatchConfig;
  private readonly clock: () => Date;

  constructor(deps: MetricsAggregatorDeps) {
    this.requests = deps.requests;
    this.registry = deps.registry;
    this.config = deps.config;
    this.clock = deps.clock;
  }

  async compute(): Promise<DispatchMetrics> {
    const [requests, workers] = await Promise.all([
      this.requests.snapshot(),
      this.registry.list()
    ]);

    return {
      ...this.requestCounts(requests),
      averageTimeToAcceptMs: this.averageTimeToAccept(requests),
      ...this.workerCounts(workers),
      topWorkers: this.topWorkers(workers),
      recentRequests: [...requests]
        .sort(newestFirst)
        .slice(0, this.config.recentRequestsLimit)
        .map(summarizeRequest),
      generatedAt: this.clock()
    };
  }

  private requestCounts(requests: ServiceRequest[]) {
    const byStatus: Record<RequestStatus, number> = {
      [RequestStatus.PENDING]: 0,
      [RequestStatus.ACCEPTED]: 0,
      [RequestStatus.IN_PROGRESS]: 0,
      [RequestStatus.COMPLETED]: 0,
      [RequestStatus.CANCELLED]: 0
    };
    const byPriority: Record<RequestPriority, number> = {
      [RequestPriority.STANDARD]: 0,
      [RequestPriority.EMERGENCY]: 0
    };
    let openRequests = 0;
    let openEmergencies = 0;

    for (const request of requests) {
      byStatus[request.status] += 1;
      byPriority[request.priority] += 1;
      if (!isOpen(request.status)) continue;
      openRequests += 1;
      if (request.priority === RequestPriority.EMERGENCY) {
        openEmergencies += 1;
      }
    }

    return {
      totalRequests: requests.length,
      byStatus,
      byPriority,
      openRequests,
      openEmergencies
    };
  }

  /**
   * Mean of acceptedAt - createdAt over every request that was ever
   * accepted, including those since completed or cancelled.
   */
  private averageTimeToAccept(requests: ServiceRequest[]): number | null {
    let total = 0;
    let count = 0;
    for (const request of requests) {
      if (!request.acceptedAt) continue;
      total += Math.max(0, request.acceptedAt.getTime() - request.createdAt.getTime());
      count += 1;
    }
    return count === 0 ? null : total / count;
  }

  private workerCounts(workers: Worker[]) {
    const availableWorkers = workers.filter(w => w.available).length;
    const busyWorkers = workers.filter(w => w.currentRequestId !== undefined).length;
    return {
      registeredWorkers: workers.length,
      availableWorkers,
      busyWorkers,
      activeWorkers: workers.filter(w => w.available || w.currentRequestId !== undefined).length
    };
  }

  private topWorkers(workers: Worker[]): DispatchMetrics['topWorkers'] {
    return workers
      .filter(w => w.completedJobs > 0)
      .sort((a, b) => b.completedJobs - a.completedJobs || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0))
      .slice(0, this.config.topWorkersLimit)
      .map(w => ({ workerId: w.id, completedJobs: w.completedJobs }));
  }
}
