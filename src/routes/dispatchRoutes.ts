/**
 * API Routes for Dispatch
 *
 * GET  /api/health                       - Health check
 * POST /api/workers                      - Register or update a worker
 * GET  /api/workers/search               - Find workers by category, rating, distance
 * GET  /api/workers/:id                  - Worker profile and availability
 * PUT  /api/workers/:id/availability     - Go on/off duty, share location
 * POST /api/requests                     - Create a service request (customer)
 * GET  /api/requests                     - List requests visible to the caller
 * GET  /api/requests/nearby              - Ranked pending requests (worker)
 * GET  /api/requests/declined            - Requests the worker declined
 * GET  /api/requests/:id                 - One request with its history
 * GET  /api/requests/:id/tracking        - Assigned worker's position
 * POST /api/requests/:id/accept          - Claim a pending request
 * POST /api/requests/:id/start           - Begin work
 * POST /api/requests/:id/complete        - Finish work
 * POST /api/requests/:id/cancel          - Cancel
 * POST /api/requests/:id/decline         - Hide from the caller's nearby list
 * GET  /api/metrics                      - Dashboard numbers (admin)
 * GET  /api/notifications                - Caller's notifications
 * POST /api/notifications/read-all       - Mark all read
 * POST /api/notifications/:id/read       - Mark one read
 *
 * Caller identity arrives in the `x-actor-id` and `x-actor-role` headers,
 * set by the authentication layer in front of this service.
 */

import { NextFunction, Request, Response, Router } from 'express';
import { UnauthenticatedError } from '../models/errors';
import {
  Actor,
  ActorSchema,
  NearbyQuerySchema,
  RequestFilterSchema,
  WorkerSearchSchema
} from '../models/types';
import { DispatchEngine } from '../services/DispatchEngine';
import { parseInput } from '../utils/validation';

// =============================================================================
// AUTHENTICATION
// =============================================================================

const actors = new WeakMap<Request, Actor>();

export function authenticate(req: Request, res: Response, next: NextFunction): void {
  const parsed = ActorSchema.safeParse({
    id: req.header('x-actor-id'),
    role: req.header('x-actor-role')
  });
  if (!parsed.success) {
    next(new UnauthenticatedError());
    return;
  }
  actors.set(req, parsed.data);
  next();
}

function actorOf(req: Request): Actor {
  const actor = actors.get(req);
  if (!actor) {
    throw new UnauthenticatedError();
  }
  return actor;
}

// =============================================================================
// QUERY HELPERS
// =============================================================================

function queryString(req: Request, name: string): string | undefined {
  const value = req.query[name];
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

function queryNumber(req: Request, name: string): number | undefined {
  const value = queryString(req, name);
  return value === undefined ? undefined : Number(value);
}

function queryBoolean(req: Request, name: string): boolean | string | undefined {
  const value = queryString(req, name);
  if (value === 'true') return true;
  if (value === 'false') return false;
  return value;
}

// =============================================================================
// ROUTER
// =============================================================================

export function createDispatchRouter(engine: DispatchEngine): Router {
  const router = Router();

  router.get('/health', (req: Request, res: Response) => {
    res.json({
      status: 'healthy',
      version: '1.0.0',
      subscribers: engine.events.subscriberCount,
      timestamp: new Date().toISOString()
    });
  });

  // ---------------------------------------------------------------------------
  // Workers
  // ---------------------------------------------------------------------------

  router.post('/workers', authenticate, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const worker = await engine.registerWorker(actorOf(req), req.body);
      res.json({ success: true, data: worker });
    } catch (error) {
      next(error);
    }
  });

  router.get('/workers/search', authenticate, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const lat = queryNumber(req, 'lat');
      const lng = queryNumber(req, 'lng');
      const filter = parseInput(WorkerSearchSchema, {
        categoryId: queryString(req, 'categoryId'),
        minRating: queryNumber(req, 'minRating'),
        location: lat !== undefined || lng !== undefined ? { lat, lng } : undefined,
        maxDistanceKm: queryNumber(req, 'maxDistanceKm'),
        availableOnly: queryBoolean(req, 'availableOnly')
      }, 'worker search');
      const matches = await engine.searchWorkers(actorOf(req), filter);
      res.json({ success: true, data: Array.from(matches) });
    } catch (error) {
      next(error);
    }
  });

  router.get('/workers/:id', authenticate, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const worker = await engine.getWorker(actorOf(req), req.params.id);
      res.json({ success: true, data: worker });
    } catch (error) {
      next(error);
    }
  });

  router.put('/workers/:id/availability', authenticate, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const worker = await engine.setAvailability(actorOf(req), req.params.id, req.body);
      res.json({ success: true, data: worker });
    } catch (error) {
      next(error);
    }
  });

  // ---------------------------------------------------------------------------
  // Requests
  // ---------------------------------------------------------------------------

  router.post('/requests', authenticate, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const request = await engine.createRequest(actorOf(req), req.body);
      res.status(201).json({ success: true, data: request });
    } catch (error) {
      next(error);
    }
  });

  router.get('/requests', authenticate, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const filter = parseInput(RequestFilterSchema, {
        status: queryString(req, 'status'),
        priority: queryString(req, 'priority')
      }, 'request filter');
      const requests = await engine.listRequests(actorOf(req), filter);
      res.json({ success: true, data: requests });
    } catch (error) {
      next(error);
    }
  });

  router.get('/requests/nearby', authenticate, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const lat = queryNumber(req, 'lat');
      const lng = queryNumber(req, 'lng');
      const query = parseInput(NearbyQuerySchema, {
        location: lat !== undefined || lng !== undefined ? { lat, lng } : undefined,
        radiusKm: queryNumber(req, 'radiusKm'),
        categoryId: queryString(req, 'categoryId')
      }, 'nearby query');
      const candidates = await engine.listNearbyPending(actorOf(req), query);
      res.json({ success: true, data: Array.from(candidates) });
    } catch (error) {
      next(error);
    }
  });

  router.get('/requests/declined', authenticate, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const declined = await engine.listDeclined(actorOf(req));
      res.json({ success: true, data: declined });
    } catch (error) {
      next(error);
    }
  });

  router.get('/requests/:id', authenticate, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const request = await engine.getRequest(actorOf(req), req.params.id);
      res.json({ success: true, data: request });
    } catch (error) {
      next(error);
    }
  });

  router.get('/requests/:id/tracking', authenticate, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const tracking = await engine.trackWorker(actorOf(req), req.params.id);
      res.json({ success: true, data: tracking });
    } catch (error) {
      next(error);
    }
  });

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  const transitions = {
    accept: engine.accept.bind(engine),
    start: engine.start.bind(engine),
    complete: engine.complete.bind(engine),
    cancel: engine.cancel.bind(engine)
  };

  for (const [name, run] of Object.entries(transitions)) {
    router.post(`/requests/:id/${name}`, authenticate, async (req: Request, res: Response, next: NextFunction) => {
      try {
        const request = await run(actorOf(req), req.params.id, req.body ?? {});
        res.json({ success: true, data: request });
      } catch (error) {
        next(error);
      }
    });
  }

  router.post('/requests/:id/decline', authenticate, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const decline = await engine.decline(actorOf(req), req.params.id, req.body ?? {});
      res.json({ success: true, data: decline });
    } catch (error) {
      next(error);
    }
  });

  // ---------------------------------------------------------------------------
  // Metrics & notifications
  // ---------------------------------------------------------------------------

  router.get('/metrics', authenticate, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const metrics = await engine.getMetrics(actorOf(req));
      res.json({ success: true, data: metrics });
    } catch (error) {
      next(error);
    }
  });

  router.get('/notifications', authenticate, (req: Request, res: Response, next: NextFunction) => {
    try {
      const result = engine.listNotifications(actorOf(req), {
        unreadOnly: queryString(req, 'unread') === 'true'
      });
      res.json({ success: true, data: result });
    } catch (error) {
      next(error);
    }
  });

  router.post('/notifications/read-all', authenticate, (req: Request, res: Response, next: NextFunction) => {
    try {
      const updated = engine.markAllNotificationsRead(actorOf(req));
      res.json({ success: true, data: { updated } });
    } catch (error) {
      next(error);
    }
  });

  router.post('/notifications/:id/read', authenticate, (req: Request, res: Response, next: NextFunction) => {
    try {
      const notification = engine.markNotificationRead(actorOf(req), req.params.id);
      res.json({ success: true, data: notification });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
