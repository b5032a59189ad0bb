/**
 * Scheduling Queue API Routes
 *
 * GET    /api/schedule                  — List scheduled posts (status, platform, limit)
 * POST   /api/schedule                  — Queue content (next free slot, or scheduledFor)
 * GET    /api/schedule/summary          — Row counts per status
 * GET    /api/schedule/connections      — Per-platform token state
 * GET    /api/schedule/next-slot/:platform — Preview the next free slot
 * POST   /api/schedule/cancel-by-source — Cancel the pending row for a content item
 * POST   /api/schedule/reorder          — Swap times between pending posts
 * POST   /api/schedule/move             — Move posts to the top or bottom of the queue
 * POST   /api/schedule/redistribute     — Re-pack one platform, or all of them
 * POST   /api/schedule/bulk-delete      — Delete posts by id
 * DELETE /api/schedule/pending          — Delete every pending post
 * GET    /api/schedule/slots            — List time slots
 * POST   /api/schedule/slots            — Add a time slot
 * PATCH  /api/schedule/slots/:id        — Update a time slot
 * POST   /api/schedule/slots/:id/toggle — Enable or disable a time slot
 * DELETE /api/schedule/slots/:id        — Remove a time slot
 * GET    /api/schedule/limits           — Daily limits per platform
 * PUT    /api/schedule/limits/:platform — Set a daily limit
 * GET    /api/schedule/:id              — One scheduled post
 * PATCH  /api/schedule/:id              — Move a pending post to a new time
 * POST   /api/schedule/:id/cancel       — Cancel a pending post
 * POST   /api/schedule/:id/post-now     — Publish a pending post immediately
 * POST   /api/schedule/:id/retry        — Re-publish a failed post
 * DELETE /api/schedule/:id              — Delete a post
 */

import { Router } from 'express';
import type { Platform } from '../core/types.js';
import type { ConnectionStatus } from '../services/social/credentials.js';
import type { Scheduler } from '../services/scheduler/index.js';
import { route, sendError, sendFailure, sendResult } from './responses.js';
import {
  bulkDeleteSchema,
  cancelBySourceSchema,
  editTimeSchema,
  enqueueSchema,
  limitSchema,
  listQuerySchema,
  moveSchema,
  platformSchema,
  redistributeSchema,
  reorderSchema,
  slotSchema,
  slotUpdateSchema,
} from './validation.js';

export function createScheduleRoutes(scheduler: Scheduler): Router {
  const router = Router();
  const { service } = scheduler;

  // ─── Queue ──────────────────────────────────────────────

  router.get('/', route((req, res) => {
    const filters = listQuerySchema.parse(req.query);
    res.json({ posts: service.list(filters) });
  }));

  router.post('/', route(async (req, res) => {
    const body = enqueueSchema.parse(req.body);
    const result = body.scheduledFor
      ? await service.scheduleAt(body.content, body.platform, body.scheduledFor)
      : await service.enqueue(body.content, body.platform);
    sendResult(res, result, 201);
  }));

  router.get('/summary', route((_req, res) => {
    res.json(service.summary());
  }));

  router.get('/connections', route((_req, res) => {
    const connections: Record<Platform, ConnectionStatus> = {
      linkedin: scheduler.credentials.status('linkedin'),
      threads: scheduler.credentials.status('threads'),
    };
    res.json(connections);
  }));

  router.get('/next-slot/:platform', route((req, res) => {
    const platform = platformSchema.parse(req.params.platform);
    const result = service.nextSlotPreview(platform);
    if (!result.ok) {
      sendFailure(res, result);
      return;
    }
    res.json({ platform, scheduledFor: result.value });
  }));

  router.post('/cancel-by-source', route(async (req, res) => {
    const body = cancelBySourceSchema.parse(req.body);
    const cancelled = await service.cancelBySource(body.content, body.platform);
    if (!cancelled) {
      sendError(res, 404, 'No pending post for that content on this platform', 'not_found');
      return;
    }
    res.json({ cancelled });
  }));

  router.post('/reorder', route(async (req, res) => {
    const { ids } = reorderSchema.parse(req.body);
    const reordered = await service.reorder(ids);
    if (!reordered) {
      sendError(res, 409, 'Posts must be pending, distinct and on the same platform', 'not_pending');
      return;
    }
    res.json({ reordered });
  }));

  router.post('/move', route(async (req, res) => {
    const { ids, position, platform } = moveSchema.parse(req.body);
    const moved = await service.moveToPosition(ids, position, platform);
    if (!moved) {
      const hint = platform ? '' : '; pass platform to move within one queue';
      sendError(res, 409, `Could not move posts (unknown, not pending or times collide)${hint}`, 'not_pending');
      return;
    }
    res.json({ moved });
  }));

  router.post('/redistribute', route(async (req, res) => {
    const { platform } = redistributeSchema.parse(req.body ?? {});
    if (platform) {
      const count = await service.redistribute(platform);
      res.json({ redistributed: { [platform]: count } });
      return;
    }
    res.json({ redistributed: await service.redistributeAll() });
  }));

  router.post('/bulk-delete', route(async (req, res) => {
    const { ids } = bulkDeleteSchema.parse(req.body);
    res.json({ deleted: await service.deleteBulk(ids) });
  }));

  router.delete('/pending', route(async (_req, res) => {
    res.json({ deleted: await service.clearAllPending() });
  }));

  // ─── Time slots ─────────────────────────────────────────

  router.get('/slots', route((_req, res) => {
    res.json({ slots: service.listSlots() });
  }));

  router.post('/slots', route(async (req, res) => {
    const body = slotSchema.parse(req.body);
    sendResult(res, await service.addSlot(body), 201);
  }));

  router.patch('/slots/:id', route(async (req, res) => {
    const fields = slotUpdateSchema.parse(req.body);
    sendResult(res, await service.updateSlot(req.params.id, fields));
  }));

  router.post('/slots/:id/toggle', route(async (req, res) => {
    sendResult(res, await service.toggleSlot(req.params.id));
  }));

  router.delete('/slots/:id', route(async (req, res) => {
    const result = await service.deleteSlot(req.params.id);
    if (!result.ok) {
      sendFailure(res, result);
      return;
    }
    res.json({ deleted: true, redistributed: result.value });
  }));

  // ─── Daily limits ───────────────────────────────────────

  router.get('/limits', route((_req, res) => {
    res.json({ limits: service.getLimits() });
  }));

  router.put('/limits/:platform', route(async (req, res) => {
    const platform = platformSchema.parse(req.params.platform);
    const { maxPerDay } = limitSchema.parse(req.body);
    sendResult(res, await service.setLimit(platform, maxPerDay));
  }));

  // ─── Single post ────────────────────────────────────────

  router.get('/:id', route((req, res) => {
    const post = service.get(req.params.id);
    if (!post) {
      sendError(res, 404, `Scheduled post ${req.params.id} not found`, 'not_found');
      return;
    }
    res.json(post);
  }));

  router.patch('/:id', route(async (req, res) => {
    const { scheduledFor } = editTimeSchema.parse(req.body);
    sendResult(res, await service.editTime(req.params.id, scheduledFor));
  }));

  router.post('/:id/cancel', route(async (req, res) => {
    sendResult(res, await service.cancel(req.params.id));
  }));

  router.post('/:id/post-now', route(async (req, res) => {
    sendResult(res, await service.postNow(req.params.id));
  }));

  router.post('/:id/retry', route(async (req, res) => {
    sendResult(res, await service.retry(req.params.id));
  }));

  router.delete('/:id', route(async (req, res) => {
    const deleted = await service.delete(req.params.id);
    if (!deleted) {
      sendError(res, 404, `Scheduled post ${req.params.id} not found`, 'not_found');
      return;
    }
    res.json({ deleted });
  }));

  return router;
}
