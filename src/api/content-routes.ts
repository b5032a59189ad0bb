/**
 * Content API Routes
 *
 * POST /api/content/standalone      — Create a standalone post
 * GET  /api/content/standalone      — List standalone posts with their queue state
 * GET  /api/content/status          — Queue and publish state for content ids (?kind=&ids=a,b)
 */

import { Router } from 'express';
import type { Scheduler } from '../services/scheduler/index.js';
import { route } from './responses.js';
import { contentStatusQuerySchema, standalonePostSchema } from './validation.js';

export function createContentRoutes(scheduler: Scheduler): Router {
  const router = Router();
  const { content, posts } = scheduler;

  router.post('/standalone', route((req, res) => {
    const body = standalonePostSchema.parse(req.body);
    res.status(201).json(content.addStandalonePost(body));
  }));

  router.get('/standalone', route((_req, res) => {
    const items = content.listStandalonePosts();
    const ids = items.map(item => item.id);
    const pending = posts.pendingByContent('standalone', ids);
    const posted = posts.postedByContent('standalone', ids);
    res.json({
      posts: items.map(item => ({
        ...item,
        scheduled: pending[item.id] ?? {},
        published: posted[item.id] ?? {},
      })),
    });
  }));

  router.get('/status', route((req, res) => {
    const { kind, ids } = contentStatusQuerySchema.parse(req.query);
    res.json({
      scheduled: posts.pendingByContent(kind, ids),
      published: posts.postedByContent(kind, ids),
    });
  }));

  return router;
}
