// ============================================================================
// Alerts API Routes
// ============================================================================

import { Router } from 'express';
import { ALERT_SOURCES, type AlertSource } from '@skyfuse/shared';
import type { AlertPipeline } from './pipeline.js';
import { assessImpact } from './impact.js';

function parseLimit(value: unknown, fallback: number): number | null {
  if (value === undefined) return fallback;
  const n = parseInt(String(value));
  return Number.isInteger(n) && n > 0 ? Math.min(n, 1000) : null;
}

function parseSource(value: unknown): AlertSource | undefined | null {
  if (value === undefined) return undefined;
  return ALERT_SOURCES.find(s => s === value) ?? null;
}

export function createAlertsRouter(pipeline: AlertPipeline): Router {
  const router = Router();

  // Recent alerts (newest first), or everything since a timestamp (oldest first)
  router.get('/alerts', (req, res) => {
    const limit = parseLimit(req.query.limit, 50);
    const source = parseSource(req.query.source);
    if (limit === null) return res.status(400).json({ error: 'limit must be a positive integer' });
    if (source === null) return res.status(400).json({ error: `source must be one of ${ALERT_SOURCES.join(', ')}` });

    if (req.query.since !== undefined) {
      const since = Number(req.query.since);
      if (!Number.isFinite(since)) return res.status(400).json({ error: 'since must be a timestamp in ms' });
      return res.json(pipeline.store.since(since, source).slice(0, limit));
    }
    res.json(pipeline.store.recent(limit, source));
  });

  router.get('/alerts/:id/impact', (req, res) => {
    const alert = pipeline.store.findById(req.params.id);
    if (!alert) return res.status(404).json({ error: 'Alert not found' });
    res.json({ alert, impact: assessImpact(alert) });
  });

  router.get('/feed/gps', (req, res) => {
    const limit = parseLimit(req.query.limit, 100);
    if (limit === null) return res.status(400).json({ error: 'limit must be a positive integer' });
    res.json(pipeline.samples.recent(limit));
  });

  router.get('/feed/weather', (req, res) => {
    const limit = parseLimit(req.query.limit, 100);
    if (limit === null) return res.status(400).json({ error: 'limit must be a positive integer' });
    res.json(pipeline.events.recent(limit));
  });

  router.get('/feed/cyber', (req, res) => {
    const limit = parseLimit(req.query.limit, 100);
    if (limit === null) return res.status(400).json({ error: 'limit must be a positive integer' });
    res.json(pipeline.cyber.recent(limit));
  });

  router.get('/diagnostics', (req, res) => {
    const limit = parseLimit(req.query.limit, 50);
    if (limit === null) return res.status(400).json({ error: 'limit must be a positive integer' });
    res.json(pipeline.diagnostics.recent(limit));
  });

  router.get('/dedup/stats', (_req, res) => {
    res.json(pipeline.dedupStats());
  });

  router.get('/policy', (_req, res) => {
    res.json(pipeline.policy);
  });

  return router;
}
