import path from 'node:path';
import { Router, type Response } from 'express';
import { FileNotFoundError, MalformedRecordError, errorMessage } from '../errors';
import type { Loader } from '../services/loader';
import type { ImageStore } from '../services/image-store';
import { computeClassStatistics, rankClassCounts } from '../services/statistics';

export interface SampleRouteDeps {
  loader: Loader;
  imageStore: ImageStore;
}

const DEFAULT_TOP = 20;

function parseIndex(value: string): number | null {
  return /^\d+$/.test(value) ? Number(value) : null;
}

function sendError(res: Response, error: unknown) {
  if (error instanceof FileNotFoundError) {
    return res.status(404).json({ error: 'Not found', message: error.message });
  }
  if (error instanceof MalformedRecordError) {
    return res.status(422).json({ error: 'Malformed sample set', message: error.message });
  }
  console.error('[API] Error:', error);
  return res.status(500).json({ error: 'Internal server error', message: errorMessage(error) });
}

// Read-only access to exported sample sets for viewers and analysis tools
export function sampleRoutes({ loader, imageStore }: SampleRouteDeps): Router {
  const router = Router();

  // GET /api/health
  router.get('/health', (_, res) => res.json({ ok: true }));

  // GET /api/labels
  router.get('/labels', (_, res) => res.json(Object.fromEntries(loader.labelMap)));

  // GET /api/sample-sets
  router.get('/sample-sets', (_, res) => {
    try {
      const sets = loader.listSampleSets().map((s) => ({ set_index: s.setIndex, file: s.file }));
      res.json(sets);
    } catch (error) {
      sendError(res, error);
    }
  });

  // GET /api/sample-sets/:index
  router.get('/sample-sets/:index', (req, res) => {
    const setIndex = parseIndex(req.params.index);
    if (setIndex === null) {
      return res.status(400).json({ error: 'Bad request', message: `Invalid set index: ${req.params.index}` });
    }

    try {
      const samples = loader.loadSampleSet(setIndex);
      res.json({
        set_index: setIndex,
        samples: samples.map((s) => ({ ...s.encode(), is_locally_loaded: imageStore.isLocallyLoaded(s) })),
      });
    } catch (error) {
      sendError(res, error);
    }
  });

  // GET /api/sample-sets/:index/stats?top=N
  router.get('/sample-sets/:index/stats', (req, res) => {
    const setIndex = parseIndex(req.params.index);
    if (setIndex === null) {
      return res.status(400).json({ error: 'Bad request', message: `Invalid set index: ${req.params.index}` });
    }
    const top = typeof req.query.top === 'string' ? parseIndex(req.query.top) ?? DEFAULT_TOP : DEFAULT_TOP;

    try {
      const samples = loader.loadSampleSet(setIndex);
      const stats = computeClassStatistics(samples);
      const getLabel = (id: string) => loader.getLabel(id, false);
      res.json({
        set_index: setIndex,
        sample_count: stats.sampleCount,
        instances: rankClassCounts(stats.instances, top, getLabel),
        appearances: rankClassCounts(stats.appearances, top, getLabel),
      });
    } catch (error) {
      sendError(res, error);
    }
  });

  // GET /api/sample-sets/:index/samples/:key/image
  router.get('/sample-sets/:index/samples/:key/image', (req, res) => {
    const setIndex = parseIndex(req.params.index);
    if (setIndex === null) {
      return res.status(400).json({ error: 'Bad request', message: `Invalid set index: ${req.params.index}` });
    }

    try {
      const sample = loader.loadSampleSet(setIndex).find((s) => s.key === req.params.key);
      if (!sample || !imageStore.isLocallyLoaded(sample)) {
        return res.status(404).json({ error: 'Not found', message: `No local image for ${req.params.key} in set ${setIndex}` });
      }
      res.sendFile(path.resolve(imageStore.getImagePath(sample)));
    } catch (error) {
      sendError(res, error);
    }
  });

  return router;
}
