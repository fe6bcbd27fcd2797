import { Router } from 'express';
import type { ModelCatalog } from '../services/inference.js';

export function modelRouter(catalog: ModelCatalog, defaultModel: string): Router {
  const router = Router();

  // Get available chat models
  router.get('/', async (_req, res) => {
    try {
      const models = await catalog.listModels();
      res.json({ models, defaultModel });
    } catch (error) {
      console.error('Error loading models:', error);
      res.status(500).json({ error: 'Failed to load models' });
    }
  });

  return router;
}
