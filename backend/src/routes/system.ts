import { Router } from 'express';
import { DEFAULT_LANGUAGE, LanguageSchema, getUiTexts } from '@martin-chat/shared';
import type { ModelCatalog } from '../services/inference.js';

export function systemRouter(catalog: ModelCatalog): Router {
  const router = Router();

  // UI labels for a language (public)
  router.get('/texts', (req, res) => {
    const parsed = LanguageSchema.safeParse(req.query.lang ?? DEFAULT_LANGUAGE);
    const language = parsed.success ? parsed.data : DEFAULT_LANGUAGE;
    res.json({ language, texts: getUiTexts(language) });
  });

  // Reachability of the inference API
  router.get('/status', async (_req, res) => {
    try {
      res.json(await catalog.checkConnection());
    } catch (error) {
      console.error('Error checking inference status:', error);
      res.status(500).json({ error: 'Failed to check inference status' });
    }
  });

  return router;
}
