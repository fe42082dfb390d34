import type { Express } from 'express';

import type { CollectionStorage } from '../store/types.js';

interface HealthRouteDeps {
  storage: CollectionStorage;
}

export const registerHealthRoutes = (app: Express, deps: HealthRouteDeps) => {
  app.get('/health', (_req, res) => res.status(200).send({ ok: true, storage: deps.storage.kind }));
};
