import { Router } from 'express';
import { JokeCatalog } from '../../core/joke-catalog';

export interface HealthResponse {
  status: 'healthy';
  timestamp: string;
  uptime: number;
  jokes: number;
}

export function createHealthRoutes(catalog: JokeCatalog): Router {
  const router = Router();

  router.get('/', (req, res) => {
    const health: HealthResponse = {
      status: 'healthy',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      jokes: catalog.count()
    };
    res.json(health);
  });

  return router;
}
