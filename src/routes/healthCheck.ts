import { Router, Request, Response } from 'express';
import { type Application } from '../app';

export function createHealthCheckRouter(application: Application): Router {
  const router = Router();

  router.get('/', (req: Request, res: Response) => {
    const closed = application.circuit.isClosed();

    res.status(closed ? 503 : 200).json({
      status: closed ? 'closed' : 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      environment: process.env.NODE_ENV || 'development',
    });
  });

  return router;
}
