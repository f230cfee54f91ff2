import { Router, Request, Response } from 'express';
import { type Application } from '../app';
import { type EventLoop } from '../engine';

export function createCircuitRouter(application: Application, loop: EventLoop): Router {
  const router = Router();

  router.get('/', (req: Request, res: Response) => {
    const lastError = application.getLastError();

    res.status(200).json({
      circuit: application.circuit.stats(),
      loop: { running: loop.isRunning(), ...loop.getStats() },
      errors: {
        count: application.getErrorCount(),
        last: lastError === null ? null : { kind: lastError.kind, message: lastError.message },
      },
      facts: application.listFacts().length,
    });
  });

  return router;
}
