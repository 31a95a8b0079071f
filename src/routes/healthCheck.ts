import { Router, Request, Response } from 'express';
import { getPlanet } from '../world';
import { isEngineRunning } from '../engine';

const router = Router();

router.get('/', (req: Request, res: Response) => {
  res.status(200).json({
    status: 'ok',
    timestamp: new Date().toISOString(),
    uptime: process.uptime(),
    environment: process.env.NODE_ENV || 'development',
    planetInitialized: getPlanet() !== null,
    engineRunning: isEngineRunning(),
  });
});

export default router;
