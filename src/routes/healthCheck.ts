import { Router, Request, Response } from 'express';
import { getRuntime } from '../runtime';

const router = Router();

export function getHealth(req: Request, res: Response): void {
  const runtime = getRuntime();

  res.status(200).json({
    status: 'ok',
    timestamp: new Date().toISOString(),
    uptime: process.uptime(),
    environment: process.env.NODE_ENV || 'development',
    coordinator: runtime ? runtime.coordinator.getState().kind : 'not-initialized',
  });
}

router.get('/', getHealth);

export default router;
