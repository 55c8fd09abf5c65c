import express, { Router, type Request, type Response } from 'express';
import { asyncErrorHandler } from '../middleware/validation/errors';
import type { PlanningBoard } from '../services/planningBoard.service';

export function createDemandRouter(board: PlanningBoard) {
  const router = Router();

  router.post(
    '/demand/uploads',
    express.text({ type: '*/*', limit: '12mb' }),
    asyncErrorHandler(async (req: Request, res: Response) => {
      const csvText = typeof req.body === 'string' ? req.body : '';
      if (!csvText.trim()) {
        return res.status(400).json({ error: 'CSV content is required.' });
      }
      const result = board.loadDemand(csvText);
      return res.status(201).json({ data: result });
    })
  );

  router.get('/demand/options', (_req: Request, res: Response) => {
    res.json({ data: board.listDemandOptions() });
  });

  return router;
}
