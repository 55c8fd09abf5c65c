import { Router, type Request, type Response } from 'express';
import { updateRequestContext } from '../lib/requestContext';
import { asyncErrorHandler } from '../middleware/validation/errors';
import {
  eventCompletionSchema,
  productCreateSchema,
  productSettingsSchema
} from '../schemas/replenishment.schema';
import type { PlanningBoard } from '../services/planningBoard.service';

export function createProductsRouter(board: PlanningBoard) {
  const router = Router();

  router.post(
    '/products',
    asyncErrorHandler(async (req: Request, res: Response) => {
      const parsed = productCreateSchema.safeParse(req.body);
      if (!parsed.success) return res.status(400).json({ error: parsed.error.flatten() });
      updateRequestContext({ sku: parsed.data.sku });
      const product = board.addProduct(parsed.data);
      return res.status(201).json({ data: product });
    })
  );

  router.get('/products', (_req: Request, res: Response) => {
    res.json({ data: board.listProducts() });
  });

  router.get(
    '/products/:sku',
    asyncErrorHandler(async (req: Request, res: Response) => {
      return res.json({ data: board.getProduct(req.params.sku) });
    })
  );

  router.put(
    '/products/:sku',
    asyncErrorHandler(async (req: Request, res: Response) => {
      const parsed = productSettingsSchema.safeParse(req.body);
      if (!parsed.success) return res.status(400).json({ error: parsed.error.flatten() });
      updateRequestContext({ sku: req.params.sku });
      const product = board.updateProduct(req.params.sku, parsed.data);
      return res.json({ data: product });
    })
  );

  router.delete(
    '/products/:sku',
    asyncErrorHandler(async (req: Request, res: Response) => {
      updateRequestContext({ sku: req.params.sku });
      board.removeProduct(req.params.sku);
      return res.status(204).send();
    })
  );

  router.get(
    '/products/:sku/schedule',
    asyncErrorHandler(async (req: Request, res: Response) => {
      return res.json({ data: board.getSchedule(req.params.sku) });
    })
  );

  router.patch(
    '/products/:sku/schedule/events/:eventId',
    asyncErrorHandler(async (req: Request, res: Response) => {
      const parsed = eventCompletionSchema.safeParse(req.body);
      if (!parsed.success) return res.status(400).json({ error: parsed.error.flatten() });
      const event = board.setEventCompleted(req.params.sku, req.params.eventId, parsed.data.completed);
      return res.json({ data: event });
    })
  );

  router.get(
    '/products/:sku/schedule/export',
    asyncErrorHandler(async (req: Request, res: Response) => {
      const { fileName, csv } = board.exportSchedule(req.params.sku);
      res.setHeader('Content-Type', 'text/csv; charset=utf-8');
      res.setHeader('Content-Disposition', `attachment; filename="${fileName}"`);
      return res.send(csv);
    })
  );

  return router;
}
