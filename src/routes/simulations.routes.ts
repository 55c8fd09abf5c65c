import { Router, type Request, type Response } from 'express';
import { runReplenishment } from '../domains/replenishment';
import { asyncErrorHandler } from '../middleware/validation/errors';
import { simulationSchema } from '../schemas/replenishment.schema';

const router = Router();

router.post(
  '/simulations',
  asyncErrorHandler(async (req: Request, res: Response) => {
    const parsed = simulationSchema.safeParse(req.body);
    if (!parsed.success) return res.status(400).json({ error: parsed.error.flatten() });
    const run = runReplenishment(parsed.data);
    return res.json({ data: run });
  })
);

export default router;
