import express from 'express';
import { requestContextMiddleware } from './middleware/requestContext.middleware';
import { requestLoggerMiddleware } from './middleware/requestLogger.middleware';
import healthRouter from './routes/health.routes';
import simulationsRouter from './routes/simulations.routes';
import { createDemandRouter } from './routes/demand.routes';
import { createProductsRouter } from './routes/products.routes';
import { PlanningBoard } from './services/planningBoard.service';

export type AppOptions = {
  board?: PlanningBoard;
  logRequests?: boolean;
};

export function createApp(options: AppOptions = {}) {
  const board = options.board ?? new PlanningBoard();
  const app = express();

  app.use(requestContextMiddleware);
  if (options.logRequests ?? true) {
    app.use(requestLoggerMiddleware);
  }
  // Demand uploads read the raw body whatever its content type.
  app.use(createDemandRouter(board));
  app.use(express.json());

  app.use(healthRouter);
  app.use(simulationsRouter);
  app.use(createProductsRouter(board));

  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  return app;
}
