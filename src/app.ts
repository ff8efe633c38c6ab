import express, { type NextFunction, type Request, type Response } from 'express';
import type { ServerContext } from './context.js';
import { registerApiRoutes } from './routes/api.js';
import { registerFileRoutes } from './routes/files.js';
import { respondError } from './routes/respond.js';

export function createApp(context: ServerContext): express.Express {
  const app = express();

  app.disable('x-powered-by');
  app.set('json spaces', 2);

  registerApiRoutes(app, context);
  registerFileRoutes(app, context);

  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    respondError(res, error, 'http');
  });

  return app;
}
