import { Hono } from 'hono';

import { handleError, handleNotFound } from './middleware/errors';
import { cronRoutes, type CronRouteDeps } from './routes/cron';
import { statusRoutes } from './routes/status';

export function createApp(deps: CronRouteDeps) {
  const app = new Hono();

  app.onError(handleError);
  app.notFound(handleNotFound);

  app.get('/', (c) => c.text('ok'));

  app.route('/api/v1/status', statusRoutes(deps));
  app.route('/api/v1/cron', cronRoutes(deps));

  return app;
}
