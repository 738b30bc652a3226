import { Hono } from 'hono';
import { cors } from 'hono/cors';
import allocationsRouter from './routes/allocations.js';
import { loadServerConfig, type ServerConfig } from './config.js';

export function createApp(config: ServerConfig = loadServerConfig()): Hono {
  const app = new Hono();

  // CORS middleware
  app.use('/*', cors({
    origin: config.corsOrigins,
    credentials: true,
  }));

  // Health check
  app.get('/health', (c) => {
    return c.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  // API routes
  app.route('/api/allocations', allocationsRouter);

  // 404 handler
  app.notFound((c) => {
    return c.json({ error: 'Not found' }, 404);
  });

  // Error handler
  app.onError((err, c) => {
    console.error('Error:', err);
    return c.json({ error: 'Internal server error', message: err.message }, 500);
  });

  return app;
}
