import { serve } from '@hono/node-server';
import { createApp } from './index.js';
import { loadServerConfig } from './config.js';

const config = loadServerConfig();
const app = createApp(config);

serve({ fetch: app.fetch, port: config.port }, (info) => {
  console.log(`Call-up allocator listening on http://localhost:${info.port}`);
});
