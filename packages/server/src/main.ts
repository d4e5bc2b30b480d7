/**
 * Node entry point
 */

import { config as loadEnv } from 'dotenv';
import { serve } from '@hono/node-server';
import { createEdgeApp } from './app.js';
import { loadConfig } from './config.js';

loadEnv();

const config = loadConfig();
const app = createEdgeApp({ config });

serve({ fetch: app.fetch, port: config.port }, (info) => {
  console.info(`[edge] Listening on http://localhost:${info.port}`);
});
