/**
 * Express Server - Minimal routing layer
 * Card logic lives in stores/scratch-card.ts; routes in handlers/card.ts
 */
import 'dotenv/config';
import express from 'express';
import { loadConfig } from './config.js';
import { loggerMiddleware } from './middleware/logger.js';
import { createCardRouter } from './handlers/card.js';
import { createHttpActivationVerifier } from '../services/activation.js';
import { createScratchCardStore } from '../stores/scratch-card.js';

const config = loadConfig();

const store = createScratchCardStore({
  verifier: createHttpActivationVerifier(config.activation),
  scratchDelayMs: config.scratch.delayMs
});

const app = express();
app.use(express.json({ limit: '10kb' }));
app.use(loggerMiddleware);
app.use('/api', createCardRouter(store));

app.get('/health', (_req, res) => {
  res.json({ status: 'ok' });
});

app.use((err: Error, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
  console.error('[Server] Unhandled error:', err);
  res.status(500).json({ error: 'Internal server error' });
});

const server = app.listen(config.server.port, config.server.host, () => {
  console.log(`[Server] Listening on http://${config.server.host}:${config.server.port}`);
  console.log(`[Server] Activation endpoint: ${config.activation.baseUrl}${config.activation.path}`);
});

function shutdown(signal: string) {
  console.log(`[Server] ${signal} received, shutting down`);
  store.dispose();
  server.close(() => {
    console.log('[Server] Closed');
    process.exit(0);
  });
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
