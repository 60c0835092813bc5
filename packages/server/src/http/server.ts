/**
 * HTTP server factory: auth gate, route dispatch.
 */

import { createServer, type Server } from 'http';
import type { PresentationAssistant } from '../assistant.js';
import { checkHttpAuth } from './auth.js';
import { handleApiRoutes, handleSessionRoutes } from './routes/index.js';
import { sendJson } from './utils.js';

export interface HttpServerOptions {
  assistant: PresentationAssistant;
  apiToken: string;
}

export function createHttpServer({ assistant, apiToken }: HttpServerOptions): Server {
  return createServer(async (req, res) => {
    const url = new URL(req.url ?? '/', 'http://localhost');

    // Auth gate (/health always exempt)
    if (!checkHttpAuth(req, res, url, apiToken)) return;

    try {
      // Route dispatch: short-circuit on first match
      if (await handleApiRoutes(req, res, url, assistant)) return;
      if (await handleSessionRoutes(req, res, url, assistant)) return;

      // 404 for unknown routes
      sendJson(res, { error: 'Not found' }, 404);
    } catch (err) {
      console.error(`[HTTP] ${req.method} ${url.pathname} failed:`, err);
      if (!res.headersSent) {
        sendJson(res, { error: 'Internal server error' }, 500);
      } else {
        res.end();
      }
    }
  });
}
