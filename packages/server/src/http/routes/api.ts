/**
 * REST API routes: health, templates.
 */

import type { IncomingMessage, ServerResponse } from 'http';
import type { PresentationAssistant } from '../../assistant.js';
import { sendJson } from '../utils.js';

export async function handleApiRoutes(
  req: IncomingMessage,
  res: ServerResponse,
  url: URL,
  assistant: PresentationAssistant,
): Promise<boolean> {
  // Health check
  if (url.pathname === '/health' && req.method === 'GET') {
    sendJson(res, { status: 'ok', sessions: assistant.store.size });
    return true;
  }

  // List available templates
  if (url.pathname === '/api/templates' && req.method === 'GET') {
    const templates = await assistant.listTemplates();
    sendJson(res, { templates });
    return true;
  }

  return false;
}
