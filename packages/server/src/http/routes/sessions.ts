/**
 * Session routes: one endpoint per assistant operation.
 *
 *   GET  /api/sessions/{userId}
 *   POST /api/sessions/{userId}/start | /edit | /save
 *   POST /api/sessions/{userId}/upload?filename=...   (raw body)
 *   POST /api/sessions/{userId}/template              { name }
 *   POST /api/sessions/{userId}/commands              { kind, ... }
 *   POST /api/sessions/{userId}/callback              { data }
 *   POST /api/sessions/{userId}/message               { text }
 */

import type { IncomingMessage, ServerResponse } from 'http';
import { PassThrough } from 'stream';
import { z } from 'zod';
import type { BoundaryResult, EditCommand } from '@deckhand/shared';
import type { PresentationAssistant } from '../../assistant.js';
import { ValidationError } from '../../errors.js';
import type { Outcome } from '../../sessions/index.js';
import { readJsonBody, sendError, sendJson, statusFor } from '../utils.js';

const SESSION_ROUTE = /^\/api\/sessions\/([^/]+)(?:\/([a-z]+))?$/;

const templateSchema = z.object({ name: z.string().min(1) });

const callbackSchema = z.object({ data: z.string() });

const messageSchema = z.object({ text: z.string() });

const commandSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('add_title'), title: z.string(), subtitle: z.string().optional() }),
  z.object({ kind: z.literal('add_content'), title: z.string(), bullets: z.array(z.string()) }),
  z.object({ kind: z.literal('add_image'), title: z.string(), imagePath: z.string() }),
]);

async function parseBody<T>(req: IncomingMessage, schema: z.ZodType<T>): Promise<T> {
  const result = schema.safeParse(await readJsonBody(req));
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    throw new ValidationError(`Invalid request body: ${detail}`);
  }
  return result.data;
}

function sendResult<T>(res: ServerResponse, result: BoundaryResult<T>): void {
  sendJson(res, result, result.ok ? 200 : statusFor(result.error.code));
}

function sendOutcome(res: ServerResponse, outcome: Outcome): void {
  const status = outcome.effect.kind === 'failed' ? statusFor(outcome.effect.error.code) : 200;
  sendJson(res, outcome, status);
}

function declaredSizeOf(req: IncomingMessage): number {
  const header = req.headers['content-length'];
  return header !== undefined && /^\d+$/.test(header) ? Number(header) : Number.NaN;
}

/**
 * The upload body as a stream the core may destroy without closing the
 * socket the reply still goes out on.
 */
function uploadBody(req: IncomingMessage): PassThrough {
  const body = new PassThrough();
  req.pipe(body);
  req.on('error', (err) => body.destroy(err));
  req.on('close', () => {
    if (!req.complete) body.destroy(new Error('Upload aborted by client'));
  });
  return body;
}

function decodeUserId(raw: string): string | null {
  try {
    const userId = decodeURIComponent(raw);
    return userId.length > 0 && userId.length <= 256 ? userId : null;
  } catch {
    return null;
  }
}

export async function handleSessionRoutes(
  req: IncomingMessage,
  res: ServerResponse,
  url: URL,
  assistant: PresentationAssistant,
): Promise<boolean> {
  const match = url.pathname.match(SESSION_ROUTE);
  if (!match) return false;

  const userId = decodeUserId(match[1]);
  if (userId === null) {
    sendError(res, 'Invalid user id', 400);
    return true;
  }
  const action = match[2];

  if (action === undefined) {
    if (req.method !== 'GET') return false;
    sendJson(res, { session: assistant.getSession(userId) });
    return true;
  }

  if (req.method !== 'POST') return false;

  try {
    switch (action) {
      case 'start':
        sendJson(res, await assistant.onStart(userId));
        return true;

      case 'edit':
        sendJson(res, await assistant.onEditRequest(userId));
        return true;

      case 'save':
        sendResult(res, await assistant.onSave(userId));
        return true;

      case 'upload': {
        const filename = url.searchParams.get('filename') ?? '';
        const result = await assistant.onDocumentUpload(userId, filename, declaredSizeOf(req), uploadBody(req));
        if (!result.ok) {
          // The body may be left unread; the connection cannot be reused.
          res.setHeader('Connection', 'close');
        }
        sendResult(res, result);
        return true;
      }

      case 'template': {
        const { name } = await parseBody(req, templateSchema);
        sendResult(res, await assistant.onTemplateChoice(userId, name));
        return true;
      }

      case 'commands': {
        const command: EditCommand = await parseBody(req, commandSchema);
        sendResult(res, await assistant.onEditCommand(userId, command));
        return true;
      }

      case 'callback': {
        const { data } = await parseBody(req, callbackSchema);
        sendOutcome(res, await assistant.onCallback(userId, data));
        return true;
      }

      case 'message': {
        const { text } = await parseBody(req, messageSchema);
        sendOutcome(res, await assistant.onMessage(userId, text));
        return true;
      }

      default:
        return false;
    }
  } catch (err) {
    if (err instanceof ValidationError) {
      sendError(res, err.message, 400);
      return true;
    }
    throw err;
  }
}
