import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { request, type Server } from 'http';
import type { AddressInfo } from 'net';
import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import { createAssistant, type PresentationAssistant } from '../assistant.js';
import { createHttpServer } from '../http/server.js';
import { writePptx } from '../slides/index.js';
import { makeTempDir, pngBytes, removeTempDir, testConfig, TEST_TOKEN } from './helpers.js';

const TEMPLATE_YAML = `
title: Business
slides:
  - layout: title
    title: Hello
  - layout: content
    title: Agenda
    bullets: [One]
`;

interface RawResponse {
  status: number;
  headers: Record<string, string | string[] | undefined>;
  body: string;
}

/**
 * Send a request whose declared length may exceed what is actually written.
 */
function rawPost(port: number, path: string, declaredLength: number, chunk: Buffer): Promise<RawResponse> {
  return new Promise((resolve, reject) => {
    const req = request(
      {
        host: '127.0.0.1',
        port,
        path,
        method: 'POST',
        headers: { Authorization: `Bearer ${TEST_TOKEN}`, 'Content-Length': declaredLength },
      },
      (res) => {
        const chunks: Buffer[] = [];
        res.on('data', (c: Buffer) => chunks.push(c));
        res.on('end', () => {
          resolve({ status: res.statusCode ?? 0, headers: res.headers, body: Buffer.concat(chunks).toString('utf-8') });
          req.destroy();
        });
      },
    );
    req.on('error', reject);
    req.write(chunk);
  });
}

describe('HTTP gateway', () => {
  let root: string;
  let assistant: PresentationAssistant;
  let server: Server;
  let base: string;
  let port: number;

  const auth = { Authorization: `Bearer ${TEST_TOKEN}` };

  async function post(path: string, body?: unknown): Promise<Response> {
    return fetch(`${base}${path}`, {
      method: 'POST',
      headers: { ...auth, 'Content-Type': 'application/json' },
      body: body === undefined ? undefined : JSON.stringify(body),
    });
  }

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    root = await makeTempDir();
    const config = testConfig(root, { DECKHAND_MAX_UPLOAD_BYTES: '1048576' });
    await mkdir(config.templatesDir, { recursive: true });
    await writeFile(join(config.templatesDir, 'business.yaml'), TEMPLATE_YAML);

    assistant = createAssistant(config);
    server = createHttpServer({ assistant, apiToken: config.apiToken });
    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
    const address: AddressInfo | string | null = server.address();
    if (address === null || typeof address === 'string') throw new Error('server not listening on TCP');
    port = address.port;
    base = `http://127.0.0.1:${port}`;
  });

  afterEach(async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve) => server.close(() => resolve()));
    assistant.store.clear();
    vi.restoreAllMocks();
    await removeTempDir(root);
  });

  describe('auth', () => {
    it('leaves /health open', async () => {
      const res = await fetch(`${base}/health`);
      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ status: 'ok', sessions: 0 });
    });

    it('rejects requests without the token', async () => {
      const res = await fetch(`${base}/api/templates`);
      expect(res.status).toBe(401);
      expect(await res.json()).toEqual({ error: 'Unauthorized' });
    });

    it('rejects a wrong token', async () => {
      const res = await fetch(`${base}/api/templates`, { headers: { Authorization: 'Bearer test-wrong-token' } });
      expect(res.status).toBe(401);
    });

    it('accepts the token as a header or a query parameter', async () => {
      const viaHeader = await fetch(`${base}/api/templates`, { headers: auth });
      expect(viaHeader.status).toBe(200);
      expect(await viaHeader.json()).toEqual({
        templates: [{ name: 'business', title: 'Business', description: '', slideCount: 2 }],
      });

      const viaQuery = await fetch(`${base}/api/templates?token=${TEST_TOKEN}`);
      expect(viaQuery.status).toBe(200);
    });
  });

  describe('session routes', () => {
    it('runs a template session through to save', async () => {
      const start = await post('/api/sessions/u1/start');
      expect(start.status).toBe(200);
      expect(await start.json()).toMatchObject({ reply: { state: 'idle' } });

      const template = await post('/api/sessions/u1/template', { name: 'business' });
      expect(template.status).toBe(200);
      expect(await template.json()).toMatchObject({ ok: true, value: { slideCount: 2 } });

      const command = await post('/api/sessions/u1/commands', {
        kind: 'add_content',
        title: 'Q1 Results',
        bullets: ['Revenue up 10%'],
      });
      expect(command.status).toBe(200);
      expect(await command.json()).toMatchObject({ ok: true, value: { slideCount: 3 } });

      const save = await post('/api/sessions/u1/save');
      expect(save.status).toBe(200);
      expect(await save.json()).toMatchObject({ ok: true, value: { slideCount: 3 }, reply: { state: 'saved' } });

      const session = await fetch(`${base}/api/sessions/u1`, { headers: auth });
      expect(await session.json()).toMatchObject({
        session: { userId: 'u1', state: 'saved', slideCount: 3, titles: ['Hello', 'Agenda', 'Q1 Results'] },
      });
    });

    it('maps core failures to status codes', async () => {
      const missing = await post('/api/sessions/u1/template', { name: 'nope' });
      expect(missing.status).toBe(404);
      expect(await missing.json()).toMatchObject({ ok: false, error: { code: 'TemplateNotFound' } });

      const invalid = await post('/api/sessions/u1/save');
      expect(invalid.status).toBe(400);
      expect(await invalid.json()).toMatchObject({ ok: false, error: { code: 'InvalidCommand' } });

      await post('/api/sessions/u1/template', { name: 'business' });
      const empty = await post('/api/sessions/u1/commands', { kind: 'add_title', title: '' });
      expect(empty.status).toBe(400);
      expect(await empty.json()).toMatchObject({ ok: false, error: { code: 'ValidationError' } });
    });

    it('validates request bodies', async () => {
      const unknownKind = await post('/api/sessions/u1/commands', { kind: 'add_chart', title: 'x' });
      expect(unknownKind.status).toBe(400);
      expect(await unknownKind.json()).toMatchObject({ error: expect.stringMatching(/^Invalid request body: /) });

      const badJson = await fetch(`${base}/api/sessions/u1/commands`, {
        method: 'POST',
        headers: auth,
        body: '{not json',
      });
      expect(badJson.status).toBe(400);
      expect(await badJson.json()).toEqual({ error: 'Invalid JSON' });

      const noBody = await post('/api/sessions/u1/callback');
      expect(noBody.status).toBe(400);
      expect(await noBody.json()).toEqual({ error: 'Empty body' });
    });

    it('handles button callbacks', async () => {
      const res = await post('/api/sessions/u1/callback', { data: 'template_business' });
      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({ effect: { kind: 'deck_ready', slideCount: 2 } });

      const bogus = await post('/api/sessions/u1/callback', { data: 'nonsense' });
      expect(bogus.status).toBe(400);
    });

    it('handles slash commands sent as messages', async () => {
      const res = await post('/api/sessions/u1/message', { text: '/start' });
      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({ effect: { kind: 'none' }, reply: { state: 'idle' } });

      const missing = await post('/api/sessions/u1/message', { data: '/start' });
      expect(missing.status).toBe(400);
    });

    it('returns 404 for unknown routes', async () => {
      const res = await fetch(`${base}/api/nowhere`, { headers: auth });
      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({ error: 'Not found' });
    });
  });

  describe('uploads', () => {
    it('accepts a presentation body', async () => {
      const bytes = await writePptx({
        slides: [
          { layout: 'title', title: 'Uploaded', subtitle: '' },
          { layout: 'content', title: 'More', bullets: [] },
        ],
      });

      const res = await fetch(`${base}/api/sessions/u2/upload?filename=deck.pptx`, {
        method: 'POST',
        headers: auth,
        body: bytes,
      });
      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({ ok: true, value: { slideCount: 2 }, reply: { state: 'deck_loaded' } });
    });

    it('stores an image upload for a later image slide', async () => {
      await post('/api/sessions/u2/template', { name: 'business' });
      const png = await pngBytes(48, 24);

      const upload = await fetch(`${base}/api/sessions/u2/upload?filename=chart.png`, {
        method: 'POST',
        headers: auth,
        body: png,
      });
      expect(upload.status).toBe(200);
      expect(await upload.json()).toMatchObject({ ok: true, value: { kind: 'image', name: 'chart.png' } });

      const command = await post('/api/sessions/u2/commands', { kind: 'add_image', title: 'Chart', imagePath: 'chart.png' });
      expect(command.status).toBe(200);
      expect(await command.json()).toMatchObject({ ok: true, value: { slideCount: 3 } });
    });

    it('answers 422 for a corrupt document', async () => {
      const res = await fetch(`${base}/api/sessions/u2/upload?filename=deck.pptx`, {
        method: 'POST',
        headers: auth,
        body: Buffer.from('not a presentation'),
      });
      expect(res.status).toBe(422);
      expect(await res.json()).toMatchObject({ ok: false, error: { code: 'CorruptDocument' }, reply: { state: 'idle' } });
    });

    it('answers 413 from the declared length and closes the connection', async () => {
      const res = await rawPost(port, '/api/sessions/u2/upload?filename=big.pptx', 2 * 1024 * 1024, Buffer.alloc(16));

      expect(res.status).toBe(413);
      expect(res.headers.connection).toBe('close');
      expect(JSON.parse(res.body)).toMatchObject({ ok: false, error: { code: 'TooLarge' } });
    });

    it('requires a file name', async () => {
      const res = await fetch(`${base}/api/sessions/u2/upload`, {
        method: 'POST',
        headers: auth,
        body: Buffer.from('abc'),
      });
      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({ error: { code: 'ValidationError', message: 'File name is missing or invalid.' } });
    });
  });
});
