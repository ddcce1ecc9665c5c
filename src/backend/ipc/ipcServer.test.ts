import fs from 'node:fs';
import type http from 'node:http';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { IpcRouter } from './ipcRouter';
import { createIpcServer } from './ipcServer';

describe('createIpcServer', () => {
  let server: http.Server;
  let baseUrl: string;
  let rendererDir: string;

  beforeEach(async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);

    rendererDir = fs.mkdtempSync(path.join(os.tmpdir(), 'inout-renderer-'));
    fs.writeFileSync(path.join(rendererDir, 'index.html'), '<div id="root"></div>');
    fs.writeFileSync(path.join(rendererDir, 'app.js'), 'console.log(1);');

    const router = new IpcRouter();
    router.handle('player:play-file', () => ({ success: true }));

    server = createIpcServer({ router, rendererDir });
    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('Server is not listening on a TCP port');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve, reject) =>
      server.close((error) => (error ? reject(error) : resolve())),
    );
    fs.rmSync(rendererDir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it('should dispatch POSTed JSON to the channel handler', async () => {
    const response = await fetch(`${baseUrl}/ipc/player:play-file`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ path: '/videos/a.mp4' }),
    });

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ success: true });
  });

  it('should reject a body that is not JSON', async () => {
    const response = await fetch(`${baseUrl}/ipc/player:play-file`, {
      method: 'POST',
      body: '{not json',
    });

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({
      success: false,
      error: 'Request body is not valid JSON',
    });
  });

  it('should answer a malformed channel escape with 400 and keep serving', async () => {
    const response = await fetch(`${baseUrl}/ipc/%E0%A4%A`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: '{}',
    });

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({
      success: false,
      error: 'Malformed IPC channel in request URL',
    });

    const next = await fetch(`${baseUrl}/ipc/player:play-file`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ path: '/videos/a.mp4' }),
    });
    expect(next.status).toBe(200);
  });

  it('should fall back to the app shell for a malformed file path', async () => {
    const response = await fetch(`${baseUrl}/%E0%A4%A`);

    expect(response.status).toBe(200);
    expect(await response.text()).toBe('<div id="root"></div>');
  });

  it('should only accept POST on IPC routes', async () => {
    const response = await fetch(`${baseUrl}/ipc/player:play-file`);

    expect(response.status).toBe(405);
  });

  it('should serve renderer files with their content type', async () => {
    const response = await fetch(`${baseUrl}/app.js`);

    expect(response.status).toBe(200);
    expect(response.headers.get('content-type')).toBe(
      'text/javascript; charset=utf-8',
    );
    expect(await response.text()).toBe('console.log(1);');
  });

  it('should fall back to index.html for unknown paths', async () => {
    const response = await fetch(`${baseUrl}/some/route`);

    expect(response.status).toBe(200);
    expect(await response.text()).toBe('<div id="root"></div>');
  });
});
