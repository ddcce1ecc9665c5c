/**
 * Local HTTP server for the renderer.
 * - POST /ipc/<channel>: JSON payload in, JSON result out
 * - GET anything else: the built renderer, falling back to index.html
 */
import fs from 'node:fs';
import http from 'node:http';
import path from 'node:path';
import { IPC_ROUTE_PREFIX } from '../../shared/ipc/channels';
import type { IpcRouter } from './ipcRouter';

const MAX_BODY_BYTES = 1024 * 1024;

const MIME_TYPES: Record<string, string> = {
  '.html': 'text/html; charset=utf-8',
  '.js': 'text/javascript; charset=utf-8',
  '.css': 'text/css; charset=utf-8',
  '.json': 'application/json; charset=utf-8',
  '.svg': 'image/svg+xml',
  '.png': 'image/png',
  '.ico': 'image/x-icon',
};

export interface IpcServerOptions {
  router: IpcRouter;
  rendererDir: string;
}

const sendJson = (
  res: http.ServerResponse,
  status: number,
  body: unknown,
): void => {
  const payload = JSON.stringify(body);
  res.writeHead(status, {
    'Content-Type': 'application/json; charset=utf-8',
    'Content-Length': Buffer.byteLength(payload),
  });
  res.end(payload);
};

const readJsonBody = (req: http.IncomingMessage): Promise<unknown> =>
  new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;

    req.on('data', (chunk: Buffer) => {
      size += chunk.length;
      if (size > MAX_BODY_BYTES) {
        reject(new Error('Request body too large'));
        req.destroy();
        return;
      }
      chunks.push(chunk);
    });

    req.on('end', () => {
      const text = Buffer.concat(chunks).toString('utf8').trim();
      if (!text) {
        resolve(undefined);
        return;
      }
      try {
        resolve(JSON.parse(text));
      } catch {
        reject(new Error('Request body is not valid JSON'));
      }
    });

    req.on('error', reject);
  });

async function handleIpcRequest(
  router: IpcRouter,
  channel: string,
  req: http.IncomingMessage,
  res: http.ServerResponse,
): Promise<void> {
  if (req.method !== 'POST') {
    res.setHeader('Allow', 'POST');
    sendJson(res, 405, { success: false, error: 'Use POST for IPC calls' });
    return;
  }

  let payload: unknown;
  try {
    payload = await readJsonBody(req);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    sendJson(res, 400, { success: false, error: message });
    return;
  }

  const { status, body } = await router.dispatch(channel, payload);
  sendJson(res, status, body);
}

/** `decodeURIComponent` that answers null for malformed escapes */
const decodePathSegment = (value: string): string | null => {
  try {
    return decodeURIComponent(value);
  } catch (error) {
    if (error instanceof URIError) return null;
    throw error;
  }
};

function serveRenderer(
  rendererDir: string,
  urlPath: string,
  res: http.ServerResponse,
): void {
  const root = path.resolve(rendererDir);
  const decoded = decodePathSegment(urlPath) ?? '/';
  const requested = path.resolve(root, `.${decoded}`);

  // Anything outside the bundle, or not a file, gets the app shell
  const isInside = requested === root || requested.startsWith(root + path.sep);
  const isFile =
    isInside && fs.existsSync(requested) && fs.statSync(requested).isFile();
  const filePath = isFile ? requested : path.join(root, 'index.html');

  if (!fs.existsSync(filePath)) {
    res.writeHead(404, { 'Content-Type': 'text/plain; charset=utf-8' });
    res.end('Renderer not built. Run the build script first.');
    return;
  }

  const mimeType =
    MIME_TYPES[path.extname(filePath).toLowerCase()] ??
    'application/octet-stream';
  res.writeHead(200, { 'Content-Type': mimeType });
  fs.createReadStream(filePath).pipe(res);
}

export function createIpcServer({
  router,
  rendererDir,
}: IpcServerOptions): http.Server {
  return http.createServer((req, res) => {
    const url = new URL(req.url ?? '/', 'http://localhost');

    if (url.pathname.startsWith(IPC_ROUTE_PREFIX)) {
      const channel = decodePathSegment(
        url.pathname.slice(IPC_ROUTE_PREFIX.length),
      );
      if (channel === null) {
        sendJson(res, 400, {
          success: false,
          error: 'Malformed IPC channel in request URL',
        });
        return;
      }
      handleIpcRequest(router, channel, req, res).catch((error) => {
        console.error('❌ IPC request failed:', error);
        if (!res.headersSent) {
          sendJson(res, 500, { success: false, error: 'Internal server error' });
        } else {
          res.end();
        }
      });
      return;
    }

    try {
      serveRenderer(rendererDir, url.pathname, res);
    } catch (error) {
      console.error('Error serving file:', error);
      res.writeHead(500);
      res.end('Internal server error');
    }
  });
}
