import type { IncomingMessage } from 'node:http';
import type { GameSnapshot } from '../src/game.ts';
import { renderBoardText } from '../src/render.ts';

/** Largest cell pitch accepted by the board endpoint. */
const MAX_CELL_PIXELS = 8;

/** Request fields the API reads. */
export type HttpRequestLike = Pick<IncomingMessage, 'method' | 'url' | 'headers'>;

/** Response surface the API writes to. */
export interface HttpResponseLike {
  statusCode: number;
  setHeader(name: string, value: string): unknown;
  end(body?: string): unknown;
}

export interface HttpApiDeps {
  getStatus: () => { tick: number; clients: number };
  getSnapshot: () => GameSnapshot | null;
  restart: () => void;
}

export function createHttpHandler(
  deps: HttpApiDeps
): (req: HttpRequestLike, res: HttpResponseLike) => void {
  return (req, res) => {
    handleRequest(req, res, deps);
  };
}

function applyCors(req: HttpRequestLike, res: HttpResponseLike): void {
  const origin = req.headers.origin;
  if (origin) {
    res.setHeader('Access-Control-Allow-Origin', origin);
    res.setHeader('Vary', 'Origin');
  } else {
    res.setHeader('Access-Control-Allow-Origin', '*');
  }
  res.setHeader('Access-Control-Allow-Methods', 'GET,POST,OPTIONS');
  res.setHeader('Access-Control-Allow-Headers', 'Content-Type');
}

function handleRequest(req: HttpRequestLike, res: HttpResponseLike, deps: HttpApiDeps): void {
  applyCors(req, res);
  if (req.method === 'OPTIONS') {
    res.statusCode = 204;
    res.end();
    return;
  }
  let url: URL;
  try {
    url = new URL(req.url ?? '/', 'http://localhost');
  } catch {
    sendJson(res, 400, { ok: false, message: 'bad request' });
    return;
  }
  if (req.method === 'GET' && url.pathname === '/health') {
    const status = deps.getStatus();
    sendJson(res, 200, { ok: true, tick: status.tick, clients: status.clients });
    return;
  }

  if (req.method === 'GET' && url.pathname === '/api/state') {
    const snapshot = deps.getSnapshot();
    if (!snapshot) {
      sendJson(res, 503, { ok: false, message: 'game not ready' });
      return;
    }
    sendJson(res, 200, { ok: true, state: snapshot });
    return;
  }

  if (req.method === 'GET' && url.pathname === '/api/board') {
    const snapshot = deps.getSnapshot();
    if (!snapshot) {
      sendJson(res, 503, { ok: false, message: 'game not ready' });
      return;
    }
    const cellRaw = url.searchParams.get('cell');
    const cellPixels = cellRaw === null ? 1 : Number(cellRaw);
    if (!Number.isInteger(cellPixels) || cellPixels < 1 || cellPixels > MAX_CELL_PIXELS) {
      sendJson(res, 400, { ok: false, message: `cell must be an integer in [1, ${MAX_CELL_PIXELS}]` });
      return;
    }
    res.statusCode = 200;
    res.setHeader('Content-Type', 'text/plain; charset=utf-8');
    res.end(`${renderBoardText(snapshot, { cellPixels })}\n`);
    return;
  }

  if (req.method === 'POST' && url.pathname === '/api/restart') {
    deps.restart();
    const snapshot = deps.getSnapshot();
    sendJson(res, 200, { ok: true, tick: snapshot?.tick ?? 0 });
    return;
  }

  sendJson(res, 404, { ok: false, message: 'not found' });
}

function sendJson(res: HttpResponseLike, status: number, payload: unknown): void {
  res.statusCode = status;
  res.setHeader('Content-Type', 'application/json');
  res.end(JSON.stringify(payload));
}
