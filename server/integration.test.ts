import { connect } from 'node:net';
import { describe, it, expect } from 'vitest';
import WebSocket, { type RawData } from 'ws';
import { readFrame, type FrameData } from '../src/protocol/frame.ts';
import { DEFAULT_CONFIG } from './config.ts';
import { startServer, type RunningServer } from './index.ts';
import { createLogger } from './logger.ts';

type Received = { kind: 'json'; value: Record<string, unknown> } | { kind: 'frame'; value: FrameData };

/**
 * Starts the server and returns null when permissions prevent binding.
 * @returns Server handle or null when the port is unavailable.
 */
async function startServerWithGuard(lines: string[] = []): Promise<RunningServer | null> {
  try {
    return await startServer(
      { ...DEFAULT_CONFIG, port: 0, logLevel: 'warn' },
      { logger: createLogger('warn', (_level, line) => lines.push(line)), manualTicks: true }
    );
  } catch (err) {
    if (err instanceof Error && 'code' in err && (err.code === 'EPERM' || err.code === 'EACCES')) {
      return null;
    }
    throw err;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toBuffer(data: RawData): Buffer {
  if (Array.isArray(data)) return Buffer.concat(data);
  if (Buffer.isBuffer(data)) return data;
  return Buffer.from(data);
}

/** WebSocket client that queues every decoded message. */
class TestClient {
  readonly socket: WebSocket;
  private queue: Received[] = [];
  private waiters: Array<() => void> = [];
  closeCode: number | null = null;

  constructor(url: string) {
    this.socket = new WebSocket(url);
    this.socket.on('message', (data, isBinary) => {
      const bytes = toBuffer(data);
      if (isBinary) {
        const frame = readFrame(new Uint8Array(bytes.buffer, bytes.byteOffset, bytes.byteLength));
        if (frame) this.queue.push({ kind: 'frame', value: frame });
      } else {
        const parsed: unknown = JSON.parse(bytes.toString('utf8'));
        if (isRecord(parsed)) this.queue.push({ kind: 'json', value: parsed });
      }
      this.wake();
    });
    this.socket.on('close', (code) => {
      this.closeCode = code;
      this.wake();
    });
  }

  opened(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.socket.once('open', () => resolve());
      this.socket.once('error', reject);
    });
  }

  send(payload: unknown): void {
    this.socket.send(JSON.stringify(payload));
  }

  sendRaw(data: string | Buffer): void {
    this.socket.send(data);
  }

  /** Wait for the next queued message, failing after a timeout. */
  async next(timeoutMs = 2000): Promise<Received> {
    const deadline = Date.now() + timeoutMs;
    for (;;) {
      const item = this.queue.shift();
      if (item) return item;
      const remaining = deadline - Date.now();
      if (remaining <= 0) throw new Error('timed out waiting for a message');
      await new Promise<void>((resolve) => {
        const timer = setTimeout(resolve, remaining);
        this.waiters.push(() => {
          clearTimeout(timer);
          resolve();
        });
      });
    }
  }

  async nextJson(): Promise<Record<string, unknown>> {
    const item = await this.next();
    if (item.kind !== 'json') throw new Error('expected a JSON message');
    return item.value;
  }

  async nextFrame(): Promise<FrameData> {
    const item = await this.next();
    if (item.kind !== 'frame') throw new Error('expected a binary frame');
    return item.value;
  }

  async closed(timeoutMs = 2000): Promise<number | null> {
    const deadline = Date.now() + timeoutMs;
    while (this.closeCode === null && Date.now() < deadline) {
      await new Promise<void>((resolve) => {
        const timer = setTimeout(resolve, deadline - Date.now());
        this.waiters.push(() => {
          clearTimeout(timer);
          resolve();
        });
      });
    }
    return this.closeCode;
  }

  close(): void {
    this.socket.close();
  }

  private wake(): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) waiter();
  }
}

describe('server integration', () => {
  it('handshakes and streams frames to displays', async () => {
    const server = await startServerWithGuard();
    if (!server) return;
    const display = new TestClient(server.wsUrl);
    try {
      await display.opened();
      display.send({ type: 'hello', clientType: 'display', version: 1 });

      const welcome = await display.nextJson();
      expect(welcome['type']).toBe('welcome');
      expect(welcome['gridSize']).toBe(16);
      expect(welcome['tickPeriodMs']).toBe(150);
      expect(welcome['frameVersion']).toBe(1);

      const status = await display.nextJson();
      expect(status['type']).toBe('status');
      expect(status['length']).toBe(4);

      server.gameServer.step();
      const frame = await display.nextFrame();
      expect(frame.tick).toBe(1);
      expect(frame.direction).toBe('right');
      expect(frame.body[0]).toEqual({ x: 9, y: 8 });
    } finally {
      display.close();
      await server.close();
    }
  });

  it('lets the controller steer the snake', async () => {
    const server = await startServerWithGuard();
    if (!server) return;
    const controller = new TestClient(server.wsUrl);
    try {
      await controller.opened();
      controller.send({ type: 'hello', clientType: 'controller', version: 1 });
      expect((await controller.nextJson())['type']).toBe('welcome');
      expect(await controller.nextJson()).toEqual({ type: 'control', granted: true });
      expect((await controller.nextJson())['type']).toBe('status');

      controller.send({ type: 'turn', dir: 'up' });
      const deadline = Date.now() + 2000;
      while (server.gameServer.getSnapshot().requested !== 'up' && Date.now() < deadline) {
        await new Promise<void>((resolve) => setTimeout(resolve, 10));
      }
      server.gameServer.step();

      const frame = await controller.nextFrame();
      expect(frame.tick).toBe(1);
      expect(frame.direction).toBe('up');
      expect(frame.body[0]).toEqual({ x: 8, y: 7 });
    } finally {
      controller.close();
      await server.close();
    }
  });

  it('closes connections that skip the handshake', async () => {
    const server = await startServerWithGuard();
    if (!server) return;
    const client = new TestClient(server.wsUrl);
    try {
      await client.opened();
      client.send({ type: 'turn', dir: 'up' });
      expect(await client.nextJson()).toEqual({ type: 'error', message: 'hello required first' });
      expect(await client.closed()).toBe(1008);
    } finally {
      client.close();
      await server.close();
    }
  });

  it('rejects steering from displays', async () => {
    const server = await startServerWithGuard();
    if (!server) return;
    const display = new TestClient(server.wsUrl);
    try {
      await display.opened();
      display.send({ type: 'hello', clientType: 'display', version: 1 });
      await display.nextJson();
      await display.nextJson();
      display.send({ type: 'restart' });
      expect(await display.nextJson()).toEqual({ type: 'error', message: 'restart requires a controller' });
      expect(await display.closed()).toBe(1008);
    } finally {
      display.close();
      await server.close();
    }
  });

  it('closes oversized messages and keeps serving', async () => {
    const lines: string[] = [];
    const server = await startServerWithGuard(lines);
    if (!server) return;
    const flooder = new TestClient(server.wsUrl);
    const display = new TestClient(server.wsUrl);
    try {
      await flooder.opened();
      flooder.sendRaw('x'.repeat(8192));
      expect(await flooder.closed()).toBe(1009);
      expect(lines.some((line) => line.includes(' | warn | ws | connection 1: Max payload size exceeded'))).toBe(true);

      await display.opened();
      display.send({ type: 'hello', clientType: 'display', version: 1 });
      expect((await display.nextJson())['type']).toBe('welcome');
    } finally {
      flooder.close();
      display.close();
      await server.close();
    }
  });

  it('rejects binary messages', async () => {
    const server = await startServerWithGuard();
    if (!server) return;
    const client = new TestClient(server.wsUrl);
    try {
      await client.opened();
      client.sendRaw(Buffer.from([1, 2, 3]));
      expect(await client.nextJson()).toEqual({ type: 'error', message: 'binary messages are not supported' });
      expect(await client.closed()).toBe(1008);
    } finally {
      client.close();
      await server.close();
    }
  });

  it('answers an unparseable request target with 400', async () => {
    const server = await startServerWithGuard();
    if (!server) return;
    try {
      const reply = await new Promise<string>((resolve, reject) => {
        const socket = connect(server.port, '127.0.0.1');
        let text = '';
        socket.setEncoding('utf8');
        socket.on('data', (chunk: string) => {
          text += chunk;
        });
        socket.on('end', () => resolve(text));
        socket.on('error', reject);
        socket.write('GET http://[/api HTTP/1.1\r\nHost: localhost\r\nConnection: close\r\n\r\n');
      });
      expect(reply.startsWith('HTTP/1.1 400')).toBe(true);
      expect(reply.endsWith('{"ok":false,"message":"bad request"}')).toBe(true);

      const health = await fetch(`http://127.0.0.1:${server.port}/health`);
      expect(health.status).toBe(200);
    } finally {
      await server.close();
    }
  });
});
