import { createServer } from 'node:http';
import { pathToFileURL } from 'node:url';
import { GRID_SIZE, TICK_PERIOD_MS } from '../src/config.ts';
import { FRAME_VERSION } from '../src/protocol/frame.ts';
import { ambientEntropy, createSeededEntropy } from '../src/rng.ts';
import { THEME } from '../src/theme.ts';
import { parseConfig, type ServerConfig } from './config.ts';
import { GameServer } from './gameServer.ts';
import { createHttpHandler } from './httpApi.ts';
import { createLogger, type Logger } from './logger.ts';
import type { WelcomeMsg } from './protocol.ts';
import { WsHub } from './wsHub.ts';

export interface RunningServer {
  port: number;
  wsUrl: string;
  gameServer: GameServer;
  close: () => Promise<void>;
}

export interface StartOptions {
  /** Logger to use instead of one built from the config level. */
  logger?: Logger;
  /** Leave the tick timer stopped; steps then run only through `step()`. */
  manualTicks?: boolean;
}

export async function startServer(config: ServerConfig, options: StartOptions = {}): Promise<RunningServer> {
  const logger = options.logger ?? createLogger(config.logLevel);
  const entropy = config.seed !== undefined ? createSeededEntropy(config.seed) : ambientEntropy;
  const sessionId = Math.random().toString(36).slice(2, 10);
  const welcome: WelcomeMsg = {
    type: 'welcome',
    sessionId,
    tickPeriodMs: TICK_PERIOD_MS,
    gridSize: GRID_SIZE,
    frameVersion: FRAME_VERSION,
    palettes: THEME
  };

  let gameServer: GameServer | null = null;
  let wsHub: WsHub | null = null;

  const httpHandler = createHttpHandler({
    getStatus: () => ({
      tick: gameServer?.getTickId() ?? 0,
      clients: wsHub?.getClientCount() ?? 0
    }),
    getSnapshot: () => gameServer?.getSnapshot() ?? null,
    restart: () => gameServer?.handleRestart(null)
  });

  const httpServer = createServer((req, res) => {
    httpHandler(req, res);
  });

  wsHub = new WsHub(httpServer, welcome, {
    onProtocolError: (connId, message) => logger.warn('ws', `connection ${connId}: ${message}`)
  });
  gameServer = new GameServer(config, wsHub, logger, entropy);
  wsHub.setHandlers({
    onHello: (connId, clientType) => gameServer?.handleHello(connId, clientType),
    onTilt: (connId, msg) => gameServer?.handleTilt(connId, msg),
    onTurn: (connId, msg) => gameServer?.handleTurn(connId, msg),
    onRestart: (connId) => gameServer?.handleRestart(connId),
    onDisconnect: (connId) => gameServer?.handleDisconnect(connId)
  });

  await new Promise<void>((resolve, reject) => {
    const onError = (err: Error) => {
      httpServer.off('error', onError);
      reject(err);
    };
    httpServer.once('error', onError);
    httpServer.listen({ port: config.port, host: config.host }, () => {
      httpServer.off('error', onError);
      resolve();
    });
  });

  const address = httpServer.address();
  const port = typeof address === 'object' && address ? address.port : config.port;

  if (!options.manualTicks) gameServer.start();

  const running = gameServer;
  const hub = wsHub;
  const close = async () => {
    running.stop();
    hub.closeAll();
    await new Promise<void>((resolve) => httpServer.close(() => resolve()));
  };

  const wsHost =
    config.host === '0.0.0.0' || config.host === '::' ? 'localhost' : config.host;
  return {
    port,
    wsUrl: `ws://${wsHost}:${port}`,
    gameServer: running,
    close
  };
}

export async function main(): Promise<void> {
  const config = parseConfig(process.argv.slice(2), process.env);
  const logger = createLogger(config.logLevel);
  const server = await startServer(config, { logger });
  logger.info('server', `listening on :${server.port} (tick ${TICK_PERIOD_MS} ms)`);

  let closing = false;
  const shutdown = async () => {
    if (closing) return;
    closing = true;
    logger.info('server', 'shutting down');
    await server.close();
    process.exit(0);
  };
  process.on('SIGINT', () => void shutdown());
  process.on('SIGTERM', () => void shutdown());
}

if (import.meta.url === pathToFileURL(process.argv[1] ?? '').href) {
  main().catch((err: unknown) => {
    console.error(err);
    process.exit(1);
  });
}
