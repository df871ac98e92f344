import { createServer } from 'node:http';
import { pathToFileURL } from 'node:url';
import { createRng } from '../src/rng.ts';
import { parseConfig, type ServerConfig } from './config.ts';
import { GameServer } from './gameServer.ts';
import { createLogger, type Logger } from './logger.ts';
import type { WelcomeMsg } from './protocol.ts';
import { WsHub } from './wsHub.ts';

export interface RunningServer {
  port: number;
  wsUrl: string;
  close: () => Promise<void>;
}

export async function startServer(
  config: ServerConfig,
  logger: Logger = createLogger(config.logLevel)
): Promise<RunningServer> {
  const sessionId = Math.random().toString(36).slice(2, 10);
  const rng = config.seed !== undefined ? createRng(config.seed) : Math.random;
  const welcome: WelcomeMsg = {
    type: 'welcome',
    sessionId,
    tickRate: config.tickRateHz,
    field: { w: config.game.fieldWidth, h: config.game.fieldHeight },
    snakeWidth: config.game.snakeWidth
  };

  const httpServer = createServer((_req, res) => {
    res.writeHead(426, { 'content-type': 'text/plain' });
    res.end('websocket upgrade required');
  });

  const wsHub = new WsHub(httpServer, welcome);
  const gameServer = new GameServer(config, wsHub, logger, rng);
  wsHub.setHandlers({
    onConnect: (connId) =>
      logger.info('ws', `conn ${connId} joined (${wsHub.getClientCount()} connected)`),
    onInput: (connId, msg) => gameServer.handleInput(connId, msg),
    onDisconnect: (connId) =>
      logger.info('ws', `conn ${connId} left (${wsHub.getClientCount()} connected)`)
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

  gameServer.start();

  const close = async () => {
    gameServer.stop();
    wsHub.closeAll();
    await new Promise<void>((resolve) => httpServer.close(() => resolve()));
  };

  const wsHost =
    config.host === '0.0.0.0' || config.host === '::' ? 'localhost' : config.host;
  return {
    port,
    wsUrl: `ws://${wsHost}:${port}`,
    close
  };
}

export async function main(): Promise<void> {
  const config = parseConfig(process.argv.slice(2), process.env);
  const logger = createLogger(config.logLevel);
  const server = await startServer(config, logger);
  logger.info('server', `listening on :${server.port}`);

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
