import { WebSocketServer, WebSocket, type RawData } from 'ws';
import http from 'http';
import type { Duplex } from 'stream';
import { z } from 'zod';
import type winston from 'winston';
import { GameState } from '@inkgrid/game-logic';
import { loadConfig, parseConfig, type ServerConfig } from './config.js';
import { createLogger } from './logger.js';
import type { GameStateFactory } from './Match.js';
import { MatchManager } from './MatchManager.js';
import type { MessageSender } from './types.js';

const MAX_MESSAGE_SIZE = 64 * 1024; // 64KB
const MAX_BODY_SIZE = 1024;

const WS_PATH = /^\/ws\/([0-9a-f-]{36})$/;
const REGISTER_PATH = /^\/register\/([^/]+)$/;

const RegisterRequestSchema = z.object({
  userId: z.number().int().nonnegative(),
});

export interface ServerOptions {
  config?: Partial<ServerConfig>;
  logger?: winston.Logger;
  createGameState?: GameStateFactory;
}

export interface InkgridServer {
  httpServer: http.Server;
  wss: WebSocketServer;
  manager: MatchManager;
  config: ServerConfig;
  logger: winston.Logger;
  close: () => Promise<void>;
}

class HttpError extends Error {
  constructor(readonly status: number, message: string) {
    super(message);
    this.name = 'HttpError';
  }
}

function sendJson(res: http.ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(body));
}

function readBody(req: http.IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    let body = '';
    req.setEncoding('utf8');
    req.on('data', (chunk: string) => {
      body += chunk;
      if (body.length > MAX_BODY_SIZE) {
        // Drain the rest so the 413 still reaches the client
        req.removeAllListeners('data');
        req.resume();
        reject(new HttpError(413, 'Request body too large'));
      }
    });
    req.on('end', () => resolve(body));
    req.on('error', reject);
  });
}

function rejectUpgrade(socket: Duplex, status: number, reason: string): void {
  socket.write(`HTTP/1.1 ${status} ${reason}\r\nConnection: close\r\n\r\n`);
  socket.destroy();
}

export function createServer(options: ServerOptions = {}): InkgridServer {
  const config: ServerConfig = { ...parseConfig({}), ...options.config };
  const logger = options.logger ?? createLogger({ level: config.logLevel, format: config.logFormat });
  const createGameState = options.createGameState ?? (() => GameState.create({ turns: config.turnsPerMatch }));
  const manager = new MatchManager({ createGameState, logger, sendRetries: config.sendRetries });
  const sockets = new Map<string, WebSocket>();
  const allowedOrigins = new Set(config.allowedOrigins);

  async function handleRegister(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    let json: unknown;
    try {
      json = JSON.parse(await readBody(req));
    } catch (err) {
      if (err instanceof HttpError) throw err;
      throw new HttpError(400, 'Body must be JSON');
    }
    const parsed = RegisterRequestSchema.safeParse(json);
    if (!parsed.success) {
      throw new HttpError(400, 'userId must be a non-negative integer');
    }
    const id = manager.register(parsed.data.userId);
    sendJson(res, 200, { url: `${config.publicWsUrl}/${id}` });
  }

  const httpServer = http.createServer((req, res) => {
    // CORS headers - restrict to allowed origins
    const origin = req.headers.origin;
    if (origin && allowedOrigins.has(origin)) {
      res.setHeader('Access-Control-Allow-Origin', origin);
    }
    res.setHeader('Access-Control-Allow-Methods', 'GET, POST, DELETE, OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type');

    if (req.method === 'OPTIONS') {
      res.writeHead(204);
      res.end();
      return;
    }

    if (req.method === 'GET' && req.url === '/health') {
      sendJson(res, 200, { status: 'ok', clients: manager.clientCount, matches: manager.matchCount });
      return;
    }

    if (req.method === 'POST' && req.url === '/register') {
      handleRegister(req, res).catch((err: unknown) => {
        if (err instanceof HttpError) {
          sendJson(res, err.status, { error: err.message });
          return;
        }
        logger.error('Failed to register client', { error: err instanceof Error ? err.message : String(err) });
        sendJson(res, 500, { error: 'Internal server error' });
      });
      return;
    }

    const unregister = req.method === 'DELETE' ? REGISTER_PATH.exec(req.url ?? '') : null;
    if (unregister) {
      const id = unregister[1];
      if (manager.unregister(id)) {
        logger.info('Client unregistered', { clientId: id });
      }
      sockets.get(id)?.close();
      sockets.delete(id);
      sendJson(res, 200, {});
      return;
    }

    sendJson(res, 404, { error: 'Not found' });
  });

  const wss = new WebSocketServer({ noServer: true });

  function socketSender(ws: WebSocket, clientId: string): MessageSender {
    return {
      send(payload) {
        if (ws.readyState !== WebSocket.OPEN) {
          return { ok: false, error: new Error('Socket is not open') };
        }
        ws.send(payload, (err) => {
          if (err) logger.warn('Socket write failed', { clientId, error: err.message });
        });
        return { ok: true };
      },
    };
  }

  httpServer.on('upgrade', (req: http.IncomingMessage, socket: Duplex, head: Buffer) => {
    const match = WS_PATH.exec(req.url ?? '');
    const clientId = match?.[1];
    if (clientId === undefined || !manager.isRegistered(clientId)) {
      rejectUpgrade(socket, 404, 'Not Found');
      return;
    }
    if (manager.isConnected(clientId)) {
      rejectUpgrade(socket, 409, 'Conflict');
      return;
    }
    wss.handleUpgrade(req, socket, head, (ws) => onConnection(ws, clientId));
  });

  function onConnection(ws: WebSocket, clientId: string): void {
    if (!manager.connect(clientId, socketSender(ws, clientId))) {
      ws.close();
      return;
    }
    sockets.set(clientId, ws);
    logger.info('Client connected', { clientId });

    ws.on('message', (data: RawData, isBinary: boolean) => {
      if (isBinary) {
        logger.debug('Dropping binary frame', { clientId });
        return;
      }
      const rawData = data.toString();
      if (rawData.length > MAX_MESSAGE_SIZE) {
        logger.warn('Dropping oversized frame', { clientId, size: rawData.length });
        return;
      }
      try {
        manager.handleMessage(clientId, rawData);
      } catch (err) {
        logger.error('Failed to handle message', {
          clientId,
          error: err instanceof Error ? err.message : String(err),
        });
      }
    });

    ws.on('close', () => {
      if (sockets.get(clientId) === ws) {
        sockets.delete(clientId);
      }
      manager.disconnect(clientId);
      logger.info('Client disconnected', { clientId });
    });

    ws.on('error', (err) => {
      logger.warn('Socket error', { clientId, error: err.message });
    });
  }

  function close(): Promise<void> {
    return new Promise((resolve, reject) => {
      // Close all WebSocket connections
      for (const ws of sockets.values()) {
        ws.terminate();
      }
      sockets.clear();
      wss.close(() => {
        httpServer.close((err) => {
          if (err) reject(err);
          else resolve();
        });
      });
    });
  }

  return { httpServer, wss, manager, config, logger, close };
}

// Start the server if run directly
if (process.argv[1]?.endsWith('server.js') || process.argv[1]?.endsWith('server.ts')) {
  const config = loadConfig();
  const server = createServer({ config });
  server.httpServer.listen(config.port, config.host, () => {
    server.logger.info(`Ink grid server listening on ${config.host}:${config.port}`);
  });

  const shutdown = (signal: string): void => {
    server.logger.info('Shutting down', { signal });
    server.close().then(
      () => process.exit(0),
      (err: unknown) => {
        server.logger.error('Shutdown failed', { error: err instanceof Error ? err.message : String(err) });
        process.exit(1);
      },
    );
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}
