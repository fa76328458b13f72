import { randomUUID } from 'crypto';
import express, { NextFunction, Request, Response } from 'express';
import http from 'http';
import WebSocket, { WebSocketServer } from 'ws';
import type { ConnectionStateChange } from './ami/types';
import type { CallSnapshot } from './calls/types';
import { PbxClient } from './client/pbxClient';
import { log } from './log';
import { metricsHandler, metricsMiddleware } from './metrics';
import { createCallsRouter, serializeCall } from './routes/calls';
import { healthRouter } from './routes/health';

export interface ServerOptions {
  client?: PbxClient;
  /** Bearer token required by /v1 routes and the event socket when set. */
  statusToken?: string;
}

type PushMessage =
  | { type: 'call_started' | 'call_answered' | 'call_ended'; call: ReturnType<typeof serializeCall> }
  | { type: 'connection_state_changed'; previous: string; current: string; reason?: string }
  | { type: 'hello'; status: ReturnType<PbxClient['status']>; calls: ReturnType<typeof serializeCall>[] };

const EVENTS_PATH = '/v1/events';

function requestIdMiddleware(req: Request, res: Response, next: NextFunction): void {
  const incomingId = req.header('x-request-id');
  const requestId = incomingId && incomingId.trim() !== '' ? incomingId : randomUUID();
  res.setHeader('x-request-id', requestId);
  Object.assign(req, { id: requestId });
  next();
}

function createTokenGuard(token: string | undefined) {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (!token) {
      next();
      return;
    }
    const header = req.header('authorization') ?? '';
    if (header !== `Bearer ${token}`) {
      res.status(401).json({ error: 'unauthorized' });
      return;
    }
    next();
  };
}

function errorHandler(
  err: unknown,
  _req: Request,
  res: Response,
  _next: NextFunction,
): void {
  log.error({ err }, 'unhandled error');
  res.status(500).json({ error: 'internal_server_error' });
}

function parseEventsRequest(request: http.IncomingMessage): { token: string | null } | null {
  if (!request.url) {
    return null;
  }

  const host = request.headers.host ?? 'localhost';
  const url = new URL(request.url, `http://${host}`);
  if (url.pathname !== EVENTS_PATH) {
    return null;
  }

  return { token: url.searchParams.get('token') };
}

function attachEventsWebSocketServer(
  server: http.Server,
  client: PbxClient,
  statusToken: string | undefined,
): WebSocketServer {
  const wss = new WebSocketServer({ noServer: true });

  server.on('upgrade', (request, socket, head) => {
    const parsed = parseEventsRequest(request);
    if (!parsed) {
      socket.destroy();
      return;
    }

    if (statusToken && parsed.token !== statusToken) {
      socket.destroy();
      return;
    }

    wss.handleUpgrade(request, socket, head, (ws) => {
      wss.emit('connection', ws, request);
    });
  });

  const broadcast = (message: PushMessage): void => {
    const payload = JSON.stringify(message);
    for (const ws of wss.clients) {
      if (ws.readyState === WebSocket.OPEN) {
        ws.send(payload);
      }
    }
  };

  const pushCall = (type: 'call_started' | 'call_answered' | 'call_ended') => (call: CallSnapshot) =>
    broadcast({ type, call: serializeCall(call) });

  const detach = [
    client.onCallStarted(pushCall('call_started')),
    client.onCallAnswered(pushCall('call_answered')),
    client.onCallEnded(pushCall('call_ended')),
    client.onConnectionStateChanged((change: ConnectionStateChange) =>
      broadcast({ type: 'connection_state_changed', ...change }),
    ),
  ];

  wss.on('connection', (ws) => {
    const hello: PushMessage = {
      type: 'hello',
      status: client.status(),
      calls: client.listActiveCalls().map(serializeCall),
    };
    ws.send(JSON.stringify(hello));

    ws.on('error', (error) => {
      log.error({ err: error, event: 'events_socket_error' }, 'events websocket error');
    });
  });

  wss.on('close', () => {
    for (const off of detach) {
      off();
    }
  });

  return wss;
}

export function buildServer(options: ServerOptions = {}): {
  app: express.Express;
  server: http.Server;
  client: PbxClient;
  wss: WebSocketServer;
} {
  const app = express();
  const client = options.client ?? new PbxClient();

  app.disable('x-powered-by');
  app.use(express.json());
  app.use(requestIdMiddleware);
  app.use(metricsMiddleware);

  app.use('/health', healthRouter);
  app.get('/metrics', metricsHandler);
  app.use('/v1', createTokenGuard(options.statusToken), createCallsRouter(client));

  app.use(errorHandler);

  const server = http.createServer(app);
  const wss = attachEventsWebSocketServer(server, client, options.statusToken);

  return { app, server, client, wss };
}
