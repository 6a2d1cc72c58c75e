// WebSocket endpoint over the in-process hub:
//   /ws/dashboard        -> topic "dashboard"
//   /ws/rooms/:roomId    -> topic "room:{roomId}" (room must exist)

import type { IncomingMessage, Server } from 'http';
import type { Duplex } from 'stream';
import { WebSocket, WebSocketServer } from 'ws';
import type { RawData } from 'ws';
import { v4 as uuidv4, validate as isUuid } from 'uuid';
import type { RoomRepository } from '../db/store';
import { errorMessage } from '../errors';
import type { TokenVerifier } from '../utils/jwt';
import { logger } from '../utils/logger';
import { DASHBOARD_TOPIC, roomTopic } from './events';
import type { PubSubHub, Subscriber } from './hub';

const log = logger.child({ module: 'websocket' });

export const CLOSE_UNAUTHORIZED = 4001;
export const CLOSE_ROOM_NOT_FOUND = 4004;
const CLOSE_INTERNAL = 1011;

type Route = { kind: 'dashboard' } | { kind: 'room'; roomId: string };

export type RealtimeServerOptions = {
  hub: PubSubHub;
  rooms: Pick<RoomRepository, 'exists'>;
  authRequired: boolean;
  verifyToken: TokenVerifier;
};

export type RealtimeServer = {
  wss: WebSocketServer;
  close(): Promise<void>;
};

export function matchRoute(url: string | undefined): Route | null {
  const { pathname } = new URL(url ?? '/', 'http://localhost');
  if (pathname === '/ws/dashboard' || pathname === '/ws/dashboard/') return { kind: 'dashboard' };

  const m = /^\/ws\/rooms\/([^/]+)\/?$/.exec(pathname);
  if (!m) return null;
  try {
    return { kind: 'room', roomId: decodeURIComponent(m[1]) };
  } catch {
    // malformed percent-escape
    return null;
  }
}

function tokenFrom(req: IncomingMessage): string {
  const { searchParams } = new URL(req.url ?? '/', 'http://localhost');
  const fromQuery = searchParams.get('token');
  if (fromQuery) return fromQuery;
  const authz = req.headers.authorization ?? '';
  return authz.toLowerCase().startsWith('bearer ') ? authz.slice(7).trim() : '';
}

function subscriberFor(ws: WebSocket): Subscriber {
  return {
    id: uuidv4(),
    send(payload: string) {
      if (ws.readyState !== WebSocket.OPEN) throw new Error('socket is not open');
      ws.send(payload);
    },
  };
}

export function attachRealtimeServer(server: Server, opts: RealtimeServerOptions): RealtimeServer {
  const wss = new WebSocketServer({ noServer: true });

  const resolveTopic = async (route: Route): Promise<string | null> => {
    if (route.kind === 'dashboard') return DASHBOARD_TOPIC;
    if (!isUuid(route.roomId)) return null;
    return (await opts.rooms.exists(route.roomId)) ? roomTopic(route.roomId) : null;
  };

  const authorize = async (req: IncomingMessage): Promise<boolean> => {
    if (!opts.authRequired) return true;
    const token = tokenFrom(req);
    if (!token) return false;
    try {
      await opts.verifyToken(token);
      return true;
    } catch (err) {
      log.warn({ err: errorMessage(err) }, 'WebSocket token rejected');
      return false;
    }
  };

  const onConnection = async (ws: WebSocket, req: IncomingMessage, route: Route): Promise<void> => {
    let subscriber: Subscriber | null = null;

    // Frame errors can arrive while the subscription is still being resolved.
    ws.on('error', (err: Error) => {
      log.warn({ subscriber: subscriber?.id, err: err.message }, 'Client error');
      if (subscriber) opts.hub.leaveAll(subscriber);
    });

    if (!(await authorize(req))) {
      ws.close(CLOSE_UNAUTHORIZED, 'Unauthorized');
      return;
    }

    const topic = await resolveTopic(route);
    if (!topic) {
      log.info({ url: req.url }, 'Subscription refused: unknown room');
      ws.close(CLOSE_ROOM_NOT_FOUND, 'Room not found');
      return;
    }

    if (ws.readyState !== WebSocket.OPEN) {
      log.info({ url: req.url }, 'Client left before subscribing');
      return;
    }

    const joined = subscriberFor(ws);
    subscriber = joined;
    opts.hub.join(topic, joined);
    log.info({ topic, subscriber: joined.id, total: opts.hub.subscriberCount() }, 'Client connected');

    ws.on('message', (data: RawData) => {
      try {
        const message: unknown = JSON.parse(data.toString());
        if (typeof message === 'object' && message !== null && 'type' in message && message.type === 'ping') {
          ws.send(JSON.stringify({ type: 'pong', timestamp: new Date().toISOString() }));
        }
      } catch (err) {
        log.warn({ subscriber: joined.id, err: errorMessage(err) }, 'Invalid message from client');
      }
    });

    ws.on('close', () => {
      opts.hub.leaveAll(joined);
      log.info({ topic, subscriber: joined.id }, 'Client disconnected');
    });
  };

  const onUpgrade = (req: IncomingMessage, socket: Duplex, head: Buffer) => {
    const route = matchRoute(req.url);
    if (!route) {
      socket.write('HTTP/1.1 404 Not Found\r\nConnection: close\r\n\r\n');
      socket.destroy();
      return;
    }

    wss.handleUpgrade(req, socket, head, (ws) => {
      onConnection(ws, req, route).catch((err: unknown) => {
        log.error({ url: req.url, err: errorMessage(err) }, 'Subscription failed');
        ws.close(CLOSE_INTERNAL, 'Internal error');
      });
    });
  };

  server.on('upgrade', onUpgrade);

  return {
    wss,
    close: () =>
      new Promise<void>((resolve) => {
        server.off('upgrade', onUpgrade);
        for (const client of wss.clients) client.terminate();
        wss.close(() => resolve());
      }),
  };
}
