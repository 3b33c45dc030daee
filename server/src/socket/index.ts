import type { Server as HTTPServer } from 'http';
import { Server, type Namespace, type Socket } from 'socket.io';
import { z } from 'zod';
import { env } from '../config/env';
import { errorMessage, isGameError } from '../lib/errors';
import { verifyInitData } from '../lib/initData';
import type { Services } from '../services';
import type { Channel, SocketHandle } from '../services/connectionRegistry';
import { socketHandle } from './socketHandle';

export const VIEWER_NAMESPACE = '/game';
export const CHAT_NAMESPACE = '/chat';

const chatSchema = z.object({
  initData: z.string().min(1),
  text: z.string().min(1),
});

function gameIdOf(socket: Socket): string | null {
  const raw = socket.handshake.query.game_id;
  const gameId = Array.isArray(raw) ? raw[0] : raw;
  return typeof gameId === 'string' && gameId.length > 0 && gameId.length <= 64 ? gameId : null;
}

/** Registers the socket under its game and unregisters it on disconnect. */
type OnJoin = (socket: Socket, gameId: string, handle: SocketHandle) => void;

function track(nsp: Namespace, services: Services, channel: Channel, onJoin: OnJoin) {
  nsp.on('connection', (socket) => {
    const gameId = gameIdOf(socket);
    if (!gameId) {
      socket.emit('error', { error: 'game_id_required' });
      socket.disconnect(true);
      return;
    }
    const handle = socketHandle(socket);
    services.registry.register(gameId, handle, channel);
    console.log(`[socket] ${channel} ${socket.id} joined game ${gameId}`);

    socket.on('disconnect', (reason) => {
      services.registry.unregister(gameId, handle.id);
      console.log(`[socket] ${channel} ${socket.id} left game ${gameId} reason=${reason}`);
    });

    onJoin(socket, gameId, handle);
  });
}

export function createSocketServer(httpServer: HTTPServer, services: Services) {
  const io = new Server(httpServer, {
    cors: {
      origin: env.corsOrigin,
      methods: ['GET', 'POST'],
    },
  });

  // Viewer channel: server pushes full state; client traffic is keep-alive only.
  track(io.of(VIEWER_NAMESPACE), services, 'viewer', (_socket, gameId, handle) => {
    services.dispatcher.sendSnapshot(gameId, handle).catch((err: unknown) => {
      console.error(`[socket] snapshot for game ${gameId} failed:`, errorMessage(err));
    });
  });

  track(io.of(CHAT_NAMESPACE), services, 'chat', (socket, gameId) => {
    socket.on('chat', async (payload: unknown) => {
      try {
        const body = chatSchema.parse(payload);
        const user = verifyInitData(body.initData, services.auth.botToken, {
          maxAgeSeconds: services.auth.maxAgeSeconds,
        });
        await services.chat.post(gameId, user, body.text);
      } catch (err) {
        const error = isGameError(err) ? err.code : err instanceof z.ZodError ? 'invalid_input' : 'chat_error';
        if (error === 'chat_error') console.error(`[socket] chat in game ${gameId} failed:`, errorMessage(err));
        socket.emit('chat:error', { error });
      }
    });
  });

  return io;
}
