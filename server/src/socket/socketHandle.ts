import type { Socket } from 'socket.io';
import type { PushEvent, SocketHandle } from '../services/connectionRegistry';

/**
 * Wraps a socket.io socket without keeping it alive: the handle only holds a
 * WeakRef, so the connection task stays the socket's sole owner.
 */
export function socketHandle(socket: Socket): SocketHandle {
  const id = socket.id;
  const ref = new WeakRef(socket);
  return {
    id,
    isOpen: () => ref.deref()?.connected === true,
    send: (event: PushEvent, payload: unknown) => {
      const target = ref.deref();
      if (!target || !target.connected) {
        throw new Error(`socket ${id} is closed`);
      }
      target.emit(event, payload);
    },
  };
}
