import type { Server as HTTPServer } from 'http';
import { Server } from 'socket.io';
import { COMMAND_TYPES, parseCommand } from './commands';
import { env } from './config/env';
import { Audience, ErrorMessages, ServerEvent } from './events';
import { GameEngine } from './gameEngine';
import { GameGateway, Transport } from './gateway';
import { RoomStore } from './roomStore';
import { RoundTimer } from './roundTimer';

export function roomChannel(roomCode: string) {
  return `room:${roomCode}`;
}

export class SocketTransport implements Transport {
  constructor(private readonly io: Server) {}

  deliver(audience: Audience, event: ServerEvent) {
    switch (audience.kind) {
      case 'connection':
        this.io.to(audience.connectionId).emit(event.type, event.payload);
        break;
      case 'room':
        this.io.to(roomChannel(audience.roomCode)).emit(event.type, event.payload);
        break;
      case 'room_except':
        this.io.to(roomChannel(audience.roomCode)).except(audience.connectionId).emit(event.type, event.payload);
        break;
    }
  }

  join(connectionId: string, roomCode: string) {
    void this.io.sockets.sockets.get(connectionId)?.join(roomChannel(roomCode));
  }

  leave(connectionId: string, roomCode: string) {
    void this.io.sockets.sockets.get(connectionId)?.leave(roomChannel(roomCode));
  }
}

export type SocketServerOptions = {
  store?: RoomStore;
  roundDurationSeconds?: number;
  corsOrigin?: string;
};

export function createSocketServer(httpServer: HTTPServer, options: SocketServerOptions = {}) {
  const io = new Server(httpServer, {
    cors: {
      origin: options.corsOrigin ?? env.corsOrigin,
      methods: ['GET', 'POST'],
    },
  });

  const store = options.store ?? new RoomStore();
  const engine = new GameEngine(store, {
    roundDurationSeconds: options.roundDurationSeconds ?? env.roundDurationSeconds,
  });
  const timer = new RoundTimer();
  const gateway = new GameGateway(engine, new SocketTransport(io), timer, {
    maxUsernameLength: env.maxUsernameLength,
  });

  io.on('connection', (socket) => {
    const sid = socket.id;
    console.log(`[socket] connected: ${sid}`);

    for (const type of COMMAND_TYPES) {
      socket.on(type, (payload: unknown) => {
        try {
          const command = parseCommand(type, payload);
          if (!command) return;
          gateway.handle(sid, command);
        } catch (err) {
          console.error(`[socket] ${type} from ${sid} failed`, err);
          socket.emit('error_message', { message: ErrorMessages.internal });
        }
      });
    }

    socket.on('disconnect', (reason) => {
      console.log(`[socket] disconnected: ${sid} reason=${reason}`);
      try {
        gateway.disconnect(sid);
      } catch (err) {
        console.error(`[socket] cleanup for ${sid} failed`, err);
      }
    });
  });

  httpServer.on('close', () => timer.stopAll());

  return { io, gateway, store, timer };
}
