import http from 'http';
import { createApp } from './app';
import { env } from './config/env';
import { RoomStore } from './roomStore';
import { createSocketServer } from './socket';

const store = new RoomStore();
const app = createApp(store);
const server = http.createServer(app);
const { io } = createSocketServer(server, { store });

server.listen(env.port, () => {
  console.log(`[server] listening on http://localhost:${env.port} (${env.nodeEnv})`);
});

export { app, server, io };
