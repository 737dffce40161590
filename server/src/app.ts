import express from 'express';
import cors from 'cors';
import { env } from './config/env';
import { RoomStore } from './roomStore';

export function createApp(store: RoomStore) {
  const app = express();
  app.use(cors({ origin: env.corsOrigin }));
  app.use(express.json());

  app.get('/health', (_req, res) => {
    const rooms = store.values();
    res.json({
      status: 'ok',
      rooms: rooms.length,
      players: rooms.reduce((sum, r) => sum + r.players.length, 0),
      uptime: process.uptime(),
    });
  });

  return app;
}
