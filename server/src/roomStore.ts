import { normalizeRoomCode } from './roomCode';
import { Room } from './types';

export type NewRoomOptions = {
  wordPool: readonly string[];
  roundDurationSeconds: number;
  createdAt: number;
};

/**
 * Registry of live rooms keyed by normalized room code.
 *
 * Command handlers run to completion on the event loop, so a room is fully
 * built before `create` inserts it and no caller ever sees one half-made.
 * A room removed by `delete` is gone for every later lookup, which is what
 * makes a join racing the deletion of the same empty room fail with
 * "Room not found".
 */
export class RoomStore {
  private rooms: Map<string, Room> = new Map();

  create(code: string, options: NewRoomOptions): Room | null {
    const key = normalizeRoomCode(code);
    if (this.rooms.has(key)) return null;
    const room: Room = {
      code: key,
      players: [],
      currentDrawerId: null,
      currentWord: '',
      wordPool: options.wordPool,
      roundNumber: 0,
      roundStartTime: 0,
      roundDurationSeconds: options.roundDurationSeconds,
      state: 'waiting',
      chatHistory: [],
      createdAt: options.createdAt,
    };
    this.rooms.set(key, room);
    return room;
  }

  get(code: string): Room | undefined {
    return this.rooms.get(normalizeRoomCode(code));
  }

  has(code: string): boolean {
    return this.rooms.has(normalizeRoomCode(code));
  }

  delete(code: string): boolean {
    return this.rooms.delete(normalizeRoomCode(code));
  }

  get size(): number {
    return this.rooms.size;
  }

  values(): Room[] {
    return Array.from(this.rooms.values());
  }
}
