import wordList from './data/words.json';
import { generateRoomCode } from './roomCode';
import { RoomStore } from './roomStore';
import { ChatMessage, Player, Room } from './types';

export const DEFAULT_WORDS: readonly string[] = wordList;
export const DEFAULT_ROUND_SECONDS = 80;
export const BASE_GUESS_POINTS = 100;

const MAX_CODE_ATTEMPTS = 20;

export type GameEngineOptions = {
  wordPool?: readonly string[];
  roundDurationSeconds?: number;
  now?: () => number;
  random?: () => number;
};

export type AddPlayerResult =
  | { ok: true; player: Player }
  | { ok: false; reason: 'username_taken' };

export type GuessResult =
  | { correct: false }
  | { correct: true; player: Player; points: number };

export type RoundSummary = {
  word: string;
  players: Player[]; // score descending
};

/**
 * Game rules over rooms held in a {@link RoomStore}. Every method is
 * synchronous and does no I/O, so a call can never interleave with another
 * call on the same room. Absence (unknown player, wrong state) is reported as
 * a value, never thrown.
 */
export class GameEngine {
  readonly store: RoomStore;
  private wordPool: readonly string[];
  private roundDurationSeconds: number;
  private now: () => number;
  private random: () => number;

  constructor(store: RoomStore, options: GameEngineOptions = {}) {
    this.store = store;
    this.wordPool = options.wordPool ?? DEFAULT_WORDS;
    this.roundDurationSeconds = options.roundDurationSeconds ?? DEFAULT_ROUND_SECONDS;
    this.now = options.now ?? (() => Date.now());
    this.random = options.random ?? (() => Math.random());
    if (this.wordPool.length === 0) throw new Error('Word pool is empty');
  }

  createRoom(): Room;
  createRoom(code: string): Room | null;
  createRoom(code?: string): Room | null {
    const options = {
      wordPool: this.wordPool,
      roundDurationSeconds: this.roundDurationSeconds,
      createdAt: this.now(),
    };
    if (code !== undefined) return this.store.create(code, options);
    // collisions are rejected by the store, so keep drawing codes until one sticks
    for (let i = 0; i < MAX_CODE_ATTEMPTS; i++) {
      const room = this.store.create(generateRoomCode(this.random), options);
      if (room) return room;
    }
    throw new Error('No room code available');
  }

  findPlayer(room: Room, connectionId: string): Player | undefined {
    return room.players.find(p => p.id === connectionId);
  }

  addPlayer(room: Room, connectionId: string, username: string): AddPlayerResult {
    const wanted = username.toLowerCase();
    if (room.players.some(p => p.username.toLowerCase() === wanted)) {
      return { ok: false, reason: 'username_taken' };
    }
    const player: Player = {
      id: connectionId,
      username,
      score: 0,
      isDrawing: false,
      hasGuessedCorrectly: false,
    };
    room.players.push(player);
    return { ok: true, player };
  }

  removePlayer(room: Room, connectionId: string): boolean {
    const index = room.players.findIndex(p => p.id === connectionId);
    if (index === -1) return false;
    room.players.splice(index, 1);
    if (room.currentDrawerId === connectionId) room.currentDrawerId = null;
    if (room.players.length === 0) this.store.delete(room.code);
    return true;
  }

  /**
   * Hands the pen to the next player by list position and draws a fresh word.
   * The caller checks the player count; with an empty roster nothing changes
   * and `null` is returned.
   */
  startNewRound(room: Room): Player | null {
    if (room.players.length === 0) return null;
    for (const p of room.players) {
      p.hasGuessedCorrectly = false;
      p.isDrawing = false;
    }
    // indexOf is -1 on the first round (or after the drawer left), giving index 0
    const current = room.players.findIndex(p => p.id === room.currentDrawerId);
    const drawer = room.players[(current + 1) % room.players.length];
    drawer.isDrawing = true;
    room.currentDrawerId = drawer.id;
    room.currentWord = room.wordPool[Math.floor(this.random() * room.wordPool.length)];
    room.roundStartTime = this.now();
    room.roundNumber += 1;
    room.state = 'drawing';
    return drawer;
  }

  checkGuess(room: Room, connectionId: string, text: string): GuessResult {
    if (room.state !== 'drawing') return { correct: false };
    const player = this.findPlayer(room, connectionId);
    if (!player || player.hasGuessedCorrectly || player.isDrawing) return { correct: false };
    if (text.trim().toLowerCase() !== room.currentWord.toLowerCase()) return { correct: false };

    player.hasGuessedCorrectly = true;
    const points = this.scoreForGuess(room);
    player.score += points;
    return { correct: true, player, points };
  }

  scoreForGuess(room: Room): number {
    const elapsed = Math.max(0, Math.floor((this.now() - room.roundStartTime) / 1000));
    return BASE_GUESS_POINTS + Math.max(0, room.roundDurationSeconds - elapsed);
  }

  getMaskedWord(room: Room): string {
    return '_'.repeat(room.currentWord.length);
  }

  allGuessed(room: Room): boolean {
    return room.players
      .filter(p => p.id !== room.currentDrawerId)
      .every(p => p.hasGuessedCorrectly);
  }

  /** Closes the active round; `null` when no round is running. */
  endRound(room: Room): RoundSummary | null {
    if (room.state !== 'drawing') return null;
    const word = room.currentWord;
    room.state = 'round_end';
    room.currentWord = '';
    for (const p of room.players) p.isDrawing = false;
    return { word, players: this.rankedPlayers(room) };
  }

  rankedPlayers(room: Room): Player[] {
    return [...room.players].sort((a, b) => b.score - a.score);
  }

  appendChat(room: Room, username: string, text: string): ChatMessage {
    const message: ChatMessage = {
      username,
      text,
      timestamp: this.now(),
      isSystemMessage: false,
      isCorrectGuess: false,
    };
    room.chatHistory.push(message);
    return message;
  }

  appendSystemMessage(room: Room, text: string, isCorrectGuess = false): ChatMessage {
    const message: ChatMessage = {
      username: 'System',
      text,
      timestamp: this.now(),
      isSystemMessage: true,
      isCorrectGuess,
    };
    room.chatHistory.push(message);
    return message;
  }
}
