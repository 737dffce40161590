import {
  Audience,
  ClientCommand,
  ErrorMessages,
  ServerEvent,
  snapshotPlayers,
  toConnection,
  toRoom,
  toRoomExcept,
} from './events';
import { GameEngine } from './gameEngine';
import { RoundTimer } from './roundTimer';
import { Room } from './types';

export const MIN_PLAYERS_TO_START = 2;
const MAX_MESSAGE_LENGTH = 200;

/** What the gateway needs from the real-time transport. */
export interface Transport {
  deliver(audience: Audience, event: ServerEvent): void;
  join(connectionId: string, roomCode: string): void;
  leave(connectionId: string, roomCode: string): void;
}

export type GatewayOptions = {
  maxUsernameLength?: number;
};

/**
 * Maps connections to rooms and turns client commands into engine calls and
 * outbound deliveries.
 *
 * Every handler runs synchronously from validation through the last
 * `deliver`, so commands touching one room are applied one at a time and all
 * members see that room's events in the same order. Rejected commands mutate
 * nothing.
 */
export class GameGateway {
  private sessions: Map<string, string> = new Map(); // connection id -> room code
  private maxUsernameLength: number;

  constructor(
    private readonly engine: GameEngine,
    private readonly transport: Transport,
    private readonly timer: RoundTimer,
    options: GatewayOptions = {},
  ) {
    this.maxUsernameLength = options.maxUsernameLength ?? 20;
  }

  roomOf(connectionId: string): string | undefined {
    return this.sessions.get(connectionId);
  }

  handle(connectionId: string, command: ClientCommand) {
    switch (command.type) {
      case 'create_room':
        return this.createRoom(connectionId, command.username);
      case 'join_room':
        return this.joinRoom(connectionId, command.roomCode, command.username);
      case 'start_game':
        return this.startGame(connectionId, command.roomCode);
      case 'send_drawing': {
        const room = this.drawerRoom(connectionId, command.roomCode);
        if (room && room.state === 'drawing') {
          this.send(toRoomExcept(room.code, connectionId), { type: 'drawing', payload: { stroke: command.stroke } });
        }
        return;
      }
      case 'clear_canvas': {
        const room = this.drawerRoom(connectionId, command.roomCode);
        if (room) this.send(toRoom(room.code), { type: 'clear_canvas', payload: {} });
        return;
      }
      case 'send_message':
        return this.sendMessage(connectionId, command.roomCode, command.text);
      case 'end_round': {
        const room = this.memberRoom(connectionId, command.roomCode);
        if (room) this.finishRound(room);
        return;
      }
      case 'next_round':
        return this.nextRound(connectionId, command.roomCode);
      case 'leave_room':
        return this.detach(connectionId);
    }
  }

  /** Runs the leave side effects once; later calls for the same connection do nothing. */
  disconnect(connectionId: string) {
    this.detach(connectionId);
  }

  private createRoom(connectionId: string, rawUsername: string) {
    const username = this.cleanUsername(rawUsername);
    if (!username) return this.fail(connectionId, ErrorMessages.usernameRequired);

    this.detach(connectionId);
    const room = this.engine.createRoom();
    this.engine.addPlayer(room, connectionId, username);
    this.attach(connectionId, room.code);
    console.log(`[room] ${room.code} created by ${username}`);
    this.send(toConnection(connectionId), {
      type: 'room_created',
      payload: { roomCode: room.code, players: snapshotPlayers(room.players) },
    });
  }

  private joinRoom(connectionId: string, roomCode: string, rawUsername: string) {
    const username = this.cleanUsername(rawUsername);
    if (!username) return this.fail(connectionId, ErrorMessages.usernameRequired);
    const room = this.engine.store.get(roomCode);
    if (!room) return this.fail(connectionId, ErrorMessages.roomNotFound);
    if (this.sessions.get(connectionId) === room.code) return this.sendJoined(connectionId, room);

    const lowered = username.toLowerCase();
    if (room.players.some(p => p.username.toLowerCase() === lowered)) {
      return this.fail(connectionId, ErrorMessages.usernameTaken);
    }
    this.detach(connectionId);
    const added = this.engine.addPlayer(room, connectionId, username);
    if (!added.ok) return this.fail(connectionId, ErrorMessages.usernameTaken);

    this.attach(connectionId, room.code);
    const message = this.engine.appendSystemMessage(room, `${username} joined the room`);
    this.sendJoined(connectionId, room);
    this.send(toRoom(room.code), { type: 'player_list', payload: { players: snapshotPlayers(room.players) } });
    this.send(toRoom(room.code), { type: 'chat_message', payload: { ...message } });
  }

  private startGame(connectionId: string, roomCode: string) {
    const room = this.memberRoom(connectionId, roomCode);
    if (!room) return;
    if (room.players.length < MIN_PLAYERS_TO_START) return this.fail(connectionId, ErrorMessages.notEnoughPlayers);
    // a second start while a round is running or over is stale
    if (room.state !== 'waiting') return;
    this.beginRound(room);
  }

  private nextRound(connectionId: string, roomCode: string) {
    const room = this.memberRoom(connectionId, roomCode);
    if (!room) return;
    if (room.players.length < MIN_PLAYERS_TO_START) return this.fail(connectionId, ErrorMessages.notEnoughPlayers);
    if (room.state !== 'round_end') return;
    this.send(toRoom(room.code), { type: 'clear_canvas', payload: {} });
    this.beginRound(room);
  }

  private sendMessage(connectionId: string, roomCode: string, rawText: string) {
    const room = this.memberRoom(connectionId, roomCode);
    if (!room) return;
    const player = this.engine.findPlayer(room, connectionId);
    const text = rawText.trim().slice(0, MAX_MESSAGE_LENGTH);
    if (!player || !text) return;

    const result = player.isDrawing ? { correct: false as const } : this.engine.checkGuess(room, connectionId, text);
    if (!result.correct) {
      const message = this.engine.appendChat(room, player.username, text);
      this.send(toRoom(room.code), { type: 'chat_message', payload: { ...message } });
      return;
    }

    const notice = this.engine.appendSystemMessage(room, `${player.username} guessed the word!`, true);
    this.send(toRoom(room.code), {
      type: 'correct_guess',
      payload: { username: player.username, points: result.points, score: player.score },
    });
    this.send(toRoom(room.code), { type: 'chat_message', payload: { ...notice } });
    this.send(toRoom(room.code), { type: 'player_list', payload: { players: snapshotPlayers(room.players) } });
    if (this.engine.allGuessed(room)) this.finishRound(room);
  }

  private beginRound(room: Room) {
    const drawer = this.engine.startNewRound(room);
    if (!drawer) return;
    const duration = room.roundDurationSeconds;
    const roundNumber = room.roundNumber;
    this.send(toConnection(drawer.id), {
      type: 'your_turn',
      payload: { word: room.currentWord, duration, roundNumber },
    });
    this.send(toRoomExcept(room.code, drawer.id), {
      type: 'round_started',
      payload: {
        drawer: drawer.username,
        maskedWord: this.engine.getMaskedWord(room),
        wordLength: room.currentWord.length,
        duration,
        roundNumber,
      },
    });
    this.send(toRoom(room.code), { type: 'player_list', payload: { players: snapshotPlayers(room.players) } });
    console.log(`[room] ${room.code} round ${roundNumber} started, drawer ${drawer.username}`);

    const code = room.code;
    this.timer.start(code, duration, {
      onTick: secondsLeft => this.send(toRoom(code), { type: 'timer', payload: { secondsLeft } }),
      onExpire: () => {
        const live = this.engine.store.get(code);
        if (live) this.finishRound(live);
      },
    });
  }

  // Both the countdown and clients can end a round; only the first call does anything.
  private finishRound(room: Room) {
    const summary = this.engine.endRound(room);
    if (!summary) return;
    this.timer.cancel(room.code);
    console.log(`[room] ${room.code} round ${room.roundNumber} ended, word was ${summary.word}`);
    this.send(toRoom(room.code), {
      type: 'round_ended',
      payload: { word: summary.word, players: snapshotPlayers(summary.players) },
    });
  }

  private detach(connectionId: string) {
    const roomCode = this.sessions.get(connectionId);
    if (roomCode === undefined) return;
    // drop the session first so a concurrent leave/disconnect finds nothing to do
    this.sessions.delete(connectionId);
    this.transport.leave(connectionId, roomCode);

    const room = this.engine.store.get(roomCode);
    if (!room) return;
    const player = this.engine.findPlayer(room, connectionId);
    const wasDrawing = room.state === 'drawing' && room.currentDrawerId === connectionId;
    if (!player || !this.engine.removePlayer(room, connectionId)) return;

    if (room.players.length === 0) {
      this.timer.cancel(roomCode);
      console.log(`[room] ${roomCode} deleted (empty)`);
      return;
    }

    const message = this.engine.appendSystemMessage(room, `${player.username} left the room`);
    this.send(toRoom(roomCode), { type: 'player_list', payload: { players: snapshotPlayers(room.players) } });
    this.send(toRoom(roomCode), { type: 'chat_message', payload: { ...message } });
    if (room.state === 'drawing' && (wasDrawing || this.engine.allGuessed(room))) this.finishRound(room);
  }

  private attach(connectionId: string, roomCode: string) {
    this.sessions.set(connectionId, roomCode);
    this.transport.join(connectionId, roomCode);
  }

  private sendJoined(connectionId: string, room: Room) {
    this.send(toConnection(connectionId), {
      type: 'room_joined',
      payload: {
        roomCode: room.code,
        players: snapshotPlayers(room.players),
        chatHistory: room.chatHistory.map(m => ({ ...m })),
        state: room.state,
      },
    });
  }

  private memberRoom(connectionId: string, roomCode: string): Room | null {
    const room = this.engine.store.get(roomCode);
    if (!room) {
      this.fail(connectionId, ErrorMessages.roomNotFound);
      return null;
    }
    if (!this.engine.findPlayer(room, connectionId)) {
      this.fail(connectionId, ErrorMessages.notInRoom);
      return null;
    }
    return room;
  }

  // Drawer checks fail silently: a non-drawer sending strokes is out of sync, not misusing the UI
  private drawerRoom(connectionId: string, roomCode: string): Room | null {
    const room = this.engine.store.get(roomCode);
    if (!room || room.currentDrawerId !== connectionId) return null;
    return room;
  }

  private cleanUsername(raw: string): string {
    return raw.trim().slice(0, this.maxUsernameLength);
  }

  private fail(connectionId: string, message: string) {
    this.send(toConnection(connectionId), { type: 'error_message', payload: { message } });
  }

  private send(audience: Audience, event: ServerEvent) {
    this.transport.deliver(audience, event);
  }
}
