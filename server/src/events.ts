import { ChatMessage, DrawingStroke, Player, RoomState } from './types';

// ---- server -> client ----

export type ServerEvent =
  | { type: 'room_created'; payload: { roomCode: string; players: Player[] } }
  | {
      type: 'room_joined';
      payload: { roomCode: string; players: Player[]; chatHistory: ChatMessage[]; state: RoomState };
    }
  | { type: 'player_list'; payload: { players: Player[] } }
  | { type: 'chat_message'; payload: ChatMessage }
  | { type: 'your_turn'; payload: { word: string; duration: number; roundNumber: number } }
  | {
      type: 'round_started';
      payload: { drawer: string; maskedWord: string; wordLength: number; duration: number; roundNumber: number };
    }
  | { type: 'drawing'; payload: { stroke: DrawingStroke } }
  | { type: 'clear_canvas'; payload: Record<string, never> }
  | { type: 'correct_guess'; payload: { username: string; points: number; score: number } }
  | { type: 'round_ended'; payload: { word: string; players: Player[] } }
  | { type: 'timer'; payload: { secondsLeft: number } }
  | { type: 'error_message'; payload: { message: string } };

export type ServerEventType = ServerEvent['type'];

export type Audience =
  | { kind: 'connection'; connectionId: string }
  | { kind: 'room'; roomCode: string }
  | { kind: 'room_except'; roomCode: string; connectionId: string };

export type Delivery = {
  audience: Audience;
  event: ServerEvent;
};

export const toConnection = (connectionId: string): Audience => ({ kind: 'connection', connectionId });
export const toRoom = (roomCode: string): Audience => ({ kind: 'room', roomCode });
export const toRoomExcept = (roomCode: string, connectionId: string): Audience => ({
  kind: 'room_except',
  roomCode,
  connectionId,
});

/** Copies so a queued event never reflects later mutations of the room. */
export function snapshotPlayers(players: readonly Player[]): Player[] {
  return players.map(p => ({ ...p }));
}

// ---- client -> server ----

export type ClientCommand =
  | { type: 'create_room'; username: string }
  | { type: 'join_room'; roomCode: string; username: string }
  | { type: 'start_game'; roomCode: string }
  | { type: 'send_drawing'; roomCode: string; stroke: DrawingStroke }
  | { type: 'send_message'; roomCode: string; text: string }
  | { type: 'end_round'; roomCode: string }
  | { type: 'next_round'; roomCode: string }
  | { type: 'clear_canvas'; roomCode: string }
  | { type: 'leave_room' };

export type ClientCommandType = ClientCommand['type'];

export const ErrorMessages = {
  roomNotFound: 'Room not found',
  usernameTaken: 'Username already taken in this room',
  notEnoughPlayers: 'Need at least 2 players to start',
  usernameRequired: 'Username is required',
  notInRoom: 'You are not in this room',
  internal: 'Internal server error',
} as const;
