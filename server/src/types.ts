export type Player = {
  id: string; // socket id of the live connection
  username: string;
  score: number;
  isDrawing: boolean;
  hasGuessedCorrectly: boolean;
};

// 'choosing_word' and 'game_end' are reserved for a word-choice phase and a final scoreboard
export type RoomState = 'waiting' | 'drawing' | 'round_end';

export type ChatMessage = {
  username: string;
  text: string;
  timestamp: number;
  isSystemMessage: boolean;
  isCorrectGuess: boolean;
};

export type Room = {
  readonly code: string;
  players: Player[];
  currentDrawerId: string | null;
  currentWord: string;
  readonly wordPool: readonly string[];
  roundNumber: number;
  roundStartTime: number;
  roundDurationSeconds: number;
  state: RoomState;
  chatHistory: ChatMessage[];
  createdAt: number;
};

export type Point = {
  x: number;
  y: number;
};

// Relayed to other clients as-is; the server never interprets it
export type DrawingStroke = {
  start: Point;
  end: Point;
  color: string;
  width: number;
  action: string;
};
