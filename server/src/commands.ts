import { ClientCommand, ClientCommandType } from './events';
import { DrawingStroke, Point } from './types';

export const COMMAND_TYPES: readonly ClientCommandType[] = [
  'create_room',
  'join_room',
  'start_game',
  'send_drawing',
  'send_message',
  'end_round',
  'next_round',
  'clear_canvas',
  'leave_room',
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function text(value: unknown): string {
  return typeof value === 'string' ? value : '';
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

function parsePoint(value: unknown): Point | null {
  if (!isRecord(value) || !isFiniteNumber(value.x) || !isFiniteNumber(value.y)) return null;
  return { x: value.x, y: value.y };
}

export function parseStroke(value: unknown): DrawingStroke | null {
  if (!isRecord(value)) return null;
  const start = parsePoint(value.start);
  const end = parsePoint(value.end);
  if (!start || !end) return null;
  if (typeof value.color !== 'string' || !isFiniteNumber(value.width) || typeof value.action !== 'string') {
    return null;
  }
  return { start, end, color: value.color, width: value.width, action: value.action };
}

/**
 * Turns a raw socket payload into a command. Missing strings become empty
 * (the gateway answers those with a proper error); a stroke that does not
 * have the expected shape makes the whole command `null`.
 */
export function parseCommand(type: ClientCommandType, payload: unknown): ClientCommand | null {
  const body = isRecord(payload) ? payload : {};
  const roomCode = text(body.roomCode);
  switch (type) {
    case 'create_room':
      return { type, username: text(body.username) };
    case 'join_room':
      return { type, roomCode, username: text(body.username) };
    case 'send_drawing': {
      const stroke = parseStroke(body.stroke);
      return stroke ? { type, roomCode, stroke } : null;
    }
    case 'send_message':
      return { type, roomCode, text: text(body.text) };
    case 'start_game':
    case 'end_round':
    case 'next_round':
    case 'clear_canvas':
      return { type, roomCode };
    case 'leave_room':
      return { type };
  }
}
