import { beforeEach, describe, expect, it } from 'vitest';
import { GameEngine } from './gameEngine';
import { RoomStore } from './roomStore';
import { Room } from './types';

describe('GameEngine', () => {
  let store: RoomStore;
  let engine: GameEngine;
  let clock: number;
  let roll: number;

  beforeEach(() => {
    store = new RoomStore();
    clock = 1_000_000;
    roll = 0;
    engine = new GameEngine(store, {
      wordPool: ['apple', 'ice cream'],
      roundDurationSeconds: 80,
      now: () => clock,
      random: () => roll,
    });
  });

  function roomWith(...names: string[]): Room {
    const room = engine.createRoom();
    for (const name of names) engine.addPlayer(room, `c-${name.toLowerCase()}`, name);
    return room;
  }

  const drawers = (room: Room) => room.players.filter(p => p.isDrawing).map(p => p.username);

  describe('createRoom', () => {
    it('starts rooms in the waiting state', () => {
      const room = engine.createRoom('ab12cd');
      expect(room).not.toBeNull();
      expect(room?.code).toBe('AB12CD');
      expect(room?.state).toBe('waiting');
      expect(room?.roundNumber).toBe(0);
      expect(room?.roundDurationSeconds).toBe(80);
      expect(engine.createRoom('AB12CD')).toBeNull();
    });

    it('generates a fresh code and gives up when every draw collides', () => {
      expect(engine.createRoom().code).toBe('AAAAAA');
      expect(() => engine.createRoom()).toThrow('No room code available');
      expect(store.size).toBe(1);
    });
  });

  describe('addPlayer', () => {
    it('appends players in join order', () => {
      const room = roomWith('Alice', 'Bob');
      expect(room.players.map(p => p.username)).toEqual(['Alice', 'Bob']);
      expect(room.players[1]).toEqual({
        id: 'c-bob',
        username: 'Bob',
        score: 0,
        isDrawing: false,
        hasGuessedCorrectly: false,
      });
    });

    it('rejects a name that differs only in case', () => {
      const room = roomWith('Alice');
      expect(engine.addPlayer(room, 'c-other', 'alice')).toEqual({ ok: false, reason: 'username_taken' });
      expect(room.players).toHaveLength(1);
    });
  });

  describe('removePlayer', () => {
    it('removes exactly one member and ignores strangers', () => {
      const room = roomWith('Alice', 'Bob');
      expect(engine.removePlayer(room, 'c-nobody')).toBe(false);
      expect(room.players).toHaveLength(2);
      expect(engine.removePlayer(room, 'c-bob')).toBe(true);
      expect(room.players.map(p => p.username)).toEqual(['Alice']);
      expect(store.has(room.code)).toBe(true);
    });

    it('deletes the room when the last player leaves', () => {
      const room = roomWith('Alice');
      expect(engine.removePlayer(room, 'c-alice')).toBe(true);
      expect(store.has(room.code)).toBe(false);
    });

    it('clears the drawer when the drawer leaves', () => {
      const room = roomWith('Alice', 'Bob');
      engine.startNewRound(room);
      engine.removePlayer(room, 'c-alice');
      expect(room.currentDrawerId).toBeNull();
    });
  });

  describe('startNewRound', () => {
    it('starts with the first player and sets up the round', () => {
      const room = roomWith('Alice', 'Bob');
      const drawer = engine.startNewRound(room);
      expect(drawer?.username).toBe('Alice');
      expect(room.currentDrawerId).toBe('c-alice');
      expect(room.currentWord).toBe('apple');
      expect(room.roundStartTime).toBe(1_000_000);
      expect(room.roundNumber).toBe(1);
      expect(room.state).toBe('drawing');
    });

    it('rotates by list position and wraps around', () => {
      const room = roomWith('Alice', 'Bob', 'Carol');
      const order: string[] = [];
      for (let i = 0; i < 4; i++) {
        engine.startNewRound(room);
        order.push(...drawers(room));
      }
      expect(order).toEqual(['Alice', 'Bob', 'Carol', 'Alice']);
      expect(room.roundNumber).toBe(4);
    });

    it('recomputes the next drawer from the current roster', () => {
      const room = roomWith('Alice', 'Bob', 'Carol');
      engine.startNewRound(room);
      engine.removePlayer(room, 'c-bob');
      engine.startNewRound(room);
      expect(drawers(room)).toEqual(['Carol']);
    });

    it('falls back to the first player when the drawer has left', () => {
      const room = roomWith('Alice', 'Bob', 'Carol');
      engine.startNewRound(room);
      engine.startNewRound(room);
      engine.removePlayer(room, 'c-bob');
      engine.startNewRound(room);
      expect(drawers(room)).toEqual(['Alice']);
    });

    it('resets guesses and keeps a single drawer', () => {
      const room = roomWith('Alice', 'Bob');
      engine.startNewRound(room);
      engine.checkGuess(room, 'c-bob', 'apple');
      engine.startNewRound(room);
      expect(room.players.map(p => p.hasGuessedCorrectly)).toEqual([false, false]);
      expect(drawers(room)).toEqual(['Bob']);
    });

    it('returns null for an empty roster', () => {
      const room = engine.createRoom();
      expect(engine.startNewRound(room)).toBeNull();
      expect(room.state).toBe('waiting');
    });
  });

  describe('checkGuess', () => {
    let room: Room;

    beforeEach(() => {
      room = roomWith('Alice', 'Bob', 'Carol');
      engine.startNewRound(room);
    });

    it('awards the base plus the full bonus at the start of the round', () => {
      const result = engine.checkGuess(room, 'c-bob', '  APPLE ');
      expect(result.correct).toBe(true);
      expect(result.correct && result.points).toBe(180);
      expect(room.players[1].score).toBe(180);
      expect(room.players[1].hasGuessedCorrectly).toBe(true);
    });

    it('floors elapsed seconds and decays the bonus', () => {
      clock += 30_900;
      expect(engine.checkGuess(room, 'c-bob', 'apple')).toMatchObject({ correct: true, points: 150 });
      clock += 10_000;
      expect(engine.checkGuess(room, 'c-carol', 'apple')).toMatchObject({ correct: true, points: 140 });
    });

    it('never awards less than the base', () => {
      clock += 500_000;
      expect(engine.checkGuess(room, 'c-bob', 'apple')).toMatchObject({ correct: true, points: 100 });
    });

    it('is false and score-neutral after a correct guess', () => {
      engine.checkGuess(room, 'c-bob', 'apple');
      expect(engine.checkGuess(room, 'c-bob', 'apple')).toEqual({ correct: false });
      expect(room.players[1].score).toBe(180);
    });

    it('ignores the drawer, strangers and wrong words', () => {
      expect(engine.checkGuess(room, 'c-alice', 'apple')).toEqual({ correct: false });
      expect(engine.checkGuess(room, 'c-nobody', 'apple')).toEqual({ correct: false });
      expect(engine.checkGuess(room, 'c-bob', 'apples')).toEqual({ correct: false });
      expect(room.players.map(p => p.score)).toEqual([0, 0, 0]);
      expect(room.players[1].hasGuessedCorrectly).toBe(false);
    });

    it('is false once the round is over', () => {
      engine.endRound(room);
      expect(engine.checkGuess(room, 'c-bob', 'apple')).toEqual({ correct: false });
    });
  });

  describe('getMaskedWord', () => {
    it('masks every character, spaces included', () => {
      roll = 0.5;
      const room = roomWith('Alice', 'Bob');
      engine.startNewRound(room);
      expect(room.currentWord).toBe('ice cream');
      expect(engine.getMaskedWord(room)).toBe('_________');
    });

    it('is empty outside a round', () => {
      expect(engine.getMaskedWord(roomWith('Alice'))).toBe('');
    });
  });

  describe('endRound', () => {
    it('reveals the word and ranks players by score', () => {
      const room = roomWith('Alice', 'Bob', 'Carol');
      engine.startNewRound(room);
      clock += 20_000;
      engine.checkGuess(room, 'c-carol', 'apple');
      const summary = engine.endRound(room);
      expect(summary?.word).toBe('apple');
      expect(summary?.players.map(p => [p.username, p.score])).toEqual([
        ['Carol', 160],
        ['Alice', 0],
        ['Bob', 0],
      ]);
      expect(room.state).toBe('round_end');
      expect(room.currentWord).toBe('');
      expect(drawers(room)).toEqual([]);
    });

    it('does nothing twice', () => {
      const room = roomWith('Alice', 'Bob');
      engine.startNewRound(room);
      engine.endRound(room);
      expect(engine.endRound(room)).toBeNull();
    });
  });

  describe('allGuessed', () => {
    it('waits for every non-drawer', () => {
      const room = roomWith('Alice', 'Bob', 'Carol');
      engine.startNewRound(room);
      engine.checkGuess(room, 'c-bob', 'apple');
      expect(engine.allGuessed(room)).toBe(false);
      engine.checkGuess(room, 'c-carol', 'apple');
      expect(engine.allGuessed(room)).toBe(true);
    });
  });

  describe('chat', () => {
    it('appends player and system messages in order', () => {
      const room = roomWith('Alice');
      engine.appendChat(room, 'Alice', 'hello');
      engine.appendSystemMessage(room, 'Bob guessed the word!', true);
      expect(room.chatHistory).toEqual([
        { username: 'Alice', text: 'hello', timestamp: 1_000_000, isSystemMessage: false, isCorrectGuess: false },
        {
          username: 'System',
          text: 'Bob guessed the word!',
          timestamp: 1_000_000,
          isSystemMessage: true,
          isCorrectGuess: true,
        },
      ]);
    });
  });
});
