import { IllegalMove, InvariantViolation, NotYourTurn } from '@matchhall/framework-protocol';
import { createTestMatchContext } from '@matchhall/framework-testing';
import { describe, expect, it, vi } from 'vitest';
import { Connect4Game } from '../../src/game/Connect4Game.js';

const BLUE = 'alice';
const RED = 'bob';

function createGame(): Connect4Game {
  return new Connect4Game(createTestMatchContext({ gameId: 'connect4', players: [RED, BLUE] }));
}

// Play columns alternately, starting with blue
function playColumns(game: Connect4Game, columns: number[]): void {
  for (const column of columns) {
    const player = game.nextTurn === 'blue' ? BLUE : RED;
    game.play(player, { column });
  }
}

describe('Connect4Game', () => {
  describe('constructor', () => {
    it('should start with an empty board and blue to move', () => {
      const game = createGame();
      const board = game.render(BLUE);

      expect(board.cells).toHaveLength(7);
      for (const row of board.cells) {
        expect(row).toEqual([null, null, null, null, null, null, null]);
      }
      expect(board.nextTurn).toBe('blue');
      expect(game.currentPlayer()).toBe(BLUE);
      expect(game.hasEnded()).toBe(false);
      expect(game.winner()).toBe('not_over');
    });

    it('should seat the first joiner as red and the second, who moves first, as blue', () => {
      const game = createGame();

      expect(game.colorOf(BLUE)).toBe('blue');
      expect(game.colorOf(RED)).toBe('red');
      expect(game.colorOf('carol')).toBeNull();
    });

    it('should reject anything but two players', () => {
      const context = createTestMatchContext({ gameId: 'connect4', players: ['a', 'b', 'c'] });

      expect(() => new Connect4Game(context)).toThrow(InvariantViolation);
    });
  });

  describe('update', () => {
    it('should drop pieces to the lowest empty row', () => {
      const game = createGame();

      expect(game.update({ column: 3 })).toEqual({ row: 6, column: 3, color: 'blue' });
      expect(game.update({ column: 3 })).toEqual({ row: 5, column: 3, color: 'red' });
      expect(game.cellAt(6, 3)).toBe('blue');
      expect(game.cellAt(5, 3)).toBe('red');
    });

    it('should leave the game running after four alternating drops in one column', () => {
      const game = createGame();

      playColumns(game, [3, 3, 3, 3]);

      expect(game.hasEnded()).toBe(false);
      expect(game.winner()).toBe('not_over');
      expect(game.nextTurn).toBe('blue');
    });

    it('should reject a drop into a full column', () => {
      const game = createGame();
      playColumns(game, [0, 0, 0, 0, 0, 0, 0]);

      expect(() => game.play(RED, { column: 0 })).toThrow(new IllegalMove('column 0 is full'));
      expect(game.nextTurn).toBe('red');
    });

    it('should refuse updates once the game ended', () => {
      const game = createGame();
      playColumns(game, [0, 1, 0, 1, 0, 1, 0]);

      expect(() => game.update({ column: 5 })).toThrow(InvariantViolation);
    });
  });

  describe('win detection', () => {
    it('should detect a vertical run', () => {
      const game = createGame();

      playColumns(game, [0, 1, 0, 1, 0, 1, 0]);

      expect(game.hasEnded()).toBe(true);
      expect(game.endReason).toBe('completed');
      expect(game.winner(BLUE)).toBe('won');
      expect(game.winner(RED)).toBe('drawn_or_lost');
    });

    it('should detect a horizontal run', () => {
      const game = createGame();

      playColumns(game, [0, 0, 1, 1, 2, 2, 3]);

      expect(game.winningColor()).toBe('blue');
      expect(game.winner()).toBe('won');
    });

    it('should detect a diagonal run', () => {
      const game = createGame();

      // Blue climbs from (6,0) to (3,3); red fills beneath
      playColumns(game, [0, 1, 1, 2, 2, 3, 2, 3, 3, 6, 3]);

      expect(game.winningColor()).toBe('blue');
      expect(game.winner(RED)).toBe('drawn_or_lost');
    });
  });

  describe('play', () => {
    it('should reject a move out of turn', () => {
      const game = createGame();

      expect(() => game.play(RED, { column: 0 })).toThrow(NotYourTurn);
    });

    it('should publish move_made and then game_over on a winning move', () => {
      const context = createTestMatchContext({ gameId: 'connect4', players: [RED, BLUE] });
      const game = new Connect4Game(context);
      playColumns(game, [0, 1, 0, 1, 0, 1]);
      const publish = vi.spyOn(context.events, 'publish');

      game.play(BLUE, { column: 0 });

      expect(publish.mock.calls).toEqual([
        [{ type: 'move_made', origin: BLUE }],
        [{ type: 'game_over', origin: BLUE, reason: 'completed' }],
      ]);
    });
  });

  describe('parseMove', () => {
    it('should accept a column on the board', () => {
      expect(createGame().parseMove({ column: 6 })).toEqual({ column: 6 });
    });

    it('should reject columns off the board', () => {
      const game = createGame();

      expect(() => game.parseMove({ column: 7 })).toThrow(IllegalMove);
      expect(() => game.parseMove({ column: -1 })).toThrow(IllegalMove);
      expect(() => game.parseMove({ column: 'three' })).toThrow(IllegalMove);
    });
  });

  describe('render', () => {
    it('should show the viewer its color and spectators none', () => {
      const game = createGame();

      expect(game.render(RED).viewerColor).toBe('red');
      expect(game.render('carol').viewerColor).toBeNull();
      expect(game.render('carol').players).toEqual({ blue: BLUE, red: RED });
    });

    it('should return a copy of the board', () => {
      const game = createGame();
      const before = game.render(BLUE);

      game.update({ column: 2 });

      expect(before.cells[6]?.[2]).toBeNull();
      expect(game.render(BLUE).cells[6]?.[2]).toBe('blue');
    });
  });

  describe('timeout policy', () => {
    it('should end the match with no winner when a player times out', () => {
      const game = createGame();
      game.play(BLUE, { column: 0 });

      game.depart(RED, 'timed_out');

      expect(game.endReason).toBe('timeout');
      expect(game.winner(BLUE)).toBe('drawn_or_lost');
      expect(game.winner(RED)).toBe('drawn_or_lost');
    });
  });
});
