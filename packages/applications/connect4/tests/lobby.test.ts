import { GameCatalog, LobbyRegistry, MatchRegistry } from '@matchhall/framework-server';
import { createMockRenderer, flushMicrotasks } from '@matchhall/framework-testing';
import { afterEach, describe, expect, it } from 'vitest';
import { Connect4Game } from '../src/game/Connect4Game.js';
import { GAME_DEFINITION, GAME_MANIFEST } from '../src/index.js';

const EMPTY_ROW = [null, null, null, null, null, null, null];

describe('connect4 in the public queue', () => {
  let matches = new MatchRegistry();

  afterEach(async () => {
    await matches.dispose();
  });

  function createRegistry() {
    matches = new MatchRegistry();
    const catalog = new GameCatalog();
    catalog.register({
      ...GAME_DEFINITION,
      manifest: { ...GAME_MANIFEST, rules: { ...GAME_MANIFEST.rules, maxSpectators: 0 } },
    });
    const renderer = createMockRenderer();
    const lobbies = new LobbyRegistry({ catalog, renderer, matches });
    return { lobbies, renderer };
  }

  it('should start the match on the second join and show both players an empty board', async () => {
    const { lobbies, renderer } = createRegistry();

    await lobbies.join('connect4', null, 'alice');
    expect(matches.size).toBe(0);

    await lobbies.join('connect4', null, 'bob');
    expect(matches.size).toBe(1);
    expect(lobbies.size).toBe(0);

    await flushMicrotasks();
    expect(renderer.lastViewFor('alice')).toMatchObject({
      kind: 'match',
      role: 'player',
      yourTurn: false,
      board: { cells: Array.from({ length: 7 }, () => EMPTY_ROW), nextTurn: 'blue', viewerColor: 'red' },
    });
    expect(renderer.lastViewFor('bob')).toMatchObject({
      kind: 'match',
      yourTurn: true,
      board: { nextTurn: 'blue', viewerColor: 'blue' },
    });
  });

  it('should keep the match running after four non-winning moves in one column', async () => {
    const { lobbies } = createRegistry();
    await lobbies.join('connect4', null, 'alice');
    await lobbies.join('connect4', null, 'bob');

    for (const player of ['bob', 'alice', 'bob', 'alice']) {
      await matches.play('connect4', player, { column: 3 });
    }

    const game = matches.list()[0]?.game;
    if (!(game instanceof Connect4Game)) throw new Error('expected a connect4 match');
    expect(game.hasEnded()).toBe(false);
    expect(game.winner()).toBe('not_over');
    expect(game.cellAt(3, 3)).toBe('red');
  });
});
