import {
  AlreadyQueued,
  type LobbyRules,
  LobbyFull,
  NotHost,
  NotQueued,
  TooFewPlayers,
  UnknownGame,
} from '@matchhall/framework-protocol';
import { createMockRenderer, flushMicrotasks } from '@matchhall/framework-testing';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
  type EngineConfig,
  GameCatalog,
  type HostAuthority,
  LobbyRegistry,
  MatchRegistry,
  parseEngineConfig,
} from '../src/index.js';
import { countDefinition } from './helpers.js';

const PRIVATE_PAIR: Partial<LobbyRules> = { minPlayers: 2, maxPlayers: 2, maxSpectators: 0 };
const PUBLIC_WAIT: Partial<LobbyRules> = {
  minPlayers: 2,
  maxPlayers: 4,
  maxSpectators: null,
  waitTimeMs: 30_000,
};
const OPEN_TABLE: Partial<LobbyRules> = { minPlayers: 2, maxPlayers: 4, maxSpectators: null };

interface SetupOptions {
  config?: EngineConfig;
  authority?: HostAuthority;
}

function setup(rules: Partial<LobbyRules>, options: SetupOptions = {}) {
  const catalog = new GameCatalog();
  catalog.register(countDefinition(rules));
  const renderer = createMockRenderer();
  const matches = new MatchRegistry();
  const lobbies = new LobbyRegistry({ catalog, renderer, matches, ...options });
  const kinds = (identity: string) => renderer.viewsFor(identity).map((view) => view.kind);
  return { renderer, matches, lobbies, kinds };
}

let active: { lobbies: LobbyRegistry; matches: MatchRegistry } | null = null;

function track<T extends { lobbies: LobbyRegistry; matches: MatchRegistry }>(env: T): T {
  active = env;
  return env;
}

describe('LobbyRegistry', () => {
  beforeEach(() => {
    vi.useFakeTimers({ now: 0 });
    vi.spyOn(console, 'info').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    if (active) {
      await active.lobbies.dispose();
      await active.matches.dispose();
      await flushMicrotasks();
      active = null;
    }
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  describe('party bookkeeping', () => {
    it('should create a party lazily and return the same record afterwards', () => {
      const { lobbies } = track(setup(PUBLIC_WAIT));

      const created = lobbies.getOrCreate('count', null);

      expect(lobbies.getOrCreate('count', null)).toBe(created);
      expect(lobbies.find('count', 'alice')).toBeUndefined();
      expect(lobbies.size).toBe(1);
    });

    it('should prune an empty party', () => {
      const { lobbies } = track(setup(PUBLIC_WAIT));
      const created = lobbies.getOrCreate('count', 'alice');

      expect(lobbies.prune(created)).toBe(true);
      expect(lobbies.prune(created)).toBe(false);
      expect(lobbies.size).toBe(0);
    });

    it('should apply configured overrides to the declared rules', () => {
      const config = parseEngineConfig({ games: { count: { waitTimeMs: 5000 } } });
      const { lobbies } = track(setup(PUBLIC_WAIT, { config }));

      expect(lobbies.rulesFor('count')).toMatchObject({ minPlayers: 2, waitTimeMs: 5000 });
    });

    it('should reject unknown games', async () => {
      const { lobbies, renderer } = track(setup(PUBLIC_WAIT));

      await expect(lobbies.join('chess', null, 'alice')).rejects.toThrow(UnknownGame);
      expect(renderer.opened).toEqual([]);
    });
  });

  describe('join', () => {
    it('should render a placeholder, then the lobby', async () => {
      const { lobbies, renderer, kinds } = track(setup(PUBLIC_WAIT));

      await lobbies.join('count', null, 'alice');
      await flushMicrotasks();

      expect(kinds('alice')).toEqual(['placeholder', 'lobby']);
      expect(renderer.lastViewFor('alice')).toEqual({
        kind: 'lobby',
        gameId: 'count',
        hostId: null,
        players: ['alice'],
        spectators: [],
        spectatorsAllowed: true,
        startsAt: null,
        canStart: false,
      });
    });

    it('should refuse a second join by the same identity', async () => {
      const { lobbies } = track(setup(PUBLIC_WAIT));
      await lobbies.join('count', null, 'alice');

      await expect(lobbies.join('count', null, 'alice')).rejects.toThrow(AlreadyQueued);
      await expect(lobbies.spectate('count', null, 'alice')).rejects.toThrow(AlreadyQueued);
      await expect(lobbies.join('count', 'bob', 'alice')).rejects.toThrow(AlreadyQueued);
    });

    it('should refuse a player once a private party is at its cap', async () => {
      const { lobbies } = track(setup({ ...PRIVATE_PAIR, maxSpectators: 1 }));
      await lobbies.join('count', 'alice', 'alice');
      await lobbies.join('count', 'alice', 'bob');

      await expect(lobbies.join('count', 'alice', 'carol')).rejects.toThrow(LobbyFull);
    });

    it('should start synchronously once the party is full with no spectator seats', async () => {
      const { lobbies, matches } = track(setup(PRIVATE_PAIR));
      await lobbies.join('count', null, 'alice');
      expect(matches.size).toBe(0);

      await lobbies.join('count', null, 'bob');

      expect(matches.size).toBe(1);
      expect(matches.list()[0]?.game.players).toEqual(['alice', 'bob']);
      expect(lobbies.size).toBe(0);
    });

    it('should hand rendering from the lobby to the match in order', async () => {
      const { lobbies, renderer, kinds } = track(setup(PRIVATE_PAIR));

      await lobbies.join('count', 'alice', 'alice');
      await flushMicrotasks();
      await lobbies.join('count', 'alice', 'bob');
      await flushMicrotasks();

      expect(kinds('alice')).toEqual(['placeholder', 'lobby', 'match']);
      expect(kinds('bob')).toEqual(['placeholder', 'match']);
      expect(renderer.lastViewFor('bob')).toMatchObject({
        kind: 'match',
        viewer: 'bob',
        role: 'player',
        yourTurn: false,
        board: { total: 0, points: {}, turn: 'alice' },
      });
    });

    it('should wait for spectators when the party is full but spectator seats remain', async () => {
      const { lobbies, matches, renderer } = track(setup({ ...PRIVATE_PAIR, maxSpectators: 1 }));
      await lobbies.join('count', 'alice', 'alice');
      await lobbies.join('count', 'alice', 'bob');
      expect(matches.size).toBe(0);

      await lobbies.spectate('count', 'alice', 'sam');
      await flushMicrotasks();

      const match = matches.list()[0];
      expect(match?.game.players).toEqual(['alice', 'bob']);
      expect(match?.game.spectators).toEqual(['sam']);
      expect(renderer.lastViewFor('sam')).toMatchObject({ kind: 'match', role: 'spectator', yourTurn: false });
    });

    it('should keep filling new matches from the public queue', async () => {
      const { lobbies, matches } = track(setup({ minPlayers: 2, maxPlayers: 2, maxSpectators: null }));

      for (const identity of ['alice', 'bob', 'carol', 'dave']) {
        await lobbies.join('count', null, identity);
      }

      expect(matches.list().map((match) => match.game.players)).toEqual([
        ['alice', 'bob'],
        ['carol', 'dave'],
      ]);
      expect(lobbies.size).toBe(0);
    });

    it('should start the waiting match to make room in a full public queue', async () => {
      const { lobbies, matches } = track(setup({ ...PUBLIC_WAIT, maxPlayers: 2, maxSpectators: 1 }));
      await lobbies.join('count', null, 'alice');
      await lobbies.join('count', null, 'bob');
      expect(matches.size).toBe(0);

      await lobbies.join('count', null, 'carol');

      expect(matches.list()[0]?.game.players).toEqual(['alice', 'bob']);
      expect(lobbies.find('count', null)?.playerIds).toEqual(['carol']);
    });
  });

  describe('public start countdown', () => {
    it('should schedule a start once the minimum is reached', async () => {
      const { lobbies, matches, renderer } = track(setup(PUBLIC_WAIT));
      await lobbies.join('count', null, 'alice');
      await flushMicrotasks();
      await lobbies.join('count', null, 'bob');
      await flushMicrotasks();

      expect(renderer.lastViewFor('alice')).toMatchObject({ players: ['alice', 'bob'], startsAt: 30_000 });

      vi.advanceTimersByTime(29_999);
      expect(matches.size).toBe(0);
      vi.advanceTimersByTime(1);
      expect(matches.list()[0]?.game.players).toEqual(['alice', 'bob']);
      expect(lobbies.size).toBe(0);
    });

    it('should take late joiners along when the countdown fires', async () => {
      const { lobbies, matches } = track(setup(PUBLIC_WAIT));
      await lobbies.join('count', null, 'alice');
      await lobbies.join('count', null, 'bob');

      vi.advanceTimersByTime(10_000);
      await lobbies.join('count', null, 'carol');
      expect(lobbies.find('count', null)?.startsAt).toBe(30_000);

      vi.advanceTimersByTime(20_000);
      expect(matches.list()[0]?.game.players).toEqual(['alice', 'bob', 'carol']);
    });

    it('should cancel the countdown when a leave drops below the minimum', async () => {
      const { lobbies, matches } = track(setup(PUBLIC_WAIT));
      await lobbies.join('count', null, 'alice');
      await lobbies.join('count', null, 'bob');

      vi.advanceTimersByTime(10_000);
      await lobbies.leave('count', 'bob');
      expect(lobbies.find('count', null)?.startsAt).toBeNull();

      vi.advanceTimersByTime(60_000);
      expect(matches.size).toBe(0);
      expect(lobbies.find('count', null)?.playerIds).toEqual(['alice']);

      await lobbies.join('count', null, 'bob');
      expect(lobbies.find('count', null)?.startsAt).toBe(100_000);
    });

    it('should never count down in a private party', async () => {
      const { lobbies, matches } = track(setup({ ...OPEN_TABLE, waitTimeMs: 1000 }));
      await lobbies.join('count', 'alice', 'alice');
      await lobbies.join('count', 'alice', 'bob');

      vi.advanceTimersByTime(60_000);

      expect(matches.size).toBe(0);
      expect(lobbies.find('count', 'alice')?.startsAt).toBeNull();
    });
  });

  describe('spectate', () => {
    it('should refuse spectators when the game allows none', async () => {
      const { lobbies, renderer } = track(setup(PRIVATE_PAIR));

      await expect(lobbies.spectate('count', null, 'sam')).rejects.toThrow(LobbyFull);
      expect(renderer.opened).toEqual([]);
    });

    it('should refuse spectators beyond the cap', async () => {
      const { lobbies } = track(setup({ ...PUBLIC_WAIT, maxSpectators: 1 }));
      await lobbies.spectate('count', null, 'sam');

      await expect(lobbies.spectate('count', null, 'tom')).rejects.toThrow(LobbyFull);
      expect(lobbies.find('count', null)?.spectatorIds).toEqual(['sam']);
    });

    it('should show spectators in the lobby view', async () => {
      const { lobbies, renderer } = track(setup(PUBLIC_WAIT));
      await lobbies.join('count', null, 'alice');
      await flushMicrotasks();
      await lobbies.spectate('count', null, 'sam');
      await flushMicrotasks();

      expect(renderer.lastViewFor('alice')).toMatchObject({ players: ['alice'], spectators: ['sam'] });
      expect(lobbies.find('count', null)?.roleOf('sam')).toBe('spectator');
    });
  });

  describe('leave', () => {
    it('should succeed once and then fail with NotQueued', async () => {
      const { lobbies } = track(setup(PUBLIC_WAIT));
      await lobbies.join('count', null, 'alice');

      await lobbies.leave('count', 'alice');

      await expect(lobbies.leave('count', 'alice')).rejects.toThrow(NotQueued);
    });

    it('should leave a final summary behind', async () => {
      const { lobbies, renderer, kinds } = track(setup(PUBLIC_WAIT));
      await lobbies.join('count', null, 'alice');
      await flushMicrotasks();

      await lobbies.leave('count', 'alice');
      await flushMicrotasks();

      expect(kinds('alice')).toEqual(['placeholder', 'lobby', 'summary']);
      expect(renderer.lastViewFor('alice')).toEqual({
        kind: 'summary',
        gameId: 'count',
        viewer: 'alice',
        state: 'left',
        reason: null,
        outcome: null,
        board: null,
        score: null,
      });
      expect(lobbies.size).toBe(0);
    });

    it('should re-render the others', async () => {
      const { lobbies, renderer } = track(setup(PUBLIC_WAIT));
      await lobbies.join('count', null, 'alice');
      await lobbies.join('count', null, 'bob');
      await flushMicrotasks();

      await lobbies.leave('count', 'bob');
      await flushMicrotasks();

      expect(renderer.lastViewFor('alice')).toMatchObject({ players: ['alice'], startsAt: null });
    });

    it('should hold exactly the joins minus the leaves when requests interleave', async () => {
      const { lobbies, renderer } = track(setup({ minPlayers: 5, maxPlayers: null, maxSpectators: null }));
      const release = renderer.holdOpens();

      const joins = Promise.all(['a', 'b', 'c'].map((identity) => lobbies.join('count', 'host', identity)));
      await expect(lobbies.leave('count', 'a')).rejects.toThrow(NotQueued);
      release();
      await joins;

      await Promise.all([
        lobbies.leave('count', 'b'),
        lobbies.join('count', 'host', 'd'),
        lobbies.leave('count', 'a'),
        lobbies.join('count', 'host', 'b'),
      ]);

      expect(lobbies.find('count', 'host')?.playerIds).toEqual(['c', 'd', 'b']);
    });
  });

  describe('requests racing at the placeholder render', () => {
    it('should re-check spectator room after the placeholder opens', async () => {
      const { lobbies, renderer } = track(setup({ ...OPEN_TABLE, maxSpectators: 1 }));
      await lobbies.join('count', 'alice', 'alice');
      const release = renderer.holdOpens();

      const sam = lobbies.spectate('count', 'alice', 'sam');
      const tom = lobbies.spectate('count', 'alice', 'tom');
      release();
      const [samResult, tomResult] = await Promise.allSettled([sam, tom]);

      expect(samResult.status).toBe('fulfilled');
      expect(tomResult).toMatchObject({ status: 'rejected', reason: expect.any(LobbyFull) });
      expect(renderer.closedCount('tom')).toBe(1);
      expect(lobbies.find('count', 'alice')?.spectatorIds).toEqual(['sam']);
    });

    it('should queue an identity once when its joins race', async () => {
      const { lobbies, renderer } = track(setup(PUBLIC_WAIT));
      const release = renderer.holdOpens();

      const first = lobbies.join('count', null, 'alice');
      const second = lobbies.join('count', null, 'alice');
      release();
      const results = await Promise.allSettled([first, second]);

      expect(results.map((result) => result.status)).toEqual(['fulfilled', 'rejected']);
      expect(lobbies.find('count', null)?.playerIds).toEqual(['alice']);
    });

    it('should start exactly one match when the last seats race', async () => {
      const { lobbies, matches, renderer } = track(setup({ ...PRIVATE_PAIR, maxPlayers: 3 }));
      await lobbies.join('count', 'alice', 'alice');
      const release = renderer.holdOpens();

      const joins = ['bob', 'carol', 'dave'].map((identity) => lobbies.join('count', 'alice', identity));
      release();
      const results = await Promise.allSettled(joins);

      expect(matches.size).toBe(1);
      expect(matches.list()[0]?.game.players).toEqual(['alice', 'bob', 'carol']);
      expect(results.map((result) => result.status)).toEqual(['fulfilled', 'fulfilled', 'fulfilled']);
      expect(lobbies.find('count', 'alice')?.playerIds).toEqual(['dave']);
    });
  });

  describe('start', () => {
    it('should let the host start a party that reached the minimum', async () => {
      const { lobbies, renderer } = track(setup(OPEN_TABLE));
      await lobbies.join('count', 'alice', 'alice');
      await lobbies.join('count', 'alice', 'bob');
      await flushMicrotasks();
      expect(renderer.lastViewFor('bob')).toMatchObject({ kind: 'lobby', canStart: true });

      const match = await lobbies.start('count', 'alice', 'alice');

      expect(match.game.players).toEqual(['alice', 'bob']);
      expect(lobbies.size).toBe(0);
    });

    it('should refuse anyone but the host', async () => {
      const { lobbies } = track(setup(OPEN_TABLE));
      await lobbies.join('count', 'alice', 'alice');
      await lobbies.join('count', 'alice', 'bob');

      await expect(lobbies.start('count', 'alice', 'bob')).rejects.toThrow(NotHost);
      await expect(lobbies.start('count', null, 'alice')).rejects.toThrow(NotHost);
    });

    it('should refuse to start below the minimum', async () => {
      const { lobbies } = track(setup(OPEN_TABLE));
      await lobbies.join('count', 'alice', 'alice');

      await expect(lobbies.start('count', 'alice', 'alice')).rejects.toThrow(TooFewPlayers);
      await expect(lobbies.start('count', 'zoe', 'zoe')).rejects.toThrow(TooFewPlayers);
    });

    it('should consult the host authority', async () => {
      const authority: HostAuthority = {
        isAuthorizedHost: async (identity, hostId) => identity === 'moderator' || identity === hostId,
      };
      const { lobbies } = track(setup(OPEN_TABLE, { authority }));
      await lobbies.join('count', 'alice', 'alice');
      await lobbies.join('count', 'alice', 'bob');

      const match = await lobbies.start('count', 'alice', 'moderator');

      expect(match.game.players).toEqual(['alice', 'bob']);
    });

    it('should open a fresh party for the host after a start', async () => {
      const { lobbies } = track(setup(OPEN_TABLE));
      await lobbies.join('count', 'alice', 'alice');
      await lobbies.join('count', 'alice', 'bob');
      await lobbies.start('count', 'alice', 'alice');

      await lobbies.join('count', 'alice', 'carol');

      expect(lobbies.find('count', 'alice')?.playerIds).toEqual(['carol']);
    });
  });

  describe('lobby sessions', () => {
    it('should time out an idle participant', async () => {
      const config = parseEngineConfig({ lobby: { inactivityTimeoutMs: 5000 } });
      const { lobbies, renderer } = track(setup(PUBLIC_WAIT, { config }));
      await lobbies.join('count', null, 'alice');

      vi.advanceTimersByTime(5000);
      await flushMicrotasks();

      expect(renderer.lastViewFor('alice')).toMatchObject({ kind: 'summary', state: 'timed_out' });
      expect(lobbies.size).toBe(0);
    });

    it('should drop a participant whose rendering fails', async () => {
      vi.spyOn(console, 'warn').mockImplementation(() => undefined);
      const { lobbies, matches, renderer } = track(setup(PUBLIC_WAIT));
      await lobbies.join('count', null, 'alice');
      await lobbies.join('count', null, 'bob');
      await flushMicrotasks();

      renderer.failFor('bob');
      await lobbies.leave('count', 'alice');
      await flushMicrotasks();

      expect(lobbies.size).toBe(0);
      vi.advanceTimersByTime(30_000);
      expect(matches.size).toBe(0);
    });

    it('should end every session on dispose', async () => {
      const { lobbies, renderer } = track(setup(PUBLIC_WAIT));
      await lobbies.join('count', null, 'alice');
      await lobbies.spectate('count', null, 'sam');

      await lobbies.dispose();
      await flushMicrotasks();

      expect(renderer.lastViewFor('alice')).toMatchObject({ kind: 'summary', state: 'left' });
      expect(renderer.lastViewFor('sam')).toMatchObject({ kind: 'summary', state: 'left' });
      expect(lobbies.size).toBe(0);
    });
  });
});
