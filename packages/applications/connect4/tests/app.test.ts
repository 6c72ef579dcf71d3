import { createGameManifestTests, createGameRegistrationTests } from '@matchhall/framework-testing';
import { describe, expect, it } from 'vitest';
import { GAME_ID, GAME_MANIFEST, GAME_NAME, GAME_VERSION, registerGame } from '../src/index.js';

describe('connect4 game', () => {
  it('should export game identifier, name and version', () => {
    expect(GAME_ID).toBe('connect4');
    expect(GAME_NAME).toBe('Connect 4');
    expect(GAME_VERSION).toBe('1.0.0');
  });

  it('should seat exactly two players and end the match on timeout', () => {
    expect(GAME_MANIFEST.rules).toEqual({
      minPlayers: 2,
      maxPlayers: 2,
      maxSpectators: null,
      waitTimeMs: 0,
      timeoutPolicy: 'end_match',
      matchInactivityTimeoutMs: 600_000,
    });
    expect(GAME_MANIFEST.tracksScore).toBe(false);
  });

  createGameManifestTests(GAME_ID, GAME_MANIFEST);
  createGameRegistrationTests(GAME_ID, registerGame);
});
