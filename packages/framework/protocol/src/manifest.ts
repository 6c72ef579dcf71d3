/**
 * @fileoverview Game manifests.
 *
 * A manifest is the metadata a game package declares so the engine can
 * queue players for it: display data plus lobby rules and timeout policy.
 */

import { z } from 'zod';

/**
 * Lobby thresholds of one game. `null` caps mean unlimited.
 */
export const LobbyRulesSchema = z
  .object({
    minPlayers: z.number().int().positive(),
    maxPlayers: z.number().int().positive().nullable(),
    maxSpectators: z.number().int().min(0).nullable(),
    /** Delay before a public lobby that reached minPlayers starts */
    waitTimeMs: z.number().int().min(0),
    timeoutPolicy: z.enum(['end_match', 'forfeit', 'drop_participant']),
    /** Inactivity allowed to a participant of a running match */
    matchInactivityTimeoutMs: z.number().int().positive(),
  })
  .refine((rules) => rules.maxPlayers === null || rules.maxPlayers >= rules.minPlayers, {
    message: 'maxPlayers must not be below minPlayers',
    path: ['maxPlayers'],
  });

export type LobbyRules = z.infer<typeof LobbyRulesSchema>;

export const GameManifestSchema = z.object({
  /** Unique game identifier (e.g. 'connect4') */
  id: z.string().min(1),
  /** Display name */
  name: z.string().min(1),
  /** Semantic version */
  version: z.string().min(1),
  description: z.string().optional(),
  tags: z.array(z.string()).readonly().optional(),
  /** Whether finished matches report a score to the score store */
  tracksScore: z.boolean(),
  rules: LobbyRulesSchema,
});

export type GameManifest = z.infer<typeof GameManifestSchema>;

/**
 * Error thrown when a game manifest is invalid.
 */
export class InvalidManifestError extends Error {
  constructor(message: string) {
    super(`Invalid game manifest: ${message}`);
    this.name = 'InvalidManifestError';
  }
}

/**
 * Validate a game manifest.
 * @throws {InvalidManifestError} if manifest is invalid
 */
export function validateManifest(manifest: unknown): asserts manifest is GameManifest {
  const result = GameManifestSchema.safeParse(manifest);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    throw new InvalidManifestError(`${where}${issue?.message ?? 'unknown problem'}`);
  }
}
