/**
 * @fileoverview Dispatcher wire messages.
 * Uses Zod for runtime validation of incoming client commands.
 */

import { z } from 'zod';
import type { LobbyErrorCode, MatchErrorCode } from './errors.js';
import type { ViewModel } from './index.js';

const HostIdSchema = z.string().min(1).nullable().default(null);

// ============ Client -> Server Commands ============

/**
 * First message on a connection: who is talking.
 */
export const HelloCommand = z.object({
  type: z.literal('hello'),
  identity: z.string().min(1),
});

export const JoinCommand = z.object({
  type: z.literal('join'),
  gameId: z.string().min(1),
  hostId: HostIdSchema,
});

export const SpectateCommand = z.object({
  type: z.literal('spectate'),
  gameId: z.string().min(1),
  hostId: HostIdSchema,
});

/**
 * Leave the waiting party the sender is queued in.
 */
export const LeaveCommand = z.object({
  type: z.literal('leave'),
  gameId: z.string().min(1),
});

export const StartCommand = z.object({
  type: z.literal('start'),
  gameId: z.string().min(1),
  hostId: z.string().min(1),
});

/**
 * A move in a running match. The payload is validated by the game itself.
 */
export const MoveCommand = z.object({
  type: z.literal('move'),
  gameId: z.string().min(1),
  move: z.unknown(),
});

/**
 * Leave a running match (forfeit, drop out or stop spectating).
 */
export const ResignCommand = z.object({
  type: z.literal('resign'),
  gameId: z.string().min(1),
});

export const ClientCommandSchema = z.discriminatedUnion('type', [
  HelloCommand,
  JoinCommand,
  SpectateCommand,
  LeaveCommand,
  StartCommand,
  MoveCommand,
  ResignCommand,
]);

export type ClientCommand = z.infer<typeof ClientCommandSchema>;

/**
 * Parse and validate a raw client command.
 * @returns The command, or null when the payload is not a known command
 */
export function parseClientCommand(raw: unknown): ClientCommand | null {
  const result = ClientCommandSchema.safeParse(raw);
  return result.success ? result.data : null;
}

// ============ Server -> Client Messages ============

export type ServerMessage =
  | { readonly type: 'welcome'; readonly identity: string }
  | { readonly type: 'render'; readonly viewId: number; readonly view: ViewModel }
  | { readonly type: 'close_view'; readonly viewId: number }
  | { readonly type: 'ok'; readonly command: ClientCommand['type'] }
  | {
      readonly type: 'error';
      readonly code: LobbyErrorCode | MatchErrorCode | 'BAD_REQUEST' | 'INTERNAL';
      readonly message: string;
    };
