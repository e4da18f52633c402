/**
 * @fileoverview Wire frames exchanged between a game host and its clients.
 *
 * Frames wrap the engine's request/response vocabulary with the session id
 * they address, so one connection can drive any number of sessions.
 */

import { GameRequest, GameResponse } from '@number-guess/engine';
import { z } from 'zod';

const SessionIdSchema = z.number().int().positive();

// ============ Client -> Server Frames ============

/**
 * Ask the host to create a new session.
 */
export const CreateSessionFrame = z.object({
  type: z.literal('create_session'),
});

/**
 * Deliver one game request to a session.
 */
export const SessionRequestFrame = z.object({
  type: z.literal('session_request'),
  sessionId: SessionIdSchema,
  request: GameRequest,
});

/**
 * Release a session.
 */
export const StopSessionFrame = z.object({
  type: z.literal('stop_session'),
  sessionId: SessionIdSchema,
});

export const ClientFrame = z.discriminatedUnion('type', [
  CreateSessionFrame,
  SessionRequestFrame,
  StopSessionFrame,
]);

export type ClientFrame = z.infer<typeof ClientFrame>;

// ============ Server -> Client Frames ============

export const SessionCreatedFrame = z.object({
  type: z.literal('session_created'),
  sessionId: SessionIdSchema,
});

export const SessionResponsesFrame = z.object({
  type: z.literal('session_responses'),
  sessionId: SessionIdSchema,
  responses: z.array(GameResponse),
});

export const SessionStoppedFrame = z.object({
  type: z.literal('session_stopped'),
  sessionId: SessionIdSchema,
});

export const ErrorFrame = z.object({
  type: z.literal('error'),
  message: z.string(),
});

export const ServerFrame = z.discriminatedUnion('type', [
  SessionCreatedFrame,
  SessionResponsesFrame,
  SessionStoppedFrame,
  ErrorFrame,
]);

export type ServerFrame = z.infer<typeof ServerFrame>;

// ============ Utility Functions ============

/**
 * Parse and validate a client frame from raw text.
 * @returns Validated ClientFrame or null if the text is not a valid frame
 */
export function parseClientFrame(data: string): ClientFrame | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(data);
  } catch {
    return null;
  }
  const result = ClientFrame.safeParse(parsed);
  return result.success ? result.data : null;
}

/**
 * Parse and validate a server frame (clients and tests).
 */
export function parseServerFrame(data: string): ServerFrame | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(data);
  } catch {
    return null;
  }
  const result = ServerFrame.safeParse(parsed);
  return result.success ? result.data : null;
}

/**
 * Serialize a server frame to JSON string.
 */
export function serializeServerFrame(frame: ServerFrame): string {
  return JSON.stringify(frame);
}
