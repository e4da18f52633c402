import {
  type GuessingGame,
  type Logger,
  logger as defaultLogger,
  parseRequest,
  SecretGenerationError,
  type SessionRegistry,
  SessionStoppedError,
} from '@number-guess/engine';
import { type Request, type Response, Router } from 'express';
import type {
  CreateSessionResponse,
  SessionListResponse,
  SessionRequestResponse,
  SessionStatusResponse,
} from './types.js';

/**
 * Parse a session id path parameter.
 * @returns The id, or null if it is not a positive integer
 */
function parseSessionId(raw: string | undefined): number | null {
  if (!raw || !/^[1-9]\d*$/.test(raw)) return null;
  const id = Number(raw);
  return Number.isSafeInteger(id) ? id : null;
}

function toStatus(session: GuessingGame): SessionStatusResponse {
  const state = session.currentState;
  return {
    sessionId: session.id,
    phase: state.phase,
    playerCount: state.getPlayerCount(),
    guessCount: state.guessCount,
  };
}

export function createSessionRouter(registry: SessionRegistry, logger: Logger = defaultLogger): Router {
  const router = Router();

  /**
   * POST /api/sessions - Create a new game session
   */
  router.post('/', (_req: Request, res: Response) => {
    try {
      const session = registry.create();
      const response: CreateSessionResponse = {
        sessionId: session.id,
        phase: session.phase,
      };
      res.status(201).json(response);
    } catch (err) {
      if (err instanceof SecretGenerationError) {
        logger.error('Session creation failed', { error: err.message });
        res.status(503).json({ error: 'Could not create session' });
        return;
      }
      logger.error('Error creating session', { error: String(err) });
      res.status(500).json({ error: 'Internal server error' });
    }
  });

  /**
   * GET /api/sessions - List live sessions
   */
  router.get('/', (_req: Request, res: Response) => {
    const response: SessionListResponse = {
      sessions: registry.list().map((session) => ({
        sessionId: session.id,
        phase: session.phase,
        playerCount: session.currentState.getPlayerCount(),
      })),
    };
    res.json(response);
  });

  /**
   * GET /api/sessions/:id - Get session status
   */
  router.get('/:id', (req: Request, res: Response) => {
    const sessionId = parseSessionId(req.params['id']);
    if (sessionId === null) {
      res.status(400).json({ error: 'Session id must be a positive integer' });
      return;
    }

    const session = registry.get(sessionId);
    if (!session) {
      res.status(404).json({ error: 'Session not found' });
      return;
    }

    res.json(toStatus(session));
  });

  /**
   * POST /api/sessions/:id/requests - Apply one game request
   */
  router.post('/:id/requests', (req: Request, res: Response) => {
    const sessionId = parseSessionId(req.params['id']);
    if (sessionId === null) {
      res.status(400).json({ error: 'Session id must be a positive integer' });
      return;
    }

    const request = parseRequest(req.body);
    if (!request) {
      res.status(400).json({ error: 'Invalid request body' });
      return;
    }

    const session = registry.get(sessionId);
    if (!session) {
      res.status(404).json({ error: 'Session not found' });
      return;
    }

    try {
      const response: SessionRequestResponse = {
        sessionId,
        responses: session.send(request),
      };
      res.json(response);
    } catch (err) {
      if (err instanceof SessionStoppedError) {
        res.status(404).json({ error: 'Session not found' });
        return;
      }
      logger.error('Error applying request', { sessionId, error: String(err) });
      res.status(500).json({ error: 'Internal server error' });
    }
  });

  /**
   * DELETE /api/sessions/:id - Stop a session
   */
  router.delete('/:id', (req: Request, res: Response) => {
    const sessionId = parseSessionId(req.params['id']);
    if (sessionId === null) {
      res.status(400).json({ error: 'Session id must be a positive integer' });
      return;
    }

    if (!registry.stop(sessionId)) {
      res.status(404).json({ error: 'Session not found' });
      return;
    }

    res.json({ message: 'Session stopped' });
  });

  return router;
}
