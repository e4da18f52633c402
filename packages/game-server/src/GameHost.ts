/**
 * @fileoverview Connection-facing host for guessing game sessions.
 *
 * Handles:
 * - Connection registry
 * - Frame parsing and validation
 * - Routing requests to the session registry
 * - Unicast replies (a frame only ever goes back to the connection that sent
 *   the triggering frame)
 */

import {
  ConcurrentRequestError,
  type Logger,
  logger as defaultLogger,
  SecretGenerationError,
  SessionNotFoundError,
  type SessionRegistry,
  SessionStoppedError,
} from '@number-guess/engine';
import { type ClientFrame, parseClientFrame, type ServerFrame, serializeServerFrame } from './protocol.js';

/**
 * WebSocket-like interface for connection abstraction.
 * Allows testing without real WebSocket connections.
 */
export interface Connection {
  /** Send a message to this connection */
  send(data: string): void;
  /** Close this connection */
  close(): void;
  /** Connection state (1 = OPEN) */
  readonly readyState: number;
  /** WebSocket OPEN constant */
  readonly OPEN: number;
}

let nextConnectionNumber = 1;

export class GameHost {
  private readonly connections = new Map<Connection, number>();

  constructor(
    private readonly registry: SessionRegistry,
    private readonly logger: Logger = defaultLogger
  ) {}

  // ============ Connection Management ============

  /**
   * Register a new connection. Nothing is sent to it until it asks.
   * @returns Connection number used in logs
   */
  handleConnection(conn: Connection): number {
    const connectionNumber = nextConnectionNumber++;
    this.connections.set(conn, connectionNumber);
    this.logger.info('Connection opened', {
      connection: connectionNumber,
      connections: this.connections.size,
    });
    return connectionNumber;
  }

  /**
   * Forget a connection. Sessions it used stay alive.
   */
  handleDisconnection(conn: Connection): void {
    const connectionNumber = this.connections.get(conn);
    if (connectionNumber === undefined) return;

    this.connections.delete(conn);
    this.logger.info('Connection closed', {
      connection: connectionNumber,
      connections: this.connections.size,
    });
  }

  /**
   * Handle an incoming text frame.
   */
  handleMessage(conn: Connection, rawData: string): void {
    const connectionNumber = this.connections.get(conn);
    if (connectionNumber === undefined) return;

    const frame = parseClientFrame(rawData);
    if (!frame) {
      this.sendTo(conn, { type: 'error', message: 'Invalid message format' });
      return;
    }

    try {
      this.sendTo(conn, this.handleFrame(frame));
    } catch (error) {
      this.sendTo(conn, { type: 'error', message: this.describeError(error, connectionNumber) });
    }
  }

  // ============ Frame Handlers ============

  private handleFrame(frame: ClientFrame): ServerFrame {
    switch (frame.type) {
      case 'create_session': {
        const session = this.registry.create();
        return { type: 'session_created', sessionId: session.id };
      }

      case 'session_request': {
        const responses = this.registry.send(frame.sessionId, frame.request);
        return { type: 'session_responses', sessionId: frame.sessionId, responses };
      }

      case 'stop_session': {
        if (!this.registry.stop(frame.sessionId)) {
          throw new SessionNotFoundError(frame.sessionId);
        }
        return { type: 'session_stopped', sessionId: frame.sessionId };
      }
    }
  }

  private describeError(error: unknown, connectionNumber: number): string {
    if (
      error instanceof SessionNotFoundError ||
      error instanceof SessionStoppedError ||
      error instanceof ConcurrentRequestError
    ) {
      return error.message;
    }

    if (error instanceof SecretGenerationError) {
      this.logger.error('Session creation failed', {
        connection: connectionNumber,
        error: error.message,
      });
      return 'Could not create session';
    }

    this.logger.error('Unexpected error while handling frame', {
      connection: connectionNumber,
      error: error instanceof Error ? error.message : String(error),
    });
    return 'Internal server error';
  }

  // ============ Message Routing ============

  private sendTo(conn: Connection, frame: ServerFrame): void {
    if (conn.readyState === conn.OPEN) {
      conn.send(serializeServerFrame(frame));
    }
  }

  // ============ Queries ============

  /** Number of open connections */
  getConnectionCount(): number {
    return this.connections.size;
  }

  /** Close every connection (host shutdown) */
  closeAll(): void {
    for (const conn of [...this.connections.keys()]) {
      conn.close();
      this.handleDisconnection(conn);
    }
  }
}
