import { ConnectionError, type EventStream, type SyncEvent } from '@catalog-sync/core';
import { Buffer } from 'node:buffer';
import { BehaviorSubject, Subject, type Observable } from 'rxjs';
import { WebSocket, type RawData } from 'ws';
import { eventStreamConfigSchema, validateConfig } from '../config.js';
import { resolveLogger, toError, type Logger, type LoggerSetting } from '../logger.js';
import { computeBackoffDelay } from '../retry.js';
import { parseSyncEvent } from './wire.js';

/**
 * Configuration for {@link WebSocketEventStream}
 */
export interface EventStreamConfig {
  /** Base URL of the catalog server; http(s) is mapped to ws(s) */
  serverUrl: string;
  authToken?: string;
  /** Delay before the first reconnect attempt (default: 1000ms) */
  reconnectDelay?: number;
  /** Upper bound for the reconnect delay (default: 30000ms) */
  maxReconnectDelay?: number;
  /** Reconnect attempts before giving up (default: Infinity) */
  maxReconnectAttempts?: number;
  /**
   * Drop and re-open the connection when no frame arrives for this long.
   * 0 disables the check (default: 0).
   */
  heartbeatTimeout?: number;
  logger?: LoggerSetting;
}

/**
 * Connection state of the event stream
 */
export type EventStreamState = 'disconnected' | 'connecting' | 'connected' | 'reconnecting' | 'failed';

/** Close codes the server uses for authentication failures */
const AUTH_CLOSE_CODES = new Set([4401, 4403]);

const EVENTS_PATH = '/api/v1/sync/events';

/** Message of the error `ws` raises when the upgrade is refused */
const HANDSHAKE_FAILURE = /Unexpected server response: (\d+)/;

/**
 * Live event feed over a WebSocket at `{serverUrl}/api/v1/sync/events`.
 *
 * Frames are JSON `{ type, data }` objects validated with zod; invalid
 * frames are logged and dropped. Every successful open after the first
 * emits a synthesized `reconnected` event so the engine can catch up on
 * what it missed.
 *
 * ## Connection Lifecycle
 *
 * ```
 * connect() ──→ [connecting] ──→ [connected] ──→ disconnect()
 *                                     │
 *                                     ▼ (connection lost)
 *                              [reconnecting] ──→ [connected] + `reconnected`
 *                                     │
 *                                     ▼ (auth failure or max attempts)
 *                                 [failed]
 * ```
 *
 * Reconnect delays double from `reconnectDelay` up to `maxReconnectDelay`.
 * A 401/403 handshake or a 4401/4403 close code stops reconnecting.
 *
 * @example
 * ```typescript
 * const stream = createWebSocketEventStream({
 *   serverUrl: 'https://catalog.example.com',
 *   authToken: session.accessToken,
 * });
 *
 * stream.events$.subscribe((event) => console.log(event.type));
 * stream.connect();
 * ```
 */
export class WebSocketEventStream implements EventStream {
  private readonly config: Required<Omit<EventStreamConfig, 'logger' | 'authToken'>>;
  private readonly authToken: string | null;
  private readonly logger: Logger;
  private readonly events$$ = new Subject<SyncEvent>();
  private readonly state$$ = new BehaviorSubject<EventStreamState>('disconnected');
  private readonly errors$$ = new Subject<Error>();

  private socket: WebSocket | null = null;
  private active = false;
  private hasConnectedBefore = false;
  private reconnectAttempts = 0;
  private reconnectTimer: ReturnType<typeof setTimeout> | null = null;
  private heartbeatTimer: ReturnType<typeof setTimeout> | null = null;
  private handshakeStatus: number | null = null;

  readonly events$: Observable<SyncEvent> = this.events$$.asObservable();

  constructor(config: EventStreamConfig) {
    validateConfig(eventStreamConfigSchema, config, 'event stream');
    this.config = {
      serverUrl: config.serverUrl,
      reconnectDelay: config.reconnectDelay ?? 1000,
      maxReconnectDelay: config.maxReconnectDelay ?? 30000,
      maxReconnectAttempts: config.maxReconnectAttempts ?? Infinity,
      heartbeatTimeout: config.heartbeatTimeout ?? 0,
    };
    this.authToken = config.authToken ?? null;
    this.logger = resolveLogger(config.logger, 'EventStream');
  }

  /** Connection state changes */
  get state$(): Observable<EventStreamState> {
    return this.state$$.asObservable();
  }

  /** Connection failures, including the final one that stops reconnecting */
  get errors$(): Observable<Error> {
    return this.errors$$.asObservable();
  }

  getState(): EventStreamState {
    return this.state$$.getValue();
  }

  isConnected(): boolean {
    return this.state$$.getValue() === 'connected';
  }

  /**
   * Open the connection. Does nothing while already active.
   */
  connect(): void {
    if (this.active) return;
    this.active = true;
    this.reconnectAttempts = 0;
    this.open('connecting');
  }

  /**
   * Close the connection and stop reconnecting
   */
  disconnect(): void {
    this.active = false;
    this.clearTimers();
    const socket = this.socket;
    this.socket = null;
    if (socket) {
      socket.removeAllListeners();
      socket.on('error', (error) => this.logger.debug('Error after disconnect', { message: error.message }));
      socket.terminate();
    }
    this.state$$.next('disconnected');
  }

  /**
   * Disconnect and complete all observables
   */
  destroy(): void {
    this.disconnect();
    this.events$$.complete();
    this.state$$.complete();
    this.errors$$.complete();
  }

  private open(state: 'connecting' | 'reconnecting'): void {
    this.state$$.next(state);
    this.handshakeStatus = null;

    const headers: Record<string, string> = {};
    if (this.authToken) {
      headers.Authorization = `Bearer ${this.authToken}`;
    }

    const socket = new WebSocket(this.buildUrl(), { headers });
    this.socket = socket;

    socket.on('open', () => {
      this.reconnectAttempts = 0;
      this.state$$.next('connected');
      this.armHeartbeat();
      this.logger.info('Event stream connected');
      if (this.hasConnectedBefore) {
        this.events$$.next({ type: 'reconnected' });
      }
      this.hasConnectedBefore = true;
    });

    socket.on('message', (data) => {
      this.armHeartbeat();
      this.handleFrame(data);
    });

    socket.on('error', (error) => {
      const handshake = HANDSHAKE_FAILURE.exec(error.message);
      if (handshake) {
        this.handshakeStatus = Number(handshake[1]);
      }
      this.logger.warn('Event stream error', { message: error.message });
    });

    socket.on('close', (code) => {
      if (this.socket !== socket) return;
      this.socket = null;
      this.clearHeartbeat();
      this.handleClose(code);
    });
  }

  private handleClose(code: number): void {
    if (!this.active) {
      this.state$$.next('disconnected');
      return;
    }

    if (AUTH_CLOSE_CODES.has(code) || this.handshakeStatus === 401 || this.handshakeStatus === 403) {
      this.fail(
        new ConnectionError('CATALOG_C501', 'Event stream authentication rejected', {
          retryable: false,
          statusCode: this.handshakeStatus ?? undefined,
          context: { closeCode: code },
        })
      );
      return;
    }

    if (this.reconnectAttempts >= this.config.maxReconnectAttempts) {
      this.fail(
        new ConnectionError('CATALOG_C505', 'Max reconnection attempts reached', {
          retryable: false,
          context: { attempts: this.reconnectAttempts },
        })
      );
      return;
    }

    this.reconnectAttempts++;
    const delay = computeBackoffDelay(
      this.reconnectAttempts,
      this.config.reconnectDelay,
      this.config.maxReconnectDelay
    );
    this.logger.info('Event stream closed, reconnecting', { code, attempt: this.reconnectAttempts, delay });
    this.state$$.next('reconnecting');
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      if (this.active) {
        this.open('reconnecting');
      }
    }, delay);
  }

  private fail(error: ConnectionError): void {
    this.active = false;
    this.logger.error('Event stream stopped', error);
    this.state$$.next('failed');
    this.errors$$.next(error);
  }

  private handleFrame(data: RawData): void {
    const text = rawDataToString(data);

    let frame: unknown;
    try {
      frame = JSON.parse(text);
    } catch (error) {
      this.logger.warn('Dropped non-JSON frame', { message: toError(error).message });
      return;
    }

    let event: SyncEvent;
    try {
      event = parseSyncEvent(frame);
    } catch (error) {
      this.logger.warn('Dropped invalid frame', { message: toError(error).message });
      return;
    }

    this.events$$.next(event);
  }

  private armHeartbeat(): void {
    if (this.config.heartbeatTimeout <= 0) return;
    this.clearHeartbeat();
    this.heartbeatTimer = setTimeout(() => {
      this.heartbeatTimer = null;
      this.logger.warn('Heartbeat timed out', { timeout: this.config.heartbeatTimeout });
      this.socket?.terminate();
    }, this.config.heartbeatTimeout);
  }

  private clearHeartbeat(): void {
    if (this.heartbeatTimer) {
      clearTimeout(this.heartbeatTimer);
      this.heartbeatTimer = null;
    }
  }

  private clearTimers(): void {
    this.clearHeartbeat();
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
  }

  private buildUrl(): string {
    const url = new URL(EVENTS_PATH, this.config.serverUrl);
    if (url.protocol === 'http:') url.protocol = 'ws:';
    if (url.protocol === 'https:') url.protocol = 'wss:';
    return url.toString();
  }
}

function rawDataToString(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString('utf8');
  return data.toString('utf8');
}

/**
 * Create a WebSocket event stream
 */
export function createWebSocketEventStream(config: EventStreamConfig): WebSocketEventStream {
  return new WebSocketEventStream(config);
}
