import net from 'net';
import type { Duplex } from 'stream';
import {
  ActionRejectedError,
  AuthenticationError,
  DisconnectedError,
  ReconnectExhaustedError,
  StreamError,
} from '../errors';
import { log } from '../log';
import { incProtocolError, incReconnectAttempts, setConnectionState } from '../metrics';
import { ActionCorrelator, type EventListResult, type SubmitOptions } from './actionCorrelator';
import type { AmiClientConfig } from './config';
import { EventRouter } from './eventRouter';
import { frameStream } from './lineFramer';
import { Listeners } from './listeners';
import type { AmiMessage } from './message';
import { parseMessage } from './messageParser';
import { ReconnectPolicy } from './reconnectPolicy';
import type { ActionFields, ConnectionState, ConnectionStateChange } from './types';

export interface SocketConnectOptions {
  host: string;
  port: number;
  timeoutMs: number;
}

export type SocketFactory = (options: SocketConnectOptions) => Promise<Duplex>;

const LOGOFF_TIMEOUT_MS = 1000;

export const connectTcp: SocketFactory = ({ host, port, timeoutMs }) =>
  new Promise<Duplex>((resolve, reject) => {
    const socket = net.createConnection({ host, port });
    const timer = setTimeout(() => {
      socket.destroy();
      reject(new Error(`connect to ${host}:${port} timed out after ${timeoutMs}ms`));
    }, timeoutMs);

    const onError = (error: Error): void => {
      clearTimeout(timer);
      reject(error);
    };

    socket.once('error', onError);
    socket.once('connect', () => {
      clearTimeout(timer);
      socket.off('error', onError);
      socket.setNoDelay(true);
      socket.setKeepAlive(true, 10_000);
      resolve(socket);
    });
  });

export interface TransportSessionOptions {
  config: AmiClientConfig;
  socketFactory?: SocketFactory;
  random?: () => number;
}

export interface TransportStatus {
  state: ConnectionState;
  connected: boolean;
  reconnectAttempts: number;
  serverVersion?: string;
  pendingActions: number;
  lastError?: string;
}

interface ConnectWaiter {
  resolve: () => void;
  reject: (reason: Error) => void;
}

type ConnectionOutcome = 'auth_failed' | 'closed';

function toError(value: unknown): Error {
  return value instanceof Error ? value : new StreamError(value);
}

/**
 * Owns the manager-interface socket: connect, login, read loop, keep-alive
 * and reconnect with backoff. The read loop is the only writer of inbound
 * state; everything it parses goes to the correlator or the event router.
 */
export class TransportSession {
  public readonly correlator: ActionCorrelator;
  public readonly router = new EventRouter();

  private readonly config: AmiClientConfig;
  private readonly socketFactory: SocketFactory;
  private readonly policy: ReconnectPolicy;
  private readonly stateListeners = new Listeners<[ConnectionStateChange]>('connection_state');
  private readonly lostListeners = new Listeners<[Error]>('connection_lost');
  private readonly reconnectListeners = new Listeners<[{ attempt: number; delayMs: number }]>(
    'reconnect_scheduled',
  );

  private state: ConnectionState = 'DISCONNECTED';
  private socket?: Duplex;
  private supervisor?: Promise<void>;
  private waiters: ConnectWaiter[] = [];
  private stopping = false;
  private cancelBackoff?: () => void;
  private keepaliveTimer?: NodeJS.Timeout;
  private keepaliveArmed = false;
  private keepaliveInFlight = false;
  private serverVersion?: string;
  private lastError?: Error;

  constructor(options: TransportSessionOptions) {
    this.config = options.config;
    this.socketFactory = options.socketFactory ?? connectTcp;
    this.policy = new ReconnectPolicy({ ...options.config.reconnect, random: options.random });
    this.correlator = new ActionCorrelator({
      defaultTimeoutMs: options.config.actionTimeoutMs,
      send: (payload) => this.write(payload),
    });
    setConnectionState(this.state);
  }

  public getState(): ConnectionState {
    return this.state;
  }

  public status(): TransportStatus {
    return {
      state: this.state,
      connected: this.state === 'CONNECTED',
      reconnectAttempts: this.policy.attemptCount,
      serverVersion: this.serverVersion,
      pendingActions: this.correlator.pendingCount,
      lastError: this.lastError?.message,
    };
  }

  public onStateChange(listener: (change: ConnectionStateChange) => void): () => void {
    return this.stateListeners.add(listener);
  }

  /** Fires once per lost connection, after pending actions have been failed. */
  public onConnectionLost(listener: (reason: Error) => void): () => void {
    return this.lostListeners.add(listener);
  }

  public onReconnectScheduled(listener: (info: { attempt: number; delayMs: number }) => void): () => void {
    return this.reconnectListeners.add(listener);
  }

  /**
   * Resolves once logged in. Network failures are retried in the background
   * and do not reject; a rejected login, an exhausted retry budget or
   * disconnect() do.
   */
  public connect(): Promise<void> {
    if (this.state === 'CONNECTED') {
      return Promise.resolve();
    }

    const waiting = new Promise<void>((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });

    if (!this.supervisor) {
      this.stopping = false;
      this.policy.reset();
      this.supervisor = this.supervise().finally(() => {
        this.supervisor = undefined;
      });
    }

    return waiting;
  }

  /** Logs off when connected, closes the socket and cancels any pending reconnect. */
  public async disconnect(): Promise<void> {
    const supervisor = this.supervisor;
    if (!supervisor) {
      return;
    }

    this.stopping = true;
    this.cancelBackoff?.();

    if (this.state === 'CONNECTED') {
      try {
        await this.correlator.submit({ Action: 'Logoff' }, { timeoutMs: LOGOFF_TIMEOUT_MS });
      } catch (error) {
        log.debug({ err: error, event: 'ami_logoff_failed' }, 'ami logoff failed');
      }
    }

    this.closeSocket();
    await supervisor;
  }

  /** Submits an action on behalf of a consumer; requires an authenticated session. */
  public submit(fields: ActionFields, options?: SubmitOptions): Promise<AmiMessage> {
    if (this.state !== 'CONNECTED') {
      return Promise.reject(new DisconnectedError(`ami session not connected (state=${this.state})`));
    }
    return this.correlator.submit(fields, options);
  }

  public submitList(fields: ActionFields, options?: SubmitOptions): Promise<EventListResult> {
    if (this.state !== 'CONNECTED') {
      return Promise.reject(new DisconnectedError(`ami session not connected (state=${this.state})`));
    }
    return this.correlator.submitList(fields, options);
  }

  private async supervise(): Promise<void> {
    let reason = 'disconnect requested';

    while (!this.stopping) {
      const outcome = await this.runConnection();
      if (outcome === 'auth_failed') {
        reason = 'authentication failed';
        break;
      }
      if (this.stopping) {
        break;
      }

      if (!this.policy.canRetry()) {
        const exhausted = new ReconnectExhaustedError(this.policy.attemptCount);
        log.error(
          { event: 'ami_reconnect_exhausted', attempts: this.policy.attemptCount, host: this.config.host },
          'ami reconnect attempts exhausted',
        );
        reason = exhausted.message;
        this.rejectWaiters(exhausted);
        break;
      }

      const delayMs = this.policy.nextDelay();
      const attempt = this.policy.attemptCount;
      this.setState('RECONNECTING', this.lastError?.message);
      incReconnectAttempts();
      log.info(
        { event: 'ami_reconnect_scheduled', attempt, delay_ms: delayMs, host: this.config.host },
        'ami reconnect scheduled',
      );
      this.reconnectListeners.emit({ attempt, delayMs });
      await this.waitBackoff(delayMs);
    }

    this.setState('DISCONNECTED', reason);
    this.rejectWaiters(new DisconnectedError(reason));
  }

  private async runConnection(): Promise<ConnectionOutcome> {
    this.setState('CONNECTING');

    let socket: Duplex;
    try {
      socket = await this.socketFactory({
        host: this.config.host,
        port: this.config.port,
        timeoutMs: this.config.connectTimeoutMs,
      });
    } catch (error) {
      this.lastError = toError(error);
      log.warn(
        { err: error, event: 'ami_connect_failed', host: this.config.host, port: this.config.port },
        'ami connect failed',
      );
      return 'closed';
    }

    if (this.stopping) {
      socket.destroy();
      return 'closed';
    }

    socket.on('error', (error) => {
      log.debug({ err: error, event: 'ami_socket_error' }, 'ami socket error');
    });
    this.socket = socket;
    const reading = this.readLoop(socket);

    this.setState('AUTHENTICATING');
    try {
      await this.correlator.submit(
        {
          Action: 'Login',
          Username: this.config.username,
          Secret: this.config.secret,
          Events: this.config.events,
        },
        { timeoutMs: this.config.actionTimeoutMs },
      );
    } catch (error) {
      if (error instanceof ActionRejectedError) {
        const authError = new AuthenticationError(error.serverMessage);
        this.lastError = authError;
        log.error(
          { event: 'ami_login_rejected', host: this.config.host, username: this.config.username, message: error.serverMessage },
          'ami login rejected',
        );
        this.stopping = true;
        this.rejectWaiters(authError);
        this.closeSocket();
        await reading;
        return 'auth_failed';
      }

      log.warn({ err: error, event: 'ami_login_failed', host: this.config.host }, 'ami login failed');
      this.closeSocket(toError(error));
      await reading;
      return 'closed';
    }

    log.info(
      { event: 'ami_login_ok', host: this.config.host, port: this.config.port, username: this.config.username },
      'ami login ok',
    );
    this.policy.reset();
    this.lastError = undefined;
    this.setState('CONNECTED');
    this.resolveWaiters();
    this.armKeepalive();

    await reading;
    return 'closed';
  }

  /**
   * Drains the socket until it ends, then fails whatever was still pending
   * before resolving with the reason it stopped.
   */
  private async readLoop(socket: Duplex): Promise<Error> {
    const reason = await this.drain(socket);
    this.handleConnectionLost(reason);
    return reason;
  }

  private async drain(socket: Duplex): Promise<Error> {
    try {
      for await (const item of frameStream(socket, { expectGreeting: true })) {
        this.touchKeepalive();
        if (item.type === 'greeting') {
          const slash = item.line.indexOf('/');
          this.serverVersion = slash === -1 ? item.line : item.line.slice(slash + 1);
          log.info({ event: 'ami_greeting', banner: item.line }, 'ami greeting');
          continue;
        }
        this.handleBlock(item.lines);
      }
    } catch (error) {
      return toError(error);
    }
    return new DisconnectedError('ami stream ended');
  }

  private handleBlock(lines: string[]): void {
    try {
      const message = parseMessage(lines);
      switch (message.kind) {
        case 'RESPONSE':
          this.correlator.handleResponse(message);
          return;
        case 'EVENT':
          this.correlator.handleEvent(message);
          this.router.dispatch(message);
          return;
        default:
          incProtocolError('unknown_block');
          log.warn(
            { event: 'ami_unknown_block', first_line: lines[0]?.slice(0, 120) },
            'ami block is neither event nor response',
          );
      }
    } catch (error) {
      incProtocolError('dispatch');
      log.error({ err: error, event: 'ami_block_failed' }, 'ami block handling failed');
    }
  }

  private handleConnectionLost(reason: Error): void {
    this.disarmKeepalive();
    if (this.socket) {
      this.socket.destroy();
      this.socket = undefined;
    }

    const failed = this.correlator.failAll(new DisconnectedError(`ami connection lost: ${reason.message}`));
    if (!this.stopping) {
      this.lastError = reason;
    }
    log.warn(
      {
        event: 'ami_connection_lost',
        reason: reason.message,
        failed_actions: failed,
        requested: this.stopping,
      },
      'ami connection lost',
    );
    this.lostListeners.emit(reason);
  }

  private write(payload: string): void {
    const socket = this.socket;
    if (!socket || socket.destroyed || !socket.writable) {
      throw new DisconnectedError('ami socket not writable');
    }
    socket.write(payload);
  }

  private closeSocket(reason?: Error): void {
    const socket = this.socket;
    if (!socket || socket.destroyed) {
      return;
    }
    socket.destroy(reason);
  }

  private waitBackoff(delayMs: number): Promise<void> {
    return new Promise<void>((resolve) => {
      const done = (): void => {
        clearTimeout(timer);
        this.cancelBackoff = undefined;
        resolve();
      };
      const timer = setTimeout(done, delayMs);
      this.cancelBackoff = done;
    });
  }

  private armKeepalive(): void {
    this.keepaliveArmed = true;
    this.touchKeepalive();
  }

  private disarmKeepalive(): void {
    this.keepaliveArmed = false;
    this.keepaliveInFlight = false;
    if (this.keepaliveTimer) {
      clearTimeout(this.keepaliveTimer);
      this.keepaliveTimer = undefined;
    }
  }

  private touchKeepalive(): void {
    if (!this.keepaliveArmed) {
      return;
    }
    if (this.keepaliveTimer) {
      clearTimeout(this.keepaliveTimer);
    }
    this.keepaliveTimer = setTimeout(() => {
      void this.sendKeepalive();
    }, this.config.keepalive.idleMs);
  }

  private async sendKeepalive(): Promise<void> {
    if (!this.keepaliveArmed || this.keepaliveInFlight || this.state !== 'CONNECTED') {
      return;
    }

    this.keepaliveInFlight = true;
    try {
      await this.correlator.submit({ Action: 'Ping' }, { timeoutMs: this.config.keepalive.graceMs });
      this.keepaliveInFlight = false;
    } catch (error) {
      this.keepaliveInFlight = false;
      if (error instanceof DisconnectedError) {
        return;
      }
      log.warn(
        { err: error, event: 'ami_keepalive_failed', grace_ms: this.config.keepalive.graceMs },
        'ami keepalive failed, dropping connection',
      );
      this.closeSocket(new DisconnectedError('keepalive timed out'));
    }
  }

  private setState(next: ConnectionState, reason?: string): void {
    const previous = this.state;
    if (previous === next) {
      return;
    }
    this.state = next;
    setConnectionState(next);
    log.info({ event: 'ami_state_changed', previous, current: next, reason }, 'ami connection state changed');
    this.stateListeners.emit({ previous, current: next, reason });
  }

  private resolveWaiters(): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      waiter.resolve();
    }
  }

  private rejectWaiters(reason: Error): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      waiter.reject(reason);
    }
  }
}
