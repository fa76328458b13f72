import { parseClientConfig, type AmiClientConfigInput } from '../ami/config';
import { Listeners } from '../ami/listeners';
import { TransportSession, type SocketFactory, type TransportStatus } from '../ami/transportSession';
import type { ConnectionState, ConnectionStateChange } from '../ami/types';
import { CallTracker } from '../calls/callTracker';
import type { CallHandler, CallId, CallSnapshot } from '../calls/types';
import { ActionTimeoutError, ConfigurationError, NotFoundError } from '../errors';
import { log } from '../log';

export interface PbxClientOptions {
  /** Replaces the TCP connector, e.g. with an in-process stand-in. */
  socketFactory?: SocketFactory;
  random?: () => number;
}

export interface HangupOptions {
  timeoutMs?: number;
}

export interface ExtensionInfo {
  extension: string;
  deviceState?: string;
  transport?: string;
}

export interface ClientStatus extends TransportStatus {
  activeCalls: number;
  monitored: { monitorAll: boolean; extensions: string[]; patterns: string[] };
}

/**
 * Public surface of the call monitor. Subscriptions live on the client, so
 * handlers registered before connect() survive reconnects and reconfiguration.
 */
export class PbxClient {
  private session?: TransportSession;
  private tracker?: CallTracker;
  private detach: Array<() => void> = [];

  private readonly startedListeners = new Listeners<[CallSnapshot]>('client_call_started');
  private readonly answeredListeners = new Listeners<[CallSnapshot]>('client_call_answered');
  private readonly endedListeners = new Listeners<[CallSnapshot]>('client_call_ended');
  private readonly stateListeners = new Listeners<[ConnectionStateChange]>('client_connection_state');

  constructor(private readonly options: PbxClientOptions = {}) {}

  /**
   * Validates the configuration, then connects and logs in. Rejects with
   * ConfigurationError before any socket is opened when the settings are
   * invalid, and with AuthenticationError when the login is refused.
   */
  public async connect(input: AmiClientConfigInput): Promise<void> {
    const config = parseClientConfig(input);

    if (this.session && this.session.getState() !== 'DISCONNECTED') {
      throw new ConfigurationError('client is already connected; call disconnect() first');
    }

    this.teardownWiring();

    const session = new TransportSession({
      config,
      socketFactory: this.options.socketFactory,
      random: this.options.random,
    });
    const tracker = new CallTracker({
      monitoredExtensions: config.monitoredExtensions,
      monitorAll: config.monitorAll,
      internalNumberPattern: config.internalNumberPattern,
      graceMs: config.callGraceMs,
      sweepIntervalMs: config.sweepIntervalMs,
      causeMap: config.causeMap,
    });

    this.detach = [
      session.router.subscribe((event) => tracker.handleEvent(event)),
      session.onConnectionLost(() => {
        const ended = tracker.endAll('connection_lost');
        if (ended > 0) {
          log.warn({ event: 'calls_ended_connection_lost', count: ended }, 'calls ended by connection loss');
        }
      }),
      session.onStateChange((change) => this.stateListeners.emit(change)),
      tracker.onCallStarted((call) => this.startedListeners.emit(call)),
      tracker.onCallAnswered((call) => this.answeredListeners.emit(call)),
      tracker.onCallEnded((call) => this.endedListeners.emit(call)),
    ];

    this.session = session;
    this.tracker = tracker;
    tracker.start();

    log.info(
      {
        event: 'pbx_client_connecting',
        host: config.host,
        port: config.port,
        username: config.username,
        monitored: tracker.getMonitoredExtensions(),
      },
      'pbx client connecting',
    );
    await session.connect();
  }

  public async disconnect(): Promise<void> {
    if (!this.session) {
      return;
    }
    await this.session.disconnect();
    this.tracker?.stop();
  }

  public onCallStarted(handler: CallHandler): () => void {
    return this.startedListeners.add(handler);
  }

  public onCallAnswered(handler: CallHandler): () => void {
    return this.answeredListeners.add(handler);
  }

  public onCallEnded(handler: CallHandler): () => void {
    return this.endedListeners.add(handler);
  }

  public onConnectionStateChanged(handler: (change: ConnectionStateChange) => void): () => void {
    return this.stateListeners.add(handler);
  }

  /**
   * Hangs up the call's current channel. A timed-out request is retried once
   * against the channel the call has by then.
   */
  public async hangup(callId: CallId, options: HangupOptions = {}): Promise<void> {
    const session = this.session;
    const first = this.resolveChannel(callId);
    if (!session) {
      throw new NotFoundError(`call ${callId}`);
    }

    try {
      await session.submit({ Action: 'Hangup', Channel: first }, { timeoutMs: options.timeoutMs });
    } catch (error) {
      if (!(error instanceof ActionTimeoutError)) {
        throw error;
      }
      const retry = this.resolveChannel(callId);
      log.warn(
        { event: 'call_hangup_retry', call_id: callId, channel: retry, action_id: error.actionId },
        'hangup timed out, retrying once',
      );
      await session.submit({ Action: 'Hangup', Channel: retry }, { timeoutMs: options.timeoutMs });
    }

    log.info({ event: 'call_hangup_requested', call_id: callId }, 'call hangup requested');
  }

  /** Copies of every call not yet ended, in no particular order. */
  public listActiveCalls(): CallSnapshot[] {
    return this.tracker?.listActive() ?? [];
  }

  /** Includes ended calls still inside the grace window. */
  public getCall(callId: CallId): CallSnapshot | undefined {
    return this.tracker?.getCall(callId);
  }

  public connectionState(): ConnectionState {
    return this.session?.getState() ?? 'DISCONNECTED';
  }

  public status(): ClientStatus {
    const transport: TransportStatus = this.session?.status() ?? {
      state: 'DISCONNECTED',
      connected: false,
      reconnectAttempts: 0,
      pendingActions: 0,
    };
    return {
      ...transport,
      activeCalls: this.tracker?.activeCount ?? 0,
      monitored: this.tracker?.getMonitoredExtensions() ?? { monitorAll: true, extensions: [], patterns: [] },
    };
  }

  public setMonitoredExtensions(extensions: readonly string[], monitorAll?: boolean): void {
    this.tracker?.setMonitoredExtensions(extensions, monitorAll);
  }

  /** Endpoints known to the PBX, from the PJSIPShowEndpoints event list. */
  public async listExtensions(): Promise<ExtensionInfo[]> {
    if (!this.session) {
      return [];
    }
    const { events } = await this.session.submitList({ Action: 'PJSIPShowEndpoints' });
    const extensions: ExtensionInfo[] = [];
    for (const event of events) {
      if (event.eventName?.toLowerCase() !== 'endpointlist') {
        continue;
      }
      const extension = event.getNonEmpty('ObjectName');
      if (!extension) {
        continue;
      }
      extensions.push({
        extension,
        deviceState: event.getNonEmpty('DeviceState'),
        transport: event.getNonEmpty('Transport'),
      });
    }
    return extensions;
  }

  private resolveChannel(callId: CallId): string {
    const call = this.tracker?.getCall(callId);
    if (!call || call.state === 'ENDED' || !call.channel) {
      throw new NotFoundError(`call ${callId}`);
    }
    return call.channel;
  }

  private teardownWiring(): void {
    for (const detach of this.detach) {
      detach();
    }
    this.detach = [];
    this.tracker?.stop();
  }
}
