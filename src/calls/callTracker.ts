import type { AmiMessage } from '../ami/message';
import { Listeners } from '../ami/listeners';
import { log } from '../log';
import { incCallTransition, observeCallDuration, setActiveCalls } from '../metrics';
import { createCauseMapper, type CauseMapper } from './causeCodes';
import { ExtensionMatcher } from './extensionMatcher';
import type { CallDirection, CallHandler, CallId, CallSnapshot, CallState, EndCause } from './types';

const DEFAULT_GRACE_MS = 5000;
const DEFAULT_SWEEP_INTERVAL_MS = 1000;
const DEFAULT_INTERNAL_NUMBER_PATTERN = '^\\d{2,6}$';

// ChannelState numbers from the channel state enum
const CHANNEL_STATE_RING = '4';
const CHANNEL_STATE_RINGING = '5';
const CHANNEL_STATE_UP = '6';

/** Which fields of a channel event describe the remote party. */
type IdentitySource = 'connected_line' | 'caller_id';

interface CallRecord {
  callId: CallId;
  linkedId?: string;
  channel: string;
  extension: string;
  callerIdName?: string;
  callerIdNumber?: string;
  direction: CallDirection;
  state: CallState;
  startedAt: Date;
  answeredAt: Date | null;
  endedAt: Date | null;
  endCause: EndCause | null;
  causeCode?: string;
  causeText?: string;
  identitySource: IdentitySource;
  ringsAtExtension: boolean;
  retiredAtMs?: number;
}

export interface CallTrackerOptions {
  monitoredExtensions?: readonly string[];
  monitorAll?: boolean;
  internalNumberPattern?: string;
  graceMs?: number;
  sweepIntervalMs?: number;
  causeMap?: Record<string, EndCause>;
}

/**
 * Device part of a channel name: `PJSIP/101-0000002a` → `101`,
 * `Local/101@from-internal-00000003;1` → `101`.
 */
export function extensionFromChannel(channel: string | undefined): string | undefined {
  if (!channel) {
    return undefined;
  }
  const slash = channel.indexOf('/');
  if (slash === -1) {
    return undefined;
  }
  let device = channel.slice(slash + 1);
  const semicolon = device.indexOf(';');
  if (semicolon !== -1) {
    device = device.slice(0, semicolon);
  }
  const dash = device.lastIndexOf('-');
  if (dash > 0) {
    device = device.slice(0, dash);
  }
  const at = device.indexOf('@');
  if (at > 0) {
    device = device.slice(0, at);
  }
  return device || undefined;
}

function eventTime(event: AmiMessage): Date {
  const raw = event.get('Timestamp');
  if (raw) {
    const seconds = Number(raw);
    if (Number.isFinite(seconds) && seconds > 0) {
      return new Date(Math.round(seconds * 1000));
    }
  }
  return event.receivedAt;
}

function notBefore(value: Date, floor: Date | null): Date {
  return floor && value.getTime() < floor.getTime() ? new Date(floor.getTime()) : value;
}

function snapshot(record: CallRecord): CallSnapshot {
  return Object.freeze({
    callId: record.callId,
    linkedId: record.linkedId,
    channel: record.channel,
    extension: record.extension,
    callerIdName: record.callerIdName,
    callerIdNumber: record.callerIdNumber,
    direction: record.direction,
    state: record.state,
    startedAt: new Date(record.startedAt.getTime()),
    answeredAt: record.answeredAt ? new Date(record.answeredAt.getTime()) : null,
    endedAt: record.endedAt ? new Date(record.endedAt.getTime()) : null,
    endCause: record.endCause,
    causeCode: record.causeCode,
    causeText: record.causeText,
    missed: record.state === 'ENDED' && record.ringsAtExtension && record.answeredAt === null,
  });
}

/**
 * Rebuilds call lifecycles for monitored extensions from the ordered event
 * stream. Transitions only move forward; late and duplicate events are
 * dropped without error.
 */
export class CallTracker {
  private readonly active = new Map<CallId, CallRecord>();
  private readonly retired = new Map<CallId, CallRecord>();
  private readonly matcher: ExtensionMatcher;
  private readonly mapCause: CauseMapper;
  private readonly internalNumber: RegExp;
  private readonly graceMs: number;
  private readonly sweepIntervalMs: number;
  private sweepTimer?: NodeJS.Timeout;

  private readonly startedListeners = new Listeners<[CallSnapshot]>('call_started');
  private readonly answeredListeners = new Listeners<[CallSnapshot]>('call_answered');
  private readonly endedListeners = new Listeners<[CallSnapshot]>('call_ended');

  constructor(options: CallTrackerOptions = {}) {
    this.matcher = new ExtensionMatcher(options.monitoredExtensions ?? [], options.monitorAll);
    this.mapCause = createCauseMapper(options.causeMap);
    this.internalNumber = new RegExp(options.internalNumberPattern ?? DEFAULT_INTERNAL_NUMBER_PATTERN);
    this.graceMs = options.graceMs ?? DEFAULT_GRACE_MS;
    this.sweepIntervalMs = options.sweepIntervalMs ?? DEFAULT_SWEEP_INTERVAL_MS;
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

  public start(): void {
    if (this.sweepTimer) {
      return;
    }
    this.sweepTimer = setInterval(() => this.sweep(), this.sweepIntervalMs);
    this.sweepTimer.unref?.();
  }

  public stop(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = undefined;
    }
  }

  public setMonitoredExtensions(extensions: readonly string[], monitorAll?: boolean): void {
    this.matcher.update(extensions, monitorAll);
    log.info({ event: 'monitored_extensions_updated', ...this.matcher.describe() }, 'monitored extensions updated');
  }

  public getMonitoredExtensions(): { monitorAll: boolean; extensions: string[]; patterns: string[] } {
    return this.matcher.describe();
  }

  public listActive(): CallSnapshot[] {
    const calls: CallSnapshot[] = [];
    for (const record of this.active.values()) {
      if (record.state !== 'ENDED') {
        calls.push(snapshot(record));
      }
    }
    return calls;
  }

  /** Active calls and calls still inside their post-end grace window. */
  public getCall(callId: CallId): CallSnapshot | undefined {
    const record = this.active.get(callId) ?? this.retired.get(callId);
    return record ? snapshot(record) : undefined;
  }

  public get activeCount(): number {
    return this.active.size;
  }

  public handleEvent(event: AmiMessage): void {
    switch (event.eventName?.toLowerCase()) {
      case 'newchannel':
      case 'newstate':
        this.onChannelState(event);
        return;
      case 'newcallerid':
        this.onIdentity(event, 'caller_id');
        return;
      case 'newconnectedline':
        this.onIdentity(event, 'connected_line');
        return;
      case 'rename':
        this.onRename(event);
        return;
      case 'bridgeenter':
        this.onBridgeEnter(event);
        return;
      case 'hangup':
        this.onHangup(event);
        return;
      case 'fullybooted':
        log.info({ event: 'ami_fully_booted', status: event.get('Status') }, 'pbx fully booted');
        return;
      default:
        return;
    }
  }

  /** Ends every call still in progress, e.g. when the connection drops. */
  public endAll(cause: EndCause, at: Date = new Date()): number {
    const records = Array.from(this.active.values());
    for (const record of records) {
      this.end(record, cause, at);
    }
    return records.length;
  }

  /** Drops ended calls whose grace window has passed. */
  public sweep(nowMs: number = Date.now()): number {
    let purged = 0;
    for (const [callId, record] of this.retired.entries()) {
      if (record.retiredAtMs !== undefined && nowMs - record.retiredAtMs >= this.graceMs) {
        this.retired.delete(callId);
        purged += 1;
      }
    }
    if (purged > 0) {
      log.debug({ event: 'calls_purged', count: purged }, 'ended calls purged');
    }
    return purged;
  }

  private onChannelState(event: AmiMessage): void {
    const callId = event.getNonEmpty('Uniqueid');
    if (!callId) {
      return;
    }

    const desc = event.get('ChannelStateDesc')?.trim().toLowerCase();
    const stateCode = event.get('ChannelState')?.trim();
    const isUp = desc === 'up' || stateCode === CHANNEL_STATE_UP;

    const record = this.active.get(callId);
    if (record) {
      this.updateChannel(record, event.getNonEmpty('Channel'));
      this.applyIdentity(record, event, record.identitySource);
      if (isUp) {
        this.answer(record, eventTime(event));
      }
      return;
    }

    if (this.retired.has(callId)) {
      return;
    }

    if (desc === 'ringing' || stateCode === CHANNEL_STATE_RINGING) {
      this.startRinging(callId, event);
    } else if (desc === 'ring' || stateCode === CHANNEL_STATE_RING) {
      this.startDialing(callId, event);
    }
  }

  /** The monitored phone is ringing: an incoming leg towards the extension. */
  private startRinging(callId: CallId, event: AmiMessage): void {
    const channel = event.getNonEmpty('Channel') ?? '';
    const device = extensionFromChannel(channel);

    let extension: string;
    let identitySource: IdentitySource;
    if (this.isMonitored(device)) {
      extension = device;
      identitySource = 'connected_line';
    } else {
      const connected = event.getNonEmpty('ConnectedLineNum');
      if (!this.isMonitored(connected)) {
        return;
      }
      extension = connected;
      identitySource = 'caller_id';
    }
    if (this.isOtherLegOfTrackedCall(callId, event, extension)) {
      return;
    }

    const record = this.createRecord(callId, event, channel, extension, identitySource, true);
    record.direction = this.classify(record.callerIdNumber, 'INBOUND');
    this.begin(record, event);
  }

  /** The monitored phone is placing a call. */
  private startDialing(callId: CallId, event: AmiMessage): void {
    const channel = event.getNonEmpty('Channel') ?? '';
    const extension = extensionFromChannel(channel);
    if (!this.isMonitored(extension) || this.isOtherLegOfTrackedCall(callId, event, extension)) {
      return;
    }

    const record = this.createRecord(callId, event, channel, extension, 'connected_line', false);
    if (!record.callerIdNumber) {
      const dialed = event.getNonEmpty('Exten');
      if (dialed && dialed !== 's') {
        record.callerIdNumber = dialed;
      }
    }
    record.direction = record.callerIdNumber ? this.classify(record.callerIdNumber, 'OUTBOUND') : 'UNKNOWN';
    this.begin(record, event);
  }

  /**
   * Listed extensions match as configured. When every extension is monitored,
   * only names that look like an extension number count, so trunk devices do not.
   */
  private isMonitored(extension: string | undefined): extension is string {
    if (!extension || !this.matcher.matches(extension)) {
      return false;
    }
    return !this.matcher.monitorsAll || this.internalNumber.test(extension);
  }

  /** One call per extension per Linkedid; the peer legs of a tracked call are skipped. */
  private isOtherLegOfTrackedCall(callId: CallId, event: AmiMessage, extension: string): boolean {
    const linkedId = event.getNonEmpty('Linkedid');
    if (!linkedId) {
      return false;
    }
    for (const record of [...this.active.values(), ...this.retired.values()]) {
      if (record.linkedId === linkedId && record.extension === extension) {
        log.debug(
          { event: 'call_leg_skipped', call_id: callId, tracked_call_id: record.callId, linked_id: linkedId, extension },
          'channel belongs to a tracked call',
        );
        return true;
      }
    }
    return false;
  }

  private createRecord(
    callId: CallId,
    event: AmiMessage,
    channel: string,
    extension: string,
    identitySource: IdentitySource,
    ringsAtExtension: boolean,
  ): CallRecord {
    const record: CallRecord = {
      callId,
      linkedId: event.getNonEmpty('Linkedid'),
      channel,
      extension,
      direction: 'UNKNOWN',
      state: 'RINGING',
      startedAt: eventTime(event),
      answeredAt: null,
      endedAt: null,
      endCause: null,
      identitySource,
      ringsAtExtension,
    };
    this.applyIdentity(record, event, identitySource);
    return record;
  }

  private begin(record: CallRecord, event: AmiMessage): void {
    this.active.set(record.callId, record);
    setActiveCalls(this.active.size);
    incCallTransition('started');
    log.info(
      {
        event: 'call_started',
        call_id: record.callId,
        channel: record.channel,
        extension: record.extension,
        caller_id_number: record.callerIdNumber,
        caller_id_name: record.callerIdName,
        direction: record.direction,
        ami_event: event.eventName,
      },
      'call started',
    );
    this.startedListeners.emit(snapshot(record));
  }

  private classify(remoteNumber: string | undefined, external: CallDirection): CallDirection {
    if (remoteNumber && this.internalNumber.test(remoteNumber)) {
      return 'INTERNAL';
    }
    return external;
  }

  private onIdentity(event: AmiMessage, source: IdentitySource): void {
    const callId = event.getNonEmpty('Uniqueid');
    const record = callId ? this.active.get(callId) : undefined;
    if (!record || record.identitySource !== source) {
      return;
    }
    this.applyIdentity(record, event, source);
  }

  /** Fills caller identity; a field once set is never cleared by a later event. */
  private applyIdentity(record: CallRecord, event: AmiMessage, source: IdentitySource): void {
    const prefix = source === 'connected_line' ? 'ConnectedLine' : 'CallerID';
    const number = event.getNonEmpty(`${prefix}Num`);
    const name = event.getNonEmpty(`${prefix}Name`);
    if (number) {
      record.callerIdNumber = number;
    }
    if (name) {
      record.callerIdName = name;
    }
  }

  private onRename(event: AmiMessage): void {
    const callId = event.getNonEmpty('Uniqueid');
    const record = callId ? this.active.get(callId) : undefined;
    if (record) {
      this.updateChannel(record, event.getNonEmpty('Newname'));
    }
  }

  private updateChannel(record: CallRecord, channel: string | undefined): void {
    if (channel && channel !== record.channel) {
      log.debug(
        { event: 'call_channel_changed', call_id: record.callId, previous: record.channel, channel },
        'call channel changed',
      );
      record.channel = channel;
    }
  }

  private onBridgeEnter(event: AmiMessage): void {
    const callId = event.getNonEmpty('Uniqueid');
    const record = callId ? this.active.get(callId) : undefined;
    if (record) {
      this.answer(record, eventTime(event));
    }
  }

  private answer(record: CallRecord, at: Date): void {
    if (record.state !== 'RINGING') {
      return;
    }
    record.state = 'ANSWERED';
    record.answeredAt = notBefore(at, record.startedAt);
    incCallTransition('answered');
    log.info(
      {
        event: 'call_answered',
        call_id: record.callId,
        extension: record.extension,
        ring_ms: record.answeredAt.getTime() - record.startedAt.getTime(),
      },
      'call answered',
    );
    this.answeredListeners.emit(snapshot(record));
  }

  private onHangup(event: AmiMessage): void {
    const callId = event.getNonEmpty('Uniqueid');
    const record = callId ? this.active.get(callId) : undefined;
    if (!record) {
      return;
    }
    const causeCode = event.getNonEmpty('Cause');
    record.causeCode = causeCode;
    record.causeText = event.getNonEmpty('Cause-txt');
    this.end(record, this.mapCause(causeCode), eventTime(event));
  }

  private end(record: CallRecord, cause: EndCause, at: Date): void {
    if (record.state === 'ENDED') {
      return;
    }
    record.state = 'ENDED';
    record.endedAt = notBefore(at, record.answeredAt ?? record.startedAt);
    record.endCause = cause;

    const durationMs = record.endedAt.getTime() - record.startedAt.getTime();
    incCallTransition('ended');
    observeCallDuration(cause, durationMs);
    log.info(
      {
        event: 'call_ended',
        call_id: record.callId,
        extension: record.extension,
        end_cause: cause,
        cause_code: record.causeCode,
        answered: record.answeredAt !== null,
        duration_ms: durationMs,
      },
      'call ended',
    );

    this.endedListeners.emit(snapshot(record));

    this.active.delete(record.callId);
    record.retiredAtMs = Date.now();
    this.retired.set(record.callId, record);
    setActiveCalls(this.active.size);
  }
}
