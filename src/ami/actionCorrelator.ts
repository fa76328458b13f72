import { randomUUID } from 'crypto';
import { ActionRejectedError, ActionTimeoutError, DisconnectedError } from '../errors';
import { log } from '../log';
import { startActionTimer } from '../metrics';
import { AmiMessage } from './message';
import { serializeAction } from './messageParser';
import type { ActionFields } from './types';

export interface EventListResult {
  response: AmiMessage;
  events: AmiMessage[];
}

interface PendingAction {
  actionId: string;
  action: string;
  timer: NodeJS.Timeout;
  finish: (outcome: string) => void;
  resolve: (response: AmiMessage) => void;
  reject: (reason: Error) => void;
  list?: {
    response?: AmiMessage;
    events: AmiMessage[];
    settle: (result: EventListResult) => void;
  };
}

export interface SubmitOptions {
  timeoutMs?: number;
}

export interface ActionCorrelatorOptions {
  defaultTimeoutMs: number;
  /** Writes a serialized action; throws or rejects when nothing can be written. */
  send: (payload: string) => void | Promise<void>;
  idPrefix?: string;
}

function isSuccess(response: AmiMessage): boolean {
  const value = response.response?.toLowerCase();
  return value === 'success' || value === 'follows' || value === 'goodbye';
}

export class ActionCorrelator {
  private readonly pending = new Map<string, PendingAction>();
  private readonly idPrefix: string;
  private sequence = 0;

  constructor(private readonly options: ActionCorrelatorOptions) {
    this.idPrefix = options.idPrefix ?? randomUUID().slice(0, 8);
  }

  public nextActionId(): string {
    this.sequence += 1;
    return `${this.idPrefix}-${this.sequence}`;
  }

  public submit(fields: ActionFields, options: SubmitOptions = {}): Promise<AmiMessage> {
    return new Promise<AmiMessage>((resolve, reject) => {
      this.register(fields, options, resolve, reject);
    });
  }

  /**
   * Submits an action answered by a list of events that carry its ActionID
   * and end with an `EventList: Complete` event.
   */
  public submitList(fields: ActionFields, options: SubmitOptions = {}): Promise<EventListResult> {
    return new Promise<EventListResult>((resolve, reject) => {
      const pending = this.register(fields, options, () => undefined, reject);
      if (pending) {
        pending.list = { events: [], settle: resolve };
      }
    });
  }

  /** Returns true when the response belonged to a pending action. */
  public handleResponse(message: AmiMessage): boolean {
    const actionId = message.actionId;
    if (!actionId) {
      return false;
    }
    const pending = this.pending.get(actionId);
    if (!pending) {
      log.debug({ event: 'ami_response_unmatched', action_id: actionId }, 'ami response without pending action');
      return false;
    }

    if (!isSuccess(message)) {
      this.settle(pending, 'rejected');
      const serverMessage = message.get('Message');
      log.warn(
        { event: 'ami_action_rejected', action: pending.action, action_id: actionId, message: serverMessage },
        'ami action rejected',
      );
      pending.reject(new ActionRejectedError(pending.action, actionId, serverMessage));
      return true;
    }

    if (pending.list) {
      pending.list.response = message;
      return true;
    }

    this.settle(pending, 'success');
    pending.resolve(message);
    return true;
  }

  /** Collects list events for event-list actions; other events are left alone. */
  public handleEvent(message: AmiMessage): boolean {
    const actionId = message.actionId;
    if (!actionId) {
      return false;
    }
    const pending = this.pending.get(actionId);
    if (!pending?.list) {
      return false;
    }

    if (message.get('EventList')?.toLowerCase() === 'complete') {
      const response = pending.list.response ?? message;
      this.settle(pending, 'success');
      pending.list.settle({ response, events: pending.list.events });
      return true;
    }

    pending.list.events.push(message);
    return true;
  }

  /** Fails every in-flight action at once, e.g. when the connection drops. */
  public failAll(reason: Error = new DisconnectedError()): number {
    const entries = Array.from(this.pending.values());
    for (const pending of entries) {
      this.settle(pending, 'disconnected');
      pending.reject(reason);
    }
    return entries.length;
  }

  public has(actionId: string): boolean {
    return this.pending.has(actionId);
  }

  public get pendingCount(): number {
    return this.pending.size;
  }

  private register(
    fields: ActionFields,
    options: SubmitOptions,
    resolve: (response: AmiMessage) => void,
    reject: (reason: Error) => void,
  ): PendingAction | undefined {
    const actionId = this.nextActionId();
    const timeoutMs = options.timeoutMs ?? this.options.defaultTimeoutMs;
    const action = fields.Action;

    const timer = setTimeout(() => {
      const current = this.pending.get(actionId);
      if (!current) {
        return;
      }
      this.settle(current, 'timeout');
      log.warn(
        { event: 'ami_action_timeout', action, action_id: actionId, timeout_ms: timeoutMs },
        'ami action timed out',
      );
      current.reject(new ActionTimeoutError(action, actionId, timeoutMs));
    }, timeoutMs);

    const pending: PendingAction = {
      actionId,
      action,
      timer,
      finish: startActionTimer(action),
      resolve,
      reject,
    };
    this.pending.set(actionId, pending);

    const { Action, ...rest } = fields;
    const payload = serializeAction({ Action, ...rest, ActionID: actionId });

    try {
      const written = this.options.send(payload);
      if (written instanceof Promise) {
        written.catch((error: unknown) => this.failSend(actionId, error));
      }
    } catch (error) {
      this.failSend(actionId, error);
      return undefined;
    }

    return pending;
  }

  private failSend(actionId: string, error: unknown): void {
    const pending = this.pending.get(actionId);
    if (!pending) {
      return;
    }
    this.settle(pending, 'send_failed');
    log.warn({ err: error, action: pending.action, action_id: actionId }, 'ami action send failed');
    pending.reject(error instanceof Error ? error : new DisconnectedError(String(error)));
  }

  private settle(pending: PendingAction, outcome: string): void {
    clearTimeout(pending.timer);
    this.pending.delete(pending.actionId);
    pending.finish(outcome);
  }
}
