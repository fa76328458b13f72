export type PbxErrorCode =
  | 'configuration'
  | 'authentication'
  | 'action_timeout'
  | 'action_rejected'
  | 'disconnected'
  | 'not_found'
  | 'stream_closed'
  | 'stream_error'
  | 'reconnect_exhausted';

export class PbxError extends Error {
  public readonly code: PbxErrorCode;

  constructor(code: PbxErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Bad or missing settings. Never retried automatically. */
export class ConfigurationError extends PbxError {
  constructor(message: string, code: 'configuration' | 'authentication' = 'configuration') {
    super(code, message);
  }
}

export class AuthenticationError extends ConfigurationError {
  public readonly serverMessage?: string;

  constructor(serverMessage?: string) {
    super(`ami login rejected${serverMessage ? `: ${serverMessage}` : ''}`, 'authentication');
    this.serverMessage = serverMessage;
  }
}

export class ActionTimeoutError extends PbxError {
  public readonly action: string;
  public readonly actionId: string;
  public readonly timeoutMs: number;

  constructor(action: string, actionId: string, timeoutMs: number) {
    super('action_timeout', `action '${action}' (id=${actionId}) timed out after ${timeoutMs}ms`);
    this.action = action;
    this.actionId = actionId;
    this.timeoutMs = timeoutMs;
  }
}

export class ActionRejectedError extends PbxError {
  public readonly action: string;
  public readonly actionId: string;
  public readonly serverMessage?: string;

  constructor(action: string, actionId: string, serverMessage?: string) {
    super(
      'action_rejected',
      `action '${action}' (id=${actionId}) rejected${serverMessage ? `: ${serverMessage}` : ''}`,
    );
    this.action = action;
    this.actionId = actionId;
    this.serverMessage = serverMessage;
  }
}

export class DisconnectedError extends PbxError {
  constructor(message = 'ami connection lost') {
    super('disconnected', message);
  }
}

export class NotFoundError extends PbxError {
  constructor(what: string) {
    super('not_found', `${what} not found`);
  }
}

export class StreamClosedError extends PbxError {
  constructor() {
    super('stream_closed', 'ami stream closed by peer');
  }
}

export class StreamError extends PbxError {
  constructor(cause: unknown) {
    super('stream_error', `ami stream error: ${cause instanceof Error ? cause.message : String(cause)}`, {
      cause,
    });
  }
}

export class ReconnectExhaustedError extends PbxError {
  public readonly attempts: number;

  constructor(attempts: number) {
    super('reconnect_exhausted', `gave up reconnecting after ${attempts} attempts`);
    this.attempts = attempts;
  }
}

export function isPbxError(error: unknown): error is PbxError {
  return error instanceof PbxError;
}
