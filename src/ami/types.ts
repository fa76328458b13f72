export type MessageKind = 'EVENT' | 'RESPONSE' | 'UNKNOWN';

export interface MessageField {
  /** Field name as it appeared on the wire. */
  name: string;
  value: string;
}

export type ConnectionState =
  | 'DISCONNECTED'
  | 'CONNECTING'
  | 'AUTHENTICATING'
  | 'CONNECTED'
  | 'RECONNECTING';

export interface ConnectionStateChange {
  previous: ConnectionState;
  current: ConnectionState;
  reason?: string;
}

/**
 * Outbound action fields in wire order. `Action` is required; `ActionID` is
 * assigned by the correlator and must not be supplied by callers.
 */
export type ActionFields = { Action: string } & Record<string, string | readonly string[]>;

export type FramedItem =
  | { type: 'greeting'; line: string }
  | { type: 'block'; lines: string[] };
