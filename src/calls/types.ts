export type CallId = string;

export type CallState = 'RINGING' | 'ANSWERED' | 'ENDED';

export type CallDirection = 'INBOUND' | 'OUTBOUND' | 'INTERNAL' | 'UNKNOWN';

export const END_CAUSES = [
  'normal_clearing',
  'no_answer',
  'busy',
  'failed',
  'connection_lost',
  'unknown',
] as const;

export type EndCause = (typeof END_CAUSES)[number];

/** Read-only copy handed to consumers; the tracker keeps the live record. */
export interface CallSnapshot {
  readonly callId: CallId;
  readonly linkedId?: string;
  readonly channel: string;
  readonly extension: string;
  readonly callerIdName?: string;
  readonly callerIdNumber?: string;
  readonly direction: CallDirection;
  readonly state: CallState;
  readonly startedAt: Date;
  readonly answeredAt: Date | null;
  readonly endedAt: Date | null;
  readonly endCause: EndCause | null;
  /** Raw hang-up cause code and text as the server reported them. */
  readonly causeCode?: string;
  readonly causeText?: string;
  /** Rang at the monitored extension and ended without being answered. */
  readonly missed: boolean;
}

export type CallTransition = 'started' | 'answered' | 'ended';

export type CallHandler = (call: CallSnapshot) => void;
