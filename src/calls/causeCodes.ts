import type { EndCause } from './types';

/**
 * Q.850 hang-up causes as Asterisk reports them in `Hangup` events. PBX
 * builds differ, so deployments can override entries through `causeMap`.
 */
export const DEFAULT_CAUSE_MAP: Readonly<Record<string, EndCause>> = Object.freeze({
  '1': 'failed', // unallocated number
  '3': 'failed', // no route to destination
  '16': 'normal_clearing',
  '17': 'busy',
  '18': 'no_answer', // no user responding
  '19': 'no_answer', // no answer from user
  '21': 'failed', // call rejected
  '22': 'failed', // number changed
  '26': 'no_answer', // answered elsewhere
  '27': 'failed', // destination out of order
  '28': 'failed', // invalid number format
  '31': 'normal_clearing', // normal, unspecified
  '34': 'failed', // no circuit available
  '38': 'failed', // network out of order
  '41': 'failed', // temporary failure
  '42': 'failed', // switching equipment congestion
  '44': 'failed', // requested channel not available
  '58': 'failed', // bearer capability not available
  '102': 'failed', // recovery on timer expiry
  '111': 'failed', // protocol error
  '127': 'failed', // interworking
});

export type CauseMapper = (code: string | undefined) => EndCause;

export function createCauseMapper(overrides: Record<string, EndCause> = {}): CauseMapper {
  const table = new Map<string, EndCause>(Object.entries({ ...DEFAULT_CAUSE_MAP, ...overrides }));

  return (code) => {
    const normalized = code?.trim();
    if (!normalized) {
      return 'unknown';
    }
    // Asterisk pads some codes ("016") depending on the channel driver
    const key = /^\d+$/.test(normalized) ? String(Number(normalized)) : normalized;
    return table.get(key) ?? 'unknown';
  };
}
