import { AmiMessage } from './message';
import type { ActionFields, MessageField } from './types';

/**
 * Parses one framed block. Never throws: lines without a colon continue the
 * previous field and unrecognized fields are kept as they are.
 */
export function parseMessage(lines: readonly string[], receivedAt: Date = new Date()): AmiMessage {
  const fields: MessageField[] = [];

  for (const line of lines) {
    const colon = line.indexOf(':');
    if (colon <= 0) {
      const last = fields[fields.length - 1];
      if (last) {
        last.value = `${last.value}\n${line}`;
      } else {
        fields.push({ name: '', value: line });
      }
      continue;
    }

    fields.push({
      name: line.slice(0, colon).trim(),
      value: line.slice(colon + 1).trim(),
    });
  }

  return new AmiMessage(fields, receivedAt);
}

function sanitizeValue(value: string): string {
  return value.replace(/[\r\n]+/g, ' ');
}

/** Serializes an action as CRLF-terminated `Name: Value` lines plus the blank terminator. */
export function serializeAction(fields: ActionFields & { ActionID: string }): string {
  let out = '';
  for (const [name, value] of Object.entries(fields)) {
    const values: readonly string[] = typeof value === 'string' ? [value] : value;
    for (const item of values) {
      out += `${name}: ${sanitizeValue(item)}\r\n`;
    }
  }
  return `${out}\r\n`;
}
