import type { MessageField, MessageKind } from './types';

function normalizeName(name: string): string {
  return name.trim().toLowerCase();
}

export class AmiMessage {
  public readonly kind: MessageKind;
  public readonly fields: ReadonlyArray<Readonly<MessageField>>;
  public readonly receivedAt: Date;
  private readonly index: ReadonlyMap<string, readonly string[]>;

  constructor(fields: MessageField[], receivedAt: Date = new Date()) {
    this.fields = Object.freeze(fields.map((field) => Object.freeze({ ...field })));
    this.receivedAt = receivedAt;

    const index = new Map<string, string[]>();
    for (const field of this.fields) {
      const key = normalizeName(field.name);
      const values = index.get(key);
      if (values) {
        values.push(field.value);
      } else {
        index.set(key, [field.value]);
      }
    }
    for (const values of index.values()) {
      Object.freeze(values);
    }
    this.index = index;

    if (index.has('event')) {
      this.kind = 'EVENT';
    } else if (index.has('response')) {
      this.kind = 'RESPONSE';
    } else {
      this.kind = 'UNKNOWN';
    }
  }

  /** First value of a field, matched case-insensitively. */
  public get(name: string): string | undefined {
    return this.index.get(normalizeName(name))?.[0];
  }

  /** Every value of a repeated field in wire order. */
  public getAll(name: string): readonly string[] {
    return this.index.get(normalizeName(name)) ?? [];
  }

  public has(name: string): boolean {
    return this.index.has(normalizeName(name));
  }

  /** Non-empty value or undefined; `<unknown>` placeholders count as empty. */
  public getNonEmpty(name: string): string | undefined {
    const value = this.get(name)?.trim();
    if (!value || value === '<unknown>') {
      return undefined;
    }
    return value;
  }

  public get eventName(): string | undefined {
    return this.kind === 'EVENT' ? this.get('Event') : undefined;
  }

  public get actionId(): string | undefined {
    return this.get('ActionID');
  }

  public get response(): string | undefined {
    return this.kind === 'RESPONSE' ? this.get('Response') : undefined;
  }

  /** Distinct field names in first-seen order, original case. */
  public names(): string[] {
    const seen = new Set<string>();
    const names: string[] = [];
    for (const field of this.fields) {
      const key = normalizeName(field.name);
      if (!seen.has(key)) {
        seen.add(key);
        names.push(field.name);
      }
    }
    return names;
  }

  /** Flattened view for logging; repeated fields keep their first value. */
  public toRecord(): Record<string, string> {
    const record: Record<string, string> = {};
    for (const field of this.fields) {
      if (!(field.name in record)) {
        record[field.name] = field.value;
      }
    }
    return record;
  }
}
