import { StringDecoder } from 'node:string_decoder';
import { StreamClosedError, StreamError } from '../errors';
import type { FramedItem } from './types';

export interface LineFramerOptions {
  /**
   * The manager interface announces itself with a single banner line
   * (`Asterisk Call Manager/5.0.1`) before the first block.
   */
  expectGreeting?: boolean;
}

function isBlank(line: string): boolean {
  return line.trim() === '';
}

export class LineFramer {
  private readonly decoder = new StringDecoder('utf8');
  private buffer = '';
  private lines: string[] = [];
  private greetingPending: boolean;

  constructor(options: LineFramerOptions = {}) {
    this.greetingPending = options.expectGreeting === true;
  }

  public push(chunk: Buffer | string): FramedItem[] {
    this.buffer += typeof chunk === 'string' ? chunk : this.decoder.write(chunk);
    const items: FramedItem[] = [];

    let newline = this.buffer.indexOf('\n');
    while (newline !== -1) {
      let line = this.buffer.slice(0, newline);
      this.buffer = this.buffer.slice(newline + 1);
      if (line.endsWith('\r')) {
        line = line.slice(0, -1);
      }
      this.acceptLine(line, items);
      newline = this.buffer.indexOf('\n');
    }

    return items;
  }

  /** Bytes and lines held back waiting for the rest of a block. */
  public get pendingLength(): number {
    return this.buffer.length + this.lines.reduce((sum, line) => sum + line.length + 1, 0);
  }

  private acceptLine(line: string, items: FramedItem[]): void {
    if (isBlank(line)) {
      if (this.lines.length > 0) {
        items.push({ type: 'block', lines: this.lines });
        this.lines = [];
      }
      return;
    }

    if (this.greetingPending && this.lines.length === 0) {
      this.greetingPending = false;
      if (!line.includes(':')) {
        items.push({ type: 'greeting', line: line.trim() });
        return;
      }
    }

    this.lines.push(this.lines.length === 0 ? line.trimStart() : line);
  }
}

/**
 * Lazily frames a byte stream. One sequence per connection: it ends by
 * throwing StreamClosedError when the source ends and StreamError when it fails.
 */
export async function* frameStream(
  source: AsyncIterable<Buffer | string>,
  options: LineFramerOptions = {},
): AsyncGenerator<FramedItem, never, undefined> {
  const framer = new LineFramer(options);
  const iterator = source[Symbol.asyncIterator]();

  while (true) {
    let next: IteratorResult<Buffer | string>;
    try {
      next = await iterator.next();
    } catch (error) {
      throw new StreamError(error);
    }
    if (next.done) {
      throw new StreamClosedError();
    }
    for (const item of framer.push(next.value)) {
      yield item;
    }
  }
}
