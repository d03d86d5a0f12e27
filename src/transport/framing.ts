// This module splits a byte stream into protocol payloads and commits to one framing discipline per connection.

import { TextDecoder } from 'node:util';
import { FramingError } from '../utils/errors.js';

export type FramingMode = 'undetected' | 'length_prefixed' | 'line_delimited';

export interface StreamFramerOptions {
  maxFrameBytes: number;
}

export interface FramerOutput {
  frames: string[];
  error: FramingError | null;
}

interface HeaderBlock {
  bodyOffset: number;
  contentLength: number;
}

const LF = 0x0a;
const CR = 0x0d;
const SPACE = 0x20;
const TAB = 0x09;
const COLON = 0x3a;

const MAX_HEADER_BYTES = 8 * 1024;
const CONTENT_LENGTH_NAME = 'content-length';
const HEADER_LINE_PATTERN = /^[A-Za-z0-9-]+\s*:/;
const CONTENT_LENGTH_LINE_PATTERN = /^content-length\s*:/i;
const CONTENT_LENGTH_VALUE_PATTERN = /^content-length\s*:\s*(\d+)\s*$/i;
const HEADER_START_PATTERN = /^[A-Za-z0-9-]/;

const utf8 = new TextDecoder('utf-8', { fatal: true });

// This helper keeps offending input short enough to be logged safely.
function preview(text: string): string {
  return text.length > 64 ? `${text.slice(0, 64)}...` : text;
}

function decodeUtf8(bytes: Buffer): string {
  try {
    return utf8.decode(bytes);
  } catch {
    throw new FramingError('Payload is not valid UTF-8.');
  }
}

// Detection happens once; afterwards the chosen discipline is fixed for the connection.
export class StreamFramer {
  private buffer: Buffer = Buffer.alloc(0);
  private currentMode: FramingMode = 'undetected';
  private failure: FramingError | null = null;
  private readonly maxFrameBytes: number;

  public constructor(options: StreamFramerOptions) {
    this.maxFrameBytes = options.maxFrameBytes;
  }

  public get mode(): FramingMode {
    return this.currentMode;
  }

  public get failed(): boolean {
    return this.failure !== null;
  }

  // Frames completed before a failure are still returned so they can be answered.
  public push(chunk: Buffer | string): FramerOutput {
    if (this.failure) {
      return { frames: [], error: null };
    }

    const bytes = typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk;
    this.buffer = this.buffer.length === 0 ? bytes : Buffer.concat([this.buffer, bytes]);

    const frames: string[] = [];
    try {
      let frame = this.nextFrame();
      while (frame !== null) {
        frames.push(frame);
        frame = this.nextFrame();
      }
      return { frames, error: null };
    } catch (error) {
      return { frames, error: this.fail(error) };
    }
  }

  // Called at end of stream: a trailing unterminated line is accepted, a truncated length-prefixed frame is not.
  public finish(): FramerOutput {
    if (this.failure) {
      return { frames: [], error: null };
    }

    const rest = this.buffer.toString('latin1').trim();
    if (rest.length === 0) {
      return { frames: [], error: null };
    }

    if (this.currentMode === 'length_prefixed') {
      return {
        frames: [],
        error: this.fail(new FramingError(`Stream ended inside a frame (${this.buffer.length} bytes pending).`))
      };
    }

    try {
      const line = decodeUtf8(this.buffer).replace(/\r$/, '');
      this.buffer = Buffer.alloc(0);
      this.currentMode = 'line_delimited';
      return { frames: [line], error: null };
    } catch (error) {
      return { frames: [], error: this.fail(error) };
    }
  }

  // This method frames one outbound payload in the committed discipline.
  public encode(payload: string): Buffer {
    const body = Buffer.from(payload, 'utf8');
    if (this.currentMode === 'length_prefixed') {
      return Buffer.concat([Buffer.from(`Content-Length: ${body.length}\r\n\r\n`, 'latin1'), body]);
    }

    return Buffer.concat([body, Buffer.from('\n', 'latin1')]);
  }

  private fail(error: unknown): FramingError {
    const failure = error instanceof FramingError ? error : new FramingError(String(error));
    this.failure = failure;
    this.buffer = Buffer.alloc(0);
    return failure;
  }

  private nextFrame(): string | null {
    if (this.currentMode === 'undetected') {
      this.skipLeading(true);
      if (this.buffer.length === 0) {
        return null;
      }

      const detected = this.detect();
      if (detected === null) {
        return null;
      }
      this.currentMode = detected;
    }

    return this.currentMode === 'length_prefixed' ? this.nextLengthPrefixed() : this.nextLine();
  }

  // Returns null while the buffered bytes are still a prefix of a Content-Length header name.
  private detect(): FramingMode | null {
    const probeLength = Math.min(this.buffer.length, CONTENT_LENGTH_NAME.length);
    const probe = this.buffer.subarray(0, probeLength).toString('latin1').toLowerCase();
    if (probe !== CONTENT_LENGTH_NAME.slice(0, probeLength)) {
      return 'line_delimited';
    }

    let index = CONTENT_LENGTH_NAME.length;
    while (index < this.buffer.length && (this.buffer[index] === SPACE || this.buffer[index] === TAB)) {
      index += 1;
    }

    if (index >= this.buffer.length) {
      return null;
    }

    return this.buffer[index] === COLON ? 'length_prefixed' : 'line_delimited';
  }

  private skipLeading(includeBlanks: boolean): void {
    let index = 0;
    while (index < this.buffer.length) {
      const byte = this.buffer[index];
      const isLineBreak = byte === LF || byte === CR;
      const isBlank = byte === SPACE || byte === TAB;
      if (!isLineBreak && !(includeBlanks && isBlank)) {
        break;
      }
      index += 1;
    }

    if (index > 0) {
      this.buffer = this.buffer.subarray(index);
    }
  }

  private nextLengthPrefixed(): string | null {
    this.skipLeading(false);
    if (this.buffer.length === 0) {
      return null;
    }

    const header = this.readHeaderBlock();
    if (header === null) {
      return null;
    }

    const bodyEnd = header.bodyOffset + header.contentLength;
    if (this.buffer.length < bodyEnd) {
      return null;
    }

    const body = this.buffer.subarray(header.bodyOffset, bodyEnd);
    this.buffer = this.buffer.subarray(bodyEnd);
    return decodeUtf8(body);
  }

  private readHeaderBlock(): HeaderBlock | null {
    const firstChar = this.buffer.subarray(0, 1).toString('latin1');
    if (!HEADER_START_PATTERN.test(firstChar)) {
      throw new FramingError(`Expected a Content-Length header block, got: ${preview(this.buffer.toString('latin1'))}`);
    }

    let offset = 0;
    let contentLength: number | null = null;

    for (;;) {
      const newline = this.buffer.indexOf(LF, offset);
      if (newline === -1 || newline > MAX_HEADER_BYTES) {
        if (this.buffer.length > MAX_HEADER_BYTES) {
          throw new FramingError(`Header block exceeds ${MAX_HEADER_BYTES} bytes.`);
        }
        return null;
      }

      const line = this.buffer.subarray(offset, newline).toString('latin1').replace(/\r$/, '');
      offset = newline + 1;

      if (line.length === 0) {
        if (contentLength === null) {
          throw new FramingError('Header block is missing Content-Length.');
        }
        return { bodyOffset: offset, contentLength };
      }

      if (!HEADER_LINE_PATTERN.test(line)) {
        throw new FramingError(`Malformed header line: ${preview(line)}`);
      }

      if (CONTENT_LENGTH_LINE_PATTERN.test(line)) {
        contentLength = this.parseContentLength(line);
      }
    }
  }

  private parseContentLength(line: string): number {
    const match = CONTENT_LENGTH_VALUE_PATTERN.exec(line);
    if (!match) {
      throw new FramingError(`Invalid Content-Length header: ${preview(line)}`);
    }

    const value = Number(match[1]);
    if (!Number.isSafeInteger(value) || value > this.maxFrameBytes) {
      throw new FramingError(`Content-Length ${match[1]} exceeds the maximum frame size of ${this.maxFrameBytes} bytes.`);
    }

    return value;
  }

  private nextLine(): string | null {
    for (;;) {
      const newline = this.buffer.indexOf(LF);
      if (newline === -1) {
        if (this.buffer.length > this.maxFrameBytes) {
          throw new FramingError(`Line exceeds the maximum frame size of ${this.maxFrameBytes} bytes.`);
        }
        return null;
      }

      if (newline > this.maxFrameBytes) {
        throw new FramingError(`Line exceeds the maximum frame size of ${this.maxFrameBytes} bytes.`);
      }

      const raw = this.buffer.subarray(0, newline);
      this.buffer = this.buffer.subarray(newline + 1);

      const line = decodeUtf8(raw).replace(/\r$/, '');
      if (line.trim().length === 0) {
        continue;
      }

      if (CONTENT_LENGTH_LINE_PATTERN.test(line.trimStart())) {
        throw new FramingError('Received a Content-Length header on a line-delimited connection.');
      }

      return line;
    }
  }
}
