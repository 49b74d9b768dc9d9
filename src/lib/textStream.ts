/**
 * Indicates there is not enough text for the requested operation.
 */
export class TextUnderflowError extends Error {
  constructor() {
    super('text underflow');
  }
}

/**
 * Receives the full text and the current position, and returns the absolute
 * index of whatever it was looking for at or after `start`, or -1 if it is
 * not present.
 */
export type TextScanner = (text: string, start: number) => number;

/**
 * A synchronous stream over text held in memory, where callers can peek at
 * upcoming characters without consuming them. Offsets and sizes are in UTF-16
 * code units, i.e., they match `String.prototype.length`.
 *
 * Parsers built on this type are expected to work on one logical document at
 * a time, e.g., one CSV file, and to advance at most a handful of characters
 * per call.
 */
export interface TextPeekableStream {
  /**
   * Reads exactly the given number of characters and returns them.
   *
   * @throws TextUnderflowError if there are fewer than `size` characters remaining
   */
  readExactly: (size: number) => string;

  /**
   * Skips exactly the given number of characters.
   *
   * @throws TextUnderflowError if there are fewer than `size` characters remaining
   */
  advance: (size: number) => void;

  /**
   * Returns up to the given number of characters without advancing the
   * stream. Calling peek multiple times in a row gives the same result.
   */
  peek: (maxSize: number) => string;

  /**
   * Invokes the scanner on the remaining text and returns the offset it found
   * relative to the current position, or -1 if the scanner found nothing.
   * The stream is not advanced.
   */
  scan: (scanner: TextScanner) => number;

  /**
   * How many characters are remaining to be read.
   */
  get remaining(): number;

  /**
   * How many characters have been read so far.
   */
  tell(): number;
}

/**
 * The standard text stream, backed by a single string.
 */
export class StringPeekableStream implements TextPeekableStream {
  private readonly text: string;
  private offset: number;

  constructor(text: string) {
    this.text = text;
    this.offset = 0;
  }

  get remaining() {
    return this.text.length - this.offset;
  }

  tell() {
    return this.offset;
  }

  readExactly(size: number): string {
    if (this.remaining < size) {
      throw new TextUnderflowError();
    }
    const result = this.text.substring(this.offset, this.offset + size);
    this.offset += size;
    return result;
  }

  advance(size: number): void {
    if (size < 0) {
      throw new Error('size must be non-negative');
    }
    if (this.remaining < size) {
      throw new TextUnderflowError();
    }
    this.offset += size;
  }

  peek(maxSize: number): string {
    return this.text.substring(this.offset, this.offset + Math.min(maxSize, this.remaining));
  }

  scan(scanner: TextScanner): number {
    const found = scanner(this.text, this.offset);
    if (found === -1) {
      return -1;
    }
    if (found < this.offset) {
      throw new Error('scanner returned a position before the current offset');
    }
    return found - this.offset;
  }
}
