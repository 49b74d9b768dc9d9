/*
 * This module reads comma-separated values as described in
 * https://www.rfc-editor.org/rfc/rfc4180 using recursive descent,
 * with the usual relaxations:
 *
 * - lines may end with either CRLF, LF or a lone CR
 * - the final line break is optional
 * - a leading UTF-8 byte order mark is ignored
 * - a double quote in the middle of an unquoted field is kept as-is
 *
 * A typical usecase of this module would be:
 *
 * ```ts
 * import { parseCsvRows } from './csv';
 *
 * for (const row of parseCsvRows('url,title\nhttps://example.com,"Hello, world"\n')) {
 *   // ['url', 'title'], then ['https://example.com', 'Hello, world']
 * }
 * ```
 *
 * Function prefixes follow the same conventions as our other recursive
 * descent parsers: `accept` functions never advance or throw, `expect`
 * functions advance past the expected value or throw, and `parse`
 * functions advance and return the parsed value or throw.
 */

import { StringPeekableStream, TextPeekableStream, TextScanner } from './textStream';

const SEPARATOR = ',';
const QUOTE = '"';
const BYTE_ORDER_MARK = '\uFEFF';

/**
 * Raised when the text cannot be read as CSV, e.g., an unterminated quoted
 * field.
 */
export class CsvSyntaxError extends Error {
  /**
   * The 1-based physical line on which the problem was found
   */
  readonly line: number;

  constructor(message: string, line: number) {
    super(`${message} (line ${line})`);
    this.name = 'CsvSyntaxError';
    this.line = line;
  }
}

// Only used when reporting an error
const lineAt = (text: string, end: number): number => {
  let line = 1;
  for (let i = 0; i < end; i++) {
    if (text[i] === '\n' || (text[i] === '\r' && text[i + 1] !== '\n')) {
      line++;
    }
  }
  return line;
};

const unquotedFieldEndScanner: TextScanner = (text, start) => {
  for (let i = start; i < text.length; i++) {
    const c = text[i];
    if (c === SEPARATOR || c === '\n' || c === '\r') {
      return i;
    }
  }
  return -1;
};

const quoteScanner: TextScanner = (text, start) => text.indexOf(QUOTE, start);

/**
 * Checks if the stream is at a line break
 */
export const acceptLineBreak = (stream: TextPeekableStream): boolean => {
  const next = stream.peek(1);
  return next === '\n' || next === '\r';
};

/**
 * Consumes a single line break, treating CRLF as one line break
 */
export const expectLineBreak = (stream: TextPeekableStream): void => {
  if (stream.peek(2) === '\r\n') {
    stream.advance(2);
    return;
  }
  if (!acceptLineBreak(stream)) {
    throw new Error(`expected line break at ${stream.tell()}`);
  }
  stream.advance(1);
};

/**
 * Checks if the next field is quoted
 */
export const acceptQuotedField = (stream: TextPeekableStream): boolean => {
  return stream.peek(1) === QUOTE;
};

/**
 * Parses a quoted field, returning its value without the surrounding quotes
 * and with doubled quotes collapsed. The field must be followed by a
 * separator, a line break or the end of the text.
 *
 * @param text the full text behind the stream, for error reporting
 */
export const parseQuotedField = (stream: TextPeekableStream, text: string): string => {
  const openedAt = stream.tell();
  stream.advance(1);

  let value = '';
  while (true) {
    const closeOffset = stream.scan(quoteScanner);
    if (closeOffset === -1) {
      throw new CsvSyntaxError('unterminated quoted field', lineAt(text, openedAt));
    }

    value += stream.readExactly(closeOffset);
    stream.advance(1);

    if (stream.peek(1) === QUOTE) {
      value += QUOTE;
      stream.advance(1);
      continue;
    }
    break;
  }

  if (stream.remaining > 0 && stream.peek(1) !== SEPARATOR && !acceptLineBreak(stream)) {
    throw new CsvSyntaxError(
      'unexpected text after closing quote',
      lineAt(text, stream.tell())
    );
  }
  return value;
};

/**
 * Parses an unquoted field, which may be empty
 */
export const parseUnquotedField = (stream: TextPeekableStream): string => {
  let endOffset = stream.scan(unquotedFieldEndScanner);
  if (endOffset === -1) {
    endOffset = stream.remaining;
  }
  return stream.readExactly(endOffset);
};

/**
 * Parses a single field, quoted or not
 */
export const parseField = (stream: TextPeekableStream, text: string): string => {
  if (acceptQuotedField(stream)) {
    return parseQuotedField(stream, text);
  }
  return parseUnquotedField(stream);
};

/**
 * Parses one record, stopping before the line break that ends it (if any).
 */
export const parseRecord = (stream: TextPeekableStream, text: string): string[] => {
  const fields = [parseField(stream, text)];
  while (stream.peek(1) === SEPARATOR) {
    stream.advance(1);
    fields.push(parseField(stream, text));
  }
  return fields;
};

/**
 * Lazily parses the given CSV text into rows of fields. The header row, if
 * any, is returned like any other row. Empty lines are returned as a row
 * with a single empty field.
 *
 * @param text the full CSV text
 * @throws CsvSyntaxError when the text is not valid CSV; rows before the
 *   problem have already been yielded at that point
 */
export function* parseCsvRows(text: string): Generator<string[], void, undefined> {
  const stream = new StringPeekableStream(text);
  if (stream.peek(1) === BYTE_ORDER_MARK) {
    stream.advance(1);
  }

  while (stream.remaining > 0) {
    yield parseRecord(stream, text);
    if (stream.remaining > 0) {
      expectLineBreak(stream);
    }
  }
}
