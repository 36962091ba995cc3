import { ReadingDTO } from '../dto/reading.dto';

/**
 * IParser Interface - Strategy Pattern for File Parsing
 *
 * Each supported file layout implements this interface to turn its rows
 * into `ReadingDTO`s.
 *
 * Usage:
 * ```typescript
 * const parser = parsers.find(p => p.canHandle(filename, snippet));
 * if (parser) {
 *   for await (const reading of parser.parse(buffer)) {
 *     batch.push(reading);
 *   }
 * }
 * ```
 */
export interface IParser {
  /**
   * Unique identifier for this parser, also the `/ingest/:format` name.
   * Examples: 'wide', 'long'
   */
  readonly name: string;

  readonly description: string;

  /**
   * Determine if this parser can handle the given file. Only consulted
   * when the upload asks for format detection.
   *
   * Should only look at the filename and the first 1-2KB of content.
   *
   * @param filename - Original upload name
   * @param snippet - Start of the file content for header inspection
   */
  canHandle(filename: string, snippet: string): boolean;

  /**
   * Parse the file buffer and yield one reading per city and timestamp.
   *
   * - Rows without a city or a valid timestamp are skipped with a warning
   * - Timestamps without a zone are read as UTC
   * - Known pollutant columns map to ReadingDTO fields, the rest to metadata
   *
   * @param report - Counters for skipped rows and clipped values
   * @throws ParserError if the file is empty or lacks required columns
   */
  parse(fileBuffer: Buffer, report?: ParseReport): AsyncGenerator<ReadingDTO>;
}

/**
 * Custom error for parser-specific failures.
 */
export class ParserError extends Error {
  constructor(
    public readonly parserName: string,
    message: string,
    public readonly originalError?: Error,
  ) {
    super(`[${parserName}] ${message}`);
    this.name = 'ParserError';
  }
}

/**
 * Per-file counters a parser fills in while yielding readings
 */
export interface ParseReport {
  /** Rows dropped for a missing city, bad timestamp or unknown pollutant */
  rowsSkipped: number;
  /** Negative concentrations stored as 0 */
  valuesClipped: number;
}

export function createParseReport(): ParseReport {
  return { rowsSkipped: 0, valuesClipped: 0 };
}
