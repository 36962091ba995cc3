import { ReadingDTO } from '../../src/ingestion/dto/reading.dto';
import { ParseReport } from '../../src/ingestion/interfaces/parser.interface';
import { createCsvBuffer } from './csv-builder';

/**
 * Helper to collect all DTOs from async generator
 */
export async function collectDTOs(
  generator: AsyncGenerator<ReadingDTO>,
): Promise<ReadingDTO[]> {
  const results: ReadingDTO[] = [];
  for await (const dto of generator) {
    results.push(dto);
  }
  return results;
}

/**
 * Parser interface for parseAndCollect helper
 */
interface Parser {
  parse(buffer: Buffer, report?: ParseReport): AsyncGenerator<ReadingDTO>;
}

/**
 * Higher-level helper: parse CSV lines and collect results
 * Combines createCsvBuffer + collectDTOs in one call
 */
export async function parseAndCollect(
  parser: Parser,
  lines: string[],
  report?: ParseReport,
): Promise<ReadingDTO[]> {
  const buffer = createCsvBuffer(lines);
  return collectDTOs(parser.parse(buffer, report));
}
