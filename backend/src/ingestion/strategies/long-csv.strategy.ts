import { Injectable, Logger } from '@nestjs/common';
import {
  IParser,
  ParseReport,
  ParserError,
  createParseReport,
} from '../interfaces/parser.interface';
import { ReadingDTO } from '../dto/reading.dto';
import { CPCB_LIMITS, normalizePollutant } from '../../compliance';
import { CsvRow, readCsvRows } from '../utils/csv-reader';
import {
  CITY_FIELDS,
  TIMESTAMP_FIELDS,
  findColumn,
  snippetHeaders,
} from '../utils/columns';
import {
  parseConcentration,
  parseNumber,
  parseTimestamp,
  safeGetAndTrim,
  toCamelCase,
} from '../utils/value-parsers';

const POLLUTANT_FIELDS = ['pollutant', 'parameter', 'pollutantid'];
const VALUE_FIELDS = ['value', 'concentration', 'pollutantavg'];

interface LongLayout {
  cityColumn: string;
  timestampColumn: string;
  pollutantColumn: string;
  valueColumn: string;
  metadataColumns: Map<string, string>;
}

/**
 * Long (Entity-Attribute-Value) Air-Quality CSV Strategy
 *
 * One row per city, timestamp and pollutant:
 *
 * ```
 * city,timestamp,pollutant,value
 * Delhi,2024-01-01T00:00:00Z,PM2.5,65
 * Delhi,2024-01-01T00:00:00Z,NO2,40
 * ```
 *
 * Rows are grouped by timestamp + city and pivoted into one reading.
 * When a pollutant repeats inside a group the last value wins.
 */
@Injectable()
export class LongCsvParser implements IParser {
  private readonly logger = new Logger(LongCsvParser.name);

  readonly name = 'long';
  readonly description =
    'Long CSV: one row per city, timestamp and pollutant (pivoted on import)';

  canHandle(_filename: string, snippet: string): boolean {
    const headers = snippetHeaders(snippet);
    return (
      headers.some((header) => POLLUTANT_FIELDS.includes(header)) &&
      headers.some((header) => VALUE_FIELDS.includes(header))
    );
  }

  async *parse(
    fileBuffer: Buffer,
    report: ParseReport = createParseReport(),
  ): AsyncGenerator<ReadingDTO> {
    const rows = await readCsvRows(fileBuffer);
    if (rows.length === 0) {
      throw new ParserError(this.name, 'File is empty or has no data rows');
    }

    const layout = this.resolveLayout(Object.keys(rows[0]));
    const groups = new Map<string, ReadingDTO>();

    for (let i = 0; i < rows.length; i++) {
      if (!this.mergeRow(groups, rows[i], i, layout, report)) {
        report.rowsSkipped++;
      }
    }

    this.logger.log(
      `Grouped ${rows.length} rows into ${groups.size} readings (${report.rowsSkipped} rows skipped)`,
    );

    yield* groups.values();
  }

  private resolveLayout(headers: string[]): LongLayout {
    const cityColumn = this.requireColumn(headers, CITY_FIELDS, 'city');
    const timestampColumn = this.requireColumn(
      headers,
      TIMESTAMP_FIELDS,
      'timestamp',
    );
    const pollutantColumn = this.requireColumn(
      headers,
      POLLUTANT_FIELDS,
      'pollutant',
    );
    const valueColumn = this.requireColumn(headers, VALUE_FIELDS, 'value');

    const used = new Set([
      cityColumn,
      timestampColumn,
      pollutantColumn,
      valueColumn,
    ]);
    const metadataColumns = new Map<string, string>();
    for (const header of headers) {
      if (used.has(header)) continue;
      const key = toCamelCase(header);
      if (key) {
        metadataColumns.set(header, key);
      }
    }

    return {
      cityColumn,
      timestampColumn,
      pollutantColumn,
      valueColumn,
      metadataColumns,
    };
  }

  /**
   * @throws ParserError when no header matches
   */
  private requireColumn(
    headers: string[],
    candidates: string[],
    role: string,
  ): string {
    const header = findColumn(headers, candidates);
    if (!header) {
      throw new ParserError(
        this.name,
        `Missing ${role} column (expected one of: ${candidates.join(', ')})`,
      );
    }
    return header;
  }

  /**
   * Fold one row into its reading group; false when the row is unusable
   */
  private mergeRow(
    groups: Map<string, ReadingDTO>,
    row: CsvRow,
    rowIndex: number,
    layout: LongLayout,
    report: ParseReport,
  ): boolean {
    const city = safeGetAndTrim(row, layout.cityColumn);
    if (!city) {
      this.logRowWarning(rowIndex, 'Missing city');
      return false;
    }

    const rawTimestamp = safeGetAndTrim(row, layout.timestampColumn);
    const timestamp = parseTimestamp(rawTimestamp);
    if (!timestamp) {
      this.logRowWarning(
        rowIndex,
        `No valid timestamp found. Raw value: "${rawTimestamp}"`,
      );
      return false;
    }

    const rawPollutant = safeGetAndTrim(row, layout.pollutantColumn);
    const pollutant = normalizePollutant(rawPollutant);
    if (!pollutant) {
      this.logRowWarning(rowIndex, `Unknown pollutant "${rawPollutant}"`);
      return false;
    }

    const groupKey = `${timestamp.toISOString()}|${city}`;
    let dto = groups.get(groupKey);
    if (!dto) {
      dto = { timestamp, city, metadata: {} };
      groups.set(groupKey, dto);
    }

    const rawValue = safeGetAndTrim(row, layout.valueColumn);
    const { value, clipped } = parseConcentration(rawValue);
    if (clipped) {
      report.valuesClipped++;
      this.logRowWarning(
        rowIndex,
        `Negative ${pollutant} "${rawValue}" clipped to 0`,
      );
    }
    dto[CPCB_LIMITS[pollutant].column] = value;

    const metadata = dto.metadata ?? {};
    for (const [header, key] of layout.metadataColumns) {
      const raw = safeGetAndTrim(row, header);
      if (raw === '') continue;
      metadata[key] = parseNumber(raw) ?? raw;
    }
    dto.metadata = metadata;

    return true;
  }

  /**
   * Log a warning for a row, but only for the first few rows
   */
  private logRowWarning(rowIndex: number, message: string): void {
    if (rowIndex < 5) {
      this.logger.warn(`Row ${rowIndex + 1}: ${message}`);
    }
  }
}
