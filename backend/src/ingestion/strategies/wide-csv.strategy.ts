import { Injectable, Logger } from '@nestjs/common';
import {
  IParser,
  ParseReport,
  ParserError,
  createParseReport,
} from '../interfaces/parser.interface';
import { ReadingDTO } from '../dto/reading.dto';
import {
  CPCB_LIMITS,
  PollutantColumn,
  normalizePollutant,
} from '../../compliance';
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

interface WideLayout {
  cityColumn: string;
  timestampColumn: string;
  /** Header -> Reading column, first header wins per pollutant */
  pollutantColumns: Map<string, PollutantColumn>;
  /** Header -> metadata key */
  metadataColumns: Map<string, string>;
}

/**
 * Wide Air-Quality CSV Strategy
 *
 * One row per city and timestamp, one column per pollutant:
 *
 * ```
 * City,Datetime,PM2_5_ugm3,PM10_ugm3,NO2_ugm3,SO2_ugm3,CO_ugm3,O3_ugm3,Temperature_C,Humidity_pct
 * Delhi,2024-01-01 00:00:00,65,100,40,10,1.5,30,12.5,80
 * ```
 *
 * Pollutant headers are recognized through `normalizePollutant`, so
 * "PM2.5", "pm25" and "PM2_5_ugm3" all land in `pm25`. Any other column
 * is kept in metadata under its camelCased name.
 */
@Injectable()
export class WideCsvParser implements IParser {
  private readonly logger = new Logger(WideCsvParser.name);

  readonly name = 'wide';
  readonly description =
    'Wide CSV: one row per city and timestamp, one column per pollutant';

  private readonly filenamePatterns = [/cpcb/i, /air[_-]?quality/i];

  canHandle(filename: string, snippet: string): boolean {
    if (this.filenamePatterns.some((pattern) => pattern.test(filename))) {
      return true;
    }

    const headers = snippetHeaders(snippet);
    const hasPollutantColumn = headers.some((header) => {
      const pollutant = normalizePollutant(header);
      return pollutant === 'PM2.5' || pollutant === 'PM10';
    });
    const hasKeys =
      headers.some((header) => CITY_FIELDS.includes(header)) &&
      headers.some((header) => TIMESTAMP_FIELDS.includes(header));

    return hasPollutantColumn && hasKeys;
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
    this.logger.log(
      `Read ${rows.length} rows, pollutant columns: ${[...layout.pollutantColumns.keys()].join(', ')}`,
    );

    let yielded = 0;
    for (let i = 0; i < rows.length; i++) {
      const dto = this.transformRow(rows[i], i, layout, report);
      if (dto) {
        yielded++;
        yield dto;
      } else {
        report.rowsSkipped++;
      }
    }

    this.logger.log(
      `Parsed ${yielded} readings (${report.rowsSkipped} rows skipped, ${report.valuesClipped} negative values clipped)`,
    );
  }

  /**
   * Map headers to city, timestamp, pollutant and metadata columns
   *
   * @throws ParserError when the city or timestamp column is missing
   */
  private resolveLayout(headers: string[]): WideLayout {
    const cityColumn = findColumn(headers, CITY_FIELDS);
    if (!cityColumn) {
      throw new ParserError(
        this.name,
        `Missing city column (expected one of: ${CITY_FIELDS.join(', ')})`,
      );
    }

    const timestampColumn = findColumn(headers, TIMESTAMP_FIELDS);
    if (!timestampColumn) {
      throw new ParserError(
        this.name,
        `Missing timestamp column (expected one of: ${TIMESTAMP_FIELDS.join(', ')})`,
      );
    }

    const pollutantColumns = new Map<string, PollutantColumn>();
    const metadataColumns = new Map<string, string>();
    const taken = new Set<PollutantColumn>();

    for (const header of headers) {
      if (header === cityColumn || header === timestampColumn) continue;

      const pollutant = normalizePollutant(header);
      if (pollutant && !taken.has(CPCB_LIMITS[pollutant].column)) {
        const { column } = CPCB_LIMITS[pollutant];
        pollutantColumns.set(header, column);
        taken.add(column);
        continue;
      }

      const key = toCamelCase(header);
      if (key) {
        metadataColumns.set(header, key);
      }
    }

    return { cityColumn, timestampColumn, pollutantColumns, metadataColumns };
  }

  private transformRow(
    row: CsvRow,
    rowIndex: number,
    layout: WideLayout,
    report: ParseReport,
  ): ReadingDTO | null {
    const city = safeGetAndTrim(row, layout.cityColumn);
    if (!city) {
      this.logRowWarning(rowIndex, 'Missing city');
      return null;
    }

    const rawTimestamp = safeGetAndTrim(row, layout.timestampColumn);
    const timestamp = parseTimestamp(rawTimestamp);
    if (!timestamp) {
      this.logRowWarning(
        rowIndex,
        `No valid timestamp found. Raw value: "${rawTimestamp}"`,
      );
      return null;
    }

    const dto: ReadingDTO = { timestamp, city, metadata: {} };

    for (const [header, column] of layout.pollutantColumns) {
      const { value, clipped } = parseConcentration(row[header]);
      if (clipped) {
        report.valuesClipped++;
        this.logRowWarning(
          rowIndex,
          `Negative ${header} "${row[header]}" clipped to 0`,
        );
      }
      dto[column] = value;
    }

    const metadata: Record<string, unknown> = {};
    for (const [header, key] of layout.metadataColumns) {
      const raw = safeGetAndTrim(row, header);
      if (raw === '') continue;
      metadata[key] = parseNumber(raw) ?? raw;
    }
    dto.metadata = metadata;

    return dto;
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
