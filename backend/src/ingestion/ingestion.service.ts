import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { QueryDeepPartialEntity } from 'typeorm/query-builder/QueryPartialEntity';
import { Reading } from '../database/entities/reading.entity';
import { categorizeAqi, computeAqi } from '../aqi/aqi';
import {
  IParser,
  ParserError,
  createParseReport,
} from './interfaces/parser.interface';
import { LongCsvParser } from './strategies/long-csv.strategy';
import { WideCsvParser } from './strategies/wide-csv.strategy';
import { ReadingDTO } from './dto/reading.dto';
import { IngestFormat } from './dto/ingest-format.dto';

const DEFAULT_BATCH_SIZE = 1000;

/**
 * Ingestion Result Summary
 */
export interface IngestionResult {
  success: boolean;
  filename: string;
  parserUsed: string;
  recordsProcessed: number;
  recordsInserted: number;
  recordsSkipped: number;
  valuesClipped: number;
  errors: string[];
  durationMs: number;
}

/**
 * IngestionService - Orchestrates file parsing and database insertion
 *
 * Responsibilities:
 * 1. Parser Selection: the parser named by the format, or for `auto` the
 *    first registered parser whose `canHandle` accepts the file
 * 2. Stream Processing: readings arrive through an AsyncGenerator
 * 3. Enrichment: AQI and AQI category computed per reading
 * 4. Batch Insertion: upserts of INGESTION_BATCH_SIZE rows, one row per
 *    city and timestamp in each batch
 * 5. Error Handling: bad rows are skipped and counted, the file goes on
 */
@Injectable()
export class IngestionService {
  private readonly logger = new Logger(IngestionService.name);
  private readonly parsers: IParser[];
  private readonly batchSize: number;

  /** System files to skip during ingestion (macOS, Windows, etc.) */
  private readonly IGNORED_FILES = [
    '.DS_Store',
    'Thumbs.db',
    '.gitkeep',
    'desktop.ini',
    '.localized',
  ];

  constructor(
    @InjectRepository(Reading)
    private readonly readingRepository: Repository<Reading>,
    private readonly longCsvParser: LongCsvParser,
    private readonly wideCsvParser: WideCsvParser,
    configService: ConfigService,
  ) {
    // Order matters: a long file also has city and timestamp columns
    this.parsers = [this.longCsvParser, this.wideCsvParser];

    const configured = Number(configService.get<number>('INGESTION_BATCH_SIZE'));
    this.batchSize =
      Number.isInteger(configured) && configured > 0
        ? configured
        : DEFAULT_BATCH_SIZE;

    this.logger.log(
      `Initialized with ${this.parsers.length} parser(s): ${this.parsers.map((p) => p.name).join(', ')}, batch size ${this.batchSize}`,
    );
  }

  /**
   * Ingest a file into the readings table
   *
   * @param filename - Original filename, also used for detection
   * @param format - Parser name, or `auto` to detect it from the content
   */
  async ingestFile(
    filename: string,
    fileBuffer: Buffer,
    format: IngestFormat = 'auto',
  ): Promise<IngestionResult> {
    const startTime = Date.now();
    const result: IngestionResult = {
      success: false,
      filename,
      parserUsed: 'none',
      recordsProcessed: 0,
      recordsInserted: 0,
      recordsSkipped: 0,
      valuesClipped: 0,
      errors: [],
      durationMs: 0,
    };

    // Skip system files (e.g., .DS_Store from macOS folder uploads)
    const basename = filename.split('/').pop() || filename;
    if (this.IGNORED_FILES.includes(basename) || basename.startsWith('.')) {
      this.logger.debug(`Skipping system file: ${filename}`);
      result.errors.push('System file skipped');
      result.durationMs = Date.now() - startTime;
      return result;
    }

    const report = createParseReport();

    try {
      const snippet = fileBuffer.toString('utf-8', 0, 2048);

      const parser = this.selectParser(format, filename, snippet);
      if (!parser) {
        throw new Error(
          `No parser found for file: ${filename}. Supported formats: ${this.parsers.map((p) => p.name).join(', ')}`,
        );
      }

      result.parserUsed = parser.name;
      this.logger.log(`Using parser '${parser.name}' for file: ${filename}`);

      // Keyed by timestamp and city: one upsert statement cannot update
      // the same row twice, so a repeated key replaces the earlier row
      const batch = new Map<string, QueryDeepPartialEntity<Reading>>();

      for await (const dto of parser.parse(fileBuffer, report)) {
        result.recordsProcessed++;

        try {
          const values = this.dtoToValues(dto);
          const key = `${dto.timestamp.toISOString()}|${dto.city}`;
          if (batch.has(key)) {
            report.rowsSkipped++;
          }
          batch.set(key, values);

          if (batch.size >= this.batchSize) {
            result.recordsInserted += await this.insertBatch([
              ...batch.values(),
            ]);
            batch.clear();
          }
        } catch (error) {
          result.recordsSkipped++;
          result.errors.push(
            `Record ${result.recordsProcessed}: ${this.formatErrorMessage(error)}`,
          );
        }
      }

      if (batch.size > 0) {
        result.recordsInserted += await this.insertBatch([...batch.values()]);
      }

      result.success = result.recordsInserted > 0;
      this.logger.log(
        `Ingestion complete: ${result.recordsInserted}/${result.recordsProcessed} records inserted`,
      );
    } catch (error) {
      const message = this.formatErrorMessage(error);
      result.errors.push(message);
      this.logger.error(`Ingestion failed for ${filename}: ${message}`);
    }

    result.recordsSkipped += report.rowsSkipped;
    result.valuesClipped = report.valuesClipped;
    if (report.rowsSkipped > 0) {
      result.errors.push(`${report.rowsSkipped} row(s) skipped`);
    }
    if (report.valuesClipped > 0) {
      this.logger.warn(
        `${filename}: ${report.valuesClipped} negative value(s) clipped to 0`,
      );
    }

    result.durationMs = Date.now() - startTime;
    return result;
  }

  private selectParser(
    format: IngestFormat,
    filename: string,
    snippet: string,
  ): IParser | null {
    if (format !== 'auto') {
      return this.parsers.find((parser) => parser.name === format) ?? null;
    }
    for (const parser of this.parsers) {
      if (parser.canHandle(filename, snippet)) {
        return parser;
      }
    }
    return null;
  }

  /**
   * Convert DTO to insert values, computing the AQI of the reading
   */
  private dtoToValues(dto: ReadingDTO): QueryDeepPartialEntity<Reading> {
    if (Number.isNaN(dto.timestamp.getTime())) {
      throw new Error('Invalid timestamp');
    }

    const pm25 = dto.pm25 ?? null;
    const pm10 = dto.pm10 ?? null;
    const no2 = dto.no2 ?? null;
    const so2 = dto.so2 ?? null;
    const co = dto.co ?? null;
    const o3 = dto.o3 ?? null;

    const aqi = computeAqi({
      'PM2.5': pm25,
      PM10: pm10,
      NO2: no2,
      SO2: so2,
      CO: co,
      O3: o3,
    });

    return {
      timestamp: dto.timestamp,
      city: dto.city,
      pm25,
      pm10,
      no2,
      so2,
      co,
      o3,
      aqi,
      aqiCategory: aqi === null ? null : categorizeAqi(aqi).category,
      metadata: (dto.metadata ?? {}) as QueryDeepPartialEntity<Reading>['metadata'],
    };
  }

  /**
   * Format error message from unknown error type
   */
  private formatErrorMessage(error: unknown): string {
    if (error instanceof ParserError) {
      return error.message;
    }
    if (error instanceof Error) {
      return error.message;
    }
    return String(error);
  }

  /**
   * Insert batch with upsert (ON CONFLICT DO UPDATE)
   * Composite PK ensures no duplicates, updates existing records
   */
  private async insertBatch(
    values: QueryDeepPartialEntity<Reading>[],
  ): Promise<number> {
    if (values.length === 0) return 0;

    try {
      // ON CONFLICT (city, timestamp) DO UPDATE
      const result = await this.readingRepository
        .createQueryBuilder()
        .insert()
        .into(Reading)
        .values(values)
        .orUpdate(
          [
            'pm25',
            'pm10',
            'no2',
            'so2',
            'co',
            'o3',
            'aqi',
            'aqiCategory',
            'metadata',
          ],
          ['city', 'timestamp'],
        )
        .execute();

      return result.identifiers.length;
    } catch (error) {
      this.logger.error('Batch insert failed', {
        batchSize: values.length,
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }
  }

  /**
   * Get list of supported parsers
   */
  getSupportedParsers(): { name: string; description: string }[] {
    return this.parsers.map((p) => ({
      name: p.name,
      description: p.description,
    }));
  }
}
