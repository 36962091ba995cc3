import {
  Controller,
  Get,
  Post,
  Param,
  UseInterceptors,
  UploadedFiles,
  BadRequestException,
  Logger,
} from '@nestjs/common';
import { FilesInterceptor } from '@nestjs/platform-express';
import { IngestionService } from './ingestion.service';
import { IngestFormat, IngestParamsSchema } from './dto/ingest-format.dto';
import { parseQuery } from '../common/parse-query';

const MAX_FILES = 10;

/**
 * The parts of a multer upload the controller reads
 */
export interface UploadedCsv {
  originalname: string;
  size: number;
  buffer: Buffer;
}

/**
 * Outcome of one uploaded file. Counters are absent when the service
 * threw before producing a result.
 */
export interface FileIngestionResult {
  filename: string;
  success: boolean;
  parserUsed?: string;
  recordsInserted?: number;
  recordsProcessed?: number;
  recordsSkipped?: number;
  valuesClipped?: number;
  error?: string;
}

export interface BulkIngestionResponse {
  format: IngestFormat;
  successCount: number;
  errorCount: number;
  totalRecordsInserted: number;
  results: FileIngestionResult[];
}

/**
 * IngestionController
 *
 * Endpoints:
 * - POST /ingest/wide - one column per pollutant
 * - POST /ingest/long - one row per pollutant, pivoted on import
 * - POST /ingest/auto - layout detected from each file's header
 * - GET /ingest/parsers - registered parsers
 *
 * Uploads are multipart with up to 10 files under the `files` field. A
 * failing file never fails the request; it is reported in `results`.
 */
@Controller('ingest')
export class IngestionController {
  private readonly logger = new Logger(IngestionController.name);

  constructor(private readonly ingestionService: IngestionService) {}

  /**
   * @example
   * curl -X POST http://localhost:3000/ingest/wide \
   *   -F "files=@delhi.csv" -F "files=@mumbai.csv"
   */
  @Post(':format')
  @UseInterceptors(FilesInterceptor('files', MAX_FILES))
  async ingestFiles(
    @Param('format') rawFormat: string,
    @UploadedFiles() files: UploadedCsv[] | undefined,
  ): Promise<BulkIngestionResponse> {
    const { format } = parseQuery(IngestParamsSchema, { format: rawFormat });
    if (!files || files.length === 0) {
      throw new BadRequestException(
        'No files uploaded. Use form field "files".',
      );
    }

    this.logger.log(`POST /ingest/${format} with ${files.length} file(s)`);

    // Sequential: each file upserts in its own batches
    const results: FileIngestionResult[] = [];
    for (const file of files) {
      results.push(await this.ingestOne(file, format));
    }

    const response: BulkIngestionResponse = {
      format,
      successCount: results.filter((r) => r.success).length,
      errorCount: results.filter((r) => !r.success).length,
      totalRecordsInserted: results.reduce(
        (sum, r) => sum + (r.success ? (r.recordsInserted ?? 0) : 0),
        0,
      ),
      results,
    };

    this.logger.log(
      `Ingested ${response.totalRecordsInserted} reading(s): ${response.successCount} file(s) ok, ${response.errorCount} failed`,
    );
    return response;
  }

  @Get('parsers')
  getSupportedParsers(): { name: string; description: string }[] {
    return this.ingestionService.getSupportedParsers();
  }

  private async ingestOne(
    file: UploadedCsv,
    format: IngestFormat,
  ): Promise<FileIngestionResult> {
    const filename = file.originalname;
    try {
      const result = await this.ingestionService.ingestFile(
        filename,
        file.buffer,
        format,
      );
      this.logger.debug(
        `${filename} (${file.size} bytes): ${result.recordsInserted}/${result.recordsProcessed} in ${result.durationMs}ms`,
      );
      return {
        filename,
        success: result.success,
        parserUsed: result.parserUsed,
        recordsInserted: result.recordsInserted,
        recordsProcessed: result.recordsProcessed,
        recordsSkipped: result.recordsSkipped,
        valuesClipped: result.valuesClipped,
        error: result.errors[0],
      };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`Failed to ingest ${filename}: ${message}`);
      return { filename, success: false, error: message };
    }
  }
}
