// Re-export public API
export { IngestionModule } from './ingestion.module';
export { IngestionService } from './ingestion.service';
export type { IngestionResult } from './ingestion.service';
export type { ReadingDTO } from './dto/reading.dto';
export { ParserError, createParseReport } from './interfaces/parser.interface';
export type { IParser, ParseReport } from './interfaces/parser.interface';
