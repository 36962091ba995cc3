import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Reading } from '../database/entities/reading.entity';
import { IngestionController } from './ingestion.controller';
import { IngestionService } from './ingestion.service';
import { WideCsvParser } from './strategies/wide-csv.strategy';
import { LongCsvParser } from './strategies/long-csv.strategy';

/**
 * IngestionModule
 *
 * Provides CSV parsing and reading ingestion.
 *
 * Components:
 * - IngestionController: REST API for file uploads
 * - IngestionService: Orchestrates parsing, AQI enrichment and upserts
 * - WideCsvParser: one column per pollutant
 * - LongCsvParser: one row per pollutant, pivoted on import
 */
@Module({
  imports: [TypeOrmModule.forFeature([Reading]), ConfigModule],
  controllers: [IngestionController],
  providers: [IngestionService, WideCsvParser, LongCsvParser],
  exports: [IngestionService],
})
export class IngestionModule {}
