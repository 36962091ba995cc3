import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { ReadingsModule } from '../readings/readings.module';
import { AnalyticsController } from './analytics.controller';
import { AnalyticsService } from './analytics.service';

/**
 * AnalyticsModule
 *
 * Compliance scoring, KPIs, heatmaps and health estimates over readings.
 */
@Module({
  imports: [ReadingsModule, ConfigModule],
  controllers: [AnalyticsController],
  providers: [AnalyticsService],
})
export class AnalyticsModule {}
