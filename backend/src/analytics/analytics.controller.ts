import { Controller, Get, Logger, Param, Query } from '@nestjs/common';
import { PollutantLimit } from '../compliance';
import {
  AnalyticsService,
  CityDistribution,
  CityHealthImpact,
  CityHeatmap,
  CitySummary,
  ComplianceReport,
} from './analytics.service';
import {
  ComplianceQuerySchema,
  DistributionQuerySchema,
  HeatmapQuerySchema,
  RangeQuerySchema,
  SummaryQuerySchema,
} from './dto/analytics-query.dto';
import { RawQuery, parseQuery } from '../common/parse-query';

/**
 * AnalyticsController
 *
 * Endpoints:
 * - GET /analytics/limits - CPCB limit table
 * - GET /analytics/summary - KPI and policy tier per city
 * - GET /analytics/compliance/:city - Windowed compliance report
 * - GET /analytics/heatmap/:city - Weekday x hour means
 * - GET /analytics/distribution/:city - Quartiles and histogram
 * - GET /analytics/health-impact/:city - PM2.5 health estimates
 *
 * Dates are ISO 8601 strings; `pollutant` accepts names such as
 * "PM2.5", "pm25" or "PM2_5_ugm3" and defaults to PM2.5.
 */
@Controller('analytics')
export class AnalyticsController {
  private readonly logger = new Logger(AnalyticsController.name);

  constructor(private readonly analyticsService: AnalyticsService) {}

  @Get('limits')
  getLimits(): PollutantLimit[] {
    return this.analyticsService.getLimits();
  }

  /**
   * @example
   * GET /analytics/summary?cities=Delhi,Mumbai&pollutant=PM10
   */
  @Get('summary')
  async getSummary(
    @Query() query: RawQuery,
  ): Promise<{ summaries: CitySummary[] }> {
    const parsed = parseQuery(SummaryQuerySchema, query);
    this.logger.log(
      `GET /analytics/summary for ${parsed.cities.join(', ')} (${parsed.pollutant})`,
    );
    const summaries = await this.analyticsService.getSummaries(parsed);
    return { summaries };
  }

  /**
   * @example
   * GET /analytics/compliance/Delhi?pollutant=PM2.5&windowHours=24
   * GET /analytics/compliance/Delhi?pollutant=CO&windowHours=8&impute=false
   */
  @Get('compliance/:city')
  async getCompliance(
    @Param('city') city: string,
    @Query() query: RawQuery,
  ): Promise<ComplianceReport> {
    this.logger.log(
      `GET /analytics/compliance/${city} with query: ${JSON.stringify(query)}`,
    );
    return this.analyticsService.getCompliance(
      city,
      parseQuery(ComplianceQuerySchema, query),
    );
  }

  @Get('heatmap/:city')
  async getHeatmap(
    @Param('city') city: string,
    @Query() query: RawQuery,
  ): Promise<CityHeatmap> {
    return this.analyticsService.getHeatmap(
      city,
      parseQuery(HeatmapQuerySchema, query),
    );
  }

  /**
   * @example
   * GET /analytics/distribution/Delhi?pollutant=PM10&bins=30
   */
  @Get('distribution/:city')
  async getDistribution(
    @Param('city') city: string,
    @Query() query: RawQuery,
  ): Promise<CityDistribution> {
    return this.analyticsService.getDistribution(
      city,
      parseQuery(DistributionQuerySchema, query),
    );
  }

  @Get('health-impact/:city')
  async getHealthImpact(
    @Param('city') city: string,
    @Query() query: RawQuery,
  ): Promise<CityHealthImpact> {
    return this.analyticsService.getHealthImpact(
      city,
      parseQuery(RangeQuerySchema, query),
    );
  }
}
