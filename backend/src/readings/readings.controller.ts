import {
  Controller,
  Get,
  Param,
  Query,
  Logger,
  BadRequestException,
} from '@nestjs/common';
import {
  DateRange,
  ReadingChartData,
  ReadingsService,
} from './readings.service';
import { DateBound, parseDateBound } from './date-bounds';

/**
 * Query parameters for the readings endpoint
 */
interface ReadingsQuery {
  start?: string;
  end?: string;
}

/**
 * ReadingsController
 *
 * Endpoints:
 * - GET /readings - List cities with data
 * - GET /readings/:city - Readings of a city
 * - GET /readings/:city/date-range - Earliest/latest timestamps of a city
 */
@Controller('readings')
export class ReadingsController {
  private readonly logger = new Logger(ReadingsController.name);

  constructor(private readonly readingsService: ReadingsService) {}

  /**
   * @example
   * GET /readings/Delhi/date-range
   * Response: { earliest: "2024-01-01T00:00:00Z", latest: "2024-03-31T23:00:00Z" }
   */
  @Get(':city/date-range')
  async getDateRange(@Param('city') city: string): Promise<DateRange> {
    this.logger.log(`GET /readings/${city}/date-range`);
    return this.readingsService.getDateRange(city);
  }

  /**
   * @example
   * GET /readings/Delhi
   * GET /readings/Delhi?start=2024-01-01T00:00:00Z&end=2024-01-02T00:00:00Z
   */
  @Get(':city')
  async getReadings(
    @Param('city') city: string,
    @Query() query: ReadingsQuery,
  ): Promise<ReadingChartData[]> {
    this.logger.log(`GET /readings/${city} with query: ${JSON.stringify(query)}`);

    const start = this.parseDate('start', query.start);
    const end = this.parseDate('end', query.end);

    const readings = await this.readingsService.getReadings(city, start, end);

    this.logger.log(`Returning ${readings.length} readings`);
    return readings;
  }

  @Get()
  async getCities(): Promise<{ cities: string[] }> {
    const cities = await this.readingsService.getCities();
    return { cities };
  }

  private parseDate(name: DateBound, value?: string): Date | undefined {
    if (!value) {
      return undefined;
    }
    const date = parseDateBound(value, name);
    if (!date) {
      throw new BadRequestException(`Invalid ${name} date: ${value}`);
    }
    return date;
  }
}
