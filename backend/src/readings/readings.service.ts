import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import {
  Repository,
  Between,
  FindOptionsWhere,
  LessThanOrEqual,
  MoreThanOrEqual,
} from 'typeorm';
import { Reading } from '../database/entities/reading.entity';
import { CPCB_LIMITS, Measurement, Pollutant } from '../compliance';

/**
 * DTO for chart data with every pollutant
 */
export interface ReadingChartData {
  timestamp: Date;
  pm25: number | null;
  pm10: number | null;
  no2: number | null;
  so2: number | null;
  co: number | null;
  o3: number | null;
  aqi: number | null;
  aqiCategory: string | null;
  metadata: Record<string, unknown>;
}

export interface DateRange {
  earliest: Date | null;
  latest: Date | null;
}

@Injectable()
export class ReadingsService {
  private readonly logger = new Logger(ReadingsService.name);

  constructor(
    @InjectRepository(Reading)
    private readonly readingRepository: Repository<Reading>,
  ) {}

  /**
   * Get readings for a city within a date range
   *
   * Smart Date Resolution:
   * - Explicit Mode: If start AND end are provided, use them directly
   * - Implicit Mode: Otherwise return the UTC day of the latest reading,
   *   or today when the city has no data
   */
  async getReadings(
    city: string,
    start?: Date,
    end?: Date,
  ): Promise<ReadingChartData[]> {
    let startDate: Date;
    let endDate: Date;

    if (start && end) {
      startDate = start;
      endDate = end;
    } else {
      ({ startDate, endDate } = await this.resolveSmartDateRange(city));
      this.logger.debug(
        `Auto-detected date range: ${startDate.toISOString()} to ${endDate.toISOString()}`,
      );
    }

    const readings = await this.readingRepository.find({
      where: {
        city,
        timestamp: Between(startDate, endDate),
      },
      order: { timestamp: 'ASC' },
    });

    this.logger.debug(`Found ${readings.length} readings for ${city}`);

    return readings.map((r) => ({
      timestamp: r.timestamp,
      pm25: r.pm25,
      pm10: r.pm10,
      no2: r.no2,
      so2: r.so2,
      co: r.co,
      o3: r.o3,
      aqi: r.aqi,
      aqiCategory: r.aqiCategory,
      metadata: r.metadata ?? {},
    }));
  }

  /**
   * Ordered single-pollutant series for one city, ready for scoring.
   * Rows where the pollutant is missing are kept with a null value.
   */
  async getSeries(
    city: string,
    pollutant: Pollutant,
    start?: Date,
    end?: Date,
  ): Promise<Measurement[]> {
    const { column } = CPCB_LIMITS[pollutant];
    const rows = await this.readingRepository.find({
      select: ['timestamp', column],
      where: this.buildWhere(city, start, end),
      order: { timestamp: 'ASC' },
    });

    return rows.map((row) => ({
      city,
      pollutant,
      timestamp: row.timestamp,
      value: row[column] ?? null,
    }));
  }

  /**
   * Stored AQI values of a city, missing ones dropped
   */
  async getAqiSeries(city: string, start?: Date, end?: Date): Promise<number[]> {
    const rows = await this.readingRepository.find({
      select: ['timestamp', 'aqi'],
      where: this.buildWhere(city, start, end),
      order: { timestamp: 'ASC' },
    });

    return rows
      .map((row) => row.aqi)
      .filter((aqi): aqi is number => aqi !== null && aqi !== undefined);
  }

  /**
   * Smart Date Range Resolution
   *
   * @returns Start (00:00:00) and end (23:59:59.999) of the UTC day with latest data
   */
  private async resolveSmartDateRange(
    city: string,
  ): Promise<{ startDate: Date; endDate: Date }> {
    const latest = await this.getLatestTimestamp(city);
    const targetDate = latest ?? new Date();

    if (!latest) {
      this.logger.debug(`No data found for ${city}, falling back to today`);
    }

    const startDate = new Date(
      Date.UTC(
        targetDate.getUTCFullYear(),
        targetDate.getUTCMonth(),
        targetDate.getUTCDate(),
        0,
        0,
        0,
        0,
      ),
    );
    const endDate = new Date(
      Date.UTC(
        targetDate.getUTCFullYear(),
        targetDate.getUTCMonth(),
        targetDate.getUTCDate(),
        23,
        59,
        59,
        999,
      ),
    );

    return { startDate, endDate };
  }

  async getLatestTimestamp(city: string): Promise<Date | null> {
    const record = await this.readingRepository.findOne({
      select: ['timestamp'],
      where: { city },
      order: { timestamp: 'DESC' },
    });

    return record?.timestamp ?? null;
  }

  async getEarliestTimestamp(city: string): Promise<Date | null> {
    const record = await this.readingRepository.findOne({
      select: ['timestamp'],
      where: { city },
      order: { timestamp: 'ASC' },
    });

    return record?.timestamp ?? null;
  }

  /**
   * Get the date range (earliest and latest) for a city
   * Returns null values if no data exists
   */
  async getDateRange(city: string): Promise<DateRange> {
    const [earliest, latest] = await Promise.all([
      this.getEarliestTimestamp(city),
      this.getLatestTimestamp(city),
    ]);

    return { earliest, latest };
  }

  /**
   * Distinct cities with at least one reading, sorted
   */
  async getCities(): Promise<string[]> {
    const result = await this.readingRepository
      .createQueryBuilder('r')
      .select('r.city', 'city')
      .groupBy('r.city')
      .orderBy('r.city', 'ASC')
      .getRawMany<{ city: string }>();

    return result.map((r) => r.city);
  }

  private buildWhere(
    city: string,
    start?: Date,
    end?: Date,
  ): FindOptionsWhere<Reading> {
    if (start && end) {
      return { city, timestamp: Between(start, end) };
    }
    if (start) {
      return { city, timestamp: MoreThanOrEqual(start) };
    }
    if (end) {
      return { city, timestamp: LessThanOrEqual(end) };
    }
    return { city };
  }
}
