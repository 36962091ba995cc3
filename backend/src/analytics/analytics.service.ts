import {
  Injectable,
  Logger,
  NotFoundException,
  UnprocessableEntityException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  CPCB_LIMITS,
  ComplianceError,
  ComplianceState,
  HOUR_MS,
  KpiColor,
  PolicyTier,
  Pollutant,
  PollutantLimit,
  assessPolicy,
  compliancePercentage,
  kpiColor,
  recommendFor,
  scoreCompliance,
} from '../compliance';
import { computeAqi } from '../aqi/aqi';
import { ReadingsService } from '../readings/readings.service';
import {
  ComplianceQuery,
  DistributionQuery,
  HeatmapQuery,
  RangeQuery,
  SummaryQuery,
} from './dto/analytics-query.dto';
import { Heatmap, buildHeatmap } from './heatmap';
import { HealthImpact, assessHealthImpact } from './health-impact';
import { imputeMedian } from './imputation';
import {
  FiveNumberSummary,
  HistogramBin,
  fiveNumberSummary,
  histogram,
  mean,
  presentValues,
} from './statistics';

const DEFAULT_UTC_OFFSET_MINUTES = 0;

export interface ComplianceWindow {
  start: Date;
  end: Date;
  meanValue: number | null;
  sampleCount: number;
  status: ComplianceState;
  recommendation: string | null;
}

export interface ComplianceReport {
  city: string;
  pollutant: Pollutant;
  threshold: number;
  unit: PollutantLimit['unit'];
  windowHours: number;
  utcOffsetMinutes: number;
  imputed: boolean;
  windows: ComplianceWindow[];
  counts: Record<ComplianceState, number>;
}

export interface CitySummary {
  city: string;
  pollutant: Pollutant;
  label: string;
  limit: number;
  unit: PollutantLimit['unit'];
  average: number;
  peak: number;
  readingCount: number;
  compliancePct: number | null;
  tier: PolicyTier;
  action: string;
  kpiColor: KpiColor;
}

export interface CityHeatmap extends Heatmap {
  city: string;
  pollutant: Pollutant;
  utcOffsetMinutes: number;
}

export interface CityDistribution extends FiveNumberSummary {
  city: string;
  pollutant: Pollutant;
  limit: number;
  unit: PollutantLimit['unit'];
  count: number;
  aboveLimit: number;
  bins: HistogramBin[];
}

export interface CityHealthImpact extends HealthImpact {
  city: string;
}

/**
 * AnalyticsService - compliance reports and dashboard figures built on
 * the stored readings
 */
@Injectable()
export class AnalyticsService {
  private readonly logger = new Logger(AnalyticsService.name);

  constructor(
    private readonly readingsService: ReadingsService,
    private readonly configService: ConfigService,
  ) {}

  /**
   * Score a city's pollutant series window by window.
   *
   * Missing values are filled with the series median first unless
   * `impute` is false, in which case windows without any value come back
   * as Unknown.
   */
  async getCompliance(
    city: string,
    query: ComplianceQuery,
  ): Promise<ComplianceReport> {
    const { pollutant, start, end, windowHours, impute } = query;
    const utcOffsetMinutes = query.utcOffsetMinutes ?? this.defaultOffset();

    const series = await this.readingsService.getSeries(
      city,
      pollutant,
      start,
      end,
    );
    if (series.length === 0) {
      throw new NotFoundException(`No ${pollutant} readings for ${city}`);
    }

    const input = impute ? imputeMedian(series) : series;
    const counts: Record<ComplianceState, number> = {
      Compliant: 0,
      'Non-Compliant': 0,
      Unknown: 0,
    };
    const windows: ComplianceWindow[] = [];

    try {
      for (const { aggregate, status } of scoreCompliance(input, {
        windowMs: windowHours * HOUR_MS,
        utcOffsetMinutes,
      })) {
        counts[status.status]++;
        windows.push({
          start: aggregate.period.start,
          end: aggregate.period.end,
          meanValue: aggregate.meanValue,
          sampleCount: aggregate.sampleCount,
          status: status.status,
          recommendation: recommendFor(status),
        });
      }
    } catch (error) {
      if (error instanceof ComplianceError) {
        this.logger.warn(
          `Scoring failed for ${city}/${pollutant}: ${error.message}`,
        );
        throw new UnprocessableEntityException(error.message);
      }
      throw error;
    }

    this.logger.debug(
      `${city}/${pollutant}: ${windows.length} windows, ${counts['Non-Compliant']} non-compliant`,
    );

    const { limit, unit } = CPCB_LIMITS[pollutant];
    return {
      city,
      pollutant,
      threshold: limit,
      unit,
      windowHours,
      utcOffsetMinutes,
      imputed: impute,
      windows,
      counts,
    };
  }

  /**
   * KPI tiles and policy tier for several cities. Cities without any
   * valued reading in the range are left out.
   */
  async getSummaries(query: SummaryQuery): Promise<CitySummary[]> {
    const { pollutant, start, end } = query;

    const summaries = await Promise.all(
      query.cities.map(async (city) => {
        const series = await this.readingsService.getSeries(
          city,
          pollutant,
          start,
          end,
        );
        return this.summarize(
          city,
          pollutant,
          series.map((m) => m.value),
        );
      }),
    );

    return summaries.filter(
      (summary): summary is CitySummary => summary !== null,
    );
  }

  async getHeatmap(city: string, query: HeatmapQuery): Promise<CityHeatmap> {
    const { pollutant, start, end } = query;
    const utcOffsetMinutes = query.utcOffsetMinutes ?? this.defaultOffset();

    const series = await this.readingsService.getSeries(
      city,
      pollutant,
      start,
      end,
    );
    if (series.length === 0) {
      throw new NotFoundException(`No ${pollutant} readings for ${city}`);
    }

    return {
      city,
      pollutant,
      utcOffsetMinutes,
      ...buildHeatmap(series, utcOffsetMinutes),
    };
  }

  /**
   * Box-plot figures and a histogram of the valued readings, with the
   * limit they are read against
   */
  async getDistribution(
    city: string,
    query: DistributionQuery,
  ): Promise<CityDistribution> {
    const { pollutant, start, end, bins } = query;
    const series = await this.readingsService.getSeries(
      city,
      pollutant,
      start,
      end,
    );
    const values = presentValues(series.map((m) => m.value));
    const summary = fiveNumberSummary(values);
    if (!summary) {
      throw new NotFoundException(`No ${pollutant} readings for ${city}`);
    }

    const { limit, unit } = CPCB_LIMITS[pollutant];
    return {
      city,
      pollutant,
      limit,
      unit,
      count: values.length,
      aboveLimit: values.filter((value) => value > limit).length,
      ...summary,
      bins: histogram(values, bins),
    };
  }

  /**
   * Health estimates from the mean PM2.5 of the range. When no AQI was
   * stored, the AQI of the mean PM2.5 stands in for the advisory.
   */
  async getHealthImpact(
    city: string,
    query: RangeQuery,
  ): Promise<CityHealthImpact> {
    const { start, end } = query;
    const [series, aqiValues] = await Promise.all([
      this.readingsService.getSeries(city, 'PM2.5', start, end),
      this.readingsService.getAqiSeries(city, start, end),
    ]);

    const averagePm25 = mean(presentValues(series.map((m) => m.value)));
    if (averagePm25 === null) {
      throw new NotFoundException(`No PM2.5 readings for ${city}`);
    }
    const averageAqi =
      mean(aqiValues) ?? computeAqi({ 'PM2.5': averagePm25 });

    return { city, ...assessHealthImpact(averagePm25, averageAqi) };
  }

  getLimits(): PollutantLimit[] {
    return Object.values(CPCB_LIMITS);
  }

  private summarize(
    city: string,
    pollutant: Pollutant,
    series: Array<number | null>,
  ): CitySummary | null {
    const values = presentValues(series);
    const average = mean(values);
    if (average === null) {
      return null;
    }
    const { label, limit, unit } = CPCB_LIMITS[pollutant];
    const { tier, action } = assessPolicy(pollutant, average);

    return {
      city,
      pollutant,
      label,
      limit,
      unit,
      average,
      peak: values.reduce((max, value) => Math.max(max, value)),
      readingCount: values.length,
      compliancePct: compliancePercentage(pollutant, series),
      tier,
      action,
      kpiColor: kpiColor(pollutant, average),
    };
  }

  private defaultOffset(): number {
    const offset = Number(
      this.configService.get<number>('ANALYTICS_UTC_OFFSET_MINUTES'),
    );
    return Number.isFinite(offset) ? offset : DEFAULT_UTC_OFFSET_MINUTES;
  }
}
