import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import {
  NotFoundException,
  UnprocessableEntityException,
} from '@nestjs/common';
import { AnalyticsService } from './analytics.service';
import { ReadingsService } from '../readings/readings.service';
import { HOUR_MS, Measurement, Pollutant } from '../compliance';
import { ComplianceQuery } from './dto/analytics-query.dto';

function hourly(
  values: Array<number | null>,
  city = 'Delhi',
  pollutant: Pollutant = 'PM2.5',
): Measurement[] {
  const origin = Date.parse('2024-01-01T00:00:00.000Z');
  return values.map((value, i) => ({
    city,
    pollutant,
    timestamp: new Date(origin + i * HOUR_MS),
    value,
  }));
}

describe('AnalyticsService', () => {
  let service: AnalyticsService;
  let mockReadingsService: {
    getSeries: jest.Mock;
    getAqiSeries: jest.Mock;
  };
  let mockConfigService: { get: jest.Mock };

  const complianceQuery = (
    overrides: Partial<ComplianceQuery> = {},
  ): ComplianceQuery => ({
    pollutant: 'PM2.5',
    windowHours: 24,
    impute: true,
    utcOffsetMinutes: 0,
    ...overrides,
  });

  beforeEach(async () => {
    mockReadingsService = {
      getSeries: jest.fn().mockResolvedValue([]),
      getAqiSeries: jest.fn().mockResolvedValue([]),
    };
    mockConfigService = { get: jest.fn().mockReturnValue(330) };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        AnalyticsService,
        { provide: ReadingsService, useValue: mockReadingsService },
        { provide: ConfigService, useValue: mockConfigService },
      ],
    }).compile();

    service = module.get<AnalyticsService>(AnalyticsService);
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  describe('getCompliance', () => {
    it('should flag a day of PM2.5 at 65 as Non-Compliant with a GRAP recommendation', async () => {
      mockReadingsService.getSeries.mockResolvedValue(
        hourly(Array(24).fill(65)),
      );

      const report = await service.getCompliance('Delhi', complianceQuery());

      expect(report).toEqual({
        city: 'Delhi',
        pollutant: 'PM2.5',
        threshold: 60,
        unit: 'µg/m³',
        windowHours: 24,
        utcOffsetMinutes: 0,
        imputed: true,
        windows: [
          {
            start: new Date('2024-01-01T00:00:00.000Z'),
            end: new Date('2024-01-02T00:00:00.000Z'),
            meanValue: 65,
            sampleCount: 24,
            status: 'Non-Compliant',
            recommendation: 'Consider GRAP measures',
          },
        ],
        counts: { Compliant: 0, 'Non-Compliant': 1, Unknown: 0 },
      });
      expect(mockReadingsService.getSeries).toHaveBeenCalledWith(
        'Delhi',
        'PM2.5',
        undefined,
        undefined,
      );
    });

    it('should fall back to the configured UTC offset', async () => {
      mockReadingsService.getSeries.mockResolvedValue(
        hourly(Array(24).fill(40)),
      );

      const report = await service.getCompliance(
        'Delhi',
        complianceQuery({ utcOffsetMinutes: undefined }),
      );

      // 00:00Z..18:00Z fall on the first IST day, 19:00Z..23:00Z on the next
      expect(report.utcOffsetMinutes).toBe(330);
      expect(report.windows.map((w) => w.sampleCount)).toEqual([19, 5]);
      expect(report.windows[0].start.toISOString()).toBe(
        '2023-12-31T18:30:00.000Z',
      );
      expect(mockConfigService.get).toHaveBeenCalledWith(
        'ANALYTICS_UTC_OFFSET_MINUTES',
      );
    });

    it('should align windows to UTC days when the offset is not configured', async () => {
      mockConfigService.get.mockReturnValue(undefined);
      mockReadingsService.getSeries.mockResolvedValue(
        hourly(Array(24).fill(40)),
      );

      const report = await service.getCompliance(
        'Delhi',
        complianceQuery({ utcOffsetMinutes: undefined }),
      );

      expect(report.utcOffsetMinutes).toBe(0);
      expect(report.windows).toHaveLength(1);
      expect(report.windows[0].start.toISOString()).toBe(
        '2024-01-01T00:00:00.000Z',
      );
    });

    it('should fill missing values with the median when imputing', async () => {
      mockReadingsService.getSeries.mockResolvedValue(hourly([50, null, 70]));

      const report = await service.getCompliance('Delhi', complianceQuery());

      expect(report.windows[0].meanValue).toBe(60);
      expect(report.windows[0].sampleCount).toBe(3);
    });

    it('should skip missing values when imputation is off', async () => {
      mockReadingsService.getSeries.mockResolvedValue(hourly([50, null, 70]));

      const report = await service.getCompliance(
        'Delhi',
        complianceQuery({ impute: false }),
      );

      expect(report.imputed).toBe(false);
      expect(report.windows[0].meanValue).toBe(60);
      expect(report.windows[0].sampleCount).toBe(2);
    });

    it('should count empty windows as Unknown', async () => {
      mockReadingsService.getSeries.mockResolvedValue([
        {
          city: 'Delhi',
          pollutant: 'PM2.5',
          timestamp: new Date('2024-01-01T10:00:00Z'),
          value: 50,
        },
        {
          city: 'Delhi',
          pollutant: 'PM2.5',
          timestamp: new Date('2024-01-03T10:00:00Z'),
          value: 70,
        },
      ]);

      const report = await service.getCompliance('Delhi', complianceQuery());

      expect(report.windows.map((w) => w.status)).toEqual([
        'Compliant',
        'Unknown',
        'Non-Compliant',
      ]);
      expect(report.windows[1].recommendation).toBeNull();
      expect(report.counts).toEqual({
        Compliant: 1,
        'Non-Compliant': 1,
        Unknown: 1,
      });
    });

    it('should use 8-hour windows when asked', async () => {
      mockReadingsService.getSeries.mockResolvedValue(
        hourly(Array(24).fill(1.5), 'Delhi', 'CO'),
      );

      const report = await service.getCompliance(
        'Delhi',
        complianceQuery({ pollutant: 'CO', windowHours: 8 }),
      );

      expect(report.threshold).toBe(2);
      expect(report.unit).toBe('mg/m³');
      expect(report.windows).toHaveLength(3);
      expect(report.counts.Compliant).toBe(3);
    });

    it('should throw NotFoundException when the city has no readings', async () => {
      await expect(
        service.getCompliance('Nowhere', complianceQuery()),
      ).rejects.toThrow(NotFoundException);
    });

    it('should turn scoring errors into UnprocessableEntityException', async () => {
      mockReadingsService.getSeries.mockResolvedValue([
        ...hourly([10]),
        {
          city: 'Delhi',
          pollutant: 'PM2.5',
          timestamp: new Date('2023-12-31T00:00:00Z'),
          value: 10,
        },
      ]);

      await expect(
        service.getCompliance('Delhi', complianceQuery()),
      ).rejects.toThrow(UnprocessableEntityException);
    });
  });

  describe('getSummaries', () => {
    it('should summarize cities with data and omit the rest', async () => {
      mockReadingsService.getSeries.mockImplementation((city: string) =>
        Promise.resolve(city === 'Delhi' ? hourly([50, 70, null, 90]) : []),
      );

      const summaries = await service.getSummaries({
        cities: ['Delhi', 'Mumbai'],
        pollutant: 'PM2.5',
      });

      expect(summaries).toHaveLength(1);
      expect(summaries[0]).toEqual({
        city: 'Delhi',
        pollutant: 'PM2.5',
        label: 'PM2.5 (Fine Particles)',
        limit: 60,
        unit: 'µg/m³',
        average: 70,
        peak: 90,
        readingCount: 3,
        // one of four rows is at or below 60; the missing one counts against
        compliancePct: 25,
        tier: 'MODERATE RISK',
        action: 'Activate pollution control for PM2.5 (Fine Particles) sources.',
        kpiColor: 'off',
      });
    });

    it('should keep the order of the requested cities', async () => {
      mockReadingsService.getSeries.mockImplementation((city: string) =>
        Promise.resolve(hourly(city === 'Mumbai' ? [20] : [200], city)),
      );

      const summaries = await service.getSummaries({
        cities: ['Mumbai', 'Delhi'],
        pollutant: 'PM2.5',
      });

      expect(summaries.map((s) => [s.city, s.tier])).toEqual([
        ['Mumbai', 'GOOD'],
        ['Delhi', 'SEVERE EMERGENCY'],
      ]);
    });
  });

  describe('getHeatmap', () => {
    it('should build the grid in the requested offset', async () => {
      mockReadingsService.getSeries.mockResolvedValue(hourly([10]));

      const heatmap = await service.getHeatmap('Delhi', {
        pollutant: 'PM2.5',
        utcOffsetMinutes: 0,
      });

      expect(heatmap.city).toBe('Delhi');
      expect(heatmap.utcOffsetMinutes).toBe(0);
      expect(heatmap.values[0][0]).toBe(10);
    });

    it('should throw NotFoundException without readings', async () => {
      await expect(
        service.getHeatmap('Nowhere', { pollutant: 'PM2.5' }),
      ).rejects.toThrow(NotFoundException);
    });
  });

  describe('getDistribution', () => {
    it('should summarize valued readings against the limit', async () => {
      mockReadingsService.getSeries.mockResolvedValue(
        hourly([50, null, 70, 90, 30]),
      );

      const distribution = await service.getDistribution('Delhi', {
        pollutant: 'PM2.5',
        bins: 2,
      });

      expect(distribution).toEqual({
        city: 'Delhi',
        pollutant: 'PM2.5',
        limit: 60,
        unit: 'µg/m³',
        count: 4,
        aboveLimit: 2,
        min: 30,
        q1: 45,
        median: 60,
        q3: 75,
        max: 90,
        bins: [
          { lower: 30, upper: 60, count: 2 },
          { lower: 60, upper: 90, count: 2 },
        ],
      });
    });

    it('should throw NotFoundException when every value is missing', async () => {
      mockReadingsService.getSeries.mockResolvedValue(hourly([null, null]));

      await expect(
        service.getDistribution('Delhi', { pollutant: 'PM2.5', bins: 20 }),
      ).rejects.toThrow('No PM2.5 readings for Delhi');
    });
  });

  describe('getHealthImpact', () => {
    it('should use the mean PM2.5 and the mean stored AQI', async () => {
      mockReadingsService.getSeries.mockResolvedValue(hourly([100, 120]));
      mockReadingsService.getAqiSeries.mockResolvedValue([300, 340]);

      const impact = await service.getHealthImpact('Delhi', {});

      expect(impact.city).toBe('Delhi');
      expect(impact.averagePm25).toBe(110);
      expect(impact.averageAqi).toBe(320);
      expect(impact.prematureDeathsPer100k).toBe(420);
      expect(impact.advisory.level).toBe('SEVERE');
      expect(mockReadingsService.getSeries).toHaveBeenCalledWith(
        'Delhi',
        'PM2.5',
        undefined,
        undefined,
      );
    });

    it('should derive the AQI from the mean PM2.5 when none is stored', async () => {
      mockReadingsService.getSeries.mockResolvedValue(hourly([100, 120]));

      const impact = await service.getHealthImpact('Delhi', {});

      expect(impact.averageAqi).toBe(266);
      expect(impact.advisory.level).toBe('UNHEALTHY');
    });

    it('should throw NotFoundException without PM2.5 values', async () => {
      mockReadingsService.getSeries.mockResolvedValue(hourly([null]));

      await expect(service.getHealthImpact('Delhi', {})).rejects.toThrow(
        NotFoundException,
      );
    });
  });

  describe('getLimits', () => {
    it('should list every pollutant limit', () => {
      const limits = service.getLimits();

      expect(limits.map((l) => [l.pollutant, l.limit])).toEqual([
        ['PM2.5', 60],
        ['PM10', 100],
        ['NO2', 80],
        ['SO2', 80],
        ['CO', 2],
        ['O3', 100],
      ]);
    });
  });
});
