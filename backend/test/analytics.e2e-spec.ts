import { Test, TestingModule } from '@nestjs/testing';
import { INestApplication } from '@nestjs/common';
import request from 'supertest';
import { App } from 'supertest/types';
import { getRepositoryToken } from '@nestjs/typeorm';
import { Between } from 'typeorm';
import { AnalyticsModule } from '../src/analytics/analytics.module';
import { Reading } from '../src/database/entities/reading.entity';

/**
 * E2E Tests for the analytics and readings endpoints
 *
 * Runs the real AnalyticsModule (with ReadingsModule) over a repository
 * stub that serves one day of hourly PM2.5 readings for every city.
 */
describe('AnalyticsController (e2e)', () => {
  let app: INestApplication<App>;
  let mockRepository: {
    find: jest.Mock;
    findOne: jest.Mock;
    createQueryBuilder: jest.Mock;
  };

  const origin = Date.parse('2024-01-01T00:00:00.000Z');
  const dayOfReadings = (pm25: number) =>
    Array.from({ length: 24 }, (_, i) => ({
      timestamp: new Date(origin + i * 3_600_000),
      pm25,
      aqi: null,
    }));

  beforeEach(async () => {
    mockRepository = {
      find: jest.fn().mockResolvedValue(dayOfReadings(65)),
      findOne: jest.fn().mockResolvedValue(null),
      createQueryBuilder: jest.fn(() => ({
        select: jest.fn().mockReturnThis(),
        groupBy: jest.fn().mockReturnThis(),
        orderBy: jest.fn().mockReturnThis(),
        getRawMany: jest
          .fn()
          .mockResolvedValue([{ city: 'Delhi' }, { city: 'Mumbai' }]),
      })),
    };

    const moduleFixture: TestingModule = await Test.createTestingModule({
      imports: [AnalyticsModule],
    })
      .overrideProvider(getRepositoryToken(Reading))
      .useValue(mockRepository)
      .compile();

    app = moduleFixture.createNestApplication();
    await app.init();
  });

  afterEach(async () => {
    await app.close();
  });

  describe('GET /analytics/compliance/:city', () => {
    it('should score a day at 65 µg/m³ as Non-Compliant', async () => {
      const response = await request(app.getHttpServer())
        .get('/analytics/compliance/Delhi')
        .query({ pollutant: 'PM2.5', utcOffsetMinutes: '0' })
        .expect(200);

      expect(response.body).toEqual({
        city: 'Delhi',
        pollutant: 'PM2.5',
        threshold: 60,
        unit: 'µg/m³',
        windowHours: 24,
        utcOffsetMinutes: 0,
        imputed: true,
        windows: [
          {
            start: '2024-01-01T00:00:00.000Z',
            end: '2024-01-02T00:00:00.000Z',
            meanValue: 65,
            sampleCount: 24,
            status: 'Non-Compliant',
            recommendation: 'Consider GRAP measures',
          },
        ],
        counts: { Compliant: 0, 'Non-Compliant': 1, Unknown: 0 },
      });
    });

    it('should include the whole end day of a date-only range', async () => {
      await request(app.getHttpServer())
        .get('/analytics/compliance/Delhi')
        .query({ start: '2024-01-01', end: '2024-01-01' })
        .expect(200);

      expect(mockRepository.find).toHaveBeenCalledWith(
        expect.objectContaining({
          where: {
            city: 'Delhi',
            timestamp: Between(
              new Date('2024-01-01T00:00:00.000Z'),
              new Date('2024-01-01T23:59:59.999Z'),
            ),
          },
        }),
      );
    });

    it('should return 400 for an unknown pollutant', async () => {
      const response = await request(app.getHttpServer())
        .get('/analytics/compliance/Delhi')
        .query({ pollutant: 'benzene' })
        .expect(400);

      expect(response.body).toMatchObject({ statusCode: 400 });
    });

    it('should return 404 when the city has no readings', async () => {
      mockRepository.find.mockResolvedValue([]);

      const response = await request(app.getHttpServer())
        .get('/analytics/compliance/Nowhere')
        .expect(404);

      expect(response.body).toMatchObject({
        statusCode: 404,
        message: 'No PM2.5 readings for Nowhere',
      });
    });
  });

  describe('GET /analytics/limits', () => {
    it('should list the six CPCB limits', async () => {
      const response = await request(app.getHttpServer())
        .get('/analytics/limits')
        .expect(200);

      const limits = response.body as Array<{ pollutant: string }>;
      expect(limits.map((l) => l.pollutant)).toEqual([
        'PM2.5',
        'PM10',
        'NO2',
        'SO2',
        'CO',
        'O3',
      ]);
    });
  });

  describe('GET /analytics/heatmap/:city', () => {
    it('should place Monday midnight in the first cell', async () => {
      const response = await request(app.getHttpServer())
        .get('/analytics/heatmap/Delhi')
        .query({ utcOffsetMinutes: '0' })
        .expect(200);

      const heatmap = response.body as {
        days: string[];
        values: Array<Array<number | null>>;
      };
      expect(heatmap.days[0]).toBe('Monday');
      expect(heatmap.values[0][0]).toBe(65);
      expect(heatmap.values[1][0]).toBeNull();
    });
  });

  describe('GET /analytics/distribution/:city', () => {
    it('should return quartiles, bins and the limit', async () => {
      const response = await request(app.getHttpServer())
        .get('/analytics/distribution/Delhi')
        .expect(200);

      expect(response.body).toEqual({
        city: 'Delhi',
        pollutant: 'PM2.5',
        limit: 60,
        unit: 'µg/m³',
        count: 24,
        aboveLimit: 24,
        min: 65,
        q1: 65,
        median: 65,
        q3: 65,
        max: 65,
        bins: [{ lower: 65, upper: 65, count: 24 }],
      });
    });
  });

  describe('GET /readings', () => {
    it('should list cities with data', async () => {
      const response = await request(app.getHttpServer())
        .get('/readings')
        .expect(200);

      expect(response.body).toEqual({ cities: ['Delhi', 'Mumbai'] });
    });
  });
});
