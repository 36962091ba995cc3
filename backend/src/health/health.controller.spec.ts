import { Test, TestingModule } from '@nestjs/testing';
import { HealthController } from './health.controller';

describe('HealthController', () => {
  let controller: HealthController;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      controllers: [HealthController],
    }).compile();

    controller = module.get<HealthController>(HealthController);
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  describe('check', () => {
    it('should return status ok with the current time', () => {
      jest.useFakeTimers().setSystemTime(new Date('2024-01-01T06:00:00Z'));

      expect(controller.check()).toEqual({
        status: 'ok',
        timestamp: '2024-01-01T06:00:00.000Z',
      });
    });
  });
});
