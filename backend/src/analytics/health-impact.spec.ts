import { assessHealthImpact, healthAdvisory } from './health-impact';

describe('assessHealthImpact', () => {
  it('should estimate mortality and life expectancy from excess PM2.5', () => {
    const impact = assessHealthImpact(110, 320);

    expect(impact.prematureDeathsPer100k).toBe(420);
    expect(impact.lifeYearsLost).toBe(10);
  });

  it('should grade disease risk multipliers', () => {
    const { risks } = assessHealthImpact(110, 320);

    expect(risks.copd.multiplier).toBeCloseTo(1.88);
    expect(risks.copd.level).toBe('elevated');
    expect(risks.asthma.multiplier).toBeCloseTo(1.66);
    expect(risks.asthma.level).toBe('high');
    expect(risks.cardiovascular.multiplier).toBeCloseTo(2.32);
    expect(risks.cardiovascular.level).toBe('high');
  });

  it('should report no excess below the reference level', () => {
    const impact = assessHealthImpact(5, 20);

    expect(impact.prematureDeathsPer100k).toBe(0);
    expect(impact.lifeYearsLost).toBe(0);
    expect(impact.risks.copd.level).toBe('low');
    expect(impact.risks.asthma.level).toBe('low');
    expect(impact.risks.cardiovascular.level).toBe('low');
  });

  it('should compare against WHO and CPCB standards', () => {
    expect(assessHealthImpact(72.5, null).standards).toEqual({
      whoGuideline: 15,
      cpcbStandard: 40,
      current: 72.5,
    });
  });

  it('should attach the advisory for the average AQI', () => {
    expect(assessHealthImpact(110, 320).advisory.level).toBe('SEVERE');
  });
});

describe('healthAdvisory', () => {
  it.each([
    [301, 'SEVERE'],
    [300, 'UNHEALTHY'],
    [201, 'UNHEALTHY'],
    [200, 'MODERATE'],
    [101, 'MODERATE'],
    [100, 'SAFE'],
    [null, 'SAFE'],
  ])('should classify an average AQI of %p as %s', (aqi, level) => {
    expect(healthAdvisory(aqi).level).toBe(level);
  });

  it('should carry the guidance text', () => {
    expect(healthAdvisory(50).message).toBe(
      'Air quality is acceptable for most individuals.',
    );
  });
});
