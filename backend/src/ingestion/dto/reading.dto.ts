/**
 * ReadingDTO
 *
 * Canonical form of one air-quality reading, whatever file layout it came
 * from. Pollutant concentrations map to the `Reading` columns; everything
 * else (temperature, humidity, wind, station codes) goes into `metadata`.
 */
export interface ReadingDTO {
  /**
   * Timestamp of the reading in UTC.
   * Part of the composite primary key.
   */
  timestamp: Date;

  /**
   * Monitoring city.
   * Part of the composite primary key.
   */
  city: string;

  /** PM2.5 in µg/m³ */
  pm25?: number | null;
  /** PM10 in µg/m³ */
  pm10?: number | null;
  no2?: number | null;
  so2?: number | null;
  /** CO in mg/m³ */
  co?: number | null;
  o3?: number | null;

  /**
   * Remaining columns, camelCased.
   *
   * {
   *   "temperatureC": 18.4,
   *   "humidityPct": 72
   * }
   */
  metadata?: Record<string, unknown>;
}
