import {
  Entity,
  Column,
  PrimaryColumn,
  Index,
  CreateDateColumn,
} from 'typeorm';

/**
 * Reading Entity - one row per city per timestamp
 *
 * The six CPCB pollutants are first-class columns so per-pollutant series
 * can be selected and averaged without touching JSONB. Meteorological
 * fields and any unmapped source columns go to `metadata`.
 *
 * Composite Primary Key: [city, timestamp]
 * - Re-ingesting the same file upserts instead of duplicating rows
 * - Range scans by city use the primary key index
 */
@Entity('air_quality_readings')
@Index('idx_air_quality_readings_timestamp', ['timestamp'])
export class Reading {
  /**
   * Timestamp of the reading (UTC enforced).
   * Part of composite primary key.
   */
  @PrimaryColumn({ type: 'timestamptz' })
  timestamp!: Date;

  /**
   * Monitoring city, as it appears in the source file.
   * Part of composite primary key.
   */
  @PrimaryColumn({ type: 'varchar', length: 64 })
  city!: string;

  /** PM2.5 in µg/m³ */
  @Column({ type: 'float', nullable: true })
  pm25!: number | null;

  /** PM10 in µg/m³ */
  @Column({ type: 'float', nullable: true })
  pm10!: number | null;

  @Column({ type: 'float', nullable: true })
  no2!: number | null;

  @Column({ type: 'float', nullable: true })
  so2!: number | null;

  /** CO in mg/m³ */
  @Column({ type: 'float', nullable: true })
  co!: number | null;

  @Column({ type: 'float', nullable: true })
  o3!: number | null;

  /**
   * CPCB AQI computed at ingestion from the pollutants present.
   * Null when the row carries no pollutant value.
   */
  @Column({ type: 'int', nullable: true })
  aqi!: number | null;

  @Column({ type: 'varchar', length: 20, nullable: true })
  aqiCategory!: string | null;

  /**
   * Everything else from the source row, camelCased.
   *
   * Typical contents:
   * {
   *   "temperatureC": 18.4,
   *   "humidityPct": 72,
   *   "windSpeedKmh": 6.1,
   *   "source": "wide"
   * }
   */
  @Column({ type: 'jsonb', nullable: true, default: {} })
  metadata!: Record<string, unknown>;

  @CreateDateColumn({ type: 'timestamptz' })
  createdAt!: Date;
}
