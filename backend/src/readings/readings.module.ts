import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Reading } from '../database/entities/reading.entity';
import { ReadingsController } from './readings.controller';
import { ReadingsService } from './readings.service';

/**
 * ReadingsModule
 *
 * Read access to stored readings. Exported for the analytics module.
 */
@Module({
  imports: [TypeOrmModule.forFeature([Reading])],
  controllers: [ReadingsController],
  providers: [ReadingsService],
  exports: [ReadingsService],
})
export class ReadingsModule {}
