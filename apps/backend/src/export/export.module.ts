import { Module } from '@nestjs/common';
import { ResultExporterService } from './result-exporter.service';

@Module({
  providers: [ResultExporterService],
  exports: [ResultExporterService],
})
export class ExportModule {}
