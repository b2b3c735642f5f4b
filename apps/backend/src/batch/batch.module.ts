import { Module } from '@nestjs/common';
import { ExportModule } from '../export/export.module';
import { GradingModule } from '../grading/grading.module';
import { VocabularyModule } from '../vocabulary/vocabulary.module';
import { BatchGradingService } from './batch-grading.service';

@Module({
  imports: [GradingModule, VocabularyModule, ExportModule],
  providers: [BatchGradingService],
  exports: [BatchGradingService, ExportModule],
})
export class BatchModule {}
