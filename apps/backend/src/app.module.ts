import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { BatchModule } from './batch/batch.module';
import { LoggerModule } from './common/logger';
import { ExportModule } from './export/export.module';
import { GradingModule } from './grading/grading.module';
import { LookupModule } from './lookup/lookup.module';
import { VocabularyModule } from './vocabulary/vocabulary.module';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true, envFilePath: '.env' }),
    LoggerModule,
    LookupModule,
    GradingModule,
    VocabularyModule,
    ExportModule,
    BatchModule,
  ],
})
export class AppModule {}
