import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { LookupModule } from '../lookup/lookup.module';
import { VocabularyService } from './vocabulary.service';

@Module({
  imports: [ConfigModule, LookupModule],
  providers: [VocabularyService],
  exports: [VocabularyService],
})
export class VocabularyModule {}
