import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { LookupModule } from '../lookup/lookup.module';
import { AppropriatenessService } from './appropriateness.service';
import { GradingService } from './grading.service';
import { MetricsCalculatorService } from './metrics-calculator.service';
import { QualityScoreService } from './quality-score.service';
import { RecommendationsService } from './recommendations.service';

@Module({
  imports: [ConfigModule, LookupModule],
  providers: [
    MetricsCalculatorService,
    RecommendationsService,
    GradingService,
    AppropriatenessService,
    QualityScoreService,
  ],
  exports: [
    MetricsCalculatorService,
    RecommendationsService,
    GradingService,
    AppropriatenessService,
    QualityScoreService,
  ],
})
export class GradingModule {}
