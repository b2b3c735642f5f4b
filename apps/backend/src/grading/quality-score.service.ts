import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Content } from '../content/content.types';
import { matchLanguage } from '../content/content-language';
import { clamp01 } from '../common/utils/clamp';
import { AppropriatenessService } from './appropriateness.service';
import { AdmissionDecision, AdmissionTier, QualityScore, SourceSignals } from './grading.types';
import { MetricsCalculatorService } from './metrics-calculator.service';

const TRUSTED_SOURCE_RELIABILITY = 0.9;
const UNTRUSTED_SOURCE_RELIABILITY = 0.6;

const ADMISSION_TIERS: Array<{ tier: AdmissionTier; atLeast: number }> = [
  { tier: 'excellent', atLeast: 0.9 },
  { tier: 'good', atLeast: 0.8 },
  { tier: 'acceptable', atLeast: 0.7 },
  { tier: 'poor', atLeast: 0.5 },
];

const parseDomains = (rawValue: string | undefined): string[] =>
  (rawValue || 'bbc.com,cambridge.org,nhk.or.jp,jlpt.jp')
    .split(',')
    .map((domain) => domain.trim().toLowerCase())
    .filter(Boolean);

const readRatio = (configService: ConfigService, key: string, fallback: number): number => {
  const value = Number(configService.get<string>(key) || String(fallback));
  return Number.isFinite(value) ? clamp01(value) : fallback;
};

/** Host part of a URL without relying on it being well formed. */
export const sourceHost = (url: string): string => {
  const afterScheme = url.split('//').pop() ?? '';
  return (afterScheme.split('/')[0] ?? '').toLowerCase();
};

@Injectable()
export class QualityScoreService {
  private readonly logger = new Logger(QualityScoreService.name);
  private readonly trustedDomains: string[];
  private readonly defaultFreshness: number;
  private readonly admissionThreshold: number;

  constructor(
    private readonly metricsCalculator: MetricsCalculatorService,
    private readonly appropriateness: AppropriatenessService,
    configService: ConfigService,
  ) {
    this.trustedDomains = parseDomains(configService.get<string>('TRUSTED_SOURCE_DOMAINS'));
    this.defaultFreshness = readRatio(configService, 'CONTENT_FRESHNESS_DEFAULT', 0.8);
    this.admissionThreshold = readRatio(configService, 'QUALITY_ADMISSION_THRESHOLD', 0.7);
  }

  assessContentQuality(content: Content, signals: SourceSignals = {}): QualityScore {
    const sourceReliability = clamp01(signals.sourceReliability ?? this.sourceReliability(content.sourceUrl));
    const contentFreshness = clamp01(signals.contentFreshness ?? this.defaultFreshness);

    const score = matchLanguage<QualityScore>(content.language, {
      english: () => {
        const metrics = this.metricsCalculator.computeMetrics(content);
        const difficultyMatch = this.appropriateness.assessClaimedLevelAccuracy(content);
        return {
          educationalValue: metrics.educationalValue,
          difficultyMatch,
          sourceReliability,
          contentFreshness,
          overallScore:
            metrics.educationalValue * 0.35 +
            difficultyMatch * 0.25 +
            sourceReliability * 0.2 +
            contentFreshness * 0.1 +
            metrics.readability * 0.1,
        };
      },
      japanese: () => {
        const metrics = this.metricsCalculator.computeMetrics(content);
        const difficultyMatch = this.appropriateness.assessClaimedLevelAccuracy(content);
        return {
          educationalValue: metrics.educationalValue,
          difficultyMatch,
          sourceReliability,
          contentFreshness,
          overallScore:
            metrics.educationalValue * 0.35 +
            difficultyMatch * 0.25 +
            sourceReliability * 0.2 +
            contentFreshness * 0.1 +
            metrics.authenticity * 0.1,
        };
      },
      other: () => {
        const educationalValue = 0.6;
        const difficultyMatch = 0.5;
        return {
          educationalValue,
          difficultyMatch,
          sourceReliability,
          contentFreshness,
          overallScore:
            educationalValue * 0.4 + sourceReliability * 0.3 + contentFreshness * 0.2 + difficultyMatch * 0.1,
        };
      },
    });

    return { ...score, overallScore: clamp01(score.overallScore) };
  }

  decideAdmission(score: QualityScore): AdmissionDecision {
    const tier = ADMISSION_TIERS.find((entry) => score.overallScore >= entry.atLeast)?.tier ?? 'rejected';
    const admitted = score.overallScore >= this.admissionThreshold;
    if (!admitted) {
      this.logger.debug(`Rejected content scoring ${score.overallScore.toFixed(3)} (${tier})`);
    }
    return { admitted, tier };
  }

  private sourceReliability(url: string): number {
    const host = sourceHost(url);
    return this.trustedDomains.some((domain) => host.includes(domain))
      ? TRUSTED_SOURCE_RELIABILITY
      : UNTRUSTED_SOURCE_RELIABILITY;
  }
}
