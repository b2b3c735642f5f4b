export type QualityMetrics = {
  vocabularyAppropriateness: number;
  grammarComplexity: number;
  contentStructure: number;
  educationalValue: number;
  authenticity: number;
  culturalRelevance: number;
  readability: number;
  engagementFactor: number;
};

export type LevelGradingResult = {
  assignedLevel: string;
  confidenceScore: number;
  levelScores: Record<string, number>;
  qualityMetrics: QualityMetrics;
  recommendations: string[];
};

export type QualityScore = {
  educationalValue: number;
  difficultyMatch: number;
  sourceReliability: number;
  contentFreshness: number;
  overallScore: number;
};

/** Caller-supplied knowledge about the source; missing values fall back to configured defaults. */
export type SourceSignals = {
  sourceReliability?: number;
  contentFreshness?: number;
};

export type AdmissionTier = 'excellent' | 'good' | 'acceptable' | 'poor' | 'rejected';

export type AdmissionDecision = {
  admitted: boolean;
  tier: AdmissionTier;
};

export const UNSUPPORTED_LEVEL = 'intermediate';
