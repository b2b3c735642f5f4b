import type { AdmissionDecision, LevelGradingResult, QualityScore } from '../grading/grading.types';
import type { VocabularyItem } from '../vocabulary/vocabulary.types';

export type BatchGradingEntry = {
  contentId: string;
  language: string;
  grading: LevelGradingResult;
  quality: QualityScore;
  admission: AdmissionDecision;
  claimedLevelAccuracy: number;
  vocabulary: VocabularyItem[];
};
