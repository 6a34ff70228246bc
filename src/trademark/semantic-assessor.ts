import {
  FormSimilarity,
  GoodsService,
  GoodsServiceAssessment,
  MarkSimilarityResult,
  SemanticMarkAssessment,
  Wordmark,
} from '../types/trademark.types';

export const SEMANTIC_ASSESSOR = 'SEMANTIC_ASSESSOR';

/**
 * Source of the judgments the engine does not make itself: conceptual and overall
 * mark similarity, and how close two goods/services terms are. Supplied by the
 * caller (a language model, an examiner, a precomputed case file).
 */
export interface SemanticAssessor {
  assessMarks(applicant: Wordmark, opponent: Wordmark, form: FormSimilarity): Promise<SemanticMarkAssessment>;

  assessGoodsServices(
    applicantGood: GoodsService,
    opponentGood: GoodsService,
    markSimilarity: MarkSimilarityResult,
  ): Promise<GoodsServiceAssessment>;
}
