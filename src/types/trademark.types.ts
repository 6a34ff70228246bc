export const SIMILARITY_CATEGORIES = ['dissimilar', 'low', 'moderate', 'high', 'identical'] as const;

// Ordered weakest to strongest; the array index is the category rank.
export type SimilarityCategory = (typeof SIMILARITY_CATEGORIES)[number];

export const CONFUSION_TYPES = ['direct', 'indirect'] as const;

export type ConfusionType = (typeof CONFUSION_TYPES)[number];

export type OppositionOutcome = 'succeed' | 'partial' | 'fail';

export const OUTCOME_LABELS: Record<OppositionOutcome, string> = {
  succeed: 'Opposition likely to succeed',
  partial: 'Opposition may partially succeed',
  fail: 'Opposition likely to fail',
};

export interface Wordmark {
  readonly wordmark: string;
  readonly isRegistered: boolean;
  readonly registrationNumber?: string;
}

export interface GoodsService {
  readonly term: string;
  readonly niceClass: number; // Nice classification, 1-45
}

export interface PhoneticCode {
  readonly primary: string;
  readonly alternate?: string;
  // true when the mark had nothing to pronounce and the code is the literal characters
  readonly fallback: boolean;
}

export interface FormSimilarity {
  readonly visualScore: number;
  readonly auralScore: number;
  readonly visual: SimilarityCategory;
  readonly aural: SimilarityCategory;
}

export interface MarkSimilarityResult {
  readonly visual: SimilarityCategory;
  readonly aural: SimilarityCategory;
  readonly conceptual: SimilarityCategory;
  readonly overall: SimilarityCategory;
  readonly reasoning?: string;
  readonly scores?: {
    readonly visual: number;
    readonly aural: number;
  };
}

export interface GoodsServicePair {
  readonly applicantGood: GoodsService;
  readonly opponentGood: GoodsService;
  readonly similarityScore: number;
  readonly competitive: boolean;
  readonly complementary: boolean;
}

export type ConfusionDetermination =
  | {
      readonly pair: GoodsServicePair;
      readonly likelihoodOfConfusion: true;
      readonly confusionType: ConfusionType;
      readonly threshold: number;
    }
  | {
      readonly pair: GoodsServicePair;
      readonly likelihoodOfConfusion: false;
      readonly confusionType: null;
      readonly threshold: number;
    };

export interface OutcomeSummary {
  readonly totalPairs: number;
  readonly confusionPairs: number;
  readonly directConfusions: number;
  readonly indirectConfusions: number;
  readonly markOverall: SimilarityCategory;
}

export interface CaseOutcome {
  readonly outcome: OppositionOutcome;
  readonly label: string;
  readonly confidence: number;
  readonly rationale: string;
  readonly summary: OutcomeSummary;
}

export interface CasePrediction {
  readonly applicant?: Wordmark;
  readonly opponent?: Wordmark;
  readonly markComparison: MarkSimilarityResult;
  readonly goodsServices: ConfusionDetermination[];
  readonly outcome: CaseOutcome;
}

export interface PredictionRequest {
  readonly applicant: Wordmark;
  readonly opponent: Wordmark;
  readonly applicantGoods: GoodsService[];
  readonly opponentGoods: GoodsService[];
}

// Judgments supplied by the semantic assessor; the engine never computes these.
export interface SemanticMarkAssessment {
  readonly conceptual: SimilarityCategory;
  readonly overall: SimilarityCategory;
  readonly reasoning?: string;
}

export interface GoodsServiceAssessment {
  readonly similarityScore: number;
  readonly competitive: boolean;
  readonly complementary: boolean;
}
