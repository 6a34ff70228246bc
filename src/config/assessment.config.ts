import { registerAs } from '@nestjs/config';
import { SimilarityCategory } from '../types/trademark.types';

export interface AssessmentConfig {
  // Minimum G/S similarity for confusion, keyed by the mark's overall category.
  confusionThresholds: Record<SimilarityCategory, number>;
  directConfusionScore: number;
  failConfidencePenalty: number;
  succeedConfidence: Record<SimilarityCategory, number>;
  partialConfidence: { min: number; max: number };
  confidencePrecision: number;
  goodsServicesConcurrency: number;
}

export const DEFAULT_ASSESSMENT_CONFIG: AssessmentConfig = {
  confusionThresholds: {
    identical: 0.5,
    high: 0.5,
    moderate: 0.65,
    low: 0.8,
    dissimilar: 0.95,
  },
  directConfusionScore: 0.9,
  failConfidencePenalty: 0.3,
  succeedConfidence: {
    identical: 0.95,
    high: 0.88,
    moderate: 0.75,
    low: 0.62,
    dissimilar: 0.55,
  },
  partialConfidence: { min: 0.4, max: 0.6 },
  confidencePrecision: 2,
  goodsServicesConcurrency: 5,
};

function readNumber(
  env: NodeJS.ProcessEnv,
  name: string,
  fallback: number,
  isValid: (value: number) => boolean,
): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isFinite(value) || !isValid(value)) {
    throw new Error(`Invalid value for ${name}: "${raw}"`);
  }
  return value;
}

const isUnit = (value: number) => value >= 0 && value <= 1;
const isPositiveInteger = (value: number) => Number.isInteger(value) && value > 0;

export function loadAssessmentConfig(env: NodeJS.ProcessEnv = process.env): AssessmentConfig {
  return {
    ...DEFAULT_ASSESSMENT_CONFIG,
    directConfusionScore: readNumber(
      env,
      'ASSESSMENT_DIRECT_CONFUSION_SCORE',
      DEFAULT_ASSESSMENT_CONFIG.directConfusionScore,
      isUnit,
    ),
    failConfidencePenalty: readNumber(
      env,
      'ASSESSMENT_FAIL_CONFIDENCE_PENALTY',
      DEFAULT_ASSESSMENT_CONFIG.failConfidencePenalty,
      isUnit,
    ),
    confidencePrecision: readNumber(
      env,
      'ASSESSMENT_CONFIDENCE_PRECISION',
      DEFAULT_ASSESSMENT_CONFIG.confidencePrecision,
      (value) => Number.isInteger(value) && value >= 0 && value <= 10,
    ),
    goodsServicesConcurrency: readNumber(
      env,
      'ASSESSMENT_GS_CONCURRENCY',
      DEFAULT_ASSESSMENT_CONFIG.goodsServicesConcurrency,
      isPositiveInteger,
    ),
  };
}

export default registerAs('assessment', (): AssessmentConfig => loadAssessmentConfig());
