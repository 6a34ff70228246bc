import { Test } from '@nestjs/testing';
import { InvalidInputException } from '../common/invalid-input.exception';
import assessmentConfig, { AssessmentConfig, DEFAULT_ASSESSMENT_CONFIG } from '../config/assessment.config';
import { SimilarityModule } from '../similarity/similarity.module';
import {
  GoodsService,
  GoodsServiceAssessment,
  MarkSimilarityResult,
  SemanticMarkAssessment,
  Wordmark,
} from '../types/trademark.types';
import { ConfusionClassifierService } from './confusion-classifier.service';
import { OutcomeAggregatorService } from './outcome-aggregator.service';
import { SEMANTIC_ASSESSOR, SemanticAssessor } from './semantic-assessor';
import { TrademarkService } from './trademark.service';

class FakeSemanticAssessor implements SemanticAssessor {
  marks: SemanticMarkAssessment = { conceptual: 'dissimilar', overall: 'moderate' };
  goodsServices = new Map<string, GoodsServiceAssessment & { delayMs?: number }>();
  inFlight = 0;
  maxInFlight = 0;

  async assessMarks(): Promise<SemanticMarkAssessment> {
    return this.marks;
  }

  async assessGoodsServices(applicantGood: GoodsService, opponentGood: GoodsService): Promise<GoodsServiceAssessment> {
    const entry = this.goodsServices.get(`${applicantGood.term}|${opponentGood.term}`);
    if (entry === undefined) {
      throw new Error(`unexpected pair ${applicantGood.term}|${opponentGood.term}`);
    }
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    await new Promise((resolve) => setTimeout(resolve, entry.delayMs ?? 0));
    this.inFlight--;
    return { similarityScore: entry.similarityScore, competitive: entry.competitive, complementary: entry.complementary };
  }
}

const mark = (wordmark: string): Wordmark => ({ wordmark, isRegistered: false });
const good = (term: string, niceClass = 25): GoodsService => ({ term, niceClass });

const moderateMarks: MarkSimilarityResult = {
  visual: 'moderate',
  aural: 'high',
  conceptual: 'dissimilar',
  overall: 'moderate',
};

async function createService(assessor: SemanticAssessor, config: AssessmentConfig = DEFAULT_ASSESSMENT_CONFIG) {
  const moduleRef = await Test.createTestingModule({
    imports: [SimilarityModule],
    providers: [
      TrademarkService,
      ConfusionClassifierService,
      OutcomeAggregatorService,
      { provide: SEMANTIC_ASSESSOR, useValue: assessor },
      { provide: assessmentConfig.KEY, useValue: config },
    ],
  }).compile();

  return moduleRef.get(TrademarkService);
}

describe('TrademarkService', () => {
  let assessor: FakeSemanticAssessor;
  let service: TrademarkService;

  beforeEach(async () => {
    assessor = new FakeSemanticAssessor();
    service = await createService(assessor);
  });

  describe('compareMarks', () => {
    it('combines computed form similarity with the assessor judgment', async () => {
      assessor.marks = { conceptual: 'dissimilar', overall: 'moderate', reasoning: 'Shared prefix' };

      const result = await service.compareMarks(mark('ZAREUS'), mark('ZARA'));

      expect(result.visual).toBe('moderate');
      expect(result.conceptual).toBe('dissimilar');
      expect(result.overall).toBe('moderate');
      expect(result.reasoning).toBe('Shared prefix');
      expect(result.scores?.visual).toBe(0.5);
    });

    it('lifts the judged overall category for identical marks', async () => {
      assessor.marks = { conceptual: 'low', overall: 'low' };

      const result = await service.compareMarks(mark('XQZPVY'), mark('xqzpvy'));

      expect(result.visual).toBe('identical');
      expect(result.aural).toBe('identical');
      expect(result.overall).toBe('identical');
    });
  });

  describe('assessGoodsServicesBatch', () => {
    it('assesses every applicant term against every opponent term in order', async () => {
      assessor.goodsServices.set('Clothing|Footwear', {
        similarityScore: 0.7,
        competitive: false,
        complementary: true,
        delayMs: 20,
      });
      assessor.goodsServices.set('Clothing|Perfumery', { similarityScore: 0.2, competitive: false, complementary: false });
      assessor.goodsServices.set('Bags|Footwear', { similarityScore: 0.66, competitive: false, complementary: false });
      assessor.goodsServices.set('Bags|Perfumery', {
        similarityScore: 1,
        competitive: true,
        complementary: false,
        delayMs: 5,
      });

      const determinations = await service.assessGoodsServicesBatch(
        [good('Clothing'), good('Bags', 18)],
        [good('Footwear'), good('Perfumery', 3)],
        moderateMarks,
      );

      expect(determinations.map((d) => `${d.pair.applicantGood.term}|${d.pair.opponentGood.term}`)).toEqual([
        'Clothing|Footwear',
        'Clothing|Perfumery',
        'Bags|Footwear',
        'Bags|Perfumery',
      ]);
      expect(determinations.map((d) => d.confusionType)).toEqual(['indirect', null, 'direct', 'direct']);
    });

    it('bounds the number of concurrent assessments', async () => {
      service = await createService(assessor, { ...DEFAULT_ASSESSMENT_CONFIG, goodsServicesConcurrency: 2 });
      const opponentGoods = ['A', 'B', 'C', 'D', 'E'].map((term) => good(term));
      for (const { term } of opponentGoods) {
        assessor.goodsServices.set(`Clothing|${term}`, {
          similarityScore: 0.9,
          competitive: false,
          complementary: false,
          delayMs: 5,
        });
      }

      const determinations = await service.assessGoodsServicesBatch([good('Clothing')], opponentGoods, moderateMarks);

      expect(determinations).toHaveLength(5);
      expect(assessor.maxInFlight).toBe(2);
    });

    it('rejects empty goods/services lists', async () => {
      await expect(service.assessGoodsServicesBatch([], [good('Clothing')], moderateMarks)).rejects.toThrow(
        'applicantGoods: at least one goods/services term is required',
      );
      await expect(service.assessGoodsServicesBatch([good('Clothing')], [], moderateMarks)).rejects.toThrow(
        InvalidInputException,
      );
    });

    it('surfaces a malformed score from the assessor', async () => {
      assessor.goodsServices.set('Clothing|Footwear', { similarityScore: 1.5, competitive: false, complementary: false });

      await expect(
        service.assessGoodsServicesBatch([good('Clothing')], [good('Footwear')], moderateMarks),
      ).rejects.toThrow('similarityScore: expected a score in [0, 1], received 1.5');
    });
  });

  describe('predictCase', () => {
    it('aggregates the given determinations', async () => {
      assessor.goodsServices.set('Clothing|Clothing', { similarityScore: 1, competitive: true, complementary: false });
      const determination = await service.assessGoodsService(good('Clothing'), good('Clothing'), moderateMarks);

      const prediction = service.predictCase(moderateMarks, [determination]);

      expect(prediction.markComparison).toBe(moderateMarks);
      expect(prediction.goodsServices).toEqual([determination]);
      expect(prediction.outcome.outcome).toBe('succeed');
    });

    it('rejects an empty determination list', () => {
      expect(() => service.predictCase(moderateMarks, [])).toThrow(InvalidInputException);
    });
  });

  describe('predict', () => {
    beforeEach(() => {
      assessor.marks = { conceptual: 'dissimilar', overall: 'moderate' };
      assessor.goodsServices.set('Clothing|Clothing', { similarityScore: 1, competitive: true, complementary: false });
    });

    it('runs a case from wordmarks to outcome', async () => {
      const prediction = await service.predict({
        applicant: mark('ZAREUS'),
        opponent: mark('ZARA'),
        applicantGoods: [good('Clothing')],
        opponentGoods: [good('Clothing')],
      });

      expect(prediction.markComparison.visual).toBe('moderate');
      expect(prediction.markComparison.overall).toBe('moderate');
      expect(prediction.goodsServices).toHaveLength(1);
      expect(prediction.goodsServices[0]).toMatchObject({
        likelihoodOfConfusion: true,
        confusionType: 'direct',
        threshold: 0.65,
      });
      expect(prediction.outcome).toMatchObject({ outcome: 'succeed', confidence: 0.75 });
      expect(prediction.applicant).toEqual(mark('ZAREUS'));
    });

    it('produces identical output for identical input', async () => {
      const request = {
        applicant: mark('ZAREUS'),
        opponent: mark('ZARA'),
        applicantGoods: [good('Clothing')],
        opponentGoods: [good('Clothing')],
      };

      const first = await service.predict(request);
      const second = await service.predict(request);

      expect(JSON.stringify(second)).toBe(JSON.stringify(first));
    });

    it('rethrows assessor failures', async () => {
      await expect(
        service.predict({
          applicant: mark('ZAREUS'),
          opponent: mark('ZARA'),
          applicantGoods: [good('Hats')],
          opponentGoods: [good('Clothing')],
        }),
      ).rejects.toThrow('unexpected pair Hats|Clothing');
    });

    it('rejects an empty wordmark', async () => {
      await expect(
        service.predict({
          applicant: mark(''),
          opponent: mark('ZARA'),
          applicantGoods: [good('Clothing')],
          opponentGoods: [good('Clothing')],
        }),
      ).rejects.toThrow(InvalidInputException);
    });
  });
});
