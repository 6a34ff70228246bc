import { DynamicModule, Module } from '@nestjs/common';
import { SimilarityModule } from '../similarity/similarity.module';
import { ConfusionClassifierService } from './confusion-classifier.service';
import { OutcomeAggregatorService } from './outcome-aggregator.service';
import { SEMANTIC_ASSESSOR, SemanticAssessor } from './semantic-assessor';
import { TrademarkService } from './trademark.service';

export interface TrademarkModuleOptions {
  semanticAssessor: SemanticAssessor;
}

@Module({})
export class TrademarkModule {
  static register(options: TrademarkModuleOptions): DynamicModule {
    return {
      module: TrademarkModule,
      imports: [SimilarityModule],
      providers: [
        { provide: SEMANTIC_ASSESSOR, useValue: options.semanticAssessor },
        ConfusionClassifierService,
        OutcomeAggregatorService,
        TrademarkService,
      ],
      exports: [TrademarkService, ConfusionClassifierService, OutcomeAggregatorService],
    };
  }
}
