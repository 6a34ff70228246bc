import { Module } from '@nestjs/common';
import { LexicalDistanceService } from './lexical-distance.service';
import { MarkSimilarityService } from './mark-similarity.service';
import { PhoneticEncoderService } from './phonetic-encoder.service';

@Module({
  providers: [LexicalDistanceService, PhoneticEncoderService, MarkSimilarityService],
  exports: [LexicalDistanceService, PhoneticEncoderService, MarkSimilarityService],
})
export class SimilarityModule {}
