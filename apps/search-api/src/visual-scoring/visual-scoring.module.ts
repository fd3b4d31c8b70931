import { Module } from "@nestjs/common";
import { SEARCH_CONFIG, type SearchConfig } from "../config/search-config";
import {
  HttpVisualScorer,
  VISUAL_SCORER,
  type VisualScorer,
} from "./visual-scoring.client";

@Module({
  providers: [
    {
      provide: VISUAL_SCORER,
      useFactory: (config: SearchConfig): VisualScorer =>
        new HttpVisualScorer(config.visualService),
      inject: [SEARCH_CONFIG],
    },
  ],
  exports: [VISUAL_SCORER],
})
export class VisualScoringModule {}
