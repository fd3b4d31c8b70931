import { Module } from "@nestjs/common";
import { VisualScoringModule } from "../visual-scoring/visual-scoring.module";
import { RerankerService } from "./reranker.service";
import { ScoreFusionService } from "./score-fusion.service";
import { VisualIntentRouter } from "./visual-intent-router.service";

@Module({
  imports: [VisualScoringModule],
  providers: [VisualIntentRouter, ScoreFusionService, RerankerService],
  exports: [
    VisualIntentRouter,
    ScoreFusionService,
    RerankerService,
    VisualScoringModule,
  ],
})
export class ScoringModule {}
