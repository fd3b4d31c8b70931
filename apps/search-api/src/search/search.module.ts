import { Module } from "@nestjs/common";
import { ScoringModule } from "../scoring/scoring.module";
import {
  CANDIDATE_RETRIEVER,
  PgCandidateRetriever,
} from "./candidate-retriever";
import { SearchController } from "./search.controller";
import { SearchService } from "./search.service";
import {
  GeminiTextEmbedder,
  TEXT_EMBEDDER,
  type TextEmbedder,
} from "./text-embedder";

@Module({
  imports: [ScoringModule],
  controllers: [SearchController],
  providers: [
    SearchService,
    {
      provide: CANDIDATE_RETRIEVER,
      useClass: PgCandidateRetriever,
    },
    {
      provide: TEXT_EMBEDDER,
      useFactory: async (): Promise<TextEmbedder> => {
        const { env } = await import("@repo/env");
        return new GeminiTextEmbedder({
          apiKey: env.GEMINI_API_KEY,
          enabled: env.ENABLE_GEMINI,
          model: env.GEMINI_EMBEDDING_MODEL,
        });
      },
    },
  ],
})
export class SearchModule {}
