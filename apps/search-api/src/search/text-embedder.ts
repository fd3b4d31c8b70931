import {
  type EmbedContentParameters,
  type EmbedContentResponse,
  GoogleGenAI,
} from "@google/genai";
import { Logger } from "@nestjs/common";

export const TEXT_EMBEDDER = "TEXT_EMBEDDER";

/**
 * Dense query embedding for the transcript and summary channels.
 */
export interface TextEmbedder {
  embed(text: string): Promise<number[]>;
}

export interface GeminiEmbedderOptions {
  apiKey: string;
  enabled: boolean;
  model: string;
}

/** The part of the Gemini models API used for embeddings */
export interface EmbeddingModels {
  embedContent(params: EmbedContentParameters): Promise<EmbedContentResponse>;
}

export class TextEmbeddingUnavailableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TextEmbeddingUnavailableError";
  }
}

export class GeminiTextEmbedder implements TextEmbedder {
  private readonly logger = new Logger(GeminiTextEmbedder.name);
  private readonly models: EmbeddingModels | null;

  constructor(
    private readonly options: GeminiEmbedderOptions,
    models?: EmbeddingModels,
  ) {
    if (!options.apiKey) {
      this.logger.warn("GEMINI_API_KEY not configured");
    }

    if (options.enabled) {
      this.logger.log("Gemini text embeddings are ENABLED");
    } else {
      this.logger.warn(
        "Gemini text embeddings are DISABLED via ENABLE_GEMINI flag",
      );
    }

    const available = options.enabled && options.apiKey.length > 0;
    this.models =
      models ??
      (available ? new GoogleGenAI({ apiKey: options.apiKey }).models : null);
  }

  async embed(text: string): Promise<number[]> {
    if (!this.models) {
      throw new TextEmbeddingUnavailableError(
        "Gemini text embeddings are disabled",
      );
    }

    const response = await this.models.embedContent({
      model: this.options.model,
      contents: text,
    });

    const values = response.embeddings?.[0]?.values;
    if (!values || values.length === 0) {
      throw new Error("No embedding returned from Gemini");
    }

    return values;
  }
}
