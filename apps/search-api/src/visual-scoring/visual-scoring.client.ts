import { createHash, createHmac } from "node:crypto";
import { Logger } from "@nestjs/common";
import axios, { type AxiosInstance, isAxiosError } from "axios";
import type { VisualServiceConfig } from "../config/search-config";
import {
  VisualScoringAuthError,
  VisualScoringError,
  VisualScoringTimeoutError,
} from "./visual-scoring.errors";

export const VISUAL_SCORER = "VISUAL_SCORER";

export const VISUAL_EMBEDDING_DIM = 512;

export const EMBED_TEXT_PATH = "/embed-text";
export const BATCH_SCORE_PATH = "/batch-score";

/**
 * CLIP text embedding and scene scoring service.
 */
export interface VisualScorer {
  embed(text: string): Promise<number[]>;
  /** Similarity per candidate id. Ids the service does not know are omitted. */
  batchScore(
    queryEmbedding: readonly number[],
    candidateIds: readonly string[],
  ): Promise<Map<string, number>>;
}

const isFiniteNumber = (value: unknown): value is number =>
  typeof value === "number" && Number.isFinite(value);

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isRetryable = (error: VisualScoringError): boolean =>
  !(error instanceof VisualScoringAuthError) &&
  (error.status === undefined || error.status >= 500);

/**
 * Hex HMAC-SHA256 over `METHOD|path|sha256(body)|timestamp`.
 */
export function signRequest(
  secret: string,
  method: string,
  path: string,
  body: string,
  timestamp: number,
): string {
  const bodyHash = createHash("sha256").update(body).digest("hex");
  return createHmac("sha256", secret)
    .update(`${method.toUpperCase()}|${path}|${bodyHash}|${timestamp}`)
    .digest("hex");
}

export class HttpVisualScorer implements VisualScorer {
  private readonly logger = new Logger(HttpVisualScorer.name);

  constructor(
    private readonly config: VisualServiceConfig,
    private readonly http: AxiosInstance = axios.create(),
  ) {}

  async embed(text: string): Promise<number[]> {
    if (!text.trim()) {
      throw new VisualScoringError("Text cannot be empty");
    }

    return this.post(EMBED_TEXT_PATH, { text }, (data) => {
      const embedding = isRecord(data) ? data.embedding : undefined;
      if (!Array.isArray(embedding) || !embedding.every(isFiniteNumber)) {
        throw new VisualScoringError(
          "Invalid embedding response: missing 'embedding' array",
        );
      }
      if (embedding.length !== VISUAL_EMBEDDING_DIM) {
        throw new VisualScoringError(
          `Invalid embedding dimension: expected ${VISUAL_EMBEDDING_DIM}, ` +
            `got ${embedding.length}`,
        );
      }
      return embedding;
    });
  }

  async batchScore(
    queryEmbedding: readonly number[],
    candidateIds: readonly string[],
  ): Promise<Map<string, number>> {
    if (candidateIds.length === 0) return new Map();

    return this.post(
      BATCH_SCORE_PATH,
      { query_embedding: queryEmbedding, candidate_ids: candidateIds },
      (data) => {
        const scores = isRecord(data) ? data.scores : undefined;
        if (!isRecord(scores)) {
          throw new VisualScoringError(
            "Invalid batch score response: missing 'scores' object",
          );
        }

        const requested = new Set(candidateIds);
        const result = new Map<string, number>();
        for (const [id, score] of Object.entries(scores)) {
          if (requested.has(id) && isFiniteNumber(score)) {
            result.set(id, score);
          }
        }
        return result;
      },
    );
  }

  /**
   * Signed POST with timeout and retry. Timeouts, network errors, 5xx and
   * malformed payloads are retried with exponential backoff; 4xx responses
   * are not.
   */
  private async post<T>(
    path: string,
    body: unknown,
    parse: (data: unknown) => T,
  ): Promise<T> {
    if (!this.config.baseUrl) {
      throw new VisualScoringError(
        "Visual scoring service URL is not configured",
      );
    }

    const payload = JSON.stringify(body);
    const { maxRetries, retryBaseDelayMs } = this.config;

    for (let attempt = 0; ; attempt++) {
      const started = Date.now();
      try {
        const timestamp = Math.floor(Date.now() / 1000);
        const signature = signRequest(
          this.config.secret,
          "POST",
          path,
          payload,
          timestamp,
        );
        const response = await this.http.post<unknown>(
          `${this.config.baseUrl}${path}`,
          payload,
          {
            timeout: this.config.timeoutMs,
            headers: {
              "Content-Type": "application/json",
              "X-Timestamp": String(timestamp),
              "X-Signature": signature,
            },
          },
        );

        const result = parse(response.data);
        this.logger.debug(
          `${path} succeeded in ${Date.now() - started}ms ` +
            `(attempt ${attempt + 1})`,
        );
        return result;
      } catch (error) {
        const failure = this.toScoringError(error, path);

        if (!isRetryable(failure) || attempt >= maxRetries) {
          this.logger.error(
            `${path} failed after ${attempt + 1} attempt(s): ${failure.message}`,
          );
          throw failure;
        }

        const delay = 2 ** attempt * retryBaseDelayMs;
        this.logger.warn(
          `${path} failed (${failure.message}), retrying in ${delay}ms`,
        );
        await new Promise((resolve) => setTimeout(resolve, delay));
      }
    }
  }

  private toScoringError(error: unknown, path: string): VisualScoringError {
    if (error instanceof VisualScoringError) return error;

    if (isAxiosError(error)) {
      const status = error.response?.status;
      if (status === 401 || status === 403) {
        return new VisualScoringAuthError(
          `Visual scoring service rejected credentials for ${path}`,
          status,
        );
      }
      if (error.code === "ECONNABORTED" || error.code === "ETIMEDOUT") {
        return new VisualScoringTimeoutError(
          `Visual scoring request ${path} timed out ` +
            `after ${this.config.timeoutMs}ms`,
        );
      }
      if (status !== undefined) {
        return new VisualScoringError(
          `Visual scoring service error (status=${status})`,
          status,
        );
      }
      return new VisualScoringError(
        `Visual scoring request ${path} failed: ${error.message}`,
      );
    }

    const message = error instanceof Error ? error.message : String(error);
    return new VisualScoringError(
      `Visual scoring request ${path} failed: ${message}`,
    );
  }
}
