import { Expose } from "class-transformer";
import {
  IsIn,
  IsInt,
  IsNumber,
  IsObject,
  IsOptional,
  IsString,
  IsUUID,
  Length,
  Matches,
  Max,
  Min,
} from "class-validator";
import {
  VISUAL_MODE_SETTINGS,
  type VisualMode,
  type VisualModeSetting,
} from "../../shared/search-types";

export class SearchRequestDto {
  @Expose()
  @IsString()
  @Length(1, 1000)
  @Matches(/\S/, { message: "query must not be blank" })
  query!: string;

  @Expose()
  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(100)
  limit: number = 10;

  @Expose()
  @IsOptional()
  @IsNumber()
  @Min(0)
  @Max(1)
  threshold: number = 0.2;

  @Expose({ name: "video_id" })
  @IsOptional()
  @IsUUID()
  videoId?: string;

  // Overrides VISUAL_MODE for this request
  @Expose({ name: "visual_mode" })
  @IsOptional()
  @IsIn(VISUAL_MODE_SETTINGS)
  visualMode?: VisualModeSetting;

  @Expose({ name: "channel_weights" })
  @IsOptional()
  @IsObject()
  channelWeights?: Record<string, number>;
}

export interface SearchResultDto {
  id: string;
  video_id: string;
  index: number;
  start_s: number;
  end_s: number;
  transcript_segment: string | null;
  visual_summary: string | null;
  thumbnail_url: string | null;
  tags: string[];
  score: number; // final ranking score
  display_score: number; // calibrated for UI, ranking unaffected
  base_score: number;
  visual_score: number | null;
}

export interface SearchResponseDto {
  query: string;
  results: SearchResultDto[];
  total: number;
  latency_ms: number;
  visual_mode_used: VisualMode;
  visual_mode_reason: string;
  weights_applied: Record<string, number>;
}
