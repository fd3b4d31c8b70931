import { Body, Controller, HttpCode, HttpStatus, Post } from "@nestjs/common";
import { CurrentUser } from "../auth/current-user.decorator";
import type { AuthenticatedUser } from "../auth/jwt.strategy";
import { SearchRequestDto, type SearchResponseDto } from "./dto/search.dto";
import { SearchService } from "./search.service";

@Controller()
export class SearchController {
  constructor(private readonly searchService: SearchService) {}

  /**
   * POST /search
   * Rank scenes for a natural-language query. Results are limited to the
   * caller's videos when auth is on.
   */
  @Post("search")
  @HttpCode(HttpStatus.OK)
  async search(
    @Body() dto: SearchRequestDto,
    @CurrentUser() user: AuthenticatedUser | undefined,
  ): Promise<SearchResponseDto> {
    return this.searchService.search(dto, user?.userId);
  }
}
