import { BadRequestException, Controller, Get, Param, ParseEnumPipe, Query } from "@nestjs/common";

import { StatType } from "../cricbuzz/cricbuzz.types";
import { PlayersService } from "./players.service";

@Controller("players")
export class PlayersController {
  constructor(private readonly players: PlayersService) {}

  /**
   * GET /players/search?name=...
   *
   * Example:
   *   /players/search?name=kohli
   */
  @Get("search")
  search(@Query("name") name?: string) {
    const term = (name ?? "").trim();
    if (!term) {
      throw new BadRequestException("Query parameter 'name' is required");
    }
    return this.players.search(term);
  }

  /**
   * GET /players/:playerId/stats/:type
   *
   * type is "batting" or "bowling". An empty table means the API has no
   * career numbers of that kind for the player.
   */
  @Get(":playerId/stats/:type")
  stats(
    @Param("playerId") playerId: string,
    @Param("type", new ParseEnumPipe(StatType)) type: StatType
  ) {
    return this.players.getStats(playerId, type);
  }
}
