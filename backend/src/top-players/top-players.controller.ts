import {
  Body,
  Controller,
  Delete,
  Get,
  Param,
  ParseIntPipe,
  Patch,
  Post,
  Query,
} from "@nestjs/common";

import { CreateTopPlayerDto } from "./dto/create-top-player.dto";
import { LeadersQuery, ListTopPlayersQuery } from "./dto/list-top-players.query";
import { UpdateTopPlayerDto } from "./dto/update-top-player.dto";
import { TopPlayersService } from "./top-players.service";

/**
 * TopPlayersController exposes CRUD endpoints under `/top-players`.
 *
 * Records are addressed by the cricket player id (player_id), not by the
 * table's serial id.
 */
@Controller("top-players")
export class TopPlayersController {
  constructor(private readonly players: TopPlayersService) {}

  /**
   * GET /top-players?name=koh&sort=name
   *
   * `name` filters case-insensitively by substring.
   */
  @Get()
  list(@Query() query: ListTopPlayersQuery) {
    return this.players.list(query.name, query.sort);
  }

  /**
   * GET /top-players/leaders?limit=10&name=koh
   *
   * Chart data: top players by runs and by hundreds, optionally within the
   * same name filter as the list.
   */
  @Get("leaders")
  leaders(@Query() query: LeadersQuery) {
    return this.players.leaders(query.limit, query.name);
  }

  @Get(":playerId")
  get(@Param("playerId", ParseIntPipe) playerId: number) {
    return this.players.get(playerId);
  }

  /**
   * POST /top-players
   *
   * Payload:
   * {
   *   "playerId": 1413, "name": "...", "matchesPlayed": 10,
   *   "inningsBatted": 10, "runs": 500, "average": 50.5, "hundred": 2
   * }
   */
  @Post()
  create(@Body() body: CreateTopPlayerDto) {
    return this.players.create(body);
  }

  /**
   * PATCH /top-players/:playerId
   *
   * Any of runs, average, hundred.
   */
  @Patch(":playerId")
  update(@Param("playerId", ParseIntPipe) playerId: number, @Body() body: UpdateTopPlayerDto) {
    return this.players.update(playerId, body);
  }

  @Delete(":playerId")
  remove(@Param("playerId", ParseIntPipe) playerId: number) {
    return this.players.remove(playerId);
  }
}
