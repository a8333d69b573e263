import { Module } from "@nestjs/common";

import { TopPlayersController } from "./top-players.controller";
import { TopPlayersService } from "./top-players.service";

/**
 * TopPlayersModule: CRUD management of the top_players table.
 * Database access comes from the global DatabaseModule.
 */
@Module({
  controllers: [TopPlayersController],
  providers: [TopPlayersService],
})
export class TopPlayersModule {}
