import { Module } from "@nestjs/common";

import { CricbuzzModule } from "../cricbuzz/cricbuzz.module";
import { PlayersController } from "./players.controller";
import { PlayersService } from "./players.service";

@Module({
  imports: [CricbuzzModule],
  controllers: [PlayersController],
  providers: [PlayersService],
})
export class PlayersModule {}
