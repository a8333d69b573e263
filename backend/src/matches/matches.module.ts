import { Module } from "@nestjs/common";

import { CricbuzzModule } from "../cricbuzz/cricbuzz.module";
import { MatchesController } from "./matches.controller";
import { MatchesService } from "./matches.service";

@Module({
  imports: [CricbuzzModule],
  controllers: [MatchesController],
  providers: [MatchesService],
})
export class MatchesModule {}
