import { Module } from "@nestjs/common";
import { ConfigModule } from "@nestjs/config";

import { AppController } from "./app.controller";
import { AppService } from "./app.service";
import { validateEnv } from "./config/env.validation";
import { DatabaseModule } from "./database/database.module";
import { MatchesModule } from "./matches/matches.module";
import { PlayersModule } from "./players/players.module";
import { QueriesModule } from "./queries/queries.module";
import { TopPlayersModule } from "./top-players/top-players.module";

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true, validate: validateEnv }),
    DatabaseModule,
    MatchesModule,
    PlayersModule,
    QueriesModule,
    TopPlayersModule,
  ],
  controllers: [AppController],
  providers: [AppService],
})
export class AppModule {}
