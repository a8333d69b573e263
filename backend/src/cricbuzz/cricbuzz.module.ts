import { Module } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import axios from "axios";

import { CricbuzzSettings, cricbuzzSettings } from "../config/configuration";
import { EnvironmentVariables } from "../config/env.validation";
import { CricbuzzClient } from "./cricbuzz.client";
import { CRICBUZZ_HTTP, CRICBUZZ_SETTINGS } from "./cricbuzz.constants";

/**
 * CricbuzzModule owns every call to the third-party cricket API.
 *
 * The axios instance and the settings are separate providers so tests can
 * swap the transport without touching configuration.
 */
@Module({
  providers: [
    {
      provide: CRICBUZZ_SETTINGS,
      inject: [ConfigService],
      useFactory: (config: ConfigService<EnvironmentVariables, true>) => cricbuzzSettings(config),
    },
    {
      provide: CRICBUZZ_HTTP,
      inject: [CRICBUZZ_SETTINGS],
      useFactory: (settings: CricbuzzSettings) =>
        axios.create({
          baseURL: `https://${settings.host}`,
          timeout: settings.timeoutMs,
          headers: {
            "x-rapidapi-host": settings.host,
            "x-rapidapi-key": settings.apiKey,
          },
        }),
    },
    CricbuzzClient,
  ],
  exports: [CricbuzzClient],
})
export class CricbuzzModule {}
