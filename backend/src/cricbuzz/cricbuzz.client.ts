// src/cricbuzz/cricbuzz.client.ts
//
// Thin client over the Cricbuzz API on RapidAPI.
//
// - One shared axios instance carries the RapidAPI headers and timeout.
// - Successful responses are cached in-process with per-endpoint TTLs
//   (the free RapidAPI tier allows very few calls per minute).
// - HTTP 429 becomes a 429 for our own caller; scorecard requests first wait
//   and retry, the other endpoints fail fast.

import {
  BadGatewayException,
  HttpException,
  HttpStatus,
  Inject,
  Injectable,
  Logger,
} from "@nestjs/common";
import axios, { AxiosInstance } from "axios";

import { CricbuzzSettings } from "../config/configuration";
import { CRICBUZZ_HTTP, CRICBUZZ_SETTINGS, RATE_LIMIT_MESSAGE } from "./cricbuzz.constants";
import { parseLiveMatches, parsePlayerSearch, parsePlayerStats } from "./cricbuzz.parsers";
import {
  LiveMatch,
  PlayerSearchResult,
  RawLiveMatches,
  RawPlayerSearch,
  RawPlayerStats,
  RawScorecard,
  StatsTable,
  StatType,
} from "./cricbuzz.types";
import { TtlCache } from "./ttl-cache";

export type CricbuzzHttp = Pick<AxiosInstance, "get">;

type GetOptions = {
  params?: Record<string, string>;
  // Retries after a 429 (0 = fail fast)
  retries?: number;
  // Used in error messages: "fetching live matches"
  label: string;
};

@Injectable()
export class CricbuzzClient {
  private readonly logger = new Logger(CricbuzzClient.name);

  // One cache per endpoint so each keeps its own value type
  private readonly liveCache = new TtlCache<LiveMatch[]>(1);
  private readonly scorecardCache = new TtlCache<RawScorecard>(100);
  private readonly searchCache = new TtlCache<PlayerSearchResult[]>();
  private readonly statsCache = new TtlCache<StatsTable>();

  constructor(
    @Inject(CRICBUZZ_HTTP) private readonly http: CricbuzzHttp,
    @Inject(CRICBUZZ_SETTINGS) private readonly settings: CricbuzzSettings
  ) {}

  // ----------------------------
  // Endpoints
  // ----------------------------

  getLiveMatches(): Promise<LiveMatch[]> {
    return this.cached(this.liveCache, "live", this.settings.ttlSec.live, async () => {
      const data = await this.get<RawLiveMatches>("/matches/v1/live", {
        label: "fetching live matches",
      });
      return parseLiveMatches(data);
    });
  }

  /**
   * Raw hscard payload; parsing is left to the caller so an empty card can
   * be told apart from a failed request.
   */
  getScorecard(matchId: number): Promise<RawScorecard> {
    return this.cached(this.scorecardCache, String(matchId), this.settings.ttlSec.scorecard, () =>
      this.get<RawScorecard>(`/mcenter/v1/${matchId}/hscard`, {
        retries: this.settings.rateLimitRetries,
        label: "fetching scorecard",
      })
    );
  }

  searchPlayers(name: string): Promise<PlayerSearchResult[]> {
    const key = name.trim().toLowerCase();
    return this.cached(this.searchCache, key, this.settings.ttlSec.player, async () => {
      const data = await this.get<RawPlayerSearch>("/stats/v1/player/search", {
        params: { plrN: name.trim() },
        label: "searching players",
      });
      return parsePlayerSearch(data);
    });
  }

  getPlayerStats(playerId: string, type: StatType): Promise<StatsTable> {
    return this.cached(this.statsCache, `${playerId}/${type}`, this.settings.ttlSec.player, async () => {
      const data = await this.get<RawPlayerStats>(
        `/stats/v1/player/${encodeURIComponent(playerId)}/${type}`,
        { label: `fetching ${type} stats` }
      );
      return parsePlayerStats(data);
    });
  }

  // ----------------------------
  // Transport helpers
  // ----------------------------

  private async cached<R>(
    cache: TtlCache<R>,
    key: string,
    ttlSec: number,
    load: () => Promise<R>
  ): Promise<R> {
    const hit = cache.get(key);
    if (hit !== undefined) {
      this.logger.debug(`Cache hit: ${key}`);
      return hit;
    }

    // Failures propagate and are never cached
    const value = await load();
    cache.set(key, value, ttlSec);
    return value;
  }

  private sleep(ms: number) {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }

  private isRateLimitError(e: unknown): boolean {
    return axios.isAxiosError(e) && e.response?.status === HttpStatus.TOO_MANY_REQUESTS;
  }

  private async get<T>(path: string, opts: GetOptions): Promise<T> {
    const maxRetries = opts.retries ?? 0;
    let attempt = 0;

    while (true) {
      try {
        const res = await this.http.get<T>(path, { params: opts.params });
        return res.data;
      } catch (e) {
        if (this.isRateLimitError(e)) {
          if (attempt < maxRetries) {
            this.logger.warn(
              `Rate-limited (429) while ${opts.label}. Retry ${attempt + 1}/${maxRetries} in ${this.settings.retryDelayMs}ms`
            );
            await this.sleep(this.settings.retryDelayMs);
            attempt += 1;
            continue;
          }

          this.logger.warn(`Rate-limited (429) while ${opts.label}`);
          throw new HttpException(RATE_LIMIT_MESSAGE, HttpStatus.TOO_MANY_REQUESTS);
        }

        throw this.upstreamError(e, opts.label);
      }
    }
  }

  private upstreamError(e: unknown, label: string): HttpException {
    let detail: string;
    if (axios.isAxiosError(e)) {
      detail = e.response ? `HTTP ${e.response.status}` : e.code ?? e.message;
    } else {
      detail = e instanceof Error ? e.message : String(e);
    }

    this.logger.error(`Cricket API error while ${label}: ${detail}`);
    return new BadGatewayException(`Cricket API error while ${label}: ${detail}`);
  }
}
