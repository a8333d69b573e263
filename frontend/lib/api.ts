// lib/api.ts
// Small fetch wrapper around the NestJS backend.
// We keep types here so the UI stays strongly typed.

const BASE_URL = process.env.NEXT_PUBLIC_BACKEND_URL || "http://localhost:3000";

/**
 * Non-2xx response from the backend. `status` lets the UI react to specific
 * cases (429 rate limit, 404 not available yet).
 */
export class ApiError extends Error {
  constructor(
    readonly status: number,
    message: string
  ) {
    super(message);
    this.name = "ApiError";
  }
}

// Nest error bodies: { statusCode, message: string | string[], error }
function messageFromBody(text: string): string | null {
  try {
    const parsed: unknown = JSON.parse(text);
    if (typeof parsed === "object" && parsed !== null && "message" in parsed) {
      const m = parsed.message;
      if (typeof m === "string") return m;
      if (Array.isArray(m)) return m.map(String).join("; ");
    }
  } catch {
    // plain-text body
  }
  return null;
}

async function apiRequest<T>(method: string, path: string, body?: unknown): Promise<T> {
  const res = await fetch(`${BASE_URL}${path}`, {
    method,
    headers: body !== undefined ? { "Content-Type": "application/json" } : undefined,
    body: body !== undefined ? JSON.stringify(body) : undefined,
  });

  if (!res.ok) {
    const text = await res.text();
    throw new ApiError(res.status, messageFromBody(text) ?? `API ${path} failed (${res.status}): ${text}`);
  }

  return (await res.json()) as T;
}

function apiGet<T>(path: string) {
  return apiRequest<T>("GET", path);
}

// ----------------------------
// DTOs (backend response shapes)
// ----------------------------

export type LiveMatchDto = {
  id: number;
  name: string;
  series: string;
  team1: string;
  team2: string;
  venue: string;
  state: string;
  status: string;
};

type Cell = number | string | null;

export type ScorecardDto = {
  summary: Array<{
    matchId: number;
    inningsId: number | null;
    team: string | null;
    score: number | null;
    wickets: number | null;
    overs: Cell;
    runRate: Cell;
    extras: number;
    byes: number;
    legByes: number;
    wides: number;
    noBalls: number;
  }>;
  batting: Array<{
    inningsId: number | null;
    team: string | null;
    name: string | null;
    runs: number | null;
    balls: number | null;
    fours: number | null;
    sixes: number | null;
    strikeRate: Cell;
    outDesc: string | null;
  }>;
  bowling: Array<{
    inningsId: number | null;
    team: string | null;
    name: string | null;
    overs: Cell;
    runs: number | null;
    wickets: number | null;
    economy: Cell;
  }>;
  fallOfWickets: Array<{
    inningsId: number | null;
    team: string | null;
    batsman: string | null;
    scoreAtFall: number | null;
    over: Cell;
  }>;
};

export type PlayerSearchDto = { id: string; name: string; team: string };

export type StatType = "batting" | "bowling";

export type StatsTableDto = {
  labelHeader: string | null;
  columns: string[];
  rows: Array<{ label: string; values: string[] }>;
};

export type QuerySummaryDto = { id: string; title: string };

export type QueryResultDto = QuerySummaryDto & {
  columns: string[];
  rows: Array<Record<string, unknown>>;
  rowCount: number;
};

export type TopPlayerDto = {
  id: number;
  playerId: number;
  name: string;
  matchesPlayed: number;
  inningsBatted: number;
  runs: number;
  average: number;
  hundred: number;
};

export type NewTopPlayer = Omit<TopPlayerDto, "id">;

export type TopPlayerPatch = Partial<Pick<TopPlayerDto, "runs" | "average" | "hundred">>;

export type LeadersDto = {
  byRuns: Array<{ name: string; value: number }>;
  byHundreds: Array<{ name: string; value: number }>;
};

export type HealthDto = { status: "ok" | "degraded"; database: "up" | "down" };

// ----------------------------
// API calls
// ----------------------------

export function getHealth() {
  return apiGet<HealthDto>("/health");
}

export function getLiveMatches() {
  return apiGet<LiveMatchDto[]>("/matches/live");
}

export function getScorecard(matchId: number) {
  return apiGet<ScorecardDto>(`/matches/${matchId}/scorecard`);
}

export function searchPlayers(name: string) {
  return apiGet<PlayerSearchDto[]>(`/players/search?name=${encodeURIComponent(name)}`);
}

export function getPlayerStats(playerId: string, type: StatType) {
  return apiGet<StatsTableDto>(`/players/${encodeURIComponent(playerId)}/stats/${type}`);
}

export function listQueries() {
  return apiGet<QuerySummaryDto[]>("/queries");
}

export function runQuery(id: string) {
  return apiRequest<QueryResultDto>("POST", `/queries/${encodeURIComponent(id)}/run`);
}

export function listTopPlayers(params: { name?: string; sort?: "id" | "name" } = {}) {
  const search = new URLSearchParams();
  if (params.name) search.append("name", params.name);
  if (params.sort) search.append("sort", params.sort);
  const query = search.toString();
  return apiGet<TopPlayerDto[]>(`/top-players${query ? `?${query}` : ""}`);
}

export function getTopPlayerLeaders(limit = 10, name?: string) {
  const search = new URLSearchParams({ limit: String(limit) });
  if (name) search.append("name", name);
  return apiGet<LeadersDto>(`/top-players/leaders?${search.toString()}`);
}

export function createTopPlayer(player: NewTopPlayer) {
  return apiRequest<TopPlayerDto>("POST", "/top-players", player);
}

export function updateTopPlayer(playerId: number, patch: TopPlayerPatch) {
  return apiRequest<TopPlayerDto>("PATCH", `/top-players/${playerId}`, patch);
}

export function deleteTopPlayer(playerId: number) {
  return apiRequest<{ deleted: true; playerId: number; name: string }>(
    "DELETE",
    `/top-players/${playerId}`
  );
}
