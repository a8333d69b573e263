// src/cricbuzz/cricbuzz.types.ts
// Raw payload shapes returned by the Cricbuzz API (only the fields we read)
// and the frontend-friendly shapes we return.

// ----------------------------
// Raw API payloads
// ----------------------------

export type RawMatchInfo = {
  matchId?: number;
  matchDesc?: string;
  seriesName?: string;
  team1?: { teamName?: string };
  team2?: { teamName?: string };
  venueInfo?: { ground?: string };
  state?: string;
  status?: string;
};

export type RawLiveMatches = {
  typeMatches?: Array<{
    seriesMatches?: Array<{
      seriesAdWrapper?: { matches?: Array<{ matchInfo?: RawMatchInfo }> };
    }>;
  }>;
};

export type RawBatsman = {
  name?: string;
  runs?: number;
  balls?: number;
  fours?: number;
  sixes?: number;
  strkrate?: number | string;
  outdec?: string;
};

export type RawBowler = {
  name?: string;
  overs?: number | string;
  runs?: number;
  wickets?: number;
  economy?: number | string;
};

export type RawFallOfWicket = {
  batsmanname?: string;
  runs?: number;
  overnbr?: number | string;
};

export type RawInnings = {
  inningsid?: number;
  batteamname?: string;
  batsman?: RawBatsman[];
  bowler?: RawBowler[];
  fow?: { fow?: RawFallOfWicket[] };
  extras?: {
    total?: number;
    byes?: number;
    legbyes?: number;
    wides?: number;
    noballs?: number;
  };
  score?: number;
  wickets?: number;
  overs?: number | string;
  runrate?: number | string;
};

export type RawScorecard = {
  scorecard?: RawInnings[];
};

export type RawPlayerSearch = {
  player?: Array<{
    id?: string | number | null;
    name?: string;
    teamName?: string;
    country?: string;
  }>;
};

export type RawPlayerStats = {
  headers?: string[];
  values?: Array<{ values?: string[] }>;
};

// ----------------------------
// Response shapes
// ----------------------------

export type LiveMatch = {
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

export type InningsSummaryRow = {
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
};

export type BattingRow = {
  inningsId: number | null;
  team: string | null;
  name: string | null;
  runs: number | null;
  balls: number | null;
  fours: number | null;
  sixes: number | null;
  strikeRate: Cell;
  outDesc: string | null;
};

export type BowlingRow = {
  inningsId: number | null;
  team: string | null;
  name: string | null;
  overs: Cell;
  runs: number | null;
  wickets: number | null;
  economy: Cell;
};

export type FallOfWicketRow = {
  inningsId: number | null;
  team: string | null;
  batsman: string | null;
  scoreAtFall: number | null;
  over: Cell;
};

export type Scorecard = {
  summary: InningsSummaryRow[];
  batting: BattingRow[];
  bowling: BowlingRow[];
  fallOfWickets: FallOfWicketRow[];
};

export type PlayerSearchResult = {
  id: string;
  name: string;
  team: string;
};

export enum StatType {
  Batting = "batting",
  Bowling = "bowling",
}

/**
 * Career stats grid: one row per metric ("Matches", "Runs", ...), one column
 * per format ("Test", "ODI", ...). labelHeader is the first API header.
 */
export type StatsTable = {
  labelHeader: string | null;
  columns: string[];
  rows: Array<{ label: string; values: string[] }>;
};
