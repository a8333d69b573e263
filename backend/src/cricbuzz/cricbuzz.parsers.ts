// src/cricbuzz/cricbuzz.parsers.ts
//
// Pure functions turning raw Cricbuzz payloads into flat rows.
// The API nests deeply and omits fields freely, so every read has a fallback.

import {
  BattingRow,
  BowlingRow,
  FallOfWicketRow,
  InningsSummaryRow,
  LiveMatch,
  PlayerSearchResult,
  RawLiveMatches,
  RawPlayerSearch,
  RawPlayerStats,
  RawScorecard,
  Scorecard,
  StatsTable,
} from "./cricbuzz.types";

/**
 * Drops rows that are field-for-field identical to an earlier one.
 * The API sometimes repeats a batsman or bowler within an innings.
 */
export function uniqueRows<T>(rows: T[]): T[] {
  const seen = new Set<string>();
  return rows.filter((row) => {
    const key = JSON.stringify(row);
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

export function parseLiveMatches(data: RawLiveMatches): LiveMatch[] {
  const matches: LiveMatch[] = [];

  for (const typeMatch of data.typeMatches ?? []) {
    for (const series of typeMatch.seriesMatches ?? []) {
      // Ad slots are interleaved with real series entries
      if (!series.seriesAdWrapper) continue;

      for (const m of series.seriesAdWrapper.matches ?? []) {
        const info = m.matchInfo;
        if (!info || info.matchId === undefined) continue;

        matches.push({
          id: info.matchId,
          name: info.matchDesc ?? `Match ${info.matchId}`,
          series: info.seriesName ?? "N/A",
          team1: info.team1?.teamName ?? "TBC",
          team2: info.team2?.teamName ?? "TBC",
          venue: info.venueInfo?.ground ?? "Unknown",
          state: info.state ?? "N/A",
          status: info.status ?? "No status",
        });
      }
    }
  }

  return matches;
}

export function hasScorecard(data: RawScorecard | null | undefined): data is Required<RawScorecard> {
  return Boolean(data && Array.isArray(data.scorecard) && data.scorecard.length > 0);
}

export function parseScorecard(data: RawScorecard, matchId: number): Scorecard {
  const summary: InningsSummaryRow[] = [];
  const batting: BattingRow[] = [];
  const bowling: BowlingRow[] = [];
  const fallOfWickets: FallOfWicketRow[] = [];

  for (const inns of data.scorecard ?? []) {
    const team = inns.batteamname ?? null;
    const inningsId = inns.inningsid ?? null;

    for (const b of inns.batsman ?? []) {
      batting.push({
        inningsId,
        team,
        name: b.name ?? null,
        runs: b.runs ?? null,
        balls: b.balls ?? null,
        fours: b.fours ?? null,
        sixes: b.sixes ?? null,
        strikeRate: b.strkrate ?? null,
        outDesc: b.outdec ?? null,
      });
    }

    for (const bw of inns.bowler ?? []) {
      bowling.push({
        inningsId,
        team,
        name: bw.name ?? null,
        overs: bw.overs ?? null,
        runs: bw.runs ?? null,
        wickets: bw.wickets ?? null,
        economy: bw.economy ?? null,
      });
    }

    for (const f of inns.fow?.fow ?? []) {
      fallOfWickets.push({
        inningsId,
        team,
        batsman: f.batsmanname ?? null,
        scoreAtFall: f.runs ?? null,
        over: f.overnbr ?? null,
      });
    }

    const extras = inns.extras ?? {};
    summary.push({
      matchId,
      inningsId,
      team,
      score: inns.score ?? null,
      wickets: inns.wickets ?? null,
      overs: inns.overs ?? null,
      runRate: inns.runrate ?? null,
      extras: extras.total ?? 0,
      byes: extras.byes ?? 0,
      legByes: extras.legbyes ?? 0,
      wides: extras.wides ?? 0,
      noBalls: extras.noballs ?? 0,
    });
  }

  return {
    summary: uniqueRows(summary),
    batting: uniqueRows(batting),
    bowling: uniqueRows(bowling),
    fallOfWickets: uniqueRows(fallOfWickets),
  };
}

export function parsePlayerSearch(data: RawPlayerSearch): PlayerSearchResult[] {
  return (data.player ?? [])
    .filter((p) => p.id !== undefined && p.id !== null)
    .map((p) => ({
      id: String(p.id),
      name: p.name ?? "Unknown",
      team: p.teamName || p.country || "N/A",
    }));
}

export const EMPTY_STATS: StatsTable = { labelHeader: null, columns: [], rows: [] };

export function parsePlayerStats(data: RawPlayerStats): StatsTable {
  const headers = data.headers ?? [];
  const values = data.values ?? [];
  if (headers.length === 0 || values.length === 0) {
    return EMPTY_STATS;
  }

  const rows = values
    .filter((r) => Array.isArray(r.values))
    .map((r) => {
      const [label = "", ...rest] = r.values ?? [];
      return { label, values: rest };
    });

  return {
    labelHeader: headers[0],
    columns: headers.slice(1),
    rows,
  };
}
