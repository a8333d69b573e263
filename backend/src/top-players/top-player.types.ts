export type TopPlayer = {
  id: number;
  playerId: number;
  name: string;
  matchesPlayed: number;
  inningsBatted: number;
  runs: number;
  average: number;
  hundred: number;
};

// Row as returned by node-postgres; NUMERIC arrives as a string
export type TopPlayerRow = {
  id: number;
  player_id: number;
  name: string;
  matches_played: number | null;
  innings_batted: number | null;
  runs: number | null;
  average: string | number | null;
  hundred: number | null;
};

export type LeaderEntry = { name: string; value: number };

export type Leaders = {
  byRuns: LeaderEntry[];
  byHundreds: LeaderEntry[];
};

export type DeletedTopPlayer = {
  deleted: true;
  playerId: number;
  name: string;
};

export function toTopPlayer(row: TopPlayerRow): TopPlayer {
  return {
    id: row.id,
    playerId: row.player_id,
    name: row.name,
    matchesPlayed: row.matches_played ?? 0,
    inningsBatted: row.innings_batted ?? 0,
    runs: row.runs ?? 0,
    average: row.average === null ? 0 : Number(row.average),
    hundred: row.hundred ?? 0,
  };
}
