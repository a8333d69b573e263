import {
  EMPTY_STATS,
  hasScorecard,
  parseLiveMatches,
  parsePlayerSearch,
  parsePlayerStats,
  parseScorecard,
  uniqueRows,
} from "./cricbuzz.parsers";
import { RawLiveMatches, RawScorecard } from "./cricbuzz.types";

describe("parseLiveMatches", () => {
  const payload: RawLiveMatches = {
    typeMatches: [
      {
        seriesMatches: [
          {
            seriesAdWrapper: {
              matches: [
                {
                  matchInfo: {
                    matchId: 101,
                    matchDesc: "1st ODI",
                    seriesName: "Test Series 2026",
                    team1: { teamName: "Northern Hawks" },
                    team2: { teamName: "Southern Owls" },
                    venueInfo: { ground: "Harbour Oval" },
                    state: "In Progress",
                    status: "Hawks opt to bat",
                  },
                },
                // match entry without matchInfo
                {},
              ],
            },
          },
          // ad slot
          {},
        ],
      },
      {
        seriesMatches: [
          {
            seriesAdWrapper: {
              matches: [{ matchInfo: { matchId: 202 } }],
            },
          },
        ],
      },
    ],
  };

  it("flattens nested series into match rows", () => {
    expect(parseLiveMatches(payload)).toEqual([
      {
        id: 101,
        name: "1st ODI",
        series: "Test Series 2026",
        team1: "Northern Hawks",
        team2: "Southern Owls",
        venue: "Harbour Oval",
        state: "In Progress",
        status: "Hawks opt to bat",
      },
      {
        id: 202,
        name: "Match 202",
        series: "N/A",
        team1: "TBC",
        team2: "TBC",
        venue: "Unknown",
        state: "N/A",
        status: "No status",
      },
    ]);
  });

  it("returns nothing for an empty payload", () => {
    expect(parseLiveMatches({})).toEqual([]);
  });
});

describe("parseScorecard", () => {
  const card: RawScorecard = {
    scorecard: [
      {
        inningsid: 1,
        batteamname: "Hawks",
        score: 187,
        wickets: 6,
        overs: 20,
        runrate: 9.35,
        extras: { total: 9, byes: 1, wides: 6, noballs: 2 },
        batsman: [
          { name: "A. Opener", runs: 54, balls: 38, fours: 6, sixes: 2, strkrate: "142.11", outdec: "c Keeper b Quick" },
          { name: "A. Opener", runs: 54, balls: 38, fours: 6, sixes: 2, strkrate: "142.11", outdec: "c Keeper b Quick" },
          { name: "B. Anchor" },
        ],
        bowler: [{ name: "C. Quick", overs: 4, runs: 31, wickets: 2, economy: "7.75" }],
        fow: { fow: [{ batsmanname: "A. Opener", runs: 71, overnbr: 8.3 }] },
      },
    ],
  };

  it("builds the four tables", () => {
    const parsed = parseScorecard(card, 101);

    expect(parsed.summary).toEqual([
      {
        matchId: 101,
        inningsId: 1,
        team: "Hawks",
        score: 187,
        wickets: 6,
        overs: 20,
        runRate: 9.35,
        extras: 9,
        byes: 1,
        legByes: 0,
        wides: 6,
        noBalls: 2,
      },
    ]);
    expect(parsed.bowling).toEqual([
      { inningsId: 1, team: "Hawks", name: "C. Quick", overs: 4, runs: 31, wickets: 2, economy: "7.75" },
    ]);
    expect(parsed.fallOfWickets).toEqual([
      { inningsId: 1, team: "Hawks", batsman: "A. Opener", scoreAtFall: 71, over: 8.3 },
    ]);
  });

  it("drops repeated batting rows and fills missing fields with null", () => {
    const { batting } = parseScorecard(card, 101);

    expect(batting).toHaveLength(2);
    expect(batting[1]).toEqual({
      inningsId: 1,
      team: "Hawks",
      name: "B. Anchor",
      runs: null,
      balls: null,
      fours: null,
      sixes: null,
      strikeRate: null,
      outDesc: null,
    });
  });

  it("defaults extras to zero when the block is missing", () => {
    const { summary } = parseScorecard({ scorecard: [{ inningsid: 2, batteamname: "Owls" }] }, 7);
    expect(summary[0]).toMatchObject({ matchId: 7, extras: 0, byes: 0, legByes: 0, wides: 0, noBalls: 0 });
  });
});

describe("hasScorecard", () => {
  it("requires a non-empty scorecard array", () => {
    expect(hasScorecard(null)).toBe(false);
    expect(hasScorecard({})).toBe(false);
    expect(hasScorecard({ scorecard: [] })).toBe(false);
    expect(hasScorecard({ scorecard: [{ inningsid: 1 }] })).toBe(true);
  });
});

describe("parsePlayerSearch", () => {
  it("labels each player with team, then country, then N/A", () => {
    expect(
      parsePlayerSearch({
        player: [
          { id: "11", name: "Player One", teamName: "Hawks", country: "Nowhere" },
          { id: 12, name: "Player Two", country: "Elsewhere" },
          { id: "13", name: "Player Three" },
          { name: "No Id" },
        ],
      })
    ).toEqual([
      { id: "11", name: "Player One", team: "Hawks" },
      { id: "12", name: "Player Two", team: "Elsewhere" },
      { id: "13", name: "Player Three", team: "N/A" },
    ]);
  });

  it("skips players whose id is null", () => {
    expect(
      parsePlayerSearch({
        player: [
          { id: null, name: "Ghost" },
          { id: 0, name: "Zero Id", teamName: "Hawks" },
        ],
      })
    ).toEqual([{ id: "0", name: "Zero Id", team: "Hawks" }]);
  });
});

describe("parsePlayerStats", () => {
  it("uses the first header as the row label column", () => {
    expect(
      parsePlayerStats({
        headers: ["ROWHEADER", "Test", "ODI"],
        values: [{ values: ["Matches", "10", "25"] }, {}, { values: ["Runs", "640", "1100"] }],
      })
    ).toEqual({
      labelHeader: "ROWHEADER",
      columns: ["Test", "ODI"],
      rows: [
        { label: "Matches", values: ["10", "25"] },
        { label: "Runs", values: ["640", "1100"] },
      ],
    });
  });

  it("returns an empty table when headers or rows are missing", () => {
    expect(parsePlayerStats({ headers: ["ROWHEADER"] })).toEqual(EMPTY_STATS);
    expect(parsePlayerStats({ values: [{ values: ["Matches"] }] })).toEqual(EMPTY_STATS);
  });
});

describe("uniqueRows", () => {
  it("keeps first occurrences in order", () => {
    expect(uniqueRows([{ a: 1 }, { a: 2 }, { a: 1 }])).toEqual([{ a: 1 }, { a: 2 }]);
  });
});
