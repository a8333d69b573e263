"use client";

import { useEffect, useState } from "react";
import { useQuery } from "@tanstack/react-query";

import { ApiError, getLiveMatches, getScorecard, type LiveMatchDto, type ScorecardDto } from "@/lib/api";
import { matchLabel } from "@/lib/format";
import { Button, Card, DataTable, ErrorText, Muted, inputStyle } from "./ui";

function Scorecard({ matchId }: { matchId: number }) {
  const scoreQ = useQuery<ScorecardDto>({
    queryKey: ["scorecard", matchId],
    queryFn: () => getScorecard(matchId),
    staleTime: 30_000,
  });

  if (scoreQ.isLoading) return <Muted>Loading scorecard...</Muted>;
  if (scoreQ.isError) {
    if (scoreQ.error instanceof ApiError && scoreQ.error.status === 404) {
      return <Muted>Scorecard not available for this match yet.</Muted>;
    }
    return <ErrorText error={scoreQ.error} />;
  }
  if (!scoreQ.data) return <Muted>No data</Muted>;

  const { summary, batting, bowling, fallOfWickets } = scoreQ.data;

  return (
    <div style={{ display: "grid", gap: 14 }}>
      <div>
        <h3 style={{ fontSize: 14, margin: "0 0 6px" }}>Innings summary</h3>
        <DataTable rows={summary} />
      </div>
      <div>
        <h3 style={{ fontSize: 14, margin: "0 0 6px" }}>Batting</h3>
        <DataTable rows={batting} />
      </div>
      <div>
        <h3 style={{ fontSize: 14, margin: "0 0 6px" }}>Bowling</h3>
        <DataTable rows={bowling} />
      </div>
      <div>
        <h3 style={{ fontSize: 14, margin: "0 0 6px" }}>Fall of wickets</h3>
        {fallOfWickets.length === 0 ? <Muted>No wickets yet.</Muted> : <DataTable rows={fallOfWickets} />}
      </div>
    </div>
  );
}

function MatchDetails({ match }: { match: LiveMatchDto }) {
  const [showScorecard, setShowScorecard] = useState(false);

  return (
    <div style={{ marginTop: 12 }}>
      <div style={{ fontSize: 15, fontWeight: 650 }}>
        {match.team1} vs {match.team2}
      </div>
      <div style={{ marginTop: 6, fontSize: 13, opacity: 0.8, lineHeight: 1.6 }}>
        <div>Venue: {match.venue}</div>
        <div>State: {match.state}</div>
        <div>Status: {match.status}</div>
      </div>

      <div style={{ marginTop: 10 }}>
        <Button kind="primary" onClick={() => setShowScorecard((v) => !v)}>
          {showScorecard ? "Hide scorecard" : "Show scorecard"}
        </Button>
      </div>

      {showScorecard ? (
        <div style={{ marginTop: 12 }}>
          <Scorecard matchId={match.id} />
        </div>
      ) : null}
    </div>
  );
}

export function LiveMatches() {
  const liveQ = useQuery<LiveMatchDto[]>({
    queryKey: ["live-matches"],
    queryFn: getLiveMatches,
    refetchInterval: 60_000,
  });

  const [selectedId, setSelectedId] = useState<number | null>(null);

  // Keep a valid selection when the list refreshes
  useEffect(() => {
    const matches = liveQ.data ?? [];
    if (matches.length === 0) {
      setSelectedId(null);
    } else if (!matches.some((m) => m.id === selectedId)) {
      setSelectedId(matches[0].id);
    }
  }, [liveQ.data, selectedId]);

  const selected = liveQ.data?.find((m) => m.id === selectedId);

  return (
    <Card title="Live Match Scores" right={<span style={{ fontSize: 12, opacity: 0.6 }}>refreshes every 60s</span>}>
      {liveQ.isLoading ? (
        <Muted>Loading...</Muted>
      ) : liveQ.isError ? (
        <ErrorText error={liveQ.error} />
      ) : !liveQ.data || liveQ.data.length === 0 ? (
        <Muted>No live matches right now.</Muted>
      ) : (
        <div>
          <select
            value={selectedId ?? ""}
            onChange={(e) => setSelectedId(Number(e.target.value))}
            style={{ ...inputStyle, width: "100%" }}
          >
            {liveQ.data.map((m) => (
              <option key={m.id} value={m.id}>
                {matchLabel(m)}
              </option>
            ))}
          </select>

          {selected ? <MatchDetails key={selected.id} match={selected} /> : null}
        </div>
      )}
    </Card>
  );
}
