"use client";

import { useState } from "react";
import { useQuery } from "@tanstack/react-query";

import {
  getPlayerStats,
  searchPlayers,
  type PlayerSearchDto,
  type StatType,
  type StatsTableDto,
} from "@/lib/api";
import { playerLabel } from "@/lib/format";
import { Button, Card, ErrorText, Muted, inputStyle } from "./ui";

function StatsGrid({ table, emptyNote }: { table: StatsTableDto; emptyNote: string }) {
  if (table.rows.length === 0) return <Muted>{emptyNote}</Muted>;

  const cell = { padding: "6px 10px", borderBottom: "1px solid #f0f0f0", textAlign: "left" as const };

  return (
    <div style={{ overflowX: "auto" }}>
      <table style={{ borderCollapse: "collapse", fontSize: 13, width: "100%" }}>
        <thead>
          <tr>
            <th style={{ ...cell, background: "#fafafa" }}>{table.labelHeader ?? ""}</th>
            {table.columns.map((c) => (
              <th key={c} style={{ ...cell, background: "#fafafa" }}>
                {c}
              </th>
            ))}
          </tr>
        </thead>
        <tbody>
          {table.rows.map((r) => (
            <tr key={r.label}>
              <td style={{ ...cell, fontWeight: 600 }}>{r.label}</td>
              {r.values.map((v, i) => (
                <td key={i} style={cell}>
                  {v}
                </td>
              ))}
            </tr>
          ))}
        </tbody>
      </table>
    </div>
  );
}

function PlayerStatsTabs({ player }: { player: PlayerSearchDto }) {
  const [tab, setTab] = useState<StatType>("batting");

  const statsQ = useQuery<StatsTableDto>({
    queryKey: ["player-stats", player.id, tab],
    queryFn: () => getPlayerStats(player.id, tab),
    staleTime: 60 * 60_000,
  });

  return (
    <div style={{ marginTop: 12 }}>
      <div style={{ display: "flex", gap: 8 }}>
        <Button kind={tab === "batting" ? "primary" : "default"} onClick={() => setTab("batting")}>
          Batting
        </Button>
        <Button kind={tab === "bowling" ? "primary" : "default"} onClick={() => setTab("bowling")}>
          Bowling
        </Button>
      </div>

      <div style={{ marginTop: 12 }}>
        {statsQ.isLoading ? (
          <Muted>Loading...</Muted>
        ) : statsQ.isError ? (
          <ErrorText error={statsQ.error} />
        ) : !statsQ.data ? (
          <Muted>No data</Muted>
        ) : (
          <StatsGrid
            table={statsQ.data}
            emptyNote={tab === "batting" ? "No batting stats available." : "No bowling stats available."}
          />
        )}
      </div>
    </div>
  );
}

export function PlayerStats() {
  const [draft, setDraft] = useState("");
  const [term, setTerm] = useState("");
  const [selectedId, setSelectedId] = useState<string>("");

  const searchQ = useQuery<PlayerSearchDto[]>({
    queryKey: ["player-search", term.toLowerCase()],
    queryFn: () => searchPlayers(term),
    enabled: term.length > 0,
    staleTime: 60 * 60_000,
  });

  const results = searchQ.data ?? [];
  const selected = results.find((p) => p.id === selectedId) ?? results[0];

  return (
    <Card title="Player Statistics">
      <form
        style={{ display: "flex", gap: 8 }}
        onSubmit={(e) => {
          e.preventDefault();
          setTerm(draft.trim());
          setSelectedId("");
        }}
      >
        <input
          value={draft}
          onChange={(e) => setDraft(e.target.value)}
          placeholder="Enter player name"
          style={{ ...inputStyle, flex: 1 }}
        />
        <Button type="submit" kind="primary" disabled={draft.trim().length === 0}>
          Search
        </Button>
      </form>

      <div style={{ marginTop: 12 }}>
        {term.length === 0 ? (
          <Muted>Type a player name to search.</Muted>
        ) : searchQ.isLoading ? (
          <Muted>Searching...</Muted>
        ) : searchQ.isError ? (
          <ErrorText error={searchQ.error} />
        ) : results.length === 0 ? (
          <Muted>No players found.</Muted>
        ) : (
          <div>
            <select
              value={selected?.id ?? ""}
              onChange={(e) => setSelectedId(e.target.value)}
              style={{ ...inputStyle, width: "100%" }}
            >
              {results.map((p) => (
                <option key={p.id} value={p.id}>
                  {playerLabel(p)}
                </option>
              ))}
            </select>

            {selected ? <PlayerStatsTabs key={selected.id} player={selected} /> : null}
          </div>
        )}
      </div>
    </Card>
  );
}
