"use client";

/**
 * Cricket Analytics Dashboard - single page with a sidebar menu.
 *
 * Sections:
 * - Home: overview + backend health
 * - Live Match Scores: live list (polled every 60s) + scorecard on demand
 * - Player Statistics: search, then batting/bowling career grids
 * - SQL Practice: run one of the canned analytical queries
 * - Top Players DB: CRUD over the top_players table
 */

import { useState } from "react";
import { useQuery } from "@tanstack/react-query";

import { getHealth, type HealthDto } from "@/lib/api";
import { Card, ErrorText, Muted } from "./components/ui";
import { LiveMatches } from "./components/LiveMatches";
import { PlayerStats } from "./components/PlayerStats";
import { SqlPractice } from "./components/SqlPractice";
import { TopPlayersCrud } from "./components/TopPlayersCrud";

const SECTIONS = [
  { key: "home", label: "Home" },
  { key: "live", label: "Live Match Scores" },
  { key: "players", label: "Player Statistics" },
  { key: "sql", label: "SQL Practice" },
  { key: "crud", label: "Top Players DB (CRUD)" },
] as const;

type SectionKey = (typeof SECTIONS)[number]["key"];

function Home() {
  const healthQ = useQuery<HealthDto>({
    queryKey: ["health"],
    queryFn: getHealth,
    refetchInterval: 30_000,
  });

  return (
    <>
      <Card title="Welcome">
        <div style={{ fontSize: 14, lineHeight: 1.6 }}>
          <p style={{ marginTop: 0 }}>
            Explore live cricket data from the Cricbuzz API and practise SQL against a local cricket database.
          </p>
          <ul style={{ margin: 0, paddingLeft: 18 }}>
            <li>Live Match Scores: current matches with full scorecards.</li>
            <li>Player Statistics: search any player and view career batting and bowling records.</li>
            <li>SQL Practice: run analytical queries over matches, series and players.</li>
            <li>Top Players DB: add, view, update and delete records in the top_players table.</li>
          </ul>
        </div>
      </Card>

      <Card title="Backend status">
        {healthQ.isLoading ? (
          <Muted>Loading...</Muted>
        ) : healthQ.isError ? (
          <ErrorText error={healthQ.error} />
        ) : !healthQ.data ? (
          <Muted>No data</Muted>
        ) : (
          <div style={{ fontSize: 14 }}>
            API: <strong>{healthQ.data.status}</strong> | Database: <strong>{healthQ.data.database}</strong>
          </div>
        )}
      </Card>
    </>
  );
}

export default function HomePage() {
  const [section, setSection] = useState<SectionKey>("home");

  return (
    <div style={{ display: "flex", minHeight: "100vh" }}>
      <nav
        style={{
          width: 220,
          padding: 16,
          borderRight: "1px solid #eee",
          background: "#fafafa",
        }}
      >
        <div style={{ fontWeight: 700, fontSize: 16, marginBottom: 14 }}>🏏 Cricket Dashboard</div>
        {SECTIONS.map((s) => (
          <button
            key={s.key}
            type="button"
            onClick={() => setSection(s.key)}
            style={{
              display: "block",
              width: "100%",
              textAlign: "left",
              padding: "8px 10px",
              marginBottom: 4,
              borderRadius: 8,
              border: "none",
              cursor: "pointer",
              fontSize: 14,
              background: section === s.key ? "#e8f1ff" : "transparent",
              fontWeight: section === s.key ? 650 : 400,
            }}
          >
            {s.label}
          </button>
        ))}
      </nav>

      <main style={{ flex: 1, maxWidth: 1000, padding: 24 }}>
        <h1 style={{ fontSize: 22, fontWeight: 700, margin: 0 }}>Cricket Analytics Dashboard</h1>

        {section === "home" && <Home />}
        {section === "live" && <LiveMatches />}
        {section === "players" && <PlayerStats />}
        {section === "sql" && <SqlPractice />}
        {section === "crud" && <TopPlayersCrud />}
      </main>
    </div>
  );
}
