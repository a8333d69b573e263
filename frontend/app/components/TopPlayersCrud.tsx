"use client";

import { useEffect, useState } from "react";
import { useMutation, useQuery, useQueryClient } from "@tanstack/react-query";

import {
  createTopPlayer,
  deleteTopPlayer,
  getTopPlayerLeaders,
  listTopPlayers,
  updateTopPlayer,
  type LeadersDto,
  type NewTopPlayer,
  type TopPlayerDto,
  type TopPlayerPatch,
} from "@/lib/api";
import { buildPatch, describeError } from "@/lib/format";
import { BarList, Button, Card, DataTable, ErrorText, Muted, inputStyle } from "./ui";

type Status = { type: "idle" } | { type: "success"; message: string } | { type: "error"; message: string };

function StatusLine({ status }: { status: Status }) {
  if (status.type === "success") return <div style={{ marginTop: 10, fontSize: 14 }}>✅ {status.message}</div>;
  if (status.type === "error")
    return <div style={{ marginTop: 10, fontSize: 14, color: "crimson" }}>❌ {status.message}</div>;
  return null;
}

function NumberField({
  label,
  value,
  onChange,
  step = 1,
}: {
  label: string;
  value: string;
  onChange: (v: string) => void;
  step?: number;
}) {
  return (
    <label style={{ display: "grid", gap: 4, fontSize: 13 }}>
      {label}
      <input type="number" min={0} step={step} value={value} onChange={(e) => onChange(e.target.value)} style={inputStyle} />
    </label>
  );
}

// Invalidate every top-players read after a write
function useRefreshTopPlayers() {
  const queryClient = useQueryClient();
  return () => queryClient.invalidateQueries({ queryKey: ["top-players"] });
}

function PlayersView() {
  const [filter, setFilter] = useState("");
  const [sort, setSort] = useState<"id" | "name">("id");

  const listQ = useQuery<TopPlayerDto[]>({
    queryKey: ["top-players", "list", filter.trim(), sort],
    queryFn: () => listTopPlayers({ name: filter.trim() || undefined, sort }),
  });

  // Charts follow the same filter as the table
  const leadersQ = useQuery<LeadersDto>({
    queryKey: ["top-players", "leaders", filter.trim()],
    queryFn: () => getTopPlayerLeaders(10, filter.trim() || undefined),
  });

  return (
    <Card title="Players">
      <div style={{ display: "flex", gap: 8 }}>
        <input
          value={filter}
          onChange={(e) => setFilter(e.target.value)}
          placeholder="Filter by name"
          style={{ ...inputStyle, flex: 1 }}
        />
        <select
          value={sort}
          onChange={(e) => setSort(e.target.value === "name" ? "name" : "id")}
          style={inputStyle}
        >
          <option value="id">Sort by id</option>
          <option value="name">Sort by name</option>
        </select>
      </div>

      <div style={{ marginTop: 12 }}>
        {listQ.isLoading ? (
          <Muted>Loading...</Muted>
        ) : listQ.isError ? (
          <ErrorText error={listQ.error} />
        ) : !listQ.data || listQ.data.length === 0 ? (
          <Muted>No players found.</Muted>
        ) : (
          <DataTable rows={listQ.data} />
        )}
      </div>

      {leadersQ.data && (listQ.data?.length ?? 0) > 1 ? (
        <div style={{ marginTop: 16, display: "grid", gridTemplateColumns: "1fr 1fr", gap: 16 }}>
          <div>
            <h3 style={{ fontSize: 14, margin: "0 0 8px" }}>Top 10 by runs</h3>
            <BarList items={leadersQ.data.byRuns} />
          </div>
          <div>
            <h3 style={{ fontSize: 14, margin: "0 0 8px" }}>Top 10 by hundreds</h3>
            <BarList items={leadersQ.data.byHundreds} />
          </div>
        </div>
      ) : null}
    </Card>
  );
}

const EMPTY_FORM = {
  playerId: "",
  name: "",
  matchesPlayed: "0",
  inningsBatted: "0",
  runs: "0",
  average: "0",
  hundred: "0",
};

function AddPlayer() {
  const refresh = useRefreshTopPlayers();
  const [form, setForm] = useState(EMPTY_FORM);
  const [status, setStatus] = useState<Status>({ type: "idle" });

  const create = useMutation<TopPlayerDto, Error, NewTopPlayer>({
    mutationFn: createTopPlayer,
    onSuccess: async (p) => {
      setStatus({ type: "success", message: `Player ${p.name} added.` });
      setForm(EMPTY_FORM);
      await refresh();
    },
    onError: (err) => setStatus({ type: "error", message: describeError(err) }),
  });

  const set = (key: keyof typeof EMPTY_FORM) => (v: string) => setForm((f) => ({ ...f, [key]: v }));

  return (
    <Card title="Add Player">
      <form
        onSubmit={(e) => {
          e.preventDefault();
          create.mutate({
            playerId: Number(form.playerId),
            name: form.name,
            matchesPlayed: Number(form.matchesPlayed),
            inningsBatted: Number(form.inningsBatted),
            runs: Number(form.runs),
            average: Number(form.average),
            hundred: Number(form.hundred),
          });
        }}
      >
        <div style={{ display: "grid", gridTemplateColumns: "repeat(auto-fill, minmax(160px, 1fr))", gap: 10 }}>
          <NumberField label="Player ID" value={form.playerId} onChange={set("playerId")} />
          <label style={{ display: "grid", gap: 4, fontSize: 13 }}>
            Name
            <input value={form.name} onChange={(e) => set("name")(e.target.value)} style={inputStyle} />
          </label>
          <NumberField label="Matches played" value={form.matchesPlayed} onChange={set("matchesPlayed")} />
          <NumberField label="Innings batted" value={form.inningsBatted} onChange={set("inningsBatted")} />
          <NumberField label="Runs" value={form.runs} onChange={set("runs")} />
          <NumberField label="Average" value={form.average} onChange={set("average")} step={0.01} />
          <NumberField label="Hundreds" value={form.hundred} onChange={set("hundred")} />
        </div>
        <div style={{ marginTop: 12 }}>
          <Button type="submit" kind="primary" disabled={create.isPending}>
            {create.isPending ? "Adding..." : "Add Player"}
          </Button>
        </div>
      </form>
      <StatusLine status={status} />
    </Card>
  );
}

function PlayerPicker({
  players,
  value,
  onChange,
}: {
  players: TopPlayerDto[];
  value: number | null;
  onChange: (playerId: number) => void;
}) {
  return (
    <select value={value ?? ""} onChange={(e) => onChange(Number(e.target.value))} style={{ ...inputStyle, width: "100%" }}>
      {players.map((p) => (
        <option key={p.playerId} value={p.playerId}>
          {p.name}
        </option>
      ))}
    </select>
  );
}

function useAllPlayers() {
  return useQuery<TopPlayerDto[]>({
    queryKey: ["top-players", "list", "", "name"],
    queryFn: () => listTopPlayers({ sort: "name" }),
  });
}

function useSelection(players: TopPlayerDto[] | undefined) {
  const [playerId, setPlayerId] = useState<number | null>(null);

  useEffect(() => {
    const list = players ?? [];
    if (list.length === 0) setPlayerId(null);
    else if (!list.some((p) => p.playerId === playerId)) setPlayerId(list[0].playerId);
  }, [players, playerId]);

  const selected = players?.find((p) => p.playerId === playerId);
  return { playerId, setPlayerId, selected };
}

function UpdatePlayer() {
  const refresh = useRefreshTopPlayers();
  const playersQ = useAllPlayers();
  const { playerId, setPlayerId, selected } = useSelection(playersQ.data);

  const [runs, setRuns] = useState("");
  const [average, setAverage] = useState("");
  const [hundred, setHundred] = useState("");
  const [status, setStatus] = useState<Status>({ type: "idle" });

  // Prefill from the selected record
  useEffect(() => {
    if (!selected) return;
    setRuns(String(selected.runs));
    setAverage(String(selected.average));
    setHundred(String(selected.hundred));
  }, [selected]);

  const update = useMutation<TopPlayerDto, Error, { playerId: number; patch: TopPlayerPatch }>({
    mutationFn: ({ playerId, patch }) => updateTopPlayer(playerId, patch),
    onSuccess: async (p) => {
      setStatus({ type: "success", message: `Player ${p.name} updated.` });
      await refresh();
    },
    onError: (err) => setStatus({ type: "error", message: describeError(err) }),
  });

  return (
    <Card title="Update Player">
      {playersQ.isLoading ? (
        <Muted>Loading...</Muted>
      ) : playersQ.isError ? (
        <ErrorText error={playersQ.error} />
      ) : !playersQ.data || playersQ.data.length === 0 ? (
        <Muted>No players to update.</Muted>
      ) : (
        <div>
          <PlayerPicker players={playersQ.data} value={playerId} onChange={setPlayerId} />
          <div style={{ marginTop: 10, display: "grid", gridTemplateColumns: "repeat(3, 1fr)", gap: 10 }}>
            <NumberField label="Runs" value={runs} onChange={setRuns} />
            <NumberField label="Average" value={average} onChange={setAverage} step={0.01} />
            <NumberField label="Hundreds" value={hundred} onChange={setHundred} />
          </div>
          <div style={{ marginTop: 12 }}>
            <Button
              kind="primary"
              disabled={playerId === null || update.isPending}
              onClick={() => {
                if (playerId === null) return;
                const patch = buildPatch({ runs, average, hundred });
                if (Object.keys(patch).length === 0) {
                  setStatus({ type: "error", message: "Enter at least one value to update." });
                  return;
                }
                update.mutate({ playerId, patch });
              }}
            >
              {update.isPending ? "Updating..." : "Update Player"}
            </Button>
          </div>
          <StatusLine status={status} />
        </div>
      )}
    </Card>
  );
}

function DeletePlayer() {
  const refresh = useRefreshTopPlayers();
  const playersQ = useAllPlayers();
  const { playerId, setPlayerId, selected } = useSelection(playersQ.data);
  const [confirming, setConfirming] = useState(false);
  const [status, setStatus] = useState<Status>({ type: "idle" });

  const remove = useMutation<{ deleted: true; playerId: number; name: string }, Error, number>({
    mutationFn: deleteTopPlayer,
    onSuccess: async (res) => {
      setStatus({ type: "success", message: `Player ${res.name} deleted.` });
      setConfirming(false);
      await refresh();
    },
    onError: (err) => setStatus({ type: "error", message: describeError(err) }),
  });

  return (
    <Card title="Delete Player">
      {playersQ.isLoading ? (
        <Muted>Loading...</Muted>
      ) : playersQ.isError ? (
        <ErrorText error={playersQ.error} />
      ) : !playersQ.data || playersQ.data.length === 0 ? (
        <Muted>No players to delete.</Muted>
      ) : (
        <div>
          <PlayerPicker
            players={playersQ.data}
            value={playerId}
            onChange={(id) => {
              setPlayerId(id);
              setConfirming(false);
            }}
          />
          <div style={{ marginTop: 12, display: "flex", gap: 8, alignItems: "center" }}>
            {!confirming ? (
              <Button kind="danger" disabled={!selected} onClick={() => setConfirming(true)}>
                Delete Player
              </Button>
            ) : (
              <>
                <span style={{ fontSize: 14 }}>Delete {selected?.name}? This cannot be undone.</span>
                <Button
                  kind="danger"
                  disabled={playerId === null || remove.isPending}
                  onClick={() => {
                    if (playerId !== null) remove.mutate(playerId);
                  }}
                >
                  {remove.isPending ? "Deleting..." : "Confirm"}
                </Button>
                <Button onClick={() => setConfirming(false)}>Cancel</Button>
              </>
            )}
          </div>
          <StatusLine status={status} />
        </div>
      )}
    </Card>
  );
}

export function TopPlayersCrud() {
  const [op, setOp] = useState<"view" | "add" | "update" | "delete">("view");

  return (
    <div>
      <div style={{ display: "flex", gap: 8, marginTop: 16 }}>
        {(["view", "add", "update", "delete"] as const).map((o) => (
          <Button key={o} kind={op === o ? "primary" : "default"} onClick={() => setOp(o)}>
            {o === "view" ? "View" : o === "add" ? "Add" : o === "update" ? "Update" : "Delete"}
          </Button>
        ))}
      </div>

      {op === "view" && <PlayersView />}
      {op === "add" && <AddPlayer />}
      {op === "update" && <UpdatePlayer />}
      {op === "delete" && <DeletePlayer />}
    </div>
  );
}
