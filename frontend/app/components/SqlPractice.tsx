"use client";

import { useState } from "react";
import { useMutation, useQuery } from "@tanstack/react-query";

import { listQueries, runQuery, type QueryResultDto, type QuerySummaryDto } from "@/lib/api";
import { Button, Card, DataTable, ErrorText, Muted, inputStyle } from "./ui";

export function SqlPractice() {
  const queriesQ = useQuery<QuerySummaryDto[]>({
    queryKey: ["queries"],
    queryFn: listQueries,
    staleTime: Infinity,
  });

  const [selectedId, setSelectedId] = useState("");
  const run = useMutation<QueryResultDto, Error, string>({ mutationFn: runQuery });

  const queryId = selectedId || queriesQ.data?.[0]?.id || "";

  return (
    <Card title="SQL Practice">
      {queriesQ.isLoading ? (
        <Muted>Loading...</Muted>
      ) : queriesQ.isError ? (
        <ErrorText error={queriesQ.error} />
      ) : !queriesQ.data ? (
        <Muted>No data</Muted>
      ) : (
        <div>
          <div style={{ display: "flex", gap: 8 }}>
            <select
              value={queryId}
              onChange={(e) => {
                setSelectedId(e.target.value);
                run.reset();
              }}
              style={{ ...inputStyle, flex: 1 }}
            >
              {queriesQ.data.map((q) => (
                <option key={q.id} value={q.id}>
                  {q.title}
                </option>
              ))}
            </select>
            <Button kind="primary" disabled={!queryId || run.isPending} onClick={() => run.mutate(queryId)}>
              {run.isPending ? "Running..." : "Run Query"}
            </Button>
          </div>

          <div style={{ marginTop: 12 }}>
            {run.isError ? (
              <ErrorText error={run.error} />
            ) : run.data ? (
              run.data.rowCount === 0 ? (
                <Muted>Query executed, but returned no results.</Muted>
              ) : (
                <div>
                  <div style={{ fontSize: 12, opacity: 0.7, marginBottom: 8 }}>{run.data.rowCount} rows</div>
                  <DataTable rows={run.data.rows} columns={run.data.columns} />
                </div>
              )
            ) : null}
          </div>
        </div>
      )}
    </Card>
  );
}
