"use client";

// Reusable UI components (inline styles, no CSS framework)

import type { CSSProperties, ReactNode } from "react";
import { barWidth, columnsOf, describeError, formatCell } from "@/lib/format";

export function Card({
  title,
  children,
  right,
}: {
  title: string;
  children: ReactNode;
  right?: ReactNode;
}) {
  return (
    <section
      style={{
        marginTop: 16,
        padding: 16,
        border: "1px solid #eee",
        borderRadius: 12,
      }}
    >
      <div style={{ display: "flex", alignItems: "center", gap: 12 }}>
        <h2 style={{ fontSize: 16, fontWeight: 650, margin: 0 }}>{title}</h2>
        <div style={{ marginLeft: "auto" }}>{right}</div>
      </div>
      <div style={{ marginTop: 10 }}>{children}</div>
    </section>
  );
}

export function Button({
  children,
  onClick,
  disabled,
  kind = "default",
  title,
  type = "button",
}: {
  children: ReactNode;
  onClick?: () => void;
  disabled?: boolean;
  kind?: "default" | "primary" | "danger";
  title?: string;
  type?: "button" | "submit";
}) {
  const base: CSSProperties = {
    padding: "9px 12px",
    borderRadius: 10,
    border: "1px solid #ddd",
    background: "#fff",
    cursor: disabled ? "not-allowed" : "pointer",
    opacity: disabled ? 0.6 : 1,
    fontSize: 14,
  };

  if (kind === "primary") {
    base.border = "1px solid #cfe3ff";
    base.background = "#f4f9ff";
  }
  if (kind === "danger") {
    base.border = "1px solid #ffd3d3";
    base.background = "#fff6f6";
  }

  return (
    <button
      type={type}
      style={base}
      onClick={disabled ? undefined : onClick}
      disabled={disabled}
      title={title}
    >
      {children}
    </button>
  );
}

export const inputStyle: CSSProperties = {
  padding: "10px 12px",
  borderRadius: 10,
  border: "1px solid #ddd",
  fontSize: 14,
};

export function Muted({ children }: { children: ReactNode }) {
  return <div style={{ fontSize: 14, opacity: 0.75 }}>{children}</div>;
}

export function ErrorText({ error }: { error: unknown }) {
  return <div style={{ fontSize: 14, color: "crimson" }}>Error: {describeError(error)}</div>;
}

export function DataTable({
  rows,
  columns,
}: {
  rows: Array<Record<string, unknown>>;
  columns?: string[];
}) {
  const cols = columns && columns.length > 0 ? columns : columnsOf(rows);
  const cell: CSSProperties = {
    padding: "6px 10px",
    borderBottom: "1px solid #f0f0f0",
    textAlign: "left",
    whiteSpace: "nowrap",
  };

  return (
    <div style={{ overflowX: "auto" }}>
      <table style={{ borderCollapse: "collapse", fontSize: 13, width: "100%" }}>
        <thead>
          <tr>
            {cols.map((c) => (
              <th key={c} style={{ ...cell, fontWeight: 650, background: "#fafafa" }}>
                {c}
              </th>
            ))}
          </tr>
        </thead>
        <tbody>
          {rows.map((r, i) => (
            <tr key={i}>
              {cols.map((c) => (
                <td key={c} style={cell}>
                  {formatCell(r[c])}
                </td>
              ))}
            </tr>
          ))}
        </tbody>
      </table>
    </div>
  );
}

export function BarList({ items }: { items: Array<{ name: string; value: number }> }) {
  const max = items.reduce((m, it) => Math.max(m, it.value), 0);

  return (
    <div style={{ display: "grid", gap: 6 }}>
      {items.map((it) => (
        <div key={it.name} style={{ fontSize: 13 }}>
          <div style={{ display: "flex", justifyContent: "space-between" }}>
            <span>{it.name}</span>
            <strong>{it.value}</strong>
          </div>
          <div style={{ height: 8, background: "#f3f3f3", borderRadius: 6 }}>
            <div
              style={{
                width: `${barWidth(it.value, max)}%`,
                height: 8,
                background: "#9cc7ff",
                borderRadius: 6,
              }}
            />
          </div>
        </div>
      ))}
    </div>
  );
}
