"use client";

import React, { useEffect, useRef, useState } from "react";
import { formatPct, type PeriodStatsRow, type PlayerStatsRow, type ShootingStats } from "@/lib/stats";

// ============================================================
// Column definitions with plain-English explanations
// ============================================================

interface ColumnDef {
  key: keyof ShootingStats;
  label: string;
  explanation?: string;
  isPct: boolean;
}

const COLUMNS: ColumnDef[] = [
  { key: "twoPointAttempts", label: "2Pa", isPct: false },
  { key: "twoPointMade", label: "2Pm", isPct: false },
  { key: "threePointAttempts", label: "3Pa", isPct: false },
  { key: "threePointMade", label: "3Pm", isPct: false },
  { key: "freeThrowAttempts", label: "FTa", isPct: false },
  { key: "freeThrowMade", label: "FTm", isPct: false },
  {
    key: "fieldGoalAttempts",
    label: "FGa",
    explanation: "Field goal attempts: every 2- and 3-point try. Free throws are not field goals.",
    isPct: false,
  },
  { key: "fieldGoalMade", label: "FGm", isPct: false },
  {
    key: "fieldGoalPct",
    label: "FG%",
    explanation: "Made field goals divided by attempts.",
    isPct: true,
  },
  {
    key: "effectiveFieldGoalPct",
    label: "eFG%",
    explanation:
      "Like FG%, but a made three counts one and a half times: (FGm + 0.5 × 3Pm) / FGa.",
    isPct: true,
  },
];

function formatValue(stats: ShootingStats, column: ColumnDef): string {
  const value = stats[column.key];
  return column.isPct ? formatPct(value) : String(value);
}

// ============================================================
// Info Tooltip (hover/click)
// ============================================================

function InfoTooltip({ text }: { text: string }) {
  const [open, setOpen] = useState(false);
  const ref = useRef<HTMLSpanElement>(null);

  useEffect(() => {
    if (!open) return;
    function handleClickOutside(e: MouseEvent) {
      if (ref.current && e.target instanceof Node && !ref.current.contains(e.target)) {
        setOpen(false);
      }
    }
    document.addEventListener("mousedown", handleClickOutside);
    return () => document.removeEventListener("mousedown", handleClickOutside);
  }, [open]);

  return (
    <span ref={ref} className="relative inline-block">
      <button
        type="button"
        onClick={() => setOpen((p) => !p)}
        onMouseEnter={() => setOpen(true)}
        onMouseLeave={() => setOpen(false)}
        className="ml-1 inline-flex h-3.5 w-3.5 items-center justify-center rounded-full border border-text-secondary/40 text-[9px] leading-none text-text-secondary transition-colors hover:border-text-secondary hover:text-text-primary"
        aria-label="Stat explanation"
      >
        ?
      </button>
      {open && (
        <span className="absolute bottom-full left-1/2 z-50 mb-2 w-56 -translate-x-1/2 rounded-lg border border-[#334155] bg-[#0F172A] px-3 py-2 text-left text-xs font-normal normal-case text-text-primary shadow-lg">
          {text}
        </span>
      )}
    </span>
  );
}

// ============================================================
// Table
// ============================================================

interface StatsTableRow {
  key: string;
  label: string;
  name?: string | null;
  stats: ShootingStats;
  isTotal: boolean;
}

function Table({ title, rows, showName }: { title: string; rows: StatsTableRow[]; showName: boolean }) {
  return (
    <div className="overflow-x-auto rounded-xl border border-[#334155] bg-card">
      <table className="w-full min-w-[640px] text-sm">
        <thead>
          <tr className="border-b border-[#334155] text-xs uppercase tracking-wide text-text-secondary">
            <th className="px-3 py-2 text-left">{title}</th>
            {showName && <th className="px-3 py-2 text-left">Name</th>}
            {COLUMNS.map((column) => (
              <th key={column.key} className="px-2 py-2 text-right">
                {column.label}
                {column.explanation && <InfoTooltip text={column.explanation} />}
              </th>
            ))}
          </tr>
        </thead>
        <tbody>
          {rows.map((row) => (
            <tr
              key={row.key}
              className={`border-b border-[#334155]/50 last:border-0 ${
                row.isTotal ? "bg-court-secondary/60 font-semibold" : ""
              }`}
            >
              <td className="px-3 py-2 text-text-primary">{row.label}</td>
              {showName && (
                <td className="px-3 py-2 text-text-secondary">{row.name ?? ""}</td>
              )}
              {COLUMNS.map((column) => (
                <td key={column.key} className="stat-value px-2 py-2 text-right text-text-stat">
                  {formatValue(row.stats, column)}
                </td>
              ))}
            </tr>
          ))}
        </tbody>
      </table>
    </div>
  );
}

// ============================================================
// Component
// ============================================================

interface StatsTableProps {
  summary: PeriodStatsRow[];
  players: PlayerStatsRow[];
}

export default function StatsTable({ summary, players }: StatsTableProps) {
  return (
    <div className="flex flex-col gap-4">
      <Table
        title="Period"
        showName={false}
        rows={summary.map((row) => ({ ...row, key: row.label }))}
      />
      <Table
        title="#"
        showName
        rows={players.map((row) => ({
          ...row,
          key: row.label,
          name: row.number === 0 ? "Unassigned" : row.name,
        }))}
      />
    </div>
  );
}
