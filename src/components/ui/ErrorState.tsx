"use client";

import React from "react";
import Link from "next/link";
import { describeLoadError } from "@/lib/queries";

interface ErrorStateProps {
  /** Lower-case name of what failed to load, e.g. "game" */
  section: string;
  error: Error;
  onRetry?: () => void;
  /** Link shown when the record does not exist */
  back?: { href: string; label: string };
  compact?: boolean;
}

export default function ErrorState({ section, error, onRetry, back, compact = false }: ErrorStateProps) {
  const { title, detail, retryable } = describeLoadError(error, section);
  const missing = !retryable && detail === null;

  return (
    <div
      role="alert"
      className={`flex flex-col items-center gap-2 rounded-xl bg-card px-4 text-center ${
        compact ? "py-5" : "py-14"
      }`}
    >
      <p className={missing ? "text-xl font-bold text-text-primary" : "text-sm text-text-primary"}>
        {title}
      </p>
      {detail && <p className="text-xs text-text-secondary">{detail}</p>}

      <div className="mt-2 flex items-center gap-4 text-sm">
        {retryable && onRetry && (
          <button
            type="button"
            onClick={onRetry}
            className="rounded-lg bg-court-secondary px-4 py-2 font-medium text-text-primary hover:bg-court-accent-alt"
          >
            Retry
          </button>
        )}
        {missing && back && (
          <Link href={back.href} className="text-court-accent hover:text-court-accent/80">
            {back.label}
          </Link>
        )}
      </div>
    </div>
  );
}
