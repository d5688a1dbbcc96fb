"use client";

import React from "react";
import Link from "next/link";
import { usePathname } from "next/navigation";

const NAV_LINKS = [
  { href: "/", label: "Teams" },
  { href: "/games", label: "Games" },
] as const;

export default function Header() {
  const pathname = usePathname();

  return (
    <header className="sticky top-0 z-40 border-b border-[#334155]/50 bg-court-primary/95 backdrop-blur-sm">
      <div className="mx-auto flex h-14 max-w-7xl items-center justify-between px-4 lg:px-6">
        {/* Logo */}
        <Link
          href="/"
          className="flex items-center gap-2 text-lg font-bold text-text-primary transition-colors hover:text-court-accent"
        >
          <svg viewBox="0 0 24 24" fill="none" className="h-6 w-6 text-court-accent">
            <circle cx="12" cy="12" r="10" stroke="currentColor" strokeWidth="1.5" />
            <path d="M12 2C12 2 12 22 12 22" stroke="currentColor" strokeWidth="1.5" />
            <path d="M2 12C2 12 22 12 22 12" stroke="currentColor" strokeWidth="1.5" />
            <path
              d="M4.93 4.93C8 8 12 12 12 12"
              stroke="currentColor"
              strokeWidth="1.5"
              strokeLinecap="round"
            />
            <path
              d="M19.07 19.07C16 16 12 12 12 12"
              stroke="currentColor"
              strokeWidth="1.5"
              strokeLinecap="round"
            />
          </svg>
          Shot Chart
        </Link>

        <nav className="flex gap-1">
          {NAV_LINKS.map((link) => {
            const active =
              link.href === "/" ? pathname === "/" : pathname.startsWith(link.href);
            return (
              <Link
                key={link.href}
                href={link.href}
                className={`rounded-lg px-3 py-2 text-sm font-medium transition-colors ${
                  active
                    ? "bg-court-secondary text-text-primary"
                    : "text-text-secondary hover:bg-court-secondary hover:text-text-primary"
                }`}
              >
                {link.label}
              </Link>
            );
          })}
        </nav>
      </div>
    </header>
  );
}
