export default function Footer() {
  return (
    <footer className="border-t border-[#334155]/50 bg-court-primary">
      <div className="mx-auto flex max-w-7xl flex-col items-center justify-between gap-2 px-4 py-4 text-xs text-text-secondary sm:flex-row lg:px-6">
        <p>Tap the court to log a shot. Tap a marker to edit it.</p>
        <p className="text-text-secondary/60">
          Shot Chart &copy; {new Date().getFullYear()}
        </p>
      </div>
    </footer>
  );
}
