// Taipei trading session: weekdays, 08:45:00–13:45:00 local time (inclusive).
// Evaluated through Intl time zone conversion; no holiday calendar.

export const MARKET_TIME_ZONE = "Asia/Taipei";

const SESSION_OPEN_MS = ((8 * 60 + 45) * 60) * 1000;
const SESSION_CLOSE_MS = ((13 * 60 + 45) * 60) * 1000;

interface LocalParts {
  readonly year: string;
  readonly month: string;
  readonly day: string;
  readonly weekday: string;
  readonly hour: number;
  readonly minute: number;
  readonly second: number;
}

function makeFormatter(timeZone: string | undefined): Intl.DateTimeFormat {
  return new Intl.DateTimeFormat("en-US", {
    timeZone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    weekday: "short",
    hour: "2-digit",
    minute: "2-digit",
    second: "2-digit",
    hourCycle: "h23",
  });
}

// Built eagerly: an unknown zone throws at startup, not on the first request.
const marketFormatter = makeFormatter(MARKET_TIME_ZONE);
const serverFormatter = makeFormatter(undefined);

function localParts(formatter: Intl.DateTimeFormat, epochMs: number): LocalParts {
  const parts: Record<string, string> = {};
  for (const p of formatter.formatToParts(new Date(epochMs))) {
    parts[p.type] = p.value;
  }
  return {
    year: parts.year ?? "",
    month: parts.month ?? "",
    day: parts.day ?? "",
    weekday: parts.weekday ?? "",
    hour: Number(parts.hour),
    minute: Number(parts.minute),
    second: Number(parts.second),
  };
}

export function isMarketOpen(epochMs: number): boolean {
  const local = localParts(marketFormatter, epochMs);
  if (local.weekday === "Sat" || local.weekday === "Sun") return false;

  const millis = ((epochMs % 1000) + 1000) % 1000;
  const timeOfDay =
    ((local.hour * 60 + local.minute) * 60 + local.second) * 1000 + millis;
  return timeOfDay >= SESSION_OPEN_MS && timeOfDay <= SESSION_CLOSE_MS;
}

function render(local: LocalParts): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return `${local.year}-${local.month}-${local.day} ${pad(local.hour)}:${pad(local.minute)}:${pad(local.second)}`;
}

/** `YYYY-MM-DD HH:mm:ss` in Taipei time. */
export function formatMarketTime(epochMs: number): string {
  return render(localParts(marketFormatter, epochMs));
}

/** `YYYY-MM-DD HH:mm:ss` in the process time zone. */
export function formatServerTime(epochMs: number): string {
  return render(localParts(serverFormatter, epochMs));
}
