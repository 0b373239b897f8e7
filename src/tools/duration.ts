const UNIT_SECONDS: Record<string, number> = {
  h: 3600,
  hr: 3600,
  hour: 3600,
  m: 60,
  min: 60,
  minute: 60,
  s: 1,
  sec: 1,
  second: 1
};

const UNIT_PATTERN = /(\d+(?:\.\d+)?)\s*(hours?|hrs?|h|minutes?|mins?|m|seconds?|secs?|s)\b/g;

/**
 * Parses "90", "1:30", "1m 30s" or "2 minutes and 5 seconds" into seconds.
 */
export function parseDurationSeconds(input: string): number {
  const normalized = input.trim().toLowerCase();
  if (!normalized) {
    throw new Error("Duration must not be empty.");
  }

  const clock = normalized.match(/^(\d{1,3}):([0-5]?\d)$/);
  if (clock) {
    return requirePositive(Number(clock[1]) * 60 + Number(clock[2]));
  }

  let total = 0;
  let matched = false;
  for (const match of normalized.matchAll(UNIT_PATTERN)) {
    matched = true;
    const unit = match[2].replace(/s$/, "");
    total += Number(match[1]) * (UNIT_SECONDS[unit] ?? UNIT_SECONDS[match[2]] ?? 0);
  }

  if (matched) {
    const leftover = normalized.replace(UNIT_PATTERN, " ").replace(/\band\b|,/g, " ").trim();
    if (/\d/.test(leftover)) {
      throw new Error(`Could not parse duration "${input}".`);
    }
    return requirePositive(Math.round(total));
  }

  const bare = Number(normalized);
  if (Number.isFinite(bare)) {
    return requirePositive(bare);
  }
  throw new Error(`Could not parse duration "${input}".`);
}

function requirePositive(seconds: number): number {
  if (seconds <= 0) {
    throw new Error("Duration must be greater than zero seconds.");
  }
  return seconds;
}
