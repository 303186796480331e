export interface TimerDuration {
  seconds: number;
  formatted: string;
}

const TIMER_KEYWORDS = ['timer', 'countdown', 'alarm', 'remind me in'];

// A unit may be followed directly by the next number, as in `2h30m`
const HOURS = '(?:hours?|hrs?|h)(?![a-z])';
const MINUTES = '(?:minutes?|mins?|m)(?![a-z])';
const SECONDS = '(?:seconds?|secs?|s)(?![a-z])';

type PatternMatcher = (match: RegExpMatchArray) => number | null;

const num = (value: string | undefined): number => Number(value ?? 0);

/**
 * Ordered patterns. The first pattern that matches wins, even when a later
 * one would describe the text more precisely.
 */
const PATTERNS: Array<[RegExp, PatternMatcher]> = [
  [/(\d{1,2}):(\d{2}):(\d{2})/, (m) => parseTimeToSeconds(m[0])],
  [/(\d{1,2}):(\d{2})/, (m) => parseTimeToSeconds(m[0])],
  [new RegExp(`(\\d+)\\s*${HOURS}\\s*(?:and\\s*)?(\\d+)\\s*${MINUTES}`), (m) => num(m[1]) * 3600 + num(m[2]) * 60],
  [new RegExp(`(\\d+)\\s*${MINUTES}\\s*(?:and\\s*)?(\\d+)\\s*${SECONDS}`), (m) => num(m[1]) * 60 + num(m[2])],
  [new RegExp(`(\\d+)\\s*${HOURS}`), (m) => num(m[1]) * 3600],
  [new RegExp(`(\\d+)\\s*${MINUTES}`), (m) => num(m[1]) * 60],
  [new RegExp(`(\\d+)\\s*${SECONDS}`), (m) => num(m[1])],
];

/**
 * Parses `hh:mm:ss`, `mm:ss` or a bare number of seconds.
 * Returns null for anything else, including minutes or seconds >= 60.
 */
export function parseTimeToSeconds(value: string): number | null {
  const trimmed = value.trim();
  const match = /^(\d{1,2}):(\d{1,2})(?::(\d{1,2}))?$/.exec(trimmed);

  if (match) {
    const [, first, second, third] = match;
    if (third !== undefined) {
      const minutes = num(second);
      const seconds = num(third);
      if (minutes >= 60 || seconds >= 60) return null;
      return num(first) * 3600 + minutes * 60 + seconds;
    }
    const seconds = num(second);
    if (seconds >= 60) return null;
    return num(first) * 60 + seconds;
  }

  if (/^\d+$/.test(trimmed)) {
    return Number(trimmed);
  }

  return null;
}

/**
 * Zero-padded `HH:MM:SS`. Hours are not capped at 99.
 */
export function formatDuration(totalSeconds: number): string {
  const whole = Math.max(0, Math.floor(totalSeconds));
  const hours = Math.floor(whole / 3600);
  const minutes = Math.floor((whole % 3600) / 60);
  const seconds = whole % 60;
  return [hours, minutes, seconds].map((part) => String(part).padStart(2, '0')).join(':');
}

export function extractTimeFromText(text: string): TimerDuration | null {
  const lower = text.toLowerCase();

  for (const [pattern, toSeconds] of PATTERNS) {
    const match = lower.match(pattern);
    if (!match) continue;

    const seconds = toSeconds(match);
    if (seconds === null || seconds <= 0) return null;
    return { seconds, formatted: formatDuration(seconds) };
  }

  return null;
}

export function mentionsTimer(text: string, extraKeywords: string[] = []): boolean {
  const lower = text.toLowerCase();
  return [...TIMER_KEYWORDS, ...extraKeywords].some((keyword) => lower.includes(keyword));
}

/**
 * A timer keyword plus a parsable duration.
 */
export function detectTimerRequest(text: string): TimerDuration | null {
  if (!mentionsTimer(text)) return null;
  return extractTimeFromText(text);
}
