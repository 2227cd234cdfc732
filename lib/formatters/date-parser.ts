/**
 * Best-effort publish date parsing.
 *
 * Feeds and listing pages disagree on formats (RFC 822, ISO 8601, bare dates,
 * European and US numeric dates). Anything we cannot read comes back as
 * undefined; a bad date never fails the article.
 */

const MIN_YEAR = 1970;
const MAX_YEAR = 2100;

type DateFormat = {
  pattern: RegExp;
  toParts: (match: RegExpMatchArray) => [number, number, number, number?, number?, number?];
};

// Numeric formats read as UTC. Native parsing would use the host timezone.
const NUMERIC_FORMATS: DateFormat[] = [
  {
    // 2024-01-05 08:30[:00]
    pattern: /^(\d{4})-(\d{2})-(\d{2})[ T](\d{2}):(\d{2})(?::(\d{2}))?$/,
    toParts: m => [+m[1], +m[2], +m[3], +m[4], +m[5], m[6] ? +m[6] : 0]
  },
  {
    // 2024/01/05
    pattern: /^(\d{4})\/(\d{1,2})\/(\d{1,2})$/,
    toParts: m => [+m[1], +m[2], +m[3]]
  },
  {
    // 05.01.2024 (day first)
    pattern: /^(\d{1,2})\.(\d{1,2})\.(\d{4})$/,
    toParts: m => [+m[3], +m[2], +m[1]]
  },
  {
    // 01/05/2024 (month first)
    pattern: /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/,
    toParts: m => [+m[3], +m[1], +m[2]]
  }
];

function fromParts([year, month, day, hour = 0, minute = 0, second = 0]: [
  number,
  number,
  number,
  number?,
  number?,
  number?
]): Date | null {
  if (month < 1 || month > 12 || day < 1 || day > 31) return null;
  const date = new Date(Date.UTC(year, month - 1, day, hour, minute, second));
  // Rejects rollovers such as 31/02
  if (date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) return null;
  return date;
}

function inRange(date: Date): boolean {
  const year = date.getUTCFullYear();
  return !isNaN(date.getTime()) && year >= MIN_YEAR && year <= MAX_YEAR;
}

/**
 * Parse a date string to a Date, or null when it cannot be read
 */
export function parseDate(raw: string | undefined | null): Date | null {
  if (!raw) return null;
  const value = raw.trim();
  if (!value) return null;

  for (const format of NUMERIC_FORMATS) {
    const match = value.match(format.pattern);
    if (match) {
      const date = fromParts(format.toParts(match));
      return date && inRange(date) ? date : null;
    }
  }

  // The native parser guesses a year for almost anything; insist on one
  if (!/\d{4}/.test(value)) return null;

  const date = new Date(value);
  return inRange(date) ? date : null;
}

/**
 * Parse a date string to ISO-8601, or undefined
 */
export function parsePublishedDate(raw: string | undefined | null): string | undefined {
  return parseDate(raw)?.toISOString();
}
