const MONTHS = [
  "january", "february", "march", "april", "may", "june",
  "july", "august", "september", "october", "november", "december",
];

const MONTH_ALT = "jan(?:uary)?|feb(?:ruary)?|mar(?:ch)?|apr(?:il)?|may|june?|july?|aug(?:ust)?|sep(?:t(?:ember)?)?|oct(?:ober)?|nov(?:ember)?|dec(?:ember)?";

// Anything shaped like a numeric date; each one must parse.
const NUMERIC_DATE = /(?<![\d/-])(\d{1,4})[-/](\d{1,2})[-/](\d{1,4})(?![\d/-])/g;
const MONTH_FIRST = new RegExp(`\\b(${MONTH_ALT})\\.? (\\d{1,2})(?:st|nd|rd|th)?,? (\\d{4})\\b`, "gi");
const DAY_FIRST = new RegExp(`\\b(\\d{1,2})(?:st|nd|rd|th)? (${MONTH_ALT})\\.?,? (\\d{4})\\b`, "gi");
const UNRENDERED = /\$\{\s*time_context\s*\}/;

export interface TemporalCheck {
  ok: boolean;
  /** Dates found, normalised to YYYY-MM-DD. */
  dates: string[];
  problem?: string;
}

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

function toIso(year: number, month: number, day: number): string | null {
  if (month < 1 || month > 12 || day < 1 || day > daysInMonth(year, month)) {
    return null;
  }
  return `${String(year).padStart(4, "0")}-${String(month).padStart(2, "0")}-${String(day).padStart(2, "0")}`;
}

function monthIndex(name: string): number {
  const prefix = name.toLowerCase().slice(0, 3);
  return MONTHS.findIndex((m) => m.startsWith(prefix)) + 1;
}

function parseNumeric(a: string, b: string, c: string): string | null {
  if (a.length === 4) {
    return toIso(Number(a), Number(b), Number(c));
  }
  if (c.length === 4) {
    // month/day or day/month: accept whichever reading is a real date
    return toIso(Number(c), Number(a), Number(b)) ?? toIso(Number(c), Number(b), Number(a));
  }
  return null;
}

interface Located {
  index: number;
  iso: string | null;
  raw: string;
}

function locateDates(text: string): Located[] {
  const found: Located[] = [];
  for (const m of text.matchAll(NUMERIC_DATE)) {
    found.push({ index: m.index ?? 0, iso: parseNumeric(m[1], m[2], m[3]), raw: m[0] });
  }
  for (const m of text.matchAll(MONTH_FIRST)) {
    found.push({ index: m.index ?? 0, iso: toIso(Number(m[3]), monthIndex(m[1]), Number(m[2])), raw: m[0] });
  }
  for (const m of text.matchAll(DAY_FIRST)) {
    found.push({ index: m.index ?? 0, iso: toIso(Number(m[3]), monthIndex(m[2]), Number(m[1])), raw: m[0] });
  }
  return found.sort((x, y) => x.index - y.index);
}

/** Valid dates in order of appearance, as YYYY-MM-DD. */
export function findDates(text: string): string[] {
  const dates: string[] = [];
  for (const located of locateDates(text)) {
    if (located.iso) dates.push(located.iso);
  }
  return dates;
}

/**
 * Every date-shaped token must be a real calendar date, and a
 * "from A to B" range must not run backwards.
 */
export function checkTemporal(text: string): TemporalCheck {
  if (UNRENDERED.test(text)) {
    return { ok: false, dates: [], problem: "unrendered time_context placeholder" };
  }

  const located = locateDates(text);
  const bad = located.find((d) => d.iso === null);
  if (bad) {
    return { ok: false, dates: [], problem: `"${bad.raw}" is not a valid date` };
  }

  const dates = located.map((d) => d.iso ?? "");
  const range = /\bfrom\b(.*?)\b(?:to|until|through)\b(.*)/i.exec(text);
  if (range) {
    const start = findDates(range[1])[0];
    const end = findDates(range[2])[0];
    if (start && end && end < start) {
      return { ok: false, dates, problem: `range ends (${end}) before it starts (${start})` };
    }
  }

  return { ok: true, dates };
}

export function hasMonthName(text: string): boolean {
  return new RegExp(`\\b(?:${MONTHS.join("|")})\\b`, "i").test(text);
}
