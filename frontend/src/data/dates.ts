// ---- Date helpers ----
// All date-only values are interpreted as LOCAL midnight to avoid UTC day shifts.

const DAY_MS = 24 * 60 * 60 * 1000;

const localDate = (y: number, m: number, d: number, hh = 0, mm = 0, ss = 0): Date | null => {
  const date = new Date(y, m - 1, d, hh, mm, ss, 0);
  // Reject rollovers such as 2024-02-31
  if (date.getFullYear() !== y || date.getMonth() !== m - 1 || date.getDate() !== d) return null;
  return date;
};

/**
 * Parse a raw cell into a Date. Returns null when the text is not a recognisable date.
 *
 * Accepts YYYY-MM-DD with an optional time (space or T separated), M/D/YYYY or D/M/YYYY
 * (day-first only when unambiguous), and finally whatever Date.parse understands,
 * except bare digit strings.
 */
export const parseDateText = (raw: string): Date | null => {
  const text = raw.trim();
  if (!text) return null;
  const iso = text.match(/^(\d{4})-(\d{1,2})-(\d{1,2})(?:[T ](\d{1,2}):(\d{2})(?::(\d{2})(?:\.\d+)?)?)?$/);
  if (iso) {
    return localDate(
      Number(iso[1]), Number(iso[2]), Number(iso[3]),
      Number(iso[4] ?? 0), Number(iso[5] ?? 0), Number(iso[6] ?? 0),
    );
  }
  const mdy = text.match(/^(\d{1,2})[/-](\d{1,2})[/-](\d{2}|\d{4})$/);
  if (mdy) {
    const a = Number(mdy[1]);
    const b = Number(mdy[2]);
    const year = mdy[3].length === 2 ? Number('20' + mdy[3]) : Number(mdy[3]);
    if (a > 12 && b <= 12) return localDate(year, b, a); // DMY
    return localDate(year, a, b);
  }
  // Bare numbers (spreadsheet serials, years) are never dates
  if (/^\d+$/.test(text)) return null;
  const t = Date.parse(text);
  if (Number.isNaN(t)) return null;
  return new Date(t);
};

/** Local midnight (ms) of the calendar day containing `d`. */
export const dayStartMs = (d: Date): number => new Date(d.getFullYear(), d.getMonth(), d.getDate()).getTime();

export const addDays = (ms: number, days: number): number => {
  const d = new Date(ms);
  return new Date(d.getFullYear(), d.getMonth(), d.getDate() + days).getTime();
};

export const daysBetween = (fromMs: number, toMs: number): number => Math.round((toMs - fromMs) / DAY_MS);

const pad2 = (n: number) => String(n).padStart(2, '0');

export const toYMD = (d: Date): string => `${d.getFullYear()}-${pad2(d.getMonth() + 1)}-${pad2(d.getDate())}`;

export const monthKey = (d: Date): string => `${d.getFullYear()}-${pad2(d.getMonth() + 1)}`;

/** YYYY-MM-DD, with HH:MM:SS appended when the value is not at midnight. */
export const formatDateCell = (d: Date): string => {
  const time = `${pad2(d.getHours())}:${pad2(d.getMinutes())}:${pad2(d.getSeconds())}`;
  return time === '00:00:00' ? toYMD(d) : `${toYMD(d)} ${time}`;
};
