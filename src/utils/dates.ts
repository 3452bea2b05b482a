const MS_PER_DAY = 24 * 60 * 60 * 1000;

const MONTHS: Record<string, number> = {
  jan: 1,
  january: 1,
  feb: 2,
  february: 2,
  mar: 3,
  march: 3,
  apr: 4,
  april: 4,
  may: 5,
  jun: 6,
  june: 6,
  jul: 7,
  july: 7,
  aug: 8,
  august: 8,
  sep: 9,
  sept: 9,
  september: 9,
  oct: 10,
  october: 10,
  nov: 11,
  november: 11,
  dec: 12,
  december: 12
};

// Two-digit alternatives come first so `2025-09-10` is not read as `2025-09-1`.
const DAY = '(3[01]|[12]\\d|0?[1-9])(?!\\d)';
const MONTH = '(1[0-2]|0?[1-9])(?!\\d)';

const ISO_DATE = new RegExp(`(20\\d{2})[-/]${MONTH}[-/]${DAY}`);
const CHINESE_DATE = new RegExp(`(20\\d{2})\\s*年\\s*${MONTH}\\s*月\\s*${DAY}\\s*日?`);
const DAY_MONTH_YEAR = new RegExp(`\\b${DAY}\\s+([A-Za-z]{3,9})\\.?\\s+(20\\d{2})\\b`);
const MONTH_DAY_YEAR = new RegExp(`\\b([A-Za-z]{3,9})\\.?\\s+${DAY},?\\s+(20\\d{2})\\b`);

const LEADING_DATE_PATTERNS = [
  new RegExp(`^\\s*(20\\d{2})[-/]${MONTH}[-/]${DAY}\\s*[,，]?\\s*`),
  new RegExp(`^\\s*${DAY}\\s+[A-Za-z]{3,9}\\.?\\s+(20\\d{2})\\s*[,，]?\\s*`),
  new RegExp(`^\\s*[A-Za-z]{3,9}\\.?\\s+${DAY},?\\s+(20\\d{2})\\s*[,，]?\\s*`),
  new RegExp(`^\\s*(20\\d{2})\\s*年\\s*${MONTH}\\s*月\\s*${DAY}\\s*日?\\s*[,，]?\\s*`)
];

export function formatIsoDate(year: number, month: number, day: number): string | undefined {
  const date = new Date(Date.UTC(year, month - 1, day));
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return undefined;
  }
  return date.toISOString().slice(0, 10);
}

export function isIsoDate(value: string): boolean {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value);
  if (!match) return false;
  return formatIsoDate(Number(match[1]), Number(match[2]), Number(match[3])) === value;
}

/**
 * Finds the first date in `text` and returns it as `YYYY-MM-DD`.
 *
 * Forms are tried in a fixed order: ISO numeric, `YYYY年MM月DD日`,
 * `10 September 2025` and `September 10, 2025`. Only the first occurrence of
 * each form is considered; an impossible calendar date moves on to the next
 * form.
 */
export function parseDateFromText(text: string | undefined): string | undefined {
  if (!text) {
    return undefined;
  }

  for (const pattern of [ISO_DATE, CHINESE_DATE]) {
    const match = pattern.exec(text);
    if (!match) continue;
    const parsed = formatIsoDate(Number(match[1]), Number(match[2]), Number(match[3]));
    if (parsed) return parsed;
  }

  const dayFirst = DAY_MONTH_YEAR.exec(text);
  if (dayFirst) {
    const month = MONTHS[dayFirst[2].toLowerCase()];
    const parsed = month
      ? formatIsoDate(Number(dayFirst[3]), month, Number(dayFirst[1]))
      : undefined;
    if (parsed) return parsed;
  }

  const monthFirst = MONTH_DAY_YEAR.exec(text);
  if (monthFirst) {
    const month = MONTHS[monthFirst[1].toLowerCase()];
    const parsed = month
      ? formatIsoDate(Number(monthFirst[3]), month, Number(monthFirst[2]))
      : undefined;
    if (parsed) return parsed;
  }

  return undefined;
}

export function stripLeadingDate(value: string): string {
  let out = value;
  for (const pattern of LEADING_DATE_PATTERNS) {
    out = out.replace(pattern, '');
  }
  return out.trim();
}

export function daysBetween(from: string, to: string): number {
  return Math.round((Date.parse(`${to}T00:00:00Z`) - Date.parse(`${from}T00:00:00Z`)) / MS_PER_DAY);
}

export function isWithinWindow(candidate: string, reference: string, windowDays: number): boolean {
  if (!isIsoDate(candidate) || !isIsoDate(reference)) {
    return false;
  }
  return Math.abs(daysBetween(reference, candidate)) <= windowDays;
}

/** Friday of the week containing `now`; Saturday and Sunday roll forward. */
export function weekAnchor(now: Date): string {
  const mondayBased = (now.getDay() + 6) % 7;
  const daysUntilFriday = (4 - mondayBased + 7) % 7;
  const friday = new Date(now.getFullYear(), now.getMonth(), now.getDate() + daysUntilFriday);
  return formatIsoDate(friday.getFullYear(), friday.getMonth() + 1, friday.getDate()) ?? '';
}
