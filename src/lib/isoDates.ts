/**
 * A calendar date formatted as YYYY-MM-DD, e.g., 2025-01-31
 */
export type IsoDate = string;
type TimeZone = string;

const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

const pad = (value: number, length: number): string => value.toString().padStart(length, '0');

/**
 * Checks that the given string is a real calendar date in exactly the
 * YYYY-MM-DD format. `2025-02-29` and `2025-13-40` are rejected, as are
 * partial forms like `2025-1-5` and datetimes.
 */
export const isIsoDate = (value: string): value is IsoDate => {
  const match = ISO_DATE_PATTERN.exec(value);
  if (match === null) {
    return false;
  }

  const year = parseInt(match[1], 10);
  const month1To12 = parseInt(match[2], 10);
  const day1To31 = parseInt(match[3], 10);
  if (month1To12 < 1 || month1To12 > 12 || day1To31 < 1) {
    return false;
  }

  // out of range days roll over, e.g., Feb 30th becomes Mar 2nd
  const asDate = new Date(0);
  asDate.setUTCFullYear(year, month1To12 - 1, day1To31);
  return asDate.getUTCMonth() === month1To12 - 1 && asDate.getUTCDate() === day1To31;
};

/**
 * Formats the calendar date that the given instant falls on in the given
 * timezone.
 *
 * @param instant the instant to convert
 * @param param1 the IANA timezone to interpret the instant in, e.g., 'UTC'
 *   or 'America/Los_Angeles'
 * @throws RangeError if the timezone is not recognized
 */
export const formatIsoDate = (instant: Date, { tz }: { tz: TimeZone }): IsoDate => {
  const asDateString = instant.toLocaleDateString('en-US', {
    timeZone: tz,
    year: 'numeric',
    month: 'numeric',
    day: 'numeric',
  });
  const [monthNumericStr, dayNumericStr, yearNumericStr] = asDateString.split('/');
  const month1To12 = parseInt(monthNumericStr, 10);
  const day1To31 = parseInt(dayNumericStr, 10);
  const year = parseInt(yearNumericStr, 10);
  return `${pad(year, 4)}-${pad(month1To12, 2)}-${pad(day1To31, 2)}`;
};

/**
 * True if the given timezone is understood by the runtime's Intl support
 */
export const isKnownTimeZone = (tz: string): boolean => {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: tz });
    return true;
  } catch (e) {
    if (e instanceof RangeError) {
      return false;
    }
    throw e;
  }
};

/**
 * Returns the latest of the given dates, or null if there are none. Since
 * IsoDates are zero-padded, they sort lexicographically.
 */
export const latestIsoDate = (dates: Iterable<IsoDate | null>): IsoDate | null => {
  let latest: IsoDate | null = null;
  for (const date of dates) {
    if (date !== null && (latest === null || date > latest)) {
      latest = date;
    }
  }
  return latest;
};
