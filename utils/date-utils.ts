/**
 * UTC date helpers for query boundaries and output file names
 */

const YMD_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

const pad = (value: number, width: number = 2): string => String(value).padStart(width, '0');

export class DateUtils {
  /**
   * Parse a YYYY-MM-DD string into midnight UTC of that day.
   * Returns null for malformed strings and impossible dates such as 2024-02-30.
   */
  static parseYmd(value: string): Date | null {
    const match = YMD_PATTERN.exec(value.trim());
    if (!match) return null;

    const year = Number(match[1]);
    const month = Number(match[2]);
    const day = Number(match[3]);
    const date = new Date(Date.UTC(year, month - 1, day));

    if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
      return null;
    }
    return date;
  }

  static toUtcYmd(date: Date): string {
    return `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}`;
  }

  static startOfUtcDay(date: Date): Date {
    return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));
  }

  /** 23:59:59 UTC of the given day */
  static endOfUtcDay(date: Date): Date {
    return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate(), 23, 59, 59));
  }

  static addDays(date: Date, days: number): Date {
    return new Date(date.getTime() + days * 24 * 60 * 60 * 1000);
  }

  /** RFC 3339 at second precision, e.g. 2024-01-01T00:00:00Z */
  static toRfc3339(date: Date): string {
    return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
  }

  /** File-safe UTC timestamp, e.g. 20240101_093005 */
  static formatFileTimestamp(date: Date): string {
    return (
      `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
      `_${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
    );
  }
}
