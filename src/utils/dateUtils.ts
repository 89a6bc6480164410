import moment from 'moment-timezone';
import { config } from '../config';

/**
 * Formats seen in extracted publish dates, tried in order with strict parsing
 */
export const DATE_FORMATS = [
  'YYYY-MM-DD',
  'YYYY-MM-DDTHH:mm:ss',
  'YYYY-MM-DD HH:mm:ss',
  'YYYY/MM/DD',
  'YYYY/M/D',
  'YYYY.MM.DD',
  'YYYYMMDD',
  'YYYY年M月D日',
  'MMMM D, YYYY',
  'MMM D, YYYY',
  'D MMMM YYYY',
  'D MMM YYYY',
  'YYYY-MM',
];

/**
 * Epoch seconds for a date string, read in `timezone`. Empty or unparsable input gives null.
 */
export function parseDateToEpoch(
  value: string | null | undefined,
  timezone: string = config.dates.timezone
): number | null {
  const text = value?.trim();
  if (!text) {
    return null;
  }

  const parsed = moment.tz(text, DATE_FORMATS, true, timezone);
  return parsed.isValid() ? parsed.unix() : null;
}
