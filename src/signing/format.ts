/**
 * Timestamp formatting for Signature V4
 */

/**
 * Date and time parts of an `x-amz-date` value
 */
export interface AmzTimestamp {
  /** YYYYMMDD */
  dateStamp: string;
  /** HHMMSSZ */
  timeStamp: string;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Format date as YYYYMMDD
 */
export function formatDateStamp(date: Date): string {
  return `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}`;
}

/**
 * Format time of day as HHMMSSZ
 */
export function formatTimeStamp(date: Date): string {
  return `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}Z`;
}

/**
 * Format date as YYYYMMDDTHHMMSSZ (ISO 8601 basic, seconds precision)
 */
export function formatAmzDate(date: Date): string {
  return `${formatDateStamp(date)}T${formatTimeStamp(date)}`;
}

/**
 * Splits a timestamp into the date and time parts used by the signer
 */
export function toAmzTimestamp(date: Date): AmzTimestamp {
  return {
    dateStamp: formatDateStamp(date),
    timeStamp: formatTimeStamp(date),
  };
}

/**
 * Parse AMZ date string (YYYYMMDDTHHMMSSZ) to Date object
 */
export function parseAmzDate(amzDate: string): Date {
  const year = parseInt(amzDate.substring(0, 4), 10);
  const month = parseInt(amzDate.substring(4, 6), 10) - 1;
  const day = parseInt(amzDate.substring(6, 8), 10);
  const hours = parseInt(amzDate.substring(9, 11), 10);
  const minutes = parseInt(amzDate.substring(11, 13), 10);
  const seconds = parseInt(amzDate.substring(13, 15), 10);
  return new Date(Date.UTC(year, month, day, hours, minutes, seconds));
}
