/**
 * Branded string type for ISO 8601 date strings (YYYY-MM-DDTHH:mm:ss.sssZ).
 */
export type IsoDate = string & { readonly __brand: 'IsoDate' }

/**
 * Branded number type for epoch timestamps in milliseconds since 1970-01-01.
 *
 * Every timestamp carried by snapshots, fills and events uses this type.
 *
 * @example
 * const timestamp: EpochDate = 1705321845123 as EpochDate
 */
export type EpochDate = number & { readonly __brand: 'EpochDate' }

/**
 * Converts a Date object or timestamp to an epoch timestamp in milliseconds.
 *
 * @param precision - Precision of a numeric input: 'ms' (default) or 's'
 *
 * @example
 * toEpochDate(new Date('2024-01-15T12:30:45.123Z')) // 1705321845123
 * toEpochDate(1705321845, 's') // 1705321845000
 */
export function toEpochDate(value: Date): EpochDate
export function toEpochDate(value: number, precision?: 'ms' | 's'): EpochDate
export function toEpochDate(value: Date | number, precision?: 'ms' | 's'): EpochDate {
  if (typeof value === 'number') {
    return (precision === 's' ? value * 1000 : value) as EpochDate
  }
  return value.getTime() as EpochDate
}

/**
 * Current wall-clock time as an EpochDate.
 */
export function epochDateNow(): EpochDate {
  return Date.now() as EpochDate
}

/**
 * Converts an epoch timestamp to an ISO 8601 date string.
 *
 * @example
 * epochToIso(1705321845123 as EpochDate) // '2024-01-15T12:30:45.123Z'
 */
export function epochToIso(epochDate: EpochDate): IsoDate {
  return new Date(epochDate).toISOString() as IsoDate
}
