import { JsonObject } from '../../core';

/**
 * First non-empty string (numbers are stringified) among the given keys
 */
export function readString(
  payload: JsonObject,
  ...keys: string[]
): string | null {
  for (const key of keys) {
    const value = payload[key];
    if (typeof value === 'string' && value.trim() !== '') {
      return value.trim();
    }
    if (typeof value === 'number' && Number.isFinite(value)) {
      return String(value);
    }
  }
  return null;
}

const DATE_ONLY_OR_DATE_TIME =
  /^(\d{2})\/(\d{2})\/(\d{2}|\d{4})(?:[\sT]+(\d{2}):(\d{2})(?::(\d{2}))?)?$/;
const ISO_WITHOUT_ZONE = /^\d{4}-\d{2}-\d{2}(T\d{2}:\d{2}(:\d{2}(\.\d+)?)?)?$/;
const UTC_OFFSET = /^(Z|[+-]\d{2}:\d{2})$/;

/**
 * Parse a carrier timestamp.
 *
 * Accepts ISO 8601 (with or without zone) and the Brazilian
 * DD/MM/YY[YY] [HH:mm[:ss]] format. Values without a zone are read in
 * `defaultOffset`. Returns null for anything unparseable.
 */
export function parseCarrierTimestamp(
  raw: string | null,
  defaultOffset = 'Z',
): Date | null {
  if (!raw) {
    return null;
  }
  const value = raw.trim();
  const offset = UTC_OFFSET.test(defaultOffset) ? defaultOffset : 'Z';

  const local = DATE_ONLY_OR_DATE_TIME.exec(value);
  if (local) {
    const [, dd, mm, yearPart, hh = '00', min = '00', ss = '00'] = local;
    const yyyy = yearPart.length === 2 ? `20${yearPart}` : yearPart;
    return buildChecked(yyyy, mm, dd, hh, min, ss, offset);
  }

  if (ISO_WITHOUT_ZONE.test(value)) {
    const withTime = value.includes('T') ? value : `${value}T00:00:00`;
    return validDate(new Date(`${withTime}${offset}`));
  }

  if (/^\d{4}-\d{2}-\d{2}T/.test(value)) {
    return validDate(new Date(value));
  }

  return null;
}

function buildChecked(
  yyyy: string,
  mm: string,
  dd: string,
  hh: string,
  min: string,
  ss: string,
  offset: string,
): Date | null {
  const month = Number(mm);
  const day = Number(dd);
  const hour = Number(hh);
  const minute = Number(min);
  const second = Number(ss);

  if (month < 1 || month > 12 || day < 1 || hour > 23 || minute > 59 || second > 59) {
    return null;
  }

  // Reject calendar overflow such as 31/02
  const calendar = new Date(Date.UTC(Number(yyyy), month - 1, day));
  if (calendar.getUTCMonth() !== month - 1 || calendar.getUTCDate() !== day) {
    return null;
  }

  return validDate(new Date(`${yyyy}-${mm}-${dd}T${hh}:${min}:${ss}${offset}`));
}

function validDate(date: Date): Date | null {
  return Number.isNaN(date.getTime()) ? null : date;
}
