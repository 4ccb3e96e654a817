import { LOCALE_SCAN_LENGTH } from '@stmtscan/types';
import { getNameFilterData } from '../data/loader.js';

export interface LocaleInfo {
  /** Month-first dates and dollar amounts. */
  isDomestic: boolean;
}

const ZIP_CODE = /\b\d{5}\b/;
const COUNTRY_MARKER = / united states| usa\b/;
const PHONE_MARKER = /\+1|\(1\)|\b1-\d{3}-\d{3}-\d{4}\b/;
const DOMESTIC_INSTITUTIONS = /american express|amex|chase|bank of america|wells fargo|citibank|capital one/;

let stateMarker: RegExp | undefined;

function getStateMarker(): RegExp {
  if (stateMarker === undefined) {
    const states = getNameFilterData().stateAbbreviations.map((state) => state.toLowerCase());
    stateMarker = new RegExp(`, (?:${states.join('|')}) `);
  }
  return stateMarker;
}

/** Reads the document head for currency, address, phone or issuer hints. */
export function inferLocale(text: string): LocaleInfo {
  const head = text.slice(0, LOCALE_SCAN_LENGTH);
  const lower = head.toLowerCase();

  if (head.includes('USD') || head.includes('$')) return { isDomestic: true };
  if (ZIP_CODE.test(lower) && (getStateMarker().test(lower) || COUNTRY_MARKER.test(lower))) {
    return { isDomestic: true };
  }
  if (PHONE_MARKER.test(lower)) return { isDomestic: true };
  return { isDomestic: DOMESTIC_INSTITUTIONS.test(lower) };
}
