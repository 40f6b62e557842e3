import fundNames from '../../../data/fund-names.json';

const FUND_NAMES: Readonly<Record<string, string>> = fundNames;

/**
 * Display name for a fund code, used when TEFAS has no row for the fund
 */
export const getFundDisplayName = (code: string): string => FUND_NAMES[code] ?? `${code} Fund`;
