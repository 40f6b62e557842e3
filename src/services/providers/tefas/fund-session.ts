import { z } from 'zod';
import { ProviderError } from '../../../utils/errors/provider-error';

export const TEFAS_PROVIDER_NAME = 'tefas';

/**
 * One fund's closing figures for a day, as served by TEFAS
 */
export interface FundRow {
  date: string;
  code: string;
  title: string;
  price: number;
}

/**
 * Browser-backed session against the TEFAS site. Keeps the provider free of
 * any browser-automation types.
 */
export interface FundSession {
  start(): Promise<void>;
  /** All investment-fund rows for a DD.MM.YYYY date */
  fetchRows(date: string): Promise<FundRow[]>;
  isReady(): boolean;
  close(): Promise<void>;
}

const WAF_MARKERS = ['Erişim Engellendi', 'Web Application Firewall'];

const rawFundRowSchema = z.object({
  TARIH: z.union([z.string(), z.number()]).transform(String),
  FONKODU: z.string().trim().min(1),
  FONUNVAN: z.string().default(''),
  FIYAT: z.coerce.number().nonnegative(),
});

const historyResponseSchema = z.object({
  recordsTotal: z.number().optional(),
  data: z.array(rawFundRowSchema),
});

/**
 * Parses the body of a BindHistoryInfo response into fund rows
 * @throws ProviderError WAF_BLOCKED when the firewall page came back instead of JSON,
 * INVALID_RESPONSE when the body is not the expected shape
 */
export const parseFundRows = (body: string): FundRow[] => {
  if (WAF_MARKERS.some(marker => body.includes(marker))) {
    throw new ProviderError('TEFAS request blocked by web application firewall', TEFAS_PROVIDER_NAME, 'WAF_BLOCKED', true);
  }

  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch (error) {
    throw new ProviderError('TEFAS returned a non-JSON response', TEFAS_PROVIDER_NAME, 'INVALID_RESPONSE', false, error);
  }

  const parsed = historyResponseSchema.safeParse(json);
  if (!parsed.success) {
    throw new ProviderError(
      `TEFAS response has an unexpected shape: ${parsed.error.issues[0]?.message ?? 'unknown'}`,
      TEFAS_PROVIDER_NAME,
      'INVALID_RESPONSE',
      false,
      parsed.error,
    );
  }

  return parsed.data.data.map(row => ({
    date: row.TARIH,
    code: row.FONKODU,
    title: row.FONUNVAN,
    price: row.FIYAT,
  }));
};
