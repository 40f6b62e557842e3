import { Browser, Page, chromium } from 'playwright-core';
import { ProviderError, describeError } from '../../../utils/errors/provider-error';
import { FundRow, FundSession, TEFAS_PROVIDER_NAME, parseFundRows } from './fund-session';

export interface PlaywrightFundSessionOptions {
  baseURL: string;
  headless: boolean;
  browserChannel?: string;
  executablePath?: string;
  navigationTimeout: number;
}

const USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/136.0.0.0 Safari/537.36';

const HISTORY_PAGE = '/TarihselVeriler.aspx';
const HISTORY_ENDPOINT = '/api/DB/BindHistoryInfo';

// Time given to the firewall's JavaScript challenge after the first navigation
const CHALLENGE_WAIT_MS = 2000;

const HIDE_WEBDRIVER_SCRIPT = `
  Object.defineProperty(navigator, 'webdriver', {
    get: () => undefined
  });
`;

/**
 * FundSession driving a real Chromium through playwright-core.
 *
 * TEFAS sits behind a WAF that rejects plain HTTP clients, so the session
 * loads the historical-data page once to collect cookies and then issues the
 * data requests from inside that page.
 */
export class PlaywrightFundSession implements FundSession {
  private browser: Browser | undefined;
  private page: Page | undefined;

  constructor(private readonly options: PlaywrightFundSessionOptions) {}

  async start(): Promise<void> {
    if (this.page) {
      return;
    }

    const { headless, executablePath, browserChannel, navigationTimeout, baseURL } = this.options;
    console.log('[TEFAS] Starting browser session', { headless, executablePath, browserChannel });

    const args = [
      '--no-sandbox',
      '--disable-dev-shm-usage',
      '--disable-blink-features=AutomationControlled',
      '--disable-infobars',
      '--window-size=1920,1080',
    ];
    if (headless) {
      args.push('--disable-gpu');
    }

    let browser: Browser;
    try {
      browser = await chromium.launch({
        headless,
        args,
        executablePath,
        channel: executablePath ? undefined : browserChannel,
        timeout: navigationTimeout,
      });
    } catch (error) {
      throw new ProviderError(
        `Could not launch browser: ${describeError(error)}`,
        TEFAS_PROVIDER_NAME,
        'SESSION_START_FAILED',
        false,
        error,
      );
    }

    try {
      const context = await browser.newContext({
        userAgent: USER_AGENT,
        viewport: { width: 1920, height: 1080 },
        locale: 'tr-TR',
        extraHTTPHeaders: { 'Accept-Language': 'tr-TR,tr;q=0.9,en;q=0.8' },
      });
      await context.addInitScript(HIDE_WEBDRIVER_SCRIPT);

      const page = await context.newPage();
      await page.goto(`${baseURL}${HISTORY_PAGE}`, {
        waitUntil: 'domcontentloaded',
        timeout: navigationTimeout,
      });
      await page.waitForTimeout(CHALLENGE_WAIT_MS);

      this.browser = browser;
      this.page = page;
      console.log('[TEFAS] Browser session ready');
    } catch (error) {
      await browser.close().catch((closeError: unknown) => {
        console.error('[TEFAS] Error closing browser after failed start:', closeError);
      });
      throw new ProviderError(
        `Could not open TEFAS: ${describeError(error)}`,
        TEFAS_PROVIDER_NAME,
        'SESSION_START_FAILED',
        true,
        error,
      );
    }
  }

  async fetchRows(date: string): Promise<FundRow[]> {
    const page = this.page;
    if (!page) {
      throw new ProviderError('TEFAS session is not started', TEFAS_PROVIDER_NAME, 'FETCH_FAILED', true);
    }

    let body: string;
    try {
      body = await page.evaluate(
        async ({ endpoint, day }) => {
          const params = new URLSearchParams({
            fontip: 'YAT',
            sfontur: '',
            fonkod: '',
            fongrup: '',
            bastarih: day,
            bittarih: day,
            fonturkod: '',
            fonunvantip: '',
            kurucukod: '',
          });
          const response = await fetch(endpoint, {
            method: 'POST',
            headers: {
              'Content-Type': 'application/x-www-form-urlencoded',
              'X-Requested-With': 'XMLHttpRequest',
            },
            body: params.toString(),
          });
          return response.text();
        },
        { endpoint: HISTORY_ENDPOINT, day: date },
      );
    } catch (error) {
      throw new ProviderError(
        `TEFAS request failed: ${describeError(error)}`,
        TEFAS_PROVIDER_NAME,
        'FETCH_FAILED',
        true,
        error,
      );
    }

    const rows = parseFundRows(body);
    console.log('[TEFAS] Fetched fund rows', { date, count: rows.length });
    return rows;
  }

  isReady(): boolean {
    return this.browser !== undefined && this.page !== undefined && this.browser.isConnected();
  }

  async close(): Promise<void> {
    const browser = this.browser;
    this.browser = undefined;
    this.page = undefined;

    if (browser) {
      console.log('[TEFAS] Closing browser session');
      await browser.close();
    }
  }
}
