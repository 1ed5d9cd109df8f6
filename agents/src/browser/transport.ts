/**
 * Page transports - how a URL becomes HTML.
 *
 * LLM Usage: None
 */

import { chromium, type Browser, type BrowserContext } from 'playwright';
import type { RequestIdentity } from '@roleradar/core';

export interface PageResponse {
  status: number;
  html: string;
  /** Final URL after redirects. */
  url: string;
}

export interface PageTransport {
  /** Resolves with whatever status the server sent; rejects only on transport failure. */
  load(url: string, identity: RequestIdentity, timeoutMs: number): Promise<PageResponse>;
  /** Drop per-session state (cookies, storage) so the next load starts clean. */
  reset(): Promise<void>;
  close(): Promise<void>;
}

export interface PlaywrightTransportOptions {
  headless?: boolean;
  /** Wait after DOMContentLoaded so client-rendered cards settle. */
  settleMs?: number;
}

/**
 * Chromium via Playwright. One browser for the transport's lifetime and one
 * context per session epoch, built from the epoch's identity.
 */
export class PlaywrightTransport implements PageTransport {
  private browser: Browser | null = null;
  private context: BrowserContext | null = null;
  private contextEpoch: string | null = null;

  constructor(private readonly options: PlaywrightTransportOptions = {}) {}

  async load(url: string, identity: RequestIdentity, timeoutMs: number): Promise<PageResponse> {
    const context = await this.contextFor(identity);
    const page = await context.newPage();
    try {
      const response = await page.goto(url, { waitUntil: 'domcontentloaded', timeout: timeoutMs });
      const settleMs = this.options.settleMs ?? 2000;
      if (settleMs > 0) await page.waitForTimeout(settleMs);
      return {
        // null means same-document navigation; the page is there
        status: response?.status() ?? 200,
        html: await page.content(),
        url: page.url(),
      };
    } finally {
      await page.close();
    }
  }

  async reset(): Promise<void> {
    if (this.context) await this.context.close();
    this.context = null;
    this.contextEpoch = null;
  }

  async close(): Promise<void> {
    await this.reset();
    if (this.browser) await this.browser.close();
    this.browser = null;
  }

  private async contextFor(identity: RequestIdentity): Promise<BrowserContext> {
    if (this.context && this.contextEpoch === identity.epochId) return this.context;
    await this.reset();

    this.browser ??= await chromium.launch({
      headless: this.options.headless ?? true,
      args: ['--disable-blink-features=AutomationControlled', '--no-sandbox'],
    });

    const { 'User-Agent': _userAgent, ...extraHTTPHeaders } = identity.headers;
    const context = await this.browser.newContext({
      userAgent: identity.userAgent,
      viewport: { ...identity.viewport },
      locale: identity.locale,
      timezoneId: identity.timezoneId,
      extraHTTPHeaders,
    });
    await context.addInitScript({
      content: "Object.defineProperty(navigator, 'webdriver', { get: () => undefined });",
    });

    this.context = context;
    this.contextEpoch = identity.epochId;
    return context;
  }
}

/** Plain HTTP GET with the identity's headers. No JavaScript rendering. */
export class HttpTransport implements PageTransport {
  async load(url: string, identity: RequestIdentity, timeoutMs: number): Promise<PageResponse> {
    const response = await fetch(url, {
      headers: { ...identity.headers },
      redirect: 'follow',
      signal: AbortSignal.timeout(timeoutMs),
    });
    return { status: response.status, html: await response.text(), url: response.url || url };
  }

  async reset(): Promise<void> {}

  async close(): Promise<void> {}
}
