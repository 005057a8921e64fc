import { chromium, errors } from 'playwright-core';
import type { Browser, ElementHandle, Page } from 'playwright-core';

import { TIMEOUTS } from '../config/defaults.js';
import type { AutomationSession, SessionElement } from './session.js';

// ── Session over a CDP connection ────────────────────────────

/**
 * Attach to a browser that is already listening on a CDP endpoint and
 * adopt its first page (or open one).
 */
export async function attachSession(
  endpoint: string,
  timeoutMs: number,
): Promise<AutomationSession> {
  const browser = await chromium.connectOverCDP(endpoint, { timeout: timeoutMs });
  const context = browser.contexts()[0] ?? (await browser.newContext());
  const page = context.pages()[0] ?? (await context.newPage());
  return createPlaywrightSession(browser, page);
}

export function createPlaywrightSession(
  browser: Browser,
  page: Page,
): AutomationSession {
  return {
    async navigate(url: string): Promise<void> {
      await page.goto(url, {
        timeout: TIMEOUTS.NAVIGATION_TIMEOUT,
        waitUntil: 'domcontentloaded',
      });
    },

    currentUrl(): Promise<string> {
      return Promise.resolve(page.url());
    },

    async find(selector: string): Promise<SessionElement | null> {
      const handle = await page.$(selector);
      return handle ? wrapElement(page, handle) : null;
    },

    async findAll(selector: string): Promise<SessionElement[]> {
      const handles = await page.$$(selector);
      return handles.map((h) => wrapElement(page, h));
    },

    async waitFor(
      selector: string,
      timeoutMs: number,
    ): Promise<SessionElement | null> {
      try {
        const handle = await page.waitForSelector(selector, {
          timeout: timeoutMs,
          state: 'attached',
        });
        return handle ? wrapElement(page, handle) : null;
      } catch (err) {
        if (err instanceof errors.TimeoutError) return null;
        throw err;
      }
    },

    content(): Promise<string> {
      return page.content();
    },

    executeScript(script: string): Promise<unknown> {
      return page.evaluate(script);
    },

    async close(): Promise<void> {
      await browser.close();
    },
  };
}

// ── Element wrapper ──────────────────────────────────────────

function wrapElement(page: Page, handle: ElementHandle): SessionElement {
  return {
    async text(): Promise<string> {
      const text = await handle.textContent();
      return (text ?? '').trim();
    },

    attribute(name: string): Promise<string | null> {
      return handle.getAttribute(name);
    },

    async click(): Promise<void> {
      await handle.click({ timeout: TIMEOUTS.ELEMENT_WAIT });
    },

    async sendKeys(text: string): Promise<void> {
      await handle.focus();
      await page.keyboard.type(text);
    },

    async scrollIntoView(): Promise<void> {
      await handle.scrollIntoViewIfNeeded({ timeout: TIMEOUTS.ELEMENT_WAIT });
    },
  };
}
