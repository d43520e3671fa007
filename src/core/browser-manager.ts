import { chromium, type Browser, type BrowserContext, type BrowserType, type Page } from "playwright";
import { PlaywrightPortalSession } from "./playwright-session.js";
import { SessionUnavailableError, errorMessage } from "./errors.js";
import { BROWSER_POLICY, TIMEOUTS } from "../constants.js";
import type { PortalSession } from "./portal-session.js";
import type { Logger } from "./logger.js";
import type { CrawlerConfig } from "../config/schema.js";

export type BrowserLauncher = Pick<BrowserType, "launch">;

/**
 * Owns the Chromium process and hands out portal sessions. Acts as the
 * session factory for the resilience layer: a session whose browser died is
 * replaced by relaunching here.
 */
export class BrowserManager {
  private browser: Browser | null = null;
  private context: BrowserContext | null = null;
  private logger: Logger;
  private config: CrawlerConfig;
  private launcher: BrowserLauncher;

  constructor(logger: Logger, config: CrawlerConfig, launcher: BrowserLauncher = chromium) {
    this.logger = logger;
    this.config = config;
    this.launcher = launcher;
  }

  async start(): Promise<void> {
    if (this.browser?.isConnected() && this.context) return;

    // debug mode implies headed
    const headless = this.config.debug ? false : this.config.headless;
    const slowMo = this.config.debug ? this.config.slow_mo || 500 : this.config.slow_mo;
    this.logger.info("Launching Chromium", { headless, slowMo });

    let browser: Browser;
    try {
      browser = await this.launcher.launch({ headless, slowMo, args: [...BROWSER_POLICY.ARGS] });
    } catch (error) {
      throw new SessionUnavailableError(
        `Failed to launch Chromium: ${errorMessage(error)}. Make sure Playwright browsers are installed (npx playwright install chromium).`,
        { cause: error }
      );
    }

    browser.on("disconnected", () => {
      this.logger.warn("Chromium disconnected");
      this.browser = null;
      this.context = null;
    });

    this.browser = browser;
    try {
      this.context = await browser.newContext({
        viewport: { ...BROWSER_POLICY.VIEWPORT },
        userAgent: BROWSER_POLICY.USER_AGENT,
        locale: "en-IN",
      });
    } catch (error) {
      throw new SessionUnavailableError(`Failed to create a browser context: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  async ensureReady(): Promise<BrowserContext> {
    if (!this.browser?.isConnected() || !this.context) {
      if (this.browser) {
        this.logger.warn("Browser not usable, relaunching...");
        await this.close().catch((error: unknown) => {
          this.logger.debug(`Closing the old browser failed: ${errorMessage(error)}`);
        });
      }
      await this.start();
    }
    if (!this.context) {
      throw new SessionUnavailableError("Browser context could not be created");
    }
    return this.context;
  }

  /** Open a fresh page on the shared browser context. */
  async openSession(): Promise<PortalSession> {
    const context = await this.ensureReady();
    let page: Page;
    try {
      page = await context.newPage();
    } catch (error) {
      throw new SessionUnavailableError(`Failed to open a page: ${errorMessage(error)}`, { cause: error });
    }
    page.setDefaultTimeout(this.config.wait_timeout_ms);
    return new PlaywrightPortalSession(
      page,
      { pollIntervalMs: this.config.poll_interval_ms, navigationTimeoutMs: TIMEOUTS.NAVIGATION },
      this.logger.child("session")
    );
  }

  async close(): Promise<void> {
    const browser = this.browser;
    this.browser = null;
    this.context = null;
    if (browser?.isConnected()) {
      await browser.close();
    }
  }

  isRunning(): boolean {
    return this.browser !== null && this.browser.isConnected();
  }
}
