import { errors, type Locator, type Page } from "playwright";
import { ElementNotFoundError, SessionLostError, errorMessage } from "./errors.js";
import { pollUntil, type Check } from "./timing.js";
import type { PortalElement, PortalSession } from "./portal-session.js";
import type { Logger } from "./logger.js";

const CLOSED_PATTERN =
  /target (page, context or browser )?(has been )?closed|browser has been closed|browser has disconnected|page has been closed/i;

class LocatorElement implements PortalElement {
  constructor(
    readonly locator: Locator,
    readonly description: string
  ) {}
}

export interface PlaywrightSessionOptions {
  pollIntervalMs: number;
  navigationTimeoutMs: number;
}

export class PlaywrightPortalSession implements PortalSession {
  private page: Page;
  private opts: PlaywrightSessionOptions;
  private logger: Logger;

  constructor(page: Page, opts: PlaywrightSessionOptions, logger: Logger) {
    this.page = page;
    this.opts = opts;
    this.logger = logger;
  }

  private unwrap(element: PortalElement): Locator {
    if (!(element instanceof LocatorElement)) {
      throw new Error(`Element '${element.description}' was not produced by this session`);
    }
    return element.locator;
  }

  private root(within?: PortalElement): Page | Locator {
    return within ? this.unwrap(within) : this.page;
  }

  /** Map Playwright failures onto the crawler's error taxonomy. */
  private async guard<T>(description: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (error instanceof ElementNotFoundError) throw error;
      if (!this.isAlive() || CLOSED_PATTERN.test(errorMessage(error))) {
        throw new SessionLostError(`Session lost during ${description}: ${errorMessage(error)}`);
      }
      if (error instanceof errors.TimeoutError) {
        throw new ElementNotFoundError(description);
      }
      throw error;
    }
  }

  async navigateTo(url: string): Promise<void> {
    await this.guard(`navigation to ${url}`, async () => {
      this.logger.debug(`Navigating to ${url}`);
      await this.page.goto(url, {
        waitUntil: "domcontentloaded",
        timeout: this.opts.navigationTimeoutMs,
      });
    });
  }

  async findElement(selector: string, within?: PortalElement): Promise<PortalElement> {
    return this.guard(selector, async () => {
      const locator = this.root(within).locator(selector).first();
      if ((await locator.count()) === 0) throw new ElementNotFoundError(selector);
      return new LocatorElement(locator, selector);
    });
  }

  async findAll(selector: string, within?: PortalElement): Promise<PortalElement[]> {
    return this.guard(selector, async () => {
      const all = this.root(within).locator(selector);
      const count = await all.count();
      return Array.from({ length: count }, (_, i) => new LocatorElement(all.nth(i), `${selector} #${i}`));
    });
  }

  async click(element: PortalElement): Promise<void> {
    const locator = this.unwrap(element);
    await this.guard(element.description, () => locator.click());
  }

  async readText(element: PortalElement): Promise<string> {
    const locator = this.unwrap(element);
    return this.guard(element.description, async () => (await locator.innerText()).trim());
  }

  async selectOption(element: PortalElement, label: string): Promise<void> {
    const locator = this.unwrap(element);
    await this.guard(element.description, async () => {
      await locator.selectOption({ label });
    });
  }

  async waitUntil<T>(check: Check<T>, timeoutMs: number, description: string): Promise<T> {
    return pollUntil(check, { timeoutMs, intervalMs: this.opts.pollIntervalMs, description });
  }

  async captureScreenshot(path: string): Promise<void> {
    await this.guard("screenshot", async () => {
      await this.page.screenshot({ path, fullPage: true });
    });
  }

  async pageContent(): Promise<string> {
    return this.guard("page content", () => this.page.content());
  }

  isAlive(): boolean {
    if (this.page.isClosed()) return false;
    const browser = this.page.context().browser();
    return browser === null || browser.isConnected();
  }

  async close(): Promise<void> {
    if (!this.page.isClosed()) {
      await this.page.close();
    }
  }
}
