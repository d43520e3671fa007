import type { Check } from "./timing.js";

/** Opaque element reference. Only the session that produced it accepts it back. */
export interface PortalElement {
  readonly description: string;
}

/**
 * The capability the crawler needs from a browser. Calls are issued one at a
 * time; `waitUntil` is the only one that suspends for longer than a single
 * round trip.
 *
 * `findElement` throws `ElementNotFoundError` when nothing matches,
 * `waitUntil` throws `TimeoutFailureError` when the check never yields, and
 * any call may throw `SessionLostError` once the browser is gone.
 */
export interface PortalSession {
  navigateTo(url: string): Promise<void>;
  findElement(selector: string, within?: PortalElement): Promise<PortalElement>;
  findAll(selector: string, within?: PortalElement): Promise<PortalElement[]>;
  click(element: PortalElement): Promise<void>;
  readText(element: PortalElement): Promise<string>;
  selectOption(element: PortalElement, label: string): Promise<void>;
  waitUntil<T>(check: Check<T>, timeoutMs: number, description: string): Promise<T>;
  captureScreenshot(path: string): Promise<void>;
  pageContent(): Promise<string>;
  isAlive(): boolean;
  close(): Promise<void>;
}

export type SessionFactory = () => Promise<PortalSession>;

/**
 * Mutable holder for the one live session of a run. The batch runner owns it;
 * only the resilience layer swaps `session` for a fresh one.
 */
export interface SessionRef {
  session: PortalSession;
}
