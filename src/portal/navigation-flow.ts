import { SELECTORS } from "./selectors.js";
import { matchOption, readOptionLabels } from "./helpers.js";
import { TimeoutFailureError } from "../core/errors.js";
import type { PortalElement, PortalSession } from "../core/portal-session.js";
import type { Logger } from "../core/logger.js";
import type { ShopQuery } from "../types.js";

export interface NavigationSettings {
  portalUrl: string;
  /** Selected before the district when the portal shows a state dropdown. */
  state?: string;
  waitTimeoutMs: number;
}

/**
 * Wait until `selector` is a dropdown whose options include `target`, then
 * select it. Picking from a list that has not been repopulated yet is what
 * makes the cascade flaky, so the wait is on the option itself.
 */
async function chooseOption(
  session: PortalSession,
  selector: string,
  target: string,
  what: string,
  timeoutMs: number
): Promise<string> {
  const { select, label } = await session.waitUntil<{ select: PortalElement; label: string }>(
    async () => {
      const select = await session.findElement(selector);
      const label = matchOption(await readOptionLabels(session, select), target);
      return label === null ? null : { select, label };
    },
    timeoutMs,
    `${what} option '${target}'`
  );
  await session.selectOption(select, label);
  return label;
}

/**
 * Switch the portal to English when it renders in another language. Labels,
 * status tokens and table headers are all matched in English. A switch that
 * never takes effect is logged and the page is used as rendered.
 */
export async function ensureEnglish(session: PortalSession, timeoutMs: number, logger: Logger): Promise<void> {
  if ((await session.findAll(SELECTORS.LANGUAGE_ENGLISH_ACTIVE)).length > 0) return;

  const options = await session.findAll(SELECTORS.LANGUAGE_ENGLISH_OPTION);
  if (options.length === 0) {
    logger.warn("Language selector not found; continuing with the page as rendered");
    return;
  }
  await session.click(options[0]);
  try {
    await session.waitUntil(
      () => session.findElement(SELECTORS.LANGUAGE_ENGLISH_ACTIVE),
      timeoutMs,
      "English page layout"
    );
    logger.debug("Switched portal language to English");
  } catch (error) {
    if (!(error instanceof TimeoutFailureError)) throw error;
    logger.warn(`Failed to switch to English, continuing anyway: ${error.message}`);
  }
}

/**
 * Drive the search form from a fresh page load to the shop's detail page.
 * Performs no retries: failures propagate to the resilience layer as is.
 */
export async function navigateToShop(
  session: PortalSession,
  query: ShopQuery,
  settings: NavigationSettings,
  logger: Logger
): Promise<void> {
  const timeout = settings.waitTimeoutMs;
  await session.navigateTo(settings.portalUrl);
  await ensureEnglish(session, timeout, logger);

  if (settings.state) {
    const state = await chooseOption(session, SELECTORS.STATE_SELECT, settings.state, "state", timeout);
    logger.debug(`Selected state: ${state}`);
  }

  const district = await chooseOption(session, SELECTORS.DISTRICT_SELECT, query.district, "district", timeout);
  logger.debug(`Selected district: ${district}`);

  const taluk = await chooseOption(session, SELECTORS.TALUK_SELECT, query.taluk, "taluk", timeout);
  logger.debug(`Selected taluk: ${taluk}`);

  const shop = await chooseOption(session, SELECTORS.SHOP_SELECT, query.id, "shop", timeout);
  logger.debug(`Selected shop: ${shop}`);

  const search = await session.findElement(SELECTORS.SEARCH_BUTTON);
  await session.click(search);

  await session.waitUntil(() => session.findElement(SELECTORS.DETAIL_ROOT), timeout, "shop detail page");
  logger.debug("Detail page loaded");
}
