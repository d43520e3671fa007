import { SELECTORS } from "./selectors.js";
import { normalizeLabel } from "./helpers.js";
import type { PortalSession } from "../core/portal-session.js";
import type { ShopStatus, StatusVocabulary } from "../types.js";

export interface ShopClassification {
  status: ShopStatus;
  shopDetails: Record<string, string>;
}

/** Exact, case-insensitive match against the vocabulary; anything else is unknown. */
export function classifyStatusText(text: string, vocabulary: StatusVocabulary): ShopStatus {
  const normalized = normalizeLabel(text);
  if (!normalized) return "unknown";
  if (vocabulary.online.some((token) => normalizeLabel(token) === normalized)) return "online";
  if (vocabulary.offline.some((token) => normalizeLabel(token) === normalized)) return "offline";
  return "unknown";
}

/** Label/value pairs of the detail container; the value is the label's next sibling. */
export async function readShopDetails(session: PortalSession): Promise<Record<string, string>> {
  const details: Record<string, string> = {};
  const labels = await session.findAll(SELECTORS.DETAIL_LABEL);
  for (const label of labels) {
    const key = (await session.readText(label)).replace(/:\s*$/, "").trim();
    if (!key) continue;
    const siblings = await session.findAll(SELECTORS.LABEL_VALUE, label);
    if (siblings.length === 0) continue;
    const value = await session.readText(siblings[0]);
    if (value) details[key] = value;
  }
  return details;
}

/**
 * Read the status indicator and the shop's detail fields. A missing or
 * unrecognised indicator yields "unknown"; it never fails the shop.
 */
export async function classifyShop(
  session: PortalSession,
  vocabulary: StatusVocabulary
): Promise<ShopClassification> {
  const shopDetails = await readShopDetails(session);

  const indicators = await session.findAll(SELECTORS.STATUS_INDICATOR);
  for (const indicator of indicators) {
    const status = classifyStatusText(await session.readText(indicator), vocabulary);
    if (status !== "unknown") return { status, shopDetails };
  }

  // Some layouts only show status as a labelled detail field
  for (const [key, value] of Object.entries(shopDetails)) {
    if (!normalizeLabel(key).includes("STATUS")) continue;
    const status = classifyStatusText(value, vocabulary);
    if (status !== "unknown") return { status, shopDetails };
  }

  return { status: "unknown", shopDetails };
}
