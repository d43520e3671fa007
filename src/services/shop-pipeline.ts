import { navigateToShop } from "../portal/navigation-flow.js";
import { classifyShop, type ShopClassification } from "../portal/status-flow.js";
import { extractLastTransaction, type TransactionExtraction } from "../portal/transaction-flow.js";
import type { PortalSession } from "../core/portal-session.js";
import type { Logger } from "../core/logger.js";
import type { CrawlerConfig } from "../config/schema.js";
import type {
  BillItem,
  ErrorInfo,
  PipelineStage,
  RunOptions,
  ShopQuery,
  ShopRecord,
  ShopStatus,
  StatusVocabulary,
  TransactionSummary,
} from "../types.js";

/** The three step functions of one shop. Swapped for fakes in tests. */
export interface ShopSteps {
  navigate(session: PortalSession, query: ShopQuery, logger: Logger): Promise<void>;
  classify(session: PortalSession, logger: Logger): Promise<ShopClassification>;
  extract(session: PortalSession, logger: Logger): Promise<TransactionExtraction | null>;
}

/**
 * Progressively filled result for one attempt. Whatever was captured before
 * a failure still ends up in the record.
 */
export class ShopRecordBuilder {
  readonly query: ShopQuery;
  stage: PipelineStage = "navigation";
  status: ShopStatus = "unknown";
  shopDetails: Record<string, string> | undefined;
  lastTransaction: TransactionSummary | undefined;
  billItems: BillItem[] = [];

  constructor(query: ShopQuery) {
    this.query = query;
  }

  build(error?: ErrorInfo, capturedAt: Date = new Date()): ShopRecord {
    const record: ShopRecord = {
      query: { id: this.query.id, district: this.query.district, taluk: this.query.taluk },
      status: this.status,
      billItems: this.billItems.map((item) => ({ ...item })),
      capturedAt: capturedAt.toISOString(),
    };
    if (this.shopDetails) record.shopDetails = { ...this.shopDetails };
    if (this.lastTransaction) record.lastTransaction = { ...this.lastTransaction };
    if (error) record.error = error;
    return record;
  }
}

export async function runShopPipeline(
  session: PortalSession,
  builder: ShopRecordBuilder,
  steps: ShopSteps,
  options: RunOptions,
  logger: Logger
): Promise<void> {
  builder.stage = "navigation";
  await steps.navigate(session, builder.query, logger);

  builder.stage = "classification";
  const { status, shopDetails } = await steps.classify(session, logger);
  builder.status = status;
  builder.shopDetails = shopDetails;
  logger.info(`Status: ${status}`);

  if (status !== "online") return;
  if (!options.includeDetails) {
    logger.debug("Transaction extraction disabled for this run");
    return;
  }

  builder.stage = "extraction";
  const extraction = await steps.extract(session, logger);
  if (extraction) {
    builder.lastTransaction = extraction.lastTransaction;
    builder.billItems = extraction.billItems;
  }
}

export function createPortalSteps(config: CrawlerConfig, vocabulary: StatusVocabulary): ShopSteps {
  return {
    navigate: (session, query, logger) =>
      navigateToShop(
        session,
        query,
        { portalUrl: config.portal_url, state: config.state, waitTimeoutMs: config.wait_timeout_ms },
        logger
      ),
    classify: (session) => classifyShop(session, vocabulary),
    extract: (session, logger) =>
      extractLastTransaction(session, { dialogTimeoutMs: config.dialog_timeout_ms }, logger),
  };
}
