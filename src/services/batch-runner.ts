import { ResilientShopRunner, type ResilienceSettings } from "../core/resilience.js";
import { RunAbortedError, SessionUnavailableError, errorMessage } from "../core/errors.js";
import { runShopPipeline, type ShopSteps } from "./shop-pipeline.js";
import { buildReport } from "./report.js";
import type { SessionFactory, SessionRef } from "../core/portal-session.js";
import type { Logger } from "../core/logger.js";
import type { CrawlReport, RunOptions, ShopQuery, ShopRecord } from "../types.js";

export interface BatchSettings extends ResilienceSettings {
  timeBudgetMs?: number;
}

export interface BatchRunnerDeps {
  factory: SessionFactory;
  steps: ShopSteps;
  options: RunOptions;
  settings: BatchSettings;
  logger: Logger;
}

function notAttempted(query: ShopQuery, reason: string): ShopRecord {
  return {
    query: { id: query.id, district: query.district, taluk: query.taluk },
    status: "unknown",
    billItems: [],
    error: { kind: "NotAttempted", message: reason, attempts: 0, artifacts: [] },
    capturedAt: new Date().toISOString(),
  };
}

/**
 * Processes the registry strictly in order on one browser session. The
 * report always has one record per input shop, in input order.
 */
export class BatchRunner {
  private deps: BatchRunnerDeps;

  constructor(deps: BatchRunnerDeps) {
    this.deps = deps;
  }

  async run(shops: ShopQuery[], signal?: AbortSignal): Promise<CrawlReport> {
    const { factory, steps, options, settings, logger } = this.deps;
    const startedAt = Date.now();
    const deadline = settings.timeBudgetMs !== undefined ? startedAt + settings.timeBudgetMs : Infinity;
    const records: ShopRecord[] = [];

    const finish = (reason: string): CrawlReport => {
      const remaining = shops.slice(records.length).map((query) => notAttempted(query, reason));
      return buildReport([...records, ...remaining], startedAt);
    };

    logger.info(`Starting run over ${shops.length} shops`, options);

    let ref: SessionRef;
    try {
      ref = { session: await factory() };
    } catch (error) {
      throw new RunAbortedError(
        `Could not open a browser session: ${errorMessage(error)}`,
        finish("Run aborted before this shop was reached: no browser session"),
        { cause: error }
      );
    }

    const runner = new ResilientShopRunner(ref, factory, settings, logger);
    let stopReason = "Run stopped before this shop was reached";

    try {
      for (const query of shops) {
        // Checked between shops only, so a shop's interaction is never cut short
        if (signal?.aborted) {
          stopReason = "Stop requested before this shop was reached";
          logger.warn(`Stop requested; ${shops.length - records.length} shops not attempted`);
          break;
        }
        if (Date.now() >= deadline) {
          stopReason = "Time budget exhausted before this shop was reached";
          logger.warn(`Time budget exhausted; ${shops.length - records.length} shops not attempted`);
          break;
        }

        const shopLogger = logger.child(`shop:${query.id}`);
        shopLogger.info(`Processing ${query.district} / ${query.taluk} (${records.length + 1}/${shops.length})`);
        const record = await runner.run(query, (session, builder) =>
          runShopPipeline(session, builder, steps, options, shopLogger)
        );
        records.push(record);
      }
    } catch (error) {
      // Whatever escapes the loop still leaves a report of what was collected
      const message =
        error instanceof SessionUnavailableError
          ? `Browser session could not be replaced: ${errorMessage(error)}`
          : `Run failed: ${errorMessage(error)}`;
      throw new RunAbortedError(message, finish("Run aborted before this shop was reached"), { cause: error });
    } finally {
      if (ref.session.isAlive()) {
        await ref.session.close().catch((error: unknown) => {
          logger.warn(`Closing the browser session failed: ${errorMessage(error)}`);
        });
      }
    }

    const report = finish(stopReason);
    logger.info("Run finished", report.summary);
    return report;
  }
}
