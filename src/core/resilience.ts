import { existsSync, mkdirSync, writeFileSync } from "fs";
import { join } from "path";
import { ExtractionTimeoutError, PortalError, SessionLostError, errorMessage } from "./errors.js";
import { sleep } from "./timing.js";
import { ShopRecordBuilder } from "../services/shop-pipeline.js";
import type { PortalSession, SessionFactory, SessionRef } from "./portal-session.js";
import type { Logger } from "./logger.js";
import type { DebugArtifact, ErrorInfo, ErrorKind, PipelineStage, ShopQuery, ShopRecord } from "../types.js";

export interface ResilienceSettings {
  maxAttempts: number;
  retryPauseMs: number;
  artifactsDir: string;
}

export type ShopAttempt = (session: PortalSession, builder: ShopRecordBuilder) => Promise<void>;

export function failureKind(error: unknown, stage: PipelineStage): ErrorKind {
  if (error instanceof PortalError) return error.kind;
  if (stage === "navigation") return "NavigationFailure";
  if (stage === "classification") return "ClassificationFailure";
  return "UnknownFailure";
}

function safeFileName(id: string): string {
  return id.replace(/[^A-Za-z0-9_-]/g, "_");
}

/**
 * Runs one shop's pipeline with bounded same-session retries, captures
 * debug artifacts for every failed attempt and replaces the session when it
 * dies. Always returns a record; only a failing session factory escapes.
 */
export class ResilientShopRunner {
  private ref: SessionRef;
  private factory: SessionFactory;
  private settings: ResilienceSettings;
  private logger: Logger;

  constructor(ref: SessionRef, factory: SessionFactory, settings: ResilienceSettings, logger: Logger) {
    this.ref = ref;
    this.factory = factory;
    this.settings = settings;
    this.logger = logger;
  }

  async run(query: ShopQuery, attempt: ShopAttempt): Promise<ShopRecord> {
    const logger = this.logger.child(`shop:${query.id}`);
    const artifacts: DebugArtifact[] = [];
    let failed: { error: unknown; builder: ShopRecordBuilder } | null = null;

    for (let n = 1; n <= this.settings.maxAttempts; n++) {
      if (!this.ref.session.isAlive()) {
        await this.replaceSession(logger);
      }

      const builder = new ShopRecordBuilder(query);
      try {
        await attempt(this.ref.session, builder);
        if (n > 1) logger.info(`Succeeded on attempt ${n}`);
        return builder.build();
      } catch (error) {
        logger.warn(`Attempt ${n}/${this.settings.maxAttempts} failed during ${builder.stage}: ${errorMessage(error)}`);
        artifacts.push(await this.captureArtifacts(query, n, logger));

        // Status and details are already in hand; a dialog that never loads is not worth a full retry
        if (error instanceof ExtractionTimeoutError) {
          return builder.build(this.describe(error, builder.stage, n, artifacts));
        }

        failed = { error, builder };
        if (n === this.settings.maxAttempts) break;
        if (error instanceof SessionLostError) {
          await this.replaceSession(logger);
        }
        if (this.settings.retryPauseMs > 0) {
          await sleep(this.settings.retryPauseMs);
        }
      }
    }

    if (!failed) {
      throw new Error("maxAttempts must be at least 1");
    }
    const info = this.describe(failed.error, failed.builder.stage, this.settings.maxAttempts, artifacts);
    logger.error(`Giving up after ${this.settings.maxAttempts} attempts: ${info.kind}`);
    return failed.builder.build(info);
  }

  private describe(error: unknown, stage: PipelineStage, attempts: number, artifacts: DebugArtifact[]): ErrorInfo {
    return {
      kind: failureKind(error, stage),
      message: errorMessage(error),
      stage,
      attempts,
      artifacts: [...artifacts],
    };
  }

  private async replaceSession(logger: Logger): Promise<void> {
    logger.warn("Session unusable, requesting a new one");
    const old = this.ref.session;
    if (old.isAlive()) {
      await old.close().catch((error: unknown) => {
        logger.debug(`Closing stale session failed: ${errorMessage(error)}`);
      });
    }
    // SessionUnavailableError from the factory is run-level fatal and propagates
    this.ref.session = await this.factory();
  }

  private async captureArtifacts(query: ShopQuery, attempt: number, logger: Logger): Promise<DebugArtifact> {
    const artifact: DebugArtifact = { attempt };
    const session = this.ref.session;
    if (!session.isAlive()) {
      logger.debug("Session is gone, no artifacts to capture");
      return artifact;
    }

    const dir = this.settings.artifactsDir;
    const base = join(dir, `${safeFileName(query.id)}_attempt${attempt}`);
    try {
      if (!existsSync(dir)) mkdirSync(dir, { recursive: true });
      await session.captureScreenshot(`${base}.png`);
      artifact.screenshot = `${base}.png`;
      writeFileSync(`${base}.html`, await session.pageContent(), "utf-8");
      artifact.html = `${base}.html`;
      logger.info(`Saved debug artifacts to ${base}.*`);
    } catch (error) {
      logger.warn(`Failed to capture debug artifacts: ${errorMessage(error)}`);
    }
    return artifact;
  }
}
