import fs from "node:fs/promises";
import path from "node:path";

import type { LocalTree, ReconciliationResult, RemoteTree, SkipSet } from "@bids-sync/core-domain";

import type { ImportMode } from "../application/config.js";
import {
  AuthenticationError,
  ConfigError,
  ConnectivityError,
  errorMessage,
  TargetNotFoundError,
  ValidationFailedError,
} from "../application/errors.js";
import type { RunContext } from "../application/run-context.js";
import { RunReport, type NodeOutcome, type ReportCounts } from "../application/run-report.js";
import type { ConnectivityCheck } from "../ports/connectivity-check.js";
import type { DatasetValidator } from "../ports/dataset-validator.js";
import type { RemoteFolder, RemoteStore } from "../ports/remote-store.js";
import { uploadDirectory } from "./grouping-uploader.js";
import { scanLocalTree } from "./local-scanner.js";
import { propagateMetadata, type PropagationReport } from "./metadata-propagator.js";
import { buildSkipSet, reconcile } from "./reconciler.js";
import { scanRemoteTree } from "./remote-scanner.js";
import { clearFolderContents, type ResetReport } from "./remote-reset.js";

export type ImportTarget = {
  bidsDir: string;
  apiUrl: string;
  apiKey: string;
  folderId: string;
};

export type ImportOptions = ImportTarget & {
  mode: ImportMode;
  skipExisting: boolean;
};

export type ComparisonOutcome = {
  folder: RemoteFolder;
  local: LocalTree;
  remote: RemoteTree;
  result: ReconciliationResult;
};

export type ImportSummary = ReportCounts & {
  skipSetSize: number;
  metadata: PropagationReport;
  reset: ResetReport | null;
  failures: NodeOutcome[];
};

export class BidsImportService {
  constructor(
    private readonly deps: {
      ctx: RunContext;
      store: RemoteStore;
      connectivity: ConnectivityCheck;
      validator: DatasetValidator;
    }
  ) {}

  async validateDataset(datasetDir: string): Promise<void> {
    const { ctx, validator } = this.deps;

    ctx.logger.info("Validating BIDS dataset...");
    const outcome = await validator.validate(datasetDir);

    switch (outcome.status) {
      case "valid":
        ctx.logger.info("BIDS dataset is valid ✓");
        return;
      case "invalid":
        throw new ValidationFailedError("BIDS validation failed. Use --no-validate to skip.", outcome.details);
      case "unavailable":
        throw new ValidationFailedError(`BIDS validator unavailable: ${outcome.reason}`);
    }
  }

  /** Scans both sides and reconciles them; never writes to the store. */
  async compare(target: ImportTarget): Promise<ComparisonOutcome> {
    const folder = await this.preflight(target);
    const { local, remote, result } = await this.reconcileWithRemote(target);
    return { folder, local, remote, result };
  }

  async importDataset(options: ImportOptions): Promise<ImportSummary> {
    const { ctx, store } = this.deps;
    const scanRoot = path.resolve(options.bidsDir);

    await this.preflight(options);

    let reset: ResetReport | null = null;
    if (options.mode === "reset") {
      ctx.logger.info(`Deleting folder contents ${options.folderId}`);
      reset = await clearFolderContents({ ctx, store, folderId: options.folderId });
    }

    let skipSet: SkipSet = new Set();
    if (options.skipExisting) {
      ctx.logger.info("Checking existing content to skip...");
      const { result } = await this.reconcileWithRemote(options);
      skipSet = buildSkipSet(result);

      ctx.logger.info(`Files to skip (existing): ${skipSet.size}`);
      ctx.logger.info(`Files to upload (new): ${result.added.length}`);
      ctx.logger.info(`Files to upload (modified): ${result.modified.length}`);
    }

    ctx.logger.info(`Uploading BIDS dataset from ${scanRoot} to folder ${options.folderId}`);
    const report = new RunReport();
    await uploadDirectory({
      ctx,
      store,
      localDir: scanRoot,
      parent: { id: options.folderId, kind: "folder" },
      skipSet,
      scanRoot,
      report,
    });

    ctx.logger.info("Extracting BIDS metadata...");
    const metadata = await propagateMetadata({ ctx, store, folderId: options.folderId });

    ctx.logger.info("Upload complete!");
    return {
      ...report.counts(),
      skipSetSize: skipSet.size,
      metadata,
      reset,
      failures: report.failures(),
    };
  }

  /* ---------------- internals ---------------- */

  private async reconcileWithRemote(target: ImportTarget) {
    const { ctx, store } = this.deps;

    ctx.logger.info("Scanning local BIDS structure...");
    const local = await scanLocalTree({ ctx, rootDir: target.bidsDir });

    ctx.logger.info("Scanning remote structure...");
    const remote = await scanRemoteTree({ ctx, store, folderId: target.folderId });

    ctx.logger.info("Comparing structures...");
    const result = reconcile(local, remote.items);

    return { local, remote, result };
  }

  /**
   * Fatal checks, in order, before any remote mutation: local dataset,
   * connectivity, authentication, destination folder.
   */
  private async preflight(target: ImportTarget): Promise<RemoteFolder> {
    const { ctx, store, connectivity } = this.deps;

    const isDir = await fs
      .stat(target.bidsDir)
      .then((s) => s.isDirectory())
      .catch(() => false);
    if (!isDir) throw new ConfigError(`BIDS directory not found: ${target.bidsDir}`);

    const reachability = await connectivity.check(target.apiUrl);
    if (!reachability.reachable) {
      const hint = reachability.tlsTrustFailure
        ? " (certificate not trusted: pass --ca-cert <file> or --insecure)"
        : "";
      throw new ConnectivityError(`Cannot connect to Girder: ${reachability.reason}${hint}`);
    }
    ctx.logger.info("Girder connection successful.");

    try {
      await store.authenticate(target.apiKey);
    } catch (err) {
      throw new AuthenticationError(`Failed to authenticate: ${errorMessage(err)}`, err);
    }

    try {
      const folder = await store.getFolder(target.folderId);
      ctx.logger.info(`Target folder found: ${folder.name} (${target.folderId})`);
      return folder;
    } catch (err) {
      throw new TargetNotFoundError(`Target folder not found: ${errorMessage(err)}`, target.folderId, err);
    }
  }
}
