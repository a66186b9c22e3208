import { Command } from "commander";

import { ConsoleLogger } from "../adapters/console-logger.js";
import { BidsValidatorCli } from "../adapters/bids-validator-cli.js";
import { GirderConnectivityCheck } from "../adapters/girder-connectivity-check.js";
import { GirderRemoteStore } from "../adapters/girder-remote-store.js";
import { createTlsAgent } from "../adapters/tls-agent.js";
import { normalizeApiUrl, parseImportConfig, type ImportConfig } from "../application/config.js";
import { errorMessage, isFatalError, ValidationFailedError } from "../application/errors.js";
import type { RunContext } from "../application/run-context.js";
import { formatComparisonReport } from "../services/comparison-report.js";
import { BidsImportService } from "../services/import-service.js";
import { formatImportSummary } from "../services/run-summary.js";

export type CliOptions = {
  bidsDir?: string;
  apiUrl?: string;
  apiKey?: string;
  folderId?: string;
  reset: boolean;
  validate: boolean;
  verbose: boolean;
  compare: boolean;
  skipExisting: boolean;
  insecure: boolean;
  caCert?: string;
};

export function buildProgram(): Command {
  return new Command()
    .name("bids-sync")
    .description("Upload a BIDS dataset to a Girder folder, keeping its structure and pairing NIfTI + JSON")
    .option("--bids-dir <path>", "BIDS directory to upload")
    .option("--api-url <url>", "Girder API URL (e.g. http://localhost:8081/api/v1)")
    .option("--api-key <key>", "Girder API key (default: $GIRDER_API_KEY)")
    .option("--folder-id <id>", "destination Girder folder id")
    .option("--reset", "delete the folder contents before uploading", false)
    .option("--no-validate", "skip BIDS validation before uploading")
    .option("--verbose", "debug logging", false)
    .option("--compare", "compare local files with the folder contents and exit without uploading", false)
    .option("--skip-existing", "do not upload files already present in the folder", false)
    .option("--insecure", "accept untrusted TLS certificates", false)
    .option("--ca-cert <path>", "PEM file with certificates to trust in addition to the bundled roots")
    .addHelpText(
      "after",
      `
Examples:
  $ bids-sync --bids-dir /path/to/bids --api-url http://localhost:8081/api/v1 \\
      --api-key YOUR_KEY --folder-id FOLDER_ID

  $ bids-sync --bids-dir /data/bids --api-url localhost:8081/api/v1 \\
      --api-key abc123 --folder-id 123456 --reset --no-validate`
    );
}

export function configFromCli(opts: CliOptions, env: NodeJS.ProcessEnv): ImportConfig {
  return parseImportConfig({
    bidsDir: opts.bidsDir,
    apiUrl: opts.apiUrl,
    apiKey: opts.apiKey ?? env["GIRDER_API_KEY"],
    folderId: opts.folderId,
    mode: opts.reset ? "reset" : "overwrite-on-same-name",
    validate: opts.validate,
    verbose: opts.verbose,
    compare: opts.compare,
    skipExisting: opts.skipExisting,
    insecure: opts.insecure,
    caCert: opts.caCert,
  });
}

/** Runs one import (or comparison) and returns the process exit code. */
export async function run(config: ImportConfig): Promise<number> {
  const logger = ConsoleLogger.forVerbosity(config.verbose);
  const ctx: RunContext = {
    logger,
    tls: { rejectUnauthorized: !config.insecure, caFile: config.caCert },
  };

  try {
    const apiUrl = normalizeApiUrl(config.apiUrl);
    const agent = await createTlsAgent(apiUrl, ctx.tls);

    const service = new BidsImportService({
      ctx,
      store: new GirderRemoteStore({ apiUrl, agent }),
      connectivity: new GirderConnectivityCheck({ agent }),
      validator: new BidsValidatorCli(),
    });

    if (config.validate) await service.validateDataset(config.bidsDir);
    else logger.info("Skipping BIDS validation (--no-validate)");

    if (config.compare) {
      logger.info("Compare mode: checking existing content...");
      const { result, local } = await service.compare({ ...config, apiUrl });
      for (const line of formatComparisonReport(result, local)) console.log(line);
      return 0;
    }

    logger.info("Starting upload to Girder...");
    const summary = await service.importDataset({ ...config, apiUrl });
    for (const line of formatImportSummary(summary)) console.log(line);
    return 0;
  } catch (err) {
    if (isFatalError(err)) {
      logger.error(err.message);
      if (err instanceof ValidationFailedError && err.details) logger.debug(err.details);
    } else {
      logger.error(`Unexpected failure: ${errorMessage(err)}`);
    }
    return 1;
  }
}
