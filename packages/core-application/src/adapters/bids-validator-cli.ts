import { spawn } from "node:child_process";

import type { DatasetValidator, ValidationOutcome } from "../ports/dataset-validator.js";

/**
 * The validator's JSON layout differs between releases; a run passes when it
 * lists an empty `errors` array or reports no issue of severity "error".
 * Anything on stderr fails the run.
 */
export function interpretValidatorOutput(stdout: string, stderr: string): ValidationOutcome {
  if (stderr.trim().length > 0) return { status: "invalid", details: stderr.trim() };

  const emptyErrors = /"errors"\s*:\s*\[\s*\]/.test(stdout);
  const severeIssue = /"severity"\s*:\s*"error"/.test(stdout);
  if (emptyErrors || !severeIssue) return { status: "valid" };

  return { status: "invalid", details: stdout };
}

/** Runs `bids-validator --json <dir>` as a subprocess. */
export class BidsValidatorCli implements DatasetValidator {
  constructor(private readonly command = "bids-validator") {}

  validate(datasetDir: string): Promise<ValidationOutcome> {
    return new Promise((resolve) => {
      const child = spawn(this.command, ["--json", datasetDir], { stdio: ["ignore", "pipe", "pipe"] });

      let stdout = "";
      let stderr = "";
      child.stdout.setEncoding("utf-8");
      child.stderr.setEncoding("utf-8");
      child.stdout.on("data", (chunk: string) => (stdout += chunk));
      child.stderr.on("data", (chunk: string) => (stderr += chunk));

      child.on("error", (err: NodeJS.ErrnoException) => {
        const reason =
          err.code === "ENOENT" ? `${this.command} not found. Install it first.` : err.message;
        resolve({ status: "unavailable", reason });
      });
      child.on("close", () => resolve(interpretValidatorOutput(stdout, stderr)));
    });
  }
}
