import type { LocalTree, ReconciliationResult } from "@bids-sync/core-domain";

const RULE = "=".repeat(80);
const MAX_NEW = 20;
const MAX_EXISTING = 10;
const MAX_REMOTE_ONLY = 10;

function mb(bytes: number): string {
  return (bytes / (1024 * 1024)).toFixed(2);
}

function signedMb(bytes: number): string {
  const v = bytes / (1024 * 1024);
  return `${v >= 0 ? "+" : ""}${v.toFixed(2)}`;
}

function more(total: number, shown: number): string[] {
  return total > shown ? [`  ... and ${total - shown} more`] : [];
}

/** Lines of the local vs remote comparison printed by compare mode. */
export function formatComparisonReport(result: ReconciliationResult, local: LocalTree): string[] {
  const lines: string[] = ["", RULE, "LOCAL vs REMOTE COMPARISON", RULE];

  if (result.added.length > 0) {
    lines.push("", `📁 NEW FILES (to upload): ${result.added.length}`);
    for (const p of result.added.slice(0, MAX_NEW)) {
      lines.push(`  + ${p} (${mb(local.get(p)?.sizeBytes ?? 0)} MB)`);
    }
    lines.push(...more(result.added.length, MAX_NEW));
  } else {
    lines.push("", "✓ No new files to upload");
  }

  if (result.existing.length > 0) {
    lines.push("", `✓ ALREADY PRESENT (identical): ${result.existing.length}`);
    for (const m of result.existing.slice(0, MAX_EXISTING)) {
      lines.push(`  = ${m.path} (${mb(m.localSizeBytes)} MB)`);
    }
    lines.push(...more(result.existing.length, MAX_EXISTING));
  }

  if (result.modified.length > 0) {
    lines.push("", `⚠️  MODIFIED (size differs): ${result.modified.length}`);
    for (const m of result.modified) {
      lines.push(`  ≠ ${m.path}`);
      lines.push(
        `     Local: ${mb(m.localSizeBytes)} MB | Remote: ${mb(m.remoteSizeBytes)} MB | Diff: ${signedMb(
          m.localSizeBytes - m.remoteSizeBytes
        )} MB`
      );
    }
  }

  if (result.remoteOnly.length > 0) {
    lines.push("", `⚠️  ON REMOTE BUT NOT LOCAL: ${result.remoteOnly.length}`);
    for (const p of result.remoteOnly.slice(0, MAX_REMOTE_ONLY)) lines.push(`  - ${p}`);
    lines.push(...more(result.remoteOnly.length, MAX_REMOTE_ONLY));
  }

  const localTotal = result.added.length + result.existing.length + result.modified.length;
  lines.push(
    "",
    RULE,
    "SUMMARY:",
    `  New to upload:         ${result.added.length}`,
    `  Already present:       ${result.existing.length}`,
    `  Modified:              ${result.modified.length}`,
    `  Remote only:           ${result.remoteOnly.length}`,
    `  TOTAL local files:     ${localTotal}`,
    RULE,
    ""
  );

  return lines;
}
