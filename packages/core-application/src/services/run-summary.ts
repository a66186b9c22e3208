import type { ImportSummary } from "./import-service.js";

/** Terminal summary printed after an import. */
export function formatImportSummary(summary: ImportSummary): string[] {
  const lines = [
    "",
    "Import summary:",
    `  Uploaded files:        ${summary.uploaded}`,
    `  Skipped files:         ${summary.skipped}`,
    `  Failed uploads:        ${summary.failed}`,
    `  Folders created:       ${summary.foldersCreated}`,
    `  Folders reused:        ${summary.foldersReused}`,
    `  Folders failed:        ${summary.foldersFailed}`,
    `  Metadata applied:      ${summary.metadata.applied}`,
    `  Metadata failed:       ${summary.metadata.failed}`,
  ];

  if (summary.metadata.looseMatches > 0) {
    lines.push(`  Loose metadata matches: ${summary.metadata.looseMatches}`);
  }
  if (summary.reset) {
    lines.push(
      `  Deleted before upload: ${summary.reset.deletedItems} items, ${summary.reset.deletedFolders} folders`
    );
  }
  if (summary.failures.length > 0) {
    lines.push("", "⚠️  Failed nodes:");
    for (const f of summary.failures) lines.push(`  - ${f.path || "."} [${f.kind}]: ${f.error ?? "unknown error"}`);
  }

  return lines;
}
