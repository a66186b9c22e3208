import type { RelativePath } from "@bids-sync/core-domain";

export type NodeKind = "pair" | "file" | "folder";

export type NodeStatus = "uploaded" | "skipped" | "created" | "reused" | "failed";

export type NodeOutcome = {
  /** root-relative path of the file, of the pair's payload, or of the folder */
  path: RelativePath;
  kind: NodeKind;
  status: NodeStatus;
  reason?: string;
  error?: string;
};

/** File counts (a pair is two files) and folder counts. */
export type ReportCounts = {
  uploaded: number;
  skipped: number;
  failed: number;
  foldersCreated: number;
  foldersReused: number;
  foldersFailed: number;
};

/**
 * Accumulates one outcome per node of the upload pass, so that a failing
 * node is visible in the summary instead of disappearing into a log line.
 */
export class RunReport {
  private readonly entries: NodeOutcome[] = [];

  record(outcome: NodeOutcome): void {
    this.entries.push(outcome);
  }

  outcomes(): readonly NodeOutcome[] {
    return this.entries;
  }

  failures(): NodeOutcome[] {
    return this.entries.filter((e) => e.status === "failed");
  }

  counts(): ReportCounts {
    const counts: ReportCounts = {
      uploaded: 0,
      skipped: 0,
      failed: 0,
      foldersCreated: 0,
      foldersReused: 0,
      foldersFailed: 0,
    };

    for (const e of this.entries) {
      const files = e.kind === "pair" ? 2 : 1;
      switch (e.status) {
        case "uploaded":
          counts.uploaded += files;
          break;
        case "skipped":
          counts.skipped += files;
          break;
        case "failed":
          if (e.kind === "folder") counts.foldersFailed += 1;
          else counts.failed += files;
          break;
        case "created":
          counts.foldersCreated += 1;
          break;
        case "reused":
          counts.foldersReused += 1;
          break;
      }
    }

    return counts;
  }
}
