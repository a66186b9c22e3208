import type {
  LocalTree,
  MatchedPath,
  ReconciliationResult,
  RelativePath,
  RemoteNodeRecord,
  SkipSet,
} from "@bids-sync/core-domain";

/**
 * Remote storage may report slightly different byte counts for the same
 * content, so sizes within 1% of the larger one count as equal. No content
 * hashing: a changed file of near-identical size is classified `existing`.
 */
export const SIZE_TOLERANCE_RATIO = 0.01;

export function sizesMatch(localSize: number, remoteSize: number): boolean {
  const diff = Math.abs(localSize - remoteSize);
  const tolerance = SIZE_TOLERANCE_RATIO * Math.max(localSize, remoteSize);
  return diff <= tolerance;
}

/* ---------------- reconciliation ---------------- */

export function reconcile(
  local: LocalTree,
  remote: ReadonlyMap<RelativePath, RemoteNodeRecord>
): ReconciliationResult {
  const added: RelativePath[] = [];
  const existing: MatchedPath[] = [];
  const modified: MatchedPath[] = [];
  const remoteOnly: RelativePath[] = [];

  for (const [path, file] of local) {
    const node = remote.get(path);
    if (!node) {
      added.push(path);
      continue;
    }

    const match: MatchedPath = {
      path,
      localSizeBytes: file.sizeBytes,
      remoteSizeBytes: node.aggregateSizeBytes,
      remoteId: node.remoteId,
    };

    if (sizesMatch(file.sizeBytes, node.aggregateSizeBytes)) existing.push(match);
    else modified.push(match);
  }

  for (const path of remote.keys()) {
    if (!local.has(path)) remoteOnly.push(path);
  }

  const byPath = (a: string, b: string) => (a < b ? -1 : a > b ? 1 : 0);
  added.sort(byPath);
  remoteOnly.sort(byPath);
  existing.sort((a, b) => byPath(a.path, b.path));
  modified.sort((a, b) => byPath(a.path, b.path));

  return { added, existing, modified, remoteOnly };
}

export function buildSkipSet(result: ReconciliationResult): SkipSet {
  return new Set(result.existing.map((m) => m.path));
}
