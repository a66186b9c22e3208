import type { RelativePath, RemoteId } from "../value-objects/ids.js";

export interface MatchedPath {
  path: RelativePath;
  localSizeBytes: number;
  remoteSizeBytes: number;
  remoteId: RemoteId;
}

export interface ReconciliationResult {
  /** local only */
  added: RelativePath[];
  /** on both sides, size within tolerance */
  existing: MatchedPath[];
  /** on both sides, size outside tolerance */
  modified: MatchedPath[];
  remoteOnly: RelativePath[];
}

export type SkipSet = ReadonlySet<RelativePath>;
