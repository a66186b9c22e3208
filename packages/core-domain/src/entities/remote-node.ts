import type { RelativePath, RemoteId } from "../value-objects/ids.js";

export type RemoteNodeKind = "item" | "folder";

export interface RemoteFileRecord {
  name: string;
  sizeBytes: number;
  remoteFileId: RemoteId;
}

export interface RemoteNodeRecord {
  relativePath: RelativePath;
  nodeKind: RemoteNodeKind;
  aggregateSizeBytes: number;
  remoteId: RemoteId;
  files: RemoteFileRecord[];
}

/**
 * Flattened remote tree. Only `items` take part in reconciliation; `folders`
 * are kept for reporting.
 */
export interface RemoteTree {
  items: ReadonlyMap<RelativePath, RemoteNodeRecord>;
  folders: ReadonlyMap<RelativePath, RemoteNodeRecord>;
}
