export type { RemoteId, RelativePath } from "./value-objects/ids.js";
export type { FileKind, LocalFileRecord, LocalTree } from "./entities/file-record.js";
export type {
  RemoteNodeKind,
  RemoteFileRecord,
  RemoteNodeRecord,
  RemoteTree,
} from "./entities/remote-node.js";
export type { MatchedPath, ReconciliationResult, SkipSet } from "./entities/reconciliation.js";
export type { GroupMember, FileGroup } from "./entities/file-group.js";
