import type { RelativePath } from "../value-objects/ids.js";
import type { FileKind } from "./file-record.js";

export interface GroupMember {
  name: string;
  absolutePath: string;
  relativePath: RelativePath;
  kind: FileKind;
}

// Lives for one directory of the upload pass.
export interface FileGroup {
  baseName: string;
  payload?: GroupMember;
  sidecar?: GroupMember;
  others: GroupMember[];
}
