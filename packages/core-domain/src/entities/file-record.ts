import type { RelativePath } from "../value-objects/ids.js";

export type FileKind = "payload" | "sidecar" | "other";

export interface LocalFileRecord {
  relativePath: RelativePath;
  absolutePath: string;
  sizeBytes: number;
  kind: FileKind;
}

export type LocalTree = ReadonlyMap<RelativePath, LocalFileRecord>;
