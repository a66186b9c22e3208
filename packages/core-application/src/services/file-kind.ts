import path from "node:path";

import type { FileKind } from "@bids-sync/core-domain";

/** Longest first: `.nii.gz` must win over `.gz`. */
export const PAYLOAD_SUFFIXES = [".nii.gz", ".nii"] as const;
export const SIDECAR_SUFFIX = ".json";
export const DATASET_DESCRIPTION = "dataset_description.json";

export function classifyFile(name: string): FileKind {
  if (PAYLOAD_SUFFIXES.some((s) => name.endsWith(s))) return "payload";
  if (name.endsWith(SIDECAR_SUFFIX)) return "sidecar";
  return "other";
}

/**
 * Logical base name shared by the members of a record:
 * `sub-01_T1w.nii.gz`, `sub-01_T1w.json` -> `sub-01_T1w`.
 * Unrecognized files lose their last extension only.
 */
export function baseNameOf(name: string): string {
  for (const suffix of [...PAYLOAD_SUFFIXES, SIDECAR_SUFFIX]) {
    if (name.endsWith(suffix) && name.length > suffix.length) {
      return name.slice(0, -suffix.length);
    }
  }
  const ext = path.extname(name);
  return ext ? name.slice(0, -ext.length) : name;
}

export function toPosix(p: string): string {
  return p.replaceAll("\\", "/");
}

export function joinRelative(parent: string, name: string): string {
  return parent ? `${parent}/${name}` : name;
}
