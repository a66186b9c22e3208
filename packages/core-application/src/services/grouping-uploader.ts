import fs from "node:fs/promises";
import type { Dirent } from "node:fs";
import path from "node:path";

import type { FileGroup, GroupMember, RelativePath, SkipSet } from "@bids-sync/core-domain";

import { errorMessage, isAlreadyExistsError, RemoteStoreError } from "../application/errors.js";
import type { RunContext } from "../application/run-context.js";
import type { NodeKind, RunReport } from "../application/run-report.js";
import type { RemoteFolder, RemoteParent, RemoteStore } from "../ports/remote-store.js";
import { baseNameOf, classifyFile, joinRelative, toPosix } from "./file-kind.js";

export type SkipReason = "already-present" | "partial-pair";

export type GroupAction =
  | { type: "skip"; kind: NodeKind; path: RelativePath; reason: SkipReason }
  | { type: "composite"; itemName: string; sidecar: GroupMember; payload: GroupMember }
  | { type: "direct"; member: GroupMember };

/* ---------------- grouping ---------------- */

export function groupFiles(
  files: Array<{ name: string; absolutePath: string; relativePath: RelativePath }>
): FileGroup[] {
  const groups = new Map<string, FileGroup>();

  for (const f of files) {
    const baseName = baseNameOf(f.name);
    let group = groups.get(baseName);
    if (!group) {
      group = { baseName, others: [] };
      groups.set(baseName, group);
    }

    const member: GroupMember = { ...f, kind: classifyFile(f.name) };

    // x.nii next to x.nii.gz: the second payload is uploaded on its own
    if (member.kind === "payload" && !group.payload) group.payload = member;
    else if (member.kind === "sidecar" && !group.sidecar) group.sidecar = member;
    else group.others.push(member);
  }

  return [...groups.values()];
}

/* ---------------- planning ---------------- */

/**
 * A pair is uploaded only as a whole: when either half is already remote the
 * pair is left untouched, so no composite item is ever built from halves.
 */
export function planGroup(group: FileGroup, skipSet: SkipSet): GroupAction[] {
  const actions: GroupAction[] = [];
  const { payload, sidecar } = group;

  if (payload && sidecar) {
    const payloadPresent = skipSet.has(payload.relativePath);
    const sidecarPresent = skipSet.has(sidecar.relativePath);

    if (payloadPresent || sidecarPresent) {
      actions.push({
        type: "skip",
        kind: "pair",
        path: payload.relativePath,
        reason: payloadPresent && sidecarPresent ? "already-present" : "partial-pair",
      });
    } else {
      actions.push({ type: "composite", itemName: payload.name, sidecar, payload });
    }
  } else {
    const single = payload ?? sidecar;
    if (single) actions.push(singleAction(single, skipSet));
  }

  for (const other of group.others) actions.push(singleAction(other, skipSet));

  return actions;
}

function singleAction(member: GroupMember, skipSet: SkipSet): GroupAction {
  if (skipSet.has(member.relativePath)) {
    return { type: "skip", kind: "file", path: member.relativePath, reason: "already-present" };
  }
  return { type: "direct", member };
}

/* ---------------- remote folders ---------------- */

/**
 * Creation is attempted first; the store rejects a duplicate name with an
 * "already exists" message, in which case the existing folder is looked up.
 */
export async function getOrCreateFolder(params: {
  ctx: RunContext;
  store: RemoteStore;
  parent: RemoteParent;
  name: string;
}): Promise<{ folder: RemoteFolder; created: boolean }> {
  const { ctx, store, parent, name } = params;

  try {
    const folder = await store.createFolder(parent, name);
    ctx.logger.info(`Created folder: ${name}`);
    return { folder, created: true };
  } catch (err) {
    if (!isAlreadyExistsError(err)) throw err;

    ctx.logger.debug(`Folder ${name} already exists, using existing folder`);
    const siblings = await store.listChildFolders(parent);
    const existing = siblings.find((f) => f.name === name);
    if (!existing) {
      throw new RemoteStoreError(`Folder ${name} reported as existing but not found under ${parent.id}`);
    }
    return { folder: existing, created: false };
  }
}

/* ---------------- upload ---------------- */

async function runAction(
  action: Exclude<GroupAction, { type: "skip" }>,
  parent: RemoteParent,
  ctx: RunContext,
  store: RemoteStore
): Promise<void> {
  if (action.type === "composite") {
    ctx.logger.info(`Uploading BIDS pair: ${action.payload.name} + ${action.sidecar.name}`);

    const item = await store.createItem(parent, action.itemName);
    try {
      // metadata first: anything reacting on the remote side sees it before the image
      await store.uploadFile({ id: item.id, kind: "item" }, action.sidecar.absolutePath);
      await store.uploadFile({ id: item.id, kind: "item" }, action.payload.absolutePath);
    } catch (err) {
      // a composite item holds both files or does not exist
      try {
        await store.deleteItem(item.id);
      } catch (cleanupErr) {
        ctx.logger.warn(`Failed to remove incomplete item '${action.itemName}': ${errorMessage(cleanupErr)}`);
      }
      throw err;
    }

    ctx.logger.info(`  ✓ Created item '${action.itemName}' with NIfTI + JSON`);
    return;
  }

  const { member } = action;
  if (member.kind === "payload") ctx.logger.info(`Uploading NIfTI (no JSON): ${member.name}`);
  else if (member.kind === "sidecar") ctx.logger.info(`Uploading JSON: ${member.name}`);
  else ctx.logger.info(`Uploading file: ${member.name}`);

  if (parent.kind !== "folder") {
    throw new RemoteStoreError(`Files cannot be uploaded directly into a ${parent.kind}`);
  }
  await store.uploadFile({ id: parent.id, kind: "folder" }, member.absolutePath);
}

/**
 * Mirrors `localDir` under `parent`. Best effort per node: each pair, file
 * and folder gets one outcome in `report` and a failure never stops its
 * siblings. `scanRoot` anchors the root-relative paths the skip-set uses.
 */
export async function uploadDirectory(params: {
  ctx: RunContext;
  store: RemoteStore;
  localDir: string;
  parent: RemoteParent;
  skipSet: SkipSet;
  scanRoot: string;
  report: RunReport;
}): Promise<void> {
  const { ctx, store, localDir, parent, skipSet, scanRoot, report } = params;

  const dirRel = toPosix(path.relative(scanRoot, localDir));

  let entries: Dirent[];
  try {
    entries = await fs.readdir(localDir, { withFileTypes: true });
  } catch (err) {
    ctx.logger.warn(`Failed to read directory ${dirRel || "."}: ${errorMessage(err)}`);
    report.record({ path: dirRel, kind: "folder", status: "failed", error: errorMessage(err) });
    return;
  }

  const files: Array<{ name: string; absolutePath: string; relativePath: RelativePath }> = [];
  const dirs: Array<{ name: string; absolutePath: string; relativePath: RelativePath }> = [];

  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  for (const e of entries) {
    const entry = {
      name: e.name,
      absolutePath: path.join(localDir, e.name),
      relativePath: joinRelative(dirRel, e.name),
    };
    if (e.isFile()) files.push(entry);
    else if (e.isDirectory()) dirs.push(entry);
  }

  for (const group of groupFiles(files)) {
    for (const action of planGroup(group, skipSet)) {
      if (action.type === "skip") {
        const why = action.reason === "partial-pair" ? "only one half of the pair is present" : "already present";
        ctx.logger.debug(`Skipping ${action.path} (${why})`);
        report.record({ path: action.path, kind: action.kind, status: "skipped", reason: action.reason });
        continue;
      }

      const nodePath = action.type === "composite" ? action.payload.relativePath : action.member.relativePath;
      const kind: NodeKind = action.type === "composite" ? "pair" : "file";

      try {
        await runAction(action, parent, ctx, store);
        report.record({ path: nodePath, kind, status: "uploaded" });
      } catch (err) {
        ctx.logger.warn(`Failed to upload ${group.baseName}: ${errorMessage(err)}`);
        report.record({ path: nodePath, kind, status: "failed", error: errorMessage(err) });
      }
    }
  }

  for (const dir of dirs) {
    let folder: RemoteFolder;
    try {
      const resolved = await getOrCreateFolder({ ctx, store, parent, name: dir.name });
      folder = resolved.folder;
      report.record({
        path: dir.relativePath,
        kind: "folder",
        status: resolved.created ? "created" : "reused",
      });
    } catch (err) {
      ctx.logger.warn(`Failed to create folder ${dir.name}: ${errorMessage(err)}`);
      report.record({ path: dir.relativePath, kind: "folder", status: "failed", error: errorMessage(err) });
      continue;
    }

    await uploadDirectory({
      ctx,
      store,
      localDir: dir.absolutePath,
      parent: { id: folder.id, kind: "folder" },
      skipSet,
      scanRoot,
      report,
    });
  }
}
