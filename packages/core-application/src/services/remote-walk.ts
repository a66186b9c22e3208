import type { RelativePath, RemoteId } from "@bids-sync/core-domain";

import type { RunContext } from "../application/run-context.js";
import type { RemoteFolder, RemoteStore } from "../ports/remote-store.js";
import { joinRelative } from "./file-kind.js";

export const DEFAULT_MAX_DEPTH = 64;

export type RemoteFolderVisit = {
  folderId: RemoteId;
  /** root-relative; `""` for the start folder */
  path: RelativePath;
  depth: number;
};

/**
 * Depth-first walk over a remote folder graph, in the store's listing order.
 * The graph is assumed acyclic; a folder id seen twice or a path deeper than
 * `maxDepth` is reported and not entered again.
 *
 * A failed child-folder listing rejects the walk, unless `onListError` is
 * given: then that folder's sub-tree is skipped and its siblings are walked.
 */
export async function walkRemoteFolders(params: {
  ctx: RunContext;
  store: RemoteStore;
  rootFolderId: RemoteId;
  maxDepth?: number;
  visit: (folder: RemoteFolderVisit) => Promise<void>;
  onChildFolder?: (child: RemoteFolder, path: RelativePath) => void;
  onListError?: (path: RelativePath, err: unknown) => void;
}): Promise<void> {
  const { ctx, store, visit, onChildFolder, onListError } = params;
  const maxDepth = params.maxDepth ?? DEFAULT_MAX_DEPTH;
  const seen = new Set<RemoteId>();

  async function walk(folderId: RemoteId, path: RelativePath, depth: number): Promise<void> {
    if (seen.has(folderId)) {
      ctx.logger.warn(`Folder ${folderId} (${path || "."}) already visited, not descending again`);
      return;
    }
    if (depth > maxDepth) {
      ctx.logger.warn(`Folder ${path} is deeper than ${maxDepth} levels, not descending`);
      return;
    }
    seen.add(folderId);

    await visit({ folderId, path, depth });

    let children: RemoteFolder[];
    try {
      children = await store.listChildFolders({ id: folderId, kind: "folder" });
    } catch (err) {
      if (!onListError) throw err;
      onListError(path, err);
      return;
    }
    for (const child of children) {
      const childPath = joinRelative(path, child.name);
      onChildFolder?.(child, childPath);
      await walk(child.id, childPath, depth + 1);
    }
  }

  await walk(params.rootFolderId, "", 0);
}
