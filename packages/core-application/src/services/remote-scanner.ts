import type {
  RelativePath,
  RemoteFileRecord,
  RemoteId,
  RemoteNodeRecord,
  RemoteTree,
} from "@bids-sync/core-domain";

import type { RunContext } from "../application/run-context.js";
import type { RemoteStore } from "../ports/remote-store.js";
import { joinRelative } from "./file-kind.js";
import { walkRemoteFolders } from "./remote-walk.js";

export async function scanRemoteTree(params: {
  ctx: RunContext;
  store: RemoteStore;
  folderId: RemoteId;
  maxDepth?: number;
}): Promise<RemoteTree> {
  const { ctx, store, folderId } = params;

  const items = new Map<RelativePath, RemoteNodeRecord>();
  const folders = new Map<RelativePath, RemoteNodeRecord>();

  await walkRemoteFolders({
    ctx,
    store,
    rootFolderId: folderId,
    maxDepth: params.maxDepth,
    onChildFolder: (child, path) => {
      folders.set(path, {
        relativePath: path,
        nodeKind: "folder",
        aggregateSizeBytes: 0,
        remoteId: child.id,
        files: [],
      });
    },
    visit: async ({ folderId: currentId, path }) => {
      for (const item of await store.listChildItems(currentId)) {
        const files: RemoteFileRecord[] = [];
        let total = 0;

        for (const f of await store.listFilesOfItem(item.id)) {
          files.push({ name: f.name, sizeBytes: f.sizeBytes, remoteFileId: f.id });
          total += f.sizeBytes;
        }

        const itemPath = joinRelative(path, item.name);
        items.set(itemPath, {
          relativePath: itemPath,
          nodeKind: "item",
          aggregateSizeBytes: total,
          remoteId: item.id,
          files,
        });
      }
    },
  });

  for (const folder of folders.values()) {
    const prefix = `${folder.relativePath}/`;
    for (const item of items.values()) {
      if (item.relativePath.startsWith(prefix)) folder.aggregateSizeBytes += item.aggregateSizeBytes;
    }
  }

  ctx.logger.info(`Found ${items.size} items on the remote store`);
  return { items, folders };
}
