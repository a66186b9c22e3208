import type { RemoteId } from "@bids-sync/core-domain";

import { errorMessage } from "../application/errors.js";
import type { RunContext } from "../application/run-context.js";
import type { RemoteStore } from "../ports/remote-store.js";

export type ResetReport = {
  deletedItems: number;
  deletedFolders: number;
  failed: number;
};

/** Empties a remote folder, keeping the folder itself. */
export async function clearFolderContents(params: {
  ctx: RunContext;
  store: RemoteStore;
  folderId: RemoteId;
}): Promise<ResetReport> {
  const { ctx, store } = params;
  const report: ResetReport = { deletedItems: 0, deletedFolders: 0, failed: 0 };

  async function clear(folderId: RemoteId): Promise<void> {
    for (const item of await store.listChildItems(folderId)) {
      try {
        await store.deleteItem(item.id);
        report.deletedItems += 1;
      } catch (err) {
        ctx.logger.warn(`Failed to delete item ${item.id}: ${errorMessage(err)}`);
        report.failed += 1;
      }
    }

    for (const folder of await store.listChildFolders({ id: folderId, kind: "folder" })) {
      await clear(folder.id);
      try {
        await store.deleteFolder(folder.id);
        report.deletedFolders += 1;
      } catch (err) {
        ctx.logger.warn(`Failed to delete folder ${folder.id}: ${errorMessage(err)}`);
        report.failed += 1;
      }
    }
  }

  await clear(params.folderId);
  return report;
}
