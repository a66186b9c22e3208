import { describe, it, expect } from "vitest";
import { clearFolderContents } from "./remote-reset.js";
import { InMemoryRemoteStore } from "../testing/in-memory-remote-store.js";
import { testContext } from "../testing/memory-logger.js";

describe("remote-reset", () => {
  it("deletes items and sub-folders but keeps the folder", async () => {
    const store = new InMemoryRemoteStore();
    store.seedItem(store.rootId, "a.tsv", [{ name: "a.tsv", content: "a" }]);
    const sub = store.seedFolder(store.rootId, "sub-01");
    store.seedItem(sub, "b.tsv", [{ name: "b.tsv", content: "b" }]);

    const report = await clearFolderContents({ ctx: testContext(), store, folderId: store.rootId });

    expect(report).toEqual({ deletedItems: 2, deletedFolders: 1, failed: 0 });
    expect(store.itemCount).toBe(0);
    expect(store.folderAt("")?.id).toBe(store.rootId);
    expect(store.folderAt("sub-01")).toBeUndefined();
  });

  it("counts deletions that fail and continues", async () => {
    const store = new InMemoryRemoteStore({
      failWhen: (c) => (c.op === "deleteItem" ? "locked" : undefined),
    });
    const a = store.seedItem(store.rootId, "a.tsv", [{ name: "a.tsv", content: "a" }]);
    store.seedFolder(store.rootId, "empty");
    const ctx = testContext();

    const report = await clearFolderContents({ ctx, store, folderId: store.rootId });

    expect(report).toEqual({ deletedItems: 0, deletedFolders: 1, failed: 1 });
    expect(ctx.logger.messages("warn")).toEqual([`Failed to delete item ${a}: locked`]);
  });
});
