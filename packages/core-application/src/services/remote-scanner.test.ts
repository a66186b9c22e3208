import { describe, it, expect } from "vitest";
import type { RemoteFolder, RemoteParent } from "../ports/remote-store.js";
import { scanRemoteTree } from "./remote-scanner.js";
import { InMemoryRemoteStore } from "../testing/in-memory-remote-store.js";
import { bytes } from "../testing/local-tree.js";
import { testContext } from "../testing/memory-logger.js";

describe("remote-scanner", () => {
  it("keys items by root-relative path with the sum of their file sizes", async () => {
    const store = new InMemoryRemoteStore();
    store.seedItem(store.rootId, "dataset_description.json", [
      { name: "dataset_description.json", content: bytes(12) },
    ]);
    const sub = store.seedFolder(store.rootId, "sub-01");
    const anat = store.seedFolder(sub, "anat");
    store.seedItem(anat, "sub-01_T1w.nii.gz", [
      { name: "sub-01_T1w.json", content: bytes(50) },
      { name: "sub-01_T1w.nii.gz", content: bytes(500) },
    ]);
    const ctx = testContext();

    const tree = await scanRemoteTree({ ctx, store, folderId: store.rootId });

    expect([...tree.items.keys()].sort()).toEqual([
      "dataset_description.json",
      "sub-01/anat/sub-01_T1w.nii.gz",
    ]);
    const pair = tree.items.get("sub-01/anat/sub-01_T1w.nii.gz");
    expect(pair?.nodeKind).toBe("item");
    expect(pair?.aggregateSizeBytes).toBe(550);
    expect(pair?.files.map((f) => f.name)).toEqual(["sub-01_T1w.json", "sub-01_T1w.nii.gz"]);
    expect(ctx.logger.messages("info")).toContain("Found 2 items on the remote store");
  });

  it("reports folders separately with the size of everything below them", async () => {
    const store = new InMemoryRemoteStore();
    const sub = store.seedFolder(store.rootId, "sub-01");
    const anat = store.seedFolder(sub, "anat");
    store.seedItem(sub, "sub-01_scans.tsv", [{ name: "sub-01_scans.tsv", content: bytes(8) }]);
    store.seedItem(anat, "a.json", [{ name: "a.json", content: bytes(30) }]);

    const tree = await scanRemoteTree({ ctx: testContext(), store, folderId: store.rootId });

    expect(tree.folders.get("sub-01")?.aggregateSizeBytes).toBe(38);
    expect(tree.folders.get("sub-01/anat")?.aggregateSizeBytes).toBe(30);
    expect(tree.folders.get("sub-01")?.remoteId).toBe(sub);
    expect(tree.items.has("sub-01")).toBe(false);
  });

  it("does not descend into a folder it has already visited", async () => {
    class LoopingStore extends InMemoryRemoteStore {
      loopFrom = "";
      override async listChildFolders(parent: RemoteParent): Promise<RemoteFolder[]> {
        const children = await super.listChildFolders(parent);
        if (parent.id !== this.loopFrom) return children;
        return [...children, { id: this.rootId, name: "loop", parentId: parent.id, parentKind: "folder" }];
      }
    }
    const store = new LoopingStore();
    store.loopFrom = store.seedFolder(store.rootId, "sub-01");
    store.seedItem(store.loopFrom, "a.json", [{ name: "a.json", content: "{}" }]);
    const ctx = testContext();

    const tree = await scanRemoteTree({ ctx, store, folderId: store.rootId });

    expect([...tree.items.keys()]).toEqual(["sub-01/a.json"]);
    expect(ctx.logger.messages("warn")).toEqual([
      `Folder ${store.rootId} (sub-01/loop) already visited, not descending again`,
    ]);
  });

  it("stops at the depth limit", async () => {
    const store = new InMemoryRemoteStore();
    const a = store.seedFolder(store.rootId, "a");
    const b = store.seedFolder(a, "b");
    store.seedItem(a, "top.json", [{ name: "top.json", content: "{}" }]);
    store.seedItem(b, "deep.json", [{ name: "deep.json", content: "{}" }]);
    const ctx = testContext();

    const tree = await scanRemoteTree({ ctx, store, folderId: store.rootId, maxDepth: 1 });

    expect([...tree.items.keys()]).toEqual(["a/top.json"]);
    expect(ctx.logger.messages("warn")).toEqual(["Folder a/b is deeper than 1 levels, not descending"]);
  });

  it("fails when a folder cannot be listed", async () => {
    class BrokenListing extends InMemoryRemoteStore {
      override async listChildFolders(_parent: RemoteParent): Promise<RemoteFolder[]> {
        throw new Error("connection reset");
      }
    }
    const store = new BrokenListing();

    await expect(scanRemoteTree({ ctx: testContext(), store, folderId: store.rootId })).rejects.toThrow(
      "connection reset"
    );
  });

  it("returns empty maps for an empty folder", async () => {
    const store = new InMemoryRemoteStore();
    const tree = await scanRemoteTree({ ctx: testContext(), store, folderId: store.rootId });
    expect(tree.items.size).toBe(0);
    expect(tree.folders.size).toBe(0);
  });
});
