import fs from "node:fs/promises";
import path from "node:path";
import { afterEach, describe, it, expect } from "vitest";
import { isAlreadyExistsError, RemoteStoreError } from "../application/errors.js";
import { getOrCreateFolder } from "../services/grouping-uploader.js";
import { GirderRemoteStore, girderErrorMessage } from "./girder-remote-store.js";
import { startGirderTestServer, type GirderTestServer, type Reply, type SeenRequest } from "../testing/girder-test-server.js";
import { makeLocalTree, removeLocalTree } from "../testing/local-tree.js";
import { testContext } from "../testing/memory-logger.js";

const EXISTS = "A folder with that name already exists here.";

function items(count: number, from = 0) {
  return Array.from({ length: count }, (_, i) => ({
    _id: `item-${from + i}`,
    name: `f${from + i}.tsv`,
    folderId: "folder-1",
  }));
}

describe("girder-remote-store", () => {
  let server: GirderTestServer | undefined;
  let root = "";

  afterEach(async () => {
    await server?.close();
    server = undefined;
    if (root) await removeLocalTree(root);
    root = "";
  });

  async function serve(route: (req: SeenRequest) => Reply | Promise<Reply>, chunkBytes?: number) {
    server = await startGirderTestServer(route);
    return { seen: server.seen, store: new GirderRemoteStore({ apiUrl: server.apiUrl, chunkBytes }) };
  }

  describe("girderErrorMessage", () => {
    it("uses the message of a Girder error body", () => {
      const body = { message: EXISTS, type: "validation" };
      expect(girderErrorMessage(body, "Request failed with status code 400")).toBe(EXISTS);
    });

    it("falls back when the body has no message", () => {
      expect(girderErrorMessage("<html>502</html>", "Request failed with status code 502")).toBe(
        "Request failed with status code 502"
      );
      expect(girderErrorMessage(undefined, "socket hang up")).toBe("socket hang up");
    });
  });

  it("exchanges the API key for a token and sends it afterwards", async () => {
    const { seen, store } = await serve((req) =>
      req.path === "/api/v1/api_key/token"
        ? { json: { authToken: { token: "token-1" } } }
        : { json: { _id: "folder-1", name: "dataset", parentId: "coll-1", parentCollection: "collection" } }
    );

    await store.authenticate("test-secret");
    const folder = await store.getFolder("folder-1");

    expect(seen[0]?.method).toBe("POST");
    expect(seen[0]?.query.get("key")).toBe("test-secret");
    expect(seen[1]?.path).toBe("/api/v1/folder/folder-1");
    expect(seen[1]?.headers["girder-token"]).toBe("token-1");
    expect(folder).toEqual({ id: "folder-1", name: "dataset", parentId: "coll-1", parentKind: "collection" });
  });

  it("asks for another page when a page is full", async () => {
    const { seen, store } = await serve((req) => ({
      json: req.query.get("offset") === "0" ? items(50) : [],
    }));

    const listed = await store.listChildItems("folder-1");

    expect(listed).toHaveLength(50);
    expect(seen.map((r) => [r.path, r.query.get("folderId"), r.query.get("limit"), r.query.get("offset")])).toEqual([
      ["/api/v1/item", "folder-1", "50", "0"],
      ["/api/v1/item", "folder-1", "50", "50"],
    ]);
  });

  it("stops after a short page", async () => {
    const { seen, store } = await serve((req) => ({
      json: req.query.get("offset") === "0" ? items(50) : items(1, 50),
    }));

    const listed = await store.listChildItems("folder-1");

    expect(listed).toHaveLength(51);
    expect(listed[50]).toEqual({ id: "item-50", name: "f50.tsv", folderId: "folder-1" });
    expect(seen).toHaveLength(2);
  });

  it("counts a file without a size as empty", async () => {
    const { seen, store } = await serve(() => ({ json: [{ _id: "file-1", name: "a.json", size: null }] }));

    await expect(store.listFilesOfItem("item-1")).resolves.toEqual([{ id: "file-1", name: "a.json", sizeBytes: 0 }]);
    expect(seen[0]?.path).toBe("/api/v1/item/item-1/files");
  });

  it("sends a file in chunks at increasing offsets", async () => {
    root = await makeLocalTree({ "scan.nii": "0123456789" });
    const { seen, store } = await serve((req) => {
      if (req.path === "/api/v1/file") return { json: { _id: "upload-1" } };
      return { json: { _id: req.query.get("offset") === "8" ? "file-7" : "upload-1" } };
    }, 4);

    const file = await store.uploadFile({ id: "item-1", kind: "item" }, path.join(root, "scan.nii"));

    expect(file).toEqual({ id: "file-7", name: "scan.nii", sizeBytes: 10 });
    const [open, ...chunks] = seen;
    expect(open?.method).toBe("POST");
    expect(Object.fromEntries(open?.query ?? [])).toEqual({
      parentType: "item",
      parentId: "item-1",
      name: "scan.nii",
      size: "10",
    });
    expect(
      chunks.map((c) => [c.path, c.query.get("uploadId"), c.query.get("offset"), c.body.toString("utf-8")])
    ).toEqual([
      ["/api/v1/file/chunk", "upload-1", "0", "0123"],
      ["/api/v1/file/chunk", "upload-1", "4", "4567"],
      ["/api/v1/file/chunk", "upload-1", "8", "89"],
    ]);
    expect(chunks[0]?.headers["content-type"]).toBe("application/octet-stream");
  });

  it("sends no chunk for an empty file", async () => {
    root = await makeLocalTree({ "empty.txt": "" });
    const { seen, store } = await serve(() => ({ json: { _id: "file-9", name: "empty.txt" } }));

    const file = await store.uploadFile({ id: "folder-1", kind: "folder" }, path.join(root, "empty.txt"));

    expect(file).toEqual({ id: "file-9", name: "empty.txt", sizeBytes: 0 });
    expect(seen.map((r) => r.path)).toEqual(["/api/v1/file"]);
    expect(seen[0]?.query.get("parentType")).toBe("folder");
  });

  it("fails when the file shrinks during the upload", async () => {
    root = await makeLocalTree({ "scan.nii": "0123456789" });
    const localPath = path.join(root, "scan.nii");
    const { store } = await serve(async (req) => {
      if (req.path === "/api/v1/file") await fs.truncate(localPath, 4);
      return { json: { _id: "upload-1" } };
    }, 4);

    await expect(store.uploadFile({ id: "item-1", kind: "item" }, localPath)).rejects.toThrow(
      new RemoteStoreError(`${localPath} ended at 4 of 10 bytes`)
    );
  });

  it("downloads file bytes", async () => {
    const { seen, store } = await serve(() => ({ raw: Buffer.from('{"EchoTime": 0.03}') }));

    const bytes = await store.downloadFile("file-3");

    expect(bytes.toString("utf-8")).toBe('{"EchoTime": 0.03}');
    expect(seen[0]?.path).toBe("/api/v1/file/file-3/download");
  });

  it("puts metadata as a JSON body", async () => {
    const { seen, store } = await serve(() => ({ json: { _id: "item-1" } }));

    await store.addMetadata({ id: "item-1", kind: "item" }, { RepetitionTime: 2, TaskName: "rest" });
    await store.addMetadata({ id: "folder-1", kind: "folder" }, { Name: "demo" });

    expect(seen.map((r) => [r.method, r.path])).toEqual([
      ["PUT", "/api/v1/item/item-1/metadata"],
      ["PUT", "/api/v1/folder/folder-1/metadata"],
    ]);
    expect(JSON.parse(seen[0]?.body.toString("utf-8") ?? "")).toEqual({ RepetitionTime: 2, TaskName: "rest" });
    expect(seen[0]?.headers["content-type"]).toContain("application/json");
  });

  it("turns a Girder name conflict into an already-exists error", async () => {
    const { seen, store } = await serve(() => ({ status: 400, json: { message: EXISTS, type: "validation" } }));

    const err = await store.createFolder({ id: "folder-1", kind: "folder" }, "sub-01").catch((e: unknown) => e);

    expect(err).toBeInstanceOf(RemoteStoreError);
    expect(err instanceof RemoteStoreError && err.statusCode).toBe(400);
    expect(isAlreadyExistsError(err)).toBe(true);
    expect(seen[0]?.query.get("reuseExisting")).toBe("false");
  });

  it("lets the uploader reuse a folder Girder reports as existing", async () => {
    const { store } = await serve((req) =>
      req.method === "POST"
        ? { status: 400, json: { message: EXISTS } }
        : { json: req.query.get("offset") === "0" ? [{ _id: "folder-5", name: "sub-01", parentId: "folder-1" }] : [] }
    );

    const { folder, created } = await getOrCreateFolder({
      ctx: testContext(),
      store,
      parent: { id: "folder-1", kind: "folder" },
      name: "sub-01",
    });

    expect(created).toBe(false);
    expect(folder.id).toBe("folder-5");
  });

  it("rejects a response of the wrong shape", async () => {
    const { store } = await serve(() => ({ json: { id: "folder-1" } }));
    await expect(store.getFolder("folder-1")).rejects.toThrow(/^Unexpected response from GET \/folder\/folder-1/);
  });

  it("refuses to create an item outside a folder", async () => {
    const store = new GirderRemoteStore({ apiUrl: "localhost:8080/api/v1" });
    await expect(store.createItem({ id: "collection-1", kind: "collection" }, "a.nii")).rejects.toThrow(
      "Items can only be created inside folders, not in a collection"
    );
  });
});
