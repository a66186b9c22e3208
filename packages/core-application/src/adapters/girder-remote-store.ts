import fs from "node:fs/promises";
import type { Agent } from "node:https";
import path from "node:path";

import { Gaxios, GaxiosError, type GaxiosOptions, type GaxiosResponse } from "gaxios";
import { z } from "zod";

import type { RemoteId } from "@bids-sync/core-domain";

import { normalizeApiUrl } from "../application/config.js";
import { errorMessage, RemoteStoreError } from "../application/errors.js";
import type {
  MetadataMap,
  RemoteFile,
  RemoteFolder,
  RemoteItem,
  RemoteParent,
  RemoteStore,
  RemoteTarget,
} from "../ports/remote-store.js";

const PAGE_SIZE = 50;
const UPLOAD_CHUNK_BYTES = 32 * 1024 * 1024;
const TOKEN_HEADER = "Girder-Token";

/* ---------------- response schemas ---------------- */

const FolderDoc = z.object({
  _id: z.string(),
  name: z.string(),
  parentId: z.string().nullish(),
  parentCollection: z.string().nullish(),
});

const ItemDoc = z.object({
  _id: z.string(),
  name: z.string(),
  folderId: z.string(),
});

const FileDoc = z.object({
  _id: z.string(),
  name: z.string(),
  size: z.number().nullish(),
});

// an upload in progress, or the finished file after the last chunk
const UploadDoc = z.object({ _id: z.string() });

const TokenDoc = z.object({
  authToken: z.object({ token: z.string() }),
});

const ErrorBody = z.object({ message: z.string() });

function toFolder(doc: z.infer<typeof FolderDoc>): RemoteFolder {
  return {
    id: doc._id,
    name: doc.name,
    parentId: doc.parentId ?? undefined,
    parentKind: doc.parentCollection ?? undefined,
  };
}

function toItem(doc: z.infer<typeof ItemDoc>): RemoteItem {
  return { id: doc._id, name: doc.name, folderId: doc.folderId };
}

function toFile(doc: z.infer<typeof FileDoc>): RemoteFile {
  return { id: doc._id, name: doc.name, sizeBytes: doc.size ?? 0 };
}

/**
 * Girder answers errors with `{ "message": ..., "type": ... }`; the message is
 * what callers match on ("already exists").
 */
export function girderErrorMessage(body: unknown, fallback: string): string {
  const parsed = ErrorBody.safeParse(body);
  return parsed.success ? parsed.data.message : fallback;
}

/**
 * `RemoteStore` over the Girder REST API (`/api/v1`). Authenticates with an
 * API key exchanged for a session token.
 */
export class GirderRemoteStore implements RemoteStore {
  private readonly apiUrl: string;
  private readonly http: Gaxios;
  private readonly chunkBytes: number;
  private token: string | null = null;

  constructor(opts: { apiUrl: string; agent?: Agent; chunkBytes?: number }) {
    this.apiUrl = normalizeApiUrl(opts.apiUrl);
    this.http = new Gaxios(opts.agent ? { agent: opts.agent } : {});
    this.chunkBytes = opts.chunkBytes ?? UPLOAD_CHUNK_BYTES;
  }

  /* ---------------- auth ---------------- */

  async authenticate(apiKey: string): Promise<void> {
    const doc = await this.call(TokenDoc, {
      method: "POST",
      url: "/api_key/token",
      params: { key: apiKey },
    });
    this.token = doc.authToken.token;
  }

  /* ---------------- reads ---------------- */

  async getFolder(folderId: RemoteId): Promise<RemoteFolder> {
    return toFolder(await this.call(FolderDoc, { url: `/folder/${folderId}` }));
  }

  async listChildFolders(parent: RemoteParent): Promise<RemoteFolder[]> {
    const docs = await this.listAll(FolderDoc, "/folder", {
      parentType: parent.kind,
      parentId: parent.id,
    });
    return docs.map(toFolder);
  }

  async listChildItems(folderId: RemoteId): Promise<RemoteItem[]> {
    const docs = await this.listAll(ItemDoc, "/item", { folderId });
    return docs.map(toItem);
  }

  async listFilesOfItem(itemId: RemoteId): Promise<RemoteFile[]> {
    const docs = await this.listAll(FileDoc, `/item/${itemId}/files`, {});
    return docs.map(toFile);
  }

  async downloadFile(fileId: RemoteId): Promise<Buffer> {
    const res = await this.send({ url: `/file/${fileId}/download`, responseType: "arraybuffer" });
    if (res.data instanceof ArrayBuffer) return Buffer.from(res.data);
    if (Buffer.isBuffer(res.data)) return res.data;
    throw new RemoteStoreError(`Unexpected download body for file ${fileId}`);
  }

  /* ---------------- writes ---------------- */

  async createFolder(parent: RemoteParent, name: string): Promise<RemoteFolder> {
    const doc = await this.call(FolderDoc, {
      method: "POST",
      url: "/folder",
      params: { parentType: parent.kind, parentId: parent.id, name, reuseExisting: false },
    });
    return toFolder(doc);
  }

  async createItem(parent: RemoteParent, name: string): Promise<RemoteItem> {
    if (parent.kind !== "folder") {
      throw new RemoteStoreError(`Items can only be created inside folders, not in a ${parent.kind}`);
    }
    const doc = await this.call(ItemDoc, {
      method: "POST",
      url: "/item",
      params: { folderId: parent.id, name },
    });
    return toItem(doc);
  }

  /**
   * Two-step Girder upload: `POST /file` opens an upload (or, for an empty
   * file, directly returns the file), then `POST /file/chunk` sends the bytes.
   */
  async uploadFile(target: RemoteTarget, localPath: string): Promise<RemoteFile> {
    const stat = await fs.stat(localPath);
    const name = path.basename(localPath);

    const upload = await this.call(UploadDoc, {
      method: "POST",
      url: "/file",
      params: { parentType: target.kind, parentId: target.id, name, size: stat.size },
    });
    if (stat.size === 0) return { id: upload._id, name, sizeBytes: 0 };

    const handle = await fs.open(localPath, "r");
    try {
      let offset = 0;
      let last = upload;
      while (offset < stat.size) {
        const length = Math.min(this.chunkBytes, stat.size - offset);
        const buf = Buffer.alloc(length);
        const { bytesRead } = await handle.read(buf, 0, length, offset);
        if (bytesRead === 0) {
          throw new RemoteStoreError(`${localPath} ended at ${offset} of ${stat.size} bytes`);
        }

        last = await this.call(UploadDoc, {
          method: "POST",
          url: "/file/chunk",
          params: { uploadId: upload._id, offset },
          headers: { "Content-Type": "application/octet-stream" },
          data: buf.subarray(0, bytesRead),
        });
        offset += bytesRead;
      }
      return { id: last._id, name, sizeBytes: stat.size };
    } finally {
      await handle.close();
    }
  }

  async addMetadata(target: RemoteTarget, metadata: MetadataMap): Promise<void> {
    await this.send({ method: "PUT", url: `/${target.kind}/${target.id}/metadata`, data: metadata });
  }

  async deleteItem(itemId: RemoteId): Promise<void> {
    await this.send({ method: "DELETE", url: `/item/${itemId}` });
  }

  async deleteFolder(folderId: RemoteId): Promise<void> {
    await this.send({ method: "DELETE", url: `/folder/${folderId}` });
  }

  /* ---------------- http ---------------- */

  private async listAll<S extends z.ZodTypeAny>(
    schema: S,
    url: string,
    params: Record<string, string | number | boolean>
  ): Promise<z.infer<S>[]> {
    const out: z.infer<S>[] = [];
    for (let offset = 0; ; offset += PAGE_SIZE) {
      const page = await this.call(z.array(schema), {
        url,
        params: { ...params, limit: PAGE_SIZE, offset },
      });
      out.push(...page);
      if (page.length < PAGE_SIZE) return out;
    }
  }

  private async call<S extends z.ZodTypeAny>(schema: S, opts: GaxiosOptions): Promise<z.infer<S>> {
    const res = await this.send(opts);
    const parsed = schema.safeParse(res.data);
    if (!parsed.success) {
      throw new RemoteStoreError(
        `Unexpected response from ${opts.method ?? "GET"} ${opts.url ?? ""}: ${parsed.error.message}`
      );
    }
    return parsed.data;
  }

  private async send(opts: GaxiosOptions): Promise<GaxiosResponse<unknown>> {
    const headers: Record<string, string> = { Accept: "application/json" };
    if (this.token) headers[TOKEN_HEADER] = this.token;

    try {
      return await this.http.request<unknown>({
        ...opts,
        url: `${this.apiUrl}${opts.url ?? ""}`,
        headers: { ...headers, ...opts.headers },
      });
    } catch (err) {
      if (err instanceof GaxiosError) {
        throw new RemoteStoreError(
          girderErrorMessage(err.response?.data, err.message),
          err.response?.status,
          err
        );
      }
      throw new RemoteStoreError(errorMessage(err), undefined, err);
    }
  }
}
