import type { RemoteId } from "@bids-sync/core-domain";

export type RemoteParentKind = "folder" | "collection";

/** Where a folder or an item can be created. */
export type RemoteParent = { id: RemoteId; kind: RemoteParentKind };

/** What metadata can be attached to, and what bytes can be uploaded into. */
export type RemoteTargetKind = "item" | "folder";
export type RemoteTarget = { id: RemoteId; kind: RemoteTargetKind };

export type RemoteFolder = {
  id: RemoteId;
  name: string;
  parentId?: RemoteId;
  parentKind?: string;
};

export type RemoteItem = {
  id: RemoteId;
  name: string;
  folderId: RemoteId;
};

export type RemoteFile = {
  id: RemoteId;
  name: string;
  sizeBytes: number;
};

export type MetadataMap = Record<string, unknown>;

/**
 * Hierarchical object store: folders contain folders and items, items contain
 * files. Every method may reject with a `RemoteStoreError`.
 */
export interface RemoteStore {
  authenticate(apiKey: string): Promise<void>;

  getFolder(folderId: RemoteId): Promise<RemoteFolder>;
  listChildFolders(parent: RemoteParent): Promise<RemoteFolder[]>;
  listChildItems(folderId: RemoteId): Promise<RemoteItem[]>;
  listFilesOfItem(itemId: RemoteId): Promise<RemoteFile[]>;

  createFolder(parent: RemoteParent, name: string): Promise<RemoteFolder>;
  createItem(parent: RemoteParent, name: string): Promise<RemoteItem>;

  /**
   * Uploads a local file. Into an item: adds a file to it. Into a folder: the
   * store creates an item named after the file.
   */
  uploadFile(target: RemoteTarget, localPath: string): Promise<RemoteFile>;
  downloadFile(fileId: RemoteId): Promise<Buffer>;

  addMetadata(target: RemoteTarget, metadata: MetadataMap): Promise<void>;

  deleteItem(itemId: RemoteId): Promise<void>;
  deleteFolder(folderId: RemoteId): Promise<void>;
}
