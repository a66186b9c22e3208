import { z } from "zod";

import type { RemoteId } from "@bids-sync/core-domain";

import { errorMessage } from "../application/errors.js";
import type { RunContext } from "../application/run-context.js";
import type {
  MetadataMap,
  RemoteFile,
  RemoteItem,
  RemoteStore,
  RemoteTarget,
} from "../ports/remote-store.js";
import { classifyFile, DATASET_DESCRIPTION, PAYLOAD_SUFFIXES, SIDECAR_SUFFIX } from "./file-kind.js";
import { walkRemoteFolders } from "./remote-walk.js";

export type MetadataMatch = "composite" | "folder" | "exact" | "loose";

export type MetadataTarget = RemoteTarget & { match: MetadataMatch };

export type PropagationReport = {
  applied: number;
  failed: number;
  looseMatches: number;
};

const MetadataObjectSchema = z.record(z.unknown());

/**
 * Decides which record a sidecar describes.
 *
 * - inside a composite item (the item also holds a payload): that item;
 * - `dataset_description.json`: the folder itself;
 * - otherwise a sibling item named `<base>.nii.gz` / `<base>.nii`, or failing
 *   that the first sibling whose name starts with `<base>`. The prefix match
 *   can pick the wrong record when one base name is a prefix of another.
 */
export function resolveMetadataTarget(params: {
  folderId: RemoteId;
  sidecar: RemoteFile;
  owner: RemoteItem;
  ownerFiles: RemoteFile[];
  siblings: RemoteItem[];
}): MetadataTarget | null {
  const { folderId, sidecar, owner, ownerFiles, siblings } = params;

  if (ownerFiles.some((f) => classifyFile(f.name) === "payload")) {
    return { id: owner.id, kind: "item", match: "composite" };
  }

  if (sidecar.name === DATASET_DESCRIPTION) {
    return { id: folderId, kind: "folder", match: "folder" };
  }

  const base = sidecar.name.slice(0, -SIDECAR_SUFFIX.length);
  const candidates = siblings.filter((s) => s.id !== owner.id);

  for (const suffix of PAYLOAD_SUFFIXES) {
    const exact = candidates.find((s) => s.name === `${base}${suffix}`);
    if (exact) return { id: exact.id, kind: "item", match: "exact" };
  }

  const loose = candidates.find((s) => s.name.startsWith(base));
  if (loose) return { id: loose.id, kind: "item", match: "loose" };

  return null;
}

export function parseSidecar(bytes: Buffer): MetadataMap {
  const raw: unknown = JSON.parse(bytes.toString("utf-8"));
  const parsed = MetadataObjectSchema.safeParse(raw);
  if (!parsed.success) throw new Error("sidecar is not a JSON object");
  return parsed.data;
}

/**
 * Walks the remote tree and attaches every sidecar's content as metadata on
 * the record it describes. Never throws for a single sidecar; misses and
 * failures are counted.
 */
export async function propagateMetadata(params: {
  ctx: RunContext;
  store: RemoteStore;
  folderId: RemoteId;
  maxDepth?: number;
}): Promise<PropagationReport> {
  const { ctx, store } = params;
  const report: PropagationReport = { applied: 0, failed: 0, looseMatches: 0 };

  await walkRemoteFolders({
    ctx,
    store,
    rootFolderId: params.folderId,
    maxDepth: params.maxDepth,
    onListError: (path, err) => {
      ctx.logger.warn(`Failed to list folders of ${path || "."}: ${errorMessage(err)}`);
      report.failed += 1;
    },
    visit: async ({ folderId, path }) => {
      let siblings: RemoteItem[];
      try {
        siblings = await store.listChildItems(folderId);
      } catch (err) {
        ctx.logger.warn(`Failed to list items of ${path || "."}: ${errorMessage(err)}`);
        report.failed += 1;
        return;
      }

      for (const item of siblings) {
        let files: RemoteFile[];
        try {
          files = await store.listFilesOfItem(item.id);
        } catch (err) {
          ctx.logger.warn(`Failed to list files of ${item.name}: ${errorMessage(err)}`);
          report.failed += 1;
          continue;
        }

        for (const file of files) {
          if (classifyFile(file.name) !== "sidecar") continue;

          const where = path ? `${path}/${file.name}` : file.name;
          const target = resolveMetadataTarget({
            folderId,
            sidecar: file,
            owner: item,
            ownerFiles: files,
            siblings,
          });

          if (!target) {
            ctx.logger.warn(`No associated record for ${where}`);
            report.failed += 1;
            continue;
          }
          if (target.match === "loose") {
            ctx.logger.info(`Loose match for ${where}: attaching to item ${target.id}`);
            report.looseMatches += 1;
          }

          try {
            const metadata = parseSidecar(await store.downloadFile(file.id));
            await store.addMetadata({ id: target.id, kind: target.kind }, metadata);
            ctx.logger.debug(`Attached ${where} to ${target.kind} ${target.id}`);
            report.applied += 1;
          } catch (err) {
            ctx.logger.warn(`Failed to add metadata from ${where}: ${errorMessage(err)}`);
            report.failed += 1;
          }
        }
      }
    },
  });

  ctx.logger.info(`Metadata applied: ${report.applied}, failed: ${report.failed}`);
  return report;
}
