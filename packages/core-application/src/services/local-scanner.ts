import fs from "node:fs/promises";
import path from "node:path";

import type { LocalFileRecord, LocalTree } from "@bids-sync/core-domain";

import type { RunContext } from "../application/run-context.js";
import { classifyFile, toPosix } from "./file-kind.js";

async function walkFiles(rootAbs: string, dirAbs: string, out: Map<string, LocalFileRecord>) {
  const entries = await fs.readdir(dirAbs, { withFileTypes: true });
  for (const e of entries) {
    const abs = path.join(dirAbs, e.name);

    // symlinks are neither files nor directories here and are not followed
    if (e.isDirectory()) {
      await walkFiles(rootAbs, abs, out);
    } else if (e.isFile()) {
      const rel = toPosix(path.relative(rootAbs, abs));
      const stat = await fs.stat(abs);
      out.set(rel, {
        relativePath: rel,
        absolutePath: abs,
        sizeBytes: stat.size,
        kind: classifyFile(e.name),
      });
    }
  }
}

export async function scanLocalTree(params: {
  ctx: RunContext;
  rootDir: string;
}): Promise<LocalTree> {
  const rootAbs = path.resolve(params.rootDir);
  const files = new Map<string, LocalFileRecord>();

  await walkFiles(rootAbs, rootAbs, files);

  params.ctx.logger.info(`Found ${files.size} files locally`);
  return files;
}
