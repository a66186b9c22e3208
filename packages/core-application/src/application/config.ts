import { z } from "zod";

import { ConfigError } from "./errors.js";

function required(flag: string) {
  const message = `${flag} is required`;
  return z.string({ required_error: message }).min(1, message);
}

export const ImportModeSchema = z.enum(["reset", "overwrite-on-same-name"]);
export type ImportMode = z.infer<typeof ImportModeSchema>;

export const ImportConfigSchema = z.object({
  bidsDir: required("--bids-dir"),
  apiUrl: required("--api-url"),
  apiKey: required("--api-key (or GIRDER_API_KEY)"),
  folderId: required("--folder-id"),
  mode: ImportModeSchema.default("overwrite-on-same-name"),
  validate: z.boolean().default(true),
  verbose: z.boolean().default(false),
  compare: z.boolean().default(false),
  skipExisting: z.boolean().default(false),
  insecure: z.boolean().default(false),
  caCert: z.string().min(1).optional(),
});

export type ImportConfig = z.infer<typeof ImportConfigSchema>;

export function parseImportConfig(input: unknown): ImportConfig {
  const parsed = ImportConfigSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) =>
      i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message
    );
    throw new ConfigError("Invalid configuration", issues);
  }
  return parsed.data;
}

/**
 * Girder is frequently given without a scheme (`localhost:8080/api/v1`); such
 * URLs are taken as plain http. Trailing slashes are dropped.
 */
export function normalizeApiUrl(raw: string): string {
  const withScheme = /^[a-z][a-z0-9+.-]*:\/\//i.test(raw) ? raw : `http://${raw}`;
  return withScheme.replace(/\/+$/, "");
}

/** scheme://host[:port] of the API URL, used for the connectivity check. */
export function serverBaseUrl(apiUrl: string): string {
  const url = new URL(normalizeApiUrl(apiUrl));
  return `${url.protocol}//${url.host}`;
}
