import fs from "node:fs/promises";
import { Agent } from "node:https";
import { rootCertificates } from "node:tls";

import type { TlsTrust } from "../application/run-context.js";

/**
 * HTTPS agent carrying the run's trust settings. `undefined` for plain http
 * URLs: an https agent cannot serve them. A CA file is trusted on top of the
 * bundled root certificates, not instead of them.
 */
export async function createTlsAgent(apiUrl: string, tls: TlsTrust): Promise<Agent | undefined> {
  if (!apiUrl.toLowerCase().startsWith("https://")) return undefined;

  const ca = tls.caFile ? [...rootCertificates, await fs.readFile(tls.caFile)] : undefined;
  return new Agent({ rejectUnauthorized: tls.rejectUnauthorized, ca, keepAlive: true });
}
