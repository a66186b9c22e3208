import type { Agent } from "node:https";

import { Gaxios, GaxiosError } from "gaxios";

import { serverBaseUrl } from "../application/config.js";
import { errorMessage } from "../application/errors.js";
import type { ConnectivityCheck, ConnectivityResult } from "../ports/connectivity-check.js";

const DEFAULT_TIMEOUT_MS = 10_000;

// OpenSSL / Node error codes for an untrusted or invalid server certificate
const TLS_TRUST_CODES = new Set([
  "SELF_SIGNED_CERT_IN_CHAIN",
  "DEPTH_ZERO_SELF_SIGNED_CERT",
  "UNABLE_TO_VERIFY_LEAF_SIGNATURE",
  "UNABLE_TO_GET_ISSUER_CERT_LOCALLY",
  "CERT_HAS_EXPIRED",
  "ERR_TLS_CERT_ALTNAME_INVALID",
]);

export function isTlsTrustFailure(code: unknown): boolean {
  return typeof code === "string" && TLS_TRUST_CODES.has(code);
}

export class GirderConnectivityCheck implements ConnectivityCheck {
  private readonly http: Gaxios;
  private readonly timeoutMs: number;

  constructor(opts: { agent?: Agent; timeoutMs?: number } = {}) {
    this.http = new Gaxios(opts.agent ? { agent: opts.agent } : {});
    this.timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async check(apiUrl: string): Promise<ConnectivityResult> {
    const url = serverBaseUrl(apiUrl);
    try {
      const res = await this.http.request<unknown>({
        url,
        timeout: this.timeoutMs,
        retry: false,
        validateStatus: () => true,
      });
      if (res.status === 200) return { reachable: true };
      return { reachable: false, reason: `status ${res.status} from ${url}`, tlsTrustFailure: false };
    } catch (err) {
      const code = err instanceof GaxiosError ? err.code : undefined;
      return { reachable: false, reason: errorMessage(err), tlsTrustFailure: isTlsTrustFailure(code) };
    }
  }
}
