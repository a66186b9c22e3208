import type { Logger } from "../ports/logger.js";

export type TlsTrust = {
  /** false accepts self-signed or otherwise untrusted certificates */
  rejectUnauthorized: boolean;
  caFile?: string;
};

/**
 * Everything a run needs besides its collaborators. Passed explicitly to each
 * service call; there is no module-level logging or TLS state. Verbosity is
 * the logger's level.
 */
export type RunContext = {
  logger: Logger;
  tls: TlsTrust;
};
