export type ConnectivityResult =
  | { reachable: true }
  | { reachable: false; reason: string; tlsTrustFailure: boolean };

export interface ConnectivityCheck {
  /** One request against the server root, before anything else is attempted. */
  check(apiUrl: string): Promise<ConnectivityResult>;
}
