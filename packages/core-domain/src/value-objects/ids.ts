/** Opaque identifier assigned by the remote store (a Girder ObjectId). */
export type RemoteId = string;

/** Path relative to a scan root, `/`-separated. `""` is the root itself. */
export type RelativePath = string;
