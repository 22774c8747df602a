export type TokenSet = {
  accessToken: string;
  refreshToken?: string;
  refreshInvalid?: boolean;
  expiresAt: number;
  scopes: string[];
  tokenType?: string;
};

export type TokenStoreKind = "encrypted" | "plain";

export type AuthStatus = {
  status: "ok" | "missing" | "expired" | "locked" | "invalid";
  reason?: string;
};

export type SyncDefaults = {
  rootFolder?: string;
  bucket?: string;
  region?: string;
  endpoint?: string;
  clientSecretPath?: string;
  serviceAccountPath?: string;
  concurrency?: number;
  timeoutMs?: number;
};

export type ConfigFile = {
  tokenStore?: TokenStoreKind;
  defaults: SyncDefaults;
};

export type RemoteFolder = {
  id: string;
  name: string;
};

export type RemoteFile = {
  id: string;
  name: string;
  parentName: string;
  mimeType?: string;
  size?: number;
};

export type DriveItem = {
  id: string;
  name: string;
  kind: "folder" | "file";
  mimeType: string;
  modifiedTime?: string;
  size?: number;
  parents?: string[];
};

export type TransferStats = {
  total: number;
  downloaded: number;
  uploaded: number;
  skipped: number;
  failed: number;
};

export type HeadResult = "exists" | "missing";

export type FileOutcome =
  | { status: "uploaded"; key: string }
  | { status: "skipped"; key: string }
  | { status: "download-failed"; key: string; error: string }
  | { status: "upload-failed"; key: string; error: string };

export type SyncReport = {
  ok: boolean;
  stats: TransferStats;
  elapsedMs: number;
  reason?: string;
};
