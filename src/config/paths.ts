import os from "node:os";
import path from "node:path";

export function configDir() {
  return (
    process.env.DRIVE_S3_SYNC_HOME ?? path.join(os.homedir(), ".drive-s3-sync")
  );
}

export function configFilePath() {
  return path.join(configDir(), "config.json");
}

export function tokenFilePath() {
  return path.join(configDir(), "tokens.enc.json");
}

export function plainTokenFilePath() {
  return path.join(configDir(), "tokens.json");
}
