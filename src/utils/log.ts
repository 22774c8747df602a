function envFlag(name: string) {
  return process.env[name] === "1" || process.env[name] === "true";
}

const debugEnabled = envFlag("DRIVE_S3_SYNC_DEBUG");

const logTarget: "stdout" | "stderr" = envFlag("DRIVE_S3_SYNC_LOG_STDERR")
  ? "stderr"
  : "stdout";

function logLine(message: string) {
  if (logTarget === "stderr") {
    console.error(message);
    return;
  }
  console.log(message);
}

export function info(message: string) {
  logLine(message);
}

export function warn(message: string) {
  console.error(message);
}

export function error(message: string) {
  console.error(message);
}

export function debug(message: string) {
  if (!debugEnabled) {
    return;
  }
  logLine(message);
}
