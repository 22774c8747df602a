import { promises as fs } from "node:fs";
import path from "node:path";

export async function ensureDir(dir: string) {
  await fs.mkdir(dir, { recursive: true });
}

export async function atomicWrite(
  filePath: string,
  contents: string,
  options?: { mode?: number }
) {
  const dir = path.dirname(filePath);
  const tempPath = path.join(dir, `.tmp-${Date.now()}-${process.pid}`);
  await fs.writeFile(tempPath, contents, { encoding: "utf8", mode: options?.mode });
  await fs.rename(tempPath, filePath);
}

const UNSAFE_NAME_CHARS = /[/\\\0]/g;

/** Drive names may contain slashes; local temp names may not. */
export function safeFileName(name: string) {
  const cleaned = name.replace(UNSAFE_NAME_CHARS, "_").trim();
  if (cleaned === "" || cleaned === "." || cleaned === "..") {
    return "_";
  }
  return cleaned;
}
