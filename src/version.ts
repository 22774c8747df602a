import { readFileSync } from "node:fs";
import { z } from "zod";

const packageJsonSchema = z.object({
  name: z.string().optional(),
  version: z.string().optional(),
});

// dist/version.js and src/version.ts both sit one level below package.json.
const packageJsonUrl = new URL("../package.json", import.meta.url);
const packageJson = packageJsonSchema.parse(
  JSON.parse(readFileSync(packageJsonUrl, "utf-8"))
);

export const PACKAGE_NAME = packageJson.name ?? "drive-s3-sync";
export const PACKAGE_VERSION = packageJson.version ?? "0.0.0";
