import { createWriteStream } from "node:fs";
import { pipeline } from "node:stream/promises";
import type { GoogleAuth, OAuth2Client } from "google-auth-library";
import { type drive_v3, google } from "googleapis";
import type { DriveItem } from "../types.js";
import { type DriveApi, FOLDER_MIME_TYPE, type ListOptions, type ListPage } from "./types.js";

const PAGE_SIZE = 100;
const ITEM_FIELDS = "id, name, mimeType, modifiedTime, size, parents";

function toDriveItem(file: drive_v3.Schema$File): DriveItem | null {
  if (!(file.id && file.name && file.mimeType)) {
    return null;
  }
  const size = file.size ? Number(file.size) : undefined;
  return {
    id: file.id,
    name: file.name,
    kind: file.mimeType === FOLDER_MIME_TYPE ? "folder" : "file",
    mimeType: file.mimeType,
    modifiedTime: file.modifiedTime ?? undefined,
    size: Number.isFinite(size) ? size : undefined,
    parents: file.parents ?? undefined,
  };
}

function httpStatus(err: unknown) {
  if (!err || typeof err !== "object") {
    return;
  }
  const { status, code } = err as { status?: unknown; code?: unknown };
  if (typeof status === "number") {
    return status;
  }
  if (typeof code === "number") {
    return code;
  }
  return;
}

export function createServiceAccountAuth(keyFile: string, scopes: string[]) {
  return new google.auth.GoogleAuth({ keyFile, scopes });
}

export class GoogleDriveApi implements DriveApi {
  private readonly drive: drive_v3.Drive;

  constructor(auth: OAuth2Client | GoogleAuth, options?: { timeoutMs?: number }) {
    this.drive = google.drive({
      version: "v3",
      auth,
      timeout: options?.timeoutMs,
    });
  }

  async list(query: string, pageToken?: string, options?: ListOptions): Promise<ListPage> {
    const { data } = await this.drive.files.list({
      q: query,
      spaces: "drive",
      fields: `nextPageToken, files(${ITEM_FIELDS})`,
      pageSize: PAGE_SIZE,
      pageToken,
      orderBy: options?.orderBy,
      includeItemsFromAllDrives: true,
      supportsAllDrives: true,
    });
    const items = (data.files ?? [])
      .map(toDriveItem)
      .filter((item): item is DriveItem => Boolean(item));
    return { items, nextPageToken: data.nextPageToken ?? undefined };
  }

  async get(fileId: string): Promise<DriveItem | null> {
    try {
      const { data } = await this.drive.files.get({
        fileId,
        fields: ITEM_FIELDS,
        supportsAllDrives: true,
      });
      return toDriveItem(data);
    } catch (err) {
      if (httpStatus(err) === 404) {
        return null;
      }
      throw err;
    }
  }

  async download(fileId: string, destination: string) {
    const response = await this.drive.files.get(
      { fileId, alt: "media", supportsAllDrives: true },
      { responseType: "stream" }
    );
    await pipeline(response.data, createWriteStream(destination));
  }
}
