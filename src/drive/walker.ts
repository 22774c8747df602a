import type { DriveItem, RemoteFile, RemoteFolder } from "../types.js";
import { debug, warn } from "../utils/log.js";
import { type DriveApi, FOLDER_MIME_TYPE, type ListOptions } from "./types.js";

export function escapeQueryValue(value: string) {
  return value.replace(/\\/g, "\\\\").replace(/'/g, "\\'");
}

export function folderByNameQuery(name: string) {
  return `mimeType = '${FOLDER_MIME_TYPE}' and name = '${escapeQueryValue(name)}' and trashed = false`;
}

export function childFoldersQuery(folderId: string) {
  return `'${escapeQueryValue(folderId)}' in parents and mimeType = '${FOLDER_MIME_TYPE}' and trashed = false`;
}

export function childFilesQuery(folderId: string) {
  return `'${escapeQueryValue(folderId)}' in parents and mimeType != '${FOLDER_MIME_TYPE}' and trashed = false`;
}

export type FolderSearch = {
  nameContains?: string;
  parentId?: string;
};

/**
 * Reads the dataset tree: root folder by name, its class folders, and the
 * files inside each class folder. Every listing is drained across pages
 * before it is returned.
 */
export class DriveWalker {
  private readonly api: DriveApi;

  constructor(api: DriveApi) {
    this.api = api;
  }

  async listAll(query: string, options?: ListOptions): Promise<DriveItem[]> {
    const items: DriveItem[] = [];
    let pageToken: string | undefined;
    let pages = 0;
    do {
      const page = await this.api.list(query, pageToken, options);
      items.push(...page.items);
      pageToken = page.nextPageToken || undefined;
      pages += 1;
    } while (pageToken);
    debug(`Listed ${items.length} item(s) over ${pages} page(s): ${query}`);
    return items;
  }

  async findRootFolder(name: string): Promise<RemoteFolder | null> {
    const matches = await this.listAll(folderByNameQuery(name), {
      orderBy: "createdTime",
    });
    const [first, ...others] = matches;
    if (!first) {
      return null;
    }
    if (others.length > 0) {
      warn(
        `Found ${matches.length} folders named "${name}"; using the oldest (${first.id}). Others: ${others
          .map((item) => item.id)
          .join(", ")}. Pass --root-id to choose explicitly.`
      );
    }
    return { id: first.id, name: first.name };
  }

  async getFolder(folderId: string): Promise<RemoteFolder | null> {
    const item = await this.api.get(folderId);
    if (!item || item.kind !== "folder") {
      return null;
    }
    return { id: item.id, name: item.name };
  }

  async listChildren(folderId: string): Promise<RemoteFolder[]> {
    const items = await this.listAll(childFoldersQuery(folderId), {
      orderBy: "name",
    });
    return items.map((item) => ({ id: item.id, name: item.name }));
  }

  async listFiles(folder: RemoteFolder): Promise<RemoteFile[]> {
    const items = await this.listAll(childFilesQuery(folder.id), {
      orderBy: "name",
    });
    return items.map((item) => ({
      id: item.id,
      name: item.name,
      parentName: folder.name,
      mimeType: item.mimeType,
      size: item.size,
    }));
  }

  searchFolders(search: FolderSearch = {}) {
    let query = `mimeType = '${FOLDER_MIME_TYPE}' and trashed = false`;
    if (search.nameContains) {
      query += ` and name contains '${escapeQueryValue(search.nameContains)}'`;
    }
    if (search.parentId) {
      query += ` and '${escapeQueryValue(search.parentId)}' in parents`;
    }
    return this.listAll(query, { orderBy: "name" });
  }

  /** Items directly inside `folderId`, optionally only those of the given MIME types. */
  listContents(folderId: string, mimeTypes: string[] = []) {
    let query = `'${escapeQueryValue(folderId)}' in parents and trashed = false`;
    if (mimeTypes.length > 0) {
      query += ` and (${mimeTypes
        .map((mimeType) => `mimeType = '${escapeQueryValue(mimeType)}'`)
        .join(" or ")})`;
    }
    return this.listAll(query, { orderBy: "folder,name" });
  }

  /** Breadcrumb from the topmost reachable ancestor down to `folderId`. */
  async folderPath(folderId: string): Promise<RemoteFolder[]> {
    const path: RemoteFolder[] = [];
    const seen = new Set<string>();
    let currentId: string | undefined = folderId;
    while (currentId && !seen.has(currentId)) {
      seen.add(currentId);
      const item = await this.api.get(currentId);
      if (!item) {
        break;
      }
      path.unshift({ id: item.id, name: item.name });
      currentId = item.parents?.[0];
    }
    return path;
  }
}
