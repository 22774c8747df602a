import type { DriveItem } from "../types.js";

export const FOLDER_MIME_TYPE = "application/vnd.google-apps.folder";

export type ListPage = {
  items: DriveItem[];
  nextPageToken?: string;
};

export type ListOptions = {
  orderBy?: string;
};

/** The slice of the Drive API the walker and worker depend on. */
export type DriveApi = {
  list(query: string, pageToken?: string, options?: ListOptions): Promise<ListPage>;
  get(fileId: string): Promise<DriveItem | null>;
  download(fileId: string, destination: string): Promise<void>;
};
