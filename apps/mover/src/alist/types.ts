import type { RemoteEntryV1 } from "@alist-mover/shared";

/** Remote storage operations the monitor depends on. */
export interface RemoteDirectoryClient {
  authenticate(): Promise<void>;
  listDirectory(dirPath: string): Promise<RemoteEntryV1[]>;
  copyEntry(sourcePath: string, destPath: string): Promise<void>;
  deleteEntry(entryPath: string): Promise<void>;
}

export type AlistEnvelope = {
  code: number;
  message: string;
  data: unknown;
};

export type AlistListItem = {
  name: string;
  size: number;
  is_dir: boolean;
  modified?: string;
};
