import { copyFile, mkdir, readFile, readdir, rename, rm, stat, unlink, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { InboxFileSystemPort } from '../../../application/ports/InboxFileSystemPort.js';
import { fileStem } from '../../../domain/services/FileLifecycle.js';

export interface InboxLayout {
  inboxDir: string;
  processedDir: string;
  failedDir: string;
}

export const MARKER_SUFFIX = '.processed';

const csvFile = /\.csv$/i;

export const markerName = (filename: string): string => `${fileStem(filename)}${MARKER_SUFFIX}`;

const hasCode = (error: unknown, code: string): boolean =>
  error instanceof Error && 'code' in error && error.code === code;

/** rename, or copy-then-unlink when source and target sit on different filesystems. */
export const moveFile = async (source: string, target: string): Promise<void> => {
  try {
    await rename(source, target);
  } catch (error) {
    if (!hasCode(error, 'EXDEV')) {
      throw error;
    }

    const staging = `${target}.partial`;
    await copyFile(source, staging);
    await rename(staging, target);
    await unlink(source);
  }
};

export class NodeInboxFileSystem implements InboxFileSystemPort {
  constructor(private readonly layout: InboxLayout) {}

  async ensureLayout(): Promise<void> {
    await mkdir(this.layout.inboxDir, { recursive: true });
    await mkdir(this.layout.processedDir, { recursive: true });
    await mkdir(this.layout.failedDir, { recursive: true });
  }

  async listInbox(): Promise<string[]> {
    const entries = await readdir(this.layout.inboxDir, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isFile() && csvFile.test(entry.name))
      .map((entry) => entry.name)
      .sort();
  }

  async readInboxFile(filename: string): Promise<string> {
    return readFile(this.inboxPath(filename), 'utf8');
  }

  async hasMarker(filename: string): Promise<boolean> {
    try {
      await stat(path.join(this.layout.inboxDir, markerName(filename)));
      return true;
    } catch (error) {
      if (hasCode(error, 'ENOENT')) {
        return false;
      }
      throw error;
    }
  }

  async touchMarker(filename: string): Promise<void> {
    await writeFile(path.join(this.layout.inboxDir, markerName(filename)), '', { flag: 'a' });
  }

  async writeProcessed(filename: string, content: string): Promise<void> {
    // write beside the target, then rename into place
    const target = path.join(this.layout.processedDir, filename);
    const staging = `${target}.partial`;
    await writeFile(staging, content, 'utf8');
    await rename(staging, target);
  }

  async removeProcessed(filename: string): Promise<void> {
    await rm(path.join(this.layout.processedDir, filename), { force: true });
  }

  async moveToProcessed(filename: string, targetName: string): Promise<void> {
    await moveFile(this.inboxPath(filename), path.join(this.layout.processedDir, targetName));
  }

  async moveToFailed(filename: string): Promise<void> {
    await moveFile(this.inboxPath(filename), path.join(this.layout.failedDir, filename));
  }

  private inboxPath(filename: string): string {
    return path.join(this.layout.inboxDir, filename);
  }
}
