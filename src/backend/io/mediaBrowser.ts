/**
 * Media Browser - directory listing behind the in-app file picker.
 * Returns sub-directories and the video files the extractor accepts.
 */
import { promises as fsPromises } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { isVideoFile } from '../../shared/media/videoFiles';
import type {
  DirectoryEntry,
  DirectoryListing,
} from '../../shared/types/extractor.types';

export async function listMediaDirectory(
  directory?: string,
): Promise<DirectoryListing> {
  const target = path.resolve(directory?.trim() || os.homedir());
  const dirents = await fsPromises.readdir(target, { withFileTypes: true });

  const entries: DirectoryEntry[] = [];
  for (const dirent of dirents) {
    if (dirent.name.startsWith('.')) continue;

    const entryPath = path.join(target, dirent.name);
    if (dirent.isDirectory()) {
      entries.push({ name: dirent.name, path: entryPath, kind: 'directory' });
    } else if (dirent.isFile() && isVideoFile(dirent.name)) {
      entries.push({ name: dirent.name, path: entryPath, kind: 'video' });
    }
  }

  entries.sort((a, b) => {
    if (a.kind !== b.kind) return a.kind === 'directory' ? -1 : 1;
    return a.name.localeCompare(b.name);
  });

  const parent = path.dirname(target);
  return {
    directory: target,
    parent: parent === target ? null : parent,
    entries,
  };
}
