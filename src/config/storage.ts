import fs from 'fs';
import path from 'path';

export interface StoragePaths {
  root: string;
  uploadsDir: string;
  convertedDir: string;
}

export const STORAGE_ROOT = path.resolve(process.cwd(), 'storage');

export function resolveStoragePaths(root: string = STORAGE_ROOT): StoragePaths {
  const resolvedRoot = path.resolve(root);

  return {
    root: resolvedRoot,
    uploadsDir: path.join(resolvedRoot, 'uploads'),
    convertedDir: path.join(resolvedRoot, 'converted')
  };
}

export async function ensureStorageDirectories(paths: StoragePaths): Promise<void> {
  await Promise.all([
    fs.promises.mkdir(paths.root, { recursive: true }),
    fs.promises.mkdir(paths.uploadsDir, { recursive: true }),
    fs.promises.mkdir(paths.convertedDir, { recursive: true })
  ]);
}
