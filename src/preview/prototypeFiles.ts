import * as fs from 'fs';
import * as path from 'path';

export interface PrototypeFileInfo {
  filename: string;
  sizeBytes: number;
  modifiedAt: Date;
}

/** Published `.html` documents in `directory`, newest first. */
export async function listPrototypes(directory: string): Promise<PrototypeFileInfo[]> {
  let entries: fs.Dirent[];
  try {
    entries = await fs.promises.readdir(directory, { withFileTypes: true });
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return [];
    throw error;
  }

  const files = await Promise.all(
    entries
      .filter((entry) => entry.isFile() && entry.name.toLowerCase().endsWith('.html'))
      .map(async (entry): Promise<PrototypeFileInfo> => {
        const stat = await fs.promises.stat(path.join(directory, entry.name));
        return { filename: entry.name, sizeBytes: stat.size, modifiedAt: stat.mtime };
      })
  );

  return files.sort((a, b) => b.modifiedAt.getTime() - a.modifiedAt.getTime());
}
