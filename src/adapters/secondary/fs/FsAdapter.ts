import * as fs from "fs";
import * as nodePath from "path";
import { EntryKind } from "../../../domain/model/FileInfo";
import {
  FileSystemPort,
  PortDirectoryEntry,
  PortEntryStats,
} from "../../../application/ports/driven/FileSystemPort";

/**
 * Adaptador para el sistema de archivos
 */
export class FsAdapter implements FileSystemPort {
  async listDirectoryEntries(dirPath: string): Promise<PortDirectoryEntry[]> {
    const dirents = await fs.promises.readdir(dirPath, { withFileTypes: true });
    return dirents.map((dirent: fs.Dirent) => ({
      name: dirent.name,
      isFile: () => dirent.isFile(),
      isDirectory: () => dirent.isDirectory(),
      isSymbolicLink: () => dirent.isSymbolicLink(),
    }));
  }

  async lstat(filePath: string): Promise<PortEntryStats> {
    return toPortStats(await fs.promises.lstat(filePath));
  }

  async stat(filePath: string): Promise<PortEntryStats> {
    return toPortStats(await fs.promises.stat(filePath));
  }

  async readLink(linkPath: string): Promise<string> {
    return fs.promises.readlink(linkPath);
  }

  async writeFile(filePath: string, content: string): Promise<void> {
    await fs.promises.mkdir(nodePath.dirname(filePath), { recursive: true });
    await fs.promises.writeFile(filePath, content, "utf-8");
  }
}

function toPortStats(stats: fs.Stats): PortEntryStats {
  return {
    size: stats.size,
    mtimeMs: stats.mtimeMs,
    kind: kindOf(stats),
    dev: stats.dev,
    ino: stats.ino,
  };
}

function kindOf(stats: fs.Stats): EntryKind {
  if (stats.isSymbolicLink()) return "symlink";
  if (stats.isDirectory()) return "directory";
  if (stats.isFile()) return "file";
  return "special";
}
