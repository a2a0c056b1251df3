import {
  DirectoryInfo,
  EntryKind,
  EntryScanError,
  FileInfo,
  LeafInfo,
} from "../../../../domain/model/FileInfo";
import { baseName, extensionOf } from "../../../../shared/utils/pathUtils";

interface LeafDetails {
  kind: Exclude<EntryKind, "directory">;
  size: number;
  modifiedTime: number;
  linkTarget?: string;
  scanError?: EntryScanError;
}

/** Crea un nodo hoja (archivo, enlace o especial) congelado */
export function createLeafInfo(path: string, details: LeafDetails): LeafInfo {
  const name = baseName(path);
  const leaf: LeafInfo = {
    path,
    name,
    isDirectory: false,
    kind: details.kind,
    size: details.size,
    fileCount: 1,
    unreadableCount: details.scanError ? 1 : 0,
    modifiedTime: details.modifiedTime,
    extension: extensionOf(name),
    ...(details.linkTarget !== undefined ? { linkTarget: details.linkTarget } : {}),
    ...(details.scanError ? { scanError: details.scanError } : {}),
  };
  return Object.freeze(leaf);
}

/**
 * Crea un nodo de directorio congelado agregando los hijos ya terminados.
 * Los hijos deben llegar ya ordenados.
 */
export function createDirectoryInfo(
  path: string,
  modifiedTime: number,
  children: FileInfo[],
  extra: { scanError?: EntryScanError; linkTarget?: string } = {}
): DirectoryInfo {
  let size = 0;
  let fileCount = 0;
  let unreadableCount = extra.scanError ? 1 : 0;
  for (const child of children) {
    size += child.size;
    fileCount += child.fileCount;
    unreadableCount += child.unreadableCount;
  }

  const directory: DirectoryInfo = {
    path,
    name: baseName(path),
    isDirectory: true,
    kind: "directory",
    size,
    fileCount,
    unreadableCount,
    modifiedTime,
    extension: "",
    children: Object.freeze(children),
    ...(extra.linkTarget !== undefined ? { linkTarget: extra.linkTarget } : {}),
    ...(extra.scanError ? { scanError: extra.scanError } : {}),
  };
  return Object.freeze(directory);
}
