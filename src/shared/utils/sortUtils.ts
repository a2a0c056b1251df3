import { FileInfo } from "../../domain/model/FileInfo";

/** Ordena directorios antes que archivos y, dentro de cada tipo, alfabéticamente */
export function compareFileInfos(a: FileInfo, b: FileInfo): number {
  if (a.isDirectory === b.isDirectory) {
    return a.name.localeCompare(b.name);
  }
  return a.isDirectory ? -1 : 1;
}

/** Comparación por unidades de código, independiente del locale */
export function compareOrdinal(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/** Tamaño descendente; a igual tamaño, ruta ascendente */
export function compareBySizeDesc(a: FileInfo, b: FileInfo): number {
  if (a.size !== b.size) return b.size - a.size;
  return compareOrdinal(a.path, b.path);
}
