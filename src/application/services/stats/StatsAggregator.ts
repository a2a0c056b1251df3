import { FileInfo } from "../../../domain/model/FileInfo";
import { compareBySizeDesc, compareOrdinal } from "../../../shared/utils/sortUtils";
import { countDirectories, walkTree } from "../../../shared/utils/treeAccessors";

/**
 * Clave para las entradas sin extensión.
 * Contiene un separador de ruta, así que ningún nombre de archivo puede producirla.
 */
export const NO_EXTENSION_KEY = "n/a";

export type LargestItemsScope = "all" | "files" | "directories";

export interface ExtensionStats {
  count: number;
  size: number;
}

export interface TreeSummary {
  totalSize: number;
  totalFiles: number;
  totalDirectories: number;
  unreadableEntries: number;
}

/**
 * Vistas derivadas de un árbol terminado (o parcial).
 * Solo lectura: nunca modifica el árbol.
 */
export class StatsAggregator {
  /**
   * Las `limit` entradas más grandes del árbol, sin contar la raíz.
   * Orden: tamaño descendente, ruta ascendente en caso de empate.
   */
  largestItems(
    root: FileInfo,
    limit: number,
    scope: LargestItemsScope = "all"
  ): FileInfo[] {
    const top: FileInfo[] = [];
    if (limit <= 0) return top;

    walkTree(root, (node) => {
      if (node === root) return;
      if (scope === "files" && node.isDirectory) return;
      if (scope === "directories" && !node.isDirectory) return;
      pushTopItem(top, node, limit);
    });
    return top;
  }

  /**
   * Conteo y bytes por extensión, sin directorios.
   * Ordenado por bytes descendente y, a igualdad, por extensión.
   */
  extensionBreakdown(root: FileInfo): Map<string, ExtensionStats> {
    const stats = new Map<string, ExtensionStats>();
    walkTree(root, (node) => {
      if (node.isDirectory) return;
      const key = node.extension || NO_EXTENSION_KEY;
      const bucket = stats.get(key);
      if (bucket) {
        bucket.count++;
        bucket.size += node.size;
      } else {
        stats.set(key, { count: 1, size: node.size });
      }
    });

    return new Map(
      [...stats.entries()].sort(
        ([extA, a], [extB, b]) => b.size - a.size || compareOrdinal(extA, extB)
      )
    );
  }

  summarize(root: FileInfo): TreeSummary {
    return {
      totalSize: root.size,
      totalFiles: root.fileCount,
      totalDirectories: countDirectories(root),
      unreadableEntries: root.unreadableCount,
    };
  }
}

// HOT PATH: se llama para cada nodo del árbol
/**
 * Inserta un candidato en una lista ordenada por `compareBySizeDesc`,
 * manteniéndola limitada a `limit` elementos.
 */
function pushTopItem(top: FileInfo[], candidate: FileInfo, limit: number): void {
  if (top.length >= limit) {
    const last = top[top.length - 1];
    if (compareBySizeDesc(candidate, last) >= 0) return;
    top.pop();
  }

  let insertAt = top.length;
  for (let i = 0; i < top.length; i++) {
    if (compareBySizeDesc(candidate, top[i]) < 0) {
      insertAt = i;
      break;
    }
  }
  top.splice(insertAt, 0, candidate);
}
