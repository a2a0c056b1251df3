import { FileInfo } from "../../domain/model/FileInfo";

/**
 * Recorre el árbol en preorden. El visitante recibe la profundidad (0 en la raíz).
 */
export function walkTree(
  node: FileInfo,
  visit: (node: FileInfo, depth: number) => void,
  depth: number = 0
): void {
  visit(node, depth);
  if (!node.isDirectory) return;
  for (const child of node.children) {
    walkTree(child, visit, depth + 1);
  }
}

/** Todas las entradas del árbol en preorden, raíz incluida */
export function flattenTree(root: FileInfo): FileInfo[] {
  const out: FileInfo[] = [];
  walkTree(root, (node) => out.push(node));
  return out;
}

export function findNode(root: FileInfo, absolutePath: string): FileInfo | undefined {
  if (root.path === absolutePath) return root;
  for (const child of root.children ?? []) {
    const found = findNode(child, absolutePath);
    if (found) return found;
  }
  return undefined;
}

export function countDirectories(root: FileInfo): number {
  let count = 0;
  walkTree(root, (node) => {
    if (node.isDirectory) count++;
  });
  return count;
}

/**
 * Directorios cuyo tamaño o conteos no coinciden con la suma de sus hijos.
 * Vacío para cualquier árbol producido por el motor, también si es parcial.
 */
export function findInconsistentDirectories(root: FileInfo): string[] {
  const inconsistent: string[] = [];
  walkTree(root, (node) => {
    if (!node.isDirectory) return;
    let size = 0;
    let fileCount = 0;
    let unreadableCount = node.scanError ? 1 : 0;
    for (const child of node.children) {
      size += child.size;
      fileCount += child.fileCount;
      unreadableCount += child.unreadableCount;
    }
    if (
      size !== node.size ||
      fileCount !== node.fileCount ||
      unreadableCount !== node.unreadableCount
    ) {
      inconsistent.push(node.path);
    }
  });
  return inconsistent;
}
