import ignore from "ignore";
import pLimit from "p-limit";
import * as path from "path";
import { FileInfo } from "../../../../domain/model/FileInfo";
import {
  FileSystemPort,
  PortDirectoryEntry,
  PortEntryStats,
} from "../../../ports/driven/FileSystemPort";
import { ProgressReporter } from "../../../ports/driven/ProgressReporter";
import { ScanOptions } from "../../../ports/driving/ScanOptions";
import { SCAN_MESSAGES } from "../../../../shared/constants/scanMessages";
import { toEntryScanError } from "../../../../shared/utils/fsErrors";
import { isHiddenName, toPosix } from "../../../../shared/utils/pathUtils";
import { compareFileInfos } from "../../../../shared/utils/sortUtils";
import { createDirectoryInfo, createLeafInfo } from "./nodeBuilders";
import { ProgressTracker } from "./ProgressTracker";

type IgnoreHandler = ReturnType<typeof ignore>;

/** Resultado de una llamada que no llegó a ejecutarse por cancelación o fallo */
const SKIPPED = Symbol("skipped");

export interface CancellationSignal {
  readonly isCancellationRequested: boolean;
}

/**
 * Recorrido recursivo en profundidad que construye el árbol de FileInfo.
 * Los subárboles hermanos avanzan en paralelo; toda llamada al sistema de archivos
 * pasa por un pool `p-limit` de `maxConcurrency`. La agregación es una reducción
 * post-orden: un directorio se crea solo cuando todos sus hijos terminaron.
 */
export class TreeWalker {
  private readonly ioLimiter: ReturnType<typeof pLimit>;
  private readonly ignoreHandler: IgnoreHandler | undefined;
  private readonly completedRootChildren: FileInfo[] = [];
  private rootPath = "";
  private rootModifiedTime = 0;
  private aborted = false;
  private interrupted = false;

  constructor(
    private readonly fsPort: FileSystemPort,
    private readonly logger: ProgressReporter,
    private readonly options: ScanOptions,
    private readonly tracker: ProgressTracker,
    private readonly cancellation: CancellationSignal
  ) {
    this.ioLimiter = pLimit(options.maxConcurrency);
    this.ignoreHandler =
      options.ignorePatterns.length > 0
        ? ignore().add(options.ignorePatterns)
        : undefined;
  }

  /** true si alguna unidad se omitió por cancelación */
  get wasInterrupted(): boolean {
    return this.interrupted;
  }

  /**
   * Recorre la raíz usando las entradas ya listadas en la validación previa.
   */
  async walk(
    rootPath: string,
    rootStats: PortEntryStats,
    rootEntries: PortDirectoryEntry[]
  ): Promise<FileInfo> {
    this.rootPath = rootPath;
    this.rootModifiedTime = rootStats.mtimeMs;
    // Un escaneo cancelado mientras esperaba turno no recorre nada
    if (this.shouldStop()) return this.partialRoot();
    return this.buildDirectory(
      rootPath,
      rootStats,
      new Set([identityOf(rootStats)]),
      rootEntries,
      (child) => this.completedRootChildren.push(child)
    );
  }

  /** Detiene el lanzamiento de trabajo nuevo tras un fallo interno */
  abort(): void {
    this.aborted = true;
  }

  /** Raíz construida con los subárboles de primer nivel que llegaron a terminar */
  partialRoot(): FileInfo {
    return createDirectoryInfo(
      this.rootPath,
      this.rootModifiedTime,
      [...this.completedRootChildren].sort(compareFileInfos)
    );
  }

  private shouldStop(): boolean {
    if (this.aborted) return true;
    if (this.cancellation.isCancellationRequested) {
      this.interrupted = true;
      return true;
    }
    return false;
  }

  /**
   * Ejecuta una llamada al sistema de archivos en el pool.
   * El checkpoint se evalúa al salir de la cola, de modo que el trabajo encolado
   * tras una cancelación o un fallo interno nunca llega a ejecutarse.
   */
  private io<T>(operation: () => Promise<T>): Promise<T | typeof SKIPPED> {
    return this.ioLimiter(
      async (): Promise<T | typeof SKIPPED> => (this.shouldStop() ? SKIPPED : operation())
    );
  }

  // HOT PATH: una llamada por directorio
  private async scanDirectory(
    dirPath: string,
    stats: PortEntryStats,
    ancestors: ReadonlySet<string>,
    linkTarget?: string
  ): Promise<FileInfo | undefined> {
    let entries: PortDirectoryEntry[] | typeof SKIPPED;
    try {
      entries = await this.io(() => this.fsPort.listDirectoryEntries(dirPath));
    } catch (error) {
      const scanError = toEntryScanError(error);
      this.logger.debug(
        SCAN_MESSAGES.DEBUG.ENTRY_UNREADABLE(dirPath, scanError.code ?? scanError.kind)
      );
      const unreadable = createDirectoryInfo(dirPath, stats.mtimeMs, [], {
        scanError,
        linkTarget,
      });
      this.tracker.recordDirectory(dirPath);
      return unreadable;
    }
    if (entries === SKIPPED) return undefined;

    return this.buildDirectory(dirPath, stats, ancestors, entries, undefined, linkTarget);
  }

  /**
   * Recorre las entradas de un directorio ya listado y agrega sus hijos.
   * Espera a que terminen todos los hermanos antes de propagar un fallo, así ninguna
   * llamada sigue en vuelo cuando el escaneo se da por terminado.
   */
  private async buildDirectory(
    dirPath: string,
    stats: PortEntryStats,
    ancestors: ReadonlySet<string>,
    entries: PortDirectoryEntry[],
    onChildComplete?: (child: FileInfo) => void,
    linkTarget?: string
  ): Promise<FileInfo> {
    const relevant = entries.filter((entry) => !this.isExcluded(dirPath, entry));
    const outcomes = await Promise.allSettled(
      relevant.map(async (entry) => {
        try {
          const child = await this.scanEntry(path.join(dirPath, entry.name), entry, ancestors);
          if (child && onChildComplete) onChildComplete(child);
          return child;
        } catch (error) {
          // Fallo interno: se deja de lanzar trabajo en todo el árbol
          this.abort();
          throw error;
        }
      })
    );

    const completed: FileInfo[] = [];
    for (const outcome of outcomes) {
      if (outcome.status === "rejected") throw outcome.reason;
      if (outcome.value) completed.push(outcome.value);
    }
    completed.sort(compareFileInfos);

    const node = createDirectoryInfo(dirPath, stats.mtimeMs, completed, { linkTarget });
    this.tracker.recordDirectory(dirPath);
    return node;
  }

  // HOT PATH: una llamada por entrada
  private async scanEntry(
    entryPath: string,
    entry: PortDirectoryEntry,
    ancestors: ReadonlySet<string>
  ): Promise<FileInfo | undefined> {
    if (this.shouldStop()) return undefined;

    let stats: PortEntryStats | typeof SKIPPED;
    try {
      stats = await this.io(() => this.fsPort.lstat(entryPath));
    } catch (error) {
      return this.recordUnreadable(entryPath, entry.isDirectory(), error);
    }
    if (stats === SKIPPED) return undefined;

    switch (stats.kind) {
      case "directory":
        return this.scanChildDirectory(entryPath, stats, ancestors);
      case "symlink":
        return this.scanSymlink(entryPath, stats, ancestors);
      case "file":
      case "special": {
        const size = stats.kind === "file" ? stats.size : 0;
        const leaf = createLeafInfo(entryPath, {
          kind: stats.kind,
          size,
          modifiedTime: stats.mtimeMs,
        });
        this.tracker.recordEntry(entryPath, size);
        return leaf;
      }
    }
  }

  private async scanChildDirectory(
    dirPath: string,
    stats: PortEntryStats,
    ancestors: ReadonlySet<string>,
    linkTarget?: string
  ): Promise<FileInfo | undefined> {
    // Checkpoint: no se abre un directorio nuevo tras la cancelación
    if (this.shouldStop()) return undefined;
    const lineage = this.options.followSymlinks
      ? new Set([...ancestors, identityOf(stats)])
      : ancestors;
    return this.scanDirectory(dirPath, stats, lineage, linkTarget);
  }

  private async scanSymlink(
    linkPath: string,
    linkStats: PortEntryStats,
    ancestors: ReadonlySet<string>
  ): Promise<FileInfo | undefined> {
    const linkTarget = await this.readLinkTarget(linkPath);
    if (linkTarget === SKIPPED) return undefined;

    if (!this.options.followSymlinks) {
      return this.recordLink(linkPath, linkStats, linkTarget);
    }

    let targetStats: PortEntryStats | typeof SKIPPED;
    try {
      targetStats = await this.io(() => this.fsPort.stat(linkPath));
    } catch (error) {
      // Enlace roto
      const scanError = toEntryScanError(error);
      this.logger.debug(
        SCAN_MESSAGES.DEBUG.ENTRY_UNREADABLE(linkPath, scanError.code ?? scanError.kind)
      );
      const broken = createLeafInfo(linkPath, {
        kind: "symlink",
        size: 0,
        modifiedTime: linkStats.mtimeMs,
        linkTarget,
        scanError,
      });
      this.tracker.recordEntry(linkPath, 0);
      return broken;
    }
    if (targetStats === SKIPPED) return undefined;

    if (targetStats.kind === "directory") {
      if (ancestors.has(identityOf(targetStats))) {
        this.logger.debug(SCAN_MESSAGES.DEBUG.CYCLE_SKIPPED(linkPath));
        return this.recordLink(linkPath, linkStats, linkTarget);
      }
      return this.scanChildDirectory(linkPath, targetStats, ancestors, linkTarget);
    }

    const size = targetStats.kind === "file" ? targetStats.size : 0;
    const followed = createLeafInfo(linkPath, {
      kind: targetStats.kind === "file" ? "file" : "special",
      size,
      modifiedTime: targetStats.mtimeMs,
      linkTarget,
    });
    this.tracker.recordEntry(linkPath, size);
    return followed;
  }

  private recordLink(
    linkPath: string,
    linkStats: PortEntryStats,
    linkTarget: string | undefined
  ): FileInfo {
    const link = createLeafInfo(linkPath, {
      kind: "symlink",
      size: linkStats.size,
      modifiedTime: linkStats.mtimeMs,
      linkTarget,
    });
    this.tracker.recordEntry(linkPath, linkStats.size);
    return link;
  }

  private recordUnreadable(
    entryPath: string,
    isDirectory: boolean,
    error: unknown
  ): FileInfo {
    const scanError = toEntryScanError(error);
    this.logger.debug(
      SCAN_MESSAGES.DEBUG.ENTRY_UNREADABLE(entryPath, scanError.code ?? scanError.kind)
    );

    if (isDirectory) {
      const dir = createDirectoryInfo(entryPath, 0, [], { scanError });
      this.tracker.recordDirectory(entryPath);
      return dir;
    }
    const leaf = createLeafInfo(entryPath, {
      kind: "file",
      size: 0,
      modifiedTime: 0,
      scanError,
    });
    this.tracker.recordEntry(entryPath, 0);
    return leaf;
  }

  private async readLinkTarget(
    linkPath: string
  ): Promise<string | undefined | typeof SKIPPED> {
    try {
      return await this.io(() => this.fsPort.readLink(linkPath));
    } catch (error) {
      this.logger.debug(SCAN_MESSAGES.DEBUG.LINK_UNREADABLE(linkPath), error);
      return undefined;
    }
  }

  private isExcluded(dirPath: string, entry: PortDirectoryEntry): boolean {
    if (this.options.skipHidden && isHiddenName(entry.name)) return true;

    const absolutePath = path.join(dirPath, entry.name);
    if (this.ignoreHandler) {
      const relativePath = toPosix(path.relative(this.rootPath, absolutePath));
      const testPath = entry.isDirectory() ? `${relativePath}/` : relativePath;
      if (this.ignoreHandler.ignores(testPath)) return true;
    }

    return this.options.excludePredicate?.(absolutePath) ?? false;
  }
}

function identityOf(stats: PortEntryStats): string {
  return `${stats.dev}:${stats.ino}`;
}
