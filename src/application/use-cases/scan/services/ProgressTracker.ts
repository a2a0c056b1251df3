import { ScanProgress } from "../../../../domain/model/ScanEvent";

/**
 * Acumulador compartido del progreso de un escaneo.
 * Los contadores solo crecen; las instantáneas se agrupan por `intervalMs`.
 */
export class ProgressTracker {
  private bytesDone = 0;
  private filesDone = 0;
  private directoriesDone = 0;
  private currentPath: string;
  private lastEmitAt = Number.NEGATIVE_INFINITY;

  constructor(
    rootPath: string,
    private readonly intervalMs: number,
    private readonly emit: (progress: ScanProgress) => void,
    private readonly clock: () => number = Date.now
  ) {
    this.currentPath = rootPath;
  }

  /** Una entrada que no es directorio quedó registrada en el árbol */
  recordEntry(path: string, size: number): void {
    this.bytesDone += size;
    this.filesDone++;
    this.currentPath = path;
    this.maybeEmit();
  }

  /** Un directorio quedó agregado (con todos sus hijos terminados) */
  recordDirectory(path: string): void {
    this.directoriesDone++;
    this.currentPath = path;
    this.maybeEmit();
  }

  snapshot(done: boolean = false): ScanProgress {
    return {
      bytesDone: this.bytesDone,
      filesDone: this.filesDone,
      directoriesDone: this.directoriesDone,
      currentPath: this.currentPath,
      done,
    };
  }

  /** Emite la instantánea final con `done: true`, sin agrupar */
  finish(): void {
    this.lastEmitAt = this.clock();
    this.emit(this.snapshot(true));
  }

  private maybeEmit(): void {
    const now = this.clock();
    if (this.intervalMs > 0 && now - this.lastEmitAt < this.intervalMs) return;
    this.lastEmitAt = now;
    this.emit(this.snapshot(false));
  }
}
