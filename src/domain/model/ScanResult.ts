import { FileInfo } from "./FileInfo";

/** Totales de un escaneo terminado */
export interface ScanSummary {
  totalSize: number;
  totalFiles: number;
  totalDirectories: number;

  /** Entradas con `scanError` dentro del árbol publicado */
  unreadableEntries: number;

  elapsedMs: number;
  startedAt: number;
  finishedAt: number;
}

export type InvalidRootReason = "not-found" | "not-a-directory" | "inaccessible";

export type ScanFailure =
  | { kind: "invalid-root"; reason: InvalidRootReason; message: string }
  | { kind: "internal-fault"; message: string };

/**
 * Resultado terminal de un escaneo.
 * Los consumidores deben tratar las tres variantes de forma exhaustiva.
 */
export type ScanResult =
  | { status: "completed"; rootPath: string; root: FileInfo; summary: ScanSummary }
  | { status: "cancelled"; rootPath: string; root: FileInfo; summary: ScanSummary }
  | {
      status: "failed";
      rootPath: string;
      failure: ScanFailure;
      /** Subárboles terminados antes de un fallo interno; no son confiables */
      root?: FileInfo;
      summary?: ScanSummary;
    };

export type ScanStatus = ScanResult["status"];

export type ScanState = "idle" | "running" | ScanStatus;
