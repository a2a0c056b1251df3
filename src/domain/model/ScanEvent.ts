import { ScanResult } from "./ScanResult";

/** Instantánea acumulada del trabajo terminado; nunca retrocede */
export interface ScanProgress {
  bytesDone: number;
  filesDone: number;
  directoriesDone: number;
  currentPath: string;
  done: boolean;
}

export type ScanProgressEvent = { type: "progress" } & ScanProgress;

export interface ScanResultEvent {
  type: "result";
  result: ScanResult;
}

export type ScanEvent = ScanProgressEvent | ScanResultEvent;

export type ScanEventListener = (event: ScanEvent) => void;
