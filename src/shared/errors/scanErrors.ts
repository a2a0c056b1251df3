import { SCAN_MESSAGES } from "../constants/scanMessages";

/**
 * Base de los errores que el motor lanza por uso incorrecto de su API.
 * Los fallos de lectura de entradas nunca se lanzan: son datos del árbol.
 */
export class ScanEngineError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Se intentó iniciar un escaneo con otro en curso y la política es `reject` */
export class ScanInProgressError extends ScanEngineError {
  constructor(readonly runningRootPath: string) {
    super(SCAN_MESSAGES.ERRORS.SCAN_IN_PROGRESS(runningRootPath));
  }
}

export class InvalidOptionsError extends ScanEngineError {
  constructor(readonly option: string, detail: string) {
    super(`Invalid scan option "${option}": ${detail}`);
  }
}
