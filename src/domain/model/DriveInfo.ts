/**
 * Volumen montado visible para el usuario actual
 */
export interface DriveInfo {
  /** Punto de montaje o letra de unidad */
  path: string;

  totalBytes: number;
  freeBytes: number;

  /** Bytes libres disponibles para usuarios sin privilegios */
  availableBytes: number;

  /** Presente cuando no se pudo consultar la capacidad de este volumen */
  error?: string;
}
