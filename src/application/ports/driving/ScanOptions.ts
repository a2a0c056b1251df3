/**
 * Opciones de un escaneo
 */
export interface ScanOptions {
  /** Seguir enlaces simbólicos a directorios (por defecto no se siguen) */
  followSymlinks: boolean;

  /** Máximo de operaciones de sistema de archivos en vuelo */
  maxConcurrency: number;

  /** Devuelve true para omitir la entrada con esa ruta absoluta */
  excludePredicate?: (path: string) => boolean;

  /** Patrones estilo .gitignore relativos a la raíz del escaneo */
  ignorePatterns: string[];

  /** Omitir entradas cuyo nombre empieza por punto */
  skipHidden: boolean;

  /** Intervalo mínimo entre eventos de progreso; 0 emite tras cada unidad */
  progressIntervalMs: number;
}
