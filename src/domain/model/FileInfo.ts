/** Clasificación de una entrada del sistema de archivos */
export type EntryKind = "file" | "directory" | "symlink" | "special";

/** Categoría de un fallo de lectura local a una entrada */
export type EntryErrorKind = "permission-denied" | "not-found" | "io-error";

/**
 * Error adjunto a una entrada que no pudo leerse por completo.
 * En un directorio indica que su tamaño e hijos son un agregado parcial.
 */
export interface EntryScanError {
  kind: EntryErrorKind;

  /** Código del sistema (EACCES, ENOENT, EIO...) si se conoce */
  code?: string;

  message: string;
}

interface FileInfoBase {
  /** Ruta absoluta nativa de la plataforma */
  readonly path: string;

  /** Nombre base derivado de la ruta */
  readonly name: string;

  /** Bytes: tamaño lógico para archivos, suma de los hijos para directorios */
  readonly size: number;

  /** 1 para cualquier entrada que no es directorio, suma de los hijos para directorios */
  readonly fileCount: number;

  /** Entradas del subárbol (incluida esta) que tienen `scanError` */
  readonly unreadableCount: number;

  /** Última modificación en milisegundos epoch, 0 si no se pudo leer */
  readonly modifiedTime: number;

  /** Sufijo en minúsculas sin punto; vacío en directorios y archivos sin extensión */
  readonly extension: string;

  /** Destino de un enlace simbólico, si se pudo leer */
  readonly linkTarget?: string;

  readonly scanError?: EntryScanError;
}

/** Directorio con su subárbol agregado */
export interface DirectoryInfo extends FileInfoBase {
  readonly isDirectory: true;
  readonly kind: "directory";

  /** Vacío (no ausente) si el directorio está vacío o no se pudo leer */
  readonly children: readonly FileInfo[];
}

/** Archivo, enlace o entrada especial */
export interface LeafInfo extends FileInfoBase {
  readonly isDirectory: false;
  readonly kind: Exclude<EntryKind, "directory">;
  readonly children?: undefined;
}

/**
 * Representa una entrada escaneada; `isDirectory` discrimina entre ambas variantes
 */
export type FileInfo = DirectoryInfo | LeafInfo;
