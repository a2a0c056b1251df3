import { EntryKind } from "../../../domain/model/FileInfo";

export interface PortDirectoryEntry {
  name: string;
  isFile(): boolean;
  isDirectory(): boolean;
  isSymbolicLink(): boolean;
}

export interface PortEntryStats {
  size: number;
  mtimeMs: number;
  kind: EntryKind;
  dev: number;
  ino: number;
}

/**
 * Puerto secundario para interactuar con el sistema de archivos.
 * Las operaciones de lectura rechazan con el error del sistema (con su `code`)
 * para que el motor pueda clasificarlo.
 */
export interface FileSystemPort {
  /**
   * Lista las entradas directas de un directorio.
   * @param dirPath Ruta del directorio
   */
  listDirectoryEntries(dirPath: string): Promise<PortDirectoryEntry[]>;

  /** Estadísticas de la entrada sin seguir enlaces simbólicos */
  lstat(path: string): Promise<PortEntryStats>;

  /** Estadísticas siguiendo enlaces simbólicos */
  stat(path: string): Promise<PortEntryStats>;

  readLink(path: string): Promise<string>;

  /** Escribe un archivo creando los directorios intermedios */
  writeFile(path: string, content: string): Promise<void>;
}
