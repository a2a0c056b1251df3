import * as path from "path";

export function toPosix(relative: string): string {
  return relative.split(path.sep).join("/");
}

/** Nombre base; para una raíz del sistema (`/`, `C:\`) devuelve la ruta completa */
export function baseName(absolute: string): string {
  return path.basename(absolute) || absolute;
}

/**
 * Extensión en minúsculas y sin punto.
 * `archive.tar.gz` → `gz`, `.bashrc` → `""`, `Makefile` → `""`
 */
export function extensionOf(name: string): string {
  return path.extname(name).slice(1).toLowerCase();
}

export function isHiddenName(name: string): boolean {
  return name.startsWith(".");
}
