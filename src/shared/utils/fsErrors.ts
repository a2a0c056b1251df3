import { EntryErrorKind, EntryScanError } from "../../domain/model/FileInfo";

const PERMISSION_CODES = new Set(["EACCES", "EPERM"]);
const NOT_FOUND_CODES = new Set(["ENOENT", "ENOTDIR", "ELOOP"]);

export function errorCodeOf(error: unknown): string | undefined {
  if (typeof error !== "object" || error === null || !("code" in error)) {
    return undefined;
  }
  const { code } = error;
  return typeof code === "string" ? code : undefined;
}

export function errorMessageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function classifyFsError(error: unknown): EntryErrorKind {
  const code = errorCodeOf(error);
  if (code && PERMISSION_CODES.has(code)) return "permission-denied";
  if (code && NOT_FOUND_CODES.has(code)) return "not-found";
  return "io-error";
}

/** Convierte un error del sistema de archivos en el dato que se adjunta al nodo */
export function toEntryScanError(error: unknown): EntryScanError {
  const code = errorCodeOf(error);
  return {
    kind: classifyFsError(error),
    ...(code ? { code } : {}),
    message: errorMessageOf(error),
  };
}
