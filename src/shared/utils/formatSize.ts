const SIZE_UNITS = ["B", "KB", "MB", "GB", "TB", "PB"] as const;
const K = 1024;

/**
 * Formatea bytes en una cadena legible ("18.2 GB").
 * Los bytes se muestran enteros; el resto de unidades con un decimal.
 * La última unidad (PB) puede superar 1024.
 */
export function formatSize(bytes: number): string {
  if (!Number.isFinite(bytes) || bytes <= 0) {
    return "0 B";
  }

  let unitIndex = 0;
  let value = bytes;
  while (value >= K && unitIndex < SIZE_UNITS.length - 1) {
    value /= K;
    unitIndex++;
  }

  if (unitIndex === 0) {
    return `${Math.floor(value)} ${SIZE_UNITS[0]}`;
  }

  // 1023.95 KB redondearía a "1024.0 KB": se sube de unidad.
  if (Number(value.toFixed(1)) >= K && unitIndex < SIZE_UNITS.length - 1) {
    value /= K;
    unitIndex++;
  }
  return `${value.toFixed(1)} ${SIZE_UNITS[unitIndex]}`;
}

/**
 * Formatea una duración en milisegundos ("850ms", "1.4s")
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${Math.round(ms)}ms`;
  }
  return `${(ms / 1000).toFixed(1)}s`;
}
