const NEEDS_QUOTING = /[",\r\n]/;

export function toCsvField(value: string | number): string {
  const text = String(value);
  if (!NEEDS_QUOTING.test(text)) return text;
  return `"${text.replace(/"/g, '""')}"`;
}

export function toCsvLine(fields: ReadonlyArray<string | number>): string {
  return fields.map(toCsvField).join(",");
}

/** Cabecera + filas, una por línea, terminado en salto de línea */
export function toCsv(
  header: ReadonlyArray<string>,
  rows: ReadonlyArray<ReadonlyArray<string | number>>
): string {
  return [header, ...rows].map(toCsvLine).join("\n") + "\n";
}
