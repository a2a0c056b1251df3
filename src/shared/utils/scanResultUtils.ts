import { ScanResult, ScanState } from "../../domain/model/ScanResult";

export type ScanCompleteness =
  | "complete"
  | "complete-with-errors"
  | "partial"
  | "failed";

/**
 * Distingue un resultado completo y confiable, completo con entradas ilegibles,
 * parcial (cancelado) o fallido.
 */
export function describeCompleteness(result: ScanResult): ScanCompleteness {
  switch (result.status) {
    case "completed":
      return result.summary.unreadableEntries > 0
        ? "complete-with-errors"
        : "complete";
    case "cancelled":
      return "partial";
    case "failed":
      return "failed";
    default: {
      const unreachable: never = result;
      return unreachable;
    }
  }
}

export function isTerminalState(state: ScanState): boolean {
  return state === "completed" || state === "cancelled" || state === "failed";
}
