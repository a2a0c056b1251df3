import { ProgressReporter } from "../../../application/ports/driven/ProgressReporter";

export type ConsoleSink = Pick<
  Console,
  "log" | "warn" | "error" | "debug" | "time" | "timeEnd"
>;

/**
 * Implementación de ProgressReporter que usa console y puede añadir prefijos de nivel.
 */
export class ConsoleProgressReporter implements ProgressReporter {
  /**
   * @param verbose Si es true, muestra logs detallados (debug y los que empiezan con 🔍).
   * @param addLevelPrefixes Si es true, añade prefijos [INFO], [WARN], etc. a los mensajes.
   * @param sink Destino de los mensajes; por defecto la consola global.
   */
  constructor(
    private readonly verbose: boolean = false,
    private readonly addLevelPrefixes: boolean = false,
    private readonly sink: ConsoleSink = console
  ) {}

  startOperation(label: string): void {
    if (this.verbose) this.sink.time(label);
  }

  endOperation(label: string): void {
    if (this.verbose) this.sink.timeEnd(label);
  }

  info(message: string): void {
    if (
      !this.verbose &&
      message.startsWith("🔍") &&
      !message.includes("Error")
    ) {
      return;
    }
    this.sink.log(`${this.prefix("INFO")}${message}`);
  }

  warn(message: string): void {
    this.sink.warn(`${this.prefix("WARN")}${message}`);
  }

  error(message: string, error?: unknown): void {
    this.sink.error(`${this.prefix("ERROR")}${message}`, error || "");
  }

  debug(message: string, ...optionalParams: unknown[]): void {
    if (this.verbose) {
      this.sink.debug(`${this.prefix("DEBUG")}${message}`, ...optionalParams);
    }
  }

  private prefix(level: "INFO" | "WARN" | "ERROR" | "DEBUG"): string {
    return this.addLevelPrefixes ? `[${level}] ` : "";
  }
}
