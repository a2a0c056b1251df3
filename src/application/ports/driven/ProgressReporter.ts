/**
 * Puerto de logging del motor y los servicios; cada caso de uso lo recibe por inyección.
 * No confundir con los eventos de progreso de un escaneo, que van por `ScanHandle.subscribe`.
 */
export interface ProgressReporter {
  /**
   * Inicia una operación con temporizador
   * @param label Etiqueta para identificar la operación
   */
  startOperation(label: string): void;

  /**
   * Finaliza una operación con temporizador
   * @param label Etiqueta para identificar la operación
   */
  endOperation(label: string): void;

  /**
   * Mensaje informativo; los que empiezan por 🔍 solo se muestran en modo verbose
   */
  info(message: string): void;

  /**
   * Reporta un mensaje de advertencia
   * @param message Mensaje de advertencia
   */
  warn(message: string): void;

  /**
   * Reporta un mensaje de error
   * @param message Mensaje de error
   * @param error Objeto de error opcional
   */
  error(message: string, error?: unknown): void;

  /**
   * Reporta un mensaje de depuración (solo en modo verbose)
   * @param message Mensaje a reportar
   * @param optionalParams Parámetros adicionales
   */
  debug(message: string, ...optionalParams: unknown[]): void;
}
