import { ScanEventListener } from "../../../domain/model/ScanEvent";
import { ScanResult, ScanState } from "../../../domain/model/ScanResult";
import { ScanOptions } from "./ScanOptions";

/**
 * Manejador de un escaneo concreto, devuelto por `ScanUseCase.start`
 */
export interface ScanHandle {
  readonly id: string;
  readonly rootPath: string;
  readonly state: ScanState;
  readonly isCancellationRequested: boolean;

  /** Se resuelve con el resultado terminal; nunca se rechaza */
  readonly result: Promise<ScanResult>;

  cancel(): void;

  /**
   * Suscribe un listener a los eventos del escaneo.
   * @returns Función para cancelar la suscripción
   */
  subscribe(listener: ScanEventListener): () => void;
}

/**
 * Puerto primario para el motor de escaneo
 */
export interface ScanUseCase {
  /** Estado del escaneo más reciente de esta instancia */
  readonly state: ScanState;

  /**
   * Valida la raíz e inicia el recorrido.
   * Una raíz inválida no rechaza: devuelve un manejador ya en estado `failed`.
   * @param rootPath Directorio raíz a escanear
   * @param options Opciones que sobrescriben las predeterminadas
   */
  start(rootPath: string, options?: Partial<ScanOptions>): Promise<ScanHandle>;

  cancel(handle: ScanHandle): void;

  subscribe(handle: ScanHandle, listener: ScanEventListener): () => void;
}
