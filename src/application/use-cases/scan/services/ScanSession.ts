import { randomUUID } from "crypto";
import { ScanEventListener, ScanProgress } from "../../../../domain/model/ScanEvent";
import { ScanResult, ScanState } from "../../../../domain/model/ScanResult";
import { ProgressReporter } from "../../../ports/driven/ProgressReporter";
import { ScanHandle } from "../../../ports/driving/ScanUseCase";
import { SCAN_MESSAGES } from "../../../../shared/constants/scanMessages";
import { isTerminalState } from "../../../../shared/utils/scanResultUtils";
import { ScanEventChannel } from "./ScanEventChannel";

/**
 * Estado explícito de un escaneo: máquina de estados, bandera de cancelación
 * compartida con los workers y canal de eventos.
 */
export class ScanSession implements ScanHandle {
  readonly id = randomUUID();
  readonly result: Promise<ScanResult>;

  private currentState: ScanState = "idle";
  private cancellationRequested = false;
  private readonly channel: ScanEventChannel;
  private settle: (result: ScanResult) => void = () => undefined;

  constructor(
    readonly rootPath: string,
    private readonly logger: ProgressReporter
  ) {
    this.channel = new ScanEventChannel(logger);
    this.result = new Promise<ScanResult>((resolve) => {
      this.settle = resolve;
    });
  }

  get state(): ScanState {
    return this.currentState;
  }

  get isCancellationRequested(): boolean {
    return this.cancellationRequested;
  }

  get isSettled(): boolean {
    return isTerminalState(this.currentState);
  }

  cancel(): void {
    if (this.isSettled || this.cancellationRequested) return;
    this.cancellationRequested = true;
    this.logger.info(SCAN_MESSAGES.INFO.CANCEL_REQUESTED(this.rootPath));
  }

  subscribe(listener: ScanEventListener): () => void {
    return this.channel.subscribe(listener);
  }

  markRunning(): void {
    this.currentState = "running";
  }

  publishProgress(progress: ScanProgress): void {
    this.channel.publish({ type: "progress", ...progress });
  }

  /**
   * Publica el evento terminal y resuelve `result` cuando ya se entregó.
   */
  async finish(result: ScanResult): Promise<void> {
    this.currentState = result.status;
    this.channel.publish({ type: "result", result });
    await this.channel.drained();
    this.settle(result);
  }
}
