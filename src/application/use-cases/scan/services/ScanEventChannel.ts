import {
  ScanEvent,
  ScanEventListener,
  ScanResultEvent,
} from "../../../../domain/model/ScanEvent";
import { ProgressReporter } from "../../../ports/driven/ProgressReporter";
import { SCAN_MESSAGES } from "../../../../shared/constants/scanMessages";

/**
 * Cola ordenada de eventos entre el recorrido y los consumidores.
 * El recorrido solo encola; la entrega ocurre en `setImmediate`, nunca dentro del recorrido.
 * Los eventos de progreso consecutivos aún no entregados se agrupan en el más reciente.
 */
export class ScanEventChannel {
  private readonly listeners = new Set<ScanEventListener>();
  private queue: ScanEvent[] = [];
  private flushScheduled = false;
  private terminalEvent: ScanResultEvent | undefined;
  private terminalDelivered = false;
  private drainWaiters: Array<() => void> = [];

  constructor(private readonly logger: ProgressReporter) {}

  /** Encola un evento; tras el evento terminal se ignora cualquier otro */
  publish(event: ScanEvent): void {
    if (this.terminalEvent) return;
    if (event.type === "result") {
      this.terminalEvent = event;
    }

    const last = this.queue[this.queue.length - 1];
    if (event.type === "progress" && last?.type === "progress") {
      this.queue[this.queue.length - 1] = event;
    } else {
      this.queue.push(event);
    }
    this.scheduleFlush();
  }

  /**
   * Suscribe un listener. Si el evento terminal ya se entregó, se le reenvía.
   * @returns Función para cancelar la suscripción
   */
  subscribe(listener: ScanEventListener): () => void {
    this.listeners.add(listener);

    const terminal = this.terminalEvent;
    if (this.terminalDelivered && terminal) {
      setImmediate(() => {
        if (this.listeners.has(listener)) this.deliver(listener, terminal);
      });
    }

    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Se resuelve cuando la cola queda vacía */
  drained(): Promise<void> {
    if (!this.flushScheduled && this.queue.length === 0) {
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.drainWaiters.push(resolve);
    });
  }

  private scheduleFlush(): void {
    if (this.flushScheduled) return;
    this.flushScheduled = true;
    setImmediate(() => this.flush());
  }

  private flush(): void {
    const batch = this.queue;
    this.queue = [];

    for (const event of batch) {
      for (const listener of [...this.listeners]) {
        this.deliver(listener, event);
      }
      if (event.type === "result") this.terminalDelivered = true;
    }

    this.flushScheduled = false;
    const waiters = this.drainWaiters;
    this.drainWaiters = [];
    for (const resolve of waiters) resolve();
  }

  private deliver(listener: ScanEventListener, event: ScanEvent): void {
    try {
      listener(event);
    } catch (error) {
      this.logger.error(SCAN_MESSAGES.ERRORS.LISTENER_FAILED, error);
    }
  }
}
