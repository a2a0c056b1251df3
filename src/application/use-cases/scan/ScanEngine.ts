import * as path from "path";
import { FileInfo } from "../../../domain/model/FileInfo";
import { ScanEventListener } from "../../../domain/model/ScanEvent";
import {
  InvalidRootReason,
  ScanFailure,
  ScanResult,
  ScanState,
  ScanSummary,
} from "../../../domain/model/ScanResult";
import {
  FileSystemPort,
  PortDirectoryEntry,
  PortEntryStats,
} from "../../ports/driven/FileSystemPort";
import { ProgressReporter } from "../../ports/driven/ProgressReporter";
import { ScanOptions } from "../../ports/driving/ScanOptions";
import { ScanHandle, ScanUseCase } from "../../ports/driving/ScanUseCase";
import { ConsoleProgressReporter } from "../../../adapters/secondary/reporting/ConsoleProgressReporter";
import { SCAN_MESSAGES } from "../../../shared/constants/scanMessages";
import {
  DEFAULT_SCAN_OPTIONS,
  resolveScanOptions,
} from "../../../shared/config/scanConfiguration";
import { ScanInProgressError } from "../../../shared/errors/scanErrors";
import { formatDuration, formatSize } from "../../../shared/utils/formatSize";
import { classifyFsError, errorMessageOf } from "../../../shared/utils/fsErrors";
import { countDirectories } from "../../../shared/utils/treeAccessors";
import { ProgressTracker } from "./services/ProgressTracker";
import { ScanSession } from "./services/ScanSession";
import { TreeWalker } from "./services/TreeWalker";

/**
 * Qué hacer si se inicia un escaneo mientras otro sigue en curso:
 * `reject` lanza ScanInProgressError, `replace` cancela el anterior, espera su
 * resultado y arranca el nuevo.
 */
export type ConcurrentScanPolicy = "reject" | "replace";

export interface ScanEngineSettings {
  concurrentScanPolicy?: ConcurrentScanPolicy;

  /** Opciones base sobre las que se aplican las de cada `start` */
  defaultOptions?: Readonly<ScanOptions>;

  clock?: () => number;
}

type PreflightOutcome =
  | { ok: true; stats: PortEntryStats; entries: PortDirectoryEntry[] }
  | { ok: false; failure: ScanFailure };

export class ScanEngine implements ScanUseCase {
  private readonly logger: ProgressReporter;
  private readonly policy: ConcurrentScanPolicy;
  private readonly defaultOptions: Readonly<ScanOptions>;
  private readonly clock: () => number;
  private activeSession: ScanSession | undefined;

  constructor(
    private readonly fsPort: FileSystemPort,
    logger?: ProgressReporter,
    settings: ScanEngineSettings = {}
  ) {
    this.logger = logger ?? new ConsoleProgressReporter(false, false);
    this.policy = settings.concurrentScanPolicy ?? "reject";
    this.defaultOptions = settings.defaultOptions ?? DEFAULT_SCAN_OPTIONS;
    this.clock = settings.clock ?? Date.now;
  }

  get state(): ScanState {
    return this.activeSession?.state ?? "idle";
  }

  async start(
    rootPath: string,
    overrides: Partial<ScanOptions> = {}
  ): Promise<ScanHandle> {
    const options = resolveScanOptions(overrides, this.defaultOptions);
    const absoluteRoot = path.resolve(rootPath);

    const session = this.claimEngine(absoluteRoot);
    if (session.previous) {
      // Solo un escaneo toca el disco a la vez: el nuevo espera al que reemplaza
      await session.previous.result;
    }

    const startedAt = this.clock();
    const preflight = await this.preflight(absoluteRoot);
    if (!preflight.ok) {
      this.logger.error(preflight.failure.message);
      await session.current.finish({
        status: "failed",
        rootPath: absoluteRoot,
        failure: preflight.failure,
      });
      return session.current;
    }

    this.logger.info(
      SCAN_MESSAGES.INFO.SCAN_STARTED(absoluteRoot, options.maxConcurrency)
    );
    this.run(
      session.current,
      options,
      preflight.stats,
      preflight.entries,
      startedAt
    ).catch((error: unknown) => {
      this.logger.error(
        SCAN_MESSAGES.ERRORS.INTERNAL_FAULT(absoluteRoot, errorMessageOf(error)),
        error
      );
    });
    return session.current;
  }

  cancel(handle: ScanHandle): void {
    handle.cancel();
  }

  subscribe(handle: ScanHandle, listener: ScanEventListener): () => void {
    return handle.subscribe(listener);
  }

  /**
   * Reserva el motor de forma síncrona, antes de cualquier `await`, para que dos
   * `start` del mismo tick no puedan pasar ambos la comprobación.
   * Con `replace` el anterior queda cancelado y el llamador debe esperar su resultado.
   */
  private claimEngine(nextRoot: string): {
    current: ScanSession;
    previous: ScanSession | undefined;
  } {
    const running = this.activeSession;
    const previous = running && !running.isSettled ? running : undefined;
    if (previous && this.policy === "reject") {
      throw new ScanInProgressError(previous.rootPath);
    }

    const current = new ScanSession(nextRoot, this.logger);
    current.markRunning();
    this.activeSession = current;
    if (!previous) return { current, previous };

    this.logger.info(SCAN_MESSAGES.INFO.REPLACING_SCAN(previous.rootPath, nextRoot));
    previous.cancel();
    return { current, previous };
  }

  private async preflight(rootPath: string): Promise<PreflightOutcome> {
    let stats: PortEntryStats;
    try {
      stats = await this.fsPort.stat(rootPath);
    } catch (error) {
      const reason: InvalidRootReason =
        classifyFsError(error) === "not-found" ? "not-found" : "inaccessible";
      return { ok: false, failure: invalidRoot(rootPath, reason, errorMessageOf(error)) };
    }

    if (stats.kind !== "directory") {
      return { ok: false, failure: invalidRoot(rootPath, "not-a-directory") };
    }

    try {
      const entries = await this.fsPort.listDirectoryEntries(rootPath);
      return { ok: true, stats, entries };
    } catch (error) {
      return {
        ok: false,
        failure: invalidRoot(rootPath, "inaccessible", errorMessageOf(error)),
      };
    }
  }

  private async run(
    session: ScanSession,
    options: ScanOptions,
    rootStats: PortEntryStats,
    rootEntries: PortDirectoryEntry[],
    startedAt: number
  ): Promise<void> {
    const label = `ScanEngine.run ${session.id}`;
    this.logger.startOperation(label);

    let tracker: ProgressTracker | undefined;
    let walker: TreeWalker | undefined;
    let result: ScanResult;
    try {
      tracker = new ProgressTracker(
        session.rootPath,
        options.progressIntervalMs,
        (progress) => session.publishProgress(progress),
        this.clock
      );
      walker = new TreeWalker(this.fsPort, this.logger, options, tracker, session);

      const root = await walker.walk(session.rootPath, rootStats, rootEntries);
      tracker.finish();
      const summary = this.summarize(root, startedAt);
      result = walker.wasInterrupted
        ? { status: "cancelled", rootPath: session.rootPath, root, summary }
        : { status: "completed", rootPath: session.rootPath, root, summary };
      this.logger.info(
        SCAN_MESSAGES.INFO.SCAN_FINISHED(
          result.status,
          summary.totalFiles,
          formatSize(summary.totalSize),
          formatDuration(summary.elapsedMs)
        )
      );
    } catch (error) {
      walker?.abort();
      tracker?.finish();
      const message = errorMessageOf(error);
      this.logger.error(
        SCAN_MESSAGES.ERRORS.INTERNAL_FAULT(session.rootPath, message),
        error
      );
      const root = walker?.partialRoot();
      result = {
        status: "failed",
        rootPath: session.rootPath,
        failure: { kind: "internal-fault", message },
        ...(root ? { root, summary: this.summarize(root, startedAt) } : {}),
      };
    }

    this.logger.endOperation(label);
    await session.finish(result);
  }

  private summarize(root: FileInfo, startedAt: number): ScanSummary {
    const finishedAt = this.clock();
    return {
      totalSize: root.size,
      totalFiles: root.fileCount,
      totalDirectories: countDirectories(root),
      unreadableEntries: root.unreadableCount,
      elapsedMs: finishedAt - startedAt,
      startedAt,
      finishedAt,
    };
  }
}

function invalidRoot(
  rootPath: string,
  reason: InvalidRootReason,
  detail: string = ""
): ScanFailure {
  const message =
    reason === "not-found"
      ? SCAN_MESSAGES.ERRORS.ROOT_NOT_FOUND(rootPath)
      : reason === "not-a-directory"
        ? SCAN_MESSAGES.ERRORS.ROOT_NOT_DIRECTORY(rootPath)
        : SCAN_MESSAGES.ERRORS.ROOT_INACCESSIBLE(rootPath, detail);
  return { kind: "invalid-root", reason, message };
}
