import { FsAdapter } from "../../secondary/fs/FsAdapter";
import { VolumeAdapter } from "../../secondary/volumes/VolumeAdapter";
import { ConsoleProgressReporter } from "../../secondary/reporting/ConsoleProgressReporter";
import { ProgressReporter } from "../../../application/ports/driven/ProgressReporter";
import { ScanOptions } from "../../../application/ports/driving/ScanOptions";
import { ScanUseCase } from "../../../application/ports/driving/ScanUseCase";
import {
  ConcurrentScanPolicy,
  ScanEngine,
} from "../../../application/use-cases/scan/ScanEngine";
import { StatsAggregator } from "../../../application/services/stats/StatsAggregator";
import { ReportExporter } from "../../../application/services/export/ReportExporter";
import { DriveEnumerator } from "../../../application/services/drives/DriveEnumerator";
import {
  loadScanConfiguration,
  resolveScanOptions,
} from "../../../shared/config/scanConfiguration";

export interface Container {
  fsAdapter: FsAdapter;
  volumeAdapter: VolumeAdapter;
  logger: ProgressReporter;
  scanEngine: ScanUseCase;
  statsAggregator: StatsAggregator;
  reportExporter: ReportExporter;
  driveEnumerator: DriveEnumerator;
  defaultOptions: ScanOptions;
}

export interface ContainerOptions {
  /** Si se omite, se toma de STORAGE_SCOPE_VERBOSE */
  verboseLogging?: boolean;
  concurrentScanPolicy?: ConcurrentScanPolicy;
  env?: NodeJS.ProcessEnv;
}

/**
 * Raíz de composición: crea adaptadores y casos de uso con la configuración del entorno.
 * @throws InvalidOptionsError si el entorno contiene valores inválidos
 */
export function createContainer(options: ContainerOptions = {}): Container {
  const configuration = loadScanConfiguration(options.env ?? process.env);
  const verboseLogging = options.verboseLogging ?? configuration.verboseLogging;
  const defaultOptions = resolveScanOptions(configuration.options);

  const logger = new ConsoleProgressReporter(verboseLogging, true);
  const fsAdapter = new FsAdapter();
  const volumeAdapter = new VolumeAdapter(logger);
  const statsAggregator = new StatsAggregator();

  const scanEngine = new ScanEngine(fsAdapter, logger, {
    concurrentScanPolicy: options.concurrentScanPolicy,
    defaultOptions,
  });
  const reportExporter = new ReportExporter(fsAdapter, logger, statsAggregator);
  const driveEnumerator = new DriveEnumerator(volumeAdapter, logger);

  return {
    fsAdapter,
    volumeAdapter,
    logger,
    scanEngine,
    statsAggregator,
    reportExporter,
    driveEnumerator,
    defaultOptions,
  };
}
