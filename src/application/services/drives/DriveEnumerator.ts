import { DriveInfo } from "../../../domain/model/DriveInfo";
import { ProgressReporter } from "../../ports/driven/ProgressReporter";
import { VolumePort } from "../../ports/driven/VolumePort";
import { SCAN_MESSAGES } from "../../../shared/constants/scanMessages";
import { errorMessageOf } from "../../../shared/utils/fsErrors";

/**
 * Lista los volúmenes visibles con su capacidad.
 * El fallo al consultar un volumen queda anotado en su entrada y no afecta al resto.
 */
export class DriveEnumerator {
  constructor(
    private readonly volumePort: VolumePort,
    private readonly logger: ProgressReporter
  ) {}

  async listDrives(): Promise<DriveInfo[]> {
    let mountPoints: string[];
    try {
      mountPoints = await this.volumePort.listMountPoints();
    } catch (error) {
      this.logger.error(SCAN_MESSAGES.ERRORS.VOLUME_LIST_FAILED, error);
      return [];
    }

    return Promise.all(mountPoints.map((mountPoint) => this.describe(mountPoint)));
  }

  private async describe(mountPoint: string): Promise<DriveInfo> {
    try {
      const capacity = await this.volumePort.getCapacity(mountPoint);
      return { path: mountPoint, ...capacity };
    } catch (error) {
      const reason = errorMessageOf(error);
      this.logger.warn(SCAN_MESSAGES.ERRORS.VOLUME_QUERY_FAILED(mountPoint, reason));
      return {
        path: mountPoint,
        totalBytes: 0,
        freeBytes: 0,
        availableBytes: 0,
        error: reason,
      };
    }
  }
}
