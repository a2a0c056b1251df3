import * as fs from "fs";
import * as path from "path";
import { ProgressReporter } from "../../../application/ports/driven/ProgressReporter";
import {
  VolumeCapacity,
  VolumePort,
} from "../../../application/ports/driven/VolumePort";
import { SCAN_MESSAGES } from "../../../shared/constants/scanMessages";
import { errorMessageOf } from "../../../shared/utils/fsErrors";

const LINUX_MOUNT_TABLE = "/proc/mounts";
const FALLBACK_MOUNT_POINTS = ["/home", "/mnt", "/media"];
const MAC_VOLUMES_DIR = "/Volumes";

// Sistemas de archivos virtuales que no representan almacenamiento
const PSEUDO_FILESYSTEMS = new Set([
  "autofs",
  "binfmt_misc",
  "bpf",
  "cgroup",
  "cgroup2",
  "configfs",
  "debugfs",
  "devpts",
  "devtmpfs",
  "efivarfs",
  "fusectl",
  "hugetlbfs",
  "mqueue",
  "nsfs",
  "proc",
  "pstore",
  "rpc_pipefs",
  "securityfs",
  "selinuxfs",
  "squashfs",
  "sysfs",
  "tracefs",
]);

/**
 * Extrae los puntos de montaje de una tabla con formato /proc/mounts,
 * descartando sistemas virtuales y duplicados.
 */
export function parseMountTable(content: string): string[] {
  const mountPoints: string[] = [];
  const seen = new Set<string>();
  for (const line of content.split("\n")) {
    const fields = line.trim().split(/\s+/);
    if (fields.length < 3) continue;
    const [, rawMountPoint, fsType] = fields;
    if (PSEUDO_FILESYSTEMS.has(fsType)) continue;
    const mountPoint = decodeMountPath(rawMountPoint);
    if (seen.has(mountPoint)) continue;
    seen.add(mountPoint);
    mountPoints.push(mountPoint);
  }
  return mountPoints;
}

/** /proc/mounts escapa espacios y tabuladores como secuencias octales (\040) */
function decodeMountPath(raw: string): string {
  return raw.replace(/\\([0-7]{3})/g, (_, octal: string) =>
    String.fromCharCode(parseInt(octal, 8))
  );
}

/**
 * Adaptador de volúmenes: tabla de montajes en Linux, letras de unidad en Windows,
 * `/` y `/Volumes/*` en macOS.
 */
export class VolumeAdapter implements VolumePort {
  constructor(
    private readonly logger: ProgressReporter,
    private readonly platform: NodeJS.Platform = process.platform
  ) {}

  async listMountPoints(): Promise<string[]> {
    switch (this.platform) {
      case "win32":
        return this.listWindowsDrives();
      case "linux":
        return this.listLinuxMounts();
      case "darwin":
        return this.listMacVolumes();
      default:
        return ["/", ...(await existing(FALLBACK_MOUNT_POINTS))];
    }
  }

  async getCapacity(mountPoint: string): Promise<VolumeCapacity> {
    const stats = await fs.promises.statfs(mountPoint);
    return {
      totalBytes: stats.blocks * stats.bsize,
      freeBytes: stats.bfree * stats.bsize,
      availableBytes: stats.bavail * stats.bsize,
    };
  }

  private async listLinuxMounts(): Promise<string[]> {
    try {
      const table = await fs.promises.readFile(LINUX_MOUNT_TABLE, "utf-8");
      const mounts = parseMountTable(table);
      if (mounts.length > 0) return mounts;
    } catch (error) {
      // Sin /proc (contenedores restringidos): se usan los montajes habituales
      this.logger.debug(
        SCAN_MESSAGES.DEBUG.MOUNT_TABLE_UNREADABLE(LINUX_MOUNT_TABLE, errorMessageOf(error))
      );
    }
    return ["/", ...(await existing(FALLBACK_MOUNT_POINTS))];
  }

  private async listWindowsDrives(): Promise<string[]> {
    const letters = Array.from({ length: 26 }, (_, i) =>
      `${String.fromCharCode(65 + i)}:\\`
    );
    return existing(letters);
  }

  private async listMacVolumes(): Promise<string[]> {
    let volumes: string[] = [];
    try {
      const names = await fs.promises.readdir(MAC_VOLUMES_DIR);
      volumes = names.map((name) => path.join(MAC_VOLUMES_DIR, name));
    } catch (error) {
      this.logger.debug(
        SCAN_MESSAGES.DEBUG.VOLUMES_DIR_UNREADABLE(MAC_VOLUMES_DIR, errorMessageOf(error))
      );
    }
    return ["/", ...volumes];
  }
}

async function existing(candidates: string[]): Promise<string[]> {
  const checks = await Promise.all(
    candidates.map(async (candidate) => {
      try {
        await fs.promises.access(candidate);
        return candidate;
      } catch {
        return undefined;
      }
    })
  );
  return checks.filter((candidate): candidate is string => candidate !== undefined);
}
