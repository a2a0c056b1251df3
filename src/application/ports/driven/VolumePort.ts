export interface VolumeCapacity {
  totalBytes: number;
  freeBytes: number;
  availableBytes: number;
}

/**
 * Puerto secundario para la enumeración de volúmenes de la plataforma
 */
export interface VolumePort {
  /** Puntos de montaje candidatos (rutas o letras de unidad) */
  listMountPoints(): Promise<string[]>;

  /** Rechaza si el volumen no puede consultarse */
  getCapacity(mountPoint: string): Promise<VolumeCapacity>;
}
