import * as fs from 'fs/promises';
import * as path from 'path';
import { ModelRecord } from '../types/model-record.js';

export interface DeviceCapacity {
  totalBytes: number;
  freeBytes: number;
}

export interface StorageInfo {
  modelsDirectory: string;
  modelsTotalBytes: number;
  deviceTotalBytes: number | null; // null when the device could not be probed
  deviceFreeBytes: number | null;
}

export type DeviceProbe = (directory: string) => Promise<DeviceCapacity | null>;

/**
 * Capacity of the filesystem holding a directory.
 * Walks up to the nearest existing ancestor when the directory is missing.
 */
export async function probeDevice(directory: string): Promise<DeviceCapacity | null> {
  let current = path.resolve(directory);

  for (;;) {
    try {
      const stats = await fs.statfs(current);
      return {
        totalBytes: stats.blocks * stats.bsize,
        freeBytes: stats.bavail * stats.bsize,
      };
    } catch {
      const parent = path.dirname(current);
      if (parent === current) return null;
      current = parent;
    }
  }
}

export async function collectStorageInfo(
  records: readonly ModelRecord[],
  modelsDirectory: string,
  probe: DeviceProbe = probeDevice
): Promise<StorageInfo> {
  const capacity = await probe(modelsDirectory);

  return {
    modelsDirectory,
    modelsTotalBytes: records.reduce((total, record) => total + record.sizeBytes, 0),
    deviceTotalBytes: capacity?.totalBytes ?? null,
    deviceFreeBytes: capacity?.freeBytes ?? null,
  };
}
