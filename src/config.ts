import path from 'node:path';

import { ConfigError } from './errors';
import { getNativeByteOrder, type ByteOrder } from './types/volume';

export type SliceFormatName = 'dicom' | 'tiff';

export const SLICE_FORMAT_NAMES: readonly SliceFormatName[] = ['dicom', 'tiff'];

export type ConverterConfig = {
  /** One subdirectory per series; the directory name is the series id. */
  rawDir: string;
  /** Holds `<series-id>.zarr` and `<series-id>.json`. */
  convertedDir: string;
  /** One output subdirectory per series id. */
  reconstructedDir: string;
  format: SliceFormatName;
  storeExtension: string;
  byteOrder: ByteOrder;
};

export const DEFAULT_RAW_DIR = 'data/raw';
export const DEFAULT_CONVERTED_DIR = 'data/converted';
export const DEFAULT_RECONSTRUCTED_DIR = 'data/reconstructed';
export const STORE_EXTENSION = '.zarr';

type Environment = Record<string, string | undefined>;

function readDirectory(env: Environment, key: string, fallback: string, cwd: string): string {
  const configured = env[key]?.trim();
  return path.resolve(cwd, configured ? configured : fallback);
}

function readFormat(env: Environment): SliceFormatName {
  const configured = env.SLICE_FORMAT?.trim().toLowerCase();
  if (!configured) {
    return 'dicom';
  }
  const match = SLICE_FORMAT_NAMES.find((name) => name === configured);
  if (!match) {
    throw new ConfigError(
      `SLICE_FORMAT must be one of ${SLICE_FORMAT_NAMES.join(', ')} (received "${configured}")`
    );
  }
  return match;
}

function readByteOrder(env: Environment): ByteOrder {
  const configured = env.STORE_BYTE_ORDER?.trim().toLowerCase();
  if (!configured) {
    return getNativeByteOrder();
  }
  if (configured !== 'little' && configured !== 'big') {
    throw new ConfigError(`STORE_BYTE_ORDER must be "little" or "big" (received "${configured}")`);
  }
  return configured;
}

export function loadConverterConfig(env: Environment = process.env, cwd: string = process.cwd()): ConverterConfig {
  return {
    rawDir: readDirectory(env, 'RAW_DIR', DEFAULT_RAW_DIR, cwd),
    convertedDir: readDirectory(env, 'CONVERTED_DIR', DEFAULT_CONVERTED_DIR, cwd),
    reconstructedDir: readDirectory(env, 'RECONSTRUCTED_DIR', DEFAULT_RECONSTRUCTED_DIR, cwd),
    format: readFormat(env),
    storeExtension: STORE_EXTENSION,
    byteOrder: readByteOrder(env)
  };
}

export type SeriesPaths = {
  storePath: string;
  sidecarPath: string;
  outputDir: string;
};

export function resolveSeriesPaths(config: ConverterConfig, seriesId: string): SeriesPaths {
  return {
    storePath: path.join(config.convertedDir, `${seriesId}${config.storeExtension}`),
    sidecarPath: path.join(config.convertedDir, `${seriesId}.json`),
    outputDir: path.join(config.reconstructedDir, seriesId)
  };
}
