import type { Volume } from './volume';

export type Vec3 = [number, number, number];

/** Row-major 3x3 matrix; its columns are the x, y and z axis directions. */
export type Direction = [number, number, number, number, number, number, number, number, number];

export const IDENTITY_DIRECTION: Direction = [1, 0, 0, 0, 1, 0, 0, 0, 1];

export type Geometry = {
  origin: Vec3;
  spacing: Vec3;
  direction: Direction;
  /** Width, height, depth. */
  size: Vec3;
  pixelId: number;
  pixelIdTypeAsString: string;
};

/**
 * Per-slice tags. Values are always strings at this boundary; consumers
 * reparse them according to the tag's own value representation.
 */
export type SliceTags = Readonly<Record<string, string>>;

export type MetadataRecord = {
  filenames: string[];
  geometry: Geometry;
  slicesMetadata: SliceTags[];
};

export type LoadedSeries = {
  volume: Volume;
  filenames: string[];
  slicesMetadata: SliceTags[];
  geometry: Geometry;
};

export function toMetadataRecord(series: LoadedSeries): MetadataRecord {
  return {
    filenames: [...series.filenames],
    geometry: series.geometry,
    slicesMetadata: [...series.slicesMetadata]
  };
}
