import type { SliceTags, Vec3 } from '../types/series';
import type { VolumeDataType, VolumeTypedArray } from '../types/volume';

/** Spatial hints a source format may carry per slice. */
export type SliceSpatialInfo = {
  position?: Vec3;
  /** Row direction cosines followed by column direction cosines. */
  orientation?: [number, number, number, number, number, number];
  /** Row spacing (between rows) then column spacing (between columns). */
  pixelSpacing?: [number, number];
  sliceThickness?: number;
};

export type SourceSlice = {
  filePath: string;
  width: number;
  height: number;
  dataType: VolumeDataType;
  data: VolumeTypedArray;
  tags: SliceTags;
  spatial: SliceSpatialInfo;
};

/**
 * Reads one series of a given source format. `discoverSeriesFiles` owns the
 * slice ordering; an empty result means the directory holds no series.
 */
export interface SliceSeriesSource {
  readonly name: string;
  discoverSeriesFiles(seriesDir: string): Promise<string[]>;
  readSlice(filePath: string): Promise<SourceSlice>;
}

export type SliceGeometry = {
  position: Vec3;
  orientation: [number, number, number, number, number, number];
  pixelSpacing: [number, number];
  sliceThickness: number;
};

export type SlicePlane = {
  index: number;
  width: number;
  height: number;
  dataType: VolumeDataType;
  data: VolumeTypedArray;
  geometry: SliceGeometry;
};

/** A slice being assembled for output; tags are attached one at a time. */
export interface EncodableSlice {
  /** Throws `TagAttachError` when the key or value cannot be carried. */
  setTag(key: string, value: string): void;
  /** Throws `WriteError` when the slice cannot be encoded. */
  encode(): Uint8Array;
}

export interface SliceEncoder {
  readonly name: string;
  readonly defaultExtension: string;
  createSlice(plane: SlicePlane): EncodableSlice;
}

export type SliceFormat = {
  source: SliceSeriesSource;
  encoder: SliceEncoder;
};
