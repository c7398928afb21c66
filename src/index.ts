export {
  loadConverterConfig,
  resolveSeriesPaths,
  SLICE_FORMAT_NAMES,
  type ConverterConfig,
  type SeriesPaths,
  type SliceFormatName
} from './config';
export {
  ConfigError,
  describeError,
  DiscoveryError,
  IOError,
  LoadError,
  ParseError,
  ReadError,
  TagAttachError,
  WriteError
} from './errors';
export { createSliceFormat } from './formats';
export { createDicomFormat, DicomSeriesSource, DicomSliceEncoder } from './formats/dicom';
export { createTiffFormat, TiffSeriesSource, TiffSliceEncoder } from './formats/tiff';
export type {
  EncodableSlice,
  SliceEncoder,
  SliceFormat,
  SliceGeometry,
  SlicePlane,
  SliceSeriesSource,
  SliceSpatialInfo,
  SourceSlice
} from './formats/types';
export { computeSeriesGeometry, VolumeLoader } from './loaders/volumeLoader';
export { createLogger, setLogLevel, type Logger, type LogLevel } from './logger';
export {
  SeriesConverter,
  SeriesStageError,
  type BatchResult,
  type ConvertedSeries,
  type SeriesResult,
  type SeriesStage
} from './pipeline/seriesConverter';
export {
  parseMetadataRecord,
  readMetadataSidecar,
  serializeMetadataRecord,
  sidecarPathForStore,
  writeMetadataSidecar,
  type MetadataSidecarJson
} from './sidecar/metadataSidecar';
export {
  readChunkedStore,
  readChunkedStoreDescriptor,
  writeChunkedStore,
  type ChunkedStoreDescriptor,
  type WriteChunkedStoreOptions
} from './store/chunkedStore';
export type { Direction, Geometry, LoadedSeries, MetadataRecord, SliceTags, Vec3 } from './types/series';
export type { ByteOrder, Volume, VolumeDataType, VolumeShape, VolumeTypedArray } from './types/volume';
export {
  computeSliceGeometry,
  resolveSliceFileName,
  VolumeWriter,
  type SliceWriteOutcome,
  type TagFailure,
  type VolumeWriteResult
} from './writers/volumeWriter';
