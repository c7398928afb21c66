import { DiscoveryError, LoadError } from '../errors';
import type { SliceSeriesSource, SourceSlice } from '../formats/types';
import { createLogger, type Logger } from '../logger';
import { IDENTITY_DIRECTION, type Direction, type Geometry, type LoadedSeries, type Vec3 } from '../types/series';
import { createWritableVolumeArray, getPixelIdEntry, type Volume } from '../types/volume';

const DEFAULT_ORIENTATION: [number, number, number, number, number, number] = [1, 0, 0, 0, 1, 0];

const dot = (left: Vec3, right: Vec3) => left[0] * right[0] + left[1] * right[1] + left[2] * right[2];

const cross = (left: Vec3, right: Vec3): Vec3 => [
  left[1] * right[2] - left[2] * right[1],
  left[2] * right[0] - left[0] * right[2],
  left[0] * right[1] - left[1] * right[0]
];

function isPositiveFinite(value: number | undefined): value is number {
  return value !== undefined && Number.isFinite(value) && value > 0;
}

function computeSliceSpacing(slices: readonly SourceSlice[], normal: Vec3): number {
  const first = slices[0];
  const last = slices[slices.length - 1];
  if (first && last && slices.length > 1 && first.spatial.position && last.spatial.position) {
    const [fx, fy, fz] = first.spatial.position;
    const [lx, ly, lz] = last.spatial.position;
    const spacing = dot([lx - fx, ly - fy, lz - fz], normal) / (slices.length - 1);
    if (isPositiveFinite(spacing)) {
      return spacing;
    }
  }
  const thickness = first?.spatial.sliceThickness;
  return isPositiveFinite(thickness) ? thickness : 1;
}

/**
 * Geometry of the assembled series. Direction columns are the row cosine,
 * the column cosine and their cross product.
 */
export function computeSeriesGeometry(slices: readonly SourceSlice[]): Geometry {
  const first = slices[0];
  if (!first) {
    throw new LoadError('Cannot compute geometry without slices');
  }

  const [r0, r1, r2, c0, c1, c2] = first.spatial.orientation ?? DEFAULT_ORIENTATION;
  const row: Vec3 = [r0, r1, r2];
  const column: Vec3 = [c0, c1, c2];
  const normal = cross(row, column);
  const direction: Direction =
    first.spatial.orientation === undefined
      ? [...IDENTITY_DIRECTION]
      : [r0, c0, normal[0], r1, c1, normal[1], r2, c2, normal[2]];

  const [rowSpacing, columnSpacing] = first.spatial.pixelSpacing ?? [1, 1];
  const { id, label } = getPixelIdEntry(first.dataType);

  return {
    origin: first.spatial.position ? [...first.spatial.position] : [0, 0, 0],
    spacing: [
      isPositiveFinite(columnSpacing) ? columnSpacing : 1,
      isPositiveFinite(rowSpacing) ? rowSpacing : 1,
      computeSliceSpacing(slices, normal)
    ],
    direction,
    size: [first.width, first.height, slices.length],
    pixelId: id,
    pixelIdTypeAsString: label
  };
}

function assembleVolume(slices: readonly SourceSlice[]): Volume {
  const first = slices[0];
  if (!first) {
    throw new LoadError('Cannot assemble a volume without slices');
  }
  const { width, height, dataType } = first;
  const sliceLength = width * height;

  for (const slice of slices) {
    if (slice.width !== width || slice.height !== height) {
      throw new LoadError(
        `All slices in a series must have identical dimensions (${slice.width}x${slice.height} vs ${width}x${height})`,
        { path: slice.filePath }
      );
    }
    if (slice.dataType !== dataType) {
      throw new LoadError(`All slices in a series must use the same sample type (${slice.dataType} vs ${dataType})`, {
        path: slice.filePath
      });
    }
    if (slice.data.length !== sliceLength) {
      throw new LoadError(`Slice holds ${slice.data.length} samples, expected ${sliceLength}`, { path: slice.filePath });
    }
  }

  const data = createWritableVolumeArray(dataType, sliceLength * slices.length);
  slices.forEach((slice, index) => {
    data.set(slice.data, index * sliceLength);
  });
  return { shape: [slices.length, height, width], dataType, data };
}

/** Reads one series directory into a volume plus the metadata needed to rebuild it. */
export class VolumeLoader {
  private readonly logger: Logger;

  constructor(
    private readonly source: SliceSeriesSource,
    logger: Logger = createLogger('volume-loader')
  ) {
    this.logger = logger;
  }

  async load(seriesDir: string): Promise<LoadedSeries> {
    const filenames = await this.source.discoverSeriesFiles(seriesDir);
    if (filenames.length === 0) {
      throw new DiscoveryError(`No ${this.source.name} slices found`, { path: seriesDir });
    }

    const slices: SourceSlice[] = [];
    for (const filePath of filenames) {
      slices.push(await this.source.readSlice(filePath));
    }

    const volume = assembleVolume(slices);
    const geometry = computeSeriesGeometry(slices);
    const [depth, height, width] = volume.shape;
    this.logger.info(`Loaded ${depth} slice(s) of ${width}x${height} ${volume.dataType} from ${seriesDir}`);

    return {
      volume,
      filenames: [...filenames],
      slicesMetadata: slices.map((slice) => ({ ...slice.tags })),
      geometry
    };
  }
}
