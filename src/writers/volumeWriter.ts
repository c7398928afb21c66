import fs from 'node:fs/promises';
import path from 'node:path';

import { describeError, WriteError } from '../errors';
import type { EncodableSlice, SliceEncoder, SliceGeometry } from '../formats/types';
import { createLogger, type Logger } from '../logger';
import type { Geometry, MetadataRecord, SliceTags } from '../types/series';
import { getVolumePlane, type Volume } from '../types/volume';

export type TagFailure = {
  key: string;
  message: string;
};

export type SliceWriteOutcome = {
  index: number;
  fileName: string;
  outputPath: string;
  ok: boolean;
  error?: string;
  tagFailures: TagFailure[];
};

export type VolumeWriteResult = {
  outputDir: string;
  slices: SliceWriteOutcome[];
  written: number;
  failed: number;
};

export type VolumeWriterOptions = {
  encoder: SliceEncoder;
  logger?: Logger;
};

/**
 * Output file name for slice `index`: the original base name while the record
 * has one, otherwise a zero-padded index with the first original extension
 * (or the encoder's default).
 */
export function resolveSliceFileName(index: number, filenames: readonly string[], defaultExtension: string): string {
  const original = filenames[index];
  if (original !== undefined) {
    return path.basename(original);
  }
  const first = filenames[0];
  const extension = first === undefined ? defaultExtension : path.extname(first);
  return `${String(index).padStart(4, '0')}${extension}`;
}

/** Position, orientation and spacing of slice `index` in a volume with `geometry`. */
export function computeSliceGeometry(geometry: Pick<Geometry, 'origin' | 'spacing' | 'direction'>, index: number): SliceGeometry {
  const { origin, spacing, direction } = geometry;
  const [d0, d1, d2, d3, d4, d5, d6, d7, d8] = direction;
  const offset = index * spacing[2];
  return {
    position: [origin[0] + offset * d2, origin[1] + offset * d5, origin[2] + offset * d8],
    orientation: [d0, d3, d6, d1, d4, d7],
    pixelSpacing: [spacing[1], spacing[0]],
    sliceThickness: spacing[2]
  };
}

async function resetDirectory(directory: string): Promise<void> {
  try {
    await fs.rm(directory, { recursive: true, force: true });
    await fs.mkdir(directory, { recursive: true });
  } catch (error) {
    throw new WriteError('Failed to prepare output directory', { path: directory, cause: error });
  }
}

/**
 * Writes a volume back out as one file per slice. Slices fail independently:
 * a slice that cannot be encoded or written is reported and skipped, and a tag
 * that cannot be attached is reported without affecting the slice.
 */
export class VolumeWriter {
  private readonly encoder: SliceEncoder;
  private readonly logger: Logger;

  constructor({ encoder, logger }: VolumeWriterOptions) {
    this.encoder = encoder;
    this.logger = logger ?? createLogger('volume-writer');
  }

  async write(volume: Volume, record: MetadataRecord, outputDir: string): Promise<VolumeWriteResult> {
    await resetDirectory(outputDir);

    const [depth, height, width] = volume.shape;
    const slices: SliceWriteOutcome[] = [];
    for (let index = 0; index < depth; index += 1) {
      const fileName = resolveSliceFileName(index, record.filenames, this.encoder.defaultExtension);
      const outcome = await this.writeSlice({
        index,
        fileName,
        outputPath: path.join(outputDir, fileName),
        volume,
        width,
        height,
        geometry: record.geometry,
        tags: record.slicesMetadata[index] ?? {}
      });
      slices.push(outcome);
    }

    const written = slices.filter((slice) => slice.ok).length;
    const failed = slices.length - written;
    if (failed > 0) {
      this.logger.warn(`Wrote ${written} of ${slices.length} slice(s) to ${outputDir}`);
    } else {
      this.logger.info(`Wrote ${written} slice(s) to ${outputDir}`);
    }
    return { outputDir, slices, written, failed };
  }

  private async writeSlice(input: {
    index: number;
    fileName: string;
    outputPath: string;
    volume: Volume;
    width: number;
    height: number;
    geometry: Geometry;
    tags: SliceTags;
  }): Promise<SliceWriteOutcome> {
    const { index, fileName, outputPath, volume } = input;
    const tagFailures: TagFailure[] = [];
    const outcome = (ok: boolean, error?: string): SliceWriteOutcome => ({
      index,
      fileName,
      outputPath,
      ok,
      ...(error === undefined ? {} : { error }),
      tagFailures
    });

    let slice: EncodableSlice;
    try {
      slice = this.encoder.createSlice({
        index,
        width: input.width,
        height: input.height,
        dataType: volume.dataType,
        data: getVolumePlane(volume, index),
        geometry: computeSliceGeometry(input.geometry, index)
      });
    } catch (error) {
      const message = describeError(error);
      this.logger.warn(`Slice ${index} (${fileName}) could not be prepared: ${message}`);
      return outcome(false, message);
    }

    for (const [key, value] of Object.entries(input.tags)) {
      try {
        slice.setTag(key, value);
      } catch (error) {
        tagFailures.push({ key, message: describeError(error) });
      }
    }
    if (tagFailures.length > 0) {
      this.logger.debug(`Slice ${index}: ${tagFailures.length} tag(s) not attached`);
    }

    let bytes: Uint8Array;
    try {
      bytes = slice.encode();
    } catch (error) {
      const message = describeError(error);
      this.logger.warn(`Slice ${index} (${fileName}) could not be encoded: ${message}`);
      return outcome(false, message);
    }

    try {
      await fs.writeFile(outputPath, bytes);
    } catch (error) {
      const message = describeError(new WriteError('Failed to write slice', { path: outputPath, cause: error }));
      this.logger.warn(`Slice ${index} (${fileName}) could not be written: ${message}`);
      return outcome(false, message);
    }

    return outcome(true);
  }
}
