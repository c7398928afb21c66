import path from 'node:path';
import { fromFile } from 'geotiff';

import { LoadError } from '../../errors';
import { createLogger, type Logger } from '../../logger';
import { isRecord } from '../../shared/utils/schema';
import { listDirectoryFiles } from '../../shared/utils/fileNames';
import { detectDataType, ensureVolumeTypedArray } from '../../types/volume';
import type { SliceSeriesSource, SourceSlice } from '../types';
import { ASCII_TAG_NUMBERS } from './tiffTags';

const TIFF_EXTENSIONS = new Set(['.tif', '.tiff']);

export function isTiffFileName(fileName: string): boolean {
  return TIFF_EXTENSIONS.has(path.extname(fileName).toLowerCase());
}

function extractAsciiTags(fileDirectory: unknown): Record<string, string> {
  const tags: Record<string, string> = {};
  if (!isRecord(fileDirectory)) {
    return tags;
  }
  for (const name of ASCII_TAG_NUMBERS.keys()) {
    const value = fileDirectory[name];
    if (typeof value === 'string') {
      tags[name] = value.replace(/\0+$/, '');
    }
  }
  return tags;
}

/**
 * Single-image TIFF slices, one file per slice, ordered by file name. TIFF
 * carries no patient geometry, so slices report no spatial hints.
 */
export class TiffSeriesSource implements SliceSeriesSource {
  readonly name = 'tiff';
  private readonly logger: Logger;

  constructor(logger: Logger = createLogger('tiff-source')) {
    this.logger = logger;
  }

  async discoverSeriesFiles(seriesDir: string): Promise<string[]> {
    const files = await listDirectoryFiles(seriesDir);
    return files.filter((filePath) => isTiffFileName(filePath));
  }

  async readSlice(filePath: string): Promise<SourceSlice> {
    let tiff: Awaited<ReturnType<typeof fromFile>>;
    try {
      tiff = await fromFile(filePath);
    } catch (error) {
      throw new LoadError('Failed to open TIFF', { path: filePath, cause: error });
    }

    try {
      const imageCount = await tiff.getImageCount();
      if (imageCount === 0) {
        throw new LoadError('TIFF file does not contain any images', { path: filePath });
      }
      if (imageCount > 1) {
        this.logger.debug(`${path.basename(filePath)} holds ${imageCount} images; reading the first`);
      }

      const image = await tiff.getImage(0);
      const width = image.getWidth();
      const height = image.getHeight();
      const samplesPerPixel = image.getSamplesPerPixel();
      if (samplesPerPixel !== 1) {
        throw new LoadError(`Only single-sample images are supported (got ${samplesPerPixel})`, { path: filePath });
      }

      const raster: unknown = await image.readRasters({ interleave: true });
      const dataType = detectDataType(raster);
      const data = dataType ? ensureVolumeTypedArray(raster, dataType) : null;
      if (!dataType || !data) {
        throw new LoadError('Unsupported raster data type', { path: filePath });
      }
      if (data.length !== width * height) {
        throw new LoadError(`Raster holds ${data.length} samples, expected ${width * height}`, { path: filePath });
      }

      const fileDirectory: unknown = image.fileDirectory;
      return {
        filePath,
        width,
        height,
        dataType,
        data,
        tags: extractAsciiTags(fileDirectory),
        spatial: {}
      };
    } catch (error) {
      if (error instanceof LoadError) {
        throw error;
      }
      throw new LoadError('Failed to decode TIFF', { path: filePath, cause: error });
    } finally {
      await tiff.close();
    }
  }
}
