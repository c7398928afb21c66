import type { Logger } from '../../logger';
import type { SliceFormat } from '../types';
import { TiffSliceEncoder } from './tiffEncoder';
import { TiffSeriesSource } from './tiffSource';

export { TiffSlice, TiffSliceEncoder } from './tiffEncoder';
export { TiffSeriesSource } from './tiffSource';
export { encodeGrayscaleTiff } from './tiffWriter';

export function createTiffFormat(logger?: Logger): SliceFormat {
  return {
    source: new TiffSeriesSource(logger),
    encoder: new TiffSliceEncoder()
  };
}
