import type { SliceFormatName } from '../config';
import type { Logger } from '../logger';
import { createDicomFormat } from './dicom';
import { createTiffFormat } from './tiff';
import type { SliceFormat } from './types';

export type { EncodableSlice, SliceEncoder, SliceFormat, SlicePlane, SliceSeriesSource, SourceSlice } from './types';

export function createSliceFormat(name: SliceFormatName, logger?: Logger): SliceFormat {
  switch (name) {
    case 'dicom':
      return createDicomFormat(logger);
    case 'tiff':
      return createTiffFormat(logger);
    default: {
      const exhaustive: never = name;
      throw new Error(`Unsupported slice format: ${exhaustive}`);
    }
  }
}
