import type { Logger } from '../../logger';
import type { SliceFormat } from '../types';
import { DicomSliceEncoder } from './dicomEncoder';
import { DicomSeriesSource } from './dicomSource';

export { DicomSlice, DicomSliceEncoder } from './dicomEncoder';
export { DicomSeriesSource } from './dicomSource';

export function createDicomFormat(logger?: Logger): SliceFormat {
  return {
    source: new DicomSeriesSource(logger),
    encoder: new DicomSliceEncoder()
  };
}
