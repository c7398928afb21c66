import { createRequire } from 'node:module';
import type * as DicomParserModule from 'dicom-parser';

// dicom-parser ships a UMD bundle, which exposes no named exports to ESM.
const require = createRequire(import.meta.url);

export const dicomParser: typeof DicomParserModule = require('dicom-parser');

export type DicomDataSet = ReturnType<typeof DicomParserModule.parseDicom>;

export type DicomElement = DicomDataSet['elements'][string];

export const PIXEL_DATA_ELEMENT = 'x7fe00010';

export const TRANSFER_SYNTAX = {
  implicitLittle: '1.2.840.10008.1.2',
  explicitLittle: '1.2.840.10008.1.2.1',
  explicitBig: '1.2.840.10008.1.2.2'
} as const;

export const SUPPORTED_TRANSFER_SYNTAXES: ReadonlySet<string> = new Set(Object.values(TRANSFER_SYNTAX));

/** Parses a Part 10 file; `headerOnly` stops before the pixel data. */
export function parseDicomBytes(bytes: Uint8Array, headerOnly = false): DicomDataSet {
  return dicomParser.parseDicom(bytes, headerOnly ? { untilTag: PIXEL_DATA_ELEMENT } : undefined);
}

/** Backslash-separated numeric value, or null when absent or malformed. */
export function readNumberList(dataSet: DicomDataSet, elementTag: string): number[] | null {
  const raw = dataSet.string(elementTag);
  if (raw === undefined || raw.trim() === '') {
    return null;
  }
  const values = raw.split('\\').map((part) => Number.parseFloat(part));
  return values.every((value) => Number.isFinite(value)) ? values : null;
}
