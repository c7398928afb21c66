import { createRequire } from 'node:module';

import { isRecord } from '../../shared/utils/schema';

// dcmjs ships a UMD bundle without type declarations; only what is used here is modelled.
const require = createRequire(import.meta.url);

/** One element of a tag-keyed dataset, the form dcmjs writes. */
export type DcmjsElement = {
  vr: string;
  Value: unknown[];
};

/** Keyed by the unpunctuated upper-case tag, e.g. `00100010`. */
export type DcmjsDataset = Record<string, DcmjsElement>;

export type DcmjsWriteOptions = {
  allowInvalidVRLength?: boolean;
};

export interface DcmjsDicomDict {
  dict: DcmjsDataset;
  write(options?: DcmjsWriteOptions): ArrayBuffer;
}

export type DcmjsData = {
  DicomDict: new (meta: DcmjsDataset) => DcmjsDicomDict;
  DicomMetaDictionary: {
    /** Standard data dictionary keyed by punctuated tag, e.g. `(0010,0010)`. */
    dictionary: Record<string, unknown>;
    uid(): string;
  };
};

function isDcmjsData(value: unknown): value is DcmjsData {
  if (!isRecord(value) || typeof value.DicomDict !== 'function') {
    return false;
  }
  const metaDictionary = value.DicomMetaDictionary;
  return (
    typeof metaDictionary === 'function' &&
    isRecord(Reflect.get(metaDictionary, 'dictionary')) &&
    typeof Reflect.get(metaDictionary, 'uid') === 'function'
  );
}

function loadDcmjsData(): DcmjsData {
  const loaded: unknown = require('dcmjs');
  const candidates = isRecord(loaded) ? [loaded.data, isRecord(loaded.default) ? loaded.default.data : undefined] : [];
  const data = candidates.find(isDcmjsData);
  if (!data) {
    throw new Error('dcmjs does not expose the expected data module.');
  }
  return data;
}

export const dcmjsData = loadDcmjsData();
