import { isRecord } from '../../shared/utils/schema';
import { dcmjsData } from './dcmjs';

export type DicomVr = string;

export type DicomTag = {
  group: number;
  element: number;
};

/** Value representations stored as (padded) text. */
export const TEXT_VRS: ReadonlySet<DicomVr> = new Set([
  'AE',
  'AS',
  'CS',
  'DA',
  'DS',
  'DT',
  'IS',
  'LO',
  'LT',
  'PN',
  'SH',
  'ST',
  'TM',
  'UC',
  'UI',
  'UR',
  'UT'
]);

export const NUMERIC_VR_SIZES: ReadonlyMap<DicomVr, number> = new Map([
  ['US', 2],
  ['SS', 2],
  ['UL', 4],
  ['SL', 4],
  ['FL', 4],
  ['FD', 8]
]);

const TAG_KEY_PATTERN = /^([0-9a-f]{4})\|([0-9a-f]{4})$/i;
const SINGLE_VR_PATTERN = /^[A-Z]{2}$/;

export function parseTagKey(key: string): DicomTag | null {
  const match = TAG_KEY_PATTERN.exec(key);
  if (!match) {
    return null;
  }
  return {
    group: Number.parseInt(match[1] ?? '', 16),
    element: Number.parseInt(match[2] ?? '', 16)
  };
}

const hex4 = (value: number) => value.toString(16).padStart(4, '0').toUpperCase();

/** dicom-parser addresses elements as `xggggeeee`. */
export function tagKeyFromElementTag(elementTag: string): string | null {
  const match = /^x([0-9a-f]{4})([0-9a-f]{4})$/i.exec(elementTag);
  if (!match) {
    return null;
  }
  return `${match[1]}|${match[2]}`.toLowerCase();
}

/** dcmjs datasets are keyed `GGGGEEEE`. */
export function datasetKeyFromTag(tag: DicomTag): string {
  return `${hex4(tag.group)}${hex4(tag.element)}`;
}

function isPrivateCreator(tag: DicomTag): boolean {
  return tag.group % 2 === 1 && tag.element >= 0x0010 && tag.element <= 0x00ff;
}

function isRepeatingGroup(tag: DicomTag): boolean {
  const family = tag.group & 0xff00;
  return family === 0x5000 || family === 0x6000;
}

function lookupDictionaryVr(tag: DicomTag): string | undefined {
  const group = hex4(tag.group);
  const element = hex4(tag.element);
  const candidates = [`(${group},${element})`];
  if (isRepeatingGroup(tag)) {
    candidates.push(`(${group.slice(0, 2)}xx,${element})`, `(${group.slice(0, 2)}XX,${element})`);
  }
  const { dictionary } = dcmjsData.DicomMetaDictionary;
  for (const candidate of candidates) {
    const entry = dictionary[candidate];
    if (isRecord(entry) && typeof entry.vr === 'string') {
      return entry.vr;
    }
  }
  return undefined;
}

/**
 * Collapses a dictionary VR to one concrete VR. Entries that are US or SS
 * follow the pixel representation; OB or OW entries become OW.
 */
export function resolveDictionaryVr(vr: string, signedPixels: boolean): DicomVr | undefined {
  const code = vr.trim();
  if (SINGLE_VR_PATTERN.test(code)) {
    return code;
  }
  const lower = code.toLowerCase();
  let options: string[];
  if (lower === 'xs' || lower === 'xw') {
    options = ['US', 'SS'];
  } else if (lower === 'ox') {
    options = ['OB', 'OW'];
  } else {
    options = code.toUpperCase().split(/\s+OR\s+|\|/);
  }
  if (options.includes('US') && options.includes('SS')) {
    return signedPixels ? 'SS' : 'US';
  }
  if (options.includes('OW')) {
    return 'OW';
  }
  const [first] = options;
  return first !== undefined && SINGLE_VR_PATTERN.test(first) ? first : undefined;
}

/** VR of a `gggg|eeee` key from the standard dictionary, or undefined when it is not known. */
export function lookupVr(key: string, signedPixels = false): DicomVr | undefined {
  const tag = parseTagKey(key);
  if (!tag) {
    return undefined;
  }
  const dictionaryVr = lookupDictionaryVr(tag);
  if (dictionaryVr !== undefined) {
    return resolveDictionaryVr(dictionaryVr, signedPixels);
  }
  if (tag.element === 0x0000) {
    return 'UL';
  }
  if (isPrivateCreator(tag)) {
    return 'LO';
  }
  return undefined;
}
