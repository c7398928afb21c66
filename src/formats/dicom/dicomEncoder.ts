import { TagAttachError, WriteError } from '../../errors';
import { getNativeByteOrder, type VolumeDataType } from '../../types/volume';
import { copyTypedArrayBytes, swapByteOrderInPlace } from '../../utils/buffer';
import type { EncodableSlice, SliceEncoder, SlicePlane } from '../types';
import { dcmjsData, type DcmjsDataset, type DcmjsElement } from './dcmjs';
import { datasetKeyFromTag, lookupVr, NUMERIC_VR_SIZES, parseTagKey, TEXT_VRS, type DicomVr } from './dictionary';
import { TRANSFER_SYNTAX } from './parser';

type PixelLayout = {
  bitsAllocated: number;
  pixelRepresentation: number;
};

const MAX_SHORT_VALUE_LENGTH = 0xfffe;
const LONG_TEXT_VRS: ReadonlySet<DicomVr> = new Set(['UC', 'UR', 'UT']);
const SINGLE_VALUE_TEXT_VRS: ReadonlySet<DicomVr> = new Set(['LT', 'ST', 'UR', 'UT']);

/** Secondary Capture Image Storage. */
export const DEFAULT_SOP_CLASS_UID = '1.2.840.10008.5.1.4.1.1.7';
export const IMPLEMENTATION_CLASS_UID = '2.25.184736528193746501826354918273645019';
export const IMPLEMENTATION_VERSION_NAME = 'SLICESTORE_1';

const SOP_CLASS_KEY = '0008|0016';
const SOP_INSTANCE_KEY = '0008|0018';
const PHOTOMETRIC_KEY = '0028|0004';

const INTEGER_RANGES: ReadonlyMap<DicomVr, [number, number]> = new Map([
  ['US', [0, 0xffff]],
  ['SS', [-0x8000, 0x7fff]],
  ['UL', [0, 0xffffffff]],
  ['SL', [-0x80000000, 0x7fffffff]]
]);

const PIXEL_LAYOUTS: Partial<Record<VolumeDataType, PixelLayout>> = {
  uint8: { bitsAllocated: 8, pixelRepresentation: 0 },
  int8: { bitsAllocated: 8, pixelRepresentation: 1 },
  uint16: { bitsAllocated: 16, pixelRepresentation: 0 },
  int16: { bitsAllocated: 16, pixelRepresentation: 1 },
  uint32: { bitsAllocated: 32, pixelRepresentation: 0 },
  int32: { bitsAllocated: 32, pixelRepresentation: 1 }
};

const textEncoder = new TextEncoder();

/** `2.25.` root UID from the dcmjs generator. */
export function generateUid(): string {
  return dcmjsData.DicomMetaDictionary.uid();
}

/** Shortest rendering of `value` that fits the 16 characters a DS allows. */
export function formatDecimalString(value: number): string {
  const plain = String(value);
  if (plain.length <= 16) {
    return plain;
  }
  for (let precision = 15; precision > 0; precision -= 1) {
    const candidate = String(Number(value.toPrecision(precision)));
    if (candidate.length <= 16) {
      return candidate;
    }
  }
  return value.toExponential(6);
}

function checkTextValue(key: string, vr: DicomVr, value: string): void {
  const parts = value.split('\\').map((part) => part.trim());
  switch (vr) {
    case 'UI':
      if (!/^[0-9.\\]*$/.test(value)) {
        throw new TagAttachError(key, `"${value}" is not a valid UID`);
      }
      break;
    case 'IS':
      if (!parts.every((part) => part === '' || /^[+-]?\d+$/.test(part))) {
        throw new TagAttachError(key, `"${value}" is not an integer string`);
      }
      break;
    case 'DS':
      if (!parts.every((part) => part === '' || Number.isFinite(Number(part)))) {
        throw new TagAttachError(key, `"${value}" is not a decimal string`);
      }
      break;
    default:
      break;
  }
}

function parseNumericValue(key: string, vr: DicomVr, value: string): number[] {
  if (value.trim() === '') {
    return [];
  }
  const range = INTEGER_RANGES.get(vr);
  return value.split('\\').map((part) => {
    const parsed = Number(part.trim());
    if (part.trim() === '' || !Number.isFinite(parsed)) {
      throw new TagAttachError(key, `"${value}" is not numeric`);
    }
    if (range) {
      const [min, max] = range;
      if (!Number.isInteger(parsed) || parsed < min || parsed > max) {
        throw new TagAttachError(key, `${parsed} is out of range for ${vr}`);
      }
    }
    return parsed;
  });
}

/** Text values split on the multi-value delimiter; DS parts longer than 16 characters are reformatted. */
function textValues(vr: DicomVr, value: string): string[] {
  if (SINGLE_VALUE_TEXT_VRS.has(vr)) {
    return [value];
  }
  if (value === '') {
    return [];
  }
  const parts = value.split('\\');
  if (vr !== 'DS') {
    return parts;
  }
  return parts.map((part) => (part.trim().length > 16 ? formatDecimalString(Number(part)) : part.trim()));
}

/** The dcmjs element for one `gggg|eeee` text value. */
export function toDatasetElement(key: string, vr: DicomVr, value: string): DcmjsElement {
  if (TEXT_VRS.has(vr)) {
    checkTextValue(key, vr, value);
    const length = textEncoder.encode(value).length;
    if (!LONG_TEXT_VRS.has(vr) && length > MAX_SHORT_VALUE_LENGTH) {
      throw new TagAttachError(key, `value of ${length} bytes is too long for ${vr}`);
    }
    return { vr, Value: textValues(vr, value) };
  }
  if (NUMERIC_VR_SIZES.has(vr)) {
    return { vr, Value: parseNumericValue(key, vr, value) };
  }
  throw new TagAttachError(key, `value representation ${vr} cannot be set from text`);
}

function pixelDataBuffer(plane: SlicePlane, layout: PixelLayout): ArrayBufferLike {
  const bytes = copyTypedArrayBytes(plane.data);
  if (getNativeByteOrder() === 'big') {
    swapByteOrderInPlace(bytes, layout.bitsAllocated / 8);
  }
  const padded = new Uint8Array(bytes.length + (bytes.length % 2));
  padded.set(bytes);
  return padded.buffer;
}

function fileMeta(sopClassUid: string, sopInstanceUid: string): DcmjsDataset {
  return {
    '00020001': { vr: 'OB', Value: [new Uint8Array([0x00, 0x01]).buffer] },
    '00020002': { vr: 'UI', Value: [sopClassUid] },
    '00020003': { vr: 'UI', Value: [sopInstanceUid] },
    '00020010': { vr: 'UI', Value: [TRANSFER_SYNTAX.explicitLittle] },
    '00020012': { vr: 'UI', Value: [IMPLEMENTATION_CLASS_UID] },
    '00020013': { vr: 'SH', Value: [IMPLEMENTATION_VERSION_NAME] }
  };
}

/**
 * One slice as an Explicit VR Little Endian Part 10 file. Attached tags are
 * written as given, except that the pixel description and the slice geometry
 * always come from the plane itself.
 */
export class DicomSlice implements EncodableSlice {
  private readonly elements = new Map<string, DcmjsElement>();
  private readonly texts = new Map<string, string>();

  constructor(private readonly plane: SlicePlane) {}

  setTag(key: string, value: string): void {
    const normalized = key.toLowerCase();
    const tag = parseTagKey(normalized);
    if (!tag) {
      throw new TagAttachError(key, 'expected a "gggg|eeee" key');
    }
    if (tag.group === 0x0002) {
      throw new TagAttachError(key, 'file meta elements are generated on encode');
    }
    if (tag.group === 0x7fe0 || tag.group === 0xfffe) {
      throw new TagAttachError(key, 'pixel data and item delimiters cannot be set');
    }
    const vr = lookupVr(normalized, this.isSigned());
    if (!vr) {
      throw new TagAttachError(key, 'value representation is unknown');
    }
    this.elements.set(datasetKeyFromTag(tag), toDatasetElement(key, vr, value));
    this.texts.set(normalized, value);
  }

  encode(): Uint8Array {
    const layout = PIXEL_LAYOUTS[this.plane.dataType];
    if (!layout) {
      throw new WriteError(`DICOM slices cannot hold ${this.plane.dataType} pixels`);
    }

    const sopClassUid = this.texts.get(SOP_CLASS_KEY)?.trim() || DEFAULT_SOP_CLASS_UID;
    const sopInstanceUid = this.texts.get(SOP_INSTANCE_KEY)?.trim() || generateUid();

    const dataset: DcmjsDataset = Object.fromEntries(this.elements);
    const put = (tag: string, vr: DicomVr, values: unknown[]) => {
      dataset[tag] = { vr, Value: values };
    };

    const { width, height, geometry } = this.plane;
    const [rowSpacing, columnSpacing] = geometry.pixelSpacing;
    put('00080016', 'UI', [sopClassUid]);
    put('00080018', 'UI', [sopInstanceUid]);
    put('00180050', 'DS', [formatDecimalString(geometry.sliceThickness)]);
    put('00200032', 'DS', geometry.position.map(formatDecimalString));
    put('00200037', 'DS', geometry.orientation.map(formatDecimalString));
    put('00280002', 'US', [1]);
    if (!this.texts.get(PHOTOMETRIC_KEY)?.trim()) {
      put('00280004', 'CS', ['MONOCHROME2']);
    }
    put('00280010', 'US', [height]);
    put('00280011', 'US', [width]);
    put('00280030', 'DS', [rowSpacing, columnSpacing].map(formatDecimalString));
    put('00280100', 'US', [layout.bitsAllocated]);
    put('00280101', 'US', [layout.bitsAllocated]);
    put('00280102', 'US', [layout.bitsAllocated - 1]);
    put('00280103', 'US', [layout.pixelRepresentation]);
    put('7FE00010', layout.bitsAllocated === 8 ? 'OB' : 'OW', [pixelDataBuffer(this.plane, layout)]);

    try {
      const file = new dcmjsData.DicomDict(fileMeta(sopClassUid, sopInstanceUid));
      file.dict = dataset;
      return new Uint8Array(file.write({ allowInvalidVRLength: true }));
    } catch (error) {
      throw new WriteError('Failed to encode DICOM slice', { cause: error });
    }
  }

  private isSigned(): boolean {
    return PIXEL_LAYOUTS[this.plane.dataType]?.pixelRepresentation === 1;
  }
}

export class DicomSliceEncoder implements SliceEncoder {
  readonly name = 'dicom';
  readonly defaultExtension = '.dcm';

  createSlice(plane: SlicePlane): DicomSlice {
    return new DicomSlice(plane);
  }
}
