import { getBytesPerValue, getNativeByteOrder, type VolumeDataType, type VolumeTypedArray } from '../../types/volume';
import { copyTypedArrayBytes, swapByteOrderInPlace } from '../../utils/buffer';

export type GrayscaleTiffInput = {
  width: number;
  height: number;
  dataType: VolumeDataType;
  /** Row-major samples; length must be width * height. */
  data: VolumeTypedArray;
  /** ASCII fields keyed by TIFF tag number. */
  asciiTags?: ReadonlyMap<number, string>;
};

const TIFF_MAGIC = 42;

const TYPE_ASCII = 2;
const TYPE_SHORT = 3;
const TYPE_LONG = 4;

const TAG_IMAGE_WIDTH = 256;
const TAG_IMAGE_LENGTH = 257;
const TAG_BITS_PER_SAMPLE = 258;
const TAG_COMPRESSION = 259;
const TAG_PHOTOMETRIC_INTERPRETATION = 262;
const TAG_STRIP_OFFSETS = 273;
const TAG_SAMPLES_PER_PIXEL = 277;
const TAG_ROWS_PER_STRIP = 278;
const TAG_STRIP_BYTE_COUNTS = 279;
const TAG_PLANAR_CONFIGURATION = 284;
const TAG_SAMPLE_FORMAT = 339;

const SAMPLE_FORMAT_UNSIGNED = 1;
const SAMPLE_FORMAT_SIGNED = 2;
const SAMPLE_FORMAT_FLOAT = 3;

const PHOTOMETRIC_BLACK_IS_ZERO = 1;

const writeAscii = (view: DataView, offset: number, text: string) => {
  for (let i = 0; i < text.length; i++) {
    view.setUint8(offset + i, text.charCodeAt(i) & 0xff);
  }
};

type TiffEntry = {
  tag: number;
  type: number;
  count: number;
  value: number;
};

type AsciiEntry = {
  tag: number;
  /** NUL-terminated. */
  text: string;
  offset: number;
};

const writeIfdEntry = (view: DataView, offset: number, entry: TiffEntry) => {
  view.setUint16(offset, entry.tag, true);
  view.setUint16(offset + 2, entry.type, true);
  view.setUint32(offset + 4, entry.count >>> 0, true);
  view.setUint32(offset + 8, entry.value >>> 0, true);
};

export function getSampleFormat(dataType: VolumeDataType): number {
  switch (dataType) {
    case 'float32':
    case 'float64':
      return SAMPLE_FORMAT_FLOAT;
    case 'int8':
    case 'int16':
    case 'int32':
      return SAMPLE_FORMAT_SIGNED;
    default:
      return SAMPLE_FORMAT_UNSIGNED;
  }
}

const align2 = (value: number) => value + (value % 2);

/**
 * Encodes one single-sample image as a little-endian baseline TIFF:
 * uncompressed, one strip, a single IFD written after the pixel data.
 */
export function encodeGrayscaleTiff({ width, height, dataType, data, asciiTags }: GrayscaleTiffInput): Uint8Array {
  if (!Number.isFinite(width) || width <= 0 || !Number.isInteger(width)) {
    throw new Error('encodeGrayscaleTiff: width must be a positive integer.');
  }
  if (!Number.isFinite(height) || height <= 0 || !Number.isInteger(height)) {
    throw new Error('encodeGrayscaleTiff: height must be a positive integer.');
  }
  if (data.length !== width * height) {
    throw new Error(`encodeGrayscaleTiff: data length must be ${width * height} samples.`);
  }

  const bytesPerSample = getBytesPerValue(dataType);
  const pixelBytes = copyTypedArrayBytes(data);
  if (getNativeByteOrder() === 'big') {
    swapByteOrderInPlace(pixelBytes, bytesPerSample);
  }

  const headerSize = 8;
  const dataStart = headerSize;
  const dataSize = pixelBytes.length;

  // ASCII values longer than four bytes live between the pixels and the IFD.
  let cursor = align2(dataStart + dataSize);
  const asciiEntries: AsciiEntry[] = [];
  for (const [tag, value] of [...(asciiTags ?? new Map<number, string>())].sort(([left], [right]) => left - right)) {
    const text = `${value}\0`;
    const offset = text.length > 4 ? cursor : 0;
    if (text.length > 4) {
      cursor = align2(cursor + text.length);
    }
    asciiEntries.push({ tag, text, offset });
  }

  const ifdStart = cursor;
  const entries: TiffEntry[] = [
    { tag: TAG_IMAGE_WIDTH, type: TYPE_LONG, count: 1, value: width },
    { tag: TAG_IMAGE_LENGTH, type: TYPE_LONG, count: 1, value: height },
    { tag: TAG_BITS_PER_SAMPLE, type: TYPE_SHORT, count: 1, value: bytesPerSample * 8 },
    { tag: TAG_COMPRESSION, type: TYPE_SHORT, count: 1, value: 1 },
    { tag: TAG_PHOTOMETRIC_INTERPRETATION, type: TYPE_SHORT, count: 1, value: PHOTOMETRIC_BLACK_IS_ZERO },
    { tag: TAG_STRIP_OFFSETS, type: TYPE_LONG, count: 1, value: dataStart },
    { tag: TAG_SAMPLES_PER_PIXEL, type: TYPE_SHORT, count: 1, value: 1 },
    { tag: TAG_ROWS_PER_STRIP, type: TYPE_LONG, count: 1, value: height },
    { tag: TAG_STRIP_BYTE_COUNTS, type: TYPE_LONG, count: 1, value: dataSize },
    { tag: TAG_PLANAR_CONFIGURATION, type: TYPE_SHORT, count: 1, value: 1 },
    { tag: TAG_SAMPLE_FORMAT, type: TYPE_SHORT, count: 1, value: getSampleFormat(dataType) }
  ];
  const ifdEntryCount = entries.length + asciiEntries.length;
  const ifdSize = 2 + ifdEntryCount * 12 + 4;
  const totalSize = ifdStart + ifdSize;

  const bytes = new Uint8Array(totalSize);
  const view = new DataView(bytes.buffer);

  // Header: little-endian (II), magic 42, first IFD offset.
  writeAscii(view, 0, 'II');
  view.setUint16(2, TIFF_MAGIC, true);
  view.setUint32(4, ifdStart, true);

  bytes.set(pixelBytes, dataStart);

  for (const entry of asciiEntries) {
    if (entry.offset > 0) {
      writeAscii(view, entry.offset, entry.text);
    }
  }

  view.setUint16(ifdStart, ifdEntryCount, true);
  let entryOffset = ifdStart + 2;
  const ordered: Array<{ entry: TiffEntry; inline: string | null }> = [
    ...entries.map((entry) => ({ entry, inline: null })),
    ...asciiEntries.map((ascii) => ({
      entry: { tag: ascii.tag, type: TYPE_ASCII, count: ascii.text.length, value: ascii.offset },
      inline: ascii.offset === 0 ? ascii.text : null
    }))
  ].sort((left, right) => left.entry.tag - right.entry.tag);

  for (const { entry, inline } of ordered) {
    writeIfdEntry(view, entryOffset, entry);
    if (inline !== null) {
      view.setUint32(entryOffset + 8, 0, true);
      writeAscii(view, entryOffset + 8, inline);
    }
    entryOffset += 12;
  }

  view.setUint32(ifdStart + 2 + ifdEntryCount * 12, 0, true);
  return bytes;
}
