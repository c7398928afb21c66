import { endianness } from 'node:os';

export type VolumeDataType =
  | 'uint8'
  | 'int8'
  | 'uint16'
  | 'int16'
  | 'uint32'
  | 'int32'
  | 'float32'
  | 'float64';

export type VolumeTypedArray =
  | Uint8Array
  | Int8Array
  | Uint16Array
  | Int16Array
  | Uint32Array
  | Int32Array
  | Float32Array
  | Float64Array;

export type ByteOrder = 'little' | 'big';

/** Depth, height, width. */
export type VolumeShape = [number, number, number];

/**
 * A scalar volume held in (z, y, x) order. `data` is always in the host's
 * native byte order; the on-disk order is a property of the store.
 */
export type Volume = {
  shape: VolumeShape;
  dataType: VolumeDataType;
  data: VolumeTypedArray;
};

export const VOLUME_DATA_TYPES: readonly VolumeDataType[] = [
  'uint8',
  'int8',
  'uint16',
  'int16',
  'uint32',
  'int32',
  'float32',
  'float64'
];

export function isVolumeDataType(value: unknown): value is VolumeDataType {
  return typeof value === 'string' && VOLUME_DATA_TYPES.some((type) => type === value);
}

export function getNativeByteOrder(): ByteOrder {
  return endianness() === 'LE' ? 'little' : 'big';
}

export function getBytesPerValue(type: VolumeDataType): number {
  switch (type) {
    case 'uint8':
    case 'int8':
      return 1;
    case 'uint16':
    case 'int16':
      return 2;
    case 'uint32':
    case 'int32':
    case 'float32':
      return 4;
    case 'float64':
      return 8;
    default: {
      const exhaustive: never = type;
      throw new Error(`Unsupported volume data type: ${exhaustive}`);
    }
  }
}

export function createVolumeTypedArray(
  type: VolumeDataType,
  buffer: ArrayBufferLike,
  byteOffset = 0,
  length?: number
): VolumeTypedArray {
  switch (type) {
    case 'uint8':
      return new Uint8Array(buffer, byteOffset, length);
    case 'int8':
      return new Int8Array(buffer, byteOffset, length);
    case 'uint16':
      return new Uint16Array(buffer, byteOffset, length);
    case 'int16':
      return new Int16Array(buffer, byteOffset, length);
    case 'uint32':
      return new Uint32Array(buffer, byteOffset, length);
    case 'int32':
      return new Int32Array(buffer, byteOffset, length);
    case 'float32':
      return new Float32Array(buffer, byteOffset, length);
    case 'float64':
      return new Float64Array(buffer, byteOffset, length);
    default: {
      const exhaustive: never = type;
      throw new Error(`Unsupported volume data type: ${exhaustive}`);
    }
  }
}

export function createWritableVolumeArray(type: VolumeDataType, length: number): VolumeTypedArray {
  switch (type) {
    case 'uint8':
      return new Uint8Array(length);
    case 'int8':
      return new Int8Array(length);
    case 'uint16':
      return new Uint16Array(length);
    case 'int16':
      return new Int16Array(length);
    case 'uint32':
      return new Uint32Array(length);
    case 'int32':
      return new Int32Array(length);
    case 'float32':
      return new Float32Array(length);
    case 'float64':
      return new Float64Array(length);
    default: {
      const exhaustive: never = type;
      throw new Error(`Unsupported volume data type: ${exhaustive}`);
    }
  }
}

/** Returns the element type of a typed array, or null for anything else. */
export function detectDataType(array: unknown): VolumeDataType | null {
  if (array instanceof Uint8Array) {
    return 'uint8';
  }
  if (array instanceof Int8Array) {
    return 'int8';
  }
  if (array instanceof Uint16Array) {
    return 'uint16';
  }
  if (array instanceof Int16Array) {
    return 'int16';
  }
  if (array instanceof Uint32Array) {
    return 'uint32';
  }
  if (array instanceof Int32Array) {
    return 'int32';
  }
  if (array instanceof Float32Array) {
    return 'float32';
  }
  if (array instanceof Float64Array) {
    return 'float64';
  }
  return null;
}

export function ensureVolumeTypedArray(array: unknown, expected: VolumeDataType): VolumeTypedArray | null {
  switch (expected) {
    case 'uint8':
      return array instanceof Uint8Array ? array : null;
    case 'int8':
      return array instanceof Int8Array ? array : null;
    case 'uint16':
      return array instanceof Uint16Array ? array : null;
    case 'int16':
      return array instanceof Int16Array ? array : null;
    case 'uint32':
      return array instanceof Uint32Array ? array : null;
    case 'int32':
      return array instanceof Int32Array ? array : null;
    case 'float32':
      return array instanceof Float32Array ? array : null;
    case 'float64':
      return array instanceof Float64Array ? array : null;
    default: {
      const exhaustive: never = expected;
      throw new Error(`Unsupported volume data type: ${exhaustive}`);
    }
  }
}

type PixelIdEntry = { id: number; label: string };

const PIXEL_IDS: Record<VolumeDataType, PixelIdEntry> = {
  int8: { id: 0, label: '8-bit signed integer' },
  uint8: { id: 1, label: '8-bit unsigned integer' },
  int16: { id: 2, label: '16-bit signed integer' },
  uint16: { id: 3, label: '16-bit unsigned integer' },
  int32: { id: 4, label: '32-bit signed integer' },
  uint32: { id: 5, label: '32-bit unsigned integer' },
  float32: { id: 8, label: '32-bit float' },
  float64: { id: 9, label: '64-bit float' }
};

export function getPixelIdEntry(type: VolumeDataType): PixelIdEntry {
  return PIXEL_IDS[type];
}

export function getVolumeSliceLength(volume: Pick<Volume, 'shape'>): number {
  const [, height, width] = volume.shape;
  return height * width;
}

export function getVolumePlane(volume: Volume, index: number): VolumeTypedArray {
  const sliceLength = getVolumeSliceLength(volume);
  return volume.data.subarray(index * sliceLength, (index + 1) * sliceLength);
}
