import type { VolumeTypedArray } from '../types/volume';

/** Copies the raw bytes behind a typed array into a fresh, unshared buffer. */
export function copyTypedArrayBytes(array: VolumeTypedArray): Uint8Array {
  const bytes = new Uint8Array(array.buffer, array.byteOffset, array.byteLength);
  return bytes.slice();
}

/** Reverses the byte order of every `width`-byte element, in place. */
export function swapByteOrderInPlace(bytes: Uint8Array, width: number): Uint8Array {
  if (width <= 1) {
    return bytes;
  }
  if (bytes.length % width !== 0) {
    throw new Error(`Byte length ${bytes.length} is not a multiple of element width ${width}.`);
  }
  const half = width >> 1;
  for (let offset = 0; offset < bytes.length; offset += width) {
    for (let i = 0; i < half; i += 1) {
      const left = offset + i;
      const right = offset + width - 1 - i;
      const value = bytes[left] ?? 0;
      bytes[left] = bytes[right] ?? 0;
      bytes[right] = value;
    }
  }
  return bytes;
}
