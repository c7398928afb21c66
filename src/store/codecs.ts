import { copyTypedArrayBytes, swapByteOrderInPlace } from '../utils/buffer';
import {
  getBytesPerValue,
  getNativeByteOrder,
  type ByteOrder,
  type VolumeDataType,
  type VolumeTypedArray
} from '../types/volume';
import { encodeBloscFrame } from './bloscFrame';

export type CodecMetadata = {
  name: string;
  configuration: Record<string, unknown>;
};

export const BYTES_CODEC_NAME = 'bytes';
export const BLOSC_CODEC_NAME = 'blosc';
export const BLOSC_COMPRESSOR = 'zstd';
export const BLOSC_COMPRESSION_LEVEL = 1;
export const BLOSC_SHUFFLE = 'bitshuffle';

/**
 * The two-stage pipeline every slice chunk goes through: byte framing with an
 * explicit endian, then blosc/zstd with bit shuffling at the element width.
 */
export function createSliceCodecs(dataType: VolumeDataType, byteOrder: ByteOrder): CodecMetadata[] {
  return [
    {
      name: BYTES_CODEC_NAME,
      configuration: { endian: byteOrder }
    },
    {
      name: BLOSC_CODEC_NAME,
      configuration: {
        cname: BLOSC_COMPRESSOR,
        clevel: BLOSC_COMPRESSION_LEVEL,
        shuffle: BLOSC_SHUFFLE,
        typesize: getBytesPerValue(dataType),
        blocksize: 0
      }
    }
  ];
}

/** Returns a copy of the plane's bytes laid out in `byteOrder`. */
export function frameSliceBytes(plane: VolumeTypedArray, byteOrder: ByteOrder): Uint8Array {
  const bytes = copyTypedArrayBytes(plane);
  if (byteOrder !== getNativeByteOrder()) {
    swapByteOrderInPlace(bytes, plane.BYTES_PER_ELEMENT);
  }
  return bytes;
}

/**
 * Frames the plane in `byteOrder`, then compresses it into a blosc frame whose
 * header records the element width the bit shuffle ran at.
 */
export async function encodeSliceChunk(plane: VolumeTypedArray, byteOrder: ByteOrder): Promise<Uint8Array> {
  return encodeBloscFrame(frameSliceBytes(plane, byteOrder), {
    typesize: plane.BYTES_PER_ELEMENT,
    clevel: BLOSC_COMPRESSION_LEVEL
  });
}
