import { Zstd, type Codec } from 'numcodecs';

export type BloscFrameOptions = {
  /** Element width in bytes; the bit shuffle transposes at this width. */
  typesize: number;
  clevel: number;
  /** Target block size in bytes before rounding to whole 8-element groups. */
  blockBytes?: number;
};

const HEADER_LENGTH = 16;
const FORMAT_VERSION = 2;
const ZSTD_FORMAT_VERSION = 1;

const FLAG_BITSHUFFLE = 0x04;
const FLAG_DONT_SPLIT = 0x10;
const ZSTD_FORMAT = 4;

const DEFAULT_BLOCK_BYTES = 256 * 1024;

/**
 * Bit-transposes `block` at `typesize`: output row `byte * 8 + bit` holds
 * that bit of that byte for every element, eight elements per output byte.
 * Blocks whose element count is not a multiple of eight are copied as is,
 * and trailing bytes past the last whole element are carried over.
 */
export function bitshuffle(block: Uint8Array, typesize: number): Uint8Array {
  const output = new Uint8Array(block.length);
  const count = Math.floor(block.length / typesize);
  if (count === 0 || count % 8 !== 0) {
    output.set(block);
    return output;
  }

  const rowBytes = count / 8;
  for (let byte = 0; byte < typesize; byte += 1) {
    for (let bit = 0; bit < 8; bit += 1) {
      const rowStart = (byte * 8 + bit) * rowBytes;
      for (let group = 0; group < rowBytes; group += 1) {
        let packed = 0;
        for (let member = 0; member < 8; member += 1) {
          const value = block[(group * 8 + member) * typesize + byte] ?? 0;
          packed |= ((value >> bit) & 1) << member;
        }
        output[rowStart + group] = packed;
      }
    }
  }

  const tail = count * typesize;
  output.set(block.subarray(tail), tail);
  return output;
}

function resolveBlockSize(length: number, typesize: number, target: number): number {
  const unit = 8 * typesize;
  const aligned = Math.max(unit, Math.floor(target / unit) * unit);
  return Math.min(length, aligned);
}

let zstdCodec: { level: number; codec: Codec } | null = null;

function getZstd(level: number): Codec {
  if (!zstdCodec || zstdCodec.level !== level) {
    zstdCodec = { level, codec: Zstd.fromConfig({ id: 'zstd', level }) };
  }
  return zstdCodec.codec;
}

/**
 * Writes `bytes` as a blosc (format 2) frame: zstd streams, bit shuffled at
 * `typesize`, one unsplit stream per block. A block whose compressed stream
 * would not be smaller is stored raw after shuffling.
 */
export async function encodeBloscFrame(bytes: Uint8Array, options: BloscFrameOptions): Promise<Uint8Array> {
  const { typesize, clevel } = options;
  if (!Number.isInteger(typesize) || typesize < 1 || typesize > 255) {
    throw new Error(`encodeBloscFrame: typesize must be an integer in 1..255 (received ${typesize}).`);
  }
  if (bytes.length === 0) {
    throw new Error('encodeBloscFrame: input must not be empty.');
  }

  const blockSize = resolveBlockSize(bytes.length, typesize, options.blockBytes ?? DEFAULT_BLOCK_BYTES);
  const blockCount = Math.ceil(bytes.length / blockSize);
  const zstd = getZstd(clevel);

  const streams: Uint8Array[] = [];
  for (let index = 0; index < blockCount; index += 1) {
    const block = bytes.subarray(index * blockSize, Math.min(bytes.length, (index + 1) * blockSize));
    const shuffled = block.length >= typesize ? bitshuffle(block, typesize) : block;
    const compressed = await zstd.encode(shuffled);
    streams.push(compressed.length < shuffled.length ? compressed : shuffled);
  }

  const offsetsStart = HEADER_LENGTH;
  const dataStart = offsetsStart + blockCount * 4;
  const totalLength = streams.reduce((sum, stream) => sum + 4 + stream.length, dataStart);

  const frame = new Uint8Array(totalLength);
  const view = new DataView(frame.buffer);
  view.setUint8(0, FORMAT_VERSION);
  view.setUint8(1, ZSTD_FORMAT_VERSION);
  view.setUint8(2, FLAG_BITSHUFFLE | FLAG_DONT_SPLIT | (ZSTD_FORMAT << 5));
  view.setUint8(3, typesize);
  view.setUint32(4, bytes.length, true);
  view.setUint32(8, blockSize, true);
  view.setUint32(12, totalLength, true);

  let cursor = dataStart;
  streams.forEach((stream, index) => {
    view.setUint32(offsetsStart + index * 4, cursor, true);
    view.setUint32(cursor, stream.length, true);
    frame.set(stream, cursor + 4);
    cursor += 4 + stream.length;
  });

  return frame;
}
