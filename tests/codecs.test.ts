import assert from 'node:assert/strict';
import { test } from 'node:test';
import { Blosc } from 'numcodecs';

import { createSliceCodecs, encodeSliceChunk, frameSliceBytes } from '../src/store/codecs.ts';
import { getNativeByteOrder, type VolumeTypedArray } from '../src/types/volume.ts';

test('createSliceCodecs records the byte order and element width explicitly', () => {
  assert.deepEqual(createSliceCodecs('int16', 'big'), [
    { name: 'bytes', configuration: { endian: 'big' } },
    {
      name: 'blosc',
      configuration: { cname: 'zstd', clevel: 1, shuffle: 'bitshuffle', typesize: 2, blocksize: 0 }
    }
  ]);
  const [, blosc] = createSliceCodecs('float64', 'little');
  assert.equal(blosc?.configuration.typesize, 8);
});

test('frameSliceBytes lays samples out in the requested byte order', () => {
  const plane = new Uint16Array([0x0102, 0x0304]);
  assert.deepEqual(Array.from(frameSliceBytes(plane, 'little')), [0x02, 0x01, 0x04, 0x03]);
  assert.deepEqual(Array.from(frameSliceBytes(plane, 'big')), [0x01, 0x02, 0x03, 0x04]);
  // The source plane is never modified.
  assert.deepEqual(Array.from(plane), [0x0102, 0x0304]);
});

test('frameSliceBytes leaves single-byte samples untouched', () => {
  const plane = new Int8Array([-1, 2, -3]);
  assert.deepEqual(Array.from(frameSliceBytes(plane, 'big')), [0xff, 0x02, 0xfd]);
});

test('encodeSliceChunk output decompresses to the framed bytes', async () => {
  const plane = new Int32Array([1, -2, 300000, -400000, 5, 6]);
  const nonNative = getNativeByteOrder() === 'little' ? 'big' : 'little';
  const encoded = await encodeSliceChunk(plane, nonNative);
  const decoder = Blosc.fromConfig({ id: 'blosc', cname: 'zstd', clevel: 1, shuffle: 2, blocksize: 0 });
  const decoded = await decoder.decode(encoded);
  assert.deepEqual(Array.from(decoded), Array.from(frameSliceBytes(plane, nonNative)));
});

test('encodeSliceChunk records the element width in the blosc header', async () => {
  const decoder = Blosc.fromConfig({ id: 'blosc', cname: 'zstd', clevel: 1, shuffle: 2, blocksize: 0 });
  const planes: Array<[VolumeTypedArray, number]> = [
    [Int8Array.from({ length: 64 }, (_, i) => i - 32), 1],
    [Uint8Array.from({ length: 64 }, (_, i) => i * 3), 1],
    [Int16Array.from({ length: 64 }, (_, i) => i * -300), 2],
    [Uint16Array.from({ length: 64 }, (_, i) => i * 1000), 2],
    [Int32Array.from({ length: 64 }, (_, i) => i * -70000), 4],
    [Float32Array.from({ length: 64 }, (_, i) => i / 8), 4],
    [Float64Array.from({ length: 64 }, (_, i) => i * 0.25 - 3), 8]
  ];

  for (const [plane, width] of planes) {
    for (const byteOrder of ['little', 'big'] as const) {
      const chunk = await encodeSliceChunk(plane, byteOrder);
      assert.equal(chunk[0], 2);
      assert.equal(chunk[2], 0x94);
      assert.equal(chunk[3], width, `${plane.constructor.name} typesize`);
      const decoded = await decoder.decode(chunk);
      assert.deepEqual(Array.from(decoded), Array.from(frameSliceBytes(plane, byteOrder)));
    }
  }
});
