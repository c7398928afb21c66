import assert from 'node:assert/strict';
import { mkdirSync } from 'node:fs';
import fs from 'node:fs/promises';
import path from 'node:path';
import { test } from 'node:test';

import { TagAttachError, WriteError } from '../src/errors.ts';
import type { EncodableSlice, SliceEncoder, SlicePlane } from '../src/formats/types.ts';
import type { Geometry, MetadataRecord } from '../src/types/series.ts';
import type { Volume } from '../src/types/volume.ts';
import { computeSliceGeometry, resolveSliceFileName, VolumeWriter } from '../src/writers/volumeWriter.ts';
import { createRecordingLogger } from './helpers/recordingLogger.ts';
import { listFileNames, withTempDirectory } from './helpers/tempDirectory.ts';

type StubEncoderOptions = {
  failCreateAt?: number;
  failEncodeAt?: number;
  rejectedKeys?: string[];
  onCreateSlice?: (plane: SlicePlane) => void;
};

/** Encodes a slice as a JSON description of what it was given. */
function createStubEncoder(options: StubEncoderOptions = {}): SliceEncoder & { planes: SlicePlane[] } {
  const planes: SlicePlane[] = [];
  return {
    name: 'stub',
    defaultExtension: '.stub',
    planes,
    createSlice(plane): EncodableSlice {
      options.onCreateSlice?.(plane);
      if (plane.index === options.failCreateAt) {
        throw new WriteError(`cannot prepare slice ${plane.index}`);
      }
      planes.push(plane);
      const tags: Record<string, string> = {};
      return {
        setTag(key, value) {
          if (options.rejectedKeys?.includes(key)) {
            throw new TagAttachError(key, 'rejected by stub');
          }
          tags[key] = value;
        },
        encode() {
          if (plane.index === options.failEncodeAt) {
            throw new WriteError(`cannot encode slice ${plane.index}`);
          }
          return new TextEncoder().encode(JSON.stringify({ index: plane.index, data: Array.from(plane.data), tags }));
        }
      };
    }
  };
}

function createVolume(depth: number): Volume {
  return {
    shape: [depth, 1, 2],
    dataType: 'uint16',
    data: Uint16Array.from({ length: depth * 2 }, (_, i) => i + 1)
  };
}

function createRecord(filenames: string[], slicesMetadata: MetadataRecord['slicesMetadata'] = []): MetadataRecord {
  return {
    filenames,
    slicesMetadata,
    geometry: {
      origin: [10, 20, 30],
      spacing: [0.5, 0.25, 4],
      direction: [1, 0, 0, 0, 1, 0, 0, 0, 1],
      size: [2, 1, 3],
      pixelId: 3,
      pixelIdTypeAsString: '16-bit unsigned integer'
    }
  };
}

async function readStubOutput(filePath: string): Promise<unknown> {
  return JSON.parse(await fs.readFile(filePath, 'utf8'));
}

test('resolveSliceFileName reuses original names, then pads the index', () => {
  const filenames = ['/raw/s/IM-7.DCM', '/raw/s/IM-8.DCM'];
  assert.equal(resolveSliceFileName(0, filenames, '.dcm'), 'IM-7.DCM');
  assert.equal(resolveSliceFileName(1, filenames, '.dcm'), 'IM-8.DCM');
  assert.equal(resolveSliceFileName(2, filenames, '.dcm'), '0002.DCM');
  assert.equal(resolveSliceFileName(12, [], '.tif'), '0012.tif');
});

test('computeSliceGeometry steps along the z axis of the direction matrix', () => {
  const geometry: Pick<Geometry, 'origin' | 'spacing' | 'direction'> = {
    origin: [1, 2, 3],
    spacing: [0.6, 0.8, 2],
    direction: [0, 0, -1, 1, 0, 0, 0, -1, 0]
  };
  assert.deepEqual(computeSliceGeometry(geometry, 3), {
    position: [-5, 2, 3],
    orientation: [0, 1, 0, 0, 0, -1],
    pixelSpacing: [0.8, 0.6],
    sliceThickness: 2
  });
});

test('write names slices after the record and falls back to padded indices', async () => {
  await withTempDirectory(async (root) => {
    const outputDir = path.join(root, 'out');
    const encoder = createStubEncoder();
    const writer = new VolumeWriter({ encoder, logger: createRecordingLogger() });

    const result = await writer.write(createVolume(3), createRecord(['/raw/a/first.dcm']), outputDir);

    assert.equal(result.written, 3);
    assert.equal(result.failed, 0);
    assert.deepEqual(await listFileNames(outputDir), ['0001.dcm', '0002.dcm', 'first.dcm']);
    assert.deepEqual(await readStubOutput(path.join(outputDir, '0002.dcm')), { index: 2, data: [5, 6], tags: {} });
    assert.deepEqual(encoder.planes[1]?.geometry.position, [10, 20, 34]);
  });
});

test('write uses the encoder extension when the record has no filenames', async () => {
  await withTempDirectory(async (root) => {
    const outputDir = path.join(root, 'out');
    const writer = new VolumeWriter({ encoder: createStubEncoder(), logger: createRecordingLogger() });
    await writer.write(createVolume(2), createRecord([]), outputDir);
    assert.deepEqual(await listFileNames(outputDir), ['0000.stub', '0001.stub']);
  });
});

test('a slice that fails to encode does not stop the others', async () => {
  await withTempDirectory(async (root) => {
    const outputDir = path.join(root, 'out');
    const logger = createRecordingLogger();
    const writer = new VolumeWriter({ encoder: createStubEncoder({ failEncodeAt: 1 }), logger });

    const result = await writer.write(createVolume(3), createRecord(['a.x', 'b.x', 'c.x']), outputDir);

    assert.equal(result.written, 2);
    assert.equal(result.failed, 1);
    assert.deepEqual(
      result.slices.map((slice) => [slice.fileName, slice.ok]),
      [
        ['a.x', true],
        ['b.x', false],
        ['c.x', true]
      ]
    );
    assert.equal(result.slices[1]?.error, 'cannot encode slice 1');
    assert.deepEqual(await listFileNames(outputDir), ['a.x', 'c.x']);
    assert.ok(logger.records.some((record) => record.level === 'warn' && record.msg.includes('b.x')));
  });
});

test('a slice whose file cannot be written is reported while the others are written', async () => {
  await withTempDirectory(async (root) => {
    const outputDir = path.join(root, 'out');
    const logger = createRecordingLogger();
    const encoder = createStubEncoder({
      onCreateSlice: (plane) => {
        if (plane.index === 0) {
          mkdirSync(path.join(outputDir, 'c.x'));
        }
      }
    });

    const result = await new VolumeWriter({ encoder, logger }).write(
      createVolume(4),
      createRecord(['a.x', 'b.x', 'c.x', 'd.x']),
      outputDir
    );

    assert.equal(result.written, 3);
    assert.equal(result.failed, 1);
    assert.deepEqual(
      result.slices.map((slice) => slice.ok),
      [true, true, false, true]
    );
    assert.match(result.slices[2]?.error ?? '', /^Failed to write slice: EISDIR/);
    assert.deepEqual(await readStubOutput(path.join(outputDir, 'b.x')), { index: 1, data: [3, 4], tags: {} });
    assert.deepEqual(await readStubOutput(path.join(outputDir, 'd.x')), { index: 3, data: [7, 8], tags: {} });
    assert.ok(logger.records.some((record) => record.level === 'warn' && record.msg.includes('(c.x) could not be written')));
  });
});

test('a slice the encoder cannot prepare is reported and the rest are written', async () => {
  await withTempDirectory(async (root) => {
    const outputDir = path.join(root, 'out');
    const logger = createRecordingLogger();
    const writer = new VolumeWriter({ encoder: createStubEncoder({ failCreateAt: 0 }), logger });

    const result = await writer.write(createVolume(3), createRecord(['a.x', 'b.x', 'c.x']), outputDir);

    assert.equal(result.written, 2);
    assert.deepEqual(result.slices[0], {
      index: 0,
      fileName: 'a.x',
      outputPath: path.join(outputDir, 'a.x'),
      ok: false,
      error: 'cannot prepare slice 0',
      tagFailures: []
    });
    assert.deepEqual(await listFileNames(outputDir), ['b.x', 'c.x']);
  });
});

test('tags that cannot be attached are reported per key while the rest are kept', async () => {
  await withTempDirectory(async (root) => {
    const outputDir = path.join(root, 'out');
    const writer = new VolumeWriter({
      encoder: createStubEncoder({ rejectedKeys: ['0010|0010'] }),
      logger: createRecordingLogger()
    });
    const record = createRecord(['only.x'], [{ '0010|0010': 'Test^Patient', '0008|0060': 'MR' }]);

    const result = await writer.write(createVolume(1), record, outputDir);

    assert.equal(result.slices[0]?.ok, true);
    assert.deepEqual(result.slices[0]?.tagFailures, [
      { key: '0010|0010', message: 'Tag "0010|0010": rejected by stub' }
    ]);
    assert.deepEqual(await readStubOutput(path.join(outputDir, 'only.x')), {
      index: 0,
      data: [1, 2],
      tags: { '0008|0060': 'MR' }
    });
  });
});

test('rewriting an output directory removes stale slices', async () => {
  await withTempDirectory(async (root) => {
    const outputDir = path.join(root, 'out');
    const writer = new VolumeWriter({ encoder: createStubEncoder(), logger: createRecordingLogger() });

    await writer.write(createVolume(3), createRecord([]), outputDir);
    await writer.write(createVolume(1), createRecord(['kept.x']), outputDir);

    assert.deepEqual(await listFileNames(outputDir), ['kept.x']);
  });
});

test('slices are encoded with the array element type even when the record disagrees', async () => {
  await withTempDirectory(async (root) => {
    const encoder = createStubEncoder();
    const writer = new VolumeWriter({ encoder, logger: createRecordingLogger() });
    const record = createRecord([]);
    record.geometry.pixelId = 8;
    record.geometry.pixelIdTypeAsString = '32-bit float';

    await writer.write(createVolume(1), record, path.join(root, 'out'));

    assert.equal(encoder.planes[0]?.dataType, 'uint16');
    assert.ok(encoder.planes[0]?.data instanceof Uint16Array);
  });
});
