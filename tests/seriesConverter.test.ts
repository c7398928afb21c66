import assert from 'node:assert/strict';
import fs from 'node:fs/promises';
import path from 'node:path';
import { test } from 'node:test';

import {
  createSliceFormat,
  DicomSeriesSource,
  DicomSliceEncoder,
  IOError,
  loadConverterConfig,
  LoadError,
  ParseError,
  readChunkedStore,
  readChunkedStoreDescriptor,
  readMetadataSidecar,
  SeriesConverter,
  SeriesStageError,
  TiffSeriesSource,
  TiffSliceEncoder,
  type ConverterConfig,
  type SliceEncoder,
  type SlicePlane,
  type VolumeTypedArray
} from '../src/index.ts';
import { createRecordingLogger } from './helpers/recordingLogger.ts';
import { listFileNames, withTempDirectory } from './helpers/tempDirectory.ts';

function createConfig(root: string, env: Record<string, string> = {}): ConverterConfig {
  return loadConverterConfig(env, root);
}

async function writeSlices(
  directory: string,
  encoder: SliceEncoder,
  slices: Array<{ name: string; plane: SlicePlane; tags: Record<string, string> }>
): Promise<void> {
  await fs.mkdir(directory, { recursive: true });
  for (const { name, plane, tags } of slices) {
    const slice = encoder.createSlice(plane);
    for (const [key, value] of Object.entries(tags)) {
      slice.setTag(key, value);
    }
    await fs.writeFile(path.join(directory, name), slice.encode());
  }
}

function dicomPlane(data: VolumeTypedArray, z: number, width = 2, height = 2): SlicePlane {
  return {
    index: 0,
    width,
    height,
    dataType: 'int16',
    data,
    geometry: { position: [-50, -60, z], orientation: [1, 0, 0, 0, 1, 0], pixelSpacing: [0.7, 0.5], sliceThickness: 3 }
  };
}

async function writeDicomSeries(directory: string): Promise<Int16Array[]> {
  const planes = [0, 1, 2].map((index) => Int16Array.from({ length: 4 }, (_, i) => index * 10 - i));
  await writeSlices(
    directory,
    new DicomSliceEncoder(),
    planes.map((data, index) => ({
      name: `IM${index + 1}.dcm`,
      plane: dicomPlane(data, 100 + index * 3),
      tags: {
        '0010|0010': 'Test^Patient',
        '0020|000e': '1.2.3.77',
        '0020|0013': String(index + 1),
        '0008|0018': `1.2.3.77.${index + 1}`
      }
    }))
  );
  return planes;
}

test('a DICOM series is converted, stored, reconstructed and re-readable', async () => {
  await withTempDirectory(async (root) => {
    const config = createConfig(root);
    const planes = await writeDicomSeries(path.join(config.rawDir, 'series-a'));
    await fs.mkdir(path.join(config.rawDir, 'empty'), { recursive: true });

    const logger = createRecordingLogger();
    const converter = new SeriesConverter(config, createSliceFormat('dicom', logger), logger);
    const { series } = await converter.runBatch();

    assert.deepEqual(
      series.map((result) => [result.seriesId, result.status]),
      [
        ['empty', 'skipped'],
        ['series-a', 'ok']
      ]
    );

    const storePath = path.join(root, 'data/converted/series-a.zarr');
    const descriptor = await readChunkedStoreDescriptor(storePath);
    assert.deepEqual(descriptor.shape, [3, 2, 2]);
    assert.deepEqual(descriptor.chunkShape, [1, 2, 2]);
    const volume = await readChunkedStore(storePath);
    assert.deepEqual(
      Array.from(volume.data),
      planes.flatMap((plane) => Array.from(plane))
    );

    const record = await readMetadataSidecar(path.join(root, 'data/converted/series-a.json'));
    assert.equal(record.filenames.length, 3);
    assert.equal(record.slicesMetadata.length, 3);
    assert.deepEqual(record.geometry.origin, [-50, -60, 100]);
    assert.deepEqual(record.geometry.spacing, [0.5, 0.7, 3]);
    assert.deepEqual(record.geometry.size, [2, 2, 3]);
    assert.equal(record.geometry.pixelId, 2);

    const outputDir = path.join(root, 'data/reconstructed/series-a');
    assert.deepEqual(await listFileNames(outputDir), ['IM1.dcm', 'IM2.dcm', 'IM3.dcm']);

    const source = new DicomSeriesSource(logger);
    const rebuilt = await source.readSlice(path.join(outputDir, 'IM2.dcm'));
    assert.deepEqual(Array.from(rebuilt.data), Array.from(planes[1] ?? []));
    assert.equal(rebuilt.tags['0010|0010'], 'Test^Patient');
    assert.equal(rebuilt.tags['0008|0018'], '1.2.3.77.2');
    assert.deepEqual(rebuilt.spatial.position, [-50, -60, 103]);
    assert.deepEqual(rebuilt.spatial.pixelSpacing, [0.7, 0.5]);
  });
});

test('running the batch twice leaves the same outputs', async () => {
  await withTempDirectory(async (root) => {
    const config = createConfig(root);
    await writeDicomSeries(path.join(config.rawDir, 'series-a'));
    const logger = createRecordingLogger();
    const converter = new SeriesConverter(config, createSliceFormat('dicom', logger), logger);

    await converter.runBatch();
    await fs.writeFile(path.join(root, 'data/reconstructed/series-a/stale.dcm'), 'stale');
    const second = await converter.runBatch();

    assert.equal(second.series[0]?.status, 'ok');
    assert.deepEqual(await listFileNames(path.join(root, 'data/reconstructed/series-a')), [
      'IM1.dcm',
      'IM2.dcm',
      'IM3.dcm'
    ]);
    const volume = await readChunkedStore(path.join(root, 'data/converted/series-a.zarr'));
    assert.deepEqual(volume.shape, [3, 2, 2]);
  });
});

test('a series with inconsistent slices fails at the load stage without stopping the batch', async () => {
  await withTempDirectory(async (root) => {
    const config = createConfig(root);
    await writeSlices(path.join(config.rawDir, 'bad'), new DicomSliceEncoder(), [
      { name: '1.dcm', plane: dicomPlane(new Int16Array(4), 0), tags: { '0020|000e': '1.9' } },
      { name: '2.dcm', plane: dicomPlane(new Int16Array(6), 1, 3, 2), tags: { '0020|000e': '1.9' } }
    ]);
    await writeDicomSeries(path.join(config.rawDir, 'good'));

    const logger = createRecordingLogger();
    const { series } = await new SeriesConverter(config, createSliceFormat('dicom', logger), logger).runBatch();

    const [bad, good] = series;
    assert.equal(bad?.status, 'failed');
    if (bad?.status === 'failed') {
      assert.equal(bad.stage, 'load');
      assert.ok(bad.error instanceof LoadError);
    }
    assert.equal(good?.status, 'ok');
    await assert.rejects(fs.stat(path.join(root, 'data/converted/bad.zarr')));
  });
});

test('a damaged sidecar fails reconstruction at the read-sidecar stage', async () => {
  await withTempDirectory(async (root) => {
    const config = createConfig(root);
    await writeDicomSeries(path.join(config.rawDir, 'series-a'));
    const logger = createRecordingLogger();
    const converter = new SeriesConverter(config, createSliceFormat('dicom', logger), logger);

    const converted = await converter.convertSeries(path.join(config.rawDir, 'series-a'));
    await fs.writeFile(converted.sidecarPath, '{"filenames": ');

    await assert.rejects(converter.reconstructSeries('series-a'), (error: unknown) => {
      assert.ok(error instanceof SeriesStageError);
      assert.equal(error.stage, 'read-sidecar');
      assert.ok(error.cause instanceof ParseError);
      return true;
    });
  });
});

test('a missing raw root aborts the batch with IOError', async () => {
  await withTempDirectory(async (root) => {
    const config = createConfig(root, { RAW_DIR: 'does-not-exist' });
    const logger = createRecordingLogger();
    await assert.rejects(new SeriesConverter(config, createSliceFormat('dicom', logger), logger).runBatch(), IOError);
  });
});

test('a TIFF series round-trips with its ASCII tags and the configured byte order', async () => {
  await withTempDirectory(async (root) => {
    const config = createConfig(root, { SLICE_FORMAT: 'tiff', STORE_BYTE_ORDER: 'big' });
    const planes = [0, 1].map((index) => Float32Array.from({ length: 6 }, (_, i) => index + i * 0.5));
    await writeSlices(
      path.join(config.rawDir, 'stack'),
      new TiffSliceEncoder(),
      planes.map((data, index) => ({
        name: `z${index}.tif`,
        plane: {
          index,
          width: 3,
          height: 2,
          dataType: 'float32',
          data,
          geometry: { position: [0, 0, index], orientation: [1, 0, 0, 0, 1, 0], pixelSpacing: [1, 1], sliceThickness: 1 }
        },
        tags: { ImageDescription: `plane ${index}` }
      }))
    );

    const logger = createRecordingLogger();
    const { series } = await new SeriesConverter(config, createSliceFormat('tiff', logger), logger).runBatch();
    assert.equal(series[0]?.status, 'ok');

    const descriptor = await readChunkedStoreDescriptor(path.join(root, 'data/converted/stack.zarr'));
    assert.equal(descriptor.byteOrder, 'big');
    assert.equal(descriptor.dataType, 'float32');

    const rebuilt = await new TiffSeriesSource(logger).readSlice(path.join(root, 'data/reconstructed/stack/z1.tif'));
    assert.deepEqual(Array.from(rebuilt.data), Array.from(planes[1] ?? []));
    assert.deepEqual(rebuilt.tags, { ImageDescription: 'plane 1' });
  });
});
