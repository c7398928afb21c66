import assert from 'node:assert/strict';
import path from 'node:path';
import { test } from 'node:test';

import { loadConverterConfig, resolveSeriesPaths } from '../src/config.ts';
import { ConfigError } from '../src/errors.ts';
import { getNativeByteOrder } from '../src/types/volume.ts';

const CWD = path.resolve('/work/project');

test('loadConverterConfig falls back to the data/ layout under cwd', () => {
  const config = loadConverterConfig({}, CWD);
  assert.deepEqual(config, {
    rawDir: path.join(CWD, 'data/raw'),
    convertedDir: path.join(CWD, 'data/converted'),
    reconstructedDir: path.join(CWD, 'data/reconstructed'),
    format: 'dicom',
    storeExtension: '.zarr',
    byteOrder: getNativeByteOrder()
  });
});

test('loadConverterConfig reads directories, format and byte order from the environment', () => {
  const config = loadConverterConfig(
    {
      RAW_DIR: 'input',
      CONVERTED_DIR: '/srv/converted',
      RECONSTRUCTED_DIR: ' out ',
      SLICE_FORMAT: 'TIFF',
      STORE_BYTE_ORDER: 'big'
    },
    CWD
  );
  assert.equal(config.rawDir, path.join(CWD, 'input'));
  assert.equal(config.convertedDir, path.resolve('/srv/converted'));
  assert.equal(config.reconstructedDir, path.join(CWD, 'out'));
  assert.equal(config.format, 'tiff');
  assert.equal(config.byteOrder, 'big');
});

test('loadConverterConfig rejects unknown formats and byte orders', () => {
  assert.throws(() => loadConverterConfig({ SLICE_FORMAT: 'png' }, CWD), ConfigError);
  assert.throws(() => loadConverterConfig({ STORE_BYTE_ORDER: 'middle' }, CWD), ConfigError);
});

test('resolveSeriesPaths pairs the store with its sidecar and output directory', () => {
  const config = loadConverterConfig({}, CWD);
  assert.deepEqual(resolveSeriesPaths(config, 'series-7'), {
    storePath: path.join(CWD, 'data/converted/series-7.zarr'),
    sidecarPath: path.join(CWD, 'data/converted/series-7.json'),
    outputDir: path.join(CWD, 'data/reconstructed/series-7')
  });
});
