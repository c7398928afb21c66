import fs from 'node:fs/promises';
import * as zarr from 'zarrita';
import type { AsyncReadable } from '@zarrita/storage';
import FileSystemStore from '@zarrita/storage/fs';

import { ReadError, WriteError } from '../errors';
import { createLogger, type Logger } from '../logger';
import {
  expectArray,
  expectNumber,
  expectPositiveInteger,
  expectRecord,
  expectString,
  SchemaError
} from '../shared/utils/schema';
import type { Geometry } from '../types/series';
import {
  createWritableVolumeArray,
  ensureVolumeTypedArray,
  getNativeByteOrder,
  getVolumePlane,
  getVolumeSliceLength,
  isVolumeDataType,
  type ByteOrder,
  type Volume,
  type VolumeDataType,
  type VolumeShape
} from '../types/volume';
import { createSliceChunkCoords, createSliceChunkStoreKey, isChunkStoreKey } from './chunkKey';
import { BYTES_CODEC_NAME, createSliceCodecs, encodeSliceChunk, type CodecMetadata } from './codecs';

export type ChunkedStoreDescriptor = {
  shape: VolumeShape;
  dataType: VolumeDataType;
  byteOrder: ByteOrder;
  /** Always `[1, height, width]`: one chunk per slice. */
  chunkShape: VolumeShape;
  codecs: CodecMetadata[];
};

export type WriteChunkedStoreOptions = {
  /** Byte order recorded in the store; defaults to the host's. */
  byteOrder?: ByteOrder;
  logger?: Logger;
};

const ZARR_METADATA_KEY = '/zarr.json';

const defaultLogger = createLogger('chunked-store');

function validateVolumeForWrite(volume: Volume, storePath: string): void {
  const [depth, height, width] = volume.shape;
  for (const [label, value] of [
    ['depth', depth],
    ['height', height],
    ['width', width]
  ] as const) {
    if (!Number.isInteger(value) || value <= 0) {
      throw new WriteError(`Cannot store a volume with ${label} ${value}`, { path: storePath });
    }
  }
  const expectedLength = depth * height * width;
  if (volume.data.length !== expectedLength) {
    throw new WriteError(
      `Volume data holds ${volume.data.length} values but shape ${volume.shape.join('x')} needs ${expectedLength}`,
      { path: storePath }
    );
  }
  if (!ensureVolumeTypedArray(volume.data, volume.dataType)) {
    throw new WriteError(`Volume data does not match element type ${volume.dataType}`, { path: storePath });
  }
}

/**
 * Replaces whatever is at `storePath` with a zarr v3 array holding `volume`,
 * chunked one slice per chunk. Removal and creation are not atomic.
 */
export async function writeChunkedStore(
  volume: Volume,
  geometry: Geometry,
  storePath: string,
  options: WriteChunkedStoreOptions = {}
): Promise<ChunkedStoreDescriptor> {
  validateVolumeForWrite(volume, storePath);

  const log = options.logger ?? defaultLogger;
  const byteOrder = options.byteOrder ?? getNativeByteOrder();
  const [depth, height, width] = volume.shape;
  const descriptor: ChunkedStoreDescriptor = {
    shape: [depth, height, width],
    dataType: volume.dataType,
    byteOrder,
    chunkShape: [1, height, width],
    codecs: createSliceCodecs(volume.dataType, byteOrder)
  };

  try {
    await fs.rm(storePath, { recursive: true, force: true });
    await fs.mkdir(storePath, { recursive: true });

    const store = new FileSystemStore(storePath);
    await zarr.create(zarr.root(store), {
      shape: [...descriptor.shape],
      data_type: descriptor.dataType,
      chunk_shape: [...descriptor.chunkShape],
      codecs: descriptor.codecs,
      fill_value: 0,
      attributes: {
        geometry: {
          origin: geometry.origin,
          spacing: geometry.spacing,
          direction: geometry.direction
        }
      }
    });

    for (let index = 0; index < depth; index += 1) {
      const chunk = await encodeSliceChunk(getVolumePlane(volume, index), byteOrder);
      await store.set(createSliceChunkStoreKey(index), chunk);
    }
  } catch (error) {
    throw new WriteError('Failed to write chunked store', { path: storePath, cause: error });
  }

  log.debug(`Wrote ${depth} chunk(s) of ${height}x${width} ${volume.dataType} (${byteOrder} endian) to ${storePath}`);
  return descriptor;
}

function parseByteOrder(codecs: CodecMetadata[], path: string): ByteOrder {
  const bytesCodec = codecs.find((codec) => codec.name === BYTES_CODEC_NAME);
  if (!bytesCodec) {
    throw new SchemaError(path, `a "${BYTES_CODEC_NAME}" codec`);
  }
  const endian = bytesCodec.configuration.endian;
  if (endian !== 'little' && endian !== 'big') {
    throw new SchemaError(`${path}.${BYTES_CODEC_NAME}.endian`, '"little" or "big"');
  }
  return endian;
}

function parseCodecs(value: unknown, path: string): CodecMetadata[] {
  return expectArray(value, path).map((entry, index) => {
    const record = expectRecord(entry, `${path}[${index}]`);
    const configuration =
      record.configuration === undefined ? {} : expectRecord(record.configuration, `${path}[${index}].configuration`);
    return {
      name: expectString(record.name, `${path}[${index}].name`),
      configuration
    };
  });
}

function parseShape(value: unknown, path: string): VolumeShape {
  const entries = expectArray(value, path);
  if (entries.length !== 3) {
    throw new SchemaError(path, 'a rank-3 shape');
  }
  return [
    expectPositiveInteger(entries[0], `${path}[0]`),
    expectPositiveInteger(entries[1], `${path}[1]`),
    expectPositiveInteger(entries[2], `${path}[2]`)
  ];
}

export function parseChunkedStoreDescriptor(json: unknown): ChunkedStoreDescriptor {
  const root = expectRecord(json, 'zarr.json');
  if (root.zarr_format !== 3) {
    throw new SchemaError('zarr.json.zarr_format', '3');
  }
  if (root.node_type !== 'array') {
    throw new SchemaError('zarr.json.node_type', '"array"');
  }

  const shape = parseShape(root.shape, 'zarr.json.shape');
  const dataType = root.data_type;
  if (!isVolumeDataType(dataType)) {
    throw new SchemaError('zarr.json.data_type', 'a supported element type');
  }

  const chunkGrid = expectRecord(root.chunk_grid, 'zarr.json.chunk_grid');
  const gridConfiguration = expectRecord(chunkGrid.configuration, 'zarr.json.chunk_grid.configuration');
  const chunkShape = expectArray(gridConfiguration.chunk_shape, 'zarr.json.chunk_grid.configuration.chunk_shape').map(
    (entry, index) => expectNumber(entry, `zarr.json.chunk_grid.configuration.chunk_shape[${index}]`)
  );
  const [, height, width] = shape;
  if (chunkShape.length !== 3 || chunkShape[0] !== 1 || chunkShape[1] !== height || chunkShape[2] !== width) {
    throw new SchemaError('zarr.json.chunk_grid.configuration.chunk_shape', `[1, ${height}, ${width}]`);
  }

  const codecs = parseCodecs(root.codecs, 'zarr.json.codecs');
  return {
    shape,
    dataType,
    byteOrder: parseByteOrder(codecs, 'zarr.json.codecs'),
    chunkShape: [1, height, width],
    codecs
  };
}

export async function readChunkedStoreDescriptor(storePath: string): Promise<ChunkedStoreDescriptor> {
  let raw: Uint8Array | undefined;
  try {
    raw = await new FileSystemStore(storePath).get(ZARR_METADATA_KEY);
  } catch (error) {
    throw new ReadError('Failed to read chunked store metadata', { path: storePath, cause: error });
  }
  if (!raw) {
    throw new ReadError('No chunked store found', { path: storePath });
  }

  try {
    return parseChunkedStoreDescriptor(JSON.parse(new TextDecoder().decode(raw)));
  } catch (error) {
    throw new ReadError('Invalid chunked store metadata', { path: storePath, cause: error });
  }
}

function createStrictChunkStore(storePath: string): AsyncReadable {
  const base = new FileSystemStore(storePath);
  return {
    async get(key) {
      const value = await base.get(key);
      if (value === undefined && isChunkStoreKey(key)) {
        throw new ReadError(`Missing chunk ${key}`, { path: storePath });
      }
      return value;
    }
  };
}

/**
 * Decodes the store slice by slice and concatenates the chunks along z,
 * yielding the original shape, element type and values.
 */
export async function readChunkedStore(storePath: string, logger: Logger = defaultLogger): Promise<Volume> {
  const descriptor = await readChunkedStoreDescriptor(storePath);

  const array = await zarr
    .open(zarr.root(createStrictChunkStore(storePath)), { kind: 'array' })
    .catch((error: unknown) => {
      throw new ReadError('Failed to open chunked store', { path: storePath, cause: error });
    });

  const [depth] = descriptor.shape;
  const sliceLength = getVolumeSliceLength(descriptor);
  const data = createWritableVolumeArray(descriptor.dataType, depth * sliceLength);

  for (let index = 0; index < depth; index += 1) {
    let chunkData: unknown;
    try {
      const chunk = await array.getChunk(createSliceChunkCoords(index));
      chunkData = chunk.data;
    } catch (error) {
      if (error instanceof ReadError) {
        throw error;
      }
      throw new ReadError(`Failed to decode chunk for slice ${index}`, { path: storePath, cause: error });
    }

    const plane = ensureVolumeTypedArray(chunkData, descriptor.dataType);
    if (!plane || plane.length !== sliceLength) {
      throw new ReadError(`Chunk for slice ${index} does not match a ${descriptor.dataType} plane of ${sliceLength} values`, {
        path: storePath
      });
    }
    data.set(plane, index * sliceLength);
  }

  logger.debug(`Read ${depth} chunk(s) from ${storePath}`);
  return { shape: descriptor.shape, dataType: descriptor.dataType, data };
}
