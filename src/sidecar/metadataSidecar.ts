import fs from 'node:fs/promises';
import path from 'node:path';

import { IOError, ParseError, WriteError } from '../errors';
import {
  expectArray,
  expectInteger,
  expectIntegerTuple3,
  expectNumber,
  expectNumberTuple3,
  expectRecord,
  expectString,
  SchemaError,
  type UnknownRecord
} from '../shared/utils/schema';
import type { Direction, Geometry, MetadataRecord, SliceTags, Vec3 } from '../types/series';

export const SIDECAR_EXTENSION = '.json';

/** On-disk layout of the sidecar. */
export type MetadataSidecarJson = {
  filenames: string[];
  origin: number[];
  spacing: number[];
  direction: number[];
  size: number[];
  pixel_id: number;
  pixel_id_type_as_string: string;
  slices_metadata: Record<string, string>[];
};

/** `converted/<id>.zarr` pairs with `converted/<id>.json`. */
export function sidecarPathForStore(storePath: string): string {
  const extension = path.extname(storePath);
  const base = path.basename(storePath, extension);
  return path.join(path.dirname(storePath), `${base}${SIDECAR_EXTENSION}`);
}

export function serializeMetadataRecord(record: MetadataRecord): MetadataSidecarJson {
  const { geometry } = record;
  return {
    filenames: [...record.filenames],
    origin: [...geometry.origin],
    spacing: [...geometry.spacing],
    direction: [...geometry.direction],
    size: [...geometry.size],
    pixel_id: geometry.pixelId,
    pixel_id_type_as_string: geometry.pixelIdTypeAsString,
    slices_metadata: record.slicesMetadata.map((tags) => ({ ...tags }))
  };
}

function parseDirection(value: unknown, fieldPath: string): Direction {
  const entries = expectArray(value, fieldPath);
  if (entries.length !== 9) {
    throw new SchemaError(fieldPath, 'array of 9 numbers');
  }
  const values = entries.map((entry, index) => expectNumber(entry, `${fieldPath}[${index}]`));
  const [a = 0, b = 0, c = 0, d = 0, e = 0, f = 0, g = 0, h = 0, i = 0] = values;
  return [a, b, c, d, e, f, g, h, i];
}

function parseTagValue(value: unknown, fieldPath: string): string {
  if (typeof value === 'string') {
    return value;
  }
  if ((typeof value === 'number' && Number.isFinite(value)) || typeof value === 'boolean') {
    return String(value);
  }
  throw new SchemaError(fieldPath, 'string tag value');
}

function parseSliceTags(value: unknown, fieldPath: string): SliceTags {
  const record = expectRecord(value, fieldPath);
  const tags: Record<string, string> = {};
  for (const [key, entry] of Object.entries(record)) {
    tags[key] = parseTagValue(entry, `${fieldPath}["${key}"]`);
  }
  return tags;
}

/** `null` counts as absent. */
function optionalField<T>(root: UnknownRecord, key: string, parse: (value: unknown, fieldPath: string) => T, fallback: T): T {
  const value = root[key];
  return value === undefined || value === null ? fallback : parse(value, key);
}

function optionalArray(root: UnknownRecord, key: string): unknown[] {
  return optionalField(root, key, expectArray, []);
}

/**
 * Validates a decoded sidecar. Filenames and per-slice tags default to empty,
 * size to zeros and the pixel id to -1; geometry vectors are required. Field
 * lengths are not checked against any store.
 */
export function parseMetadataRecord(json: unknown): MetadataRecord {
  const root = expectRecord(json, 'sidecar');

  const filenames = optionalArray(root, 'filenames').map((entry, index) => expectString(entry, `filenames[${index}]`));
  const slicesMetadata = optionalArray(root, 'slices_metadata').map((entry, index) =>
    parseSliceTags(entry, `slices_metadata[${index}]`)
  );

  const geometry: Geometry = {
    origin: expectNumberTuple3(root.origin, 'origin'),
    spacing: expectNumberTuple3(root.spacing, 'spacing'),
    direction: parseDirection(root.direction, 'direction'),
    size: optionalField<Vec3>(root, 'size', expectIntegerTuple3, [0, 0, 0]),
    pixelId: optionalField(root, 'pixel_id', expectInteger, -1),
    pixelIdTypeAsString: optionalField(root, 'pixel_id_type_as_string', expectString, '')
  };

  return { filenames, geometry, slicesMetadata };
}

export async function writeMetadataSidecar(record: MetadataRecord, sidecarPath: string): Promise<void> {
  const payload = `${JSON.stringify(serializeMetadataRecord(record), null, 4)}\n`;
  try {
    await fs.mkdir(path.dirname(sidecarPath), { recursive: true });
    await fs.writeFile(sidecarPath, payload, 'utf8');
  } catch (error) {
    throw new WriteError('Failed to write metadata sidecar', { path: sidecarPath, cause: error });
  }
}

export async function readMetadataSidecar(sidecarPath: string): Promise<MetadataRecord> {
  let text: string;
  try {
    text = await fs.readFile(sidecarPath, 'utf8');
  } catch (error) {
    throw new IOError('Failed to read metadata sidecar', { path: sidecarPath, cause: error });
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw new ParseError('Metadata sidecar is not valid JSON', { path: sidecarPath, cause: error });
  }

  try {
    return parseMetadataRecord(json);
  } catch (error) {
    throw new ParseError('Metadata sidecar has an unexpected structure', { path: sidecarPath, cause: error });
  }
}
