import fs from 'node:fs/promises';
import path from 'node:path';

import { describeError, IOError, LoadError } from '../../errors';
import { createLogger, type Logger } from '../../logger';
import { listDirectoryFiles } from '../../shared/utils/fileNames';
import type { Vec3 } from '../../types/series';
import {
  createVolumeTypedArray,
  getBytesPerValue,
  getNativeByteOrder,
  type VolumeDataType
} from '../../types/volume';
import { swapByteOrderInPlace } from '../../utils/buffer';
import type { SliceSeriesSource, SliceSpatialInfo, SourceSlice } from '../types';
import {
  lookupVr,
  NUMERIC_VR_SIZES,
  parseTagKey,
  tagKeyFromElementTag,
  TEXT_VRS
} from './dictionary';
import {
  parseDicomBytes,
  PIXEL_DATA_ELEMENT,
  readNumberList,
  SUPPORTED_TRANSFER_SYNTAXES,
  TRANSFER_SYNTAX,
  type DicomDataSet,
  type DicomElement
} from './parser';

export type SliceHeader = {
  filePath: string;
  seriesUid: string;
  position: Vec3 | null;
  orientation: SliceSpatialInfo['orientation'] | null;
  instanceNumber: number | null;
};

/** Values kept verbatim; the others are trimmed by dicom-parser. */
const FREE_TEXT_VRS: ReadonlySet<string> = new Set(['LT', 'ST', 'UT', 'UR']);

function toVec3(values: number[] | null): Vec3 | null {
  if (!values || values.length !== 3) {
    return null;
  }
  const [x = 0, y = 0, z = 0] = values;
  return [x, y, z];
}

function toOrientation(values: number[] | null): SliceSpatialInfo['orientation'] | null {
  if (!values || values.length !== 6) {
    return null;
  }
  const [a = 0, b = 0, c = 0, d = 0, e = 0, f = 0] = values;
  return [a, b, c, d, e, f];
}

function sliceNormal(orientation: NonNullable<SliceSpatialInfo['orientation']>): Vec3 {
  const [rx, ry, rz, cx, cy, cz] = orientation;
  return [ry * cz - rz * cy, rz * cx - rx * cz, rx * cy - ry * cx];
}

function readHeader(filePath: string, dataSet: DicomDataSet): SliceHeader {
  const instance = dataSet.intString('x00200013');
  return {
    filePath,
    seriesUid: dataSet.string('x0020000e') ?? '',
    position: toVec3(readNumberList(dataSet, 'x00200032')),
    orientation: toOrientation(readNumberList(dataSet, 'x00200037')),
    instanceNumber: instance === undefined || Number.isNaN(instance) ? null : instance
  };
}

/**
 * Orders slices along the normal of the first slice when every slice has a
 * position and orientation, by instance number when every slice has one, and
 * by file name otherwise.
 */
export function sortSliceHeaders(headers: SliceHeader[]): SliceHeader[] {
  const first = headers[0];
  const orientation = first?.orientation;
  if (orientation && headers.every((header) => header.position !== null)) {
    const normal = sliceNormal(orientation);
    const distance = (header: SliceHeader) => {
      const [x, y, z] = header.position ?? [0, 0, 0];
      return x * normal[0] + y * normal[1] + z * normal[2];
    };
    return headers
      .map((header, order) => ({ header, order, key: distance(header) }))
      .sort((left, right) => left.key - right.key || left.order - right.order)
      .map(({ header }) => header);
  }

  if (headers.every((header) => header.instanceNumber !== null)) {
    return headers
      .map((header, order) => ({ header, order, key: header.instanceNumber ?? 0 }))
      .sort((left, right) => left.key - right.key || left.order - right.order)
      .map(({ header }) => header);
  }

  return [...headers];
}

function resolveDataType(bitsAllocated: number, pixelRepresentation: number, filePath: string): VolumeDataType {
  const signed = pixelRepresentation === 1;
  switch (bitsAllocated) {
    case 8:
      return signed ? 'int8' : 'uint8';
    case 16:
      return signed ? 'int16' : 'uint16';
    case 32:
      return signed ? 'int32' : 'uint32';
    default:
      throw new LoadError(`Unsupported BitsAllocated ${bitsAllocated}`, { path: filePath });
  }
}

function readNumericValues(dataSet: DicomDataSet, element: DicomElement, vr: string): string | null {
  const size = NUMERIC_VR_SIZES.get(vr);
  if (size === undefined) {
    return null;
  }
  const count = Math.floor(element.length / size);
  const values: string[] = [];
  for (let index = 0; index < count; index += 1) {
    let value: number | undefined;
    switch (vr) {
      case 'US':
        value = dataSet.uint16(element.tag, index);
        break;
      case 'SS':
        value = dataSet.int16(element.tag, index);
        break;
      case 'UL':
        value = dataSet.uint32(element.tag, index);
        break;
      case 'SL':
        value = dataSet.int32(element.tag, index);
        break;
      case 'FL':
        value = dataSet.float(element.tag, index);
        break;
      case 'FD':
        value = dataSet.double(element.tag, index);
        break;
      default:
        value = undefined;
    }
    if (value !== undefined) {
      values.push(String(value));
    }
  }
  return values.join('\\');
}

/**
 * Every text or numeric element outside the file meta group, keyed
 * `gggg|eeee`. Sequences and binary values are left out.
 */
export function extractSliceTags(dataSet: DicomDataSet): Record<string, string> {
  const tags: Record<string, string> = {};
  const signedPixels = dataSet.uint16('x00280103') === 1;
  for (const element of Object.values(dataSet.elements)) {
    const key = tagKeyFromElementTag(element.tag);
    const tag = key ? parseTagKey(key) : null;
    if (!key || !tag) {
      continue;
    }
    if (tag.group === 0x0002 || tag.element === 0x0000 || element.tag === PIXEL_DATA_ELEMENT || element.items) {
      continue;
    }
    const vr = element.vr ?? lookupVr(key, signedPixels);
    if (!vr) {
      continue;
    }
    if (TEXT_VRS.has(vr)) {
      const value = FREE_TEXT_VRS.has(vr) ? dataSet.text(element.tag) : dataSet.string(element.tag);
      tags[key] = value ?? '';
      continue;
    }
    const numeric = readNumericValues(dataSet, element, vr);
    if (numeric !== null) {
      tags[key] = numeric;
    }
  }
  return tags;
}

function readSpatialInfo(dataSet: DicomDataSet): SliceSpatialInfo {
  const spatial: SliceSpatialInfo = {};
  const position = toVec3(readNumberList(dataSet, 'x00200032'));
  if (position) {
    spatial.position = position;
  }
  const orientation = toOrientation(readNumberList(dataSet, 'x00200037'));
  if (orientation) {
    spatial.orientation = orientation;
  }
  const spacing = readNumberList(dataSet, 'x00280030');
  if (spacing && spacing.length === 2) {
    const [row = 1, column = 1] = spacing;
    spatial.pixelSpacing = [row, column];
  }
  const thickness = dataSet.floatString('x00180050');
  if (thickness !== undefined && Number.isFinite(thickness)) {
    spatial.sliceThickness = thickness;
  }
  return spatial;
}

function readPixelData(dataSet: DicomDataSet, filePath: string) {
  const transferSyntax = dataSet.string('x00020010') ?? TRANSFER_SYNTAX.implicitLittle;
  if (!SUPPORTED_TRANSFER_SYNTAXES.has(transferSyntax)) {
    throw new LoadError(`Unsupported transfer syntax ${transferSyntax}`, { path: filePath });
  }

  const width = dataSet.uint16('x00280011');
  const height = dataSet.uint16('x00280010');
  if (!width || !height) {
    throw new LoadError('Missing Rows or Columns', { path: filePath });
  }
  const samplesPerPixel = dataSet.uint16('x00280002') ?? 1;
  if (samplesPerPixel !== 1) {
    throw new LoadError(`Only single-sample images are supported (got ${samplesPerPixel})`, { path: filePath });
  }

  const dataType = resolveDataType(
    dataSet.uint16('x00280100') ?? 0,
    dataSet.uint16('x00280103') ?? 0,
    filePath
  );

  const element = dataSet.elements[PIXEL_DATA_ELEMENT];
  if (!element) {
    throw new LoadError('No pixel data', { path: filePath });
  }
  if (element.encapsulatedPixelData) {
    throw new LoadError('Compressed pixel data is not supported', { path: filePath });
  }

  const bytesPerValue = getBytesPerValue(dataType);
  const byteLength = width * height * bytesPerValue;
  if (element.length < byteLength) {
    throw new LoadError(`Pixel data holds ${element.length} bytes, expected ${byteLength}`, { path: filePath });
  }

  const bytes = new Uint8Array(byteLength);
  bytes.set(dataSet.byteArray.subarray(element.dataOffset, element.dataOffset + byteLength));
  const sourceOrder = transferSyntax === TRANSFER_SYNTAX.explicitBig ? 'big' : 'little';
  if (sourceOrder !== getNativeByteOrder()) {
    swapByteOrderInPlace(bytes, bytesPerValue);
  }

  return {
    width,
    height,
    dataType,
    data: createVolumeTypedArray(dataType, bytes.buffer, 0, width * height)
  };
}

async function readFileBytes(filePath: string): Promise<Uint8Array> {
  try {
    return await fs.readFile(filePath);
  } catch (error) {
    throw new IOError('Failed to read slice', { path: filePath, cause: error });
  }
}

export class DicomSeriesSource implements SliceSeriesSource {
  readonly name = 'dicom';
  private readonly logger: Logger;

  constructor(logger: Logger = createLogger('dicom-source')) {
    this.logger = logger;
  }

  /**
   * Members of the first series found in `seriesDir` (by file name), in
   * acquisition order. Files that are not DICOM are ignored.
   */
  async discoverSeriesFiles(seriesDir: string): Promise<string[]> {
    const headers: SliceHeader[] = [];
    for (const filePath of await listDirectoryFiles(seriesDir)) {
      let dataSet: DicomDataSet;
      try {
        dataSet = parseDicomBytes(await readFileBytes(filePath), true);
      } catch (error) {
        this.logger.debug(`Ignoring ${path.basename(filePath)}: ${describeError(error)}`);
        continue;
      }
      headers.push(readHeader(filePath, dataSet));
    }

    const first = headers[0];
    if (!first) {
      return [];
    }
    const members = headers.filter((header) => header.seriesUid === first.seriesUid);
    if (members.length < headers.length) {
      this.logger.info(
        `${seriesDir} holds more than one series; using ${first.seriesUid || '(no uid)'} with ${members.length} slice(s)`
      );
    }
    return sortSliceHeaders(members).map((header) => header.filePath);
  }

  async readSlice(filePath: string): Promise<SourceSlice> {
    const bytes = await readFileBytes(filePath);
    let dataSet: DicomDataSet;
    try {
      dataSet = parseDicomBytes(bytes);
    } catch (error) {
      throw new LoadError('Not a readable DICOM file', { path: filePath, cause: error });
    }

    const pixels = readPixelData(dataSet, filePath);
    return {
      filePath,
      ...pixels,
      tags: extractSliceTags(dataSet),
      spatial: readSpatialInfo(dataSet)
    };
  }
}
