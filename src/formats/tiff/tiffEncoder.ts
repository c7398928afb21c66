import { TagAttachError, WriteError } from '../../errors';
import type { EncodableSlice, SliceEncoder, SlicePlane } from '../types';
import { ASCII_TAG_NUMBERS, isAsciiText } from './tiffTags';
import { encodeGrayscaleTiff } from './tiffWriter';

export class TiffSlice implements EncodableSlice {
  private readonly asciiTags = new Map<number, string>();

  constructor(private readonly plane: SlicePlane) {}

  setTag(key: string, value: string): void {
    const tagNumber = ASCII_TAG_NUMBERS.get(key);
    if (tagNumber === undefined) {
      throw new TagAttachError(key, 'not a supported TIFF ASCII field');
    }
    if (!isAsciiText(value)) {
      throw new TagAttachError(key, 'value is not 7-bit ASCII text');
    }
    this.asciiTags.set(tagNumber, value);
  }

  encode(): Uint8Array {
    const { width, height, dataType, data } = this.plane;
    try {
      return encodeGrayscaleTiff({ width, height, dataType, data, asciiTags: this.asciiTags });
    } catch (error) {
      throw new WriteError(`Failed to encode slice ${this.plane.index}`, { cause: error });
    }
  }
}

export class TiffSliceEncoder implements SliceEncoder {
  readonly name = 'tiff';
  readonly defaultExtension = '.tif';

  createSlice(plane: SlicePlane): TiffSlice {
    return new TiffSlice(plane);
  }
}
