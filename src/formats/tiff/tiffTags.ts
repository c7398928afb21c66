/** Baseline ASCII fields carried as slice tags, keyed by their TIFF names. */
export const ASCII_TAG_NUMBERS: ReadonlyMap<string, number> = new Map([
  ['DocumentName', 269],
  ['ImageDescription', 270],
  ['Make', 271],
  ['Model', 272],
  ['PageName', 285],
  ['Software', 305],
  ['DateTime', 306],
  ['Artist', 315],
  ['HostComputer', 316],
  ['Copyright', 33432]
]);

export function isAsciiText(value: string): boolean {
  return /^[\x01-\x7f]*$/.test(value);
}
