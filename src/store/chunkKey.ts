import type { AbsolutePath } from '@zarrita/storage';

export function createZarrChunkKeyFromCoords(coords: readonly number[]): string {
  if (coords.length === 0) {
    throw new Error('Chunk coordinates cannot be empty.');
  }

  const normalized = coords.map((coord, index) => {
    if (!Number.isFinite(coord) || coord < 0 || Math.floor(coord) !== coord) {
      throw new Error(`Invalid chunk coordinate at index ${index}: ${coord}`);
    }
    return coord;
  });

  return `c/${normalized.join('/')}`;
}

/** Chunk coordinates of slice `index` in a (1, H, W)-chunked volume. */
export function createSliceChunkCoords(index: number): [number, number, number] {
  return [index, 0, 0];
}

export function createSliceChunkStoreKey(index: number): AbsolutePath {
  return `/${createZarrChunkKeyFromCoords(createSliceChunkCoords(index))}`;
}

export function isChunkStoreKey(key: string): boolean {
  return key.startsWith('/c/');
}
