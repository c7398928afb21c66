export type UnknownRecord = Record<string, unknown>;

/** Raised by the `expect*` helpers; callers wrap it in their own error type. */
export class SchemaError extends Error {
  readonly path: string;

  constructor(path: string, expectation: string) {
    super(`Invalid schema at ${path}: expected ${expectation}.`);
    this.name = 'SchemaError';
    this.path = path;
  }
}

export function isRecord(value: unknown): value is UnknownRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function expectRecord(value: unknown, path: string): UnknownRecord {
  if (!isRecord(value)) {
    throw new SchemaError(path, 'object');
  }
  return value;
}

export function expectArray(value: unknown, path: string): unknown[] {
  if (!Array.isArray(value)) {
    throw new SchemaError(path, 'array');
  }
  return value;
}

export function expectString(value: unknown, path: string): string {
  if (typeof value !== 'string') {
    throw new SchemaError(path, 'string');
  }
  return value;
}

export function expectNumber(value: unknown, path: string): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new SchemaError(path, 'finite number');
  }
  return value;
}

export function expectInteger(value: unknown, path: string): number {
  const numeric = expectNumber(value, path);
  if (Math.floor(numeric) !== numeric) {
    throw new SchemaError(path, 'integer');
  }
  return numeric;
}

export function expectPositiveInteger(value: unknown, path: string): number {
  const integer = expectInteger(value, path);
  if (integer <= 0) {
    throw new SchemaError(path, 'positive integer');
  }
  return integer;
}

export function expectNumberTuple3(value: unknown, path: string): [number, number, number] {
  const entries = expectArray(value, path);
  if (entries.length !== 3) {
    throw new SchemaError(path, 'array of 3 numbers');
  }
  return [
    expectNumber(entries[0], `${path}[0]`),
    expectNumber(entries[1], `${path}[1]`),
    expectNumber(entries[2], `${path}[2]`)
  ];
}

export function expectIntegerTuple3(value: unknown, path: string): [number, number, number] {
  const entries = expectArray(value, path);
  if (entries.length !== 3) {
    throw new SchemaError(path, 'array of 3 integers');
  }
  return [
    expectInteger(entries[0], `${path}[0]`),
    expectInteger(entries[1], `${path}[1]`),
    expectInteger(entries[2], `${path}[2]`)
  ];
}
