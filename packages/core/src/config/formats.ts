// packages/core/src/config/formats.ts

/** Every output format, in the order they are listed to users */
export const FORMAT_NAMES = [
  'raw',
  'hex',
  'dump',
  'arrayLiteral',
  'stringLiteral',
  'cstring',
  'cstringSafe',
  'base64',
  'md5',
  'sha256',
] as const;

export type FormatName = typeof FORMAT_NAMES[number];

export const DEFAULT_FORMAT: FormatName = 'raw';

/** `length` value meaning "read to the end of the source" */
export const UNBOUNDED = -1;

/** Bytes requested from the source per pull */
export const DEFAULT_CHUNK_SIZE = 32 * 1024;
