/**
 * Byte-size model for cells in the value store.
 *
 * Numbers follow a 64-bit R build: vector headers of 48 bytes, node
 * headers of 56, and small vectors allocated from fixed size classes.
 * They are a model, not a measurement.
 */

import { Payload } from './values';

export const VECTOR_HEADER = 48;
export const NODE_SIZE = 56;
export const POINTER_SIZE = 8;

const SMALL_VECTOR_CLASSES = [8, 16, 32, 48, 64, 128];

/** Round a vector's data size up to the allocation class it lands in. */
export function roundVectorData(bytes: number): number {
  if (bytes <= 0) return 0;
  for (const cls of SMALL_VECTOR_CLASSES) {
    if (bytes <= cls) return cls;
  }
  return Math.ceil(bytes / 8) * 8;
}

/** Size of a vector of `length` elements, each `width` bytes wide. */
export function vectorBytes(length: number, width: number): number {
  return VECTOR_HEADER + roundVectorData(length * width);
}

/** Shallow size of one cell: what it costs by itself, not what it references. */
export function cellBytes(p: Payload): number {
  switch (p.kind) {
    case 'null':
      return 0;
    case 'logical':
    case 'integer':
      return vectorBytes(p.data.length, 4);
    case 'double':
      return vectorBytes(p.data.length, 8);
    case 'string':
      // text plus terminating NUL
      return VECTOR_HEADER + roundVectorData(Buffer.byteLength(p.text, 'utf8') + 1);
    case 'character':
    case 'list':
      return vectorBytes(p.elements.length, POINTER_SIZE);
    case 'environment':
      return NODE_SIZE + NODE_SIZE * p.frame.size;
    case 'closure':
      return NODE_SIZE + NODE_SIZE * p.formals.length;
    case 'promise':
      return NODE_SIZE;
  }
}
