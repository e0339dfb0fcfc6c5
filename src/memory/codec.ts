import type { Vector } from "../scoring/types.js";

const BYTES = Float64Array.BYTES_PER_ELEMENT;

/** Little-endian float64, the BLOB layout of memories.vector. */
export function encodeVector(vector: Vector): Buffer {
  const buf = Buffer.alloc(vector.length * BYTES);
  vector.forEach((x, i) => buf.writeDoubleLE(x, i * BYTES));
  return buf;
}

export function decodeVector(buf: Buffer): number[] {
  const out: number[] = [];
  for (let offset = 0; offset + BYTES <= buf.length; offset += BYTES) {
    out.push(buf.readDoubleLE(offset));
  }
  return out;
}
