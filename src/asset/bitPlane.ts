import {AssetCodecError} from "./errors";
import {type ElementType, readElement} from "./elementTypes";
import type {DualColorImageHeader} from "./header";

/** Anything indexable we can write decoded elements into: arrays, typed arrays. */
export interface WritableArrayLike<T> {
   [index: number]: T;
   readonly length: number;
}

/** The two raw color byte patterns a two-color image selects between. */
export interface PaletteBytes {
   color0: Uint8Array;
   color1: Uint8Array;
}

export function indexPlaneByteCount(bitCount: number): number {
   return Math.ceil(bitCount / 8);
}

function packedColorBytes(packed: number, bpp: number): Uint8Array {
   const out = new Uint8Array(bpp);
   for (let i = 0; i < bpp; i++) {
      out[i] = (packed >>> (8 * i)) & 0xFF;
   }
   return out;
}

/**
 * First `bpp` bytes of each packed palette color, in stored (little-endian) order.
 * No color conversion happens; the bytes are reinterpreted as the element type later.
 */
export function getPaletteBytes(header: DualColorImageHeader): PaletteBytes {
   return {
      color0: packedColorBytes(header.color0, header.bpp),
      color1: packedColorBytes(header.color1, header.bpp),
   };
}

// selector for element i; most significant bit of each byte comes first.
export function readSelector(plane: Uint8Array, i: number): 0|1 {
   const byteIndex = i >>> 3;
   const bitIndex = i & 7;
   return ((plane[byteIndex] >>> (7 - bitIndex)) & 1) === 1 ? 1 : 0;
}

export function unpackBitPlane(count: number, plane: Uint8Array): Uint8Array {
   requirePlane(count, plane);
   const out = new Uint8Array(count);
   for (let i = 0; i < count; i++) {
      out[i] = readSelector(plane, i);
   }
   return out;
}

/**
 * Inverse of unpackBitPlane: one bit per selector, MSB first, trailing bits of the
 * last byte zero. Any nonzero selector counts as 1.
 */
export function packBitPlane(selectors: ArrayLike<number>): Uint8Array {
   const out = new Uint8Array(indexPlaneByteCount(selectors.length));
   for (let i = 0; i < selectors.length; i++) {
      if (selectors[i] !== 0) {
         out[i >>> 3] |= 1 << (7 - (i & 7));
      }
   }
   return out;
}

function requirePlane(count: number, plane: Uint8Array) {
   const needed = indexPlaneByteCount(count);
   if (plane.length < needed) {
      throw new AssetCodecError(
         "Truncated", `index plane for ${count} elements needs ${needed} bytes, got ${plane.length}`);
   }
}

/**
 * Expand `count` one-bit selectors into palette colors read as `type`, writing
 * element i to `target[i]`. Each element is read fresh from the palette bytes, so
 * object element types never share instances.
 */
export function reconstructBitPlane<T>(
   count: number,
   plane: Uint8Array,
   palette: PaletteBytes,
   type: ElementType<T>,
   target: WritableArrayLike<T>,
   ): void {
   requirePlane(count, plane);
   for (let i = 0; i < count; i++) {
      target[i] = readElement(type, readSelector(plane, i) === 1 ? palette.color1 : palette.color0);
   }
}
