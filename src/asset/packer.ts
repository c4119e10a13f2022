import {indexPlaneByteCount, packBitPlane} from "./bitPlane";
import {kHeaderByteSize} from "./defs";
import {AssetCodecError} from "./errors";
import {type AssetHeader, packHeader} from "./header";
import {wordAlignedByteLength} from "./words";

// The word layout an asset packager emits: 24 header bytes, then the payload, zero
// padded to a whole word.

export function packAsset(header: AssetHeader, payload: Uint8Array): Uint8Array {
   const headerBytes = packHeader(header);
   const needed = indexPlaneByteCount(header.bitCount);
   if (payload.length < needed) {
      throw new AssetCodecError(
         "InvalidHeader", `bitCount ${header.bitCount} needs ${needed} payload bytes, got ${payload.length}`);
   }
   const out = new Uint8Array(wordAlignedByteLength(kHeaderByteSize + payload.length));
   out.set(headerBytes, 0);
   out.set(payload, kHeaderByteSize);
   return out;
}

export function packGeneric(bytes: Uint8Array): Uint8Array {
   return packAsset({kind: "generic", bpp: 1, bitCount: bytes.length * 8}, bytes);
}

export interface ImageSource {
   width: number;
   height: number;
   /** Bytes per pixel, 1..4. */
   bpp: number;
   /** Row-major pixels, `width * height * bpp` bytes. */
   pixels: Uint8Array;
}

export function packImage({width, height, bpp, pixels}: ImageSource): Uint8Array {
   const expected = width * height * bpp;
   if (pixels.length !== expected) {
      throw new AssetCodecError(
         "InvalidHeader", `${width}x${height} at ${bpp} bpp needs ${expected} pixel bytes, got ${pixels.length}`);
   }
   return packAsset({kind: "image", bpp, bitCount: pixels.length * 8, width, height}, pixels);
}

// channel bytes (up to 4) -> packed little-endian color
export function packColor(channels: Uint8Array): number {
   if (channels.length > 4) {
      throw new AssetCodecError("InvalidHeader", `a packed color holds at most 4 channels, got ${channels.length}`);
   }
   let packed = 0;
   for (let i = 0; i < channels.length; i++) {
      packed += channels[i] * 2 ** (8 * i);
   }
   return packed;
}

export interface DualColorImageSource {
   width: number;
   height: number;
   bpp: number;
   color0: Uint8Array;
   color1: Uint8Array;
   /** One entry per pixel, row-major: 0 selects color0, anything else color1. */
   selectors: ArrayLike<number>;
}

export function packDualColorImage(src: DualColorImageSource): Uint8Array {
   const count = src.width * src.height;
   if (src.selectors.length !== count) {
      throw new AssetCodecError(
         "InvalidHeader", `${src.width}x${src.height} needs ${count} selectors, got ${src.selectors.length}`);
   }
   if (src.color0.length !== src.bpp || src.color1.length !== src.bpp) {
      throw new AssetCodecError("InvalidHeader", `palette colors must be ${src.bpp} bytes each`);
   }
   return packAsset(
      {
         kind: "dualColorImage",
         bpp: src.bpp,
         bitCount: count,
         width: src.width,
         height: src.height,
         color0: packColor(src.color0),
         color1: packColor(src.color1),
      },
      packBitPlane(src.selectors));
}

function samePixel(pixels: Uint8Array, a: number, b: number, bpp: number) {
   for (let c = 0; c < bpp; c++) {
      if (pixels[a + c] !== pixels[b + c])
         return false;
   }
   return true;
}

/**
 * Split an image with at most two distinct colors into a palette and selectors.
 * Returns undefined when a third color shows up. color0 is the first pixel's color;
 * a single-color image gets the same color in both slots.
 */
export function splitDualColorImage({width, height, bpp, pixels}: ImageSource): DualColorImageSource|undefined {
   const count = width * height;
   if (count === 0 || pixels.length !== count * bpp)
      return undefined;

   const selectors = new Uint8Array(count);
   let color1Offset = -1;
   for (let i = 0; i < count; i++) {
      const off = i * bpp;
      if (samePixel(pixels, off, 0, bpp))
         continue;
      if (color1Offset < 0) {
         color1Offset = off;
      } else if (!samePixel(pixels, off, color1Offset, bpp)) {
         return undefined;
      }
      selectors[i] = 1;
   }

   const color0 = pixels.slice(0, bpp);
   const color1 = color1Offset < 0 ? color0.slice() : pixels.slice(color1Offset, color1Offset + bpp);
   return {width, height, bpp, color0, color1, selectors};
}

// two-color images shrink to one bit per pixel; everything else is stored as is.
export function packImageCompact(src: ImageSource): Uint8Array {
   const split = splitDualColorImage(src);
   return split ? packDualColorImage(split) : packImage(src);
}
