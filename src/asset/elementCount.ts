import {AssetCodecError} from "./errors";
import type {ElementType} from "./elementTypes";
import {type AssetHeader, parseHeader} from "./header";
import type {WordSource} from "./words";

function asHeader(headerOrWords: AssetHeader|WordSource): AssetHeader {
   return "kind" in headerOrWords ? headerOrWords : parseHeader(headerOrWords);
}

/**
 * Pixel count of an image payload (`width * height`). A generic payload has no
 * element count without an element type, so it is rejected.
 */
export function getImageElementCount(headerOrWords: AssetHeader|WordSource): number {
   const header = asHeader(headerOrWords);
   if (header.kind === "generic") {
      throw new AssetCodecError(
         "UnsupportedKind", "a generic payload has no element count without an element type");
   }
   return header.width * header.height;
}

/**
 * Number of `type` elements the payload represents.
 *
 * Two-color images count pixels; the element size only matters for how they are read.
 * Generic and image payloads count whole elements in `floor(bitCount / 8)` bytes, so a
 * partial trailing element is dropped.
 */
export function getElementCount<T>(headerOrWords: AssetHeader|WordSource, type: ElementType<T>): number {
   const header = asHeader(headerOrWords);
   if (header.kind === "dualColorImage") {
      return getImageElementCount(header);
   }
   const byteCount = Math.floor(header.bitCount / 8);
   return Math.floor(byteCount / type.byteSize);
}
