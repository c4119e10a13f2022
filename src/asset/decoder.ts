import {BitReader, MemoryRegion} from "../utils/bitpack/bitpack";
import {type AssetCodecConfig, resolveConfig} from "../config";
import {getPaletteBytes, indexPlaneByteCount, reconstructBitPlane, type WritableArrayLike} from "./bitPlane";
import {kPayloadByteOffset} from "./defs";
import {getElementCount} from "./elementCount";
import type {ElementType} from "./elementTypes";
import {AssetCodecError} from "./errors";
import {type AssetHeader, parseHeader} from "./header";
import {type WordSource, toWordBytes} from "./words";

interface PreparedDecode {
   bytes: Uint8Array;
   header: AssetHeader;
   count: number;
}

// parse, reject kind/type combinations, resolve the count. nothing past the header is touched yet.
function prepare<T>(source: WordSource, type: ElementType<T>): PreparedDecode {
   const bytes = toWordBytes(source);
   const header = parseHeader(bytes);
   if (header.kind === "dualColorImage" && header.bpp !== type.byteSize) {
      throw new AssetCodecError(
         "TypeMismatch",
         `two-color image has bpp=${header.bpp} but element type ${type.name} is ${type.byteSize} byte(s)`);
   }
   return {bytes, header, count: getElementCount(header, type)};
}

function payloadSpan(bytes: Uint8Array, byteLength: number): Uint8Array {
   const available = Math.max(bytes.length - kPayloadByteOffset, 0);
   if (byteLength > available) {
      throw new AssetCodecError("Truncated", `payload needs ${byteLength} bytes, sequence holds ${available}`);
   }
   return bytes.subarray(kPayloadByteOffset, kPayloadByteOffset + byteLength);
}

// one dispatch for every output mode: expand the index plane, or read the payload verbatim.
function fill<T>({bytes, header, count}: PreparedDecode, type: ElementType<T>, target: WritableArrayLike<T>): void {
   if (header.kind === "dualColorImage") {
      const plane = payloadSpan(bytes, indexPlaneByteCount(header.bitCount));
      reconstructBitPlane(count, plane, getPaletteBytes(header), type, target);
      return;
   }

   const byteLength = count * type.byteSize;
   payloadSpan(bytes, byteLength);
   const reader = new BitReader(bytes, new MemoryRegion("payload", kPayloadByteOffset, byteLength));
   for (let i = 0; i < count; i++) {
      target[i] = type.codec.decode(reader);
   }
}

/**
 * Decode into a result of a length fixed before decoding (typically derived from a
 * header known ahead of time). The payload must hold at least one element and exactly
 * `length` of them.
 */
export function decodeToArray<T>(source: WordSource, type: ElementType<T>, length: number): T[] {
   const prepared = prepare(source, type);
   if (prepared.count <= 0) {
      throw new AssetCodecError("ElementCountNotPositive", `payload holds no ${type.name} elements`);
   }
   if (prepared.count !== length) {
      throw new AssetCodecError(
         "CapacityMismatch", `expected ${length} ${type.name} elements, payload holds ${prepared.count}`);
   }
   const out = new Array<T>(length);
   fill(prepared, type, out);
   return out;
}

/**
 * Decode into a new array sized from the header.
 */
export function decodeToVector<T>(source: WordSource, type: ElementType<T>): T[] {
   const prepared = prepare(source, type);
   const out = new Array<T>(prepared.count);
   fill(prepared, type, out);
   return out;
}

/**
 * Decode into caller storage, starting at index 0, and return the number of elements
 * written.
 *
 * Precondition: `dst` has room for the resolved element count and does not alias the
 * source. With `debugAssertions` on, a short destination is rejected before anything
 * is written; with it off the write is unchecked (arrays grow, typed arrays drop the
 * excess).
 */
export function decodeInto<T>(
   source: WordSource,
   type: ElementType<T>,
   dst: WritableArrayLike<T>,
   config: Partial<AssetCodecConfig> = {},
   ): number {
   const prepared = prepare(source, type);
   if (resolveConfig(config).debugAssertions && dst.length < prepared.count) {
      throw new AssetCodecError(
         "DestinationTooSmall", `destination holds ${dst.length} elements, payload has ${prepared.count}`);
   }
   fill(prepared, type, dst);
   return prepared.count;
}

/**
 * Copy of the stored payload bytes: `floor(bitCount / 8)` bytes for generic and image
 * payloads, the `ceil(bitCount / 8)` byte index plane for two-color images.
 */
export function decodeBytes(source: WordSource): Uint8Array {
   const bytes = toWordBytes(source);
   const header = parseHeader(bytes);
   const byteLength = header.kind === "dualColorImage" ? indexPlaneByteCount(header.bitCount) :
                                                        Math.floor(header.bitCount / 8);
   return payloadSpan(bytes, byteLength).slice();
}
