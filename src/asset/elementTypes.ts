import {C, type Codec, decodeAt, encodeToBytes} from "../utils/bitpack/bitpack";
import {AssetCodecError} from "./errors";

/**
 * The consumer's chosen output element: its byte size (the `sizeof(T)` that drives
 * element counts) and how a run of that many bytes reads as a value.
 */
export interface ElementType<T> {
   readonly name: string;
   readonly byteSize: number;
   readonly codec: Codec<T>;
}

export function defineElementType<T>(name: string, codec: Codec<T>): ElementType<T> {
   if (codec.bitSize === "variable" || codec.bitSize <= 0 || codec.bitSize % 8 !== 0) {
      throw new AssetCodecError(
         "InvalidElementType", `${name}: element codec must have a fixed whole-byte size, got ${codec.bitSize}`);
   }
   return {name, byteSize: codec.bitSize / 8, codec};
}

export function readElement<T>(type: ElementType<T>, bytes: Uint8Array, byteOffset = 0): T {
   return decodeAt(type.codec, bytes, byteOffset, type.name);
}

export function writeElement<T>(type: ElementType<T>, value: T): Uint8Array {
   return encodeToBytes(type.codec, value, type.name);
}

const RgbCodec = C.struct("rgb", [C.field("r", C.u8()), C.field("g", C.u8()), C.field("b", C.u8())]);
const RgbaCodec =
   C.struct("rgba", [C.field("r", C.u8()), C.field("g", C.u8()), C.field("b", C.u8()), C.field("a", C.u8())]);

export type Rgb = {r: number; g: number; b: number};
export type Rgba = {r: number; g: number; b: number; a: number};

// multi-byte numbers are little-endian.
export const ElementTypes = {
   u8: defineElementType("u8", C.u8()),
   i8: defineElementType("i8", C.i8()),
   u16: defineElementType("u16", C.u16le()),
   i16: defineElementType("i16", C.i16le()),
   u32: defineElementType("u32", C.u(32)),
   i32: defineElementType("i32", C.i(32)),
   u64: defineElementType("u64", C.u64le()),
   rgb: defineElementType<Rgb>("rgb", RgbCodec),
   rgba: defineElementType<Rgba>("rgba", RgbaCodec),
   // n raw bytes per element, in stored order (e.g. bytes(3) for packed rgb pixels)
   bytes: (n: number): ElementType<Uint8Array> => defineElementType(`bytes${n}`, C.bytes(n)),
};
