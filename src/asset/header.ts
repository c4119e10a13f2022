import {BitWriter, C, MemoryRegion, decodeAt} from "../utils/bitpack/bitpack";
import {AssetCodecError} from "./errors";
import {
   kHeaderByteSize,
   kMaxImageBpp,
   kMinImageBpp,
   kPayloadKind,
   kWordByteSize,
   type PayloadKind,
   payloadKindFromValue,
} from "./defs";
import {type WordSource, toWordBytes} from "./words";

// Header words, little-endian fields packed low to high.
//
//   word 0  kind:u8  bpp:u8  pad:u16  bitCount:u32      always
//   word 1  width:u16  height:u16  pad:u32              kind != generic
//   word 2  color0:u32  color1:u32                      kind == dualColorImage
const HeaderWord0Codec = C.struct("HeaderWord0", [
   C.field("kind", C.u8()),
   C.field("bpp", C.u8()),
   C.padBits(16),
   C.field("bitCount", C.u(32)),
]);

const HeaderWord1Codec = C.struct("HeaderWord1", [
   C.field("width", C.u16le()),
   C.field("height", C.u16le()),
   C.padBits(32),
]);

const HeaderWord2Codec = C.struct("HeaderWord2", [
   C.field("color0", C.u(32)),
   C.field("color1", C.u(32)),
]);

interface HeaderBase {
   /** Bytes per channel group. Meaningful for image kinds (1..4). */
   bpp: number;
   /** Number of populated payload bits; not necessarily a multiple of 8. */
   bitCount: number;
}

export interface GenericHeader extends HeaderBase {
   kind: "generic";
}

export interface ImageHeader extends HeaderBase {
   kind: "image";
   width: number;
   height: number;
}

export interface DualColorImageHeader extends HeaderBase {
   kind: "dualColorImage";
   width: number;
   height: number;
   /** Packed color selected by index bit 0. Byte i (little-endian) is channel i. */
   color0: number;
   /** Packed color selected by index bit 1. */
   color1: number;
}

export type AssetHeader = GenericHeader|ImageHeader|DualColorImageHeader;
export type ImageLikeHeader = ImageHeader|DualColorImageHeader;

export function headerWordCount(kind: PayloadKind): number {
   return kPayloadKind[kind].headerWords;
}

export function isImageHeader(header: AssetHeader): header is ImageLikeHeader {
   return header.kind !== "generic";
}

function requireWords(bytes: Uint8Array, words: number, what: string) {
   if (bytes.length < words * kWordByteSize) {
      throw new AssetCodecError(
         "Truncated", `${what} needs ${words} word(s), sequence has ${Math.floor(bytes.length / kWordByteSize)}`);
   }
}

function readKindAndWord0(bytes: Uint8Array) {
   requireWords(bytes, 1, "header");
   const word0 = decodeAt(HeaderWord0Codec, bytes, 0, "header.word0");
   return {word0, kind: payloadKindFromValue(word0.kind)};
}

function requireImageBpp(bpp: number) {
   if (!Number.isInteger(bpp) || bpp < kMinImageBpp || bpp > kMaxImageBpp) {
      throw new AssetCodecError("InvalidHeader", `image bpp must be ${kMinImageBpp}..${kMaxImageBpp}, got ${bpp}`);
   }
}

/**
 * Parse the header from the leading words of a sequence.
 * Word 1 is read only for image kinds and word 2 only for two-color images, so a
 * generic payload may be passed as a single header word.
 */
export function parseHeader(source: WordSource): AssetHeader {
   const bytes = toWordBytes(source);
   const {word0, kind} = readKindAndWord0(bytes);
   const base = {bpp: word0.bpp, bitCount: word0.bitCount};

   switch (kind) {
      case undefined:
         throw new AssetCodecError("UnknownKind", `payload kind ${word0.kind} is not 0, 1 or 2`);
      case "generic":
         return {kind, ...base};
      case "image": {
         requireWords(bytes, headerWordCount(kind), "image header");
         requireImageBpp(base.bpp);
         const word1 = decodeAt(HeaderWord1Codec, bytes, kWordByteSize, "header.word1");
         return {kind, ...base, width: word1.width, height: word1.height};
      }
      case "dualColorImage": {
         requireWords(bytes, headerWordCount(kind), "two-color image header");
         requireImageBpp(base.bpp);
         const word1 = decodeAt(HeaderWord1Codec, bytes, kWordByteSize, "header.word1");
         const word2 = decodeAt(HeaderWord2Codec, bytes, 2 * kWordByteSize, "header.word2");
         return {
            kind,
            ...base,
            width: word1.width,
            height: word1.height,
            color0: word2.color0,
            color1: word2.color1,
         };
      }
   }
}

// reads word 0 only; an unknown kind is simply not an image.
export function isImage(source: WordSource): boolean {
   const {kind} = readKindAndWord0(toWordBytes(source));
   return kind === "image" || kind === "dualColorImage";
}

export function getWidth(source: WordSource): number|undefined {
   const bytes = toWordBytes(source);
   if (!isImage(bytes))
      return undefined;
   requireWords(bytes, 2, "image header");
   return decodeAt(HeaderWord1Codec, bytes, kWordByteSize, "header.word1").width;
}

export function getHeight(source: WordSource): number|undefined {
   const bytes = toWordBytes(source);
   if (!isImage(bytes))
      return undefined;
   requireWords(bytes, 2, "image header");
   return decodeAt(HeaderWord1Codec, bytes, kWordByteSize, "header.word1").height;
}

function checkField(name: string, value: number, max: number) {
   if (!Number.isInteger(value) || value < 0 || value > max) {
      throw new AssetCodecError("InvalidHeader", `${name} must be an integer in 0..${max}, got ${value}`);
   }
}

export function validateHeader(header: AssetHeader): void {
   checkField("bitCount", header.bitCount, 0xFFFFFFFF);
   if (header.kind === "generic") {
      checkField("bpp", header.bpp, 0xFF);
      return;
   }
   requireImageBpp(header.bpp);
   checkField("width", header.width, 0xFFFF);
   checkField("height", header.height, 0xFFFF);
   if (header.kind === "dualColorImage") {
      checkField("color0", header.color0, 0xFFFFFFFF);
      checkField("color1", header.color1, 0xFFFFFFFF);
   }
}

/**
 * Serialize a header into its three reserved words (24 bytes). Words a kind does not
 * use are left zero.
 */
export function packHeader(header: AssetHeader): Uint8Array {
   validateHeader(header);
   const out = new Uint8Array(kHeaderByteSize);
   const w = new BitWriter(out, new MemoryRegion("header", 0, out.length));

   HeaderWord0Codec.encode({kind: kPayloadKind[header.kind].value, bpp: header.bpp, bitCount: header.bitCount}, w);
   if (header.kind !== "generic") {
      HeaderWord1Codec.encode({width: header.width, height: header.height}, w);
   }
   if (header.kind === "dualColorImage") {
      HeaderWord2Codec.encode({color0: header.color0, color1: header.color1}, w);
   }
   return out;
}

export function describeHeader(header: AssetHeader): string {
   const base = `${kPayloadKind[header.kind].title}, bpp=${header.bpp}, bits=${header.bitCount}`;
   switch (header.kind) {
      case "generic":
         return base;
      case "image":
         return `${base}, ${header.width}x${header.height}`;
      case "dualColorImage":
         return `${base}, ${header.width}x${header.height}, colors=0x${header.color0.toString(16)}/0x${
            header.color1.toString(16)}`;
   }
}
