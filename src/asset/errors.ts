// every failure the codec reports carries one of these codes.
export const AssetCodecErrorCodes = [
   "UnsupportedKind",         // type-agnostic element count asked of a generic payload
   "TypeMismatch",            // element size != bpp for a two-color image
   "ElementCountNotPositive", // fixed-capacity decode of an empty payload
   "CapacityMismatch",        // fixed-capacity length != resolved element count
   "DestinationTooSmall",     // write-into-buffer destination shorter than the element count
   "Truncated",               // word sequence shorter than the header or payload it describes
   "UnknownKind",             // wire kind value outside 0..2
   "MisalignedWords",         // byte length not a multiple of the word size
   "InvalidWord",             // bigint word outside 0..2^64-1
   "InvalidHeader",           // header field out of range when packing
   "InvalidElementType",      // element codec without a fixed whole-byte size
   "InvalidEncoding",         // malformed base85 text or LZ stream
   "DecompressedLengthMismatch",
   "UnknownAsset",
   "DuplicateAsset",
] as const;

export type AssetCodecErrorCode = (typeof AssetCodecErrorCodes)[number];

export class AssetCodecError extends Error {
   readonly code: AssetCodecErrorCode;

   constructor(code: AssetCodecErrorCode, message: string) {
      super(`${code}: ${message}`);
      this.name = "AssetCodecError";
      this.code = code;
   }
}

export function isAssetCodecError(e: unknown, code?: AssetCodecErrorCode): e is AssetCodecError {
   return e instanceof AssetCodecError && (code === undefined || e.code === code);
}
