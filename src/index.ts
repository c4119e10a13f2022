export {type AssetCodecConfig, kDefaultConfig, resolveConfig} from "./config";
export {consoleSink, gLog, Logger, type LoggerOptions, type LogLevel, type LogSink, nullSink} from "./utils/logger";

export {
   getPaletteBytes,
   indexPlaneByteCount,
   packBitPlane,
   type PaletteBytes,
   readSelector,
   reconstructBitPlane,
   unpackBitPlane,
   type WritableArrayLike,
} from "./asset/bitPlane";
export {type Decompressor, kDefaultLZConfig, type LZConfig, lzCompress, lzDecompress, lzDecompressor} from "./asset/compression";
export {decodeBytes, decodeInto, decodeToArray, decodeToVector} from "./asset/decoder";
export {
   kHeaderByteSize,
   kHeaderWordCount,
   kPayloadByteOffset,
   kPayloadKind,
   kPayloadKinds,
   kWordByteSize,
   type PayloadKind,
   type PayloadKindValue,
} from "./asset/defs";
export {getElementCount, getImageElementCount} from "./asset/elementCount";
export {defineElementType, type ElementType, ElementTypes, readElement, type Rgb, type Rgba, writeElement} from "./asset/elementTypes";
export {base85Decode, base85Encode, type Base85Words, wordsFromBase85, wordsToBase85} from "./asset/embedding";
export {AssetCodecError, type AssetCodecErrorCode, AssetCodecErrorCodes, isAssetCodecError} from "./asset/errors";
export {
   type AssetHeader,
   describeHeader,
   type DualColorImageHeader,
   type GenericHeader,
   getHeight,
   getWidth,
   headerWordCount,
   type ImageHeader,
   type ImageLikeHeader,
   isImage,
   isImageHeader,
   packHeader,
   parseHeader,
   validateHeader,
} from "./asset/header";
export {
   type DualColorImageSource,
   type ImageSource,
   packAsset,
   packColor,
   packDualColorImage,
   packGeneric,
   packImage,
   packImageCompact,
   splitDualColorImage,
} from "./asset/packer";
export {type PayloadEntry, PayloadStore, type PayloadStoreOptions} from "./asset/payloadStore";
export {type WordSource, toWordArray, toWordBytes, wordAlignedByteLength, wordCount} from "./asset/words";
