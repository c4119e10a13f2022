import {AssetCodecError} from "./errors";
import {kWordByteSize} from "./defs";

/**
 * An embedded word sequence, in any of the forms it is likely to be embedded as:
 * the raw little-endian bytes of the words, a `BigUint64Array`, or a plain array of
 * `bigint` literals (`[0x0000002001000300n, ...]`).
 */
export type WordSource = Uint8Array|BigUint64Array|readonly bigint[];

const kMaxWord = 0xFFFFFFFFFFFFFFFFn;

function writeWordLE(out: Uint8Array, byteOffset: number, word: bigint, index: number) {
   if (word < 0n || word > kMaxWord) {
      throw new AssetCodecError("InvalidWord", `word ${index} is out of range (${word})`);
   }
   let v = word;
   for (let b = 0; b < kWordByteSize; b++) {
      out[byteOffset + b] = Number(v & 0xFFn);
      v >>= 8n;
   }
}

/**
 * Little-endian byte view of a word sequence. A `Uint8Array` is returned as is (no copy);
 * bigint words are serialized byte by byte with explicit shifts, independent of host endianness.
 */
export function toWordBytes(source: WordSource): Uint8Array {
   if (source instanceof Uint8Array) {
      if (source.length % kWordByteSize !== 0) {
         throw new AssetCodecError(
            "MisalignedWords", `${source.length} bytes is not a whole number of ${kWordByteSize}-byte words`);
      }
      return source;
   }
   const out = new Uint8Array(source.length * kWordByteSize);
   for (let i = 0; i < source.length; i++) {
      writeWordLE(out, i * kWordByteSize, source[i], i);
   }
   return out;
}

// inverse of toWordBytes; length must already be word aligned.
export function toWordArray(bytes: Uint8Array): bigint[] {
   if (bytes.length % kWordByteSize !== 0) {
      throw new AssetCodecError(
         "MisalignedWords", `${bytes.length} bytes is not a whole number of ${kWordByteSize}-byte words`);
   }
   const out: bigint[] = [];
   for (let i = 0; i < bytes.length; i += kWordByteSize) {
      let word = 0n;
      for (let b = kWordByteSize - 1; b >= 0; b--) {
         word = (word << 8n) | BigInt(bytes[i + b]);
      }
      out.push(word);
   }
   return out;
}

export function wordCount(source: WordSource): number {
   if (source instanceof Uint8Array) {
      return Math.floor(source.length / kWordByteSize);
   }
   return source.length;
}

// byte length rounded up to whole words
export function wordAlignedByteLength(byteLength: number): number {
   return Math.ceil(byteLength / kWordByteSize) * kWordByteSize;
}
