import {AssetCodecError} from "./errors";

/**
 * Turns a compressed blob back into exactly `expectedLength` bytes. Any scheme works as long
 * as the payload store and the packager agree on it.
 */
export type Decompressor = (compressed: Uint8Array, expectedLength: number) => Uint8Array;

// A small LZ77 byte codec. Stream of ops:
//    0x00 len bytes...   literal run
//    0x80 len dist       copy len bytes from dist back (may overlap)
//    0x81 len value      run of one byte
// len and dist are unsigned LEB128 varints.

const kTagLiteral = 0x00;
const kTagMatch = 0x80;
const kTagRun = 0x81;

export interface LZConfig {
   windowSize: number;     // how far back a match may reach
   minMatchLength: number; // shorter repeats stay literal
   maxMatchLength: number;
}

// small window keeps a decoder on the target side cheap.
export const kDefaultLZConfig: Readonly<LZConfig> = {
   windowSize: 16,
   minMatchLength: 4,
   maxMatchLength: 30,
};

function writeVarint(out: number[], x: number) {
   while (x >= 0x80) {
      out.push((x & 0x7f) | 0x80);
      x >>>= 7;
   }
   out.push(x);
}

function readVarint(data: Uint8Array, i: number): {value: number; next: number} {
   let x = 0;
   let shift = 0;
   while (true) {
      if (i >= data.length)
         throw new AssetCodecError("InvalidEncoding", "truncated varint");
      const b = data[i++];
      x |= (b & 0x7f) << shift;
      if ((b & 0x80) === 0)
         break;
      shift += 7;
      if (shift > 28)
         throw new AssetCodecError("InvalidEncoding", "varint too large");
   }
   return {value: x >>> 0, next: i};
}

export function lzDecompress(encoded: Uint8Array): Uint8Array {
   const out: number[] = [];
   let i = 0;

   while (i < encoded.length) {
      const tag = encoded[i++];

      if (tag === kTagLiteral) {
         const r = readVarint(encoded, i);
         i = r.next;
         const len = r.value;
         if (i + len > encoded.length)
            throw new AssetCodecError("InvalidEncoding", "truncated literal run");
         for (let j = 0; j < len; j++)
            out.push(encoded[i++]);
      } else if (tag === kTagMatch) {
         const rl = readVarint(encoded, i);
         const rd = readVarint(encoded, rl.next);
         i = rd.next;
         const len = rl.value;
         const dist = rd.value;
         if (dist <= 0 || dist > out.length)
            throw new AssetCodecError("InvalidEncoding", `invalid match distance ${dist} at output ${out.length}`);
         for (let j = 0; j < len; j++) {
            out.push(out[out.length - dist]);
         }
      } else if (tag === kTagRun) {
         const rl = readVarint(encoded, i);
         i = rl.next;
         if (i >= encoded.length)
            throw new AssetCodecError("InvalidEncoding", "truncated byte run");
         const v = encoded[i++];
         for (let j = 0; j < rl.value; j++)
            out.push(v);
      } else {
         throw new AssetCodecError("InvalidEncoding", `unknown tag 0x${tag.toString(16)} at ${i - 1}`);
      }
   }

   return Uint8Array.from(out);
}

/**
 * Reference compressor: literal runs plus the longest match in the window, taken greedily.
 * Never emits byte runs; lzDecompress still reads them.
 */
export function lzCompress(input: Uint8Array, cfg: LZConfig = kDefaultLZConfig): Uint8Array {
   const {windowSize, minMatchLength, maxMatchLength} = cfg;
   if (windowSize < 1)
      throw new Error("windowSize must be >= 1");
   if (minMatchLength < 2)
      throw new Error("minMatchLength must be >= 2");
   if (maxMatchLength < minMatchLength)
      throw new Error("maxMatchLength must be >= minMatchLength");

   const out: number[] = [];
   let litStart = 0;
   const flushLiterals = (end: number) => {
      if (end > litStart) {
         out.push(kTagLiteral);
         writeVarint(out, end - litStart);
         for (let j = litStart; j < end; j++)
            out.push(input[j]);
      }
   };

   let i = 0;
   while (i < input.length) {
      const cap = Math.min(maxMatchLength, input.length - i);
      let bestLen = 0;
      let bestDist = 0;
      for (let dist = 1; dist <= Math.min(windowSize, i) && bestLen < cap; dist++) {
         let len = 0;
         while (len < cap && input[i + len] === input[i + len - dist])
            len++;
         if (len > bestLen) {
            bestLen = len;
            bestDist = dist;
         }
      }

      if (bestLen < minMatchLength) {
         i++;
         continue;
      }
      flushLiterals(i);
      out.push(kTagMatch);
      writeVarint(out, bestLen);
      writeVarint(out, bestDist);
      i += bestLen;
      litStart = i;
   }

   flushLiterals(input.length);
   return Uint8Array.from(out);
}

export const lzDecompressor: Decompressor = (compressed, expectedLength) => {
   const out = lzDecompress(compressed);
   if (out.length !== expectedLength) {
      throw new AssetCodecError(
         "DecompressedLengthMismatch", `expected ${expectedLength} bytes, decompressed ${out.length}`);
   }
   return out;
};
