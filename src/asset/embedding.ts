import {AssetCodecError} from "./errors";
import {type WordSource, toWordBytes} from "./words";

// ASCII85-style base85 without the 'z' shortcut: digits 0..84 map to chars 33..117 ('!'..'u').
const BASE85_RADIX = 85;
const BASE85_OFFSET = 33;

export function base85Encode(data: Uint8Array): string {
   let out = "";
   for (let i = 0; i < data.length; i += 4) {
      const b0 = data[i] ?? 0;
      const b1 = data[i + 1] ?? 0;
      const b2 = data[i + 2] ?? 0;
      const b3 = data[i + 3] ?? 0;

      // avoid signed-int32 behavior from bitwise ops
      let v = b0 * 2 ** 24 + b1 * 2 ** 16 + b2 * 2 ** 8 + b3;

      const digits = new Array<number>(5);
      for (let d = 4; d >= 0; d--) {
         digits[d] = v % BASE85_RADIX;
         v = Math.floor(v / BASE85_RADIX);
      }
      for (const digit of digits) {
         out += String.fromCharCode(BASE85_OFFSET + digit);
      }
   }
   return out;
}

export function base85Decode(str: string, expectedLength: number): Uint8Array {
   if (str.length % 5 !== 0) {
      throw new AssetCodecError("InvalidEncoding", `base85 text length ${str.length} is not a multiple of 5`);
   }
   const groups = str.length / 5;
   if (expectedLength < 0 || expectedLength > groups * 4) {
      throw new AssetCodecError(
         "InvalidEncoding", `expected ${expectedLength} bytes but the text decodes to ${groups * 4}`);
   }

   const out = new Uint8Array(groups * 4);
   let idx = 0;
   for (let g = 0; g < groups; g++) {
      let v = 0;
      for (let d = 0; d < 5; d++) {
         const digit = str.charCodeAt(idx) - BASE85_OFFSET;
         if (digit < 0 || digit >= BASE85_RADIX) {
            throw new AssetCodecError("InvalidEncoding", `invalid base85 char '${str[idx]}' at index ${idx}`);
         }
         v = v * BASE85_RADIX + digit;
         idx++;
      }
      if (v > 0xFFFFFFFF) {
         throw new AssetCodecError("InvalidEncoding", `base85 group ${g} overflows 32 bits`);
      }
      out[g * 4] = (v >>> 24) & 0xFF;
      out[g * 4 + 1] = (v >>> 16) & 0xFF;
      out[g * 4 + 2] = (v >>> 8) & 0xFF;
      out[g * 4 + 3] = v & 0xFF;
   }

   // trim padding of the last group
   return out.subarray(0, expectedLength);
}

/** A word sequence as a string literal, plus the byte length needed to trim it back. */
export interface Base85Words {
   text: string;
   byteLength: number;
}

export function wordsToBase85(source: WordSource): Base85Words {
   const bytes = toWordBytes(source);
   return {text: base85Encode(bytes), byteLength: bytes.length};
}

export function wordsFromBase85(text: string, byteLength: number): Uint8Array {
   return toWordBytes(base85Decode(text, byteLength));
}
