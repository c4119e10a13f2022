import {MemoryRegion, BitCursor} from "./MemoryRegion";

export type BitSize = number|"variable";

/**
 * Discriminated union of all possible codec node types.
 * Each codec has a 'node' property containing metadata used for introspection.
 */
// clang-format off
export type CodecNode =
   | { kind: "u"; n: number }
   | { kind: "i"; n: number }
   | { kind: "u16le" }
   | { kind: "i16le" }
   | { kind: "u64le" }
   | { kind: "bytes"; n: number }
   | { kind: "alignToByte" }
   | { kind: "padBits"; n: number }
   | { kind: "struct"; name: string; seq: StructSeqItem[]; layout: LayoutItem[] };
// clang-format on

export interface Codec<T = unknown> {
   node: CodecNode;
   bitSize: BitSize;
   encode(value: T, writer: BitWriter): void;
   decode(reader: BitReader): T;
   getLayout?: () => LayoutItem[];
   byteSizeCeil?: () => number;
}

// =========================
// Type inference helpers (Zod-style)

export type InferCodecType<T extends Codec<unknown>> = T extends Codec<infer U>? U : never;

type AnyCodec = Codec<unknown>;

type UnionToIntersection<U> = (U extends unknown ? (k: U) => void : never) extends((k: infer I) => void) ? I : never;

type Simplify<T> = {
   [K in keyof T]: T[K]
}&{};

type FieldValue<I> = I extends FieldEntry<infer N extends string, infer C extends AnyCodec>? {[K in N]: InferCodecType<C>} : {};

type StructValueFromItems<Items extends readonly unknown[]> = Simplify<UnionToIntersection<FieldValue<Items[number]>>>;

/**
 * Get the fixed bit size of a codec, throwing if it's variable-sized.
 */
export function fixedBits(codec: Codec<unknown>, name: string): number {
   if (codec.bitSize === "variable")
      throw new Error(`${name} codec must be fixed size`);
   return codec.bitSize;
}

type FieldEntry<Name extends string = string, C extends AnyCodec = AnyCodec> = {
   kind: "field"; //
   name: Name;
   codec: C;
};
type AnonEntry = {
   kind: "anon"; codec: Codec<unknown>
};
type StructSeqItem = FieldEntry|AnonEntry;
export type LayoutItem = {
   name: string; bitOffset: number; bitSize: BitSize
};

// low n bits set, n in 0..32
function maskLowBits(n: number): number {
   if (n <= 0)
      return 0;
   return n >= 32 ? 0xFFFFFFFF : (2 ** n - 1);
}

function isFieldEntry(it: FieldEntry|AnyCodec): it is FieldEntry {
   return "kind" in it && it.kind === "field";
}

class BitReader {
   u8: Uint8Array;
   region: MemoryRegion;
   cur: BitCursor;
   constructor(u8: Uint8Array, region: MemoryRegion, cursor = new BitCursor(region, 0)) {
      this.u8 = u8;
      this.region = region;
      this.cur = cursor;
   }
   advanceToNextByteBoundary() {
      this.cur.advanceToNextByteBoundary();
      return this;
   }
   readBitsU(n: number) {
      n |= 0;
      if (n < 0 || n > 32)
         throw new Error(`readBitsU: n must be 0..32, got ${n}`);
      this.region.assertBitsFit(this.cur.bitOffset, n, "BitReader.readBitsU");
      let remaining = n;
      let out = 0 >>> 0;
      let outShift = 0;
      while (remaining > 0) {
         const absByte = this.cur.byteIndexAbs();
         const bitInByte = this.cur.bitIndexInByte();
         const avail = 8 - bitInByte;
         const k = remaining < avail ? remaining : avail;
         const byteVal = this.u8[absByte] >>> 0;
         const part = (byteVal >>> bitInByte) & maskLowBits(k);
         out = (out | ((part << outShift) >>> 0)) >>> 0;
         this.cur.seekBits(k);
         outShift += k;
         remaining -= k;
      }
      return out >>> 0;
   }
   readBitsI(n: number) {
      n |= 0;
      if (n <= 0 || n > 32)
         throw new Error(`readBitsI: n must be 1..32, got ${n}`);
      const u = this.readBitsU(n);
      if (n === 32)
         return (u | 0);
      const signBit = 1 << (n - 1);
      return (u & signBit) ? (u - Math.pow(2, n)) : u;
   }
   readU8() {
      this.advanceToNextByteBoundary();
      return this.readBitsU(8);
   }
   readU16LE() {
      this.advanceToNextByteBoundary();
      const lo = this.readBitsU(8);
      const hi = this.readBitsU(8);
      return (lo | (hi << 8)) >>> 0;
   }
   readI16LE() {
      const u = this.readU16LE();
      return (u & 0x8000) ? (u - 0x10000) : u;
   }
   readU64LE() {
      this.advanceToNextByteBoundary();
      const lo = this.readBitsU(32);
      const hi = this.readBitsU(32);
      return (BigInt(hi) << 32n) | BigInt(lo);
   }
   readBytes(n: number) {
      this.advanceToNextByteBoundary();
      const out = new Uint8Array(n);
      for (let i = 0; i < n; i++)
         out[i] = this.readBitsU(8);
      return out;
   }
}

class BitWriter {
   u8: Uint8Array;
   region: MemoryRegion;
   cur: BitCursor;
   constructor(u8: Uint8Array, region: MemoryRegion, cursor = new BitCursor(region, 0)) {
      this.u8 = u8;
      this.region = region;
      this.cur = cursor;
   }
   advanceToNextByteBoundary() {
      this.cur.advanceToNextByteBoundary();
      return this;
   }
   writeBitsU(n: number, value: number) {
      n |= 0;
      if (n < 0 || n > 32)
         throw new Error(`writeBitsU: n must be 0..32, got ${n}`);
      this.region.assertBitsFit(this.cur.bitOffset, n, "BitWriter.writeBitsU");
      const max = Math.pow(2, n) - 1;
      if (!Number.isInteger(value) || value < 0 || value > max) {
         throw new Error(`writeBitsU(${n}): value out of range: ${value} (max ${max})`);
      }
      const v = value >>> 0;
      let remaining = n;
      let inShift = 0;
      while (remaining > 0) {
         const absByte = this.cur.byteIndexAbs();
         const bitInByte = this.cur.bitIndexInByte();
         const avail = 8 - bitInByte;
         const k = remaining < avail ? remaining : avail;
         const mask = maskLowBits(k);
         const part = (v >>> inShift) & mask;
         const clearMask = (~(mask << bitInByte)) & 0xFF;
         const prev = this.u8[absByte] >>> 0;
         const next = ((prev & clearMask) | ((part & mask) << bitInByte)) & 0xFF;
         this.u8[absByte] = next;
         this.cur.seekBits(k);
         inShift += k;
         remaining -= k;
      }
      return this;
   }
   writeBitsI(n: number, value: number) {
      n |= 0;
      if (n <= 0 || n > 32)
         throw new Error(`writeBitsI: n must be 1..32, got ${n}`);
      const min = -Math.pow(2, n - 1);
      const max = Math.pow(2, n - 1) - 1;
      if (value < min || value > max)
         throw new Error(`writeBitsI(${n}): value out of range: ${value} (min ${min}, max ${max})`);
      const u = value < 0 ? (value + Math.pow(2, n)) : value;
      this.writeBitsU(n, u);
      return this;
   }
   writeU8(v: number) {
      this.advanceToNextByteBoundary();
      return this.writeBitsU(8, v);
   }
   writeU16LE(v: number) {
      this.advanceToNextByteBoundary();
      if (!Number.isInteger(v) || v < 0 || v > 0xFFFF)
         throw new Error(`writeU16LE: value out of range: ${v}`);
      this.writeBitsU(8, v & 0xFF);
      this.writeBitsU(8, (v >>> 8) & 0xFF);
      return this;
   }
   writeI16LE(v: number) {
      if (!Number.isInteger(v) || v < -0x8000 || v > 0x7FFF)
         throw new Error(`writeI16LE: value out of range: ${v}`);
      return this.writeU16LE(v & 0xFFFF);
   }
   writeU64LE(v: bigint) {
      this.advanceToNextByteBoundary();
      if (v < 0n || v > 0xFFFFFFFFFFFFFFFFn)
         throw new Error(`writeU64LE: value out of range: ${v}`);
      this.writeBitsU(32, Number(v & 0xFFFFFFFFn));
      this.writeBitsU(32, Number(v >> 32n));
      return this;
   }
   writeBytes(bytes: Uint8Array) {
      this.advanceToNextByteBoundary();
      for (let i = 0; i < bytes.length; i++)
         this.writeBitsU(8, bytes[i]);
      return this;
   }
}

function _codec<T>(
   node: CodecNode,
   encode: (value: T, writer: BitWriter) => void,
   decode: (reader: BitReader) => T,
   bitSize: BitSize,
   ): Codec<T> {
   return {node, bitSize, encode, decode};
}

/**
 * Codec factory – Domain-Specific Language (DSL) for defining binary data schemas.
 *
 * Each codec knows how to encode values to a BitWriter, decode them from a BitReader,
 * and report its size in bits (or "variable" for dynamic sizes). Bit fields are packed
 * LSB-first, so consecutive byte-aligned fields read as little-endian integers.
 *
 * Example:
 * ```typescript
 * const Word0 = C.struct("Word0", [
 *    C.field("kind", C.u8()),
 *    C.field("bpp", C.u8()),
 *    C.padBits(16),
 *    C.field("bitCount", C.u(32)),
 * ]);
 * ```
 */
const C = {
   u: (n: number): Codec<number> => {
      n |= 0;
      if (n < 0 || n > 32)
         throw new Error(`C.u(n): n must be 0..32, got ${n}`);
      return _codec(
         {kind: "u", n}, (v: number, w: BitWriter) => w.writeBitsU(n, v), (r: BitReader) => r.readBitsU(n), n);
   },
   i: (n: number): Codec<number> => {
      n |= 0;
      if (n <= 0 || n > 32)
         throw new Error(`C.i(n): n must be 1..32, got ${n}`);
      return _codec(
         {kind: "i", n}, (v: number, w: BitWriter) => w.writeBitsI(n, v), (r: BitReader) => r.readBitsI(n), n);
   },
   u8: (): Codec<number> => C.u(8),
   i8: (): Codec<number> => C.i(8),
   u16le: (): Codec<number> =>
      _codec({kind: "u16le"}, (v: number, w: BitWriter) => w.writeU16LE(v), (r: BitReader) => r.readU16LE(), 16),
   i16le: (): Codec<number> =>
      _codec({kind: "i16le"}, (v: number, w: BitWriter) => w.writeI16LE(v), (r: BitReader) => r.readI16LE(), 16),
   u64le: (): Codec<bigint> =>
      _codec({kind: "u64le"}, (v: bigint, w: BitWriter) => w.writeU64LE(v), (r: BitReader) => r.readU64LE(), 64),
   // opaque n-byte tuple, copied in stored order.
   bytes: (n: number): Codec<Uint8Array> => {
      n |= 0;
      if (n <= 0)
         throw new Error(`C.bytes(n): n must be >=1, got ${n}`);
      return _codec(
         {kind: "bytes", n},
         (v: Uint8Array, w: BitWriter) => {
            if (v.length !== n)
               throw new Error(`C.bytes(${n}): expected ${n} bytes, got ${v.length}`);
            w.writeBytes(v);
         },
         (r: BitReader) => r.readBytes(n),
         n * 8);
   },
   alignToByte: (): Codec<void> => _codec(
      {kind: "alignToByte"},
      (_v: void, w: BitWriter) => {
         w.advanceToNextByteBoundary();
      },
      (r: BitReader) => {
         r.advanceToNextByteBoundary();
         return undefined;
      },
      "variable"),
   padBits: (n: number): Codec<void> => {
      n = Math.trunc(n);
      if (n < 0)
         throw new Error(`C.padBits: n must be >=0, got ${n}`);
      return _codec(
         {kind: "padBits", n},
         (_v: void, w: BitWriter) => {
            // wider than one readBitsU call can take
            for (let left = n; left > 0; left -= 32)
               w.writeBitsU(Math.min(left, 32), 0);
         },
         (r: BitReader) => {
            for (let left = n; left > 0; left -= 32)
               r.readBitsU(Math.min(left, 32));
            return undefined;
         },
         n);
   },
   field: <const Name extends string, C extends AnyCodec>(name: Name, codec: C): FieldEntry<Name, C> =>
      ({kind: "field", name, codec}),
   struct: <const Items extends readonly(FieldEntry<string, AnyCodec>| AnyCodec)[]>(
      name: string,
      items: Items,
      ): Codec<StructValueFromItems<Items>> => {
      const seq: StructSeqItem[] = items.map((it): StructSeqItem => {
         if (isFieldEntry(it))
            return it;
         if (it.node && typeof it.encode === "function" && typeof it.decode === "function")
            return {kind: "anon", codec: it};
         throw new Error(`struct(${name}): item must be field(...) or codec, got ${JSON.stringify(it)}`);
      });
      const layout: LayoutItem[] = [];
      let bitOff = 0;
      let fixed = true;
      for (const it of seq) {
         if (it.kind === "field") {
            const bs = it.codec.bitSize;
            layout.push({name: it.name, bitOffset: bitOff, bitSize: bs});
            if (bs === "variable")
               fixed = false;
            else
               bitOff += bs;
         } else {
            const k = it.codec.node.kind;
            if (k === "alignToByte") {
               const m = bitOff % 8;
               const pad = m === 0 ? 0 : (8 - m);
               layout.push({name: "(alignToByte)", bitOffset: bitOff, bitSize: pad});
               bitOff += pad;
            } else if (k === "padBits") {
               const bs = it.codec.bitSize;
               if (bs === "variable")
                  fixed = false;
               else
                  bitOff += bs;
            } else {
               fixed = false;
            }
         }
      }
      const bitSize = fixed ? bitOff : "variable";
      const codec = _codec(
         {kind: "struct", name, seq, layout},
         (obj: StructValueFromItems<Items>, w: BitWriter) => {
            const rec = obj as unknown as Record<string, unknown>;
            for (const it of seq) {
               if (it.kind === "field") {
                  it.codec.encode(rec[it.name], w);
               } else {
                  it.codec.encode(undefined, w);
               }
            }
         },
         (r: BitReader) => {
            const out: Record<string, unknown> = {};
            for (const it of seq) {
               if (it.kind === "field") {
                  out[it.name] = it.codec.decode(r);
               } else {
                  it.codec.decode(r);
               }
            }
            return out as unknown as StructValueFromItems<Items>;
         },
         bitSize,
      );
      codec.getLayout = () => layout.slice();
      codec.byteSizeCeil = () => {
         if (bitSize === "variable")
            throw new Error(`struct ${name} has variable size; cannot compute byteSizeCeil()`);
         return Math.ceil(bitSize / 8);
      };
      return codec;
   },
};

/**
 * Decode a single value of `codec` from `bytes`, starting at `byteOffset`.
 * The read is bounded to the codec's own size when it is fixed.
 */
export function decodeAt<T>(codec: Codec<T>, bytes: Uint8Array, byteOffset = 0, name = "decodeAt"): T {
   const size = codec.bitSize === "variable" ? bytes.length - byteOffset : Math.ceil(codec.bitSize / 8);
   const region = new MemoryRegion(name, byteOffset, size);
   return codec.decode(new BitReader(bytes, region));
}

/**
 * Encode `value` into a fresh buffer sized to the codec's fixed size.
 */
export function encodeToBytes<T>(codec: Codec<T>, value: T, name = "encodeToBytes"): Uint8Array {
   const out = new Uint8Array(Math.ceil(fixedBits(codec, name) / 8));
   codec.encode(value, new BitWriter(out, new MemoryRegion(name, 0, out.length)));
   return out;
}

export {MemoryRegion, BitCursor, BitReader, BitWriter, C};
