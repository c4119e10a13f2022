import {type AssetCodecConfig, resolveConfig} from "../config";
import {gLog, type Logger} from "../utils/logger";
import type {WritableArrayLike} from "./bitPlane";
import {type Decompressor, lzDecompressor} from "./compression";
import {decodeInto, decodeToVector} from "./decoder";
import type {ElementType} from "./elementTypes";
import {wordsFromBase85} from "./embedding";
import {AssetCodecError} from "./errors";
import {type AssetHeader, describeHeader, parseHeader} from "./header";
import {type WordSource, toWordBytes, wordCount} from "./words";

// how a payload was embedded
// clang-format off
export type PayloadEntry =
   | { encoding: "words"; words: WordSource }
   | { encoding: "base85"; text: string; byteLength: number }
   | { encoding: "compressed"; bytes: Uint8Array; uncompressedByteLength: number };
// clang-format on

export interface PayloadStoreOptions {
   decompressor?: Decompressor;
   logger?: Logger;
   config?: Partial<AssetCodecConfig>;
}

/**
 * Named registry of embedded payloads. Entries are kept as registered and turned into
 * word bytes on first use; the result is cached per name (compressed entries decompress once).
 *
 *    const store = new PayloadStore();
 *    store.register("font", {encoding: "compressed", bytes, uncompressedByteLength: 1024});
 *    const glyphs = store.decodeToVector("font", ElementTypes.u8);
 */
export class PayloadStore {
   private readonly entries = new Map<string, PayloadEntry>();
   private readonly words = new Map<string, Uint8Array>();
   private readonly decompressor: Decompressor;
   private readonly log: Logger;
   private readonly config: AssetCodecConfig;

   constructor(options: PayloadStoreOptions = {}) {
      this.decompressor = options.decompressor ?? lzDecompressor;
      this.log = options.logger ?? gLog;
      this.config = resolveConfig(options.config);
   }

   register(name: string, entry: PayloadEntry): this {
      if (this.entries.has(name)) {
         throw new AssetCodecError("DuplicateAsset", `payload "${name}" is already registered`);
      }
      this.entries.set(name, entry);
      this.log.info(`registered payload "${name}" (${entry.encoding})`);
      return this;
   }

   has(name: string): boolean {
      return this.entries.has(name);
   }

   names(): string[] {
      return [...this.entries.keys()];
   }

   private entry(name: string): PayloadEntry {
      const entry = this.entries.get(name);
      if (!entry) {
         throw new AssetCodecError("UnknownAsset", `no payload named "${name}"`);
      }
      return entry;
   }

   private materialize(name: string, entry: PayloadEntry, decompressor: Decompressor): Uint8Array {
      switch (entry.encoding) {
         case "words":
            return toWordBytes(entry.words);
         case "base85":
            return wordsFromBase85(entry.text, entry.byteLength);
         case "compressed": {
            const run = () => toWordBytes(decompressor(entry.bytes, entry.uncompressedByteLength));
            if (!this.config.logDecompression) {
               return run();
            }
            return this.log.scope(
               `decompress "${name}" (${entry.bytes.length} -> ${entry.uncompressedByteLength} bytes)`, run);
         }
      }
   }

   /**
    * Little-endian word bytes of a payload. The first call per name does the work;
    * later calls return the cached bytes. Callers must not modify them.
    */
   getWords(name: string, decompressor: Decompressor = this.decompressor): Uint8Array {
      const cached = this.words.get(name);
      if (cached) {
         return cached;
      }
      const bytes = this.materialize(name, this.entry(name), decompressor);
      this.words.set(name, bytes);
      return bytes;
   }

   getHeader(name: string): AssetHeader {
      return parseHeader(this.getWords(name));
   }

   // one line per payload; entries not yet decoded are decoded for it
   describe(): string[] {
      return this.names().map((name) => {
         const words = this.getWords(name);
         return `${name}: ${describeHeader(parseHeader(words))} (${wordCount(words)} words)`;
      });
   }

   decodeToVector<T>(name: string, type: ElementType<T>, decompressor?: Decompressor): T[] {
      return decodeToVector(this.getWords(name, decompressor), type);
   }

   decodeInto<T>(name: string, type: ElementType<T>, dst: WritableArrayLike<T>, decompressor?: Decompressor): number {
      return decodeInto(this.getWords(name, decompressor), type, dst, this.config);
   }
}
