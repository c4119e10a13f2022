import {describe, it} from "node:test";
import assert from "node:assert/strict";

import {type Decompressor, lzCompress, lzDecompressor} from "../src/asset/compression";
import {ElementTypes} from "../src/asset/elementTypes";
import {wordsToBase85} from "../src/asset/embedding";
import {isAssetCodecError} from "../src/asset/errors";
import {packGeneric, packImage} from "../src/asset/packer";
import {PayloadStore} from "../src/asset/payloadStore";
import {Logger, type LogLevel} from "../src/utils/logger";

const kGreeting = packGeneric(new Uint8Array([0x68, 0x65, 0x6C, 0x6C, 0x6F]));
const kGreetingLZ = lzCompress(kGreeting);

function makeStore(options: {decompressor?: Decompressor; logDecompression?: boolean; debugAssertions?: boolean} = {}) {
   const lines: string[] = [];
   const logger = new Logger({
      now: () => 0,
      sink: (level: LogLevel, line: string) => lines.push(`${level} ${line.replace(/^\[[^\]]*\] /, "")}`),
   });
   const store = new PayloadStore({
      decompressor: options.decompressor,
      logger,
      config: {logDecompression: options.logDecompression, debugAssertions: options.debugAssertions},
   });
   return {store, lines};
}

describe("PayloadStore", () => {
   it("decompresses on first use and logs it", () => {
      const {store, lines} = makeStore();
      store.register("greeting", {encoding: "compressed", bytes: kGreetingLZ, uncompressedByteLength: 32});

      assert.deepEqual(store.decodeToVector("greeting", ElementTypes.u8), [0x68, 0x65, 0x6C, 0x6C, 0x6F]);
      const scope = `decompress "greeting" (${kGreetingLZ.length} -> 32 bytes)`;
      assert.deepEqual(lines, [
         `info registered payload "greeting" (compressed)`,
         `info { ${scope}`,
         `info } ${scope} (0.0ms)`,
      ]);
   });

   it("memoizes decompressed words per name", () => {
      let calls = 0;
      const decompressor: Decompressor = (bytes, expectedLength) => {
         calls++;
         return lzDecompressor(bytes, expectedLength);
      };
      const {store} = makeStore({decompressor, logDecompression: false});
      store.register("greeting", {encoding: "compressed", bytes: kGreetingLZ, uncompressedByteLength: 32});

      const first = store.getWords("greeting");
      store.decodeToVector("greeting", ElementTypes.u8);
      assert.equal(store.getWords("greeting"), first);
      assert.equal(calls, 1);
   });

   it("uses a per-call decompressor for the first decode", () => {
      let calls = 0;
      const {store} = makeStore({logDecompression: false});
      store.register("greeting", {encoding: "compressed", bytes: kGreetingLZ, uncompressedByteLength: 32});
      const out = store.decodeToVector("greeting", ElementTypes.u8, (bytes, expectedLength) => {
         calls++;
         return lzDecompressor(bytes, expectedLength);
      });
      assert.equal(out.length, 5);
      assert.equal(calls, 1);
   });

   it("does not cache a failed decompression", () => {
      const {store, lines} = makeStore();
      store.register("bad", {encoding: "compressed", bytes: kGreetingLZ, uncompressedByteLength: 40});
      const mismatch = (e: unknown) => isAssetCodecError(e, "DecompressedLengthMismatch");
      assert.throws(() => store.getWords("bad"), mismatch);
      assert.throws(() => store.getWords("bad"), mismatch);
      assert.equal(lines[2], `info } decompress "bad" (${kGreetingLZ.length} -> 40 bytes) FAILED (0.0ms)`);
      assert.equal(lines.length, 5);
   });

   it("serves raw and base85 entries without decompressing", () => {
      const {store, lines} = makeStore({decompressor: () => assert.fail("not compressed")});
      const image = packImage({width: 1, height: 2, bpp: 2, pixels: new Uint8Array([1, 0, 2, 0])});
      const embedded = wordsToBase85(image);
      store.register("raw", {encoding: "words", words: image})
         .register("text", {encoding: "base85", text: embedded.text, byteLength: embedded.byteLength});

      assert.deepEqual(store.decodeToVector("raw", ElementTypes.u16), [1, 2]);
      assert.deepEqual(store.decodeToVector("text", ElementTypes.u16), [1, 2]);
      assert.deepEqual(store.getHeader("text"), {kind: "image", bpp: 2, bitCount: 32, width: 1, height: 2});
      assert.equal(lines.length, 2);
   });

   it("lists and describes its entries", () => {
      const {store} = makeStore();
      store.register("b", {encoding: "words", words: kGreeting});
      store.register("a", {encoding: "compressed", bytes: kGreetingLZ, uncompressedByteLength: 32});
      assert.deepEqual(store.names(), ["b", "a"]);
      assert.equal(store.has("a"), true);
      assert.equal(store.has("c"), false);
      assert.deepEqual(store.describe(), [
         "b: Generic binary, bpp=1, bits=40 (4 words)",
         "a: Generic binary, bpp=1, bits=40 (4 words)",
      ]);
   });

   it("decodes into caller storage with its own assertion setting", () => {
      const {store} = makeStore({debugAssertions: true});
      store.register("greeting", {encoding: "words", words: kGreeting});
      const dst = new Uint8Array(5);
      assert.equal(store.decodeInto("greeting", ElementTypes.u8, dst), 5);
      assert.deepEqual(Array.from(dst), [0x68, 0x65, 0x6C, 0x6C, 0x6F]);
      assert.throws(
         () => store.decodeInto("greeting", ElementTypes.u8, new Uint8Array(4)),
         (e) => isAssetCodecError(e, "DestinationTooSmall"));
   });

   it("rejects unknown and duplicate names", () => {
      const {store} = makeStore();
      store.register("greeting", {encoding: "words", words: kGreeting});
      assert.throws(
         () => store.register("greeting", {encoding: "words", words: kGreeting}),
         (e) => isAssetCodecError(e, "DuplicateAsset"));
      assert.throws(() => store.getWords("missing"), (e) => isAssetCodecError(e, "UnknownAsset"));
      assert.throws(() => store.decodeToVector("missing", ElementTypes.u8), (e) => isAssetCodecError(e, "UnknownAsset"));
   });
});
