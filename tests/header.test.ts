import {describe, it} from "node:test";
import assert from "node:assert/strict";

import {
   describeHeader,
   getHeight,
   getWidth,
   headerWordCount,
   isImage,
   packHeader,
   parseHeader,
} from "../src/asset/header";
import {isAssetCodecError} from "../src/asset/errors";

// kind=image bpp=3 bitCount=48, 2x1
const kImageWord0 = 0x0000003000000301n;
const kImageWord1 = 0x0000000000010002n;

describe("parseHeader", () => {
   it("reads word 0 and word 1 of an image", () => {
      assert.deepEqual(parseHeader([kImageWord0, kImageWord1, 0n]), {
         kind: "image",
         bpp: 3,
         bitCount: 48,
         width: 2,
         height: 1,
      });
   });

   it("reads a generic header from a single word", () => {
      // kind=0 bpp=1 bitCount=0x1234
      assert.deepEqual(parseHeader([0x0000123400000100n]), {kind: "generic", bpp: 1, bitCount: 0x1234});
   });

   it("reads the packed palette of a two-color image", () => {
      const bytes = new Uint8Array([
         2, 1, 0, 0, 16, 0, 0, 0,             // kind=2 bpp=1 bitCount=16
         4, 0, 4, 0, 0, 0, 0, 0,              // 4x4
         0x11, 0, 0, 0, 0xEE, 0xDD, 0xCC, 0xBB, // color0, color1
      ]);
      assert.deepEqual(parseHeader(bytes), {
         kind: "dualColorImage",
         bpp: 1,
         bitCount: 16,
         width: 4,
         height: 4,
         color0: 0x11,
         color1: 0xBBCCDDEE,
      });
   });

   it("ignores padding bytes", () => {
      const bytes = new Uint8Array(16);
      bytes.set([1, 3, 0xAA, 0xBB, 48, 0, 0, 0, 2, 0, 1, 0, 0xFF, 0xFF, 0xFF, 0xFF]);
      assert.deepEqual(parseHeader(bytes), {kind: "image", bpp: 3, bitCount: 48, width: 2, height: 1});
   });

   it("rejects unknown kinds", () => {
      assert.throws(() => parseHeader([0x07n]), (e) => isAssetCodecError(e, "UnknownKind"));
   });

   it("rejects image headers with bpp outside 1..4", () => {
      const invalid = (e: unknown) => isAssetCodecError(e, "InvalidHeader");
      // image, bpp=0
      assert.throws(() => parseHeader([0x01n, kImageWord1]), invalid);
      // image, bpp=5
      assert.throws(() => parseHeader([0x0501n, kImageWord1]), invalid);
      // two-color, bpp=8
      assert.throws(() => parseHeader([0x0802n, kImageWord1, 0n]), invalid);
      // generic payloads keep any bpp
      assert.equal(parseHeader([0x0800n]).bpp, 8);
   });

   it("rejects sequences shorter than the header their kind needs", () => {
      assert.throws(() => parseHeader([]), (e) => isAssetCodecError(e, "Truncated"));
      assert.throws(() => parseHeader([kImageWord0]), (e) => isAssetCodecError(e, "Truncated"));
      assert.throws(() => parseHeader([0x02n, 0n]), (e) => isAssetCodecError(e, "Truncated"));
   });

   it("rejects byte sequences that are not whole words", () => {
      assert.throws(() => parseHeader(new Uint8Array(12)), (e) => isAssetCodecError(e, "MisalignedWords"));
   });

   it("accepts BigUint64Array sources", () => {
      const words = new BigUint64Array([kImageWord0, kImageWord1, 0n]);
      assert.equal(parseHeader(words).kind, "image");
   });
});

describe("header queries", () => {
   it("isImage is true for both image kinds only", () => {
      assert.equal(isImage([kImageWord0]), true);
      assert.equal(isImage([0x02n]), true);
      assert.equal(isImage([0x00n]), false);
      assert.equal(isImage([0x09n]), false);
   });

   it("width and height come from word 1 of images", () => {
      assert.equal(getWidth([kImageWord0, kImageWord1]), 2);
      assert.equal(getHeight([kImageWord0, kImageWord1]), 1);
   });

   it("width and height are absent for generic payloads", () => {
      assert.equal(getWidth([0x0000000800000100n]), undefined);
      assert.equal(getHeight([0x0000000800000100n]), undefined);
   });

   it("header word counts per kind", () => {
      assert.equal(headerWordCount("generic"), 1);
      assert.equal(headerWordCount("image"), 2);
      assert.equal(headerWordCount("dualColorImage"), 3);
   });
});

describe("packHeader", () => {
   it("writes the same words parseHeader reads", () => {
      const bytes = packHeader({kind: "image", bpp: 3, bitCount: 48, width: 2, height: 1});
      assert.equal(bytes.length, 24);
      assert.deepEqual(Array.from(bytes.subarray(0, 16)), [1, 3, 0, 0, 48, 0, 0, 0, 2, 0, 1, 0, 0, 0, 0, 0]);
      assert.deepEqual(Array.from(bytes.subarray(16)), [0, 0, 0, 0, 0, 0, 0, 0]);
   });

   it("packs both palette colors of a two-color image", () => {
      const header = {
         kind: "dualColorImage",
         bpp: 4,
         bitCount: 9,
         width: 3,
         height: 3,
         color0: 0xFF000000,
         color1: 0x00FFFFFF,
      } as const;
      const bytes = packHeader(header);
      assert.deepEqual(Array.from(bytes.subarray(16)), [0, 0, 0, 0xFF, 0xFF, 0xFF, 0xFF, 0]);
      assert.deepEqual(parseHeader(bytes), header);
   });

   it("rejects fields that do not fit", () => {
      const invalid = (e: unknown) => isAssetCodecError(e, "InvalidHeader");
      assert.throws(() => packHeader({kind: "image", bpp: 5, bitCount: 0, width: 0, height: 0}), invalid);
      assert.throws(() => packHeader({kind: "image", bpp: 1, bitCount: 0, width: 0x10000, height: 0}), invalid);
      assert.throws(() => packHeader({kind: "generic", bpp: 1, bitCount: -1}), invalid);
      assert.throws(() => packHeader({kind: "generic", bpp: 1, bitCount: 2 ** 32}), invalid);
   });
});

describe("describeHeader", () => {
   it("summarizes each kind", () => {
      assert.equal(describeHeader({kind: "generic", bpp: 1, bitCount: 64}), "Generic binary, bpp=1, bits=64");
      assert.equal(
         describeHeader({kind: "image", bpp: 3, bitCount: 48, width: 2, height: 1}), "Image, bpp=3, bits=48, 2x1");
      assert.equal(
         describeHeader({kind: "dualColorImage", bpp: 1, bitCount: 4, width: 2, height: 2, color0: 0, color1: 0xff}),
         "Two-color image, bpp=1, bits=4, 2x2, colors=0x0/0xff");
   });
});
