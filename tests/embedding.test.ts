import {describe, it} from "node:test";
import assert from "node:assert/strict";

import {decodeToVector} from "../src/asset/decoder";
import {ElementTypes} from "../src/asset/elementTypes";
import {base85Decode, base85Encode, wordsFromBase85, wordsToBase85} from "../src/asset/embedding";
import {isAssetCodecError} from "../src/asset/errors";
import {packGeneric} from "../src/asset/packer";

const invalidEncoding = (e: unknown) => isAssetCodecError(e, "InvalidEncoding");

describe("base85", () => {
   it("encodes groups of four bytes as five chars", () => {
      assert.equal(base85Encode(new Uint8Array([0, 0, 0, 0])), "!!!!!");
      assert.equal(base85Encode(new Uint8Array([0xFF, 0xFF, 0xFF, 0xFF])), "s8W-!");
      assert.equal(base85Encode(new Uint8Array([0, 0, 0, 1])), "!!!!\"");
   });

   it("pads a short last group with zeros", () => {
      assert.equal(base85Encode(new Uint8Array([0xFF, 0xFF])).length, 5);
      assert.deepEqual(Array.from(base85Decode(base85Encode(new Uint8Array([0xFF, 0xFF])), 2)), [0xFF, 0xFF]);
   });

   it("decodes back to the expected length", () => {
      assert.deepEqual(Array.from(base85Decode("s8W-!", 4)), [0xFF, 0xFF, 0xFF, 0xFF]);
      assert.deepEqual(Array.from(base85Decode("s8W-!!!!!\"", 6)), [0xFF, 0xFF, 0xFF, 0xFF, 0, 0]);
   });

   it("rejects malformed text", () => {
      assert.throws(() => base85Decode("abc", 2), invalidEncoding);
      assert.throws(() => base85Decode("!!!!v", 4), invalidEncoding);
      assert.throws(() => base85Decode("uuuuu", 4), invalidEncoding);
      assert.throws(() => base85Decode("!!!!!", 5), invalidEncoding);
   });
});

describe("word embedding", () => {
   it("round trips a packed payload", () => {
      const words = packGeneric(new Uint8Array([1, 2, 3]));
      const embedded = wordsToBase85(words);
      assert.equal(embedded.byteLength, 32);
      assert.equal(embedded.text.length, 40);

      const restored = wordsFromBase85(embedded.text, embedded.byteLength);
      assert.deepEqual(Array.from(restored), Array.from(words));
      assert.deepEqual(decodeToVector(restored, ElementTypes.u8), [1, 2, 3]);
   });

   it("serializes bigint words little-endian first", () => {
      assert.deepEqual(wordsToBase85([0xFFFFFFFFn]), {text: "s8W-!!!!!!", byteLength: 8});
   });

   it("rejects a byte length that is not whole words", () => {
      const {text} = wordsToBase85(packGeneric(new Uint8Array(1)));
      assert.throws(() => wordsFromBase85(text, 30), (e) => isAssetCodecError(e, "MisalignedWords"));
   });
});
