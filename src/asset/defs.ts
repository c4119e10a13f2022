// wire layout constants.

export const kWordByteSize = 8;

// the header always reserves three words; the payload starts right after them.
export const kHeaderWordCount = 3;
export const kHeaderByteSize = kHeaderWordCount * kWordByteSize; // 24
export const kPayloadByteOffset = kHeaderByteSize;

export const kPayloadKind = {
   generic: {value: 0, title: "Generic binary", headerWords: 1},
   image: {value: 1, title: "Image", headerWords: 2},
   dualColorImage: {value: 2, title: "Two-color image", headerWords: 3},
} as const;

export type PayloadKind = keyof typeof kPayloadKind;
export type PayloadKindValue = (typeof kPayloadKind)[PayloadKind]["value"];

export const kPayloadKinds: readonly PayloadKind[] = ["generic", "image", "dualColorImage"];

export function payloadKindFromValue(value: number): PayloadKind|undefined {
   switch (value) {
      case 0:
         return "generic";
      case 1:
         return "image";
      case 2:
         return "dualColorImage";
      default:
         return undefined;
   }
}

// image channel groups are 1..4 bytes (gray, gray+alpha, rgb, rgba)
export const kMinImageBpp = 1;
export const kMaxImageBpp = 4;
