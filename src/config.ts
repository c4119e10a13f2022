export interface AssetCodecConfig {
   // check write-into-buffer destinations before writing. the size is otherwise the caller's contract.
   debugAssertions: boolean;
   // log a timed scope each time the payload store decompresses an entry
   logDecompression: boolean;
}

export const kDefaultConfig: Readonly<AssetCodecConfig> = {
   debugAssertions: process.env.NODE_ENV !== "production",
   logDecompression: true,
};

export function resolveConfig(partial: Partial<AssetCodecConfig> = {}): AssetCodecConfig {
   return {
      debugAssertions: partial.debugAssertions ?? kDefaultConfig.debugAssertions,
      logDecompression: partial.logDecompression ?? kDefaultConfig.logDecompression,
   };
}
