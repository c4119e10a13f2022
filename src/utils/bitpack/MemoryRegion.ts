export interface MemoryRegionDto {
   name: string;
   address: number;
   size: number;
}

// a named byte span inside a buffer. readers and writers are bounded by it.
export class MemoryRegion {
   name: string;
   address: number;
   size: number;

   constructor(data: MemoryRegionDto);
   constructor(name: string, address: number, size: number);
   constructor(dataOrName: MemoryRegionDto|string, address = 0, size = 0) {
      const data: MemoryRegionDto = typeof dataOrName === "string" ? {name: dataOrName, address, size} : dataOrName;

      if (!Number.isFinite(data.address)) {
         throw new Error(`MemoryRegion ${data.name} address must be a number (${data.address})`);
      }
      if (!Number.isFinite(data.size)) {
         throw new Error(`MemoryRegion ${data.name} size must be a number (${data.size})`);
      }
      if (data.size < 0) {
         throw new Error(`MemoryRegion ${data.name} cannot have negative size (${data.size})`);
      }

      this.name = data.name;
      this.address = data.address;
      this.size = data.size;
   }
   endAddress() {
      return this.address + this.size;
   }
   containsAddress(addr: number) {
      return addr >= this.address && addr < this.endAddress();
   }
   containsRegion(other: MemoryRegion) {
      return this.address <= other.address && this.endAddress() >= other.endAddress();
   }
   // sub-region relative to this one's start; must lie inside.
   slice(name: string, offset: number, size: number) {
      const ret = new MemoryRegion({name: `${this.name}.${name}`, address: this.address + offset, size});
      if (!this.containsRegion(ret)) {
         throw new Error(`MemoryRegion ${this.name} cannot provide ${ret.toString()} (out of range)`);
      }
      return ret;
   }
   // throws unless bits [bitOffset, bitOffset + bitsNeeded) lie inside the region
   assertBitsFit(bitOffset: number, bitsNeeded: number, context: string): void {
      if (bitOffset < 0 || bitOffset + bitsNeeded > this.size * 8) {
         throw new Error(
            `${context}: out of bounds (need ${bitsNeeded} bits at bitOffset ${bitOffset}, region=${this.toString()})`);
      }
   }
   toString() {
      return `${this.name} [0x${this.address.toString(16)}..0x${this.endAddress().toString(16)}] (${this.size} bytes)`;
   }
}

/**
 * A cursor that tracks a bit-level position within a memory region.
 * Offsets are plain numbers, not int32, so regions past 256 MiB stay addressable.
 */
export class BitCursor {
   region: MemoryRegion;
   bitOffset: number;
   constructor(region: MemoryRegion, bitOffset = 0) {
      this.region = region;
      this.bitOffset = Math.trunc(bitOffset);
   }
   // bytes needed to cover every bit written so far
   currentByteLengthCeil() {
      return Math.ceil(this.bitOffset / 8);
   }
   byteIndexAbs() {
      return this.region.address + Math.floor(this.bitOffset / 8);
   }
   bitIndexInByte() {
      return this.bitOffset % 8;
   }
   seekBits(deltaBits: number) {
      this.bitOffset += Math.trunc(deltaBits);
      return this;
   }
   // no-op when already byte aligned
   advanceToNextByteBoundary() {
      const m = this.bitOffset % 8;
      if (m !== 0)
         this.bitOffset += 8 - m;
      return this;
   }
}
