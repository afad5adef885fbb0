export const U4_MASK = 0xf;
export const U8_MASK = 0xff;
export const U16_MASK = 0xffff;
export const U17_MASK = 0x1ffff;

export function zeroExtend8(x: number): number {
  return x & U8_MASK;
}

export function zeroExtend16(x: number): number {
  return x & U16_MASK;
}

export function zeroExtend17(x: number): number {
  return x & U17_MASK;
}

export function bit(x: number, pos: number): number {
  return (x >>> pos) & 1;
}

export function lowNibble(x: number): number {
  return x & U4_MASK;
}

export function highNibble(x: number): number {
  return (x >>> 4) & U4_MASK;
}

// hi goes to bits [7:4], lo to bits [3:0]
export function joinNibbles(hi: number, lo: number): number {
  return ((hi & U4_MASK) << 4) | (lo & U4_MASK);
}

export function lowByte(x: number): number {
  return x & U8_MASK;
}

export function highByte(x: number): number {
  return (x >>> 8) & U8_MASK;
}

export function joinBytes(hi: number, lo: number): number {
  return ((hi & U8_MASK) << 8) | (lo & U8_MASK);
}

export function hex(x: number, digits: number): string {
  return '0x' + (x >>> 0).toString(16).toUpperCase().padStart(digits, '0');
}

export function crc32(data: Uint8Array): string {
  let crc = 0xFFFFFFFF >>> 0;
  for (let i = 0; i < data.length; i++) {
    let c = (crc ^ data[i]!) & 0xFF;
    for (let k = 0; k < 8; k++) {
      const mask = -(c & 1);
      c = (c >>> 1) ^ (0xEDB88320 & mask);
    }
    crc = (crc >>> 8) ^ c;
  }
  crc = (~crc) >>> 0;
  return (crc >>> 0).toString(16).padStart(8, '0');
}
