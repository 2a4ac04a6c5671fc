/**
 * Boot image loaded into the program store on every reset unless a configuration supplies
 * its own: echo received bytes shifted to upper case until a zero byte, then send a newline.
 */
export const DEFAULT_PROGRAM: readonly number[] = [
  0xa0, // IN
  0xc7, // JZ  +7
  0x70, // DEC 16
  0x6f, // DEC 15
  0x61, // DEC 1
  0x80, // OUT
  0xa0, // IN
  0xfb, // JNZ -5
  0x4a, // INC 10
  0x80, // OUT
  0x00, // HALT
];

export function defaultProgramImage(depth: number): Uint8Array {
  const image = new Uint8Array(depth);
  image.set(DEFAULT_PROGRAM.slice(0, depth));
  return image;
}
