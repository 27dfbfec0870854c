// bmp-js ships no type declarations
declare module "bmp-js" {
  interface BmpImage {
    width: number;
    height: number;
    /** ABGR, four bytes per pixel, top row first */
    data: Buffer;
  }

  const bmp: {
    decode(buffer: Buffer): BmpImage;
    encode(image: BmpImage, quality?: number): BmpImage;
  };
  export = bmp;
}
