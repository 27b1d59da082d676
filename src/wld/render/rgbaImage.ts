export type Rgba = readonly [number, number, number, number];

export type RgbaImage = {
  width: number;
  height: number;
  data: Uint8Array; // length = width*height*4 (RGBA)
};

export function createImage(width: number, height: number, fill: Rgba = [0, 0, 0, 0]): RgbaImage {
  if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
    throw new Error(`Invalid image size ${width}x${height}`);
  }
  const img: RgbaImage = { width, height, data: new Uint8Array(width * height * 4) };
  fillRect(img, 0, 0, width, height, fill);
  return img;
}

export function fillRect(
  img: RgbaImage,
  left: number,
  top: number,
  w: number,
  h: number,
  [r, g, b, a]: Rgba,
): void {
  const x1 = Math.min(img.width, left + w);
  const y1 = Math.min(img.height, top + h);
  for (let y = Math.max(0, top); y < y1; y++) {
    for (let x = Math.max(0, left); x < x1; x++) {
      const o = (y * img.width + x) * 4;
      img.data[o + 0] = r;
      img.data[o + 1] = g;
      img.data[o + 2] = b;
      img.data[o + 3] = a;
    }
  }
}

export function pixelAt(img: RgbaImage, x: number, y: number): Rgba {
  const o = (y * img.width + x) * 4;
  return [img.data[o + 0] ?? 0, img.data[o + 1] ?? 0, img.data[o + 2] ?? 0, img.data[o + 3] ?? 0];
}
