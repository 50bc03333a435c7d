/**
 * Color channel maps
 */

/** Integer RGB channels, each in [0, 255] */
export interface Rgb {
  r: number;
  g: number;
  b: number;
}

/** Linearized sRGB channels, each in [0, 1] */
export interface Srgb {
  r: number;
  g: number;
  b: number;
}

/** CIE 1931 XYZ tristimulus values */
export interface Xyz {
  x: number;
  y: number;
  z: number;
}

/** CIE L*a*b*: L in [0, 100], a and b in [-128, 127] */
export interface Lab {
  L: number;
  a: number;
  b: number;
}

/** Decoded RGBA pixel as read from a raw buffer */
export interface RgbaPixel extends Rgb {
  alpha: number;
}
