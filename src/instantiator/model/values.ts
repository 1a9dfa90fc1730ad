/**
 * Value types carried by composition objects
 */

export interface Vector2 {
  x: number;
  y: number;
}

export interface Vector3 {
  x: number;
  y: number;
  z: number;
}

export interface Matrix3x2 {
  m11: number;
  m12: number;
  m21: number;
  m22: number;
  m31: number;
  m32: number;
}

/**
 * 8-bit ARGB color
 */
export interface Color {
  a: number;
  r: number;
  g: number;
  b: number;
}

export const IDENTITY_MATRIX: Matrix3x2 = {
  m11: 1,
  m12: 0,
  m21: 0,
  m22: 1,
  m31: 0,
  m32: 0,
};

// Basic named colors, keyed by AARRGGBB.
const NAMED_COLORS = new Map<string, string>([
  ["FF000000", "Black"],
  ["FF0000FF", "Blue"],
  ["FF00FFFF", "Aqua"],
  ["FF008000", "Green"],
  ["FF008080", "Teal"],
  ["FF000080", "Navy"],
  ["FF00FF00", "Lime"],
  ["FF800000", "Maroon"],
  ["FF800080", "Purple"],
  ["FF808000", "Olive"],
  ["FF808080", "Gray"],
  ["FFC0C0C0", "Silver"],
  ["FFFF0000", "Red"],
  ["FFFF00FF", "Fuchsia"],
  ["FFFFFF00", "Yellow"],
  ["FFFFFFFF", "White"],
]);

const hexByte = (value: number): string =>
  value.toString(16).toUpperCase().padStart(2, "0");

export const colorToHex = (color: Color): string =>
  `${hexByte(color.a)}${hexByte(color.r)}${hexByte(color.g)}${hexByte(color.b)}`;

/**
 * Name usable inside an identifier: a basic color name, or AARRGGBB.
 */
export const colorName = (color: Color): string => {
  const hex = colorToHex(color);
  return NAMED_COLORS.get(hex) ?? hex;
};

export const vector2Equals = (a: Vector2, b: Vector2): boolean =>
  a.x === b.x && a.y === b.y;

export const isZeroVector2 = (value: Vector2): boolean =>
  value.x === 0 && value.y === 0;
