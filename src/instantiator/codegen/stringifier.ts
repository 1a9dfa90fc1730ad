/**
 * Target-language literal rendering
 */

import type {
  CanvasFigureLoop,
  CanvasFilledRegionDetermination,
  CanvasGeometryCombine,
} from "../model/types.js";
import type { Color, Matrix3x2, Vector2, Vector3 } from "../model/values.js";

export interface Stringifier {
  readonly deref: string;
  readonly iListAdd: string;
  readonly int64TypeName: string;
  readonly newOperator: string;
  readonly nullLiteral: string;
  readonly readonlyModifier: string;
  readonly scopeResolve: string;
  readonly varKeyword: string;

  bool(value: boolean): string;
  canvasFigureLoop(value: CanvasFigureLoop): string;
  canvasGeometryCombine(value: CanvasGeometryCombine): string;
  color(value: Color): string;
  factoryCall(value: string): string;
  filledRegionDetermination(value: CanvasFilledRegionDetermination): string;
  float(value: number): string;
  hex(value: number): string;
  int32(value: number): string;
  int64(value: bigint | number): string;
  matrix3x2(value: Matrix3x2): string;
  referenceTypeName(value: string): string;
  string(value: string): string;
  /** A time span of the given 100 ns ticks. */
  timeSpanTicks(ticks: bigint | number): string;
  /** A time span read from a named tick constant. */
  timeSpanFromConstant(ticksName: string): string;
  vector2(value: Vector2): string;
  vector3(value: Vector3): string;
}

/**
 * Renderings shared by most C-like targets.
 */
export abstract class StringifierBase implements Stringifier {
  abstract readonly deref: string;
  abstract readonly iListAdd: string;
  abstract readonly int64TypeName: string;
  abstract readonly newOperator: string;
  abstract readonly nullLiteral: string;
  abstract readonly readonlyModifier: string;
  abstract readonly scopeResolve: string;
  abstract readonly varKeyword: string;

  bool(value: boolean): string {
    return value ? "true" : "false";
  }

  abstract canvasFigureLoop(value: CanvasFigureLoop): string;
  abstract canvasGeometryCombine(value: CanvasGeometryCombine): string;
  abstract color(value: Color): string;
  abstract factoryCall(value: string): string;
  abstract filledRegionDetermination(
    value: CanvasFilledRegionDetermination,
  ): string;

  /**
   * Integral values print bare; anything else prints with nine significant
   * digits and a single-precision suffix.
   */
  float(value: number): string {
    if (Math.floor(value) === value) {
      return Object.is(value, -0)
        ? "0"
        : expandExponentialLiteral(value.toFixed(0));
    }
    const text = String(Number(value.toPrecision(9)));
    return `${expandExponentialLiteral(text)}F`;
  }

  hex(value: number): string {
    return `0x${value.toString(16).toUpperCase().padStart(2, "0")}`;
  }

  int32(value: number): string {
    return Math.trunc(value).toString();
  }

  abstract int64(value: bigint | number): string;
  abstract matrix3x2(value: Matrix3x2): string;
  abstract referenceTypeName(value: string): string;

  string(value: string): string {
    return JSON.stringify(value);
  }

  abstract timeSpanTicks(ticks: bigint | number): string;
  abstract timeSpanFromConstant(ticksName: string): string;
  abstract vector2(value: Vector2): string;
  abstract vector3(value: Vector3): string;
}

/**
 * Rewrites `1.5e-7` style text as a plain decimal literal.
 */
export const expandExponentialLiteral = (text: string): string => {
  const match = /^([+-]?)(\d+)(?:\.(\d+))?[eE]([+-]?\d+)$/.exec(text);
  if (!match) {
    return text;
  }

  const sign = match[1] ?? "";
  const integerPart = match[2] ?? "0";
  const fractionPart = match[3] ?? "";
  const exponent = Number(match[4]);

  const digits = `${integerPart}${fractionPart}`;
  const decimalIndex = integerPart.length + exponent;

  if (decimalIndex <= 0) {
    return `${sign}0.${"0".repeat(-decimalIndex)}${digits}`;
  }
  if (decimalIndex >= digits.length) {
    return `${sign}${digits}${"0".repeat(decimalIndex - digits.length)}`;
  }
  return `${sign}${digits.slice(0, decimalIndex)}.${digits.slice(decimalIndex)}`;
};

/**
 * A float for use inside an identifier: at most three decimals, `p` for the
 * point and `m` for a minus sign.
 */
export const floatId = (value: number): string => {
  const rounded = Number(value.toFixed(3));
  const text = Object.is(rounded, -0) ? "0" : String(rounded);
  return expandExponentialLiteral(text).replace(".", "p").replace("-", "m");
};

export const vector2Id = (value: Vector2): string =>
  value.x === value.y
    ? floatId(value.x)
    : `${floatId(value.x)}x${floatId(value.y)}`;
