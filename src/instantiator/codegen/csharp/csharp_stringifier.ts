/**
 * C# literal rendering
 */

import type {
  CanvasFigureLoop,
  CanvasFilledRegionDetermination,
  CanvasGeometryCombine,
} from "../../model/types.js";
import type {
  Color,
  Matrix3x2,
  Vector2,
  Vector3,
} from "../../model/values.js";
import { StringifierBase } from "../stringifier.js";

export class CSharpStringifier extends StringifierBase {
  readonly deref = ".";
  readonly iListAdd = "Add";
  readonly int64TypeName = "long";
  readonly newOperator = "new";
  readonly nullLiteral = "null";
  readonly readonlyModifier = "readonly";
  readonly scopeResolve = ".";
  readonly varKeyword = "var";

  canvasFigureLoop(value: CanvasFigureLoop): string {
    return `CanvasFigureLoop.${value}`;
  }

  canvasGeometryCombine(value: CanvasGeometryCombine): string {
    return `CanvasGeometryCombine.${value}`;
  }

  color(value: Color): string {
    return `Color.FromArgb(${this.hex(value.a)}, ${this.hex(value.r)}, ${this.hex(value.g)}, ${this.hex(value.b)})`;
  }

  factoryCall(value: string): string {
    return value;
  }

  filledRegionDetermination(value: CanvasFilledRegionDetermination): string {
    return `CanvasFilledRegionDetermination.${value}`;
  }

  int64(value: bigint | number): string {
    return typeof value === "bigint"
      ? value.toString()
      : Math.trunc(value).toString();
  }

  matrix3x2(value: Matrix3x2): string {
    const elements = [
      value.m11,
      value.m12,
      value.m21,
      value.m22,
      value.m31,
      value.m32,
    ].map((element) => this.float(element));
    return `new Matrix3x2(${elements.join(", ")})`;
  }

  referenceTypeName(value: string): string {
    return value;
  }

  timeSpanTicks(ticks: bigint | number): string {
    return `TimeSpan.FromTicks(${this.int64(ticks)})`;
  }

  timeSpanFromConstant(ticksName: string): string {
    return `TimeSpan.FromTicks(${ticksName})`;
  }

  vector2(value: Vector2): string {
    return `new Vector2(${this.float(value.x)}, ${this.float(value.y)})`;
  }

  vector3(value: Vector3): string {
    return `new Vector3(${this.float(value.x)}, ${this.float(value.y)}, ${this.float(value.z)})`;
  }
}
