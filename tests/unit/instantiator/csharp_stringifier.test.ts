import { describe, expect, it } from "vitest";
import { CSharpStringifier } from "../../../src/instantiator/codegen/csharp/csharp_stringifier.js";
import {
  expandExponentialLiteral,
  floatId,
  vector2Id,
} from "../../../src/instantiator/codegen/stringifier.js";
import {
  CanvasFigureLoop,
  CanvasGeometryCombine,
} from "../../../src/instantiator/model/types.js";
import { IDENTITY_MATRIX } from "../../../src/instantiator/model/values.js";

const s = new CSharpStringifier();

describe("CSharpStringifier", () => {
  it("prints integral floats bare and others with an F suffix", () => {
    expect(s.float(1)).toBe("1");
    expect(s.float(-0)).toBe("0");
    expect(s.float(100000)).toBe("100000");
    expect(s.float(0.5)).toBe("0.5F");
    expect(s.float(-2.25)).toBe("-2.25F");
    expect(s.float(1 / 3)).toBe("0.333333333F");
  });

  it("never prints a float in exponent form", () => {
    expect(s.float(1e-7)).toBe("0.0000001F");
    expect(s.float(1e21)).toBe("1000000000000000000000");
    expect(s.float(-2.5e21)).toBe("-2500000000000000000000");
  });

  it("renders colors as hex bytes", () => {
    expect(s.color({ a: 255, r: 255, g: 128, b: 0 })).toBe(
      "Color.FromArgb(0xFF, 0xFF, 0x80, 0x00)",
    );
    expect(s.hex(10)).toBe("0x0A");
  });

  it("renders vectors and matrices", () => {
    expect(s.vector2({ x: 1, y: 0.5 })).toBe("new Vector2(1, 0.5F)");
    expect(s.vector3({ x: 0, y: 0, z: 1 })).toBe("new Vector3(0, 0, 1)");
    expect(s.matrix3x2(IDENTITY_MATRIX)).toBe(
      "new Matrix3x2(1, 0, 0, 1, 0, 0)",
    );
  });

  it("renders time spans from ticks or from a constant", () => {
    expect(s.timeSpanTicks(5000000)).toBe("TimeSpan.FromTicks(5000000)");
    expect(s.timeSpanTicks(5n)).toBe("TimeSpan.FromTicks(5)");
    expect(s.timeSpanFromConstant("c_durationTicks")).toBe(
      "TimeSpan.FromTicks(c_durationTicks)",
    );
  });

  it("escapes strings", () => {
    expect(s.string('say "hi"')).toBe('"say \\"hi\\""');
  });

  it("renders enums and integers", () => {
    expect(s.canvasFigureLoop(CanvasFigureLoop.Closed)).toBe(
      "CanvasFigureLoop.Closed",
    );
    expect(s.canvasGeometryCombine(CanvasGeometryCombine.Xor)).toBe(
      "CanvasGeometryCombine.Xor",
    );
    expect(s.int32(3.7)).toBe("3");
    expect(s.bool(false)).toBe("false");
  });
});

describe("expandExponentialLiteral", () => {
  it("moves the decimal point", () => {
    expect(expandExponentialLiteral("1.5e-7")).toBe("0.00000015");
    expect(expandExponentialLiteral("2.5e+3")).toBe("2500");
    expect(expandExponentialLiteral("-1e-2")).toBe("-0.01");
  });

  it("leaves plain literals alone", () => {
    expect(expandExponentialLiteral("42")).toBe("42");
  });
});

describe("identifier fragments", () => {
  it("spells floats with p and m", () => {
    expect(floatId(2)).toBe("2");
    expect(floatId(0.5)).toBe("0p5");
    expect(floatId(-1.25)).toBe("m1p25");
    expect(floatId(0.12345)).toBe("0p123");
  });

  it("collapses square vectors", () => {
    expect(vector2Id({ x: 10, y: 10 })).toBe("10");
    expect(vector2Id({ x: 10, y: 20 })).toBe("10x20");
  });
});
