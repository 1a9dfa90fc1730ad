/**
 * Integration tests: scene files through the full generation pipeline
 */

import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { describe, expect, it } from "vitest";
import { BatchGenerator } from "../../../src/instantiator/batch/batch_generator.js";
import { SceneInstantiator } from "../../../src/instantiator/scene_instantiator.js";
import { methodBody } from "../../unit/instantiator/helpers.js";

const scenesDir = fileURLToPath(new URL("../../fixtures/scenes", import.meta.url));
const expectedDir = fileURLToPath(
  new URL("../../fixtures/expected", import.meta.url),
);

describe("scene pipeline", () => {
  it("should generate the expected Pulse class", () => {
    const result = new SceneInstantiator().generateFile(
      path.join(scenesDir, "pulse.json"),
    );

    expect(result.className).toBe("Pulse");
    expect(result.code).toBe(
      fs.readFileSync(path.join(expectedDir, "Pulse.cs"), "utf8"),
    );
  });

  it("should generate every fixture scene in a batch", () => {
    const outputDir = fs.mkdtempSync(path.join(os.tmpdir(), "scene-pipeline-"));

    const result = new BatchGenerator().generate({
      source: scenesDir,
      outputDir,
    });

    expect(result.outputs.map((output) => output.className)).toEqual([
      "LoadingBar",
      "Pulse",
    ]);

    const code = fs.readFileSync(path.join(outputDir, "LoadingBar.cs"), "utf8");
    expect(code).toContain("    sealed class LoadingBar : IAnimatedVisualSource\n");
    expect(
      methodBody(code, "CompositionColorBrush ColorBrush_Gray()"),
    ).toEqual([
      "return _colorBrush_Gray = _c.CreateColorBrush(Color.FromArgb(0xFF, 0x80, 0x80, 0x80));",
    ]);

    const track = methodBody(code, "CompositionSpriteShape SpriteShape_000()");
    expect(track).toContain("result.Geometry = Rectangle_200x20_000();");
    expect(track).toContain("result.StrokeBrush = ColorBrush_Gray();");
    expect(track).toContain("result.StrokeThickness = 2;");

    const fill = methodBody(code, "CompositionSpriteShape SpriteShape_001()");
    expect(fill).toContain("result.FillBrush = _colorBrush_Gray;");
    expect(fill).toContain("result.Geometry = Rectangle_200x20_001();");

    const root = methodBody(code, "ContainerVisual Root()");
    expect(root).toContain("result.Clip = InsetClip();");
    expect(root).toContain("var children = result.Children;");
    expect(root).toContain("children.InsertAtTop(ShapeVisual());");

    expect(methodBody(code, "InsetClip InsetClip()")).toContain(
      "result.RightInset = 4;",
    );
    expect(
      methodBody(code, "StepEasingFunction StepEasingFunction()"),
    ).toContain("result.StepCount = 4;");
    expect(code).toContain("                _rootVisual = Root();\n");
  });
});
