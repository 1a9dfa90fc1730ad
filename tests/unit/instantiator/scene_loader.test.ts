import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { SceneLoadError } from "../../../src/instantiator/errors/codegen_errors.js";
import { SceneLoader, parseColor } from "../../../src/instantiator/model/scene_loader.js";
import { CompositionObjectType } from "../../../src/instantiator/model/types.js";

const scene = (objects: Record<string, unknown>, root = "root") => ({
  width: 10,
  height: 10,
  durationMs: 100,
  root,
  objects,
});

const captureLoadError = (json: unknown): SceneLoadError => {
  try {
    new SceneLoader().load(json);
  } catch (err) {
    if (err instanceof SceneLoadError) return err;
    throw err;
  }
  throw new Error("Expected a SceneLoadError");
};

describe("SceneLoader", () => {
  it("resolves ids into shared objects and applies defaults", () => {
    const loaded = new SceneLoader().load(
      scene({
        root: { type: "ShapeVisual", shapes: ["a", "b"] },
        a: { type: "CompositionSpriteShape", fillBrush: "red", shortDescription: "A" },
        b: { type: "CompositionSpriteShape", fillBrush: "red", strokeThickness: 3 },
        red: { type: "CompositionColorBrush", color: "#FFFF0000" },
      }),
    );

    const root = loaded.root;
    if (root.type !== CompositionObjectType.ShapeVisual) {
      throw new Error("Expected a shape visual");
    }
    const [a, b] = root.shapes;
    if (
      a?.type !== CompositionObjectType.CompositionSpriteShape ||
      b?.type !== CompositionObjectType.CompositionSpriteShape
    ) {
      throw new Error("Expected two sprite shapes");
    }
    expect(a.fillBrush).toBe(b.fillBrush);
    expect(a.fillBrush?.color).toEqual({ a: 255, r: 255, g: 0, b: 0 });
    expect(a.shortDescription).toBe("A");
    expect(a.strokeThickness).toBe(1);
    expect(b.strokeThickness).toBe(3);
    expect(loaded.sourcePath).toBe("<memory>");
    expect(loaded.className).toBeUndefined();
  });

  it("allows collections to refer back to their owner", () => {
    const loaded = new SceneLoader().load(
      scene({
        root: {
          type: "ContainerVisual",
          animators: [{ property: "Offset.X", animation: "follow" }],
        },
        follow: {
          type: "ExpressionAnimation",
          expression: "Self.Size.X",
          referenceParameters: { Self: "root" },
        },
      }),
    );

    const animator = loaded.root.animators[0];
    expect(animator?.animatedProperty).toBe("Offset.X");
    expect(animator?.animation.referenceParameters.get("Self")).toBe(
      loaded.root,
    );
  });

  it("builds controllers with their own animators", () => {
    const loaded = new SceneLoader().load(
      scene({
        root: {
          type: "ContainerVisual",
          animators: [
            {
              property: "Opacity",
              animation: "fade",
              controller: {
                animators: [{ property: "Progress", animation: "drive" }],
              },
            },
          ],
        },
        fade: {
          type: "ScalarKeyFrameAnimation",
          duration: 100,
          keyFrames: [
            { progress: 0, value: 1, easing: "linear" },
            { progress: 1, expression: "this.StartingValue", easing: "linear" },
          ],
        },
        drive: { type: "ExpressionAnimation", expression: "0.5" },
        linear: { type: "LinearEasingFunction" },
      }),
    );

    const animator = loaded.root.animators[0];
    const fade = animator?.animation;
    if (fade?.type !== CompositionObjectType.ScalarKeyFrameAnimation) {
      throw new Error("Expected a scalar animation");
    }
    expect(fade.keyFrames.map((keyFrame) => keyFrame.kind)).toEqual([
      "value",
      "expression",
    ]);
    expect(fade.keyFrames[0]?.easing).toBe(fade.keyFrames[1]?.easing);
    expect(
      animator?.controller?.animators.map((a) => a.animatedProperty),
    ).toEqual(["Progress"]);
  });

  it("reports unknown ids and wrong kinds together", () => {
    const error = captureLoadError(
      scene({
        root: { type: "ShapeVisual", shapes: ["missing", "brush"] },
        brush: { type: "CompositionColorBrush", color: "#FF000000" },
      }),
    );

    expect(error.issues).toEqual([
      { path: "objects.root.shapes.0", message: 'Unknown object id "missing"' },
      {
        path: "objects.root.shapes.1",
        message: 'Expected a shape, got CompositionColorBrush "brush"',
      },
    ]);
    expect(error.message).toBe(
      [
        "Scene <memory> is invalid (2 issue(s)):",
        '- objects.root.shapes.0: Unknown object id "missing"',
        '- objects.root.shapes.1: Expected a shape, got CompositionColorBrush "brush"',
      ].join("\n"),
    );
  });

  it("rejects a root that is not a visual", () => {
    const error = captureLoadError(
      scene(
        { brush: { type: "CompositionColorBrush", color: "#FF000000" } },
        "brush",
      ),
    );
    expect(error.issues).toEqual([
      {
        path: "root",
        message: 'Expected a visual, got CompositionColorBrush "brush"',
      },
    ]);
  });

  it("reports schema violations with their paths", () => {
    const error = captureLoadError(
      scene({
        root: { type: "ShapeVisual" },
        b: { type: "CompositionColorBrush", color: "red" },
        anim: {
          type: "ScalarKeyFrameAnimation",
          duration: 100,
          keyFrames: [{ progress: 0, value: 1, expression: "1", easing: "e" }],
        },
      }),
    );

    expect(error.issues).toEqual([
      {
        path: "objects.b.color",
        message: "Expected a color in the form #AARRGGBB",
      },
      {
        path: "objects.anim.keyFrames.0",
        message: "Expected exactly one of value or expression",
      },
    ]);
  });

  it("reports an unknown object type at its discriminator", () => {
    const error = captureLoadError(
      scene({ root: { type: "ContainerVisual" }, x: { type: "Sprite" } }),
    );
    expect(error.issues.map((issue) => issue.path)).toEqual(["objects.x.type"]);
  });

  it("reports a missing document field", () => {
    const error = captureLoadError({
      height: 10,
      durationMs: 100,
      root: "root",
      objects: {},
    });
    expect(error.issues).toEqual([{ path: "width", message: "Required" }]);
  });

  it("rejects cycles through single-valued references", () => {
    const error = captureLoadError(
      scene({
        root: { type: "ShapeVisual", shapes: ["s"] },
        s: { type: "CompositionSpriteShape", geometry: "g" },
        g: { type: "CompositionPathGeometry", path: "p" },
        p: { type: "CompositionPath", source: "a" },
        a: {
          type: "CanvasGeometry",
          geometryType: "Combination",
          a: "b",
          b: "e",
          combineMode: "Union",
        },
        b: {
          type: "CanvasGeometry",
          geometryType: "Combination",
          a: "a",
          b: "e",
          combineMode: "Union",
        },
        e: {
          type: "CanvasGeometry",
          geometryType: "Ellipse",
          x: 0,
          y: 0,
          radiusX: 1,
          radiusY: 1,
        },
      }),
    );

    expect(error.issues).toEqual([
      { path: "objects.b.a", message: "Reference cycle: a -> b -> a" },
    ]);
  });

  it("validates objects the root does not reach", () => {
    const error = captureLoadError(
      scene({
        root: { type: "ContainerVisual" },
        orphan: { type: "CompositionSpriteShape", fillBrush: "nothing" },
      }),
    );
    expect(error.issues).toEqual([
      { path: "objects.orphan.fillBrush", message: 'Unknown object id "nothing"' },
    ]);
  });

  it("reports unreadable JSON as a document issue", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "scene-loader-"));
    try {
      const file = path.join(dir, "broken.json");
      fs.writeFileSync(file, "{ not json", "utf8");

      let caught: unknown;
      try {
        new SceneLoader().loadFile(file);
      } catch (err) {
        caught = err;
      }

      expect(caught).toBeInstanceOf(SceneLoadError);
      if (caught instanceof SceneLoadError) {
        expect(caught.sourcePath).toBe(file);
        expect(caught.issues.map((issue) => issue.path)).toEqual(["(document)"]);
      }
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});

describe("parseColor", () => {
  it("reads #AARRGGBB", () => {
    expect(parseColor("#80102030")).toEqual({ a: 128, r: 16, g: 32, b: 48 });
  });
});
