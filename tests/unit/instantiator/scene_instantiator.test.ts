import { describe, expect, it } from "vitest";
import {
  DEFAULT_CLASS_NAME,
  SceneInstantiator,
  classNameFromPath,
} from "../../../src/instantiator/scene_instantiator.js";

const json = (className?: string) => ({
  className,
  width: 20,
  height: 10,
  durationMs: 250,
  root: "root",
  objects: { root: { type: "ContainerVisual" } },
});

describe("classNameFromPath", () => {
  it("turns a file name into a type name", () => {
    expect(classNameFromPath("scenes/loading-bar.json")).toBe("LoadingBar");
    expect(classNameFromPath("my_scene.v2.json")).toBe("MySceneV2");
    expect(classNameFromPath("3d-spin.json")).toBe("_3dSpin");
    expect(classNameFromPath("---.json")).toBeUndefined();
  });
});

describe("SceneInstantiator", () => {
  it("prefers the class name from the options", () => {
    const result = new SceneInstantiator().generate(json("FromScene"), {
      className: "FromOptions",
    });
    expect(result.className).toBe("FromOptions");
    expect(result.code).toContain("    sealed class FromOptions : IAnimatedVisualSource\n");
  });

  it("rejects a class name option that is not an identifier", () => {
    expect(() =>
      new SceneInstantiator().generate(json(), { className: "Bad-Name" }),
    ).toThrow("Invalid class name: Bad-Name");
  });

  it("falls back to the scene, then the path, then a default", () => {
    const instantiator = new SceneInstantiator();
    expect(instantiator.generate(json("FromScene")).className).toBe("FromScene");
    expect(
      instantiator.generate(json(), {}, "scenes/pulse-ring.json").className,
    ).toBe("PulseRing");
    expect(instantiator.generate(json()).className).toBe(DEFAULT_CLASS_NAME);
  });

  it("carries the scene size and duration into the class", () => {
    const { code } = new SceneInstantiator().generate(json(), {
      namespace: "Demo",
    });
    expect(code).toContain("\nnamespace Demo\n");
    expect(code).toContain("            const long c_durationTicks = 2500000;\n");
    expect(code).toContain(
      "            Vector2 IAnimatedVisual.Size => new Vector2(20, 10);\n",
    );
  });

  it("compiles a scene that binds one expression to two properties", () => {
    const { code } = new SceneInstantiator().generate({
      width: 10,
      height: 10,
      durationMs: 100,
      root: "root",
      objects: {
        root: {
          type: "ContainerVisual",
          animators: [
            { property: "Opacity", animation: "spin" },
            { property: "RotationAngleInDegrees", animation: "spin" },
          ],
        },
        spin: {
          type: "ExpressionAnimation",
          expression: "p.X",
          referenceParameters: { p: "ease" },
        },
        ease: { type: "LinearEasingFunction" },
      },
    });

    expect(code).toContain("            ExpressionAnimation _expressionAnimation;\n");
    expect(code).toContain(
      '                result.StartAnimation("Opacity", ExpressionAnimation());\n',
    );
    expect(code).toContain(
      '                result.StartAnimation("RotationAngleInDegrees", _expressionAnimation);\n',
    );
    expect(code).toContain(
      '                result.SetReferenceParameter("p", LinearEasingFunction());\n',
    );
  });
});
