import { describe, expect, it } from "vitest";
import { Compositor } from "../../../src/instantiator/model/compositor.js";
import { RED, compileScene, countOccurrences, methodBody, methodSignatures } from "./helpers.js";

const c = new Compositor();

describe("annotate", () => {
  it("stores a brush shared by two shapes and builds it once", () => {
    const brush = c.createColorBrush(RED);
    const sprite1 = c.createSpriteShape({ fillBrush: brush });
    const sprite2 = c.createSpriteShape({ fillBrush: brush });
    const root = c.createShapeVisual({ shapes: [sprite1, sprite2] });

    const { code, context } = compileScene(root);
    const brushNode = context.nodeFor(brush);

    expect(brushNode.name).toBe("ColorBrush_Red");
    expect(brushNode.requiresStorage).toBe(true);
    expect(brushNode.inboundReferences.map((node) => node.name)).toEqual([
      "SpriteShape_000",
      "SpriteShape_001",
    ]);
    expect(code).toContain("            CompositionColorBrush _colorBrush_Red;\n");
    expect(
      methodBody(code, "CompositionColorBrush ColorBrush_Red()"),
    ).toEqual([
      "return _colorBrush_Red = _c.CreateColorBrush(Color.FromArgb(0xFF, 0xFF, 0x00, 0x00));",
    ]);
    expect(methodBody(code, "CompositionSpriteShape SpriteShape_000()")).toEqual([
      "var result = _c.CreateSpriteShape();",
      "result.FillBrush = ColorBrush_Red();",
      "return result;",
    ]);
    expect(methodBody(code, "CompositionSpriteShape SpriteShape_001()")).toEqual([
      "var result = _c.CreateSpriteShape();",
      "result.FillBrush = _colorBrush_Red;",
      "return result;",
    ]);
    expect(countOccurrences(code, "_c.CreateColorBrush(")).toBe(1);
  });

  it("inlines a path used by a single geometry", () => {
    const geometry = c.createPathGeometry(
      c.createPath(c.createCanvasEllipse(0, 0, 10, 10)),
    );
    const root = c.createShapeVisual({
      shapes: [c.createSpriteShape({ geometry })],
    });

    const { code, context } = compileScene(root);
    const pathNode = context.nodeFor(geometry.path);

    expect(pathNode.isInlined).toBe(true);
    expect(pathNode.inlineExpression).toBe("new CompositionPath(Geometry())");
    expect(methodSignatures(code)).toEqual([
      "CanvasGeometry Geometry()",
      "CompositionPathGeometry PathGeometry()",
      "ShapeVisual Root()",
      "CompositionSpriteShape SpriteShape()",
    ]);
    expect(methodBody(code, "CompositionPathGeometry PathGeometry()")).toEqual([
      "var result = _c.CreatePathGeometry(new CompositionPath(Geometry()));",
      "return result;",
    ]);
    expect(methodBody(code, "CanvasGeometry Geometry()")).toEqual([
      "var result = CanvasGeometry.CreateEllipse(null, 0, 0, 10, 10);",
      "return result;",
    ]);
    expect(code.startsWith("//")).toBe(true);
    expect(code).toContain("\nusing Microsoft.Graphics.Canvas.Geometry;\n");
  });

  it("gives a shared path a factory and a field", () => {
    const path = c.createPath(c.createCanvasEllipse(0, 0, 10, 10));
    const root = c.createShapeVisual({
      shapes: [
        c.createSpriteShape({ geometry: c.createPathGeometry(path, { trimEnd: 0.5 }) }),
        c.createSpriteShape({ geometry: c.createPathGeometry(path) }),
      ],
    });

    const { code, context } = compileScene(root);
    const pathNode = context.nodeFor(path);

    expect(pathNode.isInlined).toBe(false);
    expect(pathNode.requiresStorage).toBe(true);
    expect(methodBody(code, "CompositionPath CompositionPath()")).toEqual([
      "var result = _compositionPath = new CompositionPath(Geometry());",
      "return result;",
    ]);
    expect(methodBody(code, "CompositionPathGeometry PathGeometry_000()")).toEqual([
      "var result = _c.CreatePathGeometry(CompositionPath());",
      "result.TrimEnd = 0.5F;",
      "return result;",
    ]);
    expect(methodBody(code, "CompositionPathGeometry PathGeometry_001()")).toEqual([
      "var result = _c.CreatePathGeometry(_compositionPath);",
      "return result;",
    ]);
  });

  it("merges equal geometries and stores the survivor", () => {
    const root = c.createShapeVisual({
      shapes: [
        c.createSpriteShape({
          geometry: c.createRoundedRectangleGeometry({ x: 10, y: 10 }, { x: 2, y: 2 }),
        }),
        c.createSpriteShape({
          geometry: c.createRoundedRectangleGeometry({ x: 10, y: 10 }, { x: 2, y: 2 }),
        }),
      ],
    });

    const { code, context } = compileScene(root);

    expect(context.nodes).toHaveLength(4);
    expect(context.storedNodes().map((node) => node.name)).toEqual([
      "RoundedRectangle_10",
    ]);
    expect(
      methodBody(code, "CompositionRoundedRectangleGeometry RoundedRectangle_10()"),
    ).toEqual([
      "var result = _roundedRectangle_10 = _c.CreateRoundedRectangleGeometry();",
      "result.CornerRadius = new Vector2(2, 2);",
      "result.Size = new Vector2(10, 10);",
      "return result;",
    ]);
  });

  it("names the root Root and keeps it in a local when nothing refers to it", () => {
    const { code, context } = compileScene(c.createContainerVisual());

    expect(context.root.name).toBe("Root");
    expect(context.root.requiresStorage).toBe(false);
    expect(code).toContain("            readonly Visual _rootVisual;\n");
    expect(code).toContain("                _rootVisual = Root();\n");
    expect(code).toContain(
      "            Visual IAnimatedVisual.RootVisual => _rootVisual;\n",
    );
  });

  it("stores the root when an expression refers to it", () => {
    const child = c.createContainerVisual();
    const root = c.createContainerVisual({ children: [child] });
    const expression = c.createExpressionAnimation("Root.Size.X / 2");
    expression.referenceParameters.set("Root", root);
    c.startAnimation(child, "Offset.X", expression);

    const { code, context } = compileScene(root);

    expect(context.root.requiresStorage).toBe(true);
    expect(context.nodeFor(expression).retained).toBe(false);
    expect(context.nodeFor(child).name).toBe("ContainerVisual_001");
    expect(code).toContain("            ContainerVisual _root;\n");
    expect(code).not.toContain("_rootVisual");
    expect(methodBody(code, "ContainerVisual Root()")).toEqual([
      "var result = _root = _c.CreateContainerVisual();",
      "var children = result.Children;",
      "children.InsertAtTop(ContainerVisual_001());",
      "return result;",
    ]);
    expect(methodBody(code, "ContainerVisual ContainerVisual_001()")).toEqual([
      "var result = _c.CreateContainerVisual();",
      "_reusableExpressionAnimation.ClearAllParameters();",
      '_reusableExpressionAnimation.Expression = "Root.Size.X / 2";',
      '_reusableExpressionAnimation.SetReferenceParameter("Root", _root);',
      'result.StartAnimation("Offset.X", _reusableExpressionAnimation);',
      "return result;",
    ]);
    expect(code).toContain("                Root();\n");
    expect(code).toContain("            void IDisposable.Dispose() => _root?.Dispose();\n");
  });

  it("does not count an expression animating its own parameter as a use", () => {
    const visual = c.createContainerVisual();
    const expression = c.createExpressionAnimation("Self.Size.X");
    expression.referenceParameters.set("Self", visual);
    c.startAnimation(visual, "Offset.X", expression);
    const root = c.createContainerVisual({ children: [visual] });

    const { code, context } = compileScene(root);
    const visualNode = context.nodeFor(visual);

    expect(visualNode.inboundReferences.map((node) => node.name)).toEqual([
      "Root",
    ]);
    expect(visualNode.requiresStorage).toBe(false);
    expect(context.storedNodes()).toEqual([]);
    expect(methodBody(code, "ContainerVisual ContainerVisual_001()")).toEqual([
      "var result = _c.CreateContainerVisual();",
      "_reusableExpressionAnimation.ClearAllParameters();",
      '_reusableExpressionAnimation.Expression = "Self.Size.X";',
      '_reusableExpressionAnimation.SetReferenceParameter("Self", result);',
      'result.StartAnimation("Offset.X", _reusableExpressionAnimation);',
      "return result;",
    ]);
  });

  it("orders methods by name regardless of construction order", () => {
    const root = c.createShapeVisual({
      shapes: [
        c.createSpriteShape({
          geometry: c.createRectangleGeometry({ x: 4, y: 2 }),
          fillBrush: c.createColorBrush(RED),
        }),
      ],
    });

    const { code } = compileScene(root);

    expect(methodSignatures(code)).toEqual([
      "CompositionColorBrush ColorBrush_Red()",
      "CompositionRectangleGeometry Rectangle_4x2()",
      "ShapeVisual Root()",
      "CompositionSpriteShape SpriteShape()",
    ]);
  });
});
