import { describe, expect, it } from "vitest";
import { ObjectGraph } from "../../../src/instantiator/graph/object_graph.js";
import { Compositor } from "../../../src/instantiator/model/compositor.js";
import { RED, captureCodegenError } from "./helpers.js";

describe("ObjectGraph", () => {
  const c = new Compositor();

  it("numbers objects in depth-first order and keeps edge multiplicity", () => {
    const brush = c.createColorBrush(RED);
    const geometry = c.createEllipseGeometry({ x: 5, y: 5 });
    const sprite = c.createSpriteShape({
      fillBrush: brush,
      geometry,
      strokeBrush: brush,
    });
    const root = c.createShapeVisual({ shapes: [sprite] });

    const graph = ObjectGraph.fromRoot(root);

    expect(graph.size).toBe(4);
    expect(graph.nodes.map((node) => node.object)).toEqual([
      root,
      sprite,
      brush,
      geometry,
    ]);
    expect(graph.nodeFor(sprite).outReferences).toEqual([2, 3, 2]);
    expect(graph.nodeFor(brush).inReferences).toEqual([1, 1]);
    expect(graph.root.kind).toBe("CompositionObject");
  });

  it("follows reference parameters back to an already visited owner", () => {
    const visual = c.createContainerVisual();
    const expression = c.createExpressionAnimation("Self.Offset.X");
    expression.referenceParameters.set("Self", visual);
    c.startAnimation(visual, "Opacity", expression);
    const root = c.createContainerVisual({ children: [visual] });

    const graph = ObjectGraph.fromRoot(root);

    expect(graph.size).toBe(3);
    expect(graph.nodeFor(expression).outReferences).toEqual([1]);
    expect(graph.nodeFor(visual).inReferences).toEqual([0, 2]);
  });

  it("attributes controller animations to the animated object", () => {
    const linear = c.createLinearEasingFunction();
    const trim = c.createScalarKeyFrameAnimation(1000);
    trim.keyFrames.push(
      { kind: "value", progress: 0, value: 0, easing: linear },
      { kind: "value", progress: 1, value: 0.5, easing: linear },
    );
    const progress = c.createScalarKeyFrameAnimation(1000);
    const controller = c.createAnimationController();
    c.startAnimation(controller, "Progress", progress);
    const ellipse = c.createEllipseGeometry({ x: 5, y: 5 });
    c.startAnimation(ellipse, "TrimEnd", trim, controller);
    const sprite = c.createSpriteShape({ geometry: ellipse });
    const root = c.createShapeVisual({ shapes: [sprite] });

    const graph = ObjectGraph.fromRoot(root);

    expect(graph.nodeFor(ellipse).outReferences).toEqual([3, 5]);
    expect(graph.nodeFor(trim).outReferences).toEqual([4, 4]);
    expect(graph.nodeFor(progress).index).toBe(5);
  });

  it("classifies path and canvas geometry nodes", () => {
    const path = c.createPath(c.createCanvasEllipse(0, 0, 1, 1));
    const sprite = c.createSpriteShape({
      geometry: c.createPathGeometry(path),
    });
    const graph = ObjectGraph.fromRoot(c.createShapeVisual({ shapes: [sprite] }));

    expect(graph.nodes.map((node) => node.kind)).toEqual([
      "CompositionObject",
      "CompositionObject",
      "CompositionObject",
      "CompositionPath",
      "CanvasGeometry",
    ]);
  });

  it("rejects objects that are not part of the graph", () => {
    const graph = ObjectGraph.fromRoot(c.createContainerVisual());
    const error = captureCodegenError(() =>
      graph.nodeFor(c.createColorBrush(RED)),
    );
    expect(error.code).toBe("InvalidReference");
    expect(graph.has(graph.root.object)).toBe(true);
  });
});
