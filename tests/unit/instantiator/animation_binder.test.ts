import { describe, expect, it } from "vitest";
import { Compositor } from "../../../src/instantiator/model/compositor.js";
import type { ScalarKeyFrameAnimation } from "../../../src/instantiator/model/types.js";
import { compileScene, methodBody, methodSignatures } from "./helpers.js";

const c = new Compositor();

const ramp = (to: number, durationMs = 1000): ScalarKeyFrameAnimation => {
  const linear = c.createLinearEasingFunction();
  const animation = c.createScalarKeyFrameAnimation(durationMs);
  animation.keyFrames.push(
    { kind: "value", progress: 0, value: 0, easing: linear },
    { kind: "value", progress: 1, value: to, easing: linear },
  );
  return animation;
};

describe("startAnimations", () => {
  it("pauses a controller and starts its animations", () => {
    const linear = c.createLinearEasingFunction();
    const trim = c.createScalarKeyFrameAnimation(1000);
    trim.keyFrames.push(
      { kind: "value", progress: 0, value: 0, easing: linear },
      { kind: "value", progress: 1, value: 0.5, easing: linear },
    );
    const progress = c.createScalarKeyFrameAnimation(1000);
    progress.keyFrames.push(
      { kind: "value", progress: 0, value: 0, easing: linear },
      { kind: "value", progress: 1, value: 1, easing: linear },
    );
    const controller = c.createAnimationController();
    c.startAnimation(controller, "Progress", progress);
    const ellipse = c.createEllipseGeometry({ x: 5, y: 5 });
    c.startAnimation(ellipse, "TrimEnd", trim, controller);
    const root = c.createShapeVisual({
      shapes: [c.createSpriteShape({ geometry: ellipse })],
    });

    const { code } = compileScene(root);

    expect(methodSignatures(code)).toEqual([
      "CompositionEllipseGeometry Ellipse_5()",
      "LinearEasingFunction LinearEasingFunction()",
      "ShapeVisual Root()",
      "ScalarKeyFrameAnimation ScalarAnimation_0_to_0p5()",
      "ScalarKeyFrameAnimation ScalarAnimation_0_to_1()",
      "CompositionSpriteShape SpriteShape()",
    ]);
    expect(methodBody(code, "CompositionEllipseGeometry Ellipse_5()")).toEqual([
      "var result = _c.CreateEllipseGeometry();",
      "result.Radius = new Vector2(5, 5);",
      'result.StartAnimation("TrimEnd", ScalarAnimation_0_to_0p5());',
      'var controller = result.TryGetAnimationController("TrimEnd");',
      "controller.Pause();",
      'controller.StartAnimation("Progress", ScalarAnimation_0_to_1());',
      "return result;",
    ]);
    expect(
      methodBody(code, "ScalarKeyFrameAnimation ScalarAnimation_0_to_0p5()"),
    ).toEqual([
      "var result = _c.CreateScalarKeyFrameAnimation();",
      "result.Duration = TimeSpan.FromTicks(c_durationTicks);",
      "result.InsertKeyFrame(0, 0, LinearEasingFunction());",
      "result.InsertKeyFrame(1, 0.5F, _linearEasingFunction);",
      "return result;",
    ]);
    expect(
      methodBody(code, "ScalarKeyFrameAnimation ScalarAnimation_0_to_1()"),
    ).toEqual([
      "var result = _c.CreateScalarKeyFrameAnimation();",
      "result.Duration = TimeSpan.FromTicks(c_durationTicks);",
      "result.InsertKeyFrame(0, 0, _linearEasingFunction);",
      "result.InsertKeyFrame(1, 1, _linearEasingFunction);",
      "return result;",
    ]);
    expect(methodBody(code, "LinearEasingFunction LinearEasingFunction()")).toEqual([
      "return _linearEasingFunction = _c.CreateLinearEasingFunction();",
    ]);
  });

  it("reuses the controller local for a second controlled property", () => {
    const visual = c.createContainerVisual();
    const first = c.createAnimationController();
    const second = c.createAnimationController();
    c.startAnimation(visual, "Opacity", ramp(1), first);
    c.startAnimation(visual, "RotationAngleInDegrees", ramp(90), second);

    const { code } = compileScene(visual);

    expect(methodBody(code, "ContainerVisual Root()")).toEqual([
      "var result = _c.CreateContainerVisual();",
      'result.StartAnimation("Opacity", ScalarAnimation_0_to_1());',
      'var controller = result.TryGetAnimationController("Opacity");',
      "controller.Pause();",
      'result.StartAnimation("RotationAngleInDegrees", ScalarAnimation_0_to_90());',
      'controller = result.TryGetAnimationController("RotationAngleInDegrees");',
      "controller.Pause();",
      "return result;",
    ]);
  });

  it("starts property set animations on the property set first", () => {
    const root = c.createContainerVisual();
    root.properties.scalarProperties.set("Progress", 0);
    c.startAnimation(root, "Opacity", ramp(1));
    c.startAnimation(root.properties, "Progress", ramp(2));

    const { code } = compileScene(root);

    expect(methodBody(code, "ContainerVisual Root()")).toEqual([
      "var result = _c.CreateContainerVisual();",
      "var propertySet = result.Properties;",
      'propertySet.InsertScalar("Progress", 0);',
      'result.Properties.StartAnimation("Progress", ScalarAnimation_0_to_2());',
      'result.StartAnimation("Opacity", ScalarAnimation_0_to_1());',
      "return result;",
    ]);
    expect(code).toContain(
      '        internal const string ProgressPropertyName = "Progress";\n',
    );
  });

  it("gives an expression animation shared by several objects a factory", () => {
    const visual1 = c.createContainerVisual();
    const visual2 = c.createContainerVisual();
    c.startAnimation(visual1, "Opacity", c.createExpressionAnimation("0.5"));
    c.startAnimation(visual2, "Opacity", c.createExpressionAnimation("0.5"));
    const root = c.createContainerVisual({ children: [visual1, visual2] });

    const { code, context } = compileScene(root);

    expect(context.storedNodes().map((node) => node.name)).toEqual([
      "ExpressionAnimation",
    ]);
    expect(methodBody(code, "ExpressionAnimation ExpressionAnimation()")).toEqual([
      "var result = _expressionAnimation = _c.CreateExpressionAnimation();",
      'result.Expression = "0.5";',
      "return result;",
    ]);
    expect(methodBody(code, "ContainerVisual ContainerVisual_001()")).toEqual([
      "var result = _c.CreateContainerVisual();",
      'result.StartAnimation("Opacity", ExpressionAnimation());',
      "return result;",
    ]);
    expect(methodBody(code, "ContainerVisual ContainerVisual_002()")).toEqual([
      "var result = _c.CreateContainerVisual();",
      'result.StartAnimation("Opacity", _expressionAnimation);',
      "return result;",
    ]);
  });

  it("writes an explicit key frame duration when it differs from the scene", () => {
    const root = c.createContainerVisual();
    c.startAnimation(root, "Opacity", ramp(1, 500));

    const { code } = compileScene(root);

    expect(
      methodBody(code, "ScalarKeyFrameAnimation ScalarAnimation_0_to_1()"),
    ).toContain("result.Duration = TimeSpan.FromTicks(5000000);");
  });

  it("sets the target of a unique expression when it has one", () => {
    const root = c.createContainerVisual();
    c.startAnimation(
      root,
      "Offset",
      c.createExpressionAnimation("Vector3(1, 2, 0)", { target: "Offset" }),
    );

    const { code } = compileScene(root);

    expect(methodBody(code, "ContainerVisual Root()")).toEqual([
      "var result = _c.CreateContainerVisual();",
      "_reusableExpressionAnimation.ClearAllParameters();",
      '_reusableExpressionAnimation.Expression = "Vector3(1, 2, 0)";',
      '_reusableExpressionAnimation.Target = "Offset";',
      'result.StartAnimation("Offset", _reusableExpressionAnimation);',
      "return result;",
    ]);
  });

  it("gives an expression animation bound twice by one object a factory", () => {
    const root = c.createContainerVisual();
    const expression = c.createExpressionAnimation("0.5");
    c.startAnimation(root, "Opacity", expression);
    c.startAnimation(root, "RotationAngleInDegrees", expression);

    const { code, context } = compileScene(root);

    expect(context.nodeFor(expression).retained).toBe(true);
    expect(methodSignatures(code)).toEqual([
      "ExpressionAnimation ExpressionAnimation()",
      "ContainerVisual Root()",
    ]);
    expect(methodBody(code, "ContainerVisual Root()")).toEqual([
      "var result = _c.CreateContainerVisual();",
      'result.StartAnimation("Opacity", ExpressionAnimation());',
      'result.StartAnimation("RotationAngleInDegrees", _expressionAnimation);',
      "return result;",
    ]);
    expect(methodBody(code, "ExpressionAnimation ExpressionAnimation()")).toEqual([
      "var result = _expressionAnimation = _c.CreateExpressionAnimation();",
      'result.Expression = "0.5";',
      "return result;",
    ]);
  });

  it("gives one expression animation bound by two objects a factory", () => {
    const visual1 = c.createContainerVisual();
    const visual2 = c.createContainerVisual();
    const expression = c.createExpressionAnimation("0.5");
    c.startAnimation(visual1, "Opacity", expression);
    c.startAnimation(visual2, "Opacity", expression);
    const root = c.createContainerVisual({ children: [visual1, visual2] });

    const { code, context } = compileScene(root);

    expect(context.storedNodes().map((node) => node.name)).toEqual([
      "ExpressionAnimation",
    ]);
    expect(methodBody(code, "ContainerVisual ContainerVisual_001()")).toEqual([
      "var result = _c.CreateContainerVisual();",
      'result.StartAnimation("Opacity", ExpressionAnimation());',
      "return result;",
    ]);
    expect(methodBody(code, "ContainerVisual ContainerVisual_002()")).toEqual([
      "var result = _c.CreateContainerVisual();",
      'result.StartAnimation("Opacity", _expressionAnimation);',
      "return result;",
    ]);
  });

  it("builds the parameters of a twice-bound expression once", () => {
    const root = c.createContainerVisual();
    const linear = c.createLinearEasingFunction();
    const expression = c.createExpressionAnimation("p.X");
    expression.referenceParameters.set("p", linear);
    c.startAnimation(root, "Opacity", expression);
    c.startAnimation(root, "RotationAngleInDegrees", expression);

    const { code } = compileScene(root);

    expect(methodBody(code, "ExpressionAnimation ExpressionAnimation()")).toEqual([
      "var result = _expressionAnimation = _c.CreateExpressionAnimation();",
      'result.SetReferenceParameter("p", LinearEasingFunction());',
      'result.Expression = "p.X";',
      "return result;",
    ]);
    expect(methodBody(code, "LinearEasingFunction LinearEasingFunction()")).toEqual([
      "return _c.CreateLinearEasingFunction();",
    ]);
    expect(code).not.toContain("_reusableExpressionAnimation.ClearAllParameters();");
  });
});
