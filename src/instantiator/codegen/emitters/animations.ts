import type {
  ColorKeyFrameAnimation,
  CompositionAnimation,
  ExpressionAnimation,
  KeyFrame,
  KeyFrameAnimation,
  PathKeyFrameAnimation,
  ScalarKeyFrameAnimation,
  Vector2KeyFrameAnimation,
  Vector3KeyFrameAnimation,
} from "../../model/types.js";
import { colorName } from "../../model/values.js";
import type { CompiledNode } from "../compiled_node.js";
import type { UnitAssembler } from "../unit_assembler.js";

export function initializeCompositionAnimation(
  this: UnitAssembler,
  obj: CompositionAnimation,
  node: CompiledNode,
): void {
  const s = this.stringifier;
  this.initializeCompositionObject(obj);
  if (obj.target?.trim()) {
    this.writeAssignment("Target", s.string(obj.target));
  }
  for (const [name, target] of obj.referenceParameters) {
    this.builder.writeLine(
      `result${this.deref}SetReferenceParameter(${s.string(name)}, ${this.callFactoryFromFor(node, target)});`,
    );
  }
}

export function initializeKeyFrameAnimation(
  this: UnitAssembler,
  obj: KeyFrameAnimation,
  node: CompiledNode,
): void {
  this.initializeCompositionAnimation(obj, node);
  this.writeAssignment("Duration", this.timeSpan(obj.duration));
}

/**
 * Inserts each keyframe. Value text is produced before the easing is
 * resolved, the order the graph visits them in.
 */
export function writeKeyFrames<T>(
  this: UnitAssembler,
  node: CompiledNode,
  keyFrames: ReadonlyArray<KeyFrame<T>>,
  valueText: (value: T) => string,
  describeValue?: (value: T) => string,
): void {
  const { builder, deref } = this;
  const s = this.stringifier;
  for (const keyFrame of keyFrames) {
    const progress = s.float(keyFrame.progress);
    if (keyFrame.kind === "expression") {
      builder.writeLine(
        `result${deref}InsertExpressionKeyFrame(${progress}, ${s.string(keyFrame.expression)}, ${this.callFactoryFromFor(node, keyFrame.easing)});`,
      );
      continue;
    }
    if (describeValue) {
      builder.writeComment(describeValue(keyFrame.value));
    }
    const value = valueText(keyFrame.value);
    builder.writeLine(
      `result${deref}InsertKeyFrame(${progress}, ${value}, ${this.callFactoryFromFor(node, keyFrame.easing)});`,
    );
  }
}

export function generateColorKeyFrameAnimationFactory(
  this: UnitAssembler,
  obj: ColorKeyFrameAnimation,
  node: CompiledNode,
): void {
  const s = this.stringifier;
  this.writeObjectFactoryStart(node);
  this.writeCreateAssignment(
    node,
    this.compositorCall("CreateColorKeyFrameAnimation"),
  );
  this.initializeKeyFrameAnimation(obj, node);
  this.writeKeyFrames(
    node,
    obj.keyFrames,
    (value) => s.color(value),
    colorName,
  );
  this.startAnimations(obj, node);
  this.writeObjectFactoryEnd();
}

export function generateScalarKeyFrameAnimationFactory(
  this: UnitAssembler,
  obj: ScalarKeyFrameAnimation,
  node: CompiledNode,
): void {
  const s = this.stringifier;
  this.writeObjectFactoryStart(node);
  this.writeCreateAssignment(
    node,
    this.compositorCall("CreateScalarKeyFrameAnimation"),
  );
  this.initializeKeyFrameAnimation(obj, node);
  this.writeKeyFrames(node, obj.keyFrames, (value) => s.float(value));
  this.startAnimations(obj, node);
  this.writeObjectFactoryEnd();
}

export function generateVector2KeyFrameAnimationFactory(
  this: UnitAssembler,
  obj: Vector2KeyFrameAnimation,
  node: CompiledNode,
): void {
  const s = this.stringifier;
  this.writeObjectFactoryStart(node);
  this.writeCreateAssignment(
    node,
    this.compositorCall("CreateVector2KeyFrameAnimation"),
  );
  this.initializeKeyFrameAnimation(obj, node);
  this.writeKeyFrames(node, obj.keyFrames, (value) => s.vector2(value));
  this.startAnimations(obj, node);
  this.writeObjectFactoryEnd();
}

export function generateVector3KeyFrameAnimationFactory(
  this: UnitAssembler,
  obj: Vector3KeyFrameAnimation,
  node: CompiledNode,
): void {
  const s = this.stringifier;
  this.writeObjectFactoryStart(node);
  this.writeCreateAssignment(
    node,
    this.compositorCall("CreateVector3KeyFrameAnimation"),
  );
  this.initializeKeyFrameAnimation(obj, node);
  this.writeKeyFrames(node, obj.keyFrames, (value) => s.vector3(value));
  this.startAnimations(obj, node);
  this.writeObjectFactoryEnd();
}

export function generatePathKeyFrameAnimationFactory(
  this: UnitAssembler,
  obj: PathKeyFrameAnimation,
  node: CompiledNode,
): void {
  this.writeObjectFactoryStart(node);
  this.writeCreateAssignment(
    node,
    this.compositorCall("CreatePathKeyFrameAnimation"),
  );
  this.initializeKeyFrameAnimation(obj, node);
  this.writeKeyFrames(node, obj.keyFrames, (path) =>
    this.callFactoryFromFor(node, path),
  );
  this.startAnimations(obj, node);
  this.writeObjectFactoryEnd();
}

/**
 * Factory for an expression animation shared by several bindings. It never
 * starts animations of its own.
 */
export function generateExpressionAnimationFactory(
  this: UnitAssembler,
  obj: ExpressionAnimation,
  node: CompiledNode,
): void {
  this.writeObjectFactoryStart(node);
  this.writeCreateAssignment(
    node,
    this.compositorCall("CreateExpressionAnimation"),
  );
  this.initializeCompositionAnimation(obj, node);
  this.writeAssignment("Expression", this.stringifier.string(obj.expression));
  this.writeObjectFactoryEnd();
}
