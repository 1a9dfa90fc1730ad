/**
 * Human-readable factory names
 */

import {
  type ColorKeyFrameAnimation,
  CompositionObjectType,
  type ExplicitCompositionObject,
  type KeyFrame,
  type ScalarKeyFrameAnimation,
  animatorsOf,
} from "../model/types.js";
import { type Color, colorName } from "../model/values.js";
import type { CompiledNode } from "./compiled_node.js";
import { floatId, vector2Id } from "./stringifier.js";

export const ROOT_NAME = "Root";

const COMPOSITION_PREFIX = "Composition";

const firstAndLastValues = <T>(
  keyFrames: ReadonlyArray<KeyFrame<T>>,
): [T, T] | undefined => {
  const first = keyFrames[0];
  const last = keyFrames[keyFrames.length - 1];
  if (first?.kind === "value" && last?.kind === "value") {
    return [first.value, last.value];
  }
  return undefined;
};

const describeColorRange = (
  animation: ColorKeyFrameAnimation,
): string | undefined => {
  const range = firstAndLastValues<Color>(animation.keyFrames);
  return range && `${colorName(range[0])}_to_${colorName(range[1])}`;
};

const describeScalarRange = (
  animation: ScalarKeyFrameAnimation,
): string | undefined => {
  const range = firstAndLastValues<number>(animation.keyFrames);
  return range && `${floatId(range[0])}_to_${floatId(range[1])}`;
};

const withSuffix = (base: string, suffix: string | undefined): string =>
  suffix === undefined ? base : `${base}_${suffix}`;

const describeCompositionObject = (obj: ExplicitCompositionObject): string => {
  switch (obj.type) {
    case CompositionObjectType.ColorKeyFrameAnimation:
      return withSuffix("ColorAnimation", describeColorRange(obj));
    case CompositionObjectType.ScalarKeyFrameAnimation:
      return withSuffix("ScalarAnimation", describeScalarRange(obj));
    case CompositionObjectType.Vector2KeyFrameAnimation:
      return "Vector2Animation";
    case CompositionObjectType.CompositionColorBrush: {
      const animators = animatorsOf(obj);
      if (animators.length === 0) {
        // Canonicalization leaves one unanimated brush per color.
        return `ColorBrush_${colorName(obj.color)}`;
      }
      const colorAnimation = animators
        .map((animator) => animator.animation)
        .find(
          (animation): animation is ColorKeyFrameAnimation =>
            animation.type === CompositionObjectType.ColorKeyFrameAnimation,
        );
      return withSuffix(
        "AnimatedColorBrush",
        colorAnimation && describeColorRange(colorAnimation),
      );
    }
    case CompositionObjectType.CompositionRectangleGeometry:
      return `Rectangle_${vector2Id(obj.size)}`;
    case CompositionObjectType.CompositionRoundedRectangleGeometry:
      return `RoundedRectangle_${vector2Id(obj.size)}`;
    case CompositionObjectType.CompositionEllipseGeometry:
      return `Ellipse_${vector2Id(obj.radius)}`;
    default:
      return obj.type.startsWith(COMPOSITION_PREFIX)
        ? obj.type.slice(COMPOSITION_PREFIX.length)
        : obj.type;
  }
};

/**
 * Name derived from the node's variant and salient content, before
 * disambiguation.
 */
export const baseName = (node: CompiledNode): string => {
  const obj = node.object;
  switch (obj.type) {
    case "CompositionPath":
      return "CompositionPath";
    case "CanvasGeometry":
      return "Geometry";
    default:
      return describeCompositionObject(obj);
  }
};

/**
 * Names every node. Nodes sharing a base name get a three-digit ordinal in
 * the order given.
 */
export const assignNames = (nodes: readonly CompiledNode[]): void => {
  const byBaseName = new Map<string, CompiledNode[]>();
  for (const node of nodes) {
    const name = baseName(node);
    const group = byBaseName.get(name);
    if (group) {
      group.push(node);
    } else {
      byBaseName.set(name, [node]);
    }
  }

  for (const [name, group] of byBaseName) {
    if (group.length === 1) {
      for (const node of group) {
        node.name = name;
      }
      continue;
    }
    group.forEach((node, i) => {
      node.name = `${name}_${String(i).padStart(3, "0")}`;
    });
  }
};

/**
 * Ordinal comparison, the order factory methods are written in.
 */
export const compareNames = (a: CompiledNode, b: CompiledNode): number =>
  a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
