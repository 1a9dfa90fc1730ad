/**
 * Emits the code that starts animations on a freshly built object
 */

import {
  type AnimationController,
  type Animator,
  CompositionObjectType,
  type ExplicitCompositionObject,
  type ExpressionAnimation,
} from "../model/types.js";
import type { CompiledNode } from "./compiled_node.js";
import { SINGLETON_EXPRESSION_ANIMATION_FIELD_NAME } from "./constants.js";
import type { UnitAssembler } from "./unit_assembler.js";

const CONTROLLER_LOCAL_NAME = "controller";

// Controller locals declared in the current factory body.
type DeclaredLocals = Set<string>;

const controllerLocalName = (depth: number): string =>
  depth === 0 ? CONTROLLER_LOCAL_NAME : `${CONTROLLER_LOCAL_NAME}${depth}`;

function writeUniqueExpressionAnimation(
  assembler: UnitAssembler,
  owner: ExplicitCompositionObject | AnimationController,
  localName: string,
  target: string,
  animator: Animator,
  animation: ExpressionAnimation,
  animationNode: CompiledNode,
): void {
  const { builder, deref } = assembler;
  const s = assembler.stringifier;
  const singleton = SINGLETON_EXPRESSION_ANIMATION_FIELD_NAME;

  builder.writeLine(`${singleton}${deref}ClearAllParameters();`);
  builder.writeLine(
    `${singleton}${deref}Expression = ${s.string(animation.expression)};`,
  );
  // The runtime rejects an empty target, so a blank one is left as is.
  if (animation.target?.trim()) {
    builder.writeLine(
      `${singleton}${deref}Target = ${s.string(animation.target)};`,
    );
  }
  for (const [name, parameter] of animation.referenceParameters) {
    const value =
      parameter === owner
        ? localName
        : assembler.callFactoryFromFor(animationNode, parameter);
    builder.writeLine(
      `${singleton}${deref}SetReferenceParameter(${s.string(name)}, ${value});`,
    );
  }
  builder.writeLine(
    `${target}${deref}StartAnimation(${s.string(animator.animatedProperty)}, ${singleton});`,
  );
}

function bindAnimators(
  assembler: UnitAssembler,
  owner: ExplicitCompositionObject | AnimationController,
  node: CompiledNode,
  localName: string,
  target: string,
  animators: readonly Animator[],
  declared: DeclaredLocals,
  depth: number,
): void {
  const { builder, deref } = assembler;
  const s = assembler.stringifier;

  for (const animator of animators) {
    const animation = animator.animation;
    const animationNode = assembler.context.nodeFor(animation);
    if (
      animation.type === CompositionObjectType.ExpressionAnimation &&
      !animationNode.retained
    ) {
      writeUniqueExpressionAnimation(
        assembler,
        owner,
        localName,
        target,
        animator,
        animation,
        animationNode,
      );
    } else {
      builder.writeLine(
        `${target}${deref}StartAnimation(${s.string(animator.animatedProperty)}, ${assembler.callFactoryFromFor(node, animation)});`,
      );
    }

    const controller = animator.controller;
    if (!controller) {
      continue;
    }
    const controllerLocal = controllerLocalName(depth);
    const accessor = `${target}${deref}TryGetAnimationController(${s.string(animator.animatedProperty)})`;
    if (declared.has(controllerLocal)) {
      builder.writeLine(`${controllerLocal} = ${accessor};`);
    } else {
      builder.writeLine(`${s.varKeyword} ${controllerLocal} = ${accessor};`);
      declared.add(controllerLocal);
    }
    builder.writeLine(`${controllerLocal}${deref}Pause();`);
    startAnimationsAt(
      assembler,
      controller,
      node,
      controllerLocal,
      declared,
      depth + 1,
    );
  }
}

function startAnimationsAt(
  assembler: UnitAssembler,
  owner: ExplicitCompositionObject | AnimationController,
  node: CompiledNode,
  localName: string,
  declared: DeclaredLocals,
  depth: number,
): void {
  bindAnimators(
    assembler,
    owner,
    node,
    localName,
    `${localName}${assembler.deref}Properties`,
    owner.properties.animators,
    declared,
    depth,
  );
  bindAnimators(
    assembler,
    owner,
    node,
    localName,
    localName,
    owner.animators,
    declared,
    depth,
  );
}

/**
 * Starts every animation bound on `obj` and on its property set, in
 * declaration order. A unique expression animation is rebuilt on the shared
 * singleton; anything else is obtained through the reference resolver.
 * Controllers are paused and their own animations started in turn.
 */
export function startAnimations(
  this: UnitAssembler,
  obj: ExplicitCompositionObject,
  node: CompiledNode,
  localName = "result",
): void {
  startAnimationsAt(this, obj, node, localName, new Set(), 0);
}
