import { type CompositionColorBrush, isAnimated } from "../../model/types.js";
import type { CompiledNode } from "../compiled_node.js";
import type { UnitAssembler } from "../unit_assembler.js";

export function generateColorBrushFactory(
  this: UnitAssembler,
  obj: CompositionColorBrush,
  node: CompiledNode,
): void {
  const createCallText = this.compositorCall(
    "CreateColorBrush",
    this.stringifier.color(obj.color),
  );
  if (!isAnimated(obj) && !this.needsInitialization(obj)) {
    this.writeSimpleObjectFactory(node, createCallText);
    return;
  }
  this.writeObjectFactoryStart(node);
  this.writeCreateAssignment(node, createCallText);
  this.initializeCompositionObject(obj);
  this.startAnimations(obj, node);
  this.writeObjectFactoryEnd();
}
