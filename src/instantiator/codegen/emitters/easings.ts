import type {
  CubicBezierEasingFunction,
  LinearEasingFunction,
  StepEasingFunction,
} from "../../model/types.js";
import type { CompiledNode } from "../compiled_node.js";
import type { UnitAssembler } from "../unit_assembler.js";

// Easing functions are plain create calls unless they carry a comment or
// property set values.
const writeEasingFactory = (
  assembler: UnitAssembler,
  obj: LinearEasingFunction | CubicBezierEasingFunction,
  node: CompiledNode,
  createCallText: string,
): void => {
  if (!assembler.needsInitialization(obj)) {
    assembler.writeSimpleObjectFactory(node, createCallText);
    return;
  }
  assembler.writeObjectFactoryStart(node);
  assembler.writeCreateAssignment(node, createCallText);
  assembler.initializeCompositionObject(obj);
  assembler.writeObjectFactoryEnd();
};

export function generateLinearEasingFunctionFactory(
  this: UnitAssembler,
  obj: LinearEasingFunction,
  node: CompiledNode,
): void {
  writeEasingFactory(
    this,
    obj,
    node,
    this.compositorCall("CreateLinearEasingFunction"),
  );
}

export function generateCubicBezierEasingFunctionFactory(
  this: UnitAssembler,
  obj: CubicBezierEasingFunction,
  node: CompiledNode,
): void {
  const s = this.stringifier;
  writeEasingFactory(
    this,
    obj,
    node,
    this.compositorCall(
      "CreateCubicBezierEasingFunction",
      s.vector2(obj.controlPoint1),
      s.vector2(obj.controlPoint2),
    ),
  );
}

export function generateStepEasingFunctionFactory(
  this: UnitAssembler,
  obj: StepEasingFunction,
  node: CompiledNode,
): void {
  const s = this.stringifier;
  this.writeObjectFactoryStart(node);
  this.writeCreateAssignment(
    node,
    this.compositorCall("CreateStepEasingFunction"),
  );
  this.initializeCompositionObject(obj);
  if (obj.finalStep !== 1) {
    this.writeAssignment("FinalStep", s.int32(obj.finalStep));
  }
  if (obj.initialStep !== 0) {
    this.writeAssignment("InitialStep", s.int32(obj.initialStep));
  }
  if (obj.isFinalStepSingleFrame) {
    this.writeAssignment("IsFinalStepSingleFrame", s.bool(true));
  }
  if (obj.isInitialStepSingleFrame) {
    this.writeAssignment("IsInitialStepSingleFrame", s.bool(true));
  }
  if (obj.stepCount !== 1) {
    this.writeAssignment("StepCount", s.int32(obj.stepCount));
  }
  this.writeObjectFactoryEnd();
}
