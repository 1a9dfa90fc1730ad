import type {
  CompositionEllipseGeometry,
  CompositionGeometry,
  CompositionPathGeometry,
  CompositionRectangleGeometry,
  CompositionRoundedRectangleGeometry,
} from "../../model/types.js";
import { isZeroVector2 } from "../../model/values.js";
import type { CompiledNode } from "../compiled_node.js";
import type { UnitAssembler } from "../unit_assembler.js";

export function initializeCompositionGeometry(
  this: UnitAssembler,
  obj: CompositionGeometry,
): void {
  const s = this.stringifier;
  this.initializeCompositionObject(obj);
  if (obj.trimEnd !== 1) {
    this.writeAssignment("TrimEnd", s.float(obj.trimEnd));
  }
  if (obj.trimOffset !== 0) {
    this.writeAssignment("TrimOffset", s.float(obj.trimOffset));
  }
  if (obj.trimStart !== 0) {
    this.writeAssignment("TrimStart", s.float(obj.trimStart));
  }
}

export function generateEllipseGeometryFactory(
  this: UnitAssembler,
  obj: CompositionEllipseGeometry,
  node: CompiledNode,
): void {
  const s = this.stringifier;
  this.writeObjectFactoryStart(node);
  this.writeCreateAssignment(node, this.compositorCall("CreateEllipseGeometry"));
  this.initializeCompositionGeometry(obj);
  if (!isZeroVector2(obj.center)) {
    this.writeAssignment("Center", s.vector2(obj.center));
  }
  this.writeAssignment("Radius", s.vector2(obj.radius));
  this.startAnimations(obj, node);
  this.writeObjectFactoryEnd();
}

export function generateRectangleGeometryFactory(
  this: UnitAssembler,
  obj: CompositionRectangleGeometry,
  node: CompiledNode,
): void {
  this.writeObjectFactoryStart(node);
  this.writeCreateAssignment(
    node,
    this.compositorCall("CreateRectangleGeometry"),
  );
  this.initializeCompositionGeometry(obj);
  this.writeAssignment("Size", this.stringifier.vector2(obj.size));
  this.startAnimations(obj, node);
  this.writeObjectFactoryEnd();
}

export function generateRoundedRectangleGeometryFactory(
  this: UnitAssembler,
  obj: CompositionRoundedRectangleGeometry,
  node: CompiledNode,
): void {
  const s = this.stringifier;
  this.writeObjectFactoryStart(node);
  this.writeCreateAssignment(
    node,
    this.compositorCall("CreateRoundedRectangleGeometry"),
  );
  this.initializeCompositionGeometry(obj);
  this.writeAssignment("CornerRadius", s.vector2(obj.cornerRadius));
  this.writeAssignment("Size", s.vector2(obj.size));
  this.startAnimations(obj, node);
  this.writeObjectFactoryEnd();
}

export function generatePathGeometryFactory(
  this: UnitAssembler,
  obj: CompositionPathGeometry,
  node: CompiledNode,
): void {
  this.writeObjectFactoryStart(node);
  this.writeCreateAssignment(
    node,
    this.compositorCall(
      "CreatePathGeometry",
      this.callFactoryFromFor(node, obj.path),
    ),
  );
  this.initializeCompositionGeometry(obj);
  this.startAnimations(obj, node);
  this.writeObjectFactoryEnd();
}
