import type {
  CompositionViewBox,
  ContainerVisual,
  InsetClip,
  ShapeVisual,
  Visual,
} from "../../model/types.js";
import { isZeroVector2 } from "../../model/values.js";
import type { CompiledNode } from "../compiled_node.js";
import type { UnitAssembler } from "../unit_assembler.js";

export function initializeVisual(
  this: UnitAssembler,
  obj: Visual,
  node: CompiledNode,
): void {
  const s = this.stringifier;
  this.initializeCompositionObject(obj);
  if (obj.centerPoint) {
    this.writeAssignment("CenterPoint", s.vector3(obj.centerPoint));
  }
  if (obj.clip) {
    this.writeAssignment("Clip", this.callFactoryFromFor(node, obj.clip));
  }
  if (obj.offset) {
    this.writeAssignment("Offset", s.vector3(obj.offset));
  }
  if (obj.rotationAngleInDegrees !== undefined) {
    this.writeAssignment(
      "RotationAngleInDegrees",
      s.float(obj.rotationAngleInDegrees),
    );
  }
  if (obj.scale) {
    this.writeAssignment("Scale", s.vector3(obj.scale));
  }
  if (obj.size) {
    this.writeAssignment("Size", s.vector2(obj.size));
  }
}

export function initializeContainerVisual(
  this: UnitAssembler,
  obj: Visual,
  node: CompiledNode,
): void {
  this.initializeVisual(obj, node);
  if (obj.children.length === 0) {
    return;
  }
  this.builder.writeLine(
    `${this.stringifier.varKeyword} children = result${this.deref}Children;`,
  );
  for (const child of obj.children) {
    this.builder.writeLine(
      `children${this.deref}InsertAtTop(${this.callFactoryFromFor(node, child)});`,
    );
  }
}

export function generateContainerVisualFactory(
  this: UnitAssembler,
  obj: ContainerVisual,
  node: CompiledNode,
): void {
  this.writeObjectFactoryStart(node);
  this.writeCreateAssignment(node, this.compositorCall("CreateContainerVisual"));
  this.initializeContainerVisual(obj, node);
  this.startAnimations(obj, node);
  this.writeObjectFactoryEnd();
}

export function generateShapeVisualFactory(
  this: UnitAssembler,
  obj: ShapeVisual,
  node: CompiledNode,
): void {
  const { builder, deref } = this;
  this.writeObjectFactoryStart(node);
  this.writeCreateAssignment(node, this.compositorCall("CreateShapeVisual"));
  this.initializeContainerVisual(obj, node);

  if (obj.shapes.length > 0) {
    builder.writeLine(
      `${this.stringifier.varKeyword} shapes = result${deref}Shapes;`,
    );
    for (const shape of obj.shapes) {
      builder.writeComment(shape.shortDescription);
      builder.writeLine(
        `shapes${deref}${this.stringifier.iListAdd}(${this.callFactoryFromFor(node, shape)});`,
      );
    }
  }
  if (obj.viewBox) {
    this.writeAssignment("ViewBox", this.callFactoryFromFor(node, obj.viewBox));
  }
  this.startAnimations(obj, node);
  this.writeObjectFactoryEnd();
}

export function generateInsetClipFactory(
  this: UnitAssembler,
  obj: InsetClip,
  node: CompiledNode,
): void {
  const s = this.stringifier;
  this.writeObjectFactoryStart(node);
  this.writeCreateAssignment(node, this.compositorCall("CreateInsetClip"));
  this.initializeCompositionObject(obj);
  if (!isZeroVector2(obj.centerPoint)) {
    this.writeAssignment("CenterPoint", s.vector2(obj.centerPoint));
  }
  if (obj.scale.x !== 1 || obj.scale.y !== 1) {
    this.writeAssignment("Scale", s.vector2(obj.scale));
  }
  const insets: Array<[string, number]> = [
    ["LeftInset", obj.leftInset],
    ["RightInset", obj.rightInset],
    ["TopInset", obj.topInset],
    ["BottomInset", obj.bottomInset],
  ];
  for (const [property, value] of insets) {
    if (value !== 0) {
      this.writeAssignment(property, s.float(value));
    }
  }
  this.startAnimations(obj, node);
  this.writeObjectFactoryEnd();
}

export function generateViewBoxFactory(
  this: UnitAssembler,
  obj: CompositionViewBox,
  node: CompiledNode,
): void {
  this.writeObjectFactoryStart(node);
  this.writeCreateAssignment(node, this.compositorCall("CreateViewBox"));
  this.initializeCompositionObject(obj);
  this.writeAssignment("Size", this.stringifier.vector2(obj.size));
  this.startAnimations(obj, node);
  this.writeObjectFactoryEnd();
}
