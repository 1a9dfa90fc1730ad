import {
  type ExplicitCompositionObject,
  type GraphObject,
  hasProperties,
} from "../../model/types.js";
import type { CompiledNode } from "../compiled_node.js";
import { longComment } from "../descriptions.js";
import {
  COMPOSITOR_FIELD_NAME,
  DURATION_TICKS_FIELD_NAME,
  millisecondsToTicks,
} from "../constants.js";
import type { UnitAssembler } from "../unit_assembler.js";

/**
 * Text that obtains `obj` from inside the factory of `caller`.
 */
export function callFactoryFromFor(
  this: UnitAssembler,
  caller: CompiledNode,
  obj: GraphObject,
): string {
  return this.context.resolve(caller, obj).text;
}

export function compositorCall(
  this: UnitAssembler,
  method: string,
  ...args: string[]
): string {
  return `${COMPOSITOR_FIELD_NAME}${this.deref}${method}(${args.join(", ")})`;
}

export function timeSpan(this: UnitAssembler, milliseconds: number): string {
  return milliseconds === this.options.durationMs
    ? this.stringifier.timeSpanFromConstant(DURATION_TICKS_FIELD_NAME)
    : this.stringifier.timeSpanTicks(millisecondsToTicks(milliseconds));
}

export function writeAssignment(
  this: UnitAssembler,
  property: string,
  value: string,
  localName = "result",
): void {
  this.builder.writeLine(`${localName}${this.deref}${property} = ${value};`);
}

export function writeObjectFactoryStart(
  this: UnitAssembler,
  node: CompiledNode,
): void {
  this.builder.writeComment(longComment(node.view));
  this.builder.writeLine(
    `${this.stringifier.referenceTypeName(node.typeName)} ${node.name}()`,
  );
  this.builder.openScope();
}

export function writeObjectFactoryEnd(this: UnitAssembler): void {
  this.builder.writeLine("return result;");
  this.builder.closeScope();
  this.builder.writeLine();
}

export function writeCreateAssignment(
  this: UnitAssembler,
  node: CompiledNode,
  createCallText: string,
): void {
  const declaration = `${this.stringifier.varKeyword} result`;
  this.builder.writeLine(
    node.requiresStorage
      ? `${declaration} = ${node.fieldName} = ${createCallText};`
      : `${declaration} = ${createCallText};`,
  );
}

/**
 * A factory that is only a create call.
 */
export function writeSimpleObjectFactory(
  this: UnitAssembler,
  node: CompiledNode,
  createCallText: string,
): void {
  this.builder.writeComment(longComment(node.view));
  this.builder.writeLine(
    `${this.stringifier.referenceTypeName(node.typeName)} ${node.name}()`,
  );
  this.builder.openScope();
  this.builder.writeLine(
    node.requiresStorage
      ? `return ${node.fieldName} = ${createCallText};`
      : `return ${createCallText};`,
  );
  this.builder.closeScope();
  this.builder.writeLine();
}

/**
 * True when the object needs more than its create call.
 */
export function needsInitialization(
  this: UnitAssembler,
  obj: ExplicitCompositionObject,
): boolean {
  return (
    hasProperties(obj) ||
    (this.options.setCommentProperties && (obj.comment?.trim().length ?? 0) > 0)
  );
}

/**
 * Comment property and property set values shared by every composition
 * object.
 */
export function initializeCompositionObject(
  this: UnitAssembler,
  obj: ExplicitCompositionObject,
  localName = "result",
): void {
  const { builder, deref, stringifier } = this;
  if (this.options.setCommentProperties && obj.comment?.trim()) {
    this.writeAssignment("Comment", stringifier.string(obj.comment), localName);
  }

  const { scalarProperties, vector2Properties } = obj.properties;
  if (scalarProperties.size === 0 && vector2Properties.size === 0) {
    return;
  }
  builder.writeLine(
    `${stringifier.varKeyword} propertySet = ${localName}${deref}Properties;`,
  );
  for (const [name, value] of scalarProperties) {
    builder.writeLine(
      `propertySet${deref}InsertScalar(${stringifier.string(name)}, ${stringifier.float(value)});`,
    );
  }
  for (const [name, value] of vector2Properties) {
    builder.writeLine(
      `propertySet${deref}InsertVector2(${stringifier.string(name)}, ${stringifier.vector2(value)});`,
    );
  }
}
