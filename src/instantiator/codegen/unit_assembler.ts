/**
 * Assembles one compilation unit from the annotated graph
 */

import { CodegenError } from "../errors/codegen_errors.js";
import { isVisual } from "../model/types.js";
import { startAnimations } from "./animation_binder.js";
import { CodeBuilder } from "./code_builder.js";
import type { CompilationContext } from "./compilation_context.js";
import {
  COMPOSITOR_FIELD_NAME,
  DURATION_TICKS_FIELD_NAME,
  SINGLETON_EXPRESSION_ANIMATION_FIELD_NAME,
  millisecondsToTicks,
} from "./constants.js";
import {
  generateColorKeyFrameAnimationFactory,
  generateExpressionAnimationFactory,
  generatePathKeyFrameAnimationFactory,
  generateScalarKeyFrameAnimationFactory,
  generateVector2KeyFrameAnimationFactory,
  generateVector3KeyFrameAnimationFactory,
  initializeCompositionAnimation,
  initializeKeyFrameAnimation,
  writeKeyFrames,
} from "./emitters/animations.js";
import { generateColorBrushFactory } from "./emitters/brushes.js";
import {
  callFactoryFromFor,
  compositorCall,
  initializeCompositionObject,
  needsInitialization,
  timeSpan,
  writeAssignment,
  writeCreateAssignment,
  writeObjectFactoryEnd,
  writeObjectFactoryStart,
  writeSimpleObjectFactory,
} from "./emitters/common.js";
import {
  generateCanvasGeometryFactory,
  generateCompositionPathFactory,
  generateObjectFactory,
  writeCodeForNode,
} from "./emitters/dispatch.js";
import {
  generateCubicBezierEasingFunctionFactory,
  generateLinearEasingFunctionFactory,
  generateStepEasingFunctionFactory,
} from "./emitters/easings.js";
import {
  generateEllipseGeometryFactory,
  generatePathGeometryFactory,
  generateRectangleGeometryFactory,
  generateRoundedRectangleGeometryFactory,
  initializeCompositionGeometry,
} from "./emitters/geometries.js";
import {
  generateContainerShapeFactory,
  generateSpriteShapeFactory,
  initializeCompositionShape,
  strokeCap,
  strokeLineJoin,
} from "./emitters/shapes.js";
import {
  generateContainerVisualFactory,
  generateInsetClipFactory,
  generateShapeVisualFactory,
  generateViewBoxFactory,
  initializeContainerVisual,
  initializeVisual,
} from "./emitters/visuals.js";
import type { Stringifier } from "./stringifier.js";
import type { InstantiatorTarget, UnitDescription } from "./target.js";

export interface UnitOptions {
  className: string;
  width: number;
  height: number;
  /** Milliseconds. */
  durationMs: number;
  setCommentProperties: boolean;
}

const AUTO_GENERATED_HEADER = [
  "//------------------------------------------------------------------------------",
  "// <auto-generated>",
  "//     This code was generated by a tool.",
  "//",
  "//     Changes to this file may cause incorrect behavior and will be lost if",
  "//     the code is regenerated.",
  "// </auto-generated>",
  "//------------------------------------------------------------------------------",
];

/**
 * Writes fields and one factory method per retained node, in name order,
 * between the target's class shell.
 */
export class UnitAssembler {
  readonly builder = new CodeBuilder();

  constructor(
    readonly context: CompilationContext,
    readonly target: InstantiatorTarget,
    readonly options: UnitOptions,
  ) {}

  get stringifier(): Stringifier {
    return this.target.stringifier;
  }

  get deref(): string {
    return this.stringifier.deref;
  }

  assemble(): string {
    const { builder, context, stringifier } = this;
    const root = context.root;
    const rootVisual = root.object;
    if (!isVisual(rootVisual)) {
      throw new CodegenError(
        "InvalidReference",
        `The root must be a visual, not ${rootVisual.type}`,
      );
    }

    for (const line of AUTO_GENERATED_HEADER) {
      builder.writeLine(line);
    }

    const methodNodes = context.methodNodes();
    this.target.writePreamble(
      builder,
      methodNodes.some((node) => node.requiresGeometryLibrary),
    );

    const unit: UnitDescription = {
      className: this.options.className,
      size: { x: this.options.width, y: this.options.height },
      propertySet: rootVisual.properties,
      durationTicks: millisecondsToTicks(this.options.durationMs),
      durationTicksFieldName: DURATION_TICKS_FIELD_NAME,
    };
    this.target.writeClassStart(builder, unit);

    this.writeField(
      `const ${stringifier.int64TypeName}`,
      `${DURATION_TICKS_FIELD_NAME} = ${stringifier.int64(unit.durationTicks)}`,
    );
    this.writeField(
      this.readonly(stringifier.referenceTypeName("Compositor")),
      COMPOSITOR_FIELD_NAME,
    );
    this.writeField(
      this.readonly(stringifier.referenceTypeName("ExpressionAnimation")),
      SINGLETON_EXPRESSION_ANIMATION_FIELD_NAME,
    );
    for (const node of context.storedNodes()) {
      this.writeField(
        stringifier.referenceTypeName(node.typeName),
        node.fieldName,
      );
    }
    builder.writeLine();

    for (const node of methodNodes) {
      this.writeCodeForNode(node);
    }

    this.target.writeClassEnd(
      builder,
      unit,
      root,
      SINGLETON_EXPRESSION_ANIMATION_FIELD_NAME,
    );
    return builder.toString();
  }

  private writeField(typeName: string, fieldName: string): void {
    this.builder.writeLine(`${typeName} ${fieldName};`);
  }

  private readonly(typeName: string): string {
    const modifier = this.stringifier.readonlyModifier;
    return modifier.trim().length > 0 ? `${modifier} ${typeName}` : typeName;
  }

  // common
  callFactoryFromFor = callFactoryFromFor;
  compositorCall = compositorCall;
  initializeCompositionObject = initializeCompositionObject;
  needsInitialization = needsInitialization;
  timeSpan = timeSpan;
  writeAssignment = writeAssignment;
  writeCreateAssignment = writeCreateAssignment;
  writeObjectFactoryEnd = writeObjectFactoryEnd;
  writeObjectFactoryStart = writeObjectFactoryStart;
  writeSimpleObjectFactory = writeSimpleObjectFactory;

  // dispatch
  writeCodeForNode = writeCodeForNode;
  generateObjectFactory = generateObjectFactory;
  generateCompositionPathFactory = generateCompositionPathFactory;
  generateCanvasGeometryFactory = generateCanvasGeometryFactory;

  // visuals
  initializeVisual = initializeVisual;
  initializeContainerVisual = initializeContainerVisual;
  generateContainerVisualFactory = generateContainerVisualFactory;
  generateShapeVisualFactory = generateShapeVisualFactory;
  generateInsetClipFactory = generateInsetClipFactory;
  generateViewBoxFactory = generateViewBoxFactory;

  // shapes
  initializeCompositionShape = initializeCompositionShape;
  generateContainerShapeFactory = generateContainerShapeFactory;
  generateSpriteShapeFactory = generateSpriteShapeFactory;
  strokeCap = strokeCap;
  strokeLineJoin = strokeLineJoin;

  // geometries
  initializeCompositionGeometry = initializeCompositionGeometry;
  generateEllipseGeometryFactory = generateEllipseGeometryFactory;
  generateRectangleGeometryFactory = generateRectangleGeometryFactory;
  generateRoundedRectangleGeometryFactory =
    generateRoundedRectangleGeometryFactory;
  generatePathGeometryFactory = generatePathGeometryFactory;

  // brushes and easings
  generateColorBrushFactory = generateColorBrushFactory;
  generateLinearEasingFunctionFactory = generateLinearEasingFunctionFactory;
  generateCubicBezierEasingFunctionFactory =
    generateCubicBezierEasingFunctionFactory;
  generateStepEasingFunctionFactory = generateStepEasingFunctionFactory;

  // animations
  initializeCompositionAnimation = initializeCompositionAnimation;
  initializeKeyFrameAnimation = initializeKeyFrameAnimation;
  writeKeyFrames = writeKeyFrames;
  generateColorKeyFrameAnimationFactory = generateColorKeyFrameAnimationFactory;
  generateScalarKeyFrameAnimationFactory =
    generateScalarKeyFrameAnimationFactory;
  generateVector2KeyFrameAnimationFactory =
    generateVector2KeyFrameAnimationFactory;
  generateVector3KeyFrameAnimationFactory =
    generateVector3KeyFrameAnimationFactory;
  generatePathKeyFrameAnimationFactory = generatePathKeyFrameAnimationFactory;
  generateExpressionAnimationFactory = generateExpressionAnimationFactory;

  // animation binding
  startAnimations = startAnimations;
}
