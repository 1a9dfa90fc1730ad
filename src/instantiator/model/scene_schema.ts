/**
 * JSON scene document schema
 *
 * A scene is a flat map of object records keyed by id. Records refer to
 * each other by id; the loader resolves the ids into the object model.
 */

import { z } from "zod";
import {
  CanvasFigureLoop,
  CanvasFilledRegionDetermination,
  CanvasGeometryCombine,
  CanvasGeometryType,
  CompositionObjectType,
  CompositionStrokeCap,
  CompositionStrokeLineJoin,
} from "./types.js";

export const vector2Schema = z.object({ x: z.number(), y: z.number() });

export const vector3Schema = z.object({
  x: z.number(),
  y: z.number(),
  z: z.number(),
});

export const matrix3x2Schema = z.object({
  m11: z.number(),
  m12: z.number(),
  m21: z.number(),
  m22: z.number(),
  m31: z.number(),
  m32: z.number(),
});

export const colorSchema = z
  .string()
  .regex(/^#[0-9a-fA-F]{8}$/, "Expected a color in the form #AARRGGBB");

export const CLASS_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

export const isClassName = (value: string): boolean =>
  CLASS_NAME_PATTERN.test(value);

const idSchema = z.string().min(1, "Expected an object id");

const propertyNameSchema = z.string().min(1, "Expected a property name");

export interface AnimatorRecord {
  property: string;
  animation: string;
  controller?: ControllerRecord;
}

export interface PropertySetRecord {
  scalars?: Record<string, number>;
  vector2s?: Record<string, { x: number; y: number }>;
  animators?: AnimatorRecord[];
}

export interface ControllerRecord {
  properties?: PropertySetRecord;
  animators?: AnimatorRecord[];
}

const animatorSchema: z.ZodType<AnimatorRecord> = z.lazy(() =>
  z.object({
    property: propertyNameSchema,
    animation: idSchema,
    controller: controllerSchema.optional(),
  }),
);

const propertySetSchema: z.ZodType<PropertySetRecord> = z.lazy(() =>
  z.object({
    scalars: z.record(z.number()).optional(),
    vector2s: z.record(vector2Schema).optional(),
    animators: z.array(animatorSchema).optional(),
  }),
);

const controllerSchema: z.ZodType<ControllerRecord> = z.lazy(() =>
  z.object({
    properties: propertySetSchema.optional(),
    animators: z.array(animatorSchema).optional(),
  }),
);

const describable = {
  comment: z.string().optional(),
  shortDescription: z.string().optional(),
  longDescription: z.string().optional(),
};

const owned = {
  ...describable,
  properties: propertySetSchema.optional(),
  animators: z.array(animatorSchema).optional(),
};

const visual = {
  ...owned,
  centerPoint: vector3Schema.optional(),
  clip: idSchema.optional(),
  offset: vector3Schema.optional(),
  rotationAngleInDegrees: z.number().optional(),
  scale: vector3Schema.optional(),
  size: vector2Schema.optional(),
  children: z.array(idSchema).optional(),
};

const shape = {
  ...owned,
  centerPoint: vector2Schema.optional(),
  offset: vector2Schema.optional(),
  rotationAngleInDegrees: z.number().optional(),
  scale: vector2Schema.optional(),
};

const geometry = {
  ...owned,
  trimStart: z.number().optional(),
  trimEnd: z.number().optional(),
  trimOffset: z.number().optional(),
};

const animation = {
  ...owned,
  target: z.string().optional(),
  referenceParameters: z.record(idSchema).optional(),
};

const progressSchema = z
  .number()
  .min(0, "Key frame progress must be within [0, 1]")
  .max(1, "Key frame progress must be within [0, 1]");

const keyFrameSchema = <T extends z.ZodTypeAny>(valueSchema: T) =>
  z
    .object({
      progress: progressSchema,
      value: valueSchema.optional(),
      expression: z.string().optional(),
      easing: idSchema,
    })
    .refine((kf) => (kf.value === undefined) !== (kf.expression === undefined), {
      message: "Expected exactly one of value or expression",
    });

const keyFrameAnimation = <T extends z.ZodTypeAny>(valueSchema: T) => ({
  ...animation,
  duration: z.number().nonnegative(),
  keyFrames: z.array(keyFrameSchema(valueSchema)).optional(),
});

const strokeCapSchema = z.nativeEnum(CompositionStrokeCap);

export const compositionRecordSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal(CompositionObjectType.ContainerVisual), ...visual }),
  z.object({
    type: z.literal(CompositionObjectType.ShapeVisual),
    ...visual,
    shapes: z.array(idSchema).optional(),
    viewBox: idSchema.optional(),
  }),
  z.object({
    type: z.literal(CompositionObjectType.InsetClip),
    ...owned,
    centerPoint: vector2Schema.optional(),
    scale: vector2Schema.optional(),
    leftInset: z.number().optional(),
    rightInset: z.number().optional(),
    topInset: z.number().optional(),
    bottomInset: z.number().optional(),
  }),
  z.object({
    type: z.literal(CompositionObjectType.CompositionViewBox),
    ...owned,
    size: vector2Schema,
  }),
  z.object({
    type: z.literal(CompositionObjectType.CompositionContainerShape),
    ...shape,
    shapes: z.array(idSchema).optional(),
  }),
  z.object({
    type: z.literal(CompositionObjectType.CompositionSpriteShape),
    ...shape,
    fillBrush: idSchema.optional(),
    geometry: idSchema.optional(),
    isStrokeNonScaling: z.boolean().optional(),
    strokeBrush: idSchema.optional(),
    strokeDashCap: strokeCapSchema.optional(),
    strokeDashOffset: z.number().optional(),
    strokeDashArray: z.array(z.number()).optional(),
    strokeEndCap: strokeCapSchema.optional(),
    strokeLineJoin: z.nativeEnum(CompositionStrokeLineJoin).optional(),
    strokeStartCap: strokeCapSchema.optional(),
    strokeMiterLimit: z.number().optional(),
    strokeThickness: z.number().optional(),
  }),
  z.object({
    type: z.literal(CompositionObjectType.CompositionEllipseGeometry),
    ...geometry,
    center: vector2Schema.optional(),
    radius: vector2Schema,
  }),
  z.object({
    type: z.literal(CompositionObjectType.CompositionRectangleGeometry),
    ...geometry,
    size: vector2Schema,
  }),
  z.object({
    type: z.literal(CompositionObjectType.CompositionRoundedRectangleGeometry),
    ...geometry,
    size: vector2Schema,
    cornerRadius: vector2Schema,
  }),
  z.object({
    type: z.literal(CompositionObjectType.CompositionPathGeometry),
    ...geometry,
    path: idSchema,
  }),
  z.object({
    type: z.literal(CompositionObjectType.CompositionColorBrush),
    ...owned,
    color: colorSchema,
  }),
  z.object({
    type: z.literal(CompositionObjectType.LinearEasingFunction),
    ...owned,
  }),
  z.object({
    type: z.literal(CompositionObjectType.CubicBezierEasingFunction),
    ...owned,
    controlPoint1: vector2Schema,
    controlPoint2: vector2Schema,
  }),
  z.object({
    type: z.literal(CompositionObjectType.StepEasingFunction),
    ...owned,
    finalStep: z.number().int().optional(),
    initialStep: z.number().int().optional(),
    isFinalStepSingleFrame: z.boolean().optional(),
    isInitialStepSingleFrame: z.boolean().optional(),
    stepCount: z.number().int().optional(),
  }),
  z.object({
    type: z.literal(CompositionObjectType.ExpressionAnimation),
    ...animation,
    expression: z.string().min(1, "Expected an expression"),
  }),
  z.object({
    type: z.literal(CompositionObjectType.ColorKeyFrameAnimation),
    ...keyFrameAnimation(colorSchema),
  }),
  z.object({
    type: z.literal(CompositionObjectType.ScalarKeyFrameAnimation),
    ...keyFrameAnimation(z.number()),
  }),
  z.object({
    type: z.literal(CompositionObjectType.Vector2KeyFrameAnimation),
    ...keyFrameAnimation(vector2Schema),
  }),
  z.object({
    type: z.literal(CompositionObjectType.Vector3KeyFrameAnimation),
    ...keyFrameAnimation(vector3Schema),
  }),
  z.object({
    type: z.literal(CompositionObjectType.PathKeyFrameAnimation),
    ...animation,
    duration: z.number().nonnegative(),
    keyFrames: z
      .array(
        z.object({ progress: progressSchema, value: idSchema, easing: idSchema }),
      )
      .optional(),
  }),
  z.object({
    type: z.literal("CompositionPath"),
    ...describable,
    source: idSchema,
  }),
]);

const pathCommandSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("beginFigure"), startPoint: vector2Schema }),
  z.object({ kind: z.literal("addLine"), endPoint: vector2Schema }),
  z.object({
    kind: z.literal("addCubicBezier"),
    controlPoint1: vector2Schema,
    controlPoint2: vector2Schema,
    endPoint: vector2Schema,
  }),
  z.object({
    kind: z.literal("endFigure"),
    figureLoop: z.nativeEnum(CanvasFigureLoop),
  }),
]);

const canvasGeometry = {
  type: z.literal("CanvasGeometry"),
  ...describable,
};

export const canvasGeometryRecordSchema = z.discriminatedUnion("geometryType", [
  z.object({
    ...canvasGeometry,
    geometryType: z.literal(CanvasGeometryType.Combination),
    a: idSchema,
    b: idSchema,
    matrix: matrix3x2Schema.optional(),
    combineMode: z.nativeEnum(CanvasGeometryCombine),
  }),
  z.object({
    ...canvasGeometry,
    geometryType: z.literal(CanvasGeometryType.Ellipse),
    x: z.number(),
    y: z.number(),
    radiusX: z.number(),
    radiusY: z.number(),
  }),
  z.object({
    ...canvasGeometry,
    geometryType: z.literal(CanvasGeometryType.Path),
    filledRegionDetermination: z
      .nativeEnum(CanvasFilledRegionDetermination)
      .optional(),
    commands: z.array(pathCommandSchema),
  }),
  z.object({
    ...canvasGeometry,
    geometryType: z.literal(CanvasGeometryType.RoundedRectangle),
    x: z.number(),
    y: z.number(),
    w: z.number(),
    h: z.number(),
    radiusX: z.number(),
    radiusY: z.number(),
  }),
]);

export const sceneDocumentSchema = z.object({
  className: z
    .string()
    .regex(CLASS_NAME_PATTERN, "Expected a class name identifier")
    .optional(),
  width: z.number().positive(),
  height: z.number().positive(),
  durationMs: z.number().nonnegative(),
  root: idSchema,
  objects: z.record(z.object({ type: z.string() }).passthrough()),
});

export type CompositionRecord = z.infer<typeof compositionRecordSchema>;
export type CanvasGeometryRecord = z.infer<typeof canvasGeometryRecordSchema>;
export type SceneObjectRecord = CompositionRecord | CanvasGeometryRecord;
export type SceneDocument = z.infer<typeof sceneDocumentSchema>;
