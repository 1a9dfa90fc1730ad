/**
 * Scene loader: validates a JSON scene document and resolves its object ids
 * into the composition object model
 */

import fs from "node:fs";
import type { ZodIssue } from "zod";
import { SceneLoadError } from "../errors/codegen_errors.js";
import { ErrorCollector } from "../errors/error_collector.js";
import { Compositor } from "./compositor.js";
import {
  type AnimatorRecord,
  type CanvasGeometryRecord,
  type CompositionRecord,
  canvasGeometryRecordSchema,
  compositionRecordSchema,
  type PropertySetRecord,
  type SceneObjectRecord,
  sceneDocumentSchema,
} from "./scene_schema.js";
import {
  type AnimationController,
  type Animator,
  CANVAS_GEOMETRY,
  type CanvasGeometry,
  CanvasFilledRegionDetermination,
  CanvasGeometryType,
  COMPOSITION_PATH,
  type CompositionPath,
  CompositionObjectType,
  type CompositionPropertySet,
  type Describable,
  type ExplicitCompositionObject,
  type GraphObject,
  isCompositionObject,
  isVisual,
  type KeyFrame,
  type ReferenceTarget,
  type ValueKeyFrame,
  type Visual,
} from "./types.js";
import type { Color } from "./values.js";

export interface LoadedScene {
  sourcePath: string;
  className?: string;
  width: number;
  height: number;
  /** Milliseconds. */
  durationMs: number;
  root: Visual;
}

const DOCUMENT_PATH = "(document)";

export const parseColor = (text: string): Color => ({
  a: Number.parseInt(text.slice(1, 3), 16),
  r: Number.parseInt(text.slice(3, 5), 16),
  g: Number.parseInt(text.slice(5, 7), 16),
  b: Number.parseInt(text.slice(7, 9), 16),
});

/**
 * Copy of `init` without the keys whose value is undefined, so that the
 * compositor's defaults apply to them.
 */
const compact = <T extends object>(init: T): Partial<T> => {
  const result: Partial<T> = {};
  for (const key in init) {
    if (init[key] !== undefined) {
      result[key] = init[key];
    }
  }
  return result;
};

const descriptions = (record: Describable): Describable =>
  compact({
    comment: record.comment,
    shortDescription: record.shortDescription,
    longDescription: record.longDescription,
  });

const isOfType =
  <K extends CompositionObjectType>(...types: K[]) =>
  (obj: GraphObject): obj is Extract<GraphObject, { type: K }> =>
    types.some((type) => type === obj.type);

const isAnimation = isOfType(
  CompositionObjectType.ExpressionAnimation,
  CompositionObjectType.ColorKeyFrameAnimation,
  CompositionObjectType.ScalarKeyFrameAnimation,
  CompositionObjectType.Vector2KeyFrameAnimation,
  CompositionObjectType.Vector3KeyFrameAnimation,
  CompositionObjectType.PathKeyFrameAnimation,
);
const isEasing = isOfType(
  CompositionObjectType.LinearEasingFunction,
  CompositionObjectType.CubicBezierEasingFunction,
  CompositionObjectType.StepEasingFunction,
);
const isShape = isOfType(
  CompositionObjectType.CompositionContainerShape,
  CompositionObjectType.CompositionSpriteShape,
);
const isGeometry = isOfType(
  CompositionObjectType.CompositionEllipseGeometry,
  CompositionObjectType.CompositionRectangleGeometry,
  CompositionObjectType.CompositionRoundedRectangleGeometry,
  CompositionObjectType.CompositionPathGeometry,
);
const isBrush = isOfType(CompositionObjectType.CompositionColorBrush);
const isInsetClip = isOfType(CompositionObjectType.InsetClip);
const isViewBox = isOfType(CompositionObjectType.CompositionViewBox);

const isCompositionPath = (obj: GraphObject): obj is CompositionPath =>
  obj.type === COMPOSITION_PATH;

const isCanvasGeometry = (obj: GraphObject): obj is CanvasGeometry =>
  obj.type === CANVAS_GEOMETRY;

const addIssues = (
  collector: ErrorCollector,
  prefix: ReadonlyArray<string | number>,
  issues: ZodIssue[],
): void => {
  for (const issue of issues) {
    const path = [...prefix, ...issue.path].join(".");
    collector.add(path || DOCUMENT_PATH, issue.message);
  }
};

type Guard<T extends GraphObject> = (obj: GraphObject) => obj is T;

type VisualRecord = Extract<
  CompositionRecord,
  {
    type: CompositionObjectType.ContainerVisual | CompositionObjectType.ShapeVisual;
  }
>;

type ShapeRecord = Extract<
  CompositionRecord,
  {
    type:
      | CompositionObjectType.CompositionContainerShape
      | CompositionObjectType.CompositionSpriteShape;
  }
>;

type GeometryRecord = Extract<
  CompositionRecord,
  {
    type:
      | CompositionObjectType.CompositionEllipseGeometry
      | CompositionObjectType.CompositionRectangleGeometry
      | CompositionObjectType.CompositionRoundedRectangleGeometry
      | CompositionObjectType.CompositionPathGeometry;
  }
>;

interface KeyFrameRecord<R> {
  progress: number;
  value?: R;
  expression?: string;
  easing: string;
}

/**
 * Resolves object ids. Single-valued references are resolved while the
 * referencing object is created, so a cycle through them is an error.
 * Collections (children, shapes, animators, reference parameters and key
 * frames) are filled after creation and may form cycles.
 */
class SceneGraphBuilder {
  private readonly built = new Map<string, GraphObject | null>();
  private readonly inProgress: string[] = [];
  private readonly pending: Array<() => void> = [];

  constructor(
    private readonly records: ReadonlyMap<string, SceneObjectRecord>,
    private readonly collector: ErrorCollector,
    private readonly compositor: Compositor,
  ) {}

  buildRoot(rootId: string): Visual | undefined {
    const root = this.reference(rootId, "root", isVisual, "a visual");
    this.drain();
    // Objects unreachable from the root are still checked.
    for (const id of this.records.keys()) {
      this.build(id, `objects.${id}`);
      this.drain();
    }
    return root;
  }

  private drain(): void {
    for (let fill = this.pending.shift(); fill; fill = this.pending.shift()) {
      fill();
    }
  }

  private reference<T extends GraphObject>(
    id: string,
    path: string,
    guard: Guard<T>,
    expected: string,
  ): T | undefined {
    const obj = this.build(id, path);
    if (obj === undefined) {
      return undefined;
    }
    if (!guard(obj)) {
      this.collector.add(path, `Expected ${expected}, got ${obj.type} "${id}"`);
      return undefined;
    }
    return obj;
  }

  private optionalReference<T extends GraphObject>(
    id: string | undefined,
    path: string,
    guard: Guard<T>,
    expected: string,
  ): T | undefined {
    return id === undefined
      ? undefined
      : this.reference(id, path, guard, expected);
  }

  private references<T extends GraphObject>(
    ids: string[] | undefined,
    path: string,
    guard: Guard<T>,
    expected: string,
  ): T[] {
    return (ids ?? [])
      .map((id, i) => this.reference(id, `${path}.${i}`, guard, expected))
      .filter((obj): obj is T => obj !== undefined);
  }

  private build(id: string, path: string): GraphObject | undefined {
    if (this.built.has(id)) {
      return this.built.get(id) ?? undefined;
    }
    const record = this.records.get(id);
    if (record === undefined) {
      this.collector.add(path, `Unknown object id "${id}"`);
      return undefined;
    }
    const cycleStart = this.inProgress.indexOf(id);
    if (cycleStart >= 0) {
      const cycle = [...this.inProgress.slice(cycleStart), id];
      this.collector.add(path, `Reference cycle: ${cycle.join(" -> ")}`);
      return undefined;
    }

    this.inProgress.push(id);
    const obj =
      record.type === CANVAS_GEOMETRY
        ? this.createCanvasGeometry(id, record)
        : this.createCompositionObject(id, record);
    this.inProgress.pop();

    if (obj !== undefined) {
      Object.assign(obj, descriptions(record));
    }
    this.built.set(id, obj ?? null);
    return obj;
  }

  private createCompositionObject(
    id: string,
    record: CompositionRecord,
  ): GraphObject | undefined {
    const at = (field: string) => `objects.${id}.${field}`;
    const c = this.compositor;

    switch (record.type) {
      case CompositionObjectType.ContainerVisual: {
        const obj = c.createContainerVisual(this.visualInit(id, record));
        this.deferVisual(id, obj, record);
        return obj;
      }
      case CompositionObjectType.ShapeVisual: {
        const obj = c.createShapeVisual({
          ...this.visualInit(id, record),
          ...compact({
            viewBox: this.optionalReference(
              record.viewBox,
              at("viewBox"),
              isViewBox,
              "a view box",
            ),
          }),
        });
        this.deferVisual(id, obj, record);
        this.pending.push(() => {
          obj.shapes.push(
            ...this.references(record.shapes, at("shapes"), isShape, "a shape"),
          );
        });
        return obj;
      }
      case CompositionObjectType.InsetClip: {
        const obj = c.createInsetClip(
          compact({
            centerPoint: record.centerPoint,
            scale: record.scale,
            leftInset: record.leftInset,
            rightInset: record.rightInset,
            topInset: record.topInset,
            bottomInset: record.bottomInset,
          }),
        );
        this.deferOwned(id, obj, record);
        return obj;
      }
      case CompositionObjectType.CompositionViewBox: {
        const obj = c.createViewBox(record.size);
        this.deferOwned(id, obj, record);
        return obj;
      }
      case CompositionObjectType.CompositionContainerShape: {
        const obj = c.createContainerShape(this.shapeInit(record));
        this.deferOwned(id, obj, record);
        this.pending.push(() => {
          obj.shapes.push(
            ...this.references(record.shapes, at("shapes"), isShape, "a shape"),
          );
        });
        return obj;
      }
      case CompositionObjectType.CompositionSpriteShape: {
        const obj = c.createSpriteShape({
          ...this.shapeInit(record),
          ...compact({
            fillBrush: this.optionalReference(
              record.fillBrush,
              at("fillBrush"),
              isBrush,
              "a brush",
            ),
            geometry: this.optionalReference(
              record.geometry,
              at("geometry"),
              isGeometry,
              "a geometry",
            ),
            strokeBrush: this.optionalReference(
              record.strokeBrush,
              at("strokeBrush"),
              isBrush,
              "a brush",
            ),
            isStrokeNonScaling: record.isStrokeNonScaling,
            strokeDashCap: record.strokeDashCap,
            strokeDashOffset: record.strokeDashOffset,
            strokeDashArray: record.strokeDashArray,
            strokeEndCap: record.strokeEndCap,
            strokeLineJoin: record.strokeLineJoin,
            strokeStartCap: record.strokeStartCap,
            strokeMiterLimit: record.strokeMiterLimit,
            strokeThickness: record.strokeThickness,
          }),
        });
        this.deferOwned(id, obj, record);
        return obj;
      }
      case CompositionObjectType.CompositionEllipseGeometry: {
        const obj = c.createEllipseGeometry(record.radius, {
          ...this.geometryInit(record),
          ...compact({ center: record.center }),
        });
        this.deferOwned(id, obj, record);
        return obj;
      }
      case CompositionObjectType.CompositionRectangleGeometry: {
        const obj = c.createRectangleGeometry(
          record.size,
          this.geometryInit(record),
        );
        this.deferOwned(id, obj, record);
        return obj;
      }
      case CompositionObjectType.CompositionRoundedRectangleGeometry: {
        const obj = c.createRoundedRectangleGeometry(
          record.size,
          record.cornerRadius,
          this.geometryInit(record),
        );
        this.deferOwned(id, obj, record);
        return obj;
      }
      case CompositionObjectType.CompositionPathGeometry: {
        const path = this.reference(
          record.path,
          at("path"),
          isCompositionPath,
          "a composition path",
        );
        if (path === undefined) {
          return undefined;
        }
        const obj = c.createPathGeometry(path, this.geometryInit(record));
        this.deferOwned(id, obj, record);
        return obj;
      }
      case CompositionObjectType.CompositionColorBrush: {
        const obj = c.createColorBrush(parseColor(record.color));
        this.deferOwned(id, obj, record);
        return obj;
      }
      case CompositionObjectType.LinearEasingFunction: {
        const obj = c.createLinearEasingFunction();
        this.deferOwned(id, obj, record);
        return obj;
      }
      case CompositionObjectType.CubicBezierEasingFunction: {
        const obj = c.createCubicBezierEasingFunction(
          record.controlPoint1,
          record.controlPoint2,
        );
        this.deferOwned(id, obj, record);
        return obj;
      }
      case CompositionObjectType.StepEasingFunction: {
        const obj = c.createStepEasingFunction(
          compact({
            finalStep: record.finalStep,
            initialStep: record.initialStep,
            isFinalStepSingleFrame: record.isFinalStepSingleFrame,
            isInitialStepSingleFrame: record.isInitialStepSingleFrame,
            stepCount: record.stepCount,
          }),
        );
        this.deferOwned(id, obj, record);
        return obj;
      }
      case CompositionObjectType.ExpressionAnimation: {
        const obj = c.createExpressionAnimation(
          record.expression,
          compact({ target: record.target }),
        );
        this.deferOwned(id, obj, record);
        this.deferReferenceParameters(id, obj.referenceParameters, record);
        return obj;
      }
      case CompositionObjectType.ColorKeyFrameAnimation: {
        const obj = c.createColorKeyFrameAnimation(
          record.duration,
          compact({ target: record.target }),
        );
        this.deferOwned(id, obj, record);
        this.deferReferenceParameters(id, obj.referenceParameters, record);
        this.pending.push(() => {
          obj.keyFrames.push(
            ...this.keyFrames(record.keyFrames, at("keyFrames"), parseColor),
          );
        });
        return obj;
      }
      case CompositionObjectType.ScalarKeyFrameAnimation: {
        const obj = c.createScalarKeyFrameAnimation(
          record.duration,
          compact({ target: record.target }),
        );
        this.deferOwned(id, obj, record);
        this.deferReferenceParameters(id, obj.referenceParameters, record);
        this.pending.push(() => {
          obj.keyFrames.push(
            ...this.keyFrames(record.keyFrames, at("keyFrames"), (v) => v),
          );
        });
        return obj;
      }
      case CompositionObjectType.Vector2KeyFrameAnimation: {
        const obj = c.createVector2KeyFrameAnimation(
          record.duration,
          compact({ target: record.target }),
        );
        this.deferOwned(id, obj, record);
        this.deferReferenceParameters(id, obj.referenceParameters, record);
        this.pending.push(() => {
          obj.keyFrames.push(
            ...this.keyFrames(record.keyFrames, at("keyFrames"), (v) => v),
          );
        });
        return obj;
      }
      case CompositionObjectType.Vector3KeyFrameAnimation: {
        const obj = c.createVector3KeyFrameAnimation(
          record.duration,
          compact({ target: record.target }),
        );
        this.deferOwned(id, obj, record);
        this.deferReferenceParameters(id, obj.referenceParameters, record);
        this.pending.push(() => {
          obj.keyFrames.push(
            ...this.keyFrames(record.keyFrames, at("keyFrames"), (v) => v),
          );
        });
        return obj;
      }
      case CompositionObjectType.PathKeyFrameAnimation: {
        const obj = c.createPathKeyFrameAnimation(
          record.duration,
          compact({ target: record.target }),
        );
        this.deferOwned(id, obj, record);
        this.deferReferenceParameters(id, obj.referenceParameters, record);
        this.pending.push(() => {
          (record.keyFrames ?? []).forEach((kf, i) => {
            const path = this.reference(
              kf.value,
              at(`keyFrames.${i}.value`),
              isCompositionPath,
              "a composition path",
            );
            const easing = this.reference(
              kf.easing,
              at(`keyFrames.${i}.easing`),
              isEasing,
              "an easing function",
            );
            if (path === undefined || easing === undefined) {
              return;
            }
            const keyFrame: ValueKeyFrame<CompositionPath> = {
              kind: "value",
              progress: kf.progress,
              value: path,
              easing,
            };
            obj.keyFrames.push(keyFrame);
          });
        });
        return obj;
      }
      case COMPOSITION_PATH: {
        const source = this.reference(
          record.source,
          at("source"),
          isCanvasGeometry,
          "a canvas geometry",
        );
        return source === undefined ? undefined : c.createPath(source);
      }
    }
  }

  private createCanvasGeometry(
    id: string,
    record: CanvasGeometryRecord,
  ): CanvasGeometry | undefined {
    const c = this.compositor;
    switch (record.geometryType) {
      case CanvasGeometryType.Combination: {
        const a = this.reference(
          record.a,
          `objects.${id}.a`,
          isCanvasGeometry,
          "a canvas geometry",
        );
        const b = this.reference(
          record.b,
          `objects.${id}.b`,
          isCanvasGeometry,
          "a canvas geometry",
        );
        if (a === undefined || b === undefined) {
          return undefined;
        }
        return c.createCanvasCombination(a, b, record.combineMode, record.matrix);
      }
      case CanvasGeometryType.Ellipse:
        return c.createCanvasEllipse(
          record.x,
          record.y,
          record.radiusX,
          record.radiusY,
        );
      case CanvasGeometryType.Path:
        return c.createCanvasPath(
          record.filledRegionDetermination ??
            CanvasFilledRegionDetermination.Alternate,
          record.commands,
        );
      case CanvasGeometryType.RoundedRectangle:
        return c.createCanvasRoundedRectangle(
          record.x,
          record.y,
          record.w,
          record.h,
          record.radiusX,
          record.radiusY,
        );
    }
  }

  private visualInit(id: string, record: VisualRecord) {
    return compact({
      centerPoint: record.centerPoint,
      clip: this.optionalReference(
        record.clip,
        `objects.${id}.clip`,
        isInsetClip,
        "an inset clip",
      ),
      offset: record.offset,
      rotationAngleInDegrees: record.rotationAngleInDegrees,
      scale: record.scale,
      size: record.size,
    });
  }

  private shapeInit(record: ShapeRecord) {
    return compact({
      centerPoint: record.centerPoint,
      offset: record.offset,
      rotationAngleInDegrees: record.rotationAngleInDegrees,
      scale: record.scale,
    });
  }

  private geometryInit(record: GeometryRecord) {
    return compact({
      trimStart: record.trimStart,
      trimEnd: record.trimEnd,
      trimOffset: record.trimOffset,
    });
  }

  private deferVisual(id: string, obj: Visual, record: VisualRecord): void {
    this.deferOwned(id, obj, record);
    this.pending.push(() => {
      obj.children.push(
        ...this.references(
          record.children,
          `objects.${id}.children`,
          isVisual,
          "a visual",
        ),
      );
    });
  }

  private deferOwned(
    id: string,
    obj: ExplicitCompositionObject,
    record: { properties?: PropertySetRecord; animators?: AnimatorRecord[] },
  ): void {
    this.pending.push(() => {
      this.fillPropertySet(
        obj.properties,
        record.properties,
        `objects.${id}.properties`,
      );
      obj.animators.push(
        ...this.animators(record.animators, `objects.${id}.animators`),
      );
    });
  }

  private deferReferenceParameters(
    id: string,
    parameters: Map<string, ReferenceTarget>,
    record: { referenceParameters?: Record<string, string> },
  ): void {
    this.pending.push(() => {
      for (const [name, targetId] of Object.entries(
        record.referenceParameters ?? {},
      )) {
        const target = this.reference(
          targetId,
          `objects.${id}.referenceParameters.${name}`,
          isCompositionObject,
          "a composition object",
        );
        if (target !== undefined) {
          parameters.set(name, target);
        }
      }
    });
  }

  private fillPropertySet(
    set: CompositionPropertySet,
    record: PropertySetRecord | undefined,
    path: string,
  ): void {
    if (record === undefined) {
      return;
    }
    for (const [name, value] of Object.entries(record.scalars ?? {})) {
      set.scalarProperties.set(name, value);
    }
    for (const [name, value] of Object.entries(record.vector2s ?? {})) {
      set.vector2Properties.set(name, value);
    }
    set.animators.push(...this.animators(record.animators, `${path}.animators`));
  }

  private animators(
    records: AnimatorRecord[] | undefined,
    path: string,
  ): Animator[] {
    const result: Animator[] = [];
    (records ?? []).forEach((record, i) => {
      const animation = this.reference(
        record.animation,
        `${path}.${i}.animation`,
        isAnimation,
        "an animation",
      );
      if (animation === undefined) {
        return;
      }
      let controller: AnimationController | undefined;
      if (record.controller !== undefined) {
        controller = this.compositor.createAnimationController();
        this.fillPropertySet(
          controller.properties,
          record.controller.properties,
          `${path}.${i}.controller.properties`,
        );
        controller.animators.push(
          ...this.animators(
            record.controller.animators,
            `${path}.${i}.controller.animators`,
          ),
        );
      }
      result.push({ animatedProperty: record.property, animation, controller });
    });
    return result;
  }

  private keyFrames<R, T>(
    records: KeyFrameRecord<R>[] | undefined,
    path: string,
    convert: (value: R) => T,
  ): KeyFrame<T>[] {
    const result: KeyFrame<T>[] = [];
    (records ?? []).forEach((record, i) => {
      const easing = this.reference(
        record.easing,
        `${path}.${i}.easing`,
        isEasing,
        "an easing function",
      );
      if (easing === undefined) {
        return;
      }
      if (record.expression !== undefined) {
        result.push({
          kind: "expression",
          progress: record.progress,
          expression: record.expression,
          easing,
        });
      } else if (record.value !== undefined) {
        result.push({
          kind: "value",
          progress: record.progress,
          value: convert(record.value),
          easing,
        });
      }
    });
    return result;
  }
}

export class SceneLoader {
  private readonly compositor = new Compositor();

  loadFile(filePath: string): LoadedScene {
    let json: unknown;
    try {
      json = JSON.parse(fs.readFileSync(filePath, "utf8"));
    } catch (err) {
      throw new SceneLoadError(filePath, [
        {
          path: DOCUMENT_PATH,
          message: err instanceof Error ? err.message : String(err),
        },
      ]);
    }
    return this.load(json, filePath);
  }

  load(json: unknown, sourcePath = "<memory>"): LoadedScene {
    const collector = new ErrorCollector(sourcePath);
    const parsed = sceneDocumentSchema.safeParse(json);
    if (!parsed.success) {
      addIssues(collector, [], parsed.error.issues);
      throw new SceneLoadError(sourcePath, collector.getIssues());
    }
    const document = parsed.data;

    const records = new Map<string, SceneObjectRecord>();
    for (const [id, raw] of Object.entries(document.objects)) {
      const result =
        raw.type === CANVAS_GEOMETRY
          ? canvasGeometryRecordSchema.safeParse(raw)
          : compositionRecordSchema.safeParse(raw);
      if (result.success) {
        records.set(id, result.data);
      } else {
        addIssues(collector, ["objects", id], result.error.issues);
      }
    }
    collector.throwIfErrors();

    const root = new SceneGraphBuilder(
      records,
      collector,
      this.compositor,
    ).buildRoot(document.root);
    if (root === undefined || collector.hasErrors()) {
      throw new SceneLoadError(sourcePath, collector.getIssues());
    }

    return {
      sourcePath,
      className: document.className,
      width: document.width,
      height: document.height,
      durationMs: document.durationMs,
      root,
    };
  }
}
