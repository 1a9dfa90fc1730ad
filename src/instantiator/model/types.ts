/**
 * Composition object model consumed by the instantiator generator
 */

import type { Color, Matrix3x2, Vector2, Vector3 } from "./values.js";

/**
 * Composition object kinds
 */
export enum CompositionObjectType {
  AnimationController = "AnimationController",
  ColorKeyFrameAnimation = "ColorKeyFrameAnimation",
  CompositionColorBrush = "CompositionColorBrush",
  CompositionContainerShape = "CompositionContainerShape",
  CompositionEllipseGeometry = "CompositionEllipseGeometry",
  CompositionPathGeometry = "CompositionPathGeometry",
  CompositionPropertySet = "CompositionPropertySet",
  CompositionRectangleGeometry = "CompositionRectangleGeometry",
  CompositionRoundedRectangleGeometry = "CompositionRoundedRectangleGeometry",
  CompositionSpriteShape = "CompositionSpriteShape",
  CompositionViewBox = "CompositionViewBox",
  ContainerVisual = "ContainerVisual",
  CubicBezierEasingFunction = "CubicBezierEasingFunction",
  ExpressionAnimation = "ExpressionAnimation",
  InsetClip = "InsetClip",
  LinearEasingFunction = "LinearEasingFunction",
  PathKeyFrameAnimation = "PathKeyFrameAnimation",
  ScalarKeyFrameAnimation = "ScalarKeyFrameAnimation",
  ShapeVisual = "ShapeVisual",
  StepEasingFunction = "StepEasingFunction",
  Vector2KeyFrameAnimation = "Vector2KeyFrameAnimation",
  Vector3KeyFrameAnimation = "Vector3KeyFrameAnimation",
}

export const COMPOSITION_PATH = "CompositionPath";
export const CANVAS_GEOMETRY = "CanvasGeometry";

export enum CanvasGeometryType {
  Combination = "Combination",
  Ellipse = "Ellipse",
  Path = "Path",
  RoundedRectangle = "RoundedRectangle",
}

export enum CompositionStrokeCap {
  Flat = "Flat",
  Square = "Square",
  Round = "Round",
  Triangle = "Triangle",
}

export enum CompositionStrokeLineJoin {
  Miter = "Miter",
  Bevel = "Bevel",
  Round = "Round",
  MiterOrBevel = "MiterOrBevel",
}

export enum CanvasGeometryCombine {
  Union = "Union",
  Intersect = "Intersect",
  Xor = "Xor",
  Exclude = "Exclude",
}

export enum CanvasFilledRegionDetermination {
  Alternate = "Alternate",
  Winding = "Winding",
}

export enum CanvasFigureLoop {
  Open = "Open",
  Closed = "Closed",
}

/**
 * Text attached to an object for traceability. Short descriptions are
 * used when describing a child, long descriptions describe the object itself.
 */
export interface Describable {
  comment?: string;
  shortDescription?: string;
  longDescription?: string;
}

export interface Animator {
  animatedProperty: string;
  animation: CompositionAnimation;
  controller?: AnimationController;
}

interface CompositionObjectCommon extends Describable {
  animators: Animator[];
}

/**
 * Property bag created implicitly with every composition object
 */
export interface CompositionPropertySet extends CompositionObjectCommon {
  type: CompositionObjectType.CompositionPropertySet;
  scalarProperties: Map<string, number>;
  vector2Properties: Map<string, Vector2>;
}

interface OwnedCompositionObject extends CompositionObjectCommon {
  properties: CompositionPropertySet;
}

/**
 * Controller created implicitly for an animated property
 */
export interface AnimationController extends OwnedCompositionObject {
  type: CompositionObjectType.AnimationController;
}

// Visuals

interface VisualBase extends OwnedCompositionObject {
  centerPoint?: Vector3;
  clip?: CompositionClip;
  offset?: Vector3;
  rotationAngleInDegrees?: number;
  scale?: Vector3;
  size?: Vector2;
  children: Visual[];
}

export interface ContainerVisual extends VisualBase {
  type: CompositionObjectType.ContainerVisual;
}

export interface ShapeVisual extends VisualBase {
  type: CompositionObjectType.ShapeVisual;
  shapes: CompositionShape[];
  viewBox?: CompositionViewBox;
}

export type Visual = ContainerVisual | ShapeVisual;

export interface InsetClip extends OwnedCompositionObject {
  type: CompositionObjectType.InsetClip;
  centerPoint: Vector2;
  scale: Vector2;
  leftInset: number;
  rightInset: number;
  topInset: number;
  bottomInset: number;
}

export type CompositionClip = InsetClip;

export interface CompositionViewBox extends OwnedCompositionObject {
  type: CompositionObjectType.CompositionViewBox;
  size: Vector2;
}

// Shapes

interface CompositionShapeBase extends OwnedCompositionObject {
  centerPoint?: Vector2;
  offset?: Vector2;
  rotationAngleInDegrees?: number;
  scale?: Vector2;
}

export interface CompositionContainerShape extends CompositionShapeBase {
  type: CompositionObjectType.CompositionContainerShape;
  shapes: CompositionShape[];
}

export interface CompositionSpriteShape extends CompositionShapeBase {
  type: CompositionObjectType.CompositionSpriteShape;
  fillBrush?: CompositionBrush;
  geometry?: CompositionGeometry;
  isStrokeNonScaling: boolean;
  strokeBrush?: CompositionBrush;
  strokeDashCap: CompositionStrokeCap;
  strokeDashOffset: number;
  strokeDashArray: number[];
  strokeEndCap: CompositionStrokeCap;
  strokeLineJoin: CompositionStrokeLineJoin;
  strokeStartCap: CompositionStrokeCap;
  strokeMiterLimit: number;
  strokeThickness: number;
}

export type CompositionShape = CompositionContainerShape | CompositionSpriteShape;

// Geometries

interface CompositionGeometryBase extends OwnedCompositionObject {
  trimStart: number;
  trimEnd: number;
  trimOffset: number;
}

export interface CompositionEllipseGeometry extends CompositionGeometryBase {
  type: CompositionObjectType.CompositionEllipseGeometry;
  center: Vector2;
  radius: Vector2;
}

export interface CompositionRectangleGeometry extends CompositionGeometryBase {
  type: CompositionObjectType.CompositionRectangleGeometry;
  size: Vector2;
}

export interface CompositionRoundedRectangleGeometry
  extends CompositionGeometryBase {
  type: CompositionObjectType.CompositionRoundedRectangleGeometry;
  cornerRadius: Vector2;
  size: Vector2;
}

export interface CompositionPathGeometry extends CompositionGeometryBase {
  type: CompositionObjectType.CompositionPathGeometry;
  path: CompositionPath;
}

export type CompositionGeometry =
  | CompositionEllipseGeometry
  | CompositionRectangleGeometry
  | CompositionRoundedRectangleGeometry
  | CompositionPathGeometry;

// Brushes

export interface CompositionColorBrush extends OwnedCompositionObject {
  type: CompositionObjectType.CompositionColorBrush;
  color: Color;
}

export type CompositionBrush = CompositionColorBrush;

// Easing functions

export interface LinearEasingFunction extends OwnedCompositionObject {
  type: CompositionObjectType.LinearEasingFunction;
}

export interface CubicBezierEasingFunction extends OwnedCompositionObject {
  type: CompositionObjectType.CubicBezierEasingFunction;
  controlPoint1: Vector2;
  controlPoint2: Vector2;
}

export interface StepEasingFunction extends OwnedCompositionObject {
  type: CompositionObjectType.StepEasingFunction;
  finalStep: number;
  initialStep: number;
  isFinalStepSingleFrame: boolean;
  isInitialStepSingleFrame: boolean;
  stepCount: number;
}

export type CompositionEasingFunction =
  | LinearEasingFunction
  | CubicBezierEasingFunction
  | StepEasingFunction;

// Animations

interface CompositionAnimationBase extends OwnedCompositionObject {
  target?: string;
  referenceParameters: Map<string, ReferenceTarget>;
}

export interface ExpressionAnimation extends CompositionAnimationBase {
  type: CompositionObjectType.ExpressionAnimation;
  expression: string;
}

export interface ValueKeyFrame<T> {
  kind: "value";
  progress: number;
  value: T;
  easing: CompositionEasingFunction;
}

export interface ExpressionKeyFrame {
  kind: "expression";
  progress: number;
  expression: string;
  easing: CompositionEasingFunction;
}

export type KeyFrame<T> = ValueKeyFrame<T> | ExpressionKeyFrame;

interface KeyFrameAnimationBase<T> extends CompositionAnimationBase {
  /** Milliseconds. */
  duration: number;
  keyFrames: KeyFrame<T>[];
}

export interface ColorKeyFrameAnimation extends KeyFrameAnimationBase<Color> {
  type: CompositionObjectType.ColorKeyFrameAnimation;
}

export interface ScalarKeyFrameAnimation extends KeyFrameAnimationBase<number> {
  type: CompositionObjectType.ScalarKeyFrameAnimation;
}

export interface Vector2KeyFrameAnimation
  extends KeyFrameAnimationBase<Vector2> {
  type: CompositionObjectType.Vector2KeyFrameAnimation;
}

export interface Vector3KeyFrameAnimation
  extends KeyFrameAnimationBase<Vector3> {
  type: CompositionObjectType.Vector3KeyFrameAnimation;
}

export interface PathKeyFrameAnimation extends CompositionAnimationBase {
  type: CompositionObjectType.PathKeyFrameAnimation;
  /** Milliseconds. */
  duration: number;
  keyFrames: ValueKeyFrame<CompositionPath>[];
}

export type KeyFrameAnimation =
  | ColorKeyFrameAnimation
  | ScalarKeyFrameAnimation
  | Vector2KeyFrameAnimation
  | Vector3KeyFrameAnimation
  | PathKeyFrameAnimation;

export type CompositionAnimation = ExpressionAnimation | KeyFrameAnimation;

export type CompositionObject =
  | AnimationController
  | CompositionPropertySet
  | Visual
  | InsetClip
  | CompositionViewBox
  | CompositionShape
  | CompositionGeometry
  | CompositionBrush
  | CompositionEasingFunction
  | CompositionAnimation;

/**
 * Objects that are only ever created implicitly by their owner.
 */
export type ImplicitCompositionObject =
  | AnimationController
  | CompositionPropertySet;

export type ExplicitCompositionObject = Exclude<
  CompositionObject,
  ImplicitCompositionObject
>;

export type ReferenceTarget = ExplicitCompositionObject;

// Win2D-style geometry sources

export interface CompositionPath extends Describable {
  type: typeof COMPOSITION_PATH;
  source: CanvasGeometry;
}

interface CanvasGeometryBase extends Describable {
  type: typeof CANVAS_GEOMETRY;
}

export interface CanvasGeometryCombination extends CanvasGeometryBase {
  geometryType: CanvasGeometryType.Combination;
  a: CanvasGeometry;
  b: CanvasGeometry;
  matrix: Matrix3x2;
  combineMode: CanvasGeometryCombine;
}

export interface CanvasGeometryEllipse extends CanvasGeometryBase {
  geometryType: CanvasGeometryType.Ellipse;
  x: number;
  y: number;
  radiusX: number;
  radiusY: number;
}

export type PathCommand =
  | { kind: "beginFigure"; startPoint: Vector2 }
  | { kind: "addLine"; endPoint: Vector2 }
  | {
      kind: "addCubicBezier";
      controlPoint1: Vector2;
      controlPoint2: Vector2;
      endPoint: Vector2;
    }
  | { kind: "endFigure"; figureLoop: CanvasFigureLoop };

export interface CanvasGeometryPath extends CanvasGeometryBase {
  geometryType: CanvasGeometryType.Path;
  filledRegionDetermination: CanvasFilledRegionDetermination;
  commands: PathCommand[];
}

export interface CanvasGeometryRoundedRectangle extends CanvasGeometryBase {
  geometryType: CanvasGeometryType.RoundedRectangle;
  x: number;
  y: number;
  w: number;
  h: number;
  radiusX: number;
  radiusY: number;
}

export type CanvasGeometry =
  | CanvasGeometryCombination
  | CanvasGeometryEllipse
  | CanvasGeometryPath
  | CanvasGeometryRoundedRectangle;

/**
 * Anything that can become a node of the object graph.
 */
export type GraphObject =
  | ExplicitCompositionObject
  | CompositionPath
  | CanvasGeometry;

/**
 * Animators bound on the object's property set followed by the object's own,
 * the order in which they are started.
 */
export const animatorsOf = (
  obj: CompositionPropertySet | ExplicitCompositionObject | AnimationController,
): Animator[] =>
  obj.type === CompositionObjectType.CompositionPropertySet
    ? obj.animators
    : [...obj.properties.animators, ...obj.animators];

export const isAnimated = (obj: ExplicitCompositionObject): boolean =>
  animatorsOf(obj).length > 0;

export const hasProperties = (obj: ExplicitCompositionObject): boolean =>
  obj.properties.scalarProperties.size > 0 ||
  obj.properties.vector2Properties.size > 0;

export const isVisual = (obj: GraphObject): obj is Visual =>
  obj.type === CompositionObjectType.ContainerVisual ||
  obj.type === CompositionObjectType.ShapeVisual;

export const isCompositionObject = (
  obj: GraphObject,
): obj is ExplicitCompositionObject =>
  obj.type !== COMPOSITION_PATH && obj.type !== CANVAS_GEOMETRY;
