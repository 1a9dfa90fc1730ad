/**
 * Scene pipeline: JSON scene -> composition object graph -> C# source
 */

import path from "node:path";
import { CSharpInstantiatorGenerator } from "./codegen/csharp/csharp_instantiator_generator.js";
import { type LoadedScene, SceneLoader } from "./model/scene_loader.js";
import { isClassName } from "./model/scene_schema.js";

export const DEFAULT_CLASS_NAME = "AnimatedVisualSource";

/**
 * Scene generation options. Values given here win over the scene's own.
 */
export interface SceneGenerationOptions {
  className?: string;
  namespace?: string;
  setCommentProperties?: boolean;
}

export interface SceneGenerationResult {
  className: string;
  code: string;
}

/**
 * `loading-spinner.json` -> `LoadingSpinner`
 */
export function classNameFromPath(filePath: string): string | undefined {
  const words = path
    .basename(filePath, path.extname(filePath))
    .split(/[^A-Za-z0-9]+/)
    .filter((word) => word.length > 0);
  if (words.length === 0) return undefined;
  const name = words
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join("");
  return /^[0-9]/.test(name) ? `_${name}` : name;
}

export class SceneInstantiator {
  private readonly loader = new SceneLoader();

  generate(
    json: unknown,
    options: SceneGenerationOptions = {},
    sourcePath?: string,
  ): SceneGenerationResult {
    return this.generateScene(
      this.loader.load(json, sourcePath),
      options,
      sourcePath,
    );
  }

  generateFile(
    filePath: string,
    options: SceneGenerationOptions = {},
  ): SceneGenerationResult {
    return this.generateScene(
      this.loader.loadFile(filePath),
      options,
      filePath,
    );
  }

  private generateScene(
    scene: LoadedScene,
    options: SceneGenerationOptions,
    sourcePath: string | undefined,
  ): SceneGenerationResult {
    if (options.className !== undefined && !isClassName(options.className)) {
      throw new Error(`Invalid class name: ${options.className}`);
    }
    const className =
      options.className ??
      scene.className ??
      (sourcePath === undefined ? undefined : classNameFromPath(sourcePath)) ??
      DEFAULT_CLASS_NAME;
    const code = CSharpInstantiatorGenerator.createFactoryCode(scene.root, {
      className,
      namespace: options.namespace,
      width: scene.width,
      height: scene.height,
      durationMs: scene.durationMs,
      setCommentProperties: options.setCommentProperties,
    });
    return { className, code };
  }
}
