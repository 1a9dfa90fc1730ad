/**
 * Batch generator: compiles every scene file under a directory
 */

import fs from "node:fs";
import path from "node:path";
import { AggregateBatchError } from "../errors/codegen_errors.js";
import { isClassName } from "../model/scene_schema.js";
import { SceneInstantiator } from "../scene_instantiator.js";
import { discoverSceneFiles } from "./file_discovery.js";

export interface BatchGeneratorOptions {
  /** A scene file, or a directory of `*.json` scene files. */
  source: string;
  outputDir: string;
  /** Only honored when a single scene is generated. */
  className?: string;
  namespace?: string;
  setCommentProperties?: boolean;
  verbose?: boolean;
  excludeDirs?: string[];
  outputExtension?: string;
}

export interface BatchFileResult {
  className: string;
  sourcePath: string;
  outputPath: string;
}

export interface BatchResult {
  outputs: BatchFileResult[];
}

export class BatchGenerator {
  private readonly instantiator = new SceneInstantiator();

  generate(options: BatchGeneratorOptions): BatchResult {
    // The class name becomes a file name under outputDir.
    if (options.className !== undefined && !isClassName(options.className)) {
      throw new Error(`Invalid class name: ${options.className}`);
    }
    const files = discoverSceneFiles({
      source: options.source,
      excludeDirs: options.excludeDirs,
    });
    const extension = options.outputExtension ?? ".cs";

    let className = options.className;
    if (className !== undefined && files.length > 1) {
      console.warn(
        `Ignoring class name ${className}: ${files.length} scenes found in ${options.source}`,
      );
      className = undefined;
    }

    const outputs: BatchFileResult[] = [];
    const failures: Array<{ filePath: string; error: Error }> = [];
    const generatedFrom = new Map<string, string>();

    for (const filePath of files) {
      if (options.verbose) {
        console.log(`Compiling ${filePath}`);
      }
      try {
        const result = this.instantiator.generateFile(filePath, {
          className,
          namespace: options.namespace,
          setCommentProperties: options.setCommentProperties,
        });
        const previous = generatedFrom.get(result.className);
        if (previous !== undefined) {
          throw new Error(
            `Duplicate class name ${result.className} (also generated from ${previous})`,
          );
        }
        generatedFrom.set(result.className, filePath);

        const outPath = path.join(
          options.outputDir,
          `${result.className}${extension}`,
        );
        fs.mkdirSync(path.dirname(outPath), { recursive: true });
        fs.writeFileSync(outPath, result.code, "utf8");
        outputs.push({
          className: result.className,
          sourcePath: filePath,
          outputPath: outPath,
        });
      } catch (err) {
        const error = err instanceof Error ? err : new Error(String(err));
        console.error(`Failed to generate ${filePath}: ${error.message}`);
        failures.push({ filePath, error });
      }
    }

    if (failures.length > 0) {
      throw new AggregateBatchError(failures);
    }
    return { outputs };
  }
}
