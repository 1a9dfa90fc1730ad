import { CSharpInstantiatorGenerator } from "../../../src/instantiator/codegen/csharp/csharp_instantiator_generator.js";
import type {
  CompilationResult,
  GeneratorOptions,
} from "../../../src/instantiator/codegen/instantiator_generator.js";
import { CodegenError } from "../../../src/instantiator/errors/codegen_errors.js";
import type { Visual } from "../../../src/instantiator/model/types.js";
import type { Color } from "../../../src/instantiator/model/values.js";

export const RED: Color = { a: 255, r: 255, g: 0, b: 0 };
export const BLUE: Color = { a: 255, r: 0, g: 0, b: 255 };

export function compileScene(
  root: Visual,
  options: Partial<GeneratorOptions> = {},
): CompilationResult {
  return new CSharpInstantiatorGenerator().compile(root, {
    className: "TestVisual",
    width: 100,
    height: 100,
    durationMs: 1000,
    ...options,
  });
}

/**
 * Trimmed lines of the method whose signature line is `signature`, without
 * the signature and its braces.
 */
export function methodBody(code: string, signature: string): string[] {
  const lines = code.split("\n");
  const start = lines.findIndex((line) => line.trim() === signature);
  if (start < 0) {
    throw new Error(`Method not found: ${signature}`);
  }
  const indent = (lines[start] ?? "").length - signature.length;
  const closing = `${" ".repeat(indent)}}`;
  const end = lines.findIndex((line, i) => i > start && line === closing);
  if (end < 0) {
    throw new Error(`Method not closed: ${signature}`);
  }
  return lines.slice(start + 2, end).map((line) => line.trim());
}

export function methodSignatures(code: string): string[] {
  return code
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => /^[A-Za-z0-9_]+ [A-Za-z0-9_]+\(\)$/.test(line));
}

export function countOccurrences(text: string, fragment: string): number {
  return text.split(fragment).length - 1;
}

export function captureCodegenError(fn: () => unknown): CodegenError {
  try {
    fn();
  } catch (err) {
    if (err instanceof CodegenError) return err;
    throw err;
  }
  throw new Error("Expected a CodegenError");
}
