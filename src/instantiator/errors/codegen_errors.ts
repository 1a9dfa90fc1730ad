/**
 * Code generator error types
 */

export type CodegenErrorCode =
  | "UnsupportedVariant"
  | "MissingStorage"
  | "DuplicateFactoryCall"
  | "InvalidReference";

/**
 * Internal consistency fault. Any one of these aborts the whole compilation;
 * the text generated so far must be discarded.
 */
export class CodegenError extends Error {
  readonly code: CodegenErrorCode;
  readonly nodeName?: string;

  constructor(code: CodegenErrorCode, message: string, nodeName?: string) {
    super(nodeName ? `${message} (node: ${nodeName})` : message);
    this.name = "CodegenError";
    this.code = code;
    this.nodeName = nodeName;
  }
}

export interface SceneIssue {
  path: string;
  message: string;
}

export class SceneLoadError extends Error {
  readonly sourcePath: string;
  readonly issues: SceneIssue[];

  constructor(sourcePath: string, issues: SceneIssue[]) {
    super(SceneLoadError.formatMessage(sourcePath, issues));
    this.name = "SceneLoadError";
    this.sourcePath = sourcePath;
    this.issues = issues;
  }

  private static formatMessage(sourcePath: string, issues: SceneIssue[]): string {
    const header = `Scene ${sourcePath} is invalid (${issues.length} issue(s)):`;
    const lines = issues.map((issue) => `- ${issue.path}: ${issue.message}`);
    return [header, ...lines].join("\n");
  }
}

export class AggregateBatchError extends Error {
  readonly failures: Array<{ filePath: string; error: Error }>;

  constructor(failures: Array<{ filePath: string; error: Error }>) {
    super(AggregateBatchError.formatMessage(failures));
    this.name = "AggregateBatchError";
    this.failures = failures;
  }

  private static formatMessage(
    failures: Array<{ filePath: string; error: Error }>,
  ): string {
    const header = `Generation failed for ${failures.length} scene(s):`;
    const lines = failures.map(
      ({ filePath, error }) => `- ${filePath}: ${error.message}`,
    );
    return [header, ...lines].join("\n");
  }
}

/**
 * Exhaustiveness guard for switches over closed variant sets.
 */
export const assertNever = (value: never, what: string): never => {
  const unknownValue: unknown = value;
  const tag =
    typeof unknownValue === "object" &&
    unknownValue !== null &&
    "type" in unknownValue
      ? String(unknownValue.type)
      : String(unknownValue);
  throw new CodegenError("UnsupportedVariant", `Unsupported ${what}: ${tag}`);
};
