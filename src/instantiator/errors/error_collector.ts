/**
 * Issue collector for scene loading
 */

import { type SceneIssue, SceneLoadError } from "./codegen_errors.js";

export class ErrorCollector {
  private issues: SceneIssue[] = [];

  constructor(private readonly sourcePath: string) {}

  add(path: string, message: string): void {
    this.issues.push({ path, message });
  }

  hasErrors(): boolean {
    return this.issues.length > 0;
  }

  getIssues(): SceneIssue[] {
    return [...this.issues];
  }

  throwIfErrors(): void {
    if (this.issues.length > 0) {
      throw new SceneLoadError(this.sourcePath, this.issues);
    }
  }
}
