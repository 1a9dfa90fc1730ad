/**
 * Decides how a caller obtains a referenced object
 */

import { CodegenError } from "../errors/codegen_errors.js";
import type { CompiledNode } from "./compiled_node.js";

export type ReferenceExpr =
  | { kind: "inline"; text: string }
  | { kind: "field"; text: string }
  | { kind: "factoryCall"; text: string };

/**
 * Resolves references between factory methods. Methods are emitted in name
 * order but run in construction order, so a callee whose index does not
 * exceed the caller's has already been built when the caller runs.
 */
export class ReferenceResolver {
  private readonly alreadyCalled = new Set<string>();

  resolve(caller: CompiledNode, callee: CompiledNode): ReferenceExpr {
    if (callee.inlineExpression !== undefined) {
      return { kind: "inline", text: callee.inlineExpression };
    }

    if (!callee.retained) {
      throw new CodegenError(
        "InvalidReference",
        `${callee} has no factory method and cannot be referenced from ${caller}`,
        callee.toString(),
      );
    }

    if (caller.constructionOrderIndex >= callee.constructionOrderIndex) {
      if (!callee.requiresStorage) {
        throw new CodegenError(
          "MissingStorage",
          `${caller} reads ${callee} from a field that is never declared`,
          callee.toString(),
        );
      }
      return { kind: "field", text: callee.fieldName };
    }

    const pair = `${caller.constructionOrderIndex}->${callee.constructionOrderIndex}`;
    if (callee.requiresStorage && this.alreadyCalled.has(pair)) {
      return { kind: "field", text: callee.fieldName };
    }

    if (this.alreadyCalled.has(pair)) {
      throw new CodegenError(
        "DuplicateFactoryCall",
        `${caller} would construct ${callee} twice`,
        callee.toString(),
      );
    }
    this.alreadyCalled.add(pair);
    return { kind: "factoryCall", text: callee.factoryCall() };
  }

  get resolvedPairCount(): number {
    return this.alreadyCalled.size;
  }
}
