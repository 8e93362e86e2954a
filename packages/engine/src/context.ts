/**
 * Dispatch context
 *
 * A context evaluates operations against an engine's ordered operators. It
 * owns the stack of in-flight operations (evaluations and support queries)
 * and the hint frames; one engine may serve any number of contexts.
 */

import type {
  Diagnostic,
  EntityCatalog,
  Resolver,
  Result,
} from "@generis/core";
import { error, fail, GenerisError, isGenerisError, ok } from "@generis/core";
import type { ResolvedConfig } from "./config.js";
import type { Hint, HintKind } from "./hints.js";
import type { Logger } from "./logging.js";
import type { OperatorSignature } from "./matching.js";
import { matchesSignature } from "./matching.js";
import type { Operation } from "./operation.js";
import type { AnyOperator } from "./operator.js";

export type DispatchContext = {
  readonly catalog: EntityCatalog;
  readonly resolver: Resolver;
  readonly logger: Logger;
  /** Number of operations currently in flight */
  readonly depth: number;
  /** Evaluate and return the result; throws GEN3001 when no operator succeeds */
  readonly eval: <R>(operation: Operation<R>) => R;
  readonly evalSuccess: (operation: Operation<unknown>) => boolean;
  /** Like eval, with generis failures returned instead of thrown */
  readonly evaluate: <R>(operation: Operation<R>) => Result<R, Diagnostic>;
  /** Evaluate only when some operator supports the operation */
  readonly evalIfSupported: <R>(operation: Operation<R>) => R | undefined;
  readonly supports: (operation: Operation<unknown>) => boolean;
  /** Operators whose signature and `supports` accept the operation, in order */
  readonly candidates: (operation: Operation<unknown>) => readonly AnyOperator[];
  /**
   * Evaluate a nested operation, passing its result to `onResult` on
   * success. Returns whether it succeeded.
   */
  readonly forwardTo: <R>(
    operation: Operation<R>,
    onResult?: (result: R) => void
  ) => boolean;
  readonly withHints: <T>(hints: readonly Hint<unknown>[], fn: () => T) => T;
  /** Nearest pushed hint of `kind`, else the configured value, else the default */
  readonly getTypedContext: <T>(kind: HintKind<T>) => T;
};

export type DispatchContextOptions = {
  readonly catalog: EntityCatalog;
  readonly resolver: Resolver;
  readonly signatures: readonly OperatorSignature[];
  readonly config: ResolvedConfig;
  readonly logger: Logger;
};

export const createDispatchContext = (
  options: DispatchContextOptions
): DispatchContext => {
  const { catalog, resolver, signatures, config, logger } = options;
  const stack: Operation<unknown>[] = [];
  const frames: (readonly Hint<unknown>[])[] = [];

  const indent = (): string => "  ".repeat(stack.length);

  const operatorName = (signature: OperatorSignature): string => signature.entity.id;

  const inFlight = (operation: Operation<unknown>): boolean =>
    stack.some((current) => current.sameAs(operation));

  const withFrame = <T>(operation: Operation<unknown>, fn: () => T): T => {
    stack.push(operation);
    try {
      return fn();
    } finally {
      stack.pop();
    }
  };

  /**
   * Call into an operator, wrapping anything but a GenerisError as GEN4001.
   */
  const guarded = <T>(
    signature: OperatorSignature,
    operation: Operation<unknown>,
    action: string,
    fn: () => T
  ): T => {
    try {
      return fn();
    } catch (err) {
      if (isGenerisError(err)) throw err;
      return fail(
        "GEN4001",
        `Operator '${operatorName(signature)}' failed ${action} ${operation.describe()}: ${err instanceof Error ? err.message : String(err)}`,
        undefined,
        err
      );
    }
  };

  const selectCandidates = (
    operation: Operation<unknown>
  ): readonly OperatorSignature[] =>
    signatures.filter(
      (signature) =>
        matchesSignature(resolver, signature, operation) &&
        guarded(signature, operation, "checking support for", () =>
          signature.operator.supports(context, operation)
        )
    );

  const abort = (operation: Operation<unknown>): void => {
    if (operation.state === "matching" || operation.state === "executing") {
      operation.transitionTo("failed");
    }
  };

  const run = (operation: Operation<unknown>): boolean => {
    if (operation.isTerminal()) {
      operation.reset();
    }
    if (inFlight(operation)) {
      return fail(
        "GEN5001",
        `Reentrant operation detected: ${operation.describe()}`,
        `In flight: ${stack.map((current) => current.describe()).join(" → ")}`
      );
    }
    if (stack.length >= config.maxDepth) {
      return fail(
        "GEN5001",
        `Nested evaluation exceeded maxDepth ${config.maxDepth}: ${operation.describe()}`
      );
    }

    logger.debug(`${indent()}eval ${operation.describe()}`);
    return withFrame(operation, () => {
      try {
        operation.transitionTo("matching");
        const selected = selectCandidates(operation);
        if (selected.length === 0) {
          logger.debug(`${indent()}no operator supports ${operation.describe()}`);
          operation.transitionTo("failed");
          return false;
        }

        logger.debug(
          `${indent()}candidates: ${selected.map(operatorName).join(", ")}`
        );
        operation.transitionTo("executing");
        let succeeded = false;
        for (const signature of selected) {
          const performed = guarded(signature, operation, "performing", () =>
            signature.operator.perform(context, operation)
          );
          if (performed) {
            succeeded = true;
            if (operation.aggregation === "firstSuccess") break;
          }
        }

        operation.transitionTo(succeeded ? "succeeded" : "failed");
        if (!succeeded) {
          logger.debug(`${indent()}failed ${operation.describe()}`);
        }
        return succeeded;
      } catch (err) {
        abort(operation);
        throw err;
      }
    });
  };

  const evalOperation = <R>(operation: Operation<R>): R => {
    if (!run(operation)) {
      return fail("GEN3001", `Operation failed: ${operation.describe()}`);
    }
    return operation.getResult();
  };

  const supports = (operation: Operation<unknown>): boolean => {
    if (inFlight(operation)) {
      logger.debug(`${indent()}reentrant support query for ${operation.describe()}`);
      return false;
    }
    if (stack.length >= config.maxDepth) {
      return false;
    }
    return withFrame(operation, () =>
      signatures.some(
        (signature) =>
          matchesSignature(resolver, signature, operation) &&
          guarded(signature, operation, "checking support for", () =>
            signature.operator.supports(context, operation)
          )
      )
    );
  };

  const getTypedContext = <T>(kind: HintKind<T>): T => {
    for (let i = frames.length - 1; i >= 0; i--) {
      const frame = frames[i] ?? [];
      for (let j = frame.length - 1; j >= 0; j--) {
        const hint = frame[j];
        const found = hint === undefined ? undefined : kind.read(hint);
        if (found) return found.value;
      }
    }

    const raw = config.hints[kind.name];
    if (raw !== undefined) {
      const parsed = kind.parse(raw);
      if (parsed !== undefined) return parsed;
      logger.warn(`Ignoring configured value of hint '${kind.name}': ${JSON.stringify(raw)}`);
    }
    return kind.defaultValue;
  };

  const context: DispatchContext = {
    catalog,
    resolver,
    logger,
    get depth() {
      return stack.length;
    },
    eval: evalOperation,
    evalSuccess: run,
    evaluate: <R>(operation: Operation<R>): Result<R, Diagnostic> => {
      try {
        return ok(evalOperation(operation));
      } catch (err) {
        if (err instanceof GenerisError) return error(err.diagnostic);
        throw err;
      }
    },
    evalIfSupported: <R>(operation: Operation<R>): R | undefined =>
      supports(operation) && run(operation) ? operation.getResult() : undefined,
    supports,
    candidates: (operation) =>
      inFlight(operation)
        ? []
        : withFrame(operation, () =>
            selectCandidates(operation).map((signature) => signature.operator)
          ),
    forwardTo: <R>(operation: Operation<R>, onResult?: (result: R) => void): boolean => {
      const succeeded = run(operation);
      if (succeeded && onResult) {
        onResult(operation.getResult());
      }
      return succeeded;
    },
    withHints: <T>(hints: readonly Hint<unknown>[], fn: () => T): T => {
      frames.push(hints);
      try {
        return fn();
      } finally {
        frames.pop();
      }
    },
    getTypedContext,
  };

  return context;
};
