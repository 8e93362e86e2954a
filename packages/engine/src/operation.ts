/**
 * Operation - a unit of dispatchable work
 *
 * An operation carries positions whose types are its actual type arguments.
 * Evaluation moves it through
 *
 *   created → matching → executing → succeeded | failed
 *
 * Terminal states are final unless the operation was created in safe mode,
 * in which case evaluating it again starts over.
 */

import type { PlaceholderType, Resolver, TypeExpression } from "@generis/core";
import { fail, placeholderKey } from "@generis/core";
import type { Position } from "./position.js";
import { positionsEqual } from "./position.js";

export type OperationState =
  | "created"
  | "matching"
  | "executing"
  | "succeeded"
  | "failed";

/**
 * - firstSuccess: stop at the first operator that succeeds
 * - aggregateAny: run every candidate; succeed if any did
 */
export type AggregationMode = "firstSuccess" | "aggregateAny";

export type OperationOptions = {
  readonly aggregation?: AggregationMode;
  readonly safe?: boolean;
};

const NEXT_STATES: Readonly<Record<OperationState, readonly OperationState[]>> = {
  created: ["matching"],
  matching: ["executing", "failed"],
  executing: ["succeeded", "failed"],
  succeeded: [],
  failed: [],
};

export abstract class Operation<RESULT> {
  readonly aggregation: AggregationMode;
  readonly safe: boolean;

  private currentState: OperationState = "created";
  private result: { readonly value: RESULT } | undefined;
  private readonly typeArguments = new WeakMap<
    Resolver,
    Map<string, TypeExpression | undefined>
  >();

  constructor(options: OperationOptions = {}) {
    this.aggregation = options.aggregation ?? "firstSuccess";
    this.safe = options.safe ?? false;
  }

  /** Positions that make up the operation's identity, in order */
  abstract positions(): readonly Position<unknown>[];

  abstract describe(): string;

  get state(): OperationState {
    return this.currentState;
  }

  isTerminal(): boolean {
    return this.currentState === "succeeded" || this.currentState === "failed";
  }

  isSuccessful(): boolean {
    return this.currentState === "succeeded";
  }

  setResult(value: RESULT): void {
    this.result = { value };
  }

  getResult(): RESULT {
    if (!this.isSuccessful() || this.result === undefined) {
      return fail(
        "GEN3002",
        `No result available for ${this.describe()} (state: ${this.currentState})`
      );
    }
    return this.result.value;
  }

  /**
   * Actual type bound to `placeholder` for this operation, resolved once per
   * resolver.
   */
  typeArgument(resolver: Resolver, placeholder: PlaceholderType): TypeExpression | undefined {
    let cache = this.typeArguments.get(resolver);
    if (!cache) {
      cache = new Map();
      this.typeArguments.set(resolver, cache);
    }
    const key = placeholderKey(placeholder);
    if (cache.has(key)) return cache.get(key);
    const resolved = resolver.resolve(this, placeholder);
    cache.set(key, resolved);
    return resolved;
  }

  /**
   * Same operation class over pairwise equal positions.
   */
  sameAs(other: Operation<unknown>): boolean {
    if (other === this) return true;
    if (other.constructor !== this.constructor) return false;
    const mine = this.positions();
    const theirs = other.positions();
    return (
      mine.length === theirs.length &&
      mine.every((position, i) => {
        const counterpart = theirs[i];
        return counterpart !== undefined && positionsEqual(position, counterpart);
      })
    );
  }

  /**
   * Advance the lifecycle. Used by the dispatch context.
   */
  transitionTo(next: OperationState): void {
    if (!NEXT_STATES[this.currentState].includes(next)) {
      fail(
        "GEN3003",
        `${this.describe()} cannot move from '${this.currentState}' to '${next}'`
      );
    }
    this.currentState = next;
  }

  /**
   * Return a terminal safe operation to 'created' so it can run again.
   */
  reset(): void {
    if (!this.safe) {
      fail(
        "GEN3003",
        `${this.describe()} has already been evaluated`,
        "Create a new operation, or create it in safe mode to allow re-evaluation"
      );
    }
    this.currentState = "created";
    this.result = undefined;
  }

  toString(): string {
    return this.describe();
  }
}
