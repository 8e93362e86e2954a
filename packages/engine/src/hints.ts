/**
 * Hints - scoped values that operators read from the dispatch context
 *
 * A hint kind names a value and supplies its default. Contexts push hint
 * frames with `withHints`; configuration may provide initial values by kind
 * name, which the kind parses.
 */

export type HintKind<T> = {
  readonly name: string;
  readonly defaultValue: T;
  /** Read a configured value; undefined when it does not apply */
  parse(raw: unknown): T | undefined;
  of(value: T): Hint<T>;
  /** Value of a hint created by this kind's `of` */
  read(hint: Hint<unknown>): { readonly value: T } | undefined;
};

export type Hint<T> = {
  readonly kind: HintKind<T>;
  readonly value: T;
};

export const defineHint = <T>(
  name: string,
  defaultValue: T,
  parse: (raw: unknown) => T | undefined
): HintKind<T> => {
  const issued = new WeakMap<Hint<unknown>, { readonly value: T }>();
  const kind: HintKind<T> = {
    name,
    defaultValue,
    parse,
    of: (value) => {
      const hint: Hint<T> = { kind, value };
      issued.set(hint, { value });
      return hint;
    },
    read: (hint) => issued.get(hint),
  };
  return kind;
};

/**
 * Hint kind whose values are a fixed set of strings.
 */
export const defineEnumHint = <V extends string>(
  name: string,
  values: readonly V[],
  defaultValue: V
): HintKind<V> =>
  defineHint<V>(name, defaultValue, (raw) => values.find((value) => value === raw));

export const booleanHint = (name: string, defaultValue: boolean): HintKind<boolean> =>
  defineHint(name, defaultValue, (raw) => (typeof raw === "boolean" ? raw : undefined));
