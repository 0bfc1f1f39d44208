/** Comparison operators of a search clause; `~` is a partial string match. */
export type Operator = '=' | '~' | '>' | '<' | '>=' | '<=';

/** Value a field is compared against. */
export type FilterValue = string | number | boolean;

/** Options shared by every `filter` call. */
export interface FilterOptions {
  /** Rows matching the clause are excluded (`-`) instead of required (`+`). */
  exclude?: boolean;
}

/** Anything that renders to a single clause of a query string. */
export interface Clause {
  build(): string;
}

/**
 * A single `<field><operator><value>` comparison.
 *
 * Strings are double-quoted with embedded quotes escaped as `%22`,
 * numbers and booleans are written as-is in lowercase.
 */
export class Filter implements Clause {
  constructor(
    readonly field: string,
    readonly operator: Operator,
    readonly value: FilterValue,
  ) {}

  build(): string {
    if (typeof this.value === 'string') {
      return `${this.field}${this.operator}"${this.value.replaceAll('"', '%22')}"`;
    }

    return `${this.field}${this.operator}${String(this.value).toLowerCase()}`;
  }
}

/** Joins clauses with a space, each prefixed `+` (required) or `-` (excluded). */
export function buildClauses(clauses: ReadonlyArray<readonly [Clause, boolean]>): string {
  return clauses.map(([clause, exclude]) => `${exclude ? '-' : '+'}${clause.build()}`).join(' ');
}

/**
 * Parenthesized group of clauses, used to nest conditions inside a query.
 *
 * @example
 * new FilterGroup().filter('Name', '~', 'Steak').filter('Name', '~', 'eft', { exclude: true });
 * // (+Name~"Steak" -Name~"eft")
 */
export class FilterGroup implements Clause {
  #filters: Array<readonly [Filter, boolean]> = [];

  /** Adds a comparison to the group. */
  filter(field: string, operator: Operator, value: FilterValue, { exclude = false }: FilterOptions = {}): this {
    this.#filters.push([new Filter(field, operator, value), exclude]);
    return this;
  }

  /** Number of clauses in the group. */
  get size(): number {
    return this.#filters.length;
  }

  build(): string {
    return `(${buildClauses(this.#filters)})`;
  }
}
