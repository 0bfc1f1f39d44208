import type { Language } from '../models/types.js';
import { encodeSearchParams, type SearchParams } from '../utils/encodeSearchParams.js';
import {
  buildClauses,
  type Clause,
  Filter,
  FilterGroup,
  type FilterOptions,
  type FilterValue,
  type Operator,
} from './filter.js';

/** Query parameters a {@link QueryBuilder} produces for `GET /search`. */
export interface SearchQueryParams extends SearchParams {
  sheets: string[];
  fields?: string[];
  transient?: string[];
  query?: string;
  limit?: number;
  version?: string | number;
  language?: Language;
  schema?: string;
}

/**
 * Fluent builder for search requests.
 *
 * @example
 * const query = new QueryBuilder('Item')
 *   .addFields('Name', 'Description')
 *   .filter('IsUntradable', '=', false)
 *   .filter(new FilterGroup().filter('Name', '~', 'Steak').filter('Name', '~', 'eft', { exclude: true }))
 *   .setVersion(7.2)
 *   .limit(10);
 */
export class QueryBuilder {
  #sheets: string[];
  #fields: string[] = [];
  #transients: string[] = [];
  #filters: Array<readonly [Clause, boolean]> = [];
  #limit?: number;
  #version?: string | number;
  #language?: Language;
  #schema?: string;

  constructor(...sheets: string[]) {
    this.#sheets = sheets;
  }

  /** Fields to return for every hit. */
  addFields(...fields: string[]): this {
    this.#fields.push(...fields);
    return this;
  }

  /** Transient fields to return for every hit. */
  addTransients(...transients: string[]): this {
    this.#transients.push(...transients);
    return this;
  }

  /** Further sheets to search in. */
  addSheets(...sheets: string[]): this {
    this.#sheets.push(...sheets);
    return this;
  }

  /** Adds a comparison on a field. */
  filter(field: string, operator: Operator, value: FilterValue, opts?: FilterOptions): this;
  /** Adds a parenthesized group of comparisons. */
  filter(group: FilterGroup, opts?: FilterOptions): this;
  filter(
    fieldOrGroup: string | FilterGroup,
    operatorOrOpts?: Operator | FilterOptions,
    value?: FilterValue,
    opts: FilterOptions = {},
  ): this {
    if (fieldOrGroup instanceof FilterGroup) {
      const exclude = typeof operatorOrOpts === 'object' && operatorOrOpts.exclude === true;
      this.#filters.push([fieldOrGroup, exclude]);
      return this;
    }

    if (typeof operatorOrOpts !== 'string' || value === undefined) {
      throw new TypeError(`operator and value are required when filtering on field ${fieldOrGroup}`);
    }

    this.#filters.push([new Filter(fieldOrGroup, operatorOrOpts, value), opts.exclude === true]);
    return this;
  }

  /** Maximum number of hits per page. */
  limit(limit: number): this {
    this.#limit = limit;
    return this;
  }

  /** Game version to search, e.g. `7.2` or `latest`. */
  setVersion(version: string | number | undefined): this {
    this.#version = version;
    return this;
  }

  /** Language of string fields, both for matching and in the results. */
  setLanguage(language: Language): this {
    this.#language = language;
    return this;
  }

  /** Schema to read the sheets with. */
  setSchema(schema: string): this {
    this.#schema = schema;
    return this;
  }

  /** Sheets the query searches, in order. */
  get sheets(): readonly string[] {
    return this.#sheets;
  }

  /**
   * Query parameters in wire order. Unset options are left out; a
   * `limit` of `0` counts as unset.
   */
  toParams(): SearchQueryParams {
    return {
      sheets: [...this.#sheets],
      ...(this.#fields.length > 0 && { fields: [...this.#fields] }),
      ...(this.#transients.length > 0 && { transient: [...this.#transients] }),
      ...(this.#filters.length > 0 && { query: buildClauses(this.#filters) }),
      ...(this.#limit !== undefined && this.#limit > 0 && { limit: this.#limit }),
      ...(this.#version !== undefined && this.#version !== '' && { version: this.#version }),
      ...(this.#language !== undefined && { language: this.#language }),
      ...(this.#schema !== undefined && this.#schema !== '' && { schema: this.#schema }),
    };
  }

  /** Encoded query string, e.g. `sheets=Item&query=%2BName~%22Steak%22`. */
  build(): string {
    return encodeSearchParams(this.toParams());
  }

  toString(): string {
    return this.build();
  }
}
