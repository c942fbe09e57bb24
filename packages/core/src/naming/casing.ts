/**
 * Identifier casing predicates shared by the line checkers and the
 * syntax fact extractor.
 */

/** lowercase runs joined by single underscores, e.g. `parse_line2` */
const SNAKE_BODY = '[a-z][a-z0-9]*(?:_[a-z0-9]+)*';

const SNAKE_CASE = new RegExp(`^${SNAKE_BODY}$`);

const DUNDER = new RegExp(`^__${SNAKE_BODY}__$`);

/** Function names only need to be lowercase; underscores go anywhere. */
const FUNCTION_NAME = /^[a-z_][a-z0-9_]*$/;

/**
 * PascalCase allowing internal acronyms and a single trailing capital,
 * e.g. `Parser`, `HTTPServer2`, `MyClassA`.
 */
const PASCAL_CASE = /^[A-Z]+(?:[a-z0-9]|[A-Z0-9][a-z0-9]+)*[A-Z]?$/;

/**
 * True for snake_case names and dunder names. Leading, trailing and doubled
 * underscores are rejected outside the dunder form.
 */
export function isSnakeCase(name: string): boolean {
  return SNAKE_CASE.test(name) || DUNDER.test(name);
}

/**
 * Looser rule for `def` names: lowercase letters, digits and underscores,
 * so `_helper` and `__init__` pass.
 */
export function isFunctionName(name: string): boolean {
  return FUNCTION_NAME.test(name);
}

export function isPascalCase(name: string): boolean {
  return PASCAL_CASE.test(name);
}
