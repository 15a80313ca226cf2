/**
 * Operations on canonical names
 *
 * A canonical name is a root followed by `.attr`, `[]` and `()` suffixes,
 * optionally starred: `*xs`, `a.b[].c()`, `@BinaryOp.attr`.
 */

export const LOCAL_VALUE_PREFIX = "@";

export const RETURN_VALUE = `${LOCAL_VALUE_PREFIX}ReturnValue`;

const STARS = /^\*+/;

const starsOf = (name: string): string => STARS.exec(name)?.[0] ?? "";

/**
 * Root identifier of a name: `*a.b[]` is "a", `@Dict.keys()` is "@Dict"
 */
export const basenameOf = (name: string): string => {
  const unstarred = name.replace(STARS, "");
  const end = unstarred.search(/[.[(]/);
  return end === -1 ? unstarred : unstarred.slice(0, end);
};

/**
 * Replace the root of `name` with `root`, keeping stars and suffixes
 */
export const rebaseName = (name: string, root: string): string => {
  const stars = starsOf(name);
  const unstarred = name.slice(stars.length);
  return `${stars}${root}${unstarred.slice(basenameOf(name).length)}`;
};

export const isSynthesized = (name: string): boolean =>
  basenameOf(name).startsWith(LOCAL_VALUE_PREFIX);

export const withoutCallBrackets = (name: string): string =>
  name.endsWith("()") ? name.slice(0, -2) : name;

/**
 * Intermediate attribute prefixes a method call necessarily reads:
 * `a.b.c()` reads "a.b"
 */
export const attributePrefixes = (callName: string): readonly string[] => {
  const parts = withoutCallBrackets(callName).split(".").slice(0, -1);
  const prefixes: string[] = [];
  let current = "";
  for (const part of parts) {
    current = current ? `${current}.${part}` : part;
    prefixes.push(current);
  }
  return prefixes.slice(1);
};

export const isMethodOnConstant = (name: string): boolean =>
  name.startsWith(`${LOCAL_VALUE_PREFIX}Constant.`);
