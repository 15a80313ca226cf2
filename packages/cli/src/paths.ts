/**
 * Path display for diagnostics and verbose output
 */

import { homedir } from "node:os";
import { sep } from "node:path";

export type PathDisplayOptions = {
  readonly collapseHome: boolean;
  readonly truncateDeepPaths: boolean;
  /** Defaults to the current user's home directory */
  readonly home?: string;
};

export type PathFormatter = (path: string) => string;

const TRUNCATED_SEGMENTS = 3;

export const collapseHome = (path: string, home: string): string => {
  if (home === "" || home === sep) {
    return path;
  }
  if (path === home) {
    return "~";
  }
  return path.startsWith(`${home}${sep}`)
    ? `~${path.slice(home.length)}`
    : path;
};

/**
 * Keep the last three segments of a longer path behind ".../"
 */
export const truncatePath = (path: string): string => {
  const segments = path.split(sep).filter((segment) => segment !== "");
  if (segments.length <= TRUNCATED_SEGMENTS) {
    return path;
  }
  return `...${sep}${segments.slice(-TRUNCATED_SEGMENTS).join(sep)}`;
};

export const createPathFormatter = (
  options: PathDisplayOptions
): PathFormatter => {
  const home = options.home ?? homedir();
  return (path) => {
    const shown = options.collapseHome ? collapseHome(path, home) : path;
    return options.truncateDeepPaths ? truncatePath(shown) : shown;
  };
};
