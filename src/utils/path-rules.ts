//
//  path-rules.ts
//  Include/exclude predicate for relative paths
//

/**
 * A rule matches a path when the path starts with it or ends with it.
 * `services` catches everything under `services/`; `.go` catches Go sources.
 */
export function ruleMatches(relativePath: string, rule: string): boolean {
  return relativePath.startsWith(rule) || relativePath.endsWith(rule);
}

/**
 * Decides whether a relative path takes part in change detection.
 *
 * Exclusion always wins. With no include rules every non-excluded path is
 * accepted; otherwise at least one include rule has to match.
 */
export function matchesPathRules(
  relativePath: string,
  includeRules: readonly string[],
  excludeRules: readonly string[]
): boolean {
  for (const rule of excludeRules) {
    if (ruleMatches(relativePath, rule)) {
      return false;
    }
  }

  if (includeRules.length === 0) {
    return true;
  }

  return includeRules.some((rule) => ruleMatches(relativePath, rule));
}

/**
 * Binds a rule set once, for callers testing many paths against the same lists.
 */
export function createPathRuleMatcher(
  includeRules: readonly string[],
  excludeRules: readonly string[]
): (relativePath: string) => boolean {
  const includes = [...includeRules];
  const excludes = [...excludeRules];
  return (relativePath: string) => matchesPathRules(relativePath, includes, excludes);
}
