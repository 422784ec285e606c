import { describe, expect, it } from 'vitest';
import { createPathRuleMatcher, matchesPathRules, ruleMatches } from '../../src/utils/path-rules.js';

describe('path rules', () => {
  it('matches a rule as prefix or suffix, not in the middle', () => {
    expect(ruleMatches('services/api/main.go', 'services')).toBe(true);
    expect(ruleMatches('services/api/main.go', '.go')).toBe(true);
    expect(ruleMatches('services/api/main.go', 'api')).toBe(false);
  });

  it('accepts every path when there are no rules', () => {
    expect(matchesPathRules('anything/at/all.txt', [], [])).toBe(true);
  });

  it('rejects paths hit by an exclude rule', () => {
    expect(matchesPathRules('debug.log', [], ['.log'])).toBe(false);
    expect(matchesPathRules('tmp/cache.bin', [], ['tmp'])).toBe(false);
    expect(matchesPathRules('main.go', [], ['.log', 'tmp'])).toBe(true);
  });

  it('requires an include rule to match once includes are given', () => {
    expect(matchesPathRules('main.go', ['.go'], [])).toBe(true);
    expect(matchesPathRules('README.md', ['.go'], [])).toBe(false);
    expect(matchesPathRules('services/readme.md', ['.go', 'services'], [])).toBe(true);
  });

  it('lets exclusion win over inclusion', () => {
    expect(matchesPathRules('src/generated.go', ['src', '.go'], ['generated.go'])).toBe(false);
    expect(matchesPathRules('src/app.go', ['src'], ['src'])).toBe(false);
  });

  it('binds rule lists in a reusable predicate', () => {
    const includes = ['.ts'];
    const accepts = createPathRuleMatcher(includes, ['dist']);
    includes.push('.md');

    expect(accepts('src/index.ts')).toBe(true);
    expect(accepts('dist/index.ts')).toBe(false);
    expect(accepts('README.md')).toBe(false);
  });
});
