/**
 * Strip range operators from a manifest version specifier.
 *
 * Every leading non-digit character is dropped and the rest is returned as-is,
 * so `^1.2.3` and `~1.2.3` both become `1.2.3`. This is a textual heuristic,
 * not range resolution: `>=1.0.0 <2.0.0` keeps its upper bound text and tags
 * such as `latest` normalize to an empty string. Matching against the threat
 * list relies on exactly this behavior.
 */
export function normalizeVersion(specifier: string): string {
  return specifier.replace(/^[^0-9]+/, '');
}
