import { CONVENTIONAL_COMMIT } from '../constants/ui.js';
import type { ChoiceSet, GitCcConfig } from '../types/common.js';

export const DEFAULT_COMMIT_TYPES: readonly string[] = CONVENTIONAL_COMMIT.DEFAULT_TYPES;
export const NO_SCOPE = CONVENTIONAL_COMMIT.NO_SCOPE;

/**
 * Keeps the first occurrence of every value, in original order.
 */
export const dedupe = (values: readonly string[]): string[] => {
  const seen = new Set<string>();
  const result: string[] = [];

  for (const value of values) {
    if (!seen.has(value)) {
      seen.add(value);
      result.push(value);
    }
  }

  return result;
};

/**
 * Merges the built-in commit types with the user's configuration.
 *
 * An empty scope list means the scope is entered as free text instead of
 * picked from a list, so the `none` sentinel is only added when the user
 * declared scopes of their own.
 */
export const resolveChoiceSet = (config: GitCcConfig): ChoiceSet => {
  let commitTypes: string[];
  let scopes: string[];

  if (config.useDefaults) {
    commitTypes = [...DEFAULT_COMMIT_TYPES, ...config.customCommitTypes];
    scopes = config.scopes.length > 0 ? [NO_SCOPE, ...config.scopes] : [];
  } else {
    commitTypes = [...config.customCommitTypes];
    scopes = [...config.scopes];
  }

  return Object.freeze({
    commitTypes: Object.freeze(dedupe(commitTypes)),
    scopes: Object.freeze(dedupe(scopes)),
  });
};
