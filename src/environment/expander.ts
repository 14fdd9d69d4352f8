/**
 * Variable Expander
 *
 * Replaces {$NAME} tokens. Lookup order:
 * 1. Special variables of the file being merged
 * 2. The mapping built so far
 * Anything else expands to the empty string; the launcher's own
 * environment is never consulted here.
 */

import { SpecialVariables } from '../models/environment';

/**
 * Matches {$NAME} where NAME is [A-Za-z_][A-Za-z0-9_]*
 */
export const TEMPLATE_PATTERN = /\{\$([A-Za-z_][A-Za-z0-9_]*)\}/g;

export function expandTemplate(
  value: string,
  current: ReadonlyMap<string, string>,
  specialVars?: SpecialVariables
): string {
  return value.replace(TEMPLATE_PATTERN, (_match, name: string) => {
    if (specialVars && isSpecialVariableName(name, specialVars)) {
      return specialVars[name];
    }
    return current.get(name) ?? '';
  });
}

/**
 * Names referenced by {$NAME} tokens, in order of appearance
 */
export function findTemplateReferences(value: string): string[] {
  const names: string[] = [];
  for (const match of value.matchAll(TEMPLATE_PATTERN)) {
    names.push(match[1]);
  }
  return names;
}

function isSpecialVariableName(name: string, specialVars: SpecialVariables): name is keyof SpecialVariables {
  return Object.prototype.hasOwnProperty.call(specialVars, name);
}
