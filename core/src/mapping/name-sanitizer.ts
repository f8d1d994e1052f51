import { DEFAULT_NAMING_RULES, type NamingRules } from '../config/mapping-rules.js';

const EMPTY_NAME = 'unnamed';

/**
 * Turns an arbitrary display name into an object name the backend accepts.
 * Idempotent: sanitizing a sanitized name returns it unchanged.
 */
export function sanitizeName(raw: string, naming: NamingRules = DEFAULT_NAMING_RULES): string {
  if (!raw) {
    return applyCase(EMPTY_NAME, naming);
  }

  let name = applyCase(raw, naming);
  for (const invalid of naming.invalidChars) {
    name = name.split(invalid).join(naming.replacementChar);
  }
  name = name.slice(0, naming.maxLength);

  if (/^\d/.test(name)) {
    name = `${applyCase(naming.digitPrefix, naming)}${name}`.slice(0, naming.maxLength);
  }
  return name;
}

/**
 * Appends `_2`, `_3`, ... until the name is not taken, shortening the stem so
 * the result stays within the length limit.
 */
export function makeUniqueName(
  name: string,
  taken: ReadonlySet<string>,
  naming: NamingRules = DEFAULT_NAMING_RULES,
): string {
  if (!taken.has(name)) {
    return name;
  }
  for (let counter = 2; ; counter += 1) {
    const suffix = `_${counter}`;
    const candidate = `${name.slice(0, Math.max(naming.maxLength - suffix.length, 1))}${suffix}`;
    if (!taken.has(candidate)) {
      return candidate;
    }
  }
}

function applyCase(value: string, naming: NamingRules): string {
  switch (naming.caseHandling) {
    case 'upper':
      return value.toUpperCase();
    case 'lower':
      return value.toLowerCase();
    default:
      return value;
  }
}
