import propertyTags from './propertyTags.json' with { type: 'json' };

/** API names of the known compound properties, in table order. */
export const PROPERTY_TAGS: readonly string[] = Object.keys(propertyTags);

const byAlias = new Map<string, string>();
for (const [name, alias] of Object.entries(propertyTags)) {
  byAlias.set(name, name);
  byAlias.set(alias, name);
}

/**
 * Resolve a property tag given by API name (`MolecularWeight`) or snake_case alias
 * (`molecular_weight`) to its API name. Unknown tags pass through verbatim so new
 * API properties stay usable.
 */
export function resolvePropertyTag(tag: string): string {
  return byAlias.get(tag) ?? tag;
}

/** snake_case alias of a known API property name, or `null` for unknown tags. */
export function propertyAlias(name: string): string | null {
  const entry = Object.entries(propertyTags).find(([apiName]) => apiName === name);
  return entry ? entry[1] : null;
}
