// src/utils/naming.ts
// Identifier casing for inferred page, component, method and parameter names.

/** Splits free text / kebab / snake / camel input into lower-case words. */
export function words(input: string): string[] {
  return input
    .replace(/([a-z0-9])([A-Z])/g, "$1 $2")
    .replace(/[^A-Za-z0-9]+/g, " ")
    .trim()
    .toLowerCase()
    .split(" ")
    .filter(Boolean);
}

export function camelCase(input: string): string {
  const parts = words(input);
  if (parts.length === 0) return "";
  const [first, ...rest] = parts;
  const head = /^\d/.test(first) ? `n${first}` : first;
  return head + rest.map(capitalize).join("");
}

export function pascalCase(input: string): string {
  const camel = camelCase(input);
  return camel ? capitalize(camel) : "";
}

export function kebabCase(input: string): string {
  return words(input).join("-");
}

function capitalize(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1);
}

/** Returns `base`, or `base2`, `base3`, … when the name is already taken. Records the result. */
export function uniqueName(base: string, taken: Set<string>): string {
  let candidate = base;
  let n = 2;
  while (taken.has(candidate)) {
    candidate = `${base}${n++}`;
  }
  taken.add(candidate);
  return candidate;
}
