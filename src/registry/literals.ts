/**
 * Renders a parameter value as the literal text bound into the interpreter.
 * Strings are wrapped in double quotes with inner quotes escaped as `\"`;
 * every other JSON value keeps its JSON text form.
 */
export function renderLiteral(value: unknown): string {
  if (typeof value === "string") {
    return `"${value.replace(/"/g, '\\"')}"`;
  }
  const json = JSON.stringify(value);
  return json === undefined ? "null" : json;
}

/** Narrows caller supplied parameters to a keyed object; anything else counts as empty. */
export function asParameterObject(params: unknown): Record<string, unknown> {
  if (params === null || typeof params !== "object" || Array.isArray(params)) {
    return {};
  }
  return Object.fromEntries(Object.entries(params));
}

/** Own value of a supplied parameter; inherited keys such as `constructor` count as absent. */
export function suppliedValue(params: Record<string, unknown>, name: string): unknown {
  return Object.hasOwn(params, name) ? params[name] : undefined;
}
