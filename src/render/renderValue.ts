import { typeName } from "../core/typeName.ts";

export const NULL_RENDERING = '"nullptr" (nullptr_t)';

const CANT_PRINT = "[Can't print]";

function hasOwnTextForm(value: object): boolean {
  if (typeof value === "function") {
    return false;
  }

  const toPrimitive: unknown = Reflect.get(value, Symbol.toPrimitive);
  if (typeof toPrimitive === "function") {
    return true;
  }

  const toString: unknown = Reflect.get(value, "toString");
  return typeof toString === "function" && toString !== Object.prototype.toString;
}

/**
 * Text form of a value for failure reports. Returns `undefined` when the
 * value has no text form of its own or producing it throws.
 */
export function textForm(value: unknown): string | undefined {
  try {
    if (typeof value === "object" || typeof value === "function") {
      if (value === null || !hasOwnTextForm(value)) {
        return undefined;
      }
    }

    return String(value);
  } catch {
    return undefined;
  }
}

/**
 * Renders any value as `"<text>" (<type>)`, `[Can't print] (<type>)` when
 * it has no text form, or the fixed null rendering for `null` and
 * `undefined`. Never throws.
 */
export function renderValue(value: unknown): string {
  if (value === null || value === undefined) {
    return NULL_RENDERING;
  }

  const text = textForm(value);
  const type = typeName(value);
  if (text === undefined) {
    return `${CANT_PRINT} (${type})`;
  }

  return `"${text}" (${type})`;
}
