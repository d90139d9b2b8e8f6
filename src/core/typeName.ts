export function typeName(value: unknown): string {
  if (value === null) {
    return "null";
  }

  if (typeof value !== "object") {
    return typeof value;
  }

  try {
    const constructor: unknown = Reflect.get(value, "constructor");
    if (
      typeof constructor === "function" &&
      typeof constructor.name === "string" &&
      constructor.name.length > 0
    ) {
      return constructor.name;
    }
  } catch {
    return "Object";
  }

  return "Object";
}
