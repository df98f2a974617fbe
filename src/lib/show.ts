/**
 * Renders a value for messages: JSON text where it has one, `String(value)`
 * otherwise. Bigints, `Map`s, `Set`s and byte arrays are rendered as the
 * nearest JSON shape.
 */
export function show(value: unknown): string {
  if (typeof value === 'bigint') {
    return value.toString();
  }
  try {
    const text = JSON.stringify(value, (_key, item: unknown) => {
      if (typeof item === 'bigint') {
        return item.toString();
      }
      if (item instanceof Map) {
        return Object.fromEntries(item);
      }
      if (item instanceof Set || item instanceof Uint8Array) {
        return Array.from(item);
      }
      return item;
    });
    return text ?? String(value);
  } catch {
    return String(value);
  }
}
