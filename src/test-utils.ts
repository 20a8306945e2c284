type Fields = Record<string, unknown>;

/**
 * Fields of a native mouse event with every modifier released and the main button.
 */
export const mouseFields = (overrides: Fields = {}): Fields => ({
  altKey: false,
  ctrlKey: false,
  shiftKey: false,
  metaKey: false,
  button: 0,
  clientX: 1,
  clientY: 2,
  offsetX: 3,
  offsetY: 4,
  pageX: 5,
  pageY: 6,
  screenX: 7,
  screenY: 8,
  ...overrides,
});

/**
 * Fields of a native touch point placed at the same `(x, y)` in every coordinate space.
 */
export const touchFields = (identifier: number, x: number, y: number): Fields => ({
  identifier,
  clientX: x,
  clientY: y,
  pageX: x,
  pageY: y,
  screenX: x,
  screenY: y,
});

/**
 * Builds a browser-style array-like collection: `{ length, 0: ..., 1: ... }`.
 */
export const arrayLikeOf = (items: readonly unknown[]): Fields => {
  const collection: Fields = { length: items.length };
  items.forEach((item, index) => {
    collection[String(index)] = item;
  });
  return collection;
};

export const without = (fields: Fields, name: string): Fields =>
  Object.fromEntries(Object.entries(fields).filter(([key]) => key !== name));

/**
 * A cancelable Node.js `Event` carrying the given fields, to dispatch on an `EventTarget`.
 */
export const nativeEvent = (type: string, fields: Fields): Event =>
  Object.assign(new Event(type, { bubbles: true, cancelable: true }), fields);
