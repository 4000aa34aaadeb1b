/**
 * A live handle on one storage slot: a record field or a collection
 * element. Leaves read and write through it, so every change lands in
 * the caller's own object.
 */
export interface Binding {
  get(): unknown;
  set(value: unknown): void;
  readonly settable: boolean;
}

/** Plain object that can carry fields. Arrays and maps are collections. */
export function isRecordValue(value: unknown): value is object {
  return (
    typeof value === "object" &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof Map)
  );
}

export function fieldBinding(
  owner: object,
  name: string,
  settable: boolean,
): Binding {
  return {
    get: (): unknown => Reflect.get(owner, name),
    set: (value) => {
      Reflect.set(owner, name, value);
    },
    settable,
  };
}

/**
 * Binding on element `index` of the list held by `list`. The list is
 * re-read on every access so a replaced array is still seen.
 */
export function elementBinding(list: Binding, index: number): Binding {
  return {
    get: () => asList(list.get())[index],
    set: (value) => {
      const items = asList(list.get());
      items[index] = value;
      list.set(items);
    },
    settable: list.settable,
  };
}

/** The array held in a list slot; an absent list reads as a fresh one. */
export function asList(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

/** The Map held in a map slot; an absent map reads as a fresh one. */
export function asMap(value: unknown): Map<unknown, unknown> {
  return value instanceof Map ? value : new Map();
}
