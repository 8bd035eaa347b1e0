/**
 * One level of a value's type hierarchy, as the comparator sees it.
 *
 * Level 0 describes the instance itself; each `base` climbs one ancestor. The
 * root level has no base.
 */
export interface TypeShape {
  readonly name: string;
  readonly base: TypeShape | null;
  /** Members declared at this level only, in declaration order. */
  declaredNames(): readonly string[];
  /** Exact lookup at this level only. */
  has(rawName: string): boolean;
  read(instance: object, rawName: string): unknown;
}

/** Capability that turns a runtime value into its {@link TypeShape}. */
export interface Introspector {
  shapeOf(value: object): TypeShape;
}

const ENTRY_NAME = /^entries\[(0|[1-9]\d*)\]$/;
const VALUE_NAME = /^values\[(0|[1-9]\d*)\]$/;

function typeName(proto: object | null): string {
  if (proto === null) return "Object";
  const ctor: unknown = Object.getOwnPropertyDescriptor(proto, "constructor")?.value;
  return typeof ctor === "function" && ctor.name.length > 0 ? ctor.name : "Object";
}

function indexFrom(pattern: RegExp, rawName: string): number | null {
  const m = pattern.exec(rawName);
  return m?.[1] === undefined ? null : Number(m[1]);
}

function fixedShape(
  name: string,
  base: TypeShape | null,
  names: readonly string[],
  read: (instance: object, rawName: string) => unknown,
): TypeShape {
  const lookup = new Set(names);
  return {
    name,
    base,
    declaredNames: () => names,
    has: (rawName) => lookup.has(rawName),
    read,
  };
}

function prototypeShape(proto: object | null): TypeShape | null {
  // Object.prototype (and null-prototype roots) end the chain.
  if (proto === null || proto === Object.prototype) return null;

  const getters = Object.getOwnPropertyNames(proto).filter(
    (k) => typeof Object.getOwnPropertyDescriptor(proto, k)?.get === "function",
  );

  return fixedShape(`${typeName(proto)}.prototype`, prototypeShape(Object.getPrototypeOf(proto)), getters, (instance, rawName) =>
    Reflect.get(proto, rawName, instance),
  );
}

// Items are snapshotted once per shape; reads against another instance of the
// same kind take their own copy.
function mapShape(value: Map<unknown, unknown>, base: TypeShape | null): TypeShape {
  const entries = Array.from(value.entries());
  const names = [...entries.map((_, i) => `entries[${i}]`), "size"];
  return fixedShape(typeName(Object.getPrototypeOf(value)), base, names, (instance, rawName) => {
    if (!(instance instanceof Map)) return undefined;
    if (rawName === "size") return instance.size;
    const i = indexFrom(ENTRY_NAME, rawName);
    if (i === null) return undefined;
    return (instance === value ? entries : Array.from(instance.entries()))[i];
  });
}

function setShape(value: Set<unknown>, base: TypeShape | null): TypeShape {
  const values = Array.from(value.values());
  const names = [...values.map((_, i) => `values[${i}]`), "size"];
  return fixedShape(typeName(Object.getPrototypeOf(value)), base, names, (instance, rawName) => {
    if (!(instance instanceof Set)) return undefined;
    if (rawName === "size") return instance.size;
    const i = indexFrom(VALUE_NAME, rawName);
    if (i === null) return undefined;
    return (instance === value ? values : Array.from(instance.values()))[i];
  });
}

// Typed arrays keep `length` on their prototype; it is listed at level 0 so a
// shorter actual still differs.
function typedArrayShape(value: object, base: TypeShape | null): TypeShape {
  return fixedShape(
    typeName(Object.getPrototypeOf(value)),
    base,
    [...Object.getOwnPropertyNames(value), "length"],
    (instance, rawName) => Reflect.get(instance, rawName),
  );
}

/**
 * Introspection over JavaScript's own object model.
 *
 * - Level 0 holds the instance's own string-keyed properties, enumerable or
 *   not (class fields, inherited class fields and array `length` all live
 *   here). Maps expose `entries[i]` pairs and Sets `values[i]`, both in
 *   insertion order and followed by `size`. Typed arrays (and Buffers) expose
 *   their indices followed by `length`.
 * - Every further level is one prototype and holds only the getters it
 *   declares, read against the instance.
 */
export const reflectiveIntrospector: Introspector = {
  shapeOf(value) {
    const proto: object | null = Object.getPrototypeOf(value);
    const base = prototypeShape(proto);

    if (value instanceof Map) return mapShape(value, base);
    if (value instanceof Set) return setShape(value, base);
    if (ArrayBuffer.isView(value) && !(value instanceof DataView)) return typedArrayShape(value, base);

    return fixedShape(typeName(proto), base, Object.getOwnPropertyNames(value), (instance, rawName) =>
      Reflect.get(instance, rawName),
    );
  },
};
