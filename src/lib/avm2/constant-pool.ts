import { Sint32, Uint32, UintSize } from "semantic-types";

import { createValueOutOfRangeError } from "../errors.js";
import { AnyName, Multiname, Namespace, QName } from "./qname.js";
import { S32_MAX, S32_MIN, U32_MAX } from "./u32.js";

/**
 * Interning table for one kind of constant. Index 0 is reserved by the ABC
 * format, so the first entry gets index 1.
 */
class InternTable<K, V> {
  private readonly indexes: Map<K, UintSize>;
  private readonly values: V[];

  constructor() {
    this.indexes = new Map();
    this.values = [];
  }

  intern(key: K, value: V): UintSize {
    const old: UintSize | undefined = this.indexes.get(key);
    if (old !== undefined) {
      return old;
    }
    this.values.push(value);
    const index: UintSize = this.values.length;
    this.indexes.set(key, index);
    return index;
  }

  get items(): readonly V[] {
    return this.values;
  }
}

// `-0` and `0` are distinct doubles, which `Map` keys would merge.
function doubleKey(value: number): string {
  return Object.is(value, -0) ? "-0" : String(value);
}

export class ConstantPool {
  private readonly ints: InternTable<Sint32, Sint32>;
  private readonly uints: InternTable<Uint32, Uint32>;
  private readonly doubles: InternTable<string, number>;
  private readonly strings: InternTable<string, string>;
  private readonly namespaces: InternTable<string, Namespace>;
  private readonly multinames: InternTable<string, QName>;

  constructor() {
    this.ints = new InternTable();
    this.uints = new InternTable();
    this.doubles = new InternTable();
    this.strings = new InternTable();
    this.namespaces = new InternTable();
    this.multinames = new InternTable();
  }

  intIndex(value: Sint32): UintSize {
    if (!Number.isInteger(value) || value < S32_MIN || value > S32_MAX) {
      throw createValueOutOfRangeError("int", value);
    }
    return this.ints.intern(value, value);
  }

  uintIndex(value: Uint32): UintSize {
    if (!Number.isInteger(value) || value < 0 || value > U32_MAX) {
      throw createValueOutOfRangeError("uint", value);
    }
    return this.uints.intern(value, value);
  }

  doubleIndex(value: number): UintSize {
    return this.doubles.intern(doubleKey(value), value);
  }

  stringIndex(value: string): UintSize {
    return this.strings.intern(value, value);
  }

  namespaceIndex(ns: Namespace): UintSize {
    this.stringIndex(ns.name);
    return this.namespaces.intern(ns.key, ns);
  }

  multinameIndex(name: Multiname): UintSize {
    if (name instanceof AnyName) {
      return 0;
    }
    this.namespaceIndex(name.ns);
    this.stringIndex(name.name);
    return this.multinames.intern(name.key, name);
  }

  get intValues(): readonly Sint32[] {
    return this.ints.items;
  }

  get uintValues(): readonly Uint32[] {
    return this.uints.items;
  }

  get doubleValues(): readonly number[] {
    return this.doubles.items;
  }

  get stringValues(): readonly string[] {
    return this.strings.items;
  }

  get namespaceValues(): readonly Namespace[] {
    return this.namespaces.items;
  }

  get multinameValues(): readonly QName[] {
    return this.multinames.items;
  }
}
