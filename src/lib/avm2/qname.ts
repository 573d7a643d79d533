export enum NamespaceKind {
  Namespace = 0x08,
  Package = 0x16,
  PackageInternal = 0x17,
  Protected = 0x18,
  Explicit = 0x19,
  StaticProtected = 0x1a,
  Private = 0x05,
}

export class Namespace {
  readonly kind: NamespaceKind;
  readonly name: string;

  constructor(kind: NamespaceKind, name: string) {
    this.kind = kind;
    this.name = name;
  }

  /**
   * Key identifying equal namespaces, used by the constant pool.
   */
  get key(): string {
    return `${this.kind}:${this.name}`;
  }

  equals(other: Namespace): boolean {
    return this.kind === other.kind && this.name === other.name;
  }
}

export function packageNamespace(name: string): Namespace {
  return new Namespace(NamespaceKind.Package, name);
}

export const PUBLIC_NAMESPACE: Namespace = packageNamespace("");

/**
 * Qualified name: a local name in a namespace.
 */
export class QName {
  readonly ns: Namespace;
  readonly name: string;

  constructor(name: string, ns: Namespace = PUBLIC_NAMESPACE) {
    this.ns = ns;
    this.name = name;
  }

  get key(): string {
    return `${this.ns.key}::${this.name}`;
  }

  equals(other: Multiname): boolean {
    return other instanceof QName && this.ns.equals(other.ns) && this.name === other.name;
  }

  multiname(): QName {
    return this;
  }

  toString(): string {
    return this.ns.name === "" ? this.name : `${this.ns.name}::${this.name}`;
  }
}

/**
 * The `*` type name. It is not stored in the constant pool: it always maps to
 * multiname index 0.
 */
export class AnyName {
  readonly key: string = "*";

  equals(other: Multiname): boolean {
    return other instanceof AnyName;
  }

  multiname(): AnyName {
    return this;
  }

  toString(): string {
    return "*";
  }
}

export const ANY_NAME: AnyName = new AnyName();

export type Multiname = QName | AnyName;

/**
 * Capability of values that produce a qualified name, such as types and
 * class references.
 */
export interface Named {
  multiname(): Multiname;
}

export function isNamed(value: unknown): value is Named {
  return typeof value === "object" && value !== null && "multiname" in value && typeof value.multiname === "function";
}

/**
 * Builds a QName from a dotted path: `"flash.display.Sprite"` is the name
 * `Sprite` in the package `flash.display`.
 */
export function packagedQName(pkg: string, name: string): QName {
  return new QName(name, packageNamespace(pkg));
}

export function parseQName(path: string): QName {
  const separator: number = path.lastIndexOf(".");
  return separator < 0 ? new QName(path) : packagedQName(path.slice(0, separator), path.slice(separator + 1));
}

export function toMultiname(value: string | Named): Multiname {
  if (typeof value === "string") {
    return value === "*" ? ANY_NAME : parseQName(value);
  }
  return value.multiname();
}

export function toQName(value: string | QName): QName {
  return typeof value === "string" ? parseQName(value) : value;
}
