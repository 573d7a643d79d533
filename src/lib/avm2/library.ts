import { JSON_READER } from "kryo-json/json-reader";

import { ClassDocument, LibraryDocument, $LibraryDocument } from "./library-document.js";
import { parseQName, QName, toQName } from "./qname.js";

/**
 * What the generator needs to know about a class to walk its superclass
 * chain: native classes and classes pending in the current script both
 * provide it.
 */
export interface ClassShape {
  readonly name: QName;
  readonly superName: QName | null;

  hasMethod(name: string, isStatic: boolean): boolean;
}

/**
 * Description of a native class.
 */
export class ClassDesc implements ClassShape {
  readonly fullName: QName;
  readonly superName: QName | null;
  readonly methods: Set<string>;
  readonly staticMethods: Set<string>;
  readonly fields: Set<string>;
  readonly staticFields: Set<string>;

  constructor(
    fullName: QName,
    superName: QName | null,
    members: Partial<Record<"methods" | "staticMethods" | "fields" | "staticFields", Iterable<string>>> = {},
  ) {
    this.fullName = fullName;
    this.superName = superName;
    this.methods = new Set(members.methods);
    this.staticMethods = new Set(members.staticMethods);
    this.fields = new Set(members.fields);
    this.staticFields = new Set(members.staticFields);
  }

  static fromDocument(doc: ClassDocument): ClassDesc {
    const superName: QName | null = doc.superName !== undefined ? parseQName(doc.superName) : null;
    return new ClassDesc(parseQName(doc.name), superName, doc);
  }

  get name(): QName {
    return this.fullName;
  }

  /**
   * Name of the package holding the class: `""` for the top level.
   */
  get packageName(): string {
    return this.fullName.ns.name;
  }

  hasMethod(name: string, isStatic: boolean): boolean {
    return (isStatic ? this.staticMethods : this.methods).has(name);
  }

  clone(): ClassDesc {
    return new ClassDesc(this.fullName, this.superName, this);
  }
}

/**
 * Node of the package tree: sub-packages and classes by name segment.
 */
export class PackageNode {
  readonly name: string;
  readonly packages: Map<string, PackageNode>;
  readonly types: Map<string, ClassDesc>;

  constructor(name: string) {
    this.name = name;
    this.packages = new Map();
    this.types = new Map();
  }

  /**
   * Resolves a dotted path relative to this package: `"display.Sprite"` from
   * the `flash` package.
   */
  lookup(path: string): PackageNode | ClassDesc | undefined {
    let current: PackageNode = this;
    const segments: string[] = path.split(".");
    for (const [i, segment] of segments.entries()) {
      const child: PackageNode | undefined = current.packages.get(segment);
      if (child !== undefined) {
        current = child;
        continue;
      }
      const type: ClassDesc | undefined = current.types.get(segment);
      return type !== undefined && i === segments.length - 1 ? type : undefined;
    }
    return current;
  }

  getOrCreatePackage(segment: string): PackageNode {
    let child: PackageNode | undefined = this.packages.get(segment);
    if (child === undefined) {
      child = new PackageNode(this.name === "" ? segment : `${this.name}.${segment}`);
      this.packages.set(segment, child);
    }
    return child;
  }
}

/**
 * A set of native classes, indexed by qualified name and by package.
 */
export class Library {
  readonly types: ReadonlyMap<string, ClassDesc>;
  readonly toplevel: PackageNode;

  constructor(types: Iterable<ClassDesc>) {
    const byKey: Map<string, ClassDesc> = new Map();
    this.toplevel = new PackageNode("");
    for (const type of types) {
      byKey.set(type.fullName.key, type);
      let pkg: PackageNode = this.toplevel;
      if (type.packageName !== "") {
        for (const segment of type.packageName.split(".")) {
          pkg = pkg.getOrCreatePackage(segment);
        }
      }
      pkg.types.set(type.fullName.name, type);
    }
    this.types = byKey;
  }

  static fromDocument(doc: LibraryDocument): Library {
    return new Library(doc.classes.map(ClassDesc.fromDocument));
  }

  /**
   * Decodes a library from its JSON document.
   */
  static read(json: string): Library {
    return Library.fromDocument($LibraryDocument.read(JSON_READER, json));
  }

  lookup(path: string): PackageNode | ClassDesc | undefined {
    return this.toplevel.lookup(path);
  }

  get(name: QName): ClassDesc | undefined {
    return this.types.get(name.key);
  }
}

/**
 * The native libraries visible to one code generator.
 */
export class LibraryRegistry {
  private readonly libraries: Library[];

  constructor(libraries: Iterable<Library> = []) {
    this.libraries = [...libraries];
  }

  add(library: Library): void {
    this.libraries.push(library);
  }

  typeExists(name: string | QName): boolean {
    return this.find(toQName(name)) !== undefined;
  }

  /**
   * Returns a copy of the description of `name`, from the first library that
   * defines it.
   */
  getType(name: string | QName): ClassDesc | undefined {
    return this.find(toQName(name))?.clone();
  }

  private find(name: QName): ClassDesc | undefined {
    for (const library of this.libraries) {
      const type: ClassDesc | undefined = library.get(name);
      if (type !== undefined) {
        return type;
      }
    }
    return undefined;
  }
}
