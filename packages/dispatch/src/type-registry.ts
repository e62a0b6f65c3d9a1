/**
 * Interned runtime type descriptor. Two descriptors for the same logical
 * type are the same object, so identity (`===`) is type equality.
 */
export type TypeOfArgument = {
  readonly id: number;
  readonly name: string;
};

let nextTypeId = 1;

/**
 * Arena of interned type descriptors. Ids are unique across every registry in
 * the process, which keeps cache key ordering total even when sets mix types
 * from several registries.
 */
export class TypeRegistry {
  #arena: TypeOfArgument[] = [];
  #byName = new Map<string, TypeOfArgument>();

  intern(name: string): TypeOfArgument {
    const existing = this.#byName.get(name);
    if (existing) return existing;
    const type: TypeOfArgument = Object.freeze({ id: nextTypeId++, name });
    this.#arena.push(type);
    this.#byName.set(name, type);
    return type;
  }

  lookup(name: string): TypeOfArgument | undefined {
    return this.#byName.get(name);
  }

  require(name: string): TypeOfArgument {
    const type = this.#byName.get(name);
    if (!type) {
      throw new Error(`unknown type ${name}`);
    }
    return type;
  }

  has(type: TypeOfArgument): boolean {
    return this.#byName.get(type.name) === type;
  }

  get types(): readonly TypeOfArgument[] {
    return this.#arena;
  }
}

export const formatTypeList = (types: readonly TypeOfArgument[]): string =>
  types.map((type) => type.name).join(", ");
