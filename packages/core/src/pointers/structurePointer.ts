import type {Member} from "../containers/container.js";
import {Structure, StructureMembers} from "../containers/structure.js";
import {Pointer, PointerOptions} from "./pointer.js";

/**
 * Pointer to a structure, with the map operations of the structure.
 * `structurePointer` builds one from plain members.
 *
 * ```ts
 * const header = new StructurePointer(new Header(), {dataOrder: "big"});
 * header.data.magic.value;
 * ```
 */
export class StructurePointer<S extends Structure = Structure> extends Pointer<S> {
  get size(): number {
    return this.data.size;
  }

  get(name: string): Member | undefined {
    return this.data.get(name);
  }

  has(name: string): boolean {
    return this.data.has(name);
  }

  keys(): string[] {
    return this.data.keys();
  }

  values(): Member[] {
    return this.data.values();
  }

  entries(): [string, Member][] {
    return this.data.entries();
  }
}

/**
 * Pointer to a new structure built from `members`
 */
export function structurePointer(members: StructureMembers = {}, opts: PointerOptions = {}): StructurePointer {
  return new StructurePointer(new Structure(members), opts);
}

export class StructureRelativePointer<S extends Structure = Structure> extends StructurePointer<S> {
  constructor(data: S, opts: Omit<PointerOptions, "relative"> = {}) {
    super(data, {...opts, relative: true});
  }
}
