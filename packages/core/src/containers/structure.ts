import {isPlainObject} from "@binlayout/utils";
import {ItemClass} from "../constants.js";
import {ContainerError, ContainerErrorCode} from "../errors.js";
import {FieldAttribute, FieldContent, FieldItem, View} from "../interface.js";
import {ViewOptions} from "../options.js";
import {Container, isContainer, isContentRecord, isField, Member} from "./container.js";

/** Members of a structure, plain objects become nested structures */
export type StructureMembers = {[name: string]: Member | StructureMembers};

const memberNamePattern = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

/**
 * Container of named members. Insertion order is serialization order.
 *
 * Subclasses declare their layout with `add`, which keeps the member type:
 *
 * ```ts
 * class Header extends Structure {
 *   readonly magic = this.add("magic", new Unsigned(32));
 *   readonly length = this.add("length", new Decimal(16));
 * }
 * ```
 */
export class Structure extends Container {
  private readonly members = new Map<string, Member>();

  constructor(members: StructureMembers = {}) {
    super();
    for (const [name, item] of Object.entries(members)) {
      this.set(name, item);
    }
  }

  get itemType(): ItemClass {
    return ItemClass.Structure;
  }

  get size(): number {
    return this.members.size;
  }

  /**
   * Append a new member and return it
   */
  add<M extends Member>(name: string, item: M): M {
    if (this.members.has(name)) {
      throw new ContainerError({code: ContainerErrorCode.MEMBER_NAME, container: this.name, member: name});
    }
    this.set(name, item);
    return item;
  }

  /**
   * Set a member, replacing the one of the same name in place
   */
  set(name: string, item: Member | StructureMembers): void {
    if (!memberNamePattern.test(name)) {
      throw new ContainerError({code: ContainerErrorCode.MEMBER_NAME, container: this.name, member: name});
    }
    if (isContainer(item) || isField(item)) {
      this.members.set(name, item);
    } else if (isPlainObject(item)) {
      this.members.set(name, new Structure(item));
    } else {
      throw this.memberTypeError(name, item);
    }
  }

  get(name: string): Member | undefined {
    return this.members.get(name);
  }

  has(name: string): boolean {
    return this.members.has(name);
  }

  delete(name: string): boolean {
    return this.members.delete(name);
  }

  keys(): string[] {
    return Array.from(this.members.keys());
  }

  values(): Member[] {
    return Array.from(this.members.values());
  }

  entries(): [string, Member][] {
    return Array.from(this.members.entries());
  }

  [Symbol.iterator](): IterableIterator<[string, Member]> {
    return this.members.entries();
  }

  initializeFields(content: FieldContent): void {
    if (!isContentRecord(content)) {
      throw this.contentError("an object", content);
    }
    for (const [name, value] of Object.entries(content)) {
      const item = this.members.get(name);
      if (item === undefined) {
        throw new ContainerError({code: ContainerErrorCode.MEMBER_NAME, container: this.name, member: name});
      }
      this.initializeMember(name, item, value);
    }
  }

  viewFields(attributes: readonly FieldAttribute[] = ["value"], opts: ViewOptions = {}): {[name: string]: View} {
    const view: {[name: string]: View} = {};
    for (const [name, item] of this.members) {
      view[name] = this.viewMember(name, item, attributes, opts);
    }
    return view;
  }

  fieldItems(path = "", opts: Pick<ViewOptions, "nested"> = {}): FieldItem[] {
    const items: FieldItem[] = [];
    for (const [name, item] of this.members) {
      items.push(...this.memberItems(name, item, path ? `${path}.${name}` : name, opts));
    }
    return items;
  }

  protected memberEntries(): [string, Member][] {
    return this.entries();
  }

  protected memberName(_name: string, key: string | number): string {
    return String(key);
  }
}
