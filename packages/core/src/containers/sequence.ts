import {ItemClass} from "../constants.js";
import {FieldAttribute, FieldContent, FieldItem, View} from "../interface.js";
import {ViewOptions} from "../options.js";
import {Container, isContainer, isField, Member} from "./container.js";

/**
 * Container of positional members of any kind
 */
export class Sequence<M extends Member = Member> extends Container implements Iterable<M> {
  protected readonly items: M[] = [];

  constructor(items: Iterable<M> = []) {
    super();
    for (const item of items) {
      this.items.push(this.checkMember(this.items.length, item));
    }
  }

  get itemType(): ItemClass {
    return ItemClass.Sequence;
  }

  get length(): number {
    return this.items.length;
  }

  /** Member at `index`, negative indexes count from the end */
  at(index: number): M | undefined {
    return this.items.at(index);
  }

  set(index: number, item: M): void {
    const position = index < 0 ? this.items.length + index : index;
    if (position < 0 || position >= this.items.length) {
      throw new RangeError(`${this.name}: index ${index} out of range for length ${this.items.length}`);
    }
    this.items[position] = this.checkMember(position, item);
  }

  append(item: M): void {
    this.items.push(this.checkMember(this.items.length, item));
  }

  insert(index: number, item: M): void {
    this.items.splice(index, 0, this.checkMember(index, item));
  }

  extend(items: Iterable<M>): void {
    for (const item of Array.from(items)) {
      this.items.push(this.checkMember(this.items.length, item));
    }
  }

  /** Remove and return the member at `index`, the last one by default */
  pop(index = -1): M | undefined {
    const position = index < 0 ? this.items.length + index : index;
    if (position < 0 || position >= this.items.length) {
      return undefined;
    }
    return this.items.splice(position, 1)[0];
  }

  /** Remove the first occurrence of `item`, false when it is not a member */
  remove(item: M): boolean {
    const position = this.items.indexOf(item);
    if (position < 0) {
      return false;
    }
    this.items.splice(position, 1);
    return true;
  }

  clear(): void {
    this.items.length = 0;
  }

  reverse(): void {
    this.items.reverse();
  }

  [Symbol.iterator](): Iterator<M> {
    return this.items[Symbol.iterator]();
  }

  initializeFields(content: FieldContent): void {
    if (!Array.isArray(content)) {
      throw this.contentError("an array", content);
    }
    const count = Math.min(this.items.length, content.length);
    for (let i = 0; i < count; i++) {
      this.initializeMember(i, this.items[i], content[i]);
    }
  }

  viewFields(attributes: readonly FieldAttribute[] = ["value"], opts: ViewOptions = {}): View[] {
    return this.items.map((item, i) => this.viewMember(i, item, attributes, opts));
  }

  fieldItems(path = "", opts: Pick<ViewOptions, "nested"> = {}): FieldItem[] {
    const items: FieldItem[] = [];
    this.items.forEach((item, i) => {
      items.push(...this.memberItems(i, item, `${path}[${i}]`, opts));
    });
    return items;
  }

  protected memberEntries(): [number, Member][] {
    return this.items.map((item, i) => [i, item]);
  }

  protected memberName(name: string, key: string | number): string {
    return `${name}[${key}]`;
  }

  private checkMember(position: number, item: M): M {
    if (!isContainer(item) && !isField(item)) {
      throw this.memberTypeError(position, item);
    }
    return item;
  }
}
