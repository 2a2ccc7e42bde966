import {ArraySequence, ArrayTemplate} from "../containers/array.js";
import type {Member} from "../containers/container.js";
import {Sequence} from "../containers/sequence.js";
import {Pointer, PointerOptions} from "./pointer.js";

/**
 * Pointer to a sequence, iterates the members of its data
 */
export abstract class ItemsPointer<M extends Member, S extends Sequence<M>> extends Pointer<S> implements Iterable<M> {
  get length(): number {
    return this.data.length;
  }

  at(index: number): M | undefined {
    return this.data.at(index);
  }

  set(index: number, item: M): void {
    this.data.set(index, item);
  }

  pop(index = -1): M | undefined {
    return this.data.pop(index);
  }

  remove(item: M): boolean {
    return this.data.remove(item);
  }

  clear(): void {
    this.data.clear();
  }

  reverse(): void {
    this.data.reverse();
  }

  [Symbol.iterator](): Iterator<M> {
    return this.data[Symbol.iterator]();
  }
}

export class SequencePointer<M extends Member = Member> extends ItemsPointer<M, Sequence<M>> {
  constructor(items: Iterable<M> = [], opts: PointerOptions = {}) {
    super(new Sequence(items), opts);
  }

  append(item: M): void {
    this.data.append(item);
  }

  insert(index: number, item: M): void {
    this.data.insert(index, item);
  }

  extend(items: Iterable<M>): void {
    this.data.extend(items);
  }
}

/**
 * Pointer to an array of `capacity` elements created from `template`
 *
 * ```ts
 * const table = new ArrayPointer(() => new Entry(), 16, {address: 0x400});
 * ```
 */
export class ArrayPointer<M extends Member = Member> extends ItemsPointer<M, ArraySequence<M>> {
  constructor(template: ArrayTemplate<M>, capacity = 0, opts: PointerOptions = {}) {
    super(new ArraySequence(template, capacity), opts);
  }

  append(): M {
    return this.data.append();
  }

  insert(index: number): M {
    return this.data.insert(index);
  }

  resize(capacity: number): void {
    this.data.resize(capacity);
  }
}

export class SequenceRelativePointer<M extends Member = Member> extends SequencePointer<M> {
  constructor(items: Iterable<M> = [], opts: Omit<PointerOptions, "relative"> = {}) {
    super(items, {...opts, relative: true});
  }
}

export class ArrayRelativePointer<M extends Member = Member> extends ArrayPointer<M> {
  constructor(template: ArrayTemplate<M>, capacity = 0, opts: Omit<PointerOptions, "relative"> = {}) {
    super(template, capacity, {...opts, relative: true});
  }
}
