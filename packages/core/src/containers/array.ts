import {ItemClass} from "../constants.js";
import {ContainerError, ContainerErrorCode} from "../errors.js";
import type {Field} from "../fields/field.js";
import {FieldContent} from "../interface.js";
import {describeValue, isContainer, isField, Member} from "./container.js";
import {Sequence} from "./sequence.js";

/** Field copied for every element, or a factory creating each element */
export type ArrayTemplate<M extends Member> = (M & Field) | (() => M);

/**
 * Sequence of `capacity` elements created from one template. Field templates are
 * copied, so elements never share state.
 *
 * ```ts
 * const samples = new ArraySequence(new Signed(16), 8);
 * const records = new ArraySequence(() => new Record(), 4);
 * ```
 */
export class ArraySequence<M extends Member = Member> extends Sequence<M> {
  private readonly template: ArrayTemplate<M>;

  constructor(template: ArrayTemplate<M>, capacity = 0) {
    super();
    if (typeof template === "function") {
      this.checkElement(template());
    } else if (!isField(template)) {
      throw this.memberTypeError("template", template);
    }
    this.template = template;
    this.resize(capacity);
  }

  get itemType(): ItemClass {
    return ItemClass.Array;
  }

  /** Append a new element and return it */
  append(): M {
    const element = this.createElement();
    this.items.push(element);
    return element;
  }

  /** Insert a new element at `index` and return it */
  insert(index: number): M {
    const element = this.createElement();
    this.items.splice(index, 0, element);
    return element;
  }

  /**
   * Grow with new elements or shrink from the end to `capacity` elements
   */
  resize(capacity: number): void {
    const length = Math.max(Math.trunc(capacity), 0);
    while (this.items.length < length) {
      this.append();
    }
    if (this.items.length > length) {
      this.items.length = length;
    }
  }

  /**
   * An array assigns its elements in turn, starting over while elements are
   * left. Any other content is assigned to every element.
   */
  initializeFields(content: FieldContent): void {
    if (!Array.isArray(content)) {
      this.items.forEach((item, i) => this.initializeMember(i, item, content));
      return;
    }
    if (content.length === 0) {
      return;
    }
    this.items.forEach((item, i) => this.initializeMember(i, item, content[i % content.length]));
  }

  private createElement(): M {
    const template = this.template;
    if (typeof template !== "function") {
      return template.clone();
    }
    return this.checkElement(template());
  }

  private checkElement(element: M): M {
    if (!isField(element) && !isContainer(element)) {
      throw new ContainerError({code: ContainerErrorCode.FACTORY_TYPE, container: this.name, value: describeValue(element)});
    }
    return element;
  }
}
