import {divmod, isPlainObject} from "@binlayout/utils";
import {ByteBuffer} from "../buffer.js";
import {ItemClass} from "../constants.js";
import {createIndex, Index} from "../cursor.js";
import {ContainerError, ContainerErrorCode, FieldError, FieldErrorCode} from "../errors.js";
import {Field} from "../fields/field.js";
import {
  ContainerMetadata,
  DataContainer,
  FieldAttribute,
  FieldContent,
  FieldItem,
  FieldMetadata,
  ItemMetadata,
  View,
} from "../interface.js";
import {codingOptions, CodingOptions, ReadOptions, ViewOptions} from "../options.js";
import type {Pointer} from "../pointers/pointer.js";
import type {Provider} from "../providers/provider.js";

/** Anything a container can hold */
export type Member = Field | Container;

export function isField(value: unknown): value is Field {
  return value instanceof Field;
}

export function isContainer(value: unknown): value is Container {
  return value instanceof Container;
}

export function isPointer(value: unknown): value is Pointer {
  return isField(value) && value.isPointer();
}

/** Items that own other items: containers and pointers */
export function isMixin(value: unknown): value is Container | Pointer {
  return isContainer(value) || isPointer(value);
}

export function describeValue(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  if (value instanceof Uint8Array) return "Uint8Array";
  if (typeof value === "object") return value.constructor?.name ?? "object";
  return typeof value;
}

export function isContentRecord(content: FieldContent): content is {[key: string]: FieldContent} {
  return isPlainObject(content);
}

/**
 * View of one field, the attribute itself or a record of several attributes
 */
export function viewField(field: Field, attributes: readonly FieldAttribute[], fieldnames?: readonly string[]): View {
  if (attributes.length <= 1) {
    return field.attribute(attributes[0] ?? "value");
  }
  const names = fieldnames ?? attributes;
  const view: {[key: string]: View} = {};
  for (let i = 0; i < Math.min(names.length, attributes.length); i++) {
    view[names[i]] = field.attribute(attributes[i]);
  }
  return view;
}

/**
 * Assign plain content to a field, nested content is a type error
 */
export function assignField(field: Field, content: FieldContent): void {
  if (content === null || Array.isArray(content) || isContentRecord(content)) {
    throw new FieldError({
      code: FieldErrorCode.TYPE,
      field: field.name,
      byte: field.index.byte,
      bit: field.index.bit,
      value: describeValue(content),
    });
  }
  field.value = content;
}

/**
 * Ordered collection of fields and containers. Every traversal walks the members
 * depth first in declaration order and threads the Index through them.
 */
export abstract class Container implements DataContainer {
  abstract get itemType(): ItemClass;

  /** Members with their key in declaration order */
  protected abstract memberEntries(): [key: string | number, item: Member][];

  abstract initializeFields(content: FieldContent): void;
  abstract viewFields(attributes?: readonly FieldAttribute[], opts?: ViewOptions): View;
  abstract fieldItems(path?: string, opts?: Pick<ViewOptions, "nested">): FieldItem[];

  get name(): string {
    return this.constructor.name;
  }

  /**
   * Assign an Index to every field. With `nested` the data of every pointer is
   * indexed as well, starting at the pointer's address.
   */
  indexFields(index: Index = createIndex(), opts: Partial<CodingOptions> = {}): Index {
    const {nested} = codingOptions(opts);
    for (const [key, item] of this.memberEntries()) {
      if (isContainer(item)) {
        index = item.indexFields(index, opts);
      } else if (isField(item)) {
        index = item.indexField(index);
        if (nested && item.isPointer()) {
          item.indexData();
        }
      } else {
        throw this.memberTypeError(key, item);
      }
    }
    return index;
  }

  deserialize(buffer: Uint8Array, index: Index = createIndex(), opts: Partial<CodingOptions> = {}): Index {
    for (const [key, item] of this.memberEntries()) {
      if (!isMember(item)) throw this.memberTypeError(key, item);
      index = item.deserialize(buffer, index, opts);
    }
    return index;
  }

  serialize(buffer: ByteBuffer, index: Index = createIndex(), opts: Partial<CodingOptions> = {}): Index {
    for (const [key, item] of this.memberEntries()) {
      if (!isMember(item)) throw this.memberTypeError(key, item);
      index = item.serialize(buffer, index, opts);
    }
    return index;
  }

  /**
   * Serialize into a new byte array
   */
  toBytes(opts: Partial<CodingOptions> = {}): Uint8Array {
    const buffer = new ByteBuffer();
    this.serialize(buffer, createIndex(), opts);
    return buffer.toBytes();
  }

  /** Accumulated size of all fields as `[bytes, bits]` */
  containerSize(): [bytes: number, bits: number] {
    let length = 0;
    for (const [key, item] of this.memberEntries()) {
      if (isContainer(item)) {
        const [bytes, bits] = item.containerSize();
        length += bytes * 8 + bits;
      } else if (isField(item)) {
        length += item.bitSize;
      } else {
        throw this.memberTypeError(key, item);
      }
    }
    return divmod(length, 8);
  }

  /** First field in traversal order, null when the container holds no field */
  firstField(): Field | null {
    for (const [key, item] of this.memberEntries()) {
      if (isContainer(item)) {
        const field = item.firstField();
        if (field !== null) return field;
      } else if (isField(item)) {
        return item;
      } else {
        throw this.memberTypeError(key, item);
      }
    }
    return null;
  }

  /**
   * Let every pointer in the container read its data from `provider`
   */
  readFrom(provider: Provider, opts: ReadOptions = {}): void {
    for (const [, item] of this.memberEntries()) {
      if (isContainer(item) || isPointer(item)) {
        item.readFrom(provider, opts);
      }
    }
  }

  describe(name?: string, opts: Pick<ViewOptions, "nested"> = {}): ContainerMetadata {
    const metadata = {
      class: this.name,
      name: name || this.name,
      size: this.memberEntries().length,
      type: ItemClass[this.itemType],
    };
    const member: ItemMetadata[] = [];
    for (const [key, item] of this.memberEntries()) {
      member.push(this.describeMember(this.memberName(metadata.name, key), key, item, opts));
    }
    return {...metadata, member};
  }

  /** Name of a member in the metadata */
  protected abstract memberName(name: string, key: string | number): string;

  protected viewMember(key: string | number, item: Member, attributes: readonly FieldAttribute[], opts: ViewOptions): View {
    if (isContainer(item)) {
      return item.viewFields(attributes, opts);
    }
    if (isField(item)) {
      if (opts.nested && item.isPointer()) {
        return item.viewFields(attributes, opts);
      }
      return viewField(item, attributes, opts.fieldnames);
    }
    throw this.memberTypeError(key, item);
  }

  protected memberItems(key: string | number, item: Member, path: string, opts: Pick<ViewOptions, "nested">): FieldItem[] {
    if (isContainer(item)) {
      return item.fieldItems(path, opts);
    }
    if (isField(item)) {
      if (opts.nested && item.isPointer()) {
        return item.fieldItems(path, opts);
      }
      return [[path, item]];
    }
    throw this.memberTypeError(key, item);
  }

  protected initializeMember(key: string | number, item: Member, content: FieldContent): void {
    if (isContainer(item)) {
      item.initializeFields(content);
    } else if (isField(item)) {
      if (item.isPointer()) {
        item.initializeFields(content);
      } else {
        assignField(item, content);
      }
    } else {
      throw this.memberTypeError(key, item);
    }
  }

  protected contentError(expected: string, content: FieldContent): ContainerError {
    return new ContainerError({code: ContainerErrorCode.CONTENT, container: this.name, expected, value: describeValue(content)});
  }

  protected memberTypeError(key: string | number, item: unknown): ContainerError {
    return new ContainerError({
      code: ContainerErrorCode.MEMBER_TYPE,
      container: this.name,
      member: String(key),
      value: describeValue(item),
    });
  }

  private describeMember(
    name: string,
    key: string | number,
    item: Member,
    opts: Pick<ViewOptions, "nested">
  ): ContainerMetadata | FieldMetadata {
    const nested = opts.nested ?? true;
    if (isContainer(item)) {
      return item.describe(name, {nested});
    }
    if (isField(item)) {
      return item.describe(name, {nested: nested && item.isPointer()});
    }
    throw this.memberTypeError(key, item);
  }
}

function isMember(value: unknown): value is Member {
  return isField(value) || isContainer(value);
}
