import type {Alignment, Index} from "./cursor.js";
import type {ByteOrder} from "./byteOrder.js";
import type {CodingOptions, ReadOptions, ViewOptions} from "./options.js";
import type {Provider} from "./providers/provider.js";
import type {Field} from "./fields/field.js";

/** Anything a field value can be assigned from */
export type FieldInput = number | bigint | string | boolean | Uint8Array;

/** What a field reports as its value */
export type FieldValue = number | bigint | string | boolean;

export type FieldAttribute = "value" | "name" | "bitSize" | "byteOrder" | "alignment" | "index";
export type AttributeValue = FieldValue | Alignment | Index;

/** Value and attribute tree shaped like the container it was taken from */
export type View = AttributeValue | null | View[] | {[key: string]: View};

/** Plain data a container can be bulk assigned from */
export type FieldContent = FieldInput | null | FieldContent[] | {[key: string]: FieldContent};

export type FieldItem = [path: string, field: Field];

export type FieldMetadata = {
  address: number;
  alignment: [byteSize: number, bitOffset: number];
  class: string;
  index: [byte: number, bit: number];
  max?: number | bigint;
  member?: ItemMetadata[];
  min?: number | bigint;
  name: string;
  order: ByteOrder;
  scale?: number;
  signed?: boolean;
  size: number;
  type: string;
  value: FieldValue;
};

export type ContainerMetadata = {
  class: string;
  member: ItemMetadata[];
  name: string;
  size: number;
  type: string;
};

export type ItemMetadata = FieldMetadata | ContainerMetadata;

/**
 * Operations of anything that owns other items. Containers implement it, and so
 * does a pointer for the data it references.
 */
export interface DataContainer {
  indexFields(index?: Index, opts?: Partial<CodingOptions>): Index;
  readFrom(provider: Provider, opts?: ReadOptions): void;
  initializeFields(content: FieldContent): void;
  viewFields(attributes?: readonly FieldAttribute[], opts?: ViewOptions): View;
  fieldItems(path?: string, opts?: Pick<ViewOptions, "nested">): FieldItem[];
  describe(name?: string, opts?: Pick<ViewOptions, "nested">): ItemMetadata;
}
