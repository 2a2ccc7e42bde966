import {BinlayoutError} from "@binlayout/utils";

export enum FieldErrorCode {
  /** Byte offset negative or bit offset outside 0..64 */
  INDEX = "FIELD_ERROR_INDEX",
  /** Absolute address of the field is negative */
  ADDRESS = "FIELD_ERROR_ADDRESS",
  /** Declared group size or bit offset cannot hold the field */
  ALIGNMENT = "FIELD_ERROR_ALIGNMENT",
  /** Bit size outside the supported range */
  SIZE = "FIELD_ERROR_SIZE",
  /** Assigned value has a type the field cannot take */
  TYPE = "FIELD_ERROR_TYPE",
  /** Assigned value cannot be parsed */
  VALUE = "FIELD_ERROR_VALUE",
  /** Characters outside the field's text encoding */
  VALUE_ENCODING = "FIELD_ERROR_VALUE_ENCODING",
  /** Byte order not allowed for this field */
  BYTE_ORDER = "FIELD_ERROR_BYTE_ORDER",
  /** Own byte order declared on a field that does not span whole bytes */
  GROUP_BYTE_ORDER = "FIELD_ERROR_GROUP_BYTE_ORDER",
  /** Bit field placed at another bit offset than declared */
  GROUP_OFFSET = "FIELD_ERROR_GROUP_OFFSET",
  /** Bits of a packed group do not fill the declared group size */
  GROUP_SIZE = "FIELD_ERROR_GROUP_SIZE",
}

type FieldLocation = {field: string; byte: number; bit: number};

export type FieldErrorType =
  | ({code: FieldErrorCode.INDEX} & FieldLocation)
  | ({code: FieldErrorCode.ADDRESS; address: number} & FieldLocation)
  | ({code: FieldErrorCode.ALIGNMENT; byteSize: number; bitOffset: number} & FieldLocation)
  | ({code: FieldErrorCode.SIZE; bitSize: number} & FieldLocation)
  | ({code: FieldErrorCode.TYPE; value: string} & FieldLocation)
  | ({code: FieldErrorCode.VALUE; value: string} & FieldLocation)
  | ({code: FieldErrorCode.VALUE_ENCODING; value: string; encoding: string} & FieldLocation)
  | ({code: FieldErrorCode.BYTE_ORDER; byteOrder: string} & FieldLocation)
  | ({code: FieldErrorCode.GROUP_BYTE_ORDER; byteOrder: string} & FieldLocation)
  | ({code: FieldErrorCode.GROUP_OFFSET; bitOffset: number} & FieldLocation)
  | ({code: FieldErrorCode.GROUP_SIZE; byteSize: number; required: number} & FieldLocation);

export class FieldError extends BinlayoutError<FieldErrorType> {
  constructor(type: FieldErrorType, message?: string) {
    super(type, message ?? renderFieldErrorMessage(type));
  }
}

function renderFieldErrorMessage(type: FieldErrorType): string {
  const at = `${type.field} at byte ${type.byte} bit ${type.bit}`;
  switch (type.code) {
    case FieldErrorCode.INDEX:
      return `${at}: invalid index`;
    case FieldErrorCode.ADDRESS:
      return `${at}: invalid address ${type.address}`;
    case FieldErrorCode.ALIGNMENT:
      return `${at}: invalid alignment, ${type.byteSize} bytes with bit offset ${type.bitOffset}`;
    case FieldErrorCode.SIZE:
      return `${at}: invalid bit size ${type.bitSize}`;
    case FieldErrorCode.TYPE:
      return `${at}: invalid value type ${type.value}`;
    case FieldErrorCode.VALUE:
      return `${at}: invalid value ${type.value}`;
    case FieldErrorCode.VALUE_ENCODING:
      return `${at}: value ${type.value} is not ${type.encoding} encoded`;
    case FieldErrorCode.BYTE_ORDER:
      return `${at}: byte order ${type.byteOrder} not allowed`;
    case FieldErrorCode.GROUP_BYTE_ORDER:
      return `${at}: own byte order conversion to ${type.byteOrder} needs a field of whole bytes`;
    case FieldErrorCode.GROUP_OFFSET:
      return `${at}: group offset mismatch, declared bit offset ${type.bitOffset}`;
    case FieldErrorCode.GROUP_SIZE:
      return `${at}: group size mismatch, expected ${type.byteSize} bytes got ${type.required}`;
  }
}

export enum ContainerErrorCode {
  /** Member is neither a field nor a container */
  MEMBER_TYPE = "CONTAINER_ERROR_MEMBER_TYPE",
  /** Member name is not an identifier or already taken */
  MEMBER_NAME = "CONTAINER_ERROR_MEMBER_NAME",
  /** Array factory returned something else than a field or container */
  FACTORY_TYPE = "CONTAINER_ERROR_FACTORY_TYPE",
  /** Size in bits does not end on a byte boundary */
  LENGTH = "CONTAINER_ERROR_LENGTH",
  /** Content assigned in bulk does not have the shape of the container */
  CONTENT = "CONTAINER_ERROR_CONTENT",
}

export type ContainerErrorType =
  | {code: ContainerErrorCode.MEMBER_TYPE; container: string; member: string; value: string}
  | {code: ContainerErrorCode.MEMBER_NAME; container: string; member: string}
  | {code: ContainerErrorCode.FACTORY_TYPE; container: string; value: string}
  | {code: ContainerErrorCode.LENGTH; container: string; byte: number; bit: number}
  | {code: ContainerErrorCode.CONTENT; container: string; expected: string; value: string};

export class ContainerError extends BinlayoutError<ContainerErrorType> {
  constructor(type: ContainerErrorType, message?: string) {
    super(type, message ?? renderContainerErrorMessage(type));
  }
}

function renderContainerErrorMessage(type: ContainerErrorType): string {
  switch (type.code) {
    case ContainerErrorCode.MEMBER_TYPE:
      return `${type.container}.${type.member}: invalid member type ${type.value}`;
    case ContainerErrorCode.MEMBER_NAME:
      return `${type.container}: invalid member name ${type.member}`;
    case ContainerErrorCode.FACTORY_TYPE:
      return `${type.container}: factory produced ${type.value}`;
    case ContainerErrorCode.LENGTH:
      return `${type.container}: length of ${type.byte} bytes and ${type.bit} bits is not byte aligned`;
    case ContainerErrorCode.CONTENT:
      return `${type.container}: content must be ${type.expected}, got ${type.value}`;
  }
}

export enum PointerErrorCode {
  /** Object passed as provider lacks read or write */
  PROVIDER_TYPE = "POINTER_ERROR_PROVIDER_TYPE",
  /** Provider returned another number of bytes than requested */
  READ_SIZE = "POINTER_ERROR_READ_SIZE",
  /** Serialized patch content has an unexpected length */
  PATCH_SIZE = "POINTER_ERROR_PATCH_SIZE",
}

export type PointerErrorType =
  | {code: PointerErrorCode.PROVIDER_TYPE; pointer: string; value: string}
  | {code: PointerErrorCode.READ_SIZE; pointer: string; address: number; expected: number; actual: number}
  | {code: PointerErrorCode.PATCH_SIZE; pointer: string; item: string; expected: number; actual: number};

export class PointerError extends BinlayoutError<PointerErrorType> {
  constructor(type: PointerErrorType, message?: string) {
    super(type, message ?? renderPointerErrorMessage(type));
  }
}

function renderPointerErrorMessage(type: PointerErrorType): string {
  switch (type.code) {
    case PointerErrorCode.PROVIDER_TYPE:
      return `${type.pointer}: invalid provider ${type.value}`;
    case PointerErrorCode.READ_SIZE:
      return `${type.pointer}: read ${type.actual} of ${type.expected} bytes at address 0x${type.address.toString(16)}`;
    case PointerErrorCode.PATCH_SIZE:
      return `${type.pointer}: patch for ${type.item} has ${type.actual} bytes, expected ${type.expected}`;
  }
}

export enum ProviderErrorCode {
  /** Access outside the bytes of the data source */
  OUT_OF_RANGE = "PROVIDER_ERROR_OUT_OF_RANGE",
  /** Path of a file provider is not a regular file */
  FILE = "PROVIDER_ERROR_FILE",
}

export type ProviderErrorType =
  | {code: ProviderErrorCode.OUT_OF_RANGE; address: number; count: number; size: number}
  | {code: ProviderErrorCode.FILE; path: string};

export class ProviderError extends BinlayoutError<ProviderErrorType> {
  constructor(type: ProviderErrorType) {
    super(type, renderProviderErrorMessage(type));
  }
}

function renderProviderErrorMessage(type: ProviderErrorType): string {
  switch (type.code) {
    case ProviderErrorCode.OUT_OF_RANGE:
      return `${type.count} bytes at address 0x${type.address.toString(16)} exceed the data source of ${type.size} bytes`;
    case ProviderErrorCode.FILE:
      return `${type.path} is not a regular file`;
  }
}

export enum ByteOrderErrorCode {
  TYPE = "BYTE_ORDER_ERROR_TYPE",
  VALUE = "BYTE_ORDER_ERROR_VALUE",
}

export type ByteOrderErrorType = {code: ByteOrderErrorCode; owner: string; value: string};

export class ByteOrderError extends BinlayoutError<ByteOrderErrorType> {
  constructor(type: ByteOrderErrorType) {
    super(type, `${type.owner}: invalid byte order ${type.value}`);
  }
}
