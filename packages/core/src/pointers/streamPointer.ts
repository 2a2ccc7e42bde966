import {clamp} from "@binlayout/utils";
import {ByteBuffer} from "../buffer.js";
import {AUTO_STRING_BLOCK_SIZE, MAX_ADDRESS} from "../constants.js";
import {describeValue} from "../containers/container.js";
import {ContainerError, ContainerErrorCode, PointerError, PointerErrorCode} from "../errors.js";
import {Stream, StringField} from "../fields/stream.js";
import {getDefaultLogger} from "../logger.js";
import {ReadOptions} from "../options.js";
import {isProvider, Provider} from "../providers/provider.js";
import {Pointer, PointerOptions} from "./pointer.js";

/** Bytes have no byte order, stream pointers take the options of the address field only */
export type StreamPointerOptions = Omit<PointerOptions, "dataOrder" | "relative">;

/**
 * Pointer to a byte sequence, iterates the bytes of its data
 */
export abstract class BytesPointer<S extends Stream> extends Pointer<S> implements Iterable<number> {
  get length(): number {
    return this.data.length;
  }

  resize(capacity: number): void {
    this.data.resize(capacity);
  }

  [Symbol.iterator](): Iterator<number> {
    return this.data.toBytes()[Symbol.iterator]();
  }
}

export class StreamPointer extends BytesPointer<Stream> {
  constructor(capacity = 0, opts: StreamPointerOptions & Pick<PointerOptions, "relative"> = {}) {
    super(new Stream(capacity), opts);
  }
}

export class StringPointer extends BytesPointer<StringField> {
  constructor(capacity = 0, opts: StreamPointerOptions & Pick<PointerOptions, "relative"> = {}) {
    super(new StringField(capacity), opts);
  }
}

/**
 * Pointer to a NUL terminated string of unknown length. Reading fetches blocks
 * until the string is terminated, then shrinks the data to the text and its NUL.
 */
export class AutoStringPointer extends StringPointer {
  constructor(opts: StreamPointerOptions = {}) {
    super(AUTO_STRING_BLOCK_SIZE, opts);
  }

  readFrom(provider: Provider, opts: ReadOptions = {}): void {
    if (!isProvider(provider)) {
      throw new PointerError({code: PointerErrorCode.PROVIDER_TYPE, pointer: this.name, value: describeValue(provider)});
    }

    const {nullAllowed = false} = opts;
    const logger = opts.logger ?? getDefaultLogger();

    this.dataStream = new Uint8Array(0);
    this.resize(0);

    if (!nullAllowed && this.isNull()) {
      logger.debug("Null pointer, data reset", {pointer: this.name});
      this.deserializeData();
      return;
    }

    const limit = Math.min(provider.size ?? MAX_ADDRESS, MAX_ADDRESS);
    for (let address = this.address; address < limit; address += AUTO_STRING_BLOCK_SIZE) {
      const count = clamp(AUTO_STRING_BLOCK_SIZE, 0, limit - address);
      logger.debug("Read string block", {pointer: this.name, address, count});

      const bytes = provider.read(address, count);
      if (bytes.length !== count) {
        throw new PointerError({code: PointerErrorCode.READ_SIZE, pointer: this.name, address, expected: count, actual: bytes.length});
      }
      const stream = new ByteBuffer(this.dataStream);
      stream.append(bytes);
      this.dataStream = stream.toBytes();
      this.resize(this.length + count);

      const index = this.deserializeData();
      if (index.bit !== 0) {
        throw new ContainerError({code: ContainerErrorCode.LENGTH, container: this.name, byte: index.byte, bit: index.bit});
      }
      if (this.data.isTerminated()) {
        this.resize(this.data.value.length + 1);
        this.dataStream = this.dataStream.slice(0, this.length);
        break;
      }
    }
  }
}

export class StreamRelativePointer extends StreamPointer {
  constructor(capacity = 0, opts: StreamPointerOptions = {}) {
    super(capacity, {...opts, relative: true});
  }
}

export class StringRelativePointer extends StringPointer {
  constructor(capacity = 0, opts: StreamPointerOptions = {}) {
    super(capacity, {...opts, relative: true});
  }
}
