export type BinlayoutErrorMetaData = Record<string, string | number | null>;
export type BinlayoutErrorObject = BinlayoutErrorMetaData & {stack: string};

/**
 * Generic error with attached metadata. `type.code` identifies the error kind,
 * the remaining properties of `type` describe where it happened.
 */
export class BinlayoutError<T extends {code: string}> extends Error {
  type: T;
  constructor(type: T, message?: string) {
    super(message || type.code);
    this.type = type;
  }

  getMetadata(): BinlayoutErrorMetaData {
    const metadata: BinlayoutErrorMetaData = {};
    for (const [key, value] of Object.entries(this.type)) {
      if (typeof value === "string" || typeof value === "number" || value === null) {
        metadata[key] = value;
      } else if (value !== undefined) {
        metadata[key] = String(value);
      }
    }
    return metadata;
  }

  /**
   * Get the metadata and the stacktrace for the error.
   */
  toObject(): BinlayoutErrorObject {
    return {
      // Ignore message since it's rendered from the metadata
      ...this.getMetadata(),
      stack: this.stack || "",
    };
  }
}
