/**
 * @fxwallet/store — Error types.
 */

export type StoreErrorCode =
  | "READ_FAILED"
  | "WRITE_FAILED"
  | "INVALID_DOCUMENT";

/**
 * Raised when a data file cannot be read, parsed or written.
 */
export class StoreError extends Error {
  public readonly code: StoreErrorCode;
  public readonly filePath: string;

  constructor(code: StoreErrorCode, message: string, filePath: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "StoreError";
    this.code = code;
    this.filePath = filePath;
  }
}
