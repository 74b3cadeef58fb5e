/**
 * @fxwallet/store — Single JSON document on disk.
 *
 * Writes are atomic: the document goes to a temporary file beside the
 * target, which is then renamed over it. A reader sees either the old
 * document or the new one, never a torn write.
 *
 * Reads validate the document against a zod schema. A missing file
 * yields the fallback value; a malformed one is an error.
 */

import {
  existsSync,
  mkdirSync,
  readFileSync,
  renameSync,
  rmSync,
  writeFileSync,
} from "node:fs";
import { dirname } from "node:path";
import type { z } from "zod";
import { StoreError } from "./types.js";

export interface JsonFileStoreOptions<T> {
  /** Path to the JSON file */
  readonly filePath: string;

  /** Validates what is read and shapes it into T */
  readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>;

  /** Value used while the file does not exist */
  readonly fallback: () => T;
}

export class JsonFileStore<T> {
  private readonly _filePath: string;
  private readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  private readonly fallback: () => T;

  constructor(options: JsonFileStoreOptions<T>) {
    this._filePath = options.filePath;
    this.schema = options.schema;
    this.fallback = options.fallback;
  }

  read(): T {
    if (!existsSync(this._filePath)) {
      return this.fallback();
    }

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(this._filePath, "utf-8"));
    } catch (err) {
      if (err instanceof SyntaxError) {
        throw new StoreError(
          "INVALID_DOCUMENT",
          `${this._filePath} is not valid JSON: ${err.message}`,
          this._filePath,
          err,
        );
      }
      throw new StoreError("READ_FAILED", `Cannot read ${this._filePath}`, this._filePath, err);
    }

    const parsed = this.schema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
        .join("; ");
      throw new StoreError(
        "INVALID_DOCUMENT",
        `${this._filePath} does not match the expected format: ${issues}`,
        this._filePath,
        parsed.error,
      );
    }
    return parsed.data;
  }

  /**
   * Replace the document.
   */
  write(value: T): void {
    const tmp = `${this._filePath}.${String(process.pid)}.tmp`;
    try {
      mkdirSync(dirname(this._filePath), { recursive: true });
      writeFileSync(tmp, JSON.stringify(value, null, 2) + "\n", "utf-8");
      renameSync(tmp, this._filePath);
    } catch (err) {
      if (existsSync(tmp)) rmSync(tmp, { force: true });
      throw new StoreError("WRITE_FAILED", `Cannot write ${this._filePath}`, this._filePath, err);
    }
  }

  get filePath(): string {
    return this._filePath;
  }
}
