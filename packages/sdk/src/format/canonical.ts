/**
 * Canonical JSON payload writing
 *
 * Invariants:
 * - Pure: the same value always produces the same bytes
 * - Compact output, object keys in code point order, one trailing LF
 * - Values JSON cannot represent faithfully (NaN, Infinity, bigint, functions,
 *   symbols, cycles) are rejected instead of silently dropped or nulled
 * - A PayloadWriter is closed on every exit path of withPayloadWriter
 */

/**
 * Raised when a value has no canonical JSON form
 */
export class CanonicalFormError extends Error {
  constructor(
    public readonly pointer: string,
    message: string
  ) {
    super(`${message} at ${pointer === "" ? "/" : pointer}`);
    this.name = "CanonicalFormError";
  }
}

/**
 * Growable UTF-8 buffer for a single payload. Must be closed after use.
 */
export class PayloadWriter {
  #chunks: string[] = [];
  #closed = false;

  get closed(): boolean {
    return this.#closed;
  }

  write(text: string): void {
    if (this.#closed) {
      throw new Error("PayloadWriter is closed");
    }
    this.#chunks.push(text);
  }

  toBytes(): Uint8Array {
    if (this.#closed) {
      throw new Error("PayloadWriter is closed");
    }
    return new TextEncoder().encode(this.#chunks.join(""));
  }

  close(): void {
    this.#chunks = [];
    this.#closed = true;
  }
}

/**
 * Acquire a writer for the duration of `fn`, releasing it however `fn` exits
 */
export function withPayloadWriter<T>(fn: (writer: PayloadWriter) => T): T {
  const writer = new PayloadWriter();
  try {
    return fn(writer);
  } finally {
    writer.close();
  }
}

const escapePointer = (key: string): string => key.replace(/~/g, "~0").replace(/\//g, "~1");

/**
 * Write `input` to `writer` in canonical JSON form
 * @throws CanonicalFormError if the value has no JSON representation
 */
export function writeCanonical(writer: PayloadWriter, input: unknown): void {
  const seen = new WeakSet<object>();

  const compareKeys = (a: string, b: string): number => {
    if (a === b) return 0;
    return a < b ? -1 : 1;
  };

  const normalize = (value: unknown, pointer: string): unknown => {
    switch (typeof value) {
      case "string":
      case "boolean":
        return value;
      case "number":
        if (!Number.isFinite(value)) {
          throw new CanonicalFormError(pointer, `Non-finite number ${value}`);
        }
        return value;
      case "bigint":
      case "function":
      case "symbol":
      case "undefined":
        throw new CanonicalFormError(pointer, `Unsupported value of type ${typeof value}`);
    }

    if (value === null || typeof value !== "object") {
      return null;
    }

    if (seen.has(value)) {
      throw new CanonicalFormError(pointer, "Circular reference detected");
    }
    seen.add(value);

    try {
      if (Array.isArray(value)) {
        return value.map((item: unknown, i) => normalize(item, `${pointer}/${i}`));
      }

      const record = new Map<string, unknown>(Object.entries(value));
      const normalized: Record<string, unknown> = {};
      for (const key of [...record.keys()].sort(compareKeys)) {
        const child = record.get(key);
        // Absent optional fields are omitted, as JSON.stringify would
        if (child === undefined) continue;
        normalized[key] = normalize(child, `${pointer}/${escapePointer(key)}`);
      }
      return normalized;
    } finally {
      seen.delete(value);
    }
  };

  writer.write(JSON.stringify(normalize(input, "")) + "\n");
}
