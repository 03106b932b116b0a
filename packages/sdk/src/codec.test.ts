import { describe, it, expect } from "vitest";
import { ZodError } from "zod";
import { JsonPayloadCodec, fromJSON, toJSON, MODEL_CONFIG_DOC_TYPE } from "./codec.js";
import { CanonicalFormError } from "./format/canonical.js";
import type { ModelConfig } from "./types.js";

const minimal: ModelConfig = {
  modelId: "m1",
  createdBy: "u",
  version: "1",
  createTime: 7,
  tags: ["a"],
  input: { fieldNames: ["f"] },
};

const encodeText = (value: unknown) => new TextEncoder().encode(JSON.stringify(value));

describe("JsonPayloadCodec", () => {
  const codec = new JsonPayloadCodec();

  describe("encode()", () => {
    it("should write canonical snake_case JSON with the storage marker", () => {
      const text = new TextDecoder().decode(codec.encode(minimal));

      expect(text).toBe(
        '{"create_time":7,"created_by":"u","doc_type":"trained_model_config",' +
          '"input":{"field_names":["f"]},"model_id":"m1","tags":["a"],"version":"1"}\n'
      );
    });

    it("should produce identical bytes regardless of key insertion order", () => {
      const a = codec.encode({ ...minimal, metadata: { b: 1, a: 2 } });
      const b = codec.encode({ ...minimal, metadata: { a: 2, b: 1 } });

      expect(Buffer.from(a).equals(Buffer.from(b))).toBe(true);
    });

    it("should reject configs the decoder would refuse", () => {
      expect(() => codec.encode({ ...minimal, createTime: 1.5 })).toThrow(ZodError);
      expect(() => codec.encode({ ...minimal, createTime: -1 })).toThrow(ZodError);
      expect(() => codec.encode({ ...minimal, modelId: "" })).toThrow(ZodError);
    });

    it("should throw for values JSON cannot represent", () => {
      expect(() => codec.encode({ ...minimal, metadata: { score: Number.NaN } })).toThrow(
        CanonicalFormError
      );
    });
  });

  describe("decode()", () => {
    it("should round-trip every field", () => {
      const full: ModelConfig = {
        ...minimal,
        description: "full",
        metadata: { nested: { deep: [1, 2] } },
        definition: { preprocessors: [], trained_model: { tree: {} } },
      };

      expect(codec.decode(codec.encode(full), { lenient: false })).toEqual(full);
    });

    it("should drop unknown fields at every level when lenient", () => {
      const payload = encodeText({
        model_id: "m1",
        created_by: "u",
        version: "1",
        create_time: 7,
        input: { field_names: ["f"], extra: true },
        future_field: "ignored",
      });

      const config = codec.decode(payload, { lenient: true });
      expect(config).toEqual({ ...minimal, tags: [] });
      expect(Object.keys(config)).not.toContain("future_field");
    });

    it("should reject unknown fields when strict", () => {
      const payload = encodeText({ ...toJSON(minimal), future_field: "x" });

      expect(() => codec.decode(payload, { lenient: false })).toThrow(ZodError);
    });

    it("should reject a foreign doc_type even when lenient", () => {
      const payload = encodeText({ ...toJSON(minimal), doc_type: "something_else" });

      expect(() => codec.decode(payload, { lenient: true })).toThrow(ZodError);
    });

    it("should reject invalid UTF-8", () => {
      expect(() => codec.decode(new Uint8Array([0xff, 0xfe]), { lenient: true })).toThrow(TypeError);
    });

    it("should reject JSON that is not an object", () => {
      expect(() => codec.decode(encodeText(42), { lenient: true })).toThrow(ZodError);
    });
  });

  it("should use model_id as the id field", () => {
    expect(codec.idField).toBe("model_id");
  });
});

describe("toJSON / fromJSON", () => {
  it("should only add doc_type for storage", () => {
    expect(toJSON(minimal).doc_type).toBeUndefined();
    expect(toJSON(minimal, true).doc_type).toBe(MODEL_CONFIG_DOC_TYPE);
  });

  it("should default tags to an empty list", () => {
    const stored = toJSON(minimal);
    delete stored.tags;

    expect(fromJSON(stored, { lenient: false }).tags).toEqual([]);
  });

  it("should reject an empty model_id", () => {
    expect(() => fromJSON({ ...toJSON(minimal), model_id: "" }, { lenient: true })).toThrow(ZodError);
  });
});
