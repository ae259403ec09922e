import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { QpackEncoder } from "../../../src/qpack/encoder.js";
import { InstructionQueue } from "../../../src/qpack/instruction-queue.js";
import type { EncoderInstruction } from "../../../src/qpack/instructions.js";

describe("QpackEncoder", () => {
  let instructions: InstructionQueue<EncoderInstruction>;
  let encoder: QpackEncoder;

  beforeEach(() => {
    vi.spyOn(console, "debug").mockImplementation(() => {});
    instructions = new InstructionQueue<EncoderInstruction>();
    encoder = new QpackEncoder(instructions);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  function encode(streamId: number, fields: Array<[string, string]>): string {
    return encoder.encode(streamId, fields).toString("hex");
  }

  describe("without a dynamic table", () => {
    it("should use exact static matches", () => {
      expect(encode(0, [[":method", "GET"]])).toBe("0000d1");
      expect(instructions.isEmpty()).toBe(true);
    });

    it("should use static name references", () => {
      expect(encode(0, [[":path", "/index.html"]])).toBe("0000510b2f696e6465782e68746d6c");
    });

    it("should fall back to literal names", () => {
      expect(encode(0, [["x-custom", "1"]])).toBe("00002701782d637573746f6d0131");
      expect(instructions.isEmpty()).toBe(true);
    });

    it("should mark sensitive fields as never indexed", () => {
      expect(encode(0, [["authorization", "secret"]])).toBe("00007f4506736563726574");
    });
  });

  describe("with a dynamic table", () => {
    beforeEach(() => {
      encoder.setCapacity(220);
      expect(instructions.drain().toString("hex")).toBe("3fbd01");
    });

    it("should insert and reference new entries post-base", () => {
      const section = encode(4, [
        [":authority", "www.example.com"],
        [":path", "/sample/path"],
      ]);
      expect(section).toBe("03811011");
      expect(instructions.drain().toString("hex")).toBe(
        "c00f7777772e6578616d706c652e636f6d" + "c10c2f73616d706c652f70617468",
      );
      expect(encoder.blockedStreams).toBe(1);
      expect(encoder.dynamicTable.isReferenced(0)).toBe(true);
    });

    it("should reuse acknowledged entries with relative indices", () => {
      const fields: Array<[string, string]> = [
        [":authority", "www.example.com"],
        [":path", "/sample/path"],
      ];
      encode(4, fields);
      encoder.handleDecoderInstruction({ type: "insert-count-increment", increment: 2 });
      encoder.handleDecoderInstruction({ type: "section-acknowledgment", streamId: 4 });
      expect(encoder.knownReceivedCount).toBe(2);
      expect(encoder.blockedStreams).toBe(0);
      expect(encoder.dynamicTable.isReferenced(0)).toBe(false);
      instructions.drain();

      expect(encode(8, fields)).toBe("03008180");
      expect(instructions.isEmpty()).toBe(true);
    });

    it("should never insert sensitive or high-cardinality fields", () => {
      expect(encode(0, [["cookie", "a=b"]])).toBe("000075" + "03613d62");
      expect(encode(4, [["content-length", "1234"]])).toBe("0000540431323334");
      expect(instructions.isEmpty()).toBe(true);
      expect(encoder.dynamicTable.insertCount).toBe(0);
    });

    it("should not evict entries pinned by unacknowledged sections", () => {
      encoder.setCapacity(72);
      instructions.drain();
      encode(0, [["x-a", "1"]]);

      expect(
        encode(4, [
          ["x-b", "1"],
          ["x-c", "1"],
        ]),
      ).toBe("038010" + "23782d630131");
      expect(encoder.dynamicTable.insertCount).toBe(2);
    });

    it("should release pinned entries on stream cancellation", () => {
      encode(0, [["x-a", "1"]]);
      expect(encoder.dynamicTable.isReferenced(0)).toBe(true);

      encoder.handleDecoderInstruction({ type: "stream-cancellation", streamId: 0 });
      expect(encoder.dynamicTable.isReferenced(0)).toBe(false);
      expect(encoder.blockedStreams).toBe(0);
      expect(() => encoder.sectionAcknowledgment(0)).toThrow(expect.objectContaining({
        kind: "MALFORMED_INSTRUCTION",
      }));
    });

    it("should duplicate draining entries instead of referencing them", () => {
      encoder.setCapacity(200);
      for (const name of ["x-a", "x-b", "x-c", "x-d", "x-e"]) {
        encoder.insert([name, "1"]);
      }
      encoder.insertCountIncrement(5);
      instructions.drain();

      expect(encode(0, [["x-a", "1"]])).toBe("078010");
      expect(instructions.poll()).toEqual({ type: "duplicate", index: 4 });
      expect(encoder.dynamicTable.lookup(5)?.name).toBe("x-a");
      expect(encoder.dynamicTable.lookup(0)).toBeUndefined();
    });
  });

  describe("blocked streams budget", () => {
    beforeEach(() => {
      encoder = new QpackEncoder(instructions, { maxBlockedStreams: 1 });
      encoder.setCapacity(4096);
      instructions.drain();
    });

    it("should use literals once the budget is spent", () => {
      expect(encode(0, [["x-a", "1"]])).toBe("028010");
      expect(encoder.blockedStreams).toBe(1);

      expect(encode(4, [["x-a", "1"]])).toBe("000023782d610131");
      expect(encoder.blockedStreams).toBe(1);
      expect(instructions.size).toBe(1);
    });

    it("should let a blocking stream keep referencing new entries", () => {
      encode(0, [["x-a", "1"]]);
      expect(encode(0, [["x-b", "2"]])).toBe("038010");
      expect(encoder.blockedStreams).toBe(1);
    });

    it("should reference entries once the decoder acknowledges them", () => {
      encode(0, [["x-a", "1"]]);
      encoder.insertCountIncrement(1);
      expect(encoder.blockedStreams).toBe(0);

      expect(encode(8, [["x-a", "1"]])).toBe("020080");
      expect(encoder.blockedStreams).toBe(0);
    });
  });

  describe("speculative inserts", () => {
    beforeEach(() => {
      encoder.setCapacity(220);
      instructions.drain();
    });

    it("should pick the cheapest insert instruction", () => {
      const entry = encoder.insert(["custom-key", "custom-value"]);
      expect(entry).toEqual({
        name: "custom-key",
        value: "custom-value",
        absoluteIndex: 0,
        size: 54,
      });
      encoder.insert(["custom-key", "other"]);
      encoder.insert([":path", "/x"]);

      expect(instructions.poll()).toEqual({
        type: "insert-with-literal-name",
        name: "custom-key",
        value: "custom-value",
      });
      expect(instructions.poll()).toEqual({
        type: "insert-with-name-reference",
        isStatic: false,
        index: 0,
        value: "other",
      });
      expect(instructions.poll()).toEqual({
        type: "insert-with-name-reference",
        isStatic: true,
        index: 1,
        value: "/x",
      });
    });

    it("should encode B.3 speculative insert", () => {
      encoder.insert(["custom-key", "custom-value"]);
      expect(instructions.drain().toString("hex")).toBe(
        "4a637573746f6d2d6b65790c637573746f6d2d76616c7565",
      );
      encoder.insertCountIncrement(1);
      expect(encoder.knownReceivedCount).toBe(1);
    });
  });

  describe("errors", () => {
    it("should reject a capacity above the maximum", () => {
      const limited = new QpackEncoder(instructions, { maxTableCapacity: 100 });
      expect(() => limited.setCapacity(200)).toThrow(expect.objectContaining({
        kind: "CAPACITY_VIOLATION",
        message: "Capacity 200 exceeds maximum table capacity 100",
      }));
      expect(instructions.isEmpty()).toBe(true);
    });

    it("should reject acknowledgments without an outstanding section", () => {
      expect(() => encoder.sectionAcknowledgment(4)).toThrow(expect.objectContaining({
        kind: "MALFORMED_INSTRUCTION",
        message: "Section Acknowledgment for stream 4 without an outstanding field section",
      }));
    });

    it("should reject increments beyond the insert count", () => {
      expect(() => encoder.insertCountIncrement(1)).toThrow(expect.objectContaining({
        kind: "MALFORMED_INSTRUCTION",
      }));
    });

    it("should acknowledge sections in order per stream", () => {
      encoder.encode(0, [[":method", "GET"]]);
      encoder.encode(0, [[":method", "GET"]]);
      encoder.sectionAcknowledgment(0);
      encoder.sectionAcknowledgment(0);
      expect(() => encoder.sectionAcknowledgment(0)).toThrow(expect.objectContaining({
        kind: "MALFORMED_INSTRUCTION",
      }));
    });

    it("should pair acknowledgments with non-zero sections when the peer skips empty ones", () => {
      encoder = new QpackEncoder(instructions, { acknowledgeEmptySections: false });
      encoder.setCapacity(220);
      instructions.drain();

      expect(encode(0, [[":method", "GET"]])).toBe("0000d1");
      encode(0, [[":authority", "www.example.com"]]);
      expect(encoder.dynamicTable.isReferenced(0)).toBe(true);
      expect(encode(0, [[":method", "GET"]])).toBe("0000d1");

      encoder.handleDecoderInstruction({ type: "section-acknowledgment", streamId: 0 });
      expect(encoder.dynamicTable.isReferenced(0)).toBe(false);
      expect(encoder.knownReceivedCount).toBe(1);
      expect(encoder.blockedStreams).toBe(0);
      expect(() => encoder.sectionAcknowledgment(0)).toThrow(expect.objectContaining({
        kind: "MALFORMED_INSTRUCTION",
        message: "Section Acknowledgment for stream 0 without an outstanding field section",
      }));
    });
  });
});
