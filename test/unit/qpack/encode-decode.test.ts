import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { QpackEncoder, type EncoderOptions } from "../../../src/qpack/encoder.js";
import { QpackDecoder, type DecoderOptions } from "../../../src/qpack/decoder.js";
import {
  EncoderInstructionParser,
  DecoderInstructionParser,
} from "../../../src/qpack/instruction-parser.js";
import { InstructionQueue } from "../../../src/qpack/instruction-queue.js";
import type { EncoderInstruction } from "../../../src/qpack/instructions.js";
import type { HeaderField } from "../../../src/qpack/types.js";
import { hex, RecordingDecoderHandler } from "./helpers.js";

/** An encoder and decoder joined by their instruction streams */
class Loopback {
  readonly encoderStream: InstructionQueue<EncoderInstruction>;
  readonly decoderHandler = new RecordingDecoderHandler();
  readonly encoder: QpackEncoder;
  readonly decoder: QpackDecoder;
  readonly encoderParser: EncoderInstructionParser;
  readonly decoderParser: DecoderInstructionParser;

  constructor(encoderOptions: EncoderOptions = {}, decoderOptions: DecoderOptions = {}) {
    this.encoderStream = new InstructionQueue<EncoderInstruction>(encoderOptions.huffman);
    this.encoder = new QpackEncoder(this.encoderStream, encoderOptions);
    this.decoder = new QpackDecoder(this.decoderHandler, decoderOptions);
    this.encoderParser = new EncoderInstructionParser(this.decoder);
    this.decoderParser = new DecoderInstructionParser(this.encoder);
  }

  flushEncoderStream(): void {
    this.encoderParser.feed(this.encoderStream.drain());
  }

  flushDecoderStream(): void {
    this.decoderParser.feed(this.decoderHandler.instructions.drain());
  }

  /** Send a header field set, delivering the encoder stream first */
  send(streamId: number, fields: HeaderField[]): HeaderField[] | null {
    const section = this.encoder.encode(streamId, fields);
    this.flushEncoderStream();
    const decoded = this.decoder.decode(streamId, section);
    this.flushDecoderStream();
    return decoded;
  }
}

const REQUEST: HeaderField[] = [
  [":method", "POST"],
  [":scheme", "https"],
  [":authority", "api.example.test"],
  [":path", "/v1/items?page=2"],
  ["content-type", "application/json"],
  ["content-length", "512"],
  ["authorization", "Bearer test-secret"],
  ["accept", "*/*"],
  ["x-trace", "a"],
  ["x-trace", "b"],
  ["x-empty", ""],
  ["x-greeting", "grüße"],
];

describe("Encoder and decoder", () => {
  beforeEach(() => {
    vi.spyOn(console, "debug").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should reproduce RFC 9204 Appendix B", () => {
    const loop = new Loopback({ maxBlockedStreams: 5 });
    const { encoder, decoder, encoderStream, decoderHandler } = loop;

    // B.1 Literal Field Line With Name Reference
    let fields: HeaderField[] = [[":path", "/index.html"]];
    let section = encoder.encode(0, fields);
    expect(section.toString("hex")).toBe("0000510b2f696e6465782e68746d6c");
    expect(encoderStream.isEmpty()).toBe(true);

    expect(decoder.decode(0, section)).toEqual(fields);
    expect(decoderHandler.instructions.poll()).toEqual({
      type: "section-acknowledgment",
      streamId: 0,
    });
    loop.decoderParser.feed(hex("80"));

    // B.2 Dynamic Table
    encoder.setCapacity(220);
    expect(encoderStream.drain().toString("hex")).toBe("3fbd01");
    loop.encoderParser.feed(hex("3fbd01"));
    expect(decoder.dynamicTable.capacity).toBe(220);

    fields = [
      [":authority", "www.example.com"],
      [":path", "/sample/path"],
    ];
    section = encoder.encode(4, fields);
    expect(encoderStream.poll()).toEqual({
      type: "insert-with-name-reference",
      isStatic: true,
      index: 0,
      value: "www.example.com",
    });
    expect(encoderStream.poll()).toEqual({
      type: "insert-with-name-reference",
      isStatic: true,
      index: 1,
      value: "/sample/path",
    });

    expect(decoder.decode(4, section)).toBeNull();
    loop.encoderParser.feed(hex("c00f7777772e6578616d706c652e636f6d"));
    expect(decoderHandler.sections).toHaveLength(1);
    loop.encoderParser.feed(hex("c10c2f73616d706c652f70617468"));
    expect(decoderHandler.sections[1]).toEqual([4, fields]);
    expect(decoderHandler.instructions.drain().toString("hex")).toBe("010184");

    loop.decoderParser.feed(hex("02 84"));
    expect(encoder.knownReceivedCount).toBe(2);
    expect(encoder.blockedStreams).toBe(0);

    // B.3 Speculative Insert
    encoder.insert(["custom-key", "custom-value"]);
    expect(encoderStream.drain().toString("hex")).toBe(
      "4a637573746f6d2d6b65790c637573746f6d2d76616c7565",
    );
    encoder.insertCountIncrement(1);
    expect(encoder.knownReceivedCount).toBe(3);
  });

  it("should round-trip header field sets", () => {
    const loop = new Loopback();
    loop.encoder.setCapacity(4096);

    for (let streamId = 0; streamId < 40; streamId += 4) {
      expect(loop.send(streamId, REQUEST)).toEqual(REQUEST);
    }
    expect(loop.decoderHandler.sections).toHaveLength(10);
    expect(loop.encoder.blockedStreams).toBe(0);
    expect(loop.decoder.dynamicTable.insertCount).toBe(loop.encoder.dynamicTable.insertCount);
  });

  it("should round-trip with Huffman coding", () => {
    const loop = new Loopback({ huffman: true });
    loop.encoder.setCapacity(1024);
    expect(loop.send(0, REQUEST)).toEqual(REQUEST);
    expect(loop.send(4, REQUEST)).toEqual(REQUEST);
  });

  it("should round-trip without a dynamic table", () => {
    const loop = new Loopback({ maxTableCapacity: 0 }, { maxTableCapacity: 0 });
    expect(loop.send(0, REQUEST)).toEqual(REQUEST);
    expect(loop.encoderStream.isEmpty()).toBe(true);
  });

  it("should survive Required Insert Count wrap-around", () => {
    const options = { maxTableCapacity: 128 };
    const loop = new Loopback(options, options);
    loop.encoder.setCapacity(128);

    for (let i = 0; i < 30; i++) {
      const fields: HeaderField[] = [
        ["x-seq", String(i % 10)],
        [":path", `/p${i}`],
      ];
      expect(loop.send(i * 4, fields)).toEqual(fields);
      expect(loop.encoder.dynamicTable.size).toBeLessThanOrEqual(128);
    }
    expect(loop.encoder.dynamicTable.insertCount).toBeGreaterThan(8);
    expect(loop.decoder.dynamicTable.insertCount).toBe(loop.encoder.dynamicTable.insertCount);
  });

  it("should decode sections that arrive before their inserts", () => {
    const loop = new Loopback();
    loop.encoder.setCapacity(4096);
    loop.flushEncoderStream();

    const first = loop.encoder.encode(0, REQUEST);
    const second = loop.encoder.encode(4, [["x-trace", "a"]]);
    expect(loop.decoder.decode(0, first)).toBeNull();
    expect(loop.decoder.decode(4, second)).toBeNull();
    expect(loop.decoder.blockedStreams).toBe(2);

    // stream 4 only needs the third insert, so it completes first
    loop.flushEncoderStream();
    expect(loop.decoderHandler.sections).toEqual([
      [4, [["x-trace", "a"]]],
      [0, REQUEST],
    ]);
    loop.flushDecoderStream();
    expect(loop.encoder.blockedStreams).toBe(0);
    expect(loop.encoder.knownReceivedCount).toBe(loop.encoder.dynamicTable.insertCount);
  });

  it("should keep encoder and decoder in step after a cancellation", () => {
    const loop = new Loopback();
    loop.encoder.setCapacity(4096);
    loop.flushEncoderStream();

    const section = loop.encoder.encode(0, REQUEST);
    loop.decoder.decode(0, section);
    loop.decoder.cancelStream(0);
    loop.flushDecoderStream();
    expect(loop.encoder.blockedStreams).toBe(0);

    loop.flushEncoderStream();
    loop.flushDecoderStream();
    expect(loop.send(4, REQUEST)).toEqual(REQUEST);
    expect(loop.encoder.knownReceivedCount).toBe(loop.encoder.dynamicTable.insertCount);
  });
});
