/**
 * Loopback example for qpack-engine.
 *
 * Wires an encoder and a decoder together in one process: encoder-stream
 * and decoder-stream bytes are handed across directly, and the field
 * section for stream 0 is delivered before the inserts it depends on, so
 * the decoder blocks and completes once the encoder stream catches up.
 *
 *   npm run example
 */
import {
  QpackEncoder,
  QpackDecoder,
  EncoderInstructionParser,
  DecoderInstructionParser,
  InstructionQueue,
  type DecoderInstruction,
  type EncoderInstruction,
  type HeaderField,
} from "../src/index.js";

const encoderStream = new InstructionQueue<EncoderInstruction>(true);
const decoderStream = new InstructionQueue<DecoderInstruction>();

const encoder = new QpackEncoder(encoderStream, { huffman: true });
const decoder = new QpackDecoder({
  onHeaderFieldSet(streamId: number, fields: HeaderField[]) {
    console.log(`stream ${streamId}:`);
    for (const [name, value] of fields) {
      console.log(`  ${name}: ${value}`);
    }
  },
  onInstruction(instruction: DecoderInstruction) {
    decoderStream.onInstruction(instruction);
  },
});

const encoderParser = new EncoderInstructionParser(decoder);
const decoderParser = new DecoderInstructionParser(encoder);

encoder.setCapacity(4096);

const request: HeaderField[] = [
  [":method", "GET"],
  [":scheme", "https"],
  [":authority", "example.com"],
  [":path", "/index.html"],
  ["user-agent", "qpack-loopback/0.1"],
  ["accept-language", "en-US"],
];

const section = encoder.encode(0, request);
const instructions = encoderStream.drain();
console.log(`field section: ${section.length} bytes, encoder stream: ${instructions.length} bytes`);

// Field section first: the decoder has to wait for the inserts
const immediate = decoder.decode(0, section);
console.log(`decoded immediately: ${immediate !== null}`);

encoderParser.feed(instructions);
decoderParser.feed(decoderStream.drain());

// Same fields again: now served from the dynamic table
const repeat = encoder.encode(4, request);
console.log(`repeat field section: ${repeat.length} bytes`);
decoder.decode(4, repeat);
decoderParser.feed(decoderStream.drain());

console.log(
  `known received count ${encoder.knownReceivedCount}, blocked streams ${encoder.blockedStreams}`,
);
