/**
 * Incremental parsers for the QPACK encoder and decoder streams.
 *
 * Instruction streams may be split at arbitrary byte boundaries. Bytes fed
 * via feed() are appended to a carried buffer; every complete instruction
 * is dispatched to the handler in order and incomplete trailing bytes wait
 * for the next feed(). Any error is fatal for the connection: the parser
 * keeps rethrowing it.
 */
import { Buffer } from "node:buffer";
import { ErrorCode, DEFAULT_MAX_INSTRUCTION_STRING_LENGTH } from "./constants.js";
import { QpackError } from "./errors.js";
import type { Decoded } from "./integer.js";
import {
  decodeEncoderInstruction,
  decodeDecoderInstruction,
  type EncoderInstruction,
  type DecoderInstruction,
} from "./instructions.js";

/** Receives instructions read from the encoder stream (implemented by the decoder) */
export interface EncoderInstructionHandler {
  handleEncoderInstruction(instruction: EncoderInstruction): void;
}

/** Receives instructions read from the decoder stream (implemented by the encoder) */
export interface DecoderInstructionHandler {
  handleDecoderInstruction(instruction: DecoderInstruction): void;
}

abstract class InstructionParser<T> {
  private buffer: Buffer = Buffer.alloc(0);
  private error: QpackError | null = null;

  constructor(private readonly errorCode: ErrorCode) {}

  /** Octets carried over, waiting for the rest of an instruction */
  get bufferedLength(): number {
    return this.buffer.length;
  }

  /** Feed raw stream data into the parser */
  feed(data: Buffer | Uint8Array): void {
    if (this.error) throw this.error;
    if (data.length === 0) return;

    // concat copies, so callers may reuse their buffer
    this.buffer = Buffer.concat([this.buffer, data]);

    let offset = 0;
    try {
      while (offset < this.buffer.length) {
        const decoded = this.decode(this.buffer, offset);
        if (!decoded) break;
        offset = decoded.offset;
        this.dispatch(decoded.value);
      }
    } catch (err) {
      this.error = QpackError.onStream(err, this.errorCode);
      throw this.error;
    }

    this.buffer = this.buffer.subarray(offset);
  }

  /** Signal the end of the stream; a partial instruction is an error */
  end(): void {
    if (this.error) throw this.error;
    if (this.buffer.length > 0) {
      this.error = new QpackError(
        "MALFORMED_INSTRUCTION",
        `Stream ended inside an instruction (${this.buffer.length} octets pending)`,
        this.errorCode,
      );
      throw this.error;
    }
  }

  protected abstract decode(buf: Buffer, offset: number): Decoded<T> | null;

  protected abstract dispatch(instruction: T): void;
}

/** Parses the encoder stream and applies instructions through the decoder */
export class EncoderInstructionParser extends InstructionParser<EncoderInstruction> {
  constructor(
    private readonly handler: EncoderInstructionHandler,
    private readonly maxStringLength: number = DEFAULT_MAX_INSTRUCTION_STRING_LENGTH,
  ) {
    super(ErrorCode.ENCODER_STREAM_ERROR);
  }

  protected decode(buf: Buffer, offset: number): Decoded<EncoderInstruction> | null {
    return decodeEncoderInstruction(buf, offset, this.maxStringLength);
  }

  protected dispatch(instruction: EncoderInstruction): void {
    this.handler.handleEncoderInstruction(instruction);
  }
}

/** Parses the decoder stream and hands acknowledgments to the encoder */
export class DecoderInstructionParser extends InstructionParser<DecoderInstruction> {
  constructor(private readonly handler: DecoderInstructionHandler) {
    super(ErrorCode.DECODER_STREAM_ERROR);
  }

  protected decode(buf: Buffer, offset: number): Decoded<DecoderInstruction> | null {
    return decodeDecoderInstruction(buf, offset);
  }

  protected dispatch(instruction: DecoderInstruction): void {
    this.handler.handleDecoderInstruction(instruction);
  }
}
