import { TransportError } from '../../src/types';
import { ByteChannel, FrameBuilder } from '../../src/utils/codec';
import { RpcValue, Sentinel, TypeTag } from '../../src/utils/transport';

// In-memory ByteChannel: reads are served from fed bytes, writes are recorded.
export class MemoryChannel implements ByteChannel {
  closed = false;
  readonly writes: Buffer[] = [];
  private incoming: Buffer;
  private failingWrites = 0;

  constructor(incoming: Buffer = Buffer.alloc(0)) {
    this.incoming = Buffer.from(incoming);
  }

  get remaining(): number {
    return this.incoming.length;
  }

  get written(): Buffer {
    return Buffer.concat(this.writes);
  }

  feed(data: Buffer): void {
    this.incoming = Buffer.concat([this.incoming, data]);
  }

  failNextWrites(count: number): void {
    this.failingWrites = count;
  }

  async write(data: Buffer): Promise<void> {
    if (this.closed) {
      throw new TransportError('Cannot write: connection is closed');
    }
    if (this.failingWrites > 0) {
      this.failingWrites -= 1;
      throw new TransportError('Write failed');
    }
    this.writes.push(Buffer.from(data));
  }

  async readExact(length: number): Promise<Buffer> {
    if (this.incoming.length < length) {
      throw new TransportError(`Connection closed after ${this.incoming.length} of ${length} bytes`);
    }
    const out = this.incoming.subarray(0, length);
    this.incoming = this.incoming.subarray(length);
    return Buffer.from(out);
  }

  close(): void {
    this.closed = true;
  }
}

export function int32Bytes(...values: number[]): Buffer {
  const frame = new FrameBuilder();
  values.forEach(value => frame.int32(value));
  return frame.toBuffer();
}

// Reply frame as the emulator's automation server writes it.
export function encodeReply(values: readonly RpcValue[]): Buffer {
  const frame = new FrameBuilder().int32(Sentinel.REPLY_TAG);
  for (const value of values) {
    switch (value.type) {
      case 'int32':
        frame.int32(TypeTag.INT32).int32(value.value);
        break;
      case 'uint32':
        frame.int32(TypeTag.UINT32).uint32(value.value);
        break;
      case 'string':
        frame.int32(TypeTag.STRING).string(value.value);
        break;
      case 'bytes':
        frame.int32(TypeTag.BYTE_ARRAY).int32(TypeTag.BYTE).uint32(value.value.length).bytes(value.value);
        break;
    }
  }
  return frame.int32(Sentinel.CALL_END).int32(Sentinel.REPLY_ACK).toBuffer();
}
