import { Socket } from 'net';
import { ProtocolError, TransportError } from '../types';

export const INT32_MIN = -0x80000000;
export const INT32_MAX = 0x7fffffff;
export const UINT32_MAX = 0xffffffff;

/**
 * A connected byte stream. Reads are all-or-nothing: `readExact` resolves with
 * exactly `length` bytes or rejects with a TransportError.
 */
export interface ByteChannel {
  readonly closed: boolean;
  write(data: Buffer): Promise<void>;
  readExact(length: number): Promise<Buffer>;
  close(): void;
}

interface PendingRead {
  length: number;
  resolve: (data: Buffer) => void;
  reject: (error: Error) => void;
}

/**
 * ByteChannel over a connected net.Socket. Incoming chunks are buffered until a
 * read asks for them; only one read may wait at a time.
 */
export class SocketChannel implements ByteChannel {
  private chunks: Buffer[] = [];
  private available = 0;
  private pending?: PendingRead;
  private failure?: TransportError;
  private ended = false;

  constructor(private readonly socket: Socket) {
    socket.on('data', (chunk: Buffer) => {
      this.chunks.push(chunk);
      this.available += chunk.length;
      this.settle();
    });
    socket.on('end', () => {
      this.ended = true;
      this.settle();
    });
    socket.on('close', () => {
      this.ended = true;
      this.settle();
    });
    socket.on('error', (error: NodeJS.ErrnoException) => {
      this.failure = new TransportError(`Socket error: ${error.message}`, { code: error.code });
      this.settle();
    });
  }

  get closed(): boolean {
    return this.ended || this.failure !== undefined || this.socket.destroyed;
  }

  write(data: Buffer): Promise<void> {
    if (this.closed) {
      return Promise.reject(new TransportError('Cannot write: connection is closed'));
    }

    return new Promise((resolve, reject) => {
      this.socket.write(data, error => {
        if (error) {
          reject(new TransportError(`Write of ${data.length} bytes failed: ${error.message}`));
          return;
        }
        resolve();
      });
    });
  }

  readExact(length: number): Promise<Buffer> {
    if (length === 0) {
      return Promise.resolve(Buffer.alloc(0));
    }
    if (this.pending) {
      return Promise.reject(new TransportError('Another read is already waiting on this connection'));
    }
    if (this.available >= length) {
      return Promise.resolve(this.take(length));
    }
    if (this.closed) {
      return Promise.reject(this.shortRead(length));
    }

    return new Promise((resolve, reject) => {
      this.pending = { length, resolve, reject };
    });
  }

  close(): void {
    this.ended = true;
    this.socket.destroy();
    this.settle();
  }

  private settle(): void {
    const pending = this.pending;
    if (!pending) {
      return;
    }

    if (this.available >= pending.length) {
      this.pending = undefined;
      pending.resolve(this.take(pending.length));
    } else if (this.closed) {
      this.pending = undefined;
      pending.reject(this.shortRead(pending.length));
    }
  }

  private shortRead(length: number): TransportError {
    return (
      this.failure ??
      new TransportError(`Connection closed after ${this.available} of ${length} bytes`)
    );
  }

  private take(length: number): Buffer {
    const joined = this.chunks.length === 1 ? this.chunks[0] : Buffer.concat(this.chunks, this.available);
    // Copy so callers own their bytes and the receive buffer can be released.
    const out = Buffer.from(joined.subarray(0, length));
    const rest = joined.subarray(length);
    this.chunks = rest.length > 0 ? [rest] : [];
    this.available = rest.length;
    return out;
  }
}

function checkInteger(value: number, min: number, max: number, kind: string): void {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new RangeError(`${value} is not a valid ${kind}`);
  }
}

export function encodeInt32(value: number): Buffer {
  checkInteger(value, INT32_MIN, INT32_MAX, 'int32');
  const data = Buffer.alloc(4);
  data.writeInt32BE(value, 0);
  return data;
}

export function encodeUInt32(value: number): Buffer {
  checkInteger(value, 0, UINT32_MAX, 'uint32');
  const data = Buffer.alloc(4);
  data.writeUInt32BE(value, 0);
  return data;
}

export function encodeString(value: string): Buffer {
  const bytes = Buffer.from(value, 'utf8');
  return Buffer.concat([encodeInt32(bytes.length), bytes]);
}

// Assembles a whole frame so it reaches the socket in a single write.
export class FrameBuilder {
  private parts: Buffer[] = [];
  private size = 0;

  int32(value: number): this {
    return this.push(encodeInt32(value));
  }

  uint32(value: number): this {
    return this.push(encodeUInt32(value));
  }

  string(value: string): this {
    return this.push(encodeString(value));
  }

  bytes(value: Buffer): this {
    return this.push(value);
  }

  get length(): number {
    return this.size;
  }

  toBuffer(): Buffer {
    return Buffer.concat(this.parts, this.size);
  }

  private push(part: Buffer): this {
    this.parts.push(part);
    this.size += part.length;
    return this;
  }
}

async function writeAll(channel: ByteChannel, data: Buffer): Promise<void> {
  if (channel.closed) {
    throw new TransportError('Cannot write: connection is closed');
  }
  await channel.write(data);
}

export async function writeInt32(channel: ByteChannel, value: number): Promise<void> {
  await writeAll(channel, encodeInt32(value));
}

export async function writeUInt32(channel: ByteChannel, value: number): Promise<void> {
  await writeAll(channel, encodeUInt32(value));
}

export async function writeString(channel: ByteChannel, value: string): Promise<void> {
  await writeAll(channel, encodeString(value));
}

export async function writeBytes(channel: ByteChannel, value: Buffer): Promise<void> {
  if (value.length === 0) {
    return;
  }
  await writeAll(channel, value);
}

export async function readExact(channel: ByteChannel, length: number): Promise<Buffer> {
  const data = await channel.readExact(length);
  if (data.length !== length) {
    throw new TransportError(`Short read: expected ${length} bytes, got ${data.length}`);
  }
  return data;
}

export async function readInt32(channel: ByteChannel): Promise<number> {
  return (await readExact(channel, 4)).readInt32BE(0);
}

export async function readUInt32(channel: ByteChannel): Promise<number> {
  return (await readExact(channel, 4)).readUInt32BE(0);
}

export async function readString(channel: ByteChannel): Promise<string> {
  const length = await readInt32(channel);
  if (length < 0) {
    throw new ProtocolError(`Invalid string length ${length}`);
  }
  return (await readExact(channel, length)).toString('utf8');
}
