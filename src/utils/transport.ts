import { ProtocolError } from '../types';
import {
  ByteChannel,
  FrameBuilder,
  readExact,
  readInt32,
  readString,
  readUInt32,
} from './codec';

// Control sentinels and type tags live in disjoint negative ranges so a
// decoder can tell them apart without extra framing.
export const Sentinel = {
  CALL_START: -3000,
  CALL_END: -3001,
  REPLY_ACK: -3002,
  REPLY_TAG: -3003,
} as const;

export const TypeTag = {
  BYTE: -2001,
  INT32: -2002,
  UINT32: -2003,
  STRING: -2005,
  BYTE_ARRAY: -2006,
} as const;

// Method ids assigned by the emulator's automation server.
export const Method = {
  KEY_DOWN: 101,
  KEY_UP: 102,
  MOUSE_MOVE: 103,
  MOUSE_DOWN: 104,
  MOUSE_UP: 105,
  GET_SCREEN_SIZE: 106,
  SCREENSHOT: 107,
  TYPE_TEXT: 108,
  CLICK: 109,
  PING: 110,
  WAIT_MS: 111,
} as const;

export type MethodId = (typeof Method)[keyof typeof Method];

export type RpcValue =
  | { type: 'int32'; value: number }
  | { type: 'uint32'; value: number }
  | { type: 'string'; value: string }
  | { type: 'bytes'; value: Buffer };

export const rpc = {
  int32: (value: number): RpcValue => ({ type: 'int32', value }),
  uint32: (value: number): RpcValue => ({ type: 'uint32', value }),
  string: (value: string): RpcValue => ({ type: 'string', value }),
  bytes: (value: Buffer): RpcValue => ({ type: 'bytes', value }),
};

export function methodName(methodId: number): string {
  const entry = Object.entries(Method).find(([, id]) => id === methodId);
  return entry ? entry[0] : `method ${methodId}`;
}

export function encodeCall(methodId: number, args: readonly RpcValue[] = []): Buffer {
  const frame = new FrameBuilder().int32(Sentinel.CALL_START).int32(methodId);

  for (const arg of args) {
    switch (arg.type) {
      case 'int32':
        frame.int32(TypeTag.INT32).int32(arg.value);
        break;
      case 'uint32':
        frame.int32(TypeTag.UINT32).uint32(arg.value);
        break;
      case 'string':
        frame.int32(TypeTag.STRING).string(arg.value);
        break;
      case 'bytes':
        frame
          .int32(TypeTag.BYTE_ARRAY)
          .int32(TypeTag.BYTE)
          .uint32(arg.value.length)
          .bytes(arg.value);
        break;
    }
  }

  return frame.int32(Sentinel.CALL_END).toBuffer();
}

async function readValue(channel: ByteChannel, tag: number): Promise<RpcValue> {
  switch (tag) {
    case TypeTag.INT32:
      return rpc.int32(await readInt32(channel));
    case TypeTag.UINT32:
      return rpc.uint32(await readUInt32(channel));
    case TypeTag.STRING:
      return rpc.string(await readString(channel));
    case TypeTag.BYTE_ARRAY: {
      const elementType = await readInt32(channel);
      if (elementType !== TypeTag.BYTE) {
        throw new ProtocolError(`Unsupported array element type ${elementType}`);
      }
      const count = await readUInt32(channel);
      return rpc.bytes(await readExact(channel, count));
    }
    default:
      throw new ProtocolError(`Unexpected type tag ${tag} in reply`);
  }
}

/**
 * Call/reply protocol over one ByteChannel. Calls are queued so that at most
 * one is in flight per connection; there is no pipelining.
 */
export class RpcTransport {
  private queue: Promise<unknown> = Promise.resolve();

  constructor(private readonly channel: ByteChannel) {}

  get closed(): boolean {
    return this.channel.closed;
  }

  async sendCall(methodId: number, args: readonly RpcValue[] = []): Promise<void> {
    await this.channel.write(encodeCall(methodId, args));
  }

  async recvReply(): Promise<RpcValue[]> {
    const reply = await readInt32(this.channel);
    if (reply !== Sentinel.REPLY_TAG) {
      throw new ProtocolError(`Expected REPLY (${Sentinel.REPLY_TAG}), got ${reply}`);
    }

    const values: RpcValue[] = [];
    for (;;) {
      const tag = await readInt32(this.channel);
      if (tag === Sentinel.CALL_END) {
        break;
      }
      values.push(await readValue(this.channel, tag));
    }

    const ack = await readInt32(this.channel);
    if (ack !== Sentinel.REPLY_ACK) {
      throw new ProtocolError(`Expected ACK (${Sentinel.REPLY_ACK}), got ${ack}`);
    }

    return values;
  }

  call(methodId: number, args: readonly RpcValue[] = []): Promise<RpcValue[]> {
    const result = this.queue.then(async () => {
      await this.sendCall(methodId, args);
      return this.recvReply();
    });
    // The queue only orders calls; each caller still receives its own failure.
    this.queue = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }

  close(): void {
    this.channel.close();
  }
}

// Reply shape helpers: the protocol does not describe what a method returns,
// so each call site states what it expects.
export function expectCount(values: RpcValue[], min: number, method: string, max = min): void {
  if (values.length < min || values.length > max) {
    const expected = min === max ? `${min}` : max === Infinity ? `at least ${min}` : `${min}-${max}`;
    throw new ProtocolError(
      `Invalid ${method} response: expected ${expected} values, got ${values.length}`
    );
  }
}

export function expectNumber(values: RpcValue[], index: number, method: string): number {
  const value = values[index];
  if (value === undefined || (value.type !== 'int32' && value.type !== 'uint32')) {
    throw new ProtocolError(`Invalid ${method} response: value ${index} is not an integer`);
  }
  return value.value;
}

export function expectUInt32(values: RpcValue[], index: number, method: string): number {
  const value = expectNumber(values, index, method);
  if (value < 0) {
    throw new ProtocolError(`Invalid ${method} response: value ${index} is negative`);
  }
  return value;
}

export function expectBytes(values: RpcValue[], index: number, method: string): Buffer {
  const value = values[index];
  if (value === undefined || value.type !== 'bytes') {
    throw new ProtocolError(`Invalid ${method} response: value ${index} is not a byte array`);
  }
  return value.value;
}
