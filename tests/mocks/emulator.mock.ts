import fs from 'fs';
import net, { Server, Socket } from 'net';
import os from 'os';
import path from 'path';
import { ProtocolError } from '../../src/types';
import { ByteChannel, SocketChannel, readExact, readInt32, readString, readUInt32 } from '../../src/utils/codec';
import { Method, RpcValue, Sentinel, TypeTag, rpc } from '../../src/utils/transport';
import { encodeReply } from './channel.mock';

export interface ReceivedCall {
  method: number;
  args: RpcValue[];
}

export type CallHandler = (call: ReceivedCall) => RpcValue[];

export const defaultHandler: CallHandler = call => {
  switch (call.method) {
    case Method.PING:
      return [rpc.int32(1)];
    case Method.GET_SCREEN_SIZE:
      return [rpc.uint32(640), rpc.uint32(480), rpc.uint32(8)];
    case Method.SCREENSHOT:
      return [rpc.uint32(2), rpc.uint32(1), rpc.uint32(8), rpc.uint32(2), rpc.bytes(Buffer.from([0x00, 0xff]))];
    default:
      return [];
  }
};

let instances = 0;

async function readCall(channel: ByteChannel): Promise<ReceivedCall> {
  const start = await readInt32(channel);
  if (start !== Sentinel.CALL_START) {
    throw new ProtocolError(`Expected CALL_START, got ${start}`);
  }

  const method = await readInt32(channel);
  const args: RpcValue[] = [];
  for (;;) {
    const tag = await readInt32(channel);
    switch (tag) {
      case Sentinel.CALL_END:
        return { method, args };
      case TypeTag.INT32:
        args.push(rpc.int32(await readInt32(channel)));
        break;
      case TypeTag.UINT32:
        args.push(rpc.uint32(await readUInt32(channel)));
        break;
      case TypeTag.STRING:
        args.push(rpc.string(await readString(channel)));
        break;
      case TypeTag.BYTE_ARRAY: {
        await readInt32(channel);
        const count = await readUInt32(channel);
        args.push(rpc.bytes(await readExact(channel, count)));
        break;
      }
      default:
        throw new ProtocolError(`Unexpected tag ${tag}`);
    }
  }
}

/**
 * Stand-in for the emulator's automation server on a temporary Unix socket.
 * Calls are decoded with the same codec the client uses and answered by
 * `handler`.
 */
export class FakeAutomationServer {
  readonly socketPath = path.join(os.tmpdir(), `classic-mac-mcp-${process.pid}-${instances++}.sock`);
  readonly calls: ReceivedCall[] = [];
  handler: CallHandler;
  private readonly server: Server;
  private readonly sockets = new Set<Socket>();

  constructor(handler: CallHandler = defaultHandler) {
    this.handler = handler;
    this.server = net.createServer(socket => {
      this.sockets.add(socket);
      socket.on('close', () => this.sockets.delete(socket));
      void this.serve(socket);
    });
  }

  methods(): number[] {
    return this.calls.map(call => call.method);
  }

  // Server-side close events arrive asynchronously; waits briefly for the count to settle.
  async liveConnections(expected: number, timeoutMs = 1000): Promise<number> {
    const deadline = Date.now() + timeoutMs;
    while (this.sockets.size !== expected && Date.now() < deadline) {
      await new Promise(resolve => setTimeout(resolve, 10));
    }
    return this.sockets.size;
  }

  async listen(): Promise<void> {
    await fs.promises.rm(this.socketPath, { force: true });
    await new Promise<void>((resolve, reject) => {
      this.server.once('error', reject);
      this.server.listen(this.socketPath, () => resolve());
    });
  }

  async close(): Promise<void> {
    for (const socket of this.sockets) {
      socket.destroy();
    }
    await new Promise<void>(resolve => this.server.close(() => resolve()));
    await fs.promises.rm(this.socketPath, { force: true });
  }

  private async serve(socket: Socket): Promise<void> {
    const channel = new SocketChannel(socket);
    try {
      for (;;) {
        const call = await readCall(channel);
        this.calls.push(call);
        await channel.write(encodeReply(this.handler(call)));
      }
    } catch {
      // The client hung up.
      socket.destroy();
    }
  }
}
