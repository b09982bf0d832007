import { ProtocolError, TransportError } from '../../src/types';
import { encodeString } from '../../src/utils/codec';
import {
  Method,
  RpcTransport,
  encodeCall,
  expectBytes,
  expectCount,
  expectNumber,
  expectUInt32,
  methodName,
  rpc,
} from '../../src/utils/transport';
import { MemoryChannel, encodeReply, int32Bytes } from '../mocks/channel.mock';

describe('RPC transport', () => {
  describe('encodeCall', () => {
    it('should frame a call without arguments', () => {
      expect(encodeCall(Method.PING)).toEqual(int32Bytes(-3000, 110, -3001));
    });

    it('should tag each int32 argument', () => {
      const frame = encodeCall(Method.CLICK, [rpc.int32(10), rpc.int32(20), rpc.int32(0)]);

      expect(frame).toEqual(int32Bytes(-3000, 109, -2002, 10, -2002, 20, -2002, 0, -3001));
    });

    it('should encode string and byte array arguments', () => {
      expect(encodeCall(Method.TYPE_TEXT, [rpc.string('Hi')])).toEqual(
        Buffer.concat([int32Bytes(-3000, 108, -2005), encodeString('Hi'), int32Bytes(-3001)])
      );
      expect(encodeCall(Method.KEY_DOWN, [rpc.bytes(Buffer.from([1, 2]))])).toEqual(
        Buffer.concat([int32Bytes(-3000, 101, -2006, -2001, 2), Buffer.from([1, 2]), int32Bytes(-3001)])
      );
    });

    it('should encode uint32 arguments with their own tag', () => {
      expect(encodeCall(Method.WAIT_MS, [rpc.uint32(0xffffffff)])).toEqual(
        Buffer.concat([int32Bytes(-3000, 111, -2003), Buffer.from([0xff, 0xff, 0xff, 0xff]), int32Bytes(-3001)])
      );
    });
  });

  describe('sendCall', () => {
    it('should emit the whole call in one write', async () => {
      const channel = new MemoryChannel();
      const transport = new RpcTransport(channel);

      await transport.sendCall(Method.MOUSE_MOVE, [rpc.int32(5), rpc.int32(6)]);

      expect(channel.writes).toHaveLength(1);
      expect(channel.writes[0]).toEqual(int32Bytes(-3000, 103, -2002, 5, -2002, 6, -3001));
    });
  });

  describe('recvReply', () => {
    it('should decode every value type in order', async () => {
      const values = [
        rpc.int32(-5),
        rpc.uint32(0x80000000),
        rpc.string('ok'),
        rpc.bytes(Buffer.from([7, 8, 9])),
      ];
      const channel = new MemoryChannel(encodeReply(values));

      expect(await new RpcTransport(channel).recvReply()).toEqual(values);
      expect(channel.remaining).toBe(0);
    });

    it('should accept an empty reply', async () => {
      const channel = new MemoryChannel(int32Bytes(-3003, -3001, -3002));

      expect(await new RpcTransport(channel).recvReply()).toEqual([]);
    });

    it('should reject a reply that does not start with the reply tag and stop reading', async () => {
      const channel = new MemoryChannel(int32Bytes(-3002, -3001, -3002));

      await expect(new RpcTransport(channel).recvReply()).rejects.toThrow(
        new ProtocolError('Expected REPLY (-3003), got -3002')
      );
      expect(channel.remaining).toBe(8);
    });

    it('should reject an unknown value tag', async () => {
      const channel = new MemoryChannel(int32Bytes(-3003, -2004, 1, -3001, -3002));

      await expect(new RpcTransport(channel).recvReply()).rejects.toThrow(
        new ProtocolError('Unexpected type tag -2004 in reply')
      );
    });

    it('should reject byte arrays whose elements are not bytes', async () => {
      const channel = new MemoryChannel(int32Bytes(-3003, -2006, -2002, 1, 5, -3001, -3002));

      await expect(new RpcTransport(channel).recvReply()).rejects.toThrow(
        new ProtocolError('Unsupported array element type -2002')
      );
    });

    it('should require the trailing acknowledgement', async () => {
      const channel = new MemoryChannel(int32Bytes(-3003, -3001, 0));

      await expect(new RpcTransport(channel).recvReply()).rejects.toThrow(
        new ProtocolError('Expected ACK (-3002), got 0')
      );
    });

    it('should surface a truncated reply as a transport error', async () => {
      const channel = new MemoryChannel(int32Bytes(-3003, -2002));

      await expect(new RpcTransport(channel).recvReply()).rejects.toThrow(TransportError);
    });
  });

  describe('call', () => {
    it('should keep concurrent calls in order', async () => {
      const channel = new MemoryChannel(
        Buffer.concat([encodeReply([rpc.int32(1)]), encodeReply([rpc.uint32(640), rpc.uint32(480), rpc.uint32(8)])])
      );
      const transport = new RpcTransport(channel);

      const [ping, size] = await Promise.all([
        transport.call(Method.PING),
        transport.call(Method.GET_SCREEN_SIZE),
      ]);

      expect(ping).toEqual([rpc.int32(1)]);
      expect(size).toEqual([rpc.uint32(640), rpc.uint32(480), rpc.uint32(8)]);
      expect(channel.writes).toEqual([int32Bytes(-3000, 110, -3001), int32Bytes(-3000, 106, -3001)]);
    });

    it('should not let a failed call block the next one', async () => {
      const channel = new MemoryChannel(encodeReply([rpc.int32(1)]));
      channel.failNextWrites(1);
      const transport = new RpcTransport(channel);

      const first = transport.call(Method.PING);
      const second = transport.call(Method.PING);

      await expect(first).rejects.toThrow(new TransportError('Write failed'));
      await expect(second).resolves.toEqual([rpc.int32(1)]);
    });

    it('should report a closed channel', () => {
      const channel = new MemoryChannel();
      const transport = new RpcTransport(channel);

      transport.close();

      expect(transport.closed).toBe(true);
    });
  });

  describe('reply shape helpers', () => {
    it('should name methods by id', () => {
      expect(methodName(Method.GET_SCREEN_SIZE)).toBe('GET_SCREEN_SIZE');
      expect(methodName(999)).toBe('method 999');
    });

    it('should check the number of values', () => {
      expect(() => expectCount([], 3, 'GET_SCREEN_SIZE')).toThrow(
        new ProtocolError('Invalid GET_SCREEN_SIZE response: expected 3 values, got 0')
      );
      expect(() => expectCount([rpc.int32(1)], 5, 'SCREENSHOT', Infinity)).toThrow(
        new ProtocolError('Invalid SCREENSHOT response: expected at least 5 values, got 1')
      );
      expect(() => expectCount([rpc.int32(1), rpc.int32(2)], 2, 'PING')).not.toThrow();
    });

    it('should check value types', () => {
      const values = [rpc.int32(-1), rpc.string('x'), rpc.bytes(Buffer.from([1]))];

      expect(expectNumber(values, 0, 'TEST')).toBe(-1);
      expect(() => expectUInt32(values, 0, 'TEST')).toThrow(
        new ProtocolError('Invalid TEST response: value 0 is negative')
      );
      expect(() => expectNumber(values, 1, 'TEST')).toThrow(
        new ProtocolError('Invalid TEST response: value 1 is not an integer')
      );
      expect(expectBytes(values, 2, 'TEST')).toEqual(Buffer.from([1]));
      expect(() => expectBytes(values, 0, 'TEST')).toThrow(
        new ProtocolError('Invalid TEST response: value 0 is not a byte array')
      );
    });
  });
});
