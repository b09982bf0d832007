import os from 'os';
import path from 'path';
import { ConnectionError, MouseButton, ProtocolError } from '../../src/types';
import { AutomationClient } from '../../src/utils/automation-client';
import { silentLogger } from '../../src/utils/logger';
import { Method, rpc } from '../../src/utils/transport';
import { FakeAutomationServer, defaultHandler } from '../mocks/emulator.mock';

describe('AutomationClient', () => {
  let server: FakeAutomationServer;
  let client: AutomationClient;

  beforeEach(async () => {
    server = new FakeAutomationServer();
    await server.listen();
    client = new AutomationClient({ socketPath: server.socketPath, logger: silentLogger });
  });

  afterEach(async () => {
    client.disconnect();
    await server.close();
  });

  describe('connection', () => {
    it('should connect to the configured socket', async () => {
      await client.connect();

      expect(client.connected).toBe(true);
      expect(await client.ping()).toBe(true);
    });

    it('should report a missing socket as a connection error', async () => {
      const missing = path.join(os.tmpdir(), `classic-mac-mcp-missing-${process.pid}.sock`);

      await expect(client.connect(missing)).rejects.toThrow(
        new ConnectionError(missing, 'socket does not exist')
      );
      expect(client.connected).toBe(false);
    });

    it('should refuse calls while disconnected', async () => {
      await expect(client.ping()).rejects.toThrow(
        `Failed to connect to automation socket '${server.socketPath}': not connected`
      );
    });

    it('should allow disconnect to be called repeatedly', async () => {
      await client.connect();

      client.disconnect();
      client.disconnect();

      expect(client.connected).toBe(false);
    });

    it('should replace an existing connection on reconnect', async () => {
      await client.connect();
      await client.connect();

      expect(await client.ping()).toBe(true);
    });

    it('should keep a single socket open when connects overlap', async () => {
      await Promise.all([client.connect(), client.connect()]);

      expect(await client.ping()).toBe(true);
      expect(await server.liveConnections(1)).toBe(1);

      client.disconnect();

      expect(await server.liveConnections(0)).toBe(0);
    });
  });

  describe('queries', () => {
    beforeEach(async () => {
      await client.connect();
    });

    it('should treat any ping answer other than 1 as not ready', async () => {
      server.handler = call => (call.method === Method.PING ? [rpc.int32(0)] : []);
      expect(await client.ping()).toBe(false);

      server.handler = () => [];
      expect(await client.ping()).toBe(false);
    });

    it('should return the screen descriptor', async () => {
      expect(await client.getScreenSize()).toEqual({ width: 640, height: 480, depth: 8 });
    });

    it('should reject a screen size reply with the wrong number of values', async () => {
      server.handler = () => [rpc.uint32(640), rpc.uint32(480)];

      await expect(client.getScreenSize()).rejects.toThrow(
        new ProtocolError('Invalid GET_SCREEN_SIZE response: expected 3 values, got 2')
      );
    });

    it('should return screenshot geometry and pixels', async () => {
      expect(await client.screenshot()).toEqual({
        width: 2,
        height: 1,
        depth: 8,
        stride: 2,
        pixels: Buffer.from([0x00, 0xff]),
      });
    });

    it('should reject a screenshot reply without pixel data', async () => {
      server.handler = () => [rpc.uint32(2), rpc.uint32(1), rpc.uint32(8), rpc.uint32(2)];

      await expect(client.screenshot()).rejects.toThrow(
        new ProtocolError('Invalid SCREENSHOT response: expected at least 5 values, got 4')
      );
    });
  });

  describe('input', () => {
    beforeEach(async () => {
      await client.connect();
      server.handler = defaultHandler;
    });

    it('should send clicks with the primary button by default', async () => {
      await client.click(10, 20);
      await client.click(30, 40, MouseButton.Secondary);

      expect(server.calls).toEqual([
        { method: Method.CLICK, args: [rpc.int32(10), rpc.int32(20), rpc.int32(0)] },
        { method: Method.CLICK, args: [rpc.int32(30), rpc.int32(40), rpc.int32(1)] },
      ]);
    });

    it('should double click as click, 100 ms wait, click', async () => {
      await client.doubleClick(5, 6);

      expect(server.calls).toEqual([
        { method: Method.CLICK, args: [rpc.int32(5), rpc.int32(6), rpc.int32(0)] },
        { method: Method.WAIT_MS, args: [rpc.int32(100)] },
        { method: Method.CLICK, args: [rpc.int32(5), rpc.int32(6), rpc.int32(0)] },
      ]);
    });

    it('should press chord keys in order and release them in reverse', async () => {
      await client.pressChord([0x37, 0x3a, 0x0d]);

      expect(server.calls).toEqual([
        { method: Method.KEY_DOWN, args: [rpc.int32(0x37)] },
        { method: Method.KEY_DOWN, args: [rpc.int32(0x3a)] },
        { method: Method.KEY_DOWN, args: [rpc.int32(0x0d)] },
        { method: Method.KEY_UP, args: [rpc.int32(0x0d)] },
        { method: Method.KEY_UP, args: [rpc.int32(0x3a)] },
        { method: Method.KEY_UP, args: [rpc.int32(0x37)] },
      ]);
    });

    it('should send text, pointer and pacing calls with their arguments', async () => {
      await client.typeText('Unix');
      await client.mouseMove(1, 2);
      await client.mouseDown();
      await client.mouseUp();
      await client.waitMs(250);

      expect(server.calls).toEqual([
        { method: Method.TYPE_TEXT, args: [rpc.string('Unix')] },
        { method: Method.MOUSE_MOVE, args: [rpc.int32(1), rpc.int32(2)] },
        { method: Method.MOUSE_DOWN, args: [rpc.int32(0)] },
        { method: Method.MOUSE_UP, args: [rpc.int32(0)] },
        { method: Method.WAIT_MS, args: [rpc.int32(250)] },
      ]);
    });

    it('should answer concurrent calls one at a time', async () => {
      await Promise.all([client.keyDown(1), client.keyUp(1), client.ping()]);

      expect(server.methods()).toEqual([Method.KEY_DOWN, Method.KEY_UP, Method.PING]);
    });
  });
});
