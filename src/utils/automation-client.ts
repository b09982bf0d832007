import { createConnection, Socket } from 'net';
import {
  AutomationDriver,
  ConnectionError,
  MouseButton,
  ScreenDescriptor,
  Screenshot,
} from '../types';
import { SocketChannel } from './codec';
import { Logger, createLogger } from './logger';
import {
  Method,
  RpcTransport,
  RpcValue,
  expectBytes,
  expectCount,
  expectUInt32,
  methodName,
  rpc,
} from './transport';

const DEFAULT_CONNECT_TIMEOUT = 5000;
const DOUBLE_CLICK_INTERVAL_MS = 100;

export interface AutomationClientOptions {
  socketPath: string;
  connectTimeoutMs?: number;
  logger?: Logger;
}

function describeSocketError(error: NodeJS.ErrnoException): string {
  switch (error.code) {
    case 'ENOENT':
      return 'socket does not exist';
    case 'ECONNREFUSED':
      return 'connection refused';
    default:
      return error.message;
  }
}

function openSocket(socketPath: string, timeoutMs: number): Promise<Socket> {
  return new Promise((resolve, reject) => {
    const socket = createConnection({ path: socketPath });

    const cleanup = () => {
      socket.off('connect', onConnect);
      socket.off('error', onError);
      socket.off('timeout', onTimeout);
      socket.setTimeout(0);
    };
    const onConnect = () => {
      cleanup();
      resolve(socket);
    };
    const onError = (error: NodeJS.ErrnoException) => {
      cleanup();
      socket.destroy();
      reject(new ConnectionError(socketPath, describeSocketError(error), { code: error.code }));
    };
    const onTimeout = () => {
      cleanup();
      socket.destroy();
      reject(new ConnectionError(socketPath, `no answer within ${timeoutMs}ms`));
    };

    socket.once('connect', onConnect);
    socket.once('error', onError);
    if (timeoutMs > 0) {
      socket.setTimeout(timeoutMs);
      socket.once('timeout', onTimeout);
    }
  });
}

/**
 * Typed operations over the emulator's automation socket. Every operation
 * sends one call and waits for its reply; calls from concurrent callers are
 * queued by the transport.
 */
export class AutomationClient implements AutomationDriver {
  private transport?: RpcTransport;
  private readonly logger: Logger;
  private currentPath: string;

  constructor(private readonly options: AutomationClientOptions) {
    this.logger = options.logger ?? createLogger('client');
    this.currentPath = options.socketPath;
  }

  get socketPath(): string {
    return this.currentPath;
  }

  get connected(): boolean {
    return this.transport !== undefined && !this.transport.closed;
  }

  async connect(socketPath: string = this.options.socketPath): Promise<void> {
    // One live connection per client; a reconnect replaces the old socket.
    this.disconnect();
    this.currentPath = socketPath;

    const socket = await openSocket(
      socketPath,
      this.options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT
    );

    // Overlapping connects all open a socket; the last to finish wins.
    const previous = this.transport;
    this.transport = new RpcTransport(new SocketChannel(socket));
    if (previous) {
      previous.close();
      this.logger.debug('replaced connection opened concurrently', { socketPath });
    }
    this.logger.debug('connected', { socketPath });
  }

  disconnect(): void {
    if (!this.transport) {
      return;
    }
    this.transport.close();
    this.transport = undefined;
    this.logger.debug('disconnected', { socketPath: this.currentPath });
  }

  async ping(): Promise<boolean> {
    const values = await this.call(Method.PING);
    const first = values[0];
    return first !== undefined && (first.type === 'int32' || first.type === 'uint32') && first.value === 1;
  }

  async getScreenSize(): Promise<ScreenDescriptor> {
    const method = methodName(Method.GET_SCREEN_SIZE);
    const values = await this.call(Method.GET_SCREEN_SIZE);
    expectCount(values, 3, method);
    return {
      width: expectUInt32(values, 0, method),
      height: expectUInt32(values, 1, method),
      depth: expectUInt32(values, 2, method),
    };
  }

  async mouseMove(x: number, y: number): Promise<void> {
    await this.call(Method.MOUSE_MOVE, [rpc.int32(x), rpc.int32(y)]);
  }

  async click(x: number, y: number, button: MouseButton = MouseButton.Primary): Promise<void> {
    await this.call(Method.CLICK, [rpc.int32(x), rpc.int32(y), rpc.int32(button)]);
  }

  async doubleClick(x: number, y: number, button: MouseButton = MouseButton.Primary): Promise<void> {
    await this.click(x, y, button);
    await this.waitMs(DOUBLE_CLICK_INTERVAL_MS);
    await this.click(x, y, button);
  }

  async mouseDown(button: MouseButton = MouseButton.Primary): Promise<void> {
    await this.call(Method.MOUSE_DOWN, [rpc.int32(button)]);
  }

  async mouseUp(button: MouseButton = MouseButton.Primary): Promise<void> {
    await this.call(Method.MOUSE_UP, [rpc.int32(button)]);
  }

  async keyDown(keyCode: number): Promise<void> {
    await this.call(Method.KEY_DOWN, [rpc.int32(keyCode)]);
  }

  async keyUp(keyCode: number): Promise<void> {
    await this.call(Method.KEY_UP, [rpc.int32(keyCode)]);
  }

  // The protocol has no chord primitive: press in order, release in reverse.
  async pressChord(keyCodes: readonly number[]): Promise<void> {
    for (const keyCode of keyCodes) {
      await this.keyDown(keyCode);
    }
    for (const keyCode of [...keyCodes].reverse()) {
      await this.keyUp(keyCode);
    }
  }

  async typeText(text: string): Promise<void> {
    await this.call(Method.TYPE_TEXT, [rpc.string(text)]);
  }

  // Pacing request executed by the emulator, not a local sleep.
  async waitMs(ms: number): Promise<void> {
    await this.call(Method.WAIT_MS, [rpc.int32(ms)]);
  }

  async screenshot(): Promise<Screenshot> {
    const method = methodName(Method.SCREENSHOT);
    const values = await this.call(Method.SCREENSHOT);
    expectCount(values, 5, method, Infinity);
    return {
      width: expectUInt32(values, 0, method),
      height: expectUInt32(values, 1, method),
      depth: expectUInt32(values, 2, method),
      stride: expectUInt32(values, 3, method),
      pixels: expectBytes(values, 4, method),
    };
  }

  private async call(methodId: number, args: RpcValue[] = []): Promise<RpcValue[]> {
    const transport = this.transport;
    if (!transport || transport.closed) {
      throw new ConnectionError(this.currentPath, 'not connected');
    }

    this.logger.debug('call', { method: methodName(methodId) });
    return transport.call(methodId, args);
  }
}
