import {
  AutomationError,
  BootFailedError,
  ConfigError,
  ConnectionError,
  EmulatorNotFoundError,
  ProtocolError,
  TimeoutError,
} from '../../src/types';
import {
  describeError,
  formatErrorForResponse,
  getErrorSuggestion,
  isRecoverableError,
  toError,
} from '../../src/utils/error';

describe('Error utilities', () => {
  describe('formatErrorForResponse', () => {
    it('should print the code, message and suggestion', () => {
      expect(formatErrorForResponse(new ConnectionError('/tmp/test.sock', 'connection refused'))).toBe(
        "CONNECTION_FAILED: Failed to connect to automation socket '/tmp/test.sock': connection refused\n\n" +
          'Suggestion: Make sure the emulator is running with the --automation flag'
      );
    });

    it('should omit a missing suggestion', () => {
      expect(formatErrorForResponse(new TimeoutError('too slow', 10))).toBe('TIMEOUT: too slow');
    });

    it('should fall back to the message of other errors', () => {
      expect(formatErrorForResponse(new Error('plain'))).toBe('plain');
      expect(formatErrorForResponse('text')).toBe('text');
    });
  });

  describe('isRecoverableError', () => {
    it('should retry transient failures', () => {
      expect(isRecoverableError(new TimeoutError('slow', 1))).toBe(true);
      expect(isRecoverableError(new ConnectionError('/tmp/test.sock', 'connection refused'))).toBe(true);
    });

    it('should not retry failures that need user action', () => {
      expect(isRecoverableError(new EmulatorNotFoundError([]))).toBe(false);
      expect(isRecoverableError(new ProtocolError('bad'))).toBe(false);
      expect(isRecoverableError(new ConfigError('bad'))).toBe(false);
      expect(isRecoverableError(new Error('unknown'))).toBe(false);
    });
  });

  it('should expose suggestions and messages', () => {
    expect(getErrorSuggestion(new AutomationError('X', 'y', undefined, 'do z'))).toBe('do z');
    expect(getErrorSuggestion(new Error('y'))).toBeUndefined();
    expect(describeError(42)).toBe('42');
    expect(toError('boom').message).toBe('boom');
  });

  it('should describe boot failures with the attempt count', () => {
    expect(new BootFailedError(1).message).toBe('Failed to start emulator after 1 attempt');
    expect(new BootFailedError(2, new Error('no ping')).message).toBe(
      'Failed to start emulator after 2 attempts: no ping'
    );
  });
});
