/**
 * Signal Handler Tests
 */

import { EventEmitter } from 'events';
import { setupSignalHandlers } from '../../src/cli/signal-handler.js';

describe('setupSignalHandlers', () => {
  let source: EventEmitter;

  beforeEach(() => {
    source = new EventEmitter();
  });

  it('should stop then exit with 0 on SIGTERM', async () => {
    const stop = jest.fn().mockResolvedValue(undefined);
    const exit = jest.fn();
    setupSignalHandlers(stop, exit, source);

    source.emit('SIGTERM', 'SIGTERM');

    expect(stop).toHaveBeenCalledTimes(1);
    await new Promise((resolve) => setImmediate(resolve));
    expect(exit).toHaveBeenCalledWith(0);
  });

  it('should handle SIGINT the same way', async () => {
    const stop = jest.fn().mockResolvedValue(undefined);
    const exit = jest.fn();
    setupSignalHandlers(stop, exit, source);

    source.emit('SIGINT', 'SIGINT');
    await new Promise((resolve) => setImmediate(resolve));

    expect(stop).toHaveBeenCalledTimes(1);
    expect(exit).toHaveBeenCalledWith(0);
  });

  it('should exit with 1 when stopping fails', async () => {
    const stop = jest.fn().mockRejectedValue(new Error('stuck'));
    const exit = jest.fn();
    setupSignalHandlers(stop, exit, source);

    source.emit('SIGTERM', 'SIGTERM');
    await new Promise((resolve) => setImmediate(resolve));

    expect(exit).toHaveBeenCalledWith(1);
  });

  it('should exit immediately on a second signal', () => {
    const stop = jest.fn(() => new Promise<void>(() => undefined));
    const exit = jest.fn();
    setupSignalHandlers(stop, exit, source);

    source.emit('SIGTERM', 'SIGTERM');
    source.emit('SIGINT', 'SIGINT');

    expect(stop).toHaveBeenCalledTimes(1);
    expect(exit).toHaveBeenCalledWith(1);
  });

  it('should remove its handlers', () => {
    const stop = jest.fn().mockResolvedValue(undefined);
    const remove = setupSignalHandlers(stop, jest.fn(), source);

    remove();
    source.emit('SIGTERM', 'SIGTERM');

    expect(stop).not.toHaveBeenCalled();
    expect(source.listenerCount('SIGTERM')).toBe(0);
  });
});
