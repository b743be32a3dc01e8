/**
 * Shutdown hook tests
 */

import { EventEmitter } from 'events';
import { ShutdownHooks, installShutdownHooks } from '../shutdownHooks';

describe('installShutdownHooks', () => {
  let source: EventEmitter;
  let hooks: {
    killDaemon: jest.Mock<void, []>;
    endInput: jest.Mock<boolean, []>;
    exit: jest.Mock<void, [number]>;
  };
  let remove: () => void;

  const install = (promptReady: boolean) => {
    hooks = {
      killDaemon: jest.fn<void, []>(),
      endInput: jest.fn<boolean, []>(() => promptReady),
      exit: jest.fn<void, [number]>()
    };
    const target: ShutdownHooks = hooks;
    remove = installShutdownHooks(target, source);
  };

  beforeEach(() => {
    source = new EventEmitter();
  });

  afterEach(() => {
    remove();
  });

  it('should kill the daemon when the process exits', () => {
    install(true);

    source.emit('exit');

    expect(hooks.killDaemon).toHaveBeenCalledTimes(1);
  });

  it('should exit right away on SIGINT while the daemon is still starting', () => {
    install(false);

    source.emit('SIGINT');

    expect(hooks.exit).toHaveBeenCalledWith(130);
  });

  it('should exit right away on SIGTERM before the prompt exists', () => {
    install(false);

    source.emit('SIGTERM');

    expect(hooks.exit).toHaveBeenCalledWith(143);
  });

  it('should end input on the first signal once the prompt exists', () => {
    install(true);

    source.emit('SIGINT');

    expect(hooks.endInput).toHaveBeenCalledTimes(1);
    expect(hooks.exit).not.toHaveBeenCalled();
  });

  it('should exit on a repeated signal', () => {
    install(true);

    source.emit('SIGINT');
    source.emit('SIGTERM');

    expect(hooks.endInput).toHaveBeenCalledTimes(1);
    expect(hooks.exit).toHaveBeenCalledWith(143);
  });

  it('should remove its listeners', () => {
    install(true);

    remove();

    expect(source.listenerCount('exit')).toBe(0);
    expect(source.listenerCount('SIGINT')).toBe(0);
    expect(source.listenerCount('SIGTERM')).toBe(0);
  });
});
