import { vi, describe, it, expect, beforeEach } from 'vitest';

vi.mock('../../src/utils/logger.js', () => ({
  logInfo: vi.fn(),
  logError: vi.fn(),
  toLoggable: vi.fn((e: unknown) => e),
}));

import { LifecycleError, LifecycleManager } from '../../src/server/lifecycle.js';
import type { ManagedContext } from '../../src/transport/types.js';
import { logError } from '../../src/utils/logger.js';

/** Records open/close calls, in order, into a shared journal. */
function makeContext(name: string, journal: string[], failures: { open?: Error; close?: Error } = {}): ManagedContext {
  return {
    name,
    open: vi.fn(async () => {
      journal.push(`open:${name}`);
      if (failures.open) throw failures.open;
    }),
    close: vi.fn(async () => {
      journal.push(`close:${name}`);
      if (failures.close) throw failures.close;
    }),
  };
}

describe('LifecycleManager', () => {
  let journal: string[];

  beforeEach(() => {
    journal = [];
    vi.clearAllMocks();
  });

  it('should open contexts in order and close them in reverse', async () => {
    const manager = new LifecycleManager();
    const code = makeContext('CodeAnalysisServer', journal);
    const docker = makeContext('DockerControlServer', journal);

    await manager.openAll([code, docker]);
    expect(manager.openContexts).toEqual(['CodeAnalysisServer', 'DockerControlServer']);

    await manager.closeAll();

    expect(journal).toEqual([
      'open:CodeAnalysisServer',
      'open:DockerControlServer',
      'close:DockerControlServer',
      'close:CodeAnalysisServer',
    ]);
    expect(manager.openContexts).toEqual([]);
  });

  it('should close already-opened contexts before propagating a startup failure', async () => {
    const manager = new LifecycleManager();
    const code = makeContext('CodeAnalysisServer', journal);
    const docker = makeContext('DockerControlServer', journal, { open: new Error('port in use') });

    const failure = manager.openAll([code, docker]);

    await expect(failure).rejects.toBeInstanceOf(LifecycleError);
    await expect(failure).rejects.toThrow('Failed to start DockerControlServer: port in use');
    expect(journal).toEqual([
      'open:CodeAnalysisServer',
      'open:DockerControlServer',
      'close:CodeAnalysisServer',
    ]);
    // the context that failed to open is never closed
    expect(docker.close).not.toHaveBeenCalled();
  });

  it('should keep the original error as the cause', async () => {
    const manager = new LifecycleManager();
    const cause = new Error('boom');

    const error = await manager.openAll([makeContext('Only', journal, { open: cause })]).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(LifecycleError);
    expect((error as LifecycleError).cause).toBe(cause);
    expect((error as LifecycleError).contextName).toBe('Only');
  });

  it('should keep closing after a context fails to close', async () => {
    const manager = new LifecycleManager();
    const first = makeContext('first', journal);
    const second = makeContext('second', journal, { close: new Error('close failed') });
    const third = makeContext('third', journal);

    await manager.openAll([first, second, third]);
    await manager.closeAll();

    expect(journal.filter((entry) => entry.startsWith('close:'))).toEqual(['close:third', 'close:second', 'close:first']);
    expect(logError).toHaveBeenCalledWith('Error while closing second', expect.any(Error));
  });

  it('should close each context only once across repeated closeAll calls', async () => {
    const manager = new LifecycleManager();
    const only = makeContext('only', journal);

    await manager.openAll([only]);
    await manager.closeAll();
    await manager.closeAll();

    expect(only.close).toHaveBeenCalledTimes(1);
  });
});
