import { beforeEach, describe, expect, it, vi } from 'vitest';

const mockWrite = vi.fn();
const mockKill = vi.fn();

vi.mock('node-pty', () => ({
  spawn: vi.fn(() => ({
    onData: vi.fn(),
    onExit: vi.fn(),
    write: mockWrite,
    kill: mockKill,
  })),
}));

import * as pty from 'node-pty';

import { createExecutor, selectEngine } from '../../src/core/engine.js';
import { ExecutionError } from '../../src/core/executor.js';
import { createMockLogger, FakeTerminal } from '../helpers/mocks.js';

describe('selectEngine', () => {
  it('uses rill for .rill files', () => {
    expect(selectEngine(null, 'intro.rill')).toBe('rill');
  });

  it('uses the shell for anything else', () => {
    expect(selectEngine(null, 'intro.sh')).toBe('shell');
    expect(selectEngine(null, 'intro.txt')).toBe('shell');
  });

  it('prefers the configured engine', () => {
    expect(selectEngine('rill', 'intro.sh')).toBe('rill');
    expect(selectEngine('shell', 'intro.rill')).toBe('shell');
  });
});

describe('createExecutor', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  const options = {
    terminal: new FakeTerminal(),
    logger: createMockLogger(),
    cwd: '/tmp',
    scriptFile: 'intro.rill',
    scriptArgs: [],
    elapsedSeconds: () => 0,
  };

  it('builds the shell executor', () => {
    const executor = createExecutor('shell', options);

    expect(executor.name).toBe('shell');
    expect(executor.noop).toBe('true');
  });

  it('builds the rill executor', () => {
    const executor = createExecutor('rill', options);

    expect(executor.name).toBe('rill');
    expect(executor.noop).toBe('""');
  });

  it('starts no shell before a line runs', () => {
    createExecutor('shell', options);

    expect(pty.spawn).not.toHaveBeenCalled();
  });

  it('closes the shell session used by demo::shell with the rill executor', async () => {
    const executor = createExecutor('rill', options);

    const line = executor.execute('demo::shell("pwd")');
    await vi.waitFor(() => {
      expect(mockWrite).toHaveBeenCalledTimes(2);
    });
    executor.dispose();

    expect(mockKill).toHaveBeenCalledTimes(1);
    await expect(line).rejects.toBeInstanceOf(ExecutionError);
  });
});
