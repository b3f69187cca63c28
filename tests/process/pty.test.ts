import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { ExecutionError } from '../../src/core/executor.js';
import {
  createShellExecutor,
  SESSION_SETUP,
  takeCommandResult,
  wrapCommand,
} from '../../src/process/pty.js';
import { createMockLogger } from '../helpers/mocks.js';

// Mock node-pty
const mockOnData = vi.fn();
const mockOnExit = vi.fn();
const mockWrite = vi.fn();
const mockKill = vi.fn();

vi.mock('node-pty', () => ({
  spawn: vi.fn(() => ({
    onData: mockOnData,
    onExit: mockOnExit,
    write: mockWrite,
    kill: mockKill,
  })),
}));

import * as pty from 'node-pty';

/** Session output for one finished command, as the pty sends it */
function framed(id: number, output: string, exitCode = 0): string {
  return `__demo_player_begin_${id}\r\n${output}\r\n__demo_player_end_${id}:${exitCode}\r\n`;
}

describe('wrapCommand', () => {
  it('frames the line with printf markers', () => {
    expect(wrapCommand(2, 'pwd')).toBe(
      "printf '%s_%s\\n' __demo_player_begin 2\n" +
        'pwd\n' +
        "printf '\\n%s_%s:%s\\n' __demo_player_end 2 \"$?\"\n"
    );
  });
});

describe('takeCommandResult', () => {
  it('waits for both markers', () => {
    expect(takeCommandResult('', 1)).toBeNull();
    expect(takeCommandResult('__demo_player_begin_1\r\nhalf', 1)).toBeNull();
  });

  it('returns the output between markers and what follows', () => {
    const taken = takeCommandResult(
      'noise' + framed(1, 'hi\r\nthere\r\n', 4) + 'tail',
      1
    );

    expect(taken).toEqual({
      result: { output: 'hi\nthere\n', exitCode: 4 },
      rest: 'tail',
    });
  });

  it('ignores markers of other commands', () => {
    expect(takeCommandResult(framed(1, 'old'), 2)).toBeNull();
  });
});

describe('createShellExecutor', () => {
  let onDataCallback: (data: string) => void;
  let onExitCallback: (e: { exitCode: number }) => void;

  beforeEach(() => {
    vi.clearAllMocks();

    // Capture callbacks when registered
    mockOnData.mockImplementation((cb: (data: string) => void) => {
      onDataCallback = cb;
    });
    mockOnExit.mockImplementation((cb: (e: { exitCode: number }) => void) => {
      onExitCallback = cb;
    });
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  function createExecutor(): ReturnType<typeof createShellExecutor> {
    return createShellExecutor({
      cwd: '/work/demo',
      shell: '/bin/bash',
      logger: createMockLogger(),
    });
  }

  it('uses true as its no-op line', () => {
    const executor = createExecutor();

    expect(executor.name).toBe('shell');
    expect(executor.noop).toBe('true');
  });

  it('does not start a shell until the first line', () => {
    const executor = createExecutor();
    executor.dispose();

    expect(pty.spawn).not.toHaveBeenCalled();
    expect(mockKill).not.toHaveBeenCalled();
  });

  it('spawns one shell session in the working directory', async () => {
    const executor = createExecutor();

    const result = executor.execute('echo hi');
    onDataCallback(framed(1, 'hi'));
    await result;

    expect(pty.spawn).toHaveBeenCalledWith(
      '/bin/bash',
      [],
      expect.objectContaining({
        name: 'xterm-256color',
        cols: 120,
        rows: 40,
        cwd: '/work/demo',
      })
    );
    expect(mockWrite).toHaveBeenNthCalledWith(1, SESSION_SETUP);
    expect(mockWrite).toHaveBeenNthCalledWith(2, wrapCommand(1, 'echo hi'));
  });

  it('falls back to $SHELL', async () => {
    vi.stubEnv('SHELL', '/usr/bin/zsh');
    const executor = createShellExecutor({
      cwd: '/tmp',
      logger: createMockLogger(),
    });

    const result = executor.execute('true');
    onDataCallback(framed(1, ''));
    await result;

    expect(pty.spawn).toHaveBeenCalledWith(
      '/usr/bin/zsh',
      [],
      expect.any(Object)
    );
  });

  it('runs every line in the same shell', async () => {
    const executor = createExecutor();

    const first = executor.execute('cd /tmp');
    onDataCallback(framed(1, ''));
    await expect(first).resolves.toEqual({ output: '', exitCode: 0 });

    const second = executor.execute('pwd');
    onDataCallback(framed(2, '/tmp\r\n'));
    await expect(second).resolves.toEqual({ output: '/tmp\n', exitCode: 0 });

    expect(pty.spawn).toHaveBeenCalledTimes(1);
    expect(mockWrite).toHaveBeenNthCalledWith(3, wrapCommand(2, 'pwd'));
  });

  it('waits for output split across chunks', async () => {
    const executor = createExecutor();

    const result = executor.execute('ls');
    const data = framed(1, 'a.txt\r\nb.txt', 2);
    onDataCallback(data.slice(0, 30));
    onDataCallback(data.slice(30));

    await expect(result).resolves.toEqual({
      output: 'a.txt\nb.txt',
      exitCode: 2,
    });
  });

  it('logs each line output', async () => {
    const logger = createMockLogger();
    const executor = createShellExecutor({ cwd: '/tmp', logger });

    const result = executor.execute('echo hi');
    onDataCallback(framed(1, 'hi'));
    await result;

    expect(logger.log).toHaveBeenCalledWith('hi');
  });

  it('rejects a line while another is running', async () => {
    const executor = createExecutor();

    void executor.execute('sleep 5');

    await expect(executor.execute('ls')).rejects.toBeInstanceOf(
      ExecutionError
    );
  });

  it('fails the running line when the shell exits and restarts after', async () => {
    const executor = createExecutor();

    const result = executor.execute('exit 3');
    onExitCallback({ exitCode: 3 });

    await expect(result).rejects.toThrow('Shell session exited with code 3');

    const next = executor.execute('pwd');
    onDataCallback(framed(2, '/work/demo'));
    await next;

    expect(pty.spawn).toHaveBeenCalledTimes(2);
  });

  it('kills the session on dispose', async () => {
    const executor = createExecutor();

    const result = executor.execute('sleep 5');
    executor.dispose();

    expect(mockKill).toHaveBeenCalledTimes(1);
    await expect(result).rejects.toThrow('Shell session closed');
  });
});
