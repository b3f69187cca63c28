import { describe, expect, it, vi } from 'vitest';

import { resolveScriptPath } from '../../src/cli/resolve.js';
import { FakeTerminal } from '../helpers/mocks.js';

describe('resolveScriptPath', () => {
  it('returns an existing path without prompting', async () => {
    const terminal = new FakeTerminal();

    const file = await resolveScriptPath(terminal, 'demo.sh', () => true);

    expect(file).toBe('demo.sh');
    expect(terminal.chunks).toEqual([]);
  });

  it('reprompts until a path exists', async () => {
    const terminal = new FakeTerminal([], ['nope.sh', '  demo.sh ']);
    const exists = vi.fn((file: string) => file === 'demo.sh');

    const file = await resolveScriptPath(terminal, 'missing.sh', exists);

    expect(file).toBe('demo.sh');
    expect(exists).toHaveBeenCalledTimes(3);
    expect(terminal.lines()).toEqual([
      'Error: Script not found: missing.sh',
      'Script file: nope.sh',
      'Error: Script not found: nope.sh',
      'Script file:   demo.sh ',
    ]);
  });
});
