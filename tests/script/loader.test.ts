import { beforeEach, describe, expect, it, vi } from 'vitest';

vi.mock('fs', () => ({
  existsSync: vi.fn(),
  readFileSync: vi.fn(),
}));

import * as fs from 'fs';

import {
  createDemoScript,
  loadDemoScript,
  splitScriptLines,
} from '../../src/script/loader.js';

describe('splitScriptLines', () => {
  it('drops CRs and the empty tail after a final newline', () => {
    expect(splitScriptLines('one\r\ntwo\r\n')).toEqual(['one', 'two']);
  });

  it('keeps blank lines inside the script', () => {
    expect(splitScriptLines('a\n\nb')).toEqual(['a', '', 'b']);
  });

  it('returns no lines for empty content', () => {
    expect(splitScriptLines('')).toEqual([]);
  });
});

describe('createDemoScript', () => {
  it('appends the trailer exactly once', () => {
    const script = createDemoScript('demo.txt', ['a', 'b'], { trailer: 'true' });

    expect(script.lines).toEqual(['a', 'b', 'true']);
    expect(script.lineCount).toBe(2);
    expect(script.commentMarker).toBe('#');
  });

  it('does not share the caller array', () => {
    const source = ['a'];
    const script = createDemoScript('demo.txt', source, { trailer: 'true' });

    expect(source).toEqual(['a']);
    expect(script.lines).not.toBe(source);
  });
});

describe('loadDemoScript', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('throws when script file not found', () => {
    vi.mocked(fs.existsSync).mockReturnValue(false);

    expect(() => loadDemoScript('missing.sh', { trailer: 'true' })).toThrow(
      'Script not found: missing.sh'
    );
  });

  it('reads the file and appends the trailer', () => {
    vi.mocked(fs.existsSync).mockReturnValue(true);
    vi.mocked(fs.readFileSync).mockReturnValue('# intro\nls -la\n');

    const script = loadDemoScript('demo.sh', {
      trailer: 'true',
      commentMarker: ';',
    });

    expect(fs.readFileSync).toHaveBeenCalledWith('demo.sh', 'utf-8');
    expect(script).toEqual({
      file: 'demo.sh',
      lines: ['# intro', 'ls -la', 'true'],
      lineCount: 2,
      commentMarker: ';',
    });
  });
});
