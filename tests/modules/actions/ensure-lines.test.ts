/**
 * Tests for appending lines to profile files
 */

import { readFileSync, writeFileSync } from 'node:fs';
import path from 'node:path';

import { execute } from '../../../src/core/executor.js';
import { EnsureLinesAction } from '../../../src/modules/actions/ensure-lines.js';
import { createContext, createTempDir } from '../../mocks/index.js';

const GO_LINES = ['export GOROOT=/usr/local/go', 'export GOPATH=$HOME/go'];

describe('EnsureLinesAction', () => {
  let tmp: ReturnType<typeof createTempDir>;
  let zshrc: string;

  beforeEach(() => {
    tmp = createTempDir();
    zshrc = path.join(tmp.dir, '.zshrc');
  });

  afterEach(() => tmp.cleanup());

  const ctx = () => createContext({ homeDir: tmp.dir, osFamily: 'macos' });

  it('should pluralize its description', () => {
    expect(new EnsureLinesAction({ filePath: zshrc, lines: GO_LINES }).description).toBe(`Ensure 2 lines in ${zshrc}`);
    expect(new EnsureLinesAction({ filePath: zshrc, lines: ['a'] }).description).toBe(`Ensure 1 line in ${zshrc}`);
  });

  it('should create the file with every line', async () => {
    const action = new EnsureLinesAction({ filePath: zshrc, lines: GO_LINES });

    const result = await execute(action, ctx());

    expect(result).toMatchObject({ status: 'applied', message: 'appended 2 line(s)' });
    expect(readFileSync(zshrc, 'utf8')).toBe('export GOROOT=/usr/local/go\nexport GOPATH=$HOME/go\n');
  });

  it('should not duplicate lines on a second run', async () => {
    const action = new EnsureLinesAction({ filePath: zshrc, lines: GO_LINES });

    await execute(action, ctx());
    const second = await execute(action, ctx());

    expect(second.status).toBe('skipped');
    expect(readFileSync(zshrc, 'utf8')).toBe('export GOROOT=/usr/local/go\nexport GOPATH=$HOME/go\n');
  });

  it('should only append missing lines, after a trailing newline', async () => {
    writeFileSync(zshrc, '# zsh\nexport GOROOT=/usr/local/go   ');

    await execute(new EnsureLinesAction({ filePath: zshrc, lines: GO_LINES }), ctx());

    expect(readFileSync(zshrc, 'utf8')).toBe('# zsh\nexport GOROOT=/usr/local/go   \nexport GOPATH=$HOME/go\n');
  });

  it('should not count a partial match as present', async () => {
    writeFileSync(zshrc, 'export GOPATH=$HOME/go/bin\n');

    const action = new EnsureLinesAction({ filePath: zshrc, lines: ['export GOPATH=$HOME/go'] });

    await expect(action.check(ctx())).resolves.toBe(false);
  });
});
