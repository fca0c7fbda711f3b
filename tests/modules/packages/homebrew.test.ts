/**
 * Tests for Homebrew package manager
 */

import { homebrewPackageManager } from '../../../src/modules/packages/homebrew.js';
import { createContext, FakeRunner } from '../../mocks/index.js';

const BREW_ENV = {
  env: { HOMEBREW_NO_AUTO_UPDATE: '1', PATH: '/opt/homebrew/bin:/usr/local/bin:/usr/bin:/bin' },
};

describe('Homebrew Package Manager', () => {
  let runner: FakeRunner;

  beforeEach(() => {
    runner = new FakeRunner()
      .on(/^brew ls --versions git$/, 'git 2.39.0 2.44.0')
      .on(/^brew (install|upgrade) /, '');
  });

  const macCtx = () => createContext({ runner, osFamily: 'macos', homeDir: '/Users/dev', env: { PATH: '/usr/bin:/bin' } });

  it('should report the newest installed version', async () => {
    await expect(homebrewPackageManager.installedVersion(macCtx(), 'git')).resolves.toBe('2.44.0');
  });

  it('should treat a missing formula as not installed', async () => {
    await expect(homebrewPackageManager.installedVersion(macCtx(), 'sqlc')).resolves.toBeNull();
  });

  it('should install a missing formula', async () => {
    await homebrewPackageManager.install(macCtx(), { name: 'sqlc' });

    expect(runner.calls.slice(1)).toEqual([{ command: 'brew install sqlc', options: BREW_ENV }]);
  });

  it('should upgrade an installed formula that misses its constraint', async () => {
    await homebrewPackageManager.install(macCtx(), { name: 'git', version: '2.45' });

    expect(runner.calls.slice(1)).toEqual([{ command: 'brew upgrade git', options: BREW_ENV }]);
  });

  it('should install tap formulas by their full name', async () => {
    runner.on(/^brew ls --versions/, (match) => {
      throw new Error(`no such keg: ${match.input}`);
    });

    await homebrewPackageManager.install(macCtx(), { name: 'cloudflare/cloudflare/cloudflared' });

    expect(runner.commands[1]).toBe('brew install cloudflare/cloudflare/cloudflared');
  });

  describe('isAvailable', () => {
    it('should find brew under the Homebrew prefix when it is not on PATH', async () => {
      runner.on(/^command -v brew$/, (_match, options) => {
        const dirs = options.env?.PATH?.split(':') ?? [];
        if (!dirs.includes('/opt/homebrew/bin')) throw new Error('brew: not found');
        return '/opt/homebrew/bin/brew';
      });

      await expect(homebrewPackageManager.isAvailable(macCtx())).resolves.toBe(true);
    });

    it('should fall back to the system PATH when none is set', async () => {
      await homebrewPackageManager.installedVersion(createContext({ runner, osFamily: 'macos' }), 'git');

      expect(runner.calls[0].options.env?.PATH).toBe('/opt/homebrew/bin:/usr/local/bin:/usr/bin:/bin:/usr/sbin:/sbin');
    });
  });

  describe('refresh and cleanup', () => {
    it('should update and clean up through brew', async () => {
      runner.on(/^brew (update|cleanup)$/, '');

      await homebrewPackageManager.refresh(macCtx());
      await homebrewPackageManager.cleanup(macCtx());

      expect(runner.calls).toEqual([
        { command: 'brew update', options: BREW_ENV },
        { command: 'brew cleanup', options: BREW_ENV },
      ]);
    });
  });

  describe('bootstrap', () => {
    it('should be able to bootstrap itself', () => {
      expect(homebrewPackageManager.canBootstrap).toBe(true);
    });

    it('should install the command line tools before Homebrew', async () => {
      runner.on(/^xcode-select --install$/, '').on(/install\.sh/, '');

      await homebrewPackageManager.bootstrap(macCtx());

      expect(runner.calls).toEqual([
        { command: 'xcode-select -p', options: {} },
        { command: 'xcode-select --install', options: { interactive: true } },
        { command: expect.stringContaining('Homebrew/install/HEAD/install.sh'), options: { interactive: true } },
      ]);
    });

    it('should skip the command line tools when present', async () => {
      runner.on(/^xcode-select -p$/, '/Library/Developer/CommandLineTools').on(/install\.sh/, '');

      await homebrewPackageManager.bootstrap(macCtx());

      expect(runner.commands).toEqual([
        'xcode-select -p',
        expect.stringContaining('install.sh'),
      ]);
    });
  });
});
