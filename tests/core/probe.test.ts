/**
 * Tests for the environment probe
 */

import { mkdirSync, writeFileSync } from 'node:fs';
import path from 'node:path';

import { UnsupportedPlatformError } from '../../src/core/errors.js';
import { parsePasswd, probe, type ProbeOptions } from '../../src/core/probe.js';
import { createTempDir, createTestLogger, FakeMachine } from '../mocks/index.js';

describe('Probe', () => {
  let tmp: ReturnType<typeof createTempDir>;
  let home: string;
  let options: ProbeOptions;

  beforeEach(() => {
    tmp = createTempDir();
    home = path.join(tmp.dir, 'home', 'dev');
    mkdirSync(path.join(home, '.ssh'), { recursive: true });
    writeFileSync(path.join(home, '.ssh', 'id_ed25519.pub'), 'ssh-ed25519 AAAAtest dev@example.com\n');
    writeFileSync(path.join(home, '.ssh', 'known_hosts'), '');
    writeFileSync(
      path.join(tmp.dir, 'passwd'),
      'root:x:0:0:root:/root:/bin/bash\ndev:x:1000:1000::/home/dev:/bin/zsh\n',
    );
    writeFileSync(path.join(tmp.dir, 'os-release'), 'ID="amzn"\n');

    options = {
      platform: 'linux',
      homeDir: home,
      username: 'dev',
      uid: 1000,
      env: {},
      runner: new FakeMachine({ commands: ['yum'] }),
      logger: createTestLogger(),
      passwdPath: path.join(tmp.dir, 'passwd'),
      osReleasePath: path.join(tmp.dir, 'os-release'),
    };
  });

  afterEach(() => tmp.cleanup());

  describe('parsePasswd', () => {
    it('should map users to home directories', () => {
      const homes = parsePasswd('root:x:0:0:root:/root:/bin/bash\n# comment\nbroken\n\ndev:x:1000:1000::/home/dev:/bin/zsh');

      expect([...homes]).toEqual([
        ['root', '/root'],
        ['dev', '/home/dev'],
      ]);
    });
  });

  describe('probe', () => {
    it('should snapshot a Linux host', async () => {
      const result = await probe(options);

      expect(result.osFamily).toBe('linux');
      expect(result.distro).toBe('amzn');
      expect(result.packageManager).toBe('yum');
      expect([...result.existingUsers]).toEqual(['root', 'dev']);
      expect(result.userHomes.get('dev')).toBe('/home/dev');
      expect(result.homeBase).toBe('/home');
      expect([...result.sshPublicKeys]).toEqual([path.join(home, '.ssh', 'id_ed25519.pub')]);
      expect(result.isRoot).toBe(false);
      expect(result.currentUser).toBe('dev');
      expect(result.homeDir).toBe(home);
    });

    it('should fall back to APT when YUM is missing', async () => {
      const result = await probe({ ...options, runner: new FakeMachine({ commands: ['apt-get'] }) });

      expect(result.packageManager).toBe('apt');
    });

    it('should report no package manager when none is available', async () => {
      const result = await probe({ ...options, runner: new FakeMachine() });

      expect(result.packageManager).toBeNull();
    });

    it('should detect root from the effective uid', async () => {
      expect((await probe({ ...options, uid: 0 })).isRoot).toBe(true);
      expect((await probe({ ...options, uid: undefined })).isRoot).toBe(false);
    });

    it('should tolerate a missing passwd file and .ssh directory', async () => {
      const result = await probe({
        ...options,
        homeDir: path.join(tmp.dir, 'empty'),
        passwdPath: path.join(tmp.dir, 'missing'),
      });

      expect(result.existingUsers.size).toBe(0);
      expect(result.sshPublicKeys.size).toBe(0);
    });

    it('should list macOS accounts through dscl', async () => {
      const runner = new FakeMachine({ commands: ['brew'] }).on(/^dscl \. -list \/Users$/, '_www\ndaemon\nroot\ndev\n');

      const result = await probe({ ...options, platform: 'darwin', runner });

      expect(result.osFamily).toBe('macos');
      expect(result.distro).toBeUndefined();
      expect(result.packageManager).toBe('homebrew');
      expect([...result.existingUsers]).toEqual(['daemon', 'root', 'dev']);
      expect(result.userHomes.get('dev')).toBe('/Users/dev');
      expect(result.homeBase).toBe('/Users');
    });

    it('should reject an unsupported platform before touching anything', async () => {
      const runner = new FakeMachine();

      await expect(probe({ ...options, platform: 'win32', runner })).rejects.toThrow(UnsupportedPlatformError);
      expect(runner.calls).toEqual([]);
    });

    it('should log the snapshot', async () => {
      const info = jest.spyOn(options.logger, 'info');

      await probe(options);

      expect(info).toHaveBeenCalledWith(
        { os: 'linux', distro: 'amzn', packageManager: 'yum', users: 2, sshKeys: 1, root: false },
        'Probed environment',
      );
    });
  });
});
