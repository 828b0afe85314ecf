import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { NodeHost } from '../../../src/host/host.js';
import { SPAWN_FAILED_EXIT_CODE } from '../../../src/execution/executor.js';
import type { Executor } from '../../../src/execution/executor.js';
import type { Command } from '../../../src/types/command.js';

describe('NodeHost', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'homebrew-probe-host-'));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('tells files from directories', async () => {
    const file = path.join(tmpDir, 'brew');
    await fs.writeFile(file, '', 'utf-8');
    const host = new NodeHost();

    expect(await host.exists(file)).toBe(true);
    expect(await host.isDirectory(file)).toBe(false);
    expect(await host.isDirectory(tmpDir)).toBe(true);
    expect(await host.exists(path.join(tmpDir, 'missing'))).toBe(false);
    expect(await host.isDirectory(path.join(tmpDir, 'missing'))).toBe(false);
  });

  it('passes commands and the timeout to its executor', async () => {
    const seen: Array<{ command: Command; timeoutMs: number }> = [];
    const executor: Executor = {
      async execute(command, timeoutMs) {
        seen.push({ command, timeoutMs });
        return { stdout: '15.7.1\n', stderr: '', exitCode: 0, durationMs: 1 };
      },
    };
    const host = new NodeHost({ executor, timeoutMs: 5000, platform: 'darwin', arch: 'arm64' });

    const result = await host.run(['sw_vers', '-productVersion']);

    expect(result.stdout).toBe('15.7.1\n');
    expect(seen).toEqual([{ command: { argv: ['sw_vers', '-productVersion'] }, timeoutMs: 5000 }]);
    expect(host.platform).toBe('darwin');
    expect(host.arch).toBe('arm64');
  });

  it('reports a missing executable as a failed spawn', async () => {
    const host = new NodeHost();

    const result = await host.run(['homebrew-probe-no-such-command']);

    expect(result.exitCode).toBe(SPAWN_FAILED_EXIT_CODE);
  });
});
