import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { runCli, EXIT_OK, EXIT_USAGE } from '../../../src/cli/main.js';
import { USAGE } from '../../../src/cli/args.js';
import { FakeHost } from '../../helpers/fake-host.js';

describe('runCli', () => {
  let tmpDir: string;
  let output: string[];
  let env: NodeJS.ProcessEnv;
  const stdout = (text: string) => {
    output.push(text);
  };

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'homebrew-probe-cli-'));
    output = [];
    // An empty config file keeps the defaults and keeps ~/.config out of the run.
    const configPath = path.join(tmpDir, 'empty-config.yaml');
    await fs.writeFile(configPath, '', 'utf-8');
    env = { HOMEBREW_PROBE_CONFIG: configPath };
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  const host = () => new FakeHost({
    commands: {
      'brew --prefix': { stdout: '/opt/homebrew\n' },
      'sw_vers -productVersion': { stdout: '15.7.1\n' },
    },
  });

  it('prints usage', async () => {
    expect(await runCli(['--help'], { env, stdout })).toBe(EXIT_OK);
    expect(output).toEqual([USAGE]);
  });

  it('prints an initial-cache script by default', async () => {
    const code = await runCli(['--build-dir', tmpDir, '--no-gui'], { env, stdout, host: host() });

    expect(code).toBe(EXIT_OK);
    expect(output.join('')).toBe([
      '# Generated by homebrew-probe. Load with: cmake -C <this file>',
      'set(HOMEBREW_PREFIX "/opt/homebrew" CACHE PATH "Homebrew installation prefix")',
      'set(CMAKE_PREFIX_PATH "/opt/homebrew" CACHE STRING "Prefix search path")',
      'set(CMAKE_OSX_DEPLOYMENT_TARGET "15.0" CACHE STRING "Minimum macOS deployment version")',
      '',
    ].join('\n'));
  });

  it('writes to an output file', async () => {
    const outputPath = path.join(tmpDir, 'probe.env');

    const code = await runCli(['--build-dir', tmpDir, '--format', 'env', '--output', outputPath], { env, stdout, host: host() });

    expect(code).toBe(EXIT_OK);
    expect(output).toEqual([]);
    expect(await fs.readFile(outputPath, 'utf-8')).toBe(
      "export HOMEBREW_PREFIX='/opt/homebrew'\nexport CMAKE_PREFIX_PATH='/opt/homebrew'\nexport MACOSX_DEPLOYMENT_TARGET='15.0'\n",
    );
  });

  it('exits with a usage error for a bad format', async () => {
    expect(await runCli(['--format', 'xml'], { env, stdout })).toBe(EXIT_USAGE);
    expect(output).toEqual([]);
  });

  it('exits with a usage error for a missing config file', async () => {
    const env = { HOMEBREW_PROBE_CONFIG: path.join(tmpDir, 'nope.yaml') };

    expect(await runCli([], { env, stdout, host: host() })).toBe(EXIT_USAGE);
  });

  it('reads the config named by --config', async () => {
    const configPath = path.join(tmpDir, 'config.yaml');
    await fs.writeFile(configPath, 'cache_file: custom-cache.json\n', 'utf-8');

    await runCli(['--build-dir', tmpDir, '--config', configPath, '--format', 'json'], { env, stdout, host: host() });

    await expect(fs.access(path.join(tmpDir, 'custom-cache.json'))).resolves.toBeUndefined();
  });
});
