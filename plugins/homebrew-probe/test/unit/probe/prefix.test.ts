import { resolvePrefix, fallbackPrefix } from '../../../src/probe/prefix.js';
import { DEFAULT_CONFIG } from '../../../src/config/loader.js';
import { FakeHost } from '../../helpers/fake-host.js';

describe('fallbackPrefix', () => {
  it('maps arm64 to /opt/homebrew', () => {
    expect(fallbackPrefix('arm64', DEFAULT_CONFIG)).toBe('/opt/homebrew');
  });

  it('maps every other architecture to /usr/local', () => {
    expect(fallbackPrefix('x64', DEFAULT_CONFIG)).toBe('/usr/local');
    expect(fallbackPrefix('x86_64', DEFAULT_CONFIG)).toBe('/usr/local');
  });
});

describe('resolvePrefix', () => {
  it('trusts brew --prefix output once trimmed', async () => {
    const host = new FakeHost({ commands: { 'brew --prefix': { stdout: '  /custom/brew \n' } } });

    const resolution = await resolvePrefix(host, DEFAULT_CONFIG);

    expect(resolution).toEqual({ prefix: '/custom/brew', source: 'brew', diagnostics: [] });
  });

  it('falls back to the architecture default when brew is unavailable', async () => {
    const host = new FakeHost({ arch: 'arm64', files: ['/opt/homebrew/bin/brew'] });

    const resolution = await resolvePrefix(host, DEFAULT_CONFIG);

    expect(resolution.prefix).toBe('/opt/homebrew');
    expect(resolution.source).toBe('fallback');
    expect(resolution.diagnostics).toEqual([
      { kind: 'probe-unavailable', step: 'prefix', detail: 'brew --prefix exited with 127' },
    ]);
  });

  it('falls back when brew exits non-zero', async () => {
    const host = new FakeHost({
      arch: 'x64',
      files: ['/usr/local/bin/brew'],
      commands: { 'brew --prefix': { stdout: '/ignored', exitCode: 1 } },
    });

    expect((await resolvePrefix(host, DEFAULT_CONFIG)).prefix).toBe('/usr/local');
  });

  it('only considers the default for the host architecture', async () => {
    const host = new FakeHost({ arch: 'arm64', files: ['/usr/local/bin/brew'] });

    const resolution = await resolvePrefix(host, DEFAULT_CONFIG);

    expect(resolution.prefix).toBe('');
    expect(resolution.source).toBe('none');
    expect(resolution.diagnostics).toContainEqual({
      kind: 'not-found',
      step: 'prefix',
      detail: '/opt/homebrew/bin/brew does not exist',
    });
  });

  it('is empty when the default has no brew executable', async () => {
    const host = new FakeHost({ arch: 'x64', dirs: ['/usr/local/bin'] });

    expect((await resolvePrefix(host, DEFAULT_CONFIG)).prefix).toBe('');
  });
});
