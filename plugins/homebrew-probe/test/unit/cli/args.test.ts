import { parseCliArgs } from '../../../src/cli/args.js';
import { ProbeError, ProbeErrorCode } from '../../../src/shared/errors.js';

describe('parseCliArgs', () => {
  it('needs no arguments', () => {
    expect(parseCliArgs([])).toEqual({
      buildDir: '.',
      format: 'cmake',
      fresh: false,
      configPath: undefined,
      outputPath: undefined,
      help: false,
      flags: { prefix: undefined, pythonExecutable: undefined, deploymentTarget: undefined, buildGui: undefined },
    });
  });

  it('maps pinned values onto probe inputs', () => {
    const args = parseCliArgs(['--prefix', '/opt/homebrew', '--python', '/usr/bin/python3', '--deployment-target', '13.0', '--no-gui']);

    expect(args.flags).toEqual({
      prefix: '/opt/homebrew',
      pythonExecutable: '/usr/bin/python3',
      deploymentTarget: '13.0',
      buildGui: false,
    });
  });

  it('reads an initial prefix path', () => {
    expect(parseCliArgs(['--prefix-path', '/opt/qt;/opt/vtk']).flags.prefixPath).toBe('/opt/qt;/opt/vtk');
  });

  it('rejects an unknown format', () => {
    expect(() => parseCliArgs(['--format', 'xml'])).toThrow('Unknown format "xml", expected one of: cmake, json, env');
  });

  it('rejects unknown options', () => {
    let caught: unknown;
    try {
      parseCliArgs(['--verbose']);
    } catch (err) {
      caught = err;
    }
    expect(caught instanceof ProbeError && caught.code).toBe(ProbeErrorCode.INVALID_ARGUMENT);
  });

  it('rejects --gui together with --no-gui', () => {
    expect(() => parseCliArgs(['--gui', '--no-gui'])).toThrow('--gui and --no-gui are mutually exclusive');
  });
});
