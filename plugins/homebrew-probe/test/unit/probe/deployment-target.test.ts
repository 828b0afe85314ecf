import { deploymentTargetFromVersion, inferDeploymentTarget } from '../../../src/probe/deployment-target.js';
import { FakeHost } from '../../helpers/fake-host.js';

describe('deploymentTargetFromVersion', () => {
  it('keeps only the major version', () => {
    expect(deploymentTargetFromVersion('15.7.1')).toBe('15.0');
    expect(deploymentTargetFromVersion('26')).toBe('26.0');
  });

  it('returns null without leading digits', () => {
    expect(deploymentTargetFromVersion('')).toBeNull();
    expect(deploymentTargetFromVersion('v15.1')).toBeNull();
  });
});

describe('inferDeploymentTarget', () => {
  it('reads the product version from sw_vers', async () => {
    const host = new FakeHost({ commands: { 'sw_vers -productVersion': { stdout: '14.6.1\n' } } });

    expect(await inferDeploymentTarget(host)).toEqual({ target: '14.0', diagnostics: [] });
  });

  it('reports a missing sw_vers', async () => {
    const result = await inferDeploymentTarget(new FakeHost());

    expect(result.target).toBeNull();
    expect(result.diagnostics).toEqual([
      { kind: 'probe-unavailable', step: 'deployment-target', detail: 'sw_vers exited with 127' },
    ]);
  });
});
