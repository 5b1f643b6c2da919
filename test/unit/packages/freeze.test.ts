import { PackageManager } from '../../../src/packages/manager.js';
import { packageNameFromDirectory, toolVersionPattern } from '../../../src/packages/freeze.js';
import { PackageToolError, PackageToolErrorCode, operationCanceled } from '../../../src/shared/errors.js';
import { FakeProcessRunner } from '../helpers/fake-runner.js';
import { createEnvironment, type TestEnvironment } from '../helpers/environment.js';

const sorted = (set: ReadonlySet<string>): string[] => [...set].sort();

describe('PackageManager.freeze', () => {
  let env: TestEnvironment | undefined;
  let runner: FakeProcessRunner;
  let manager: PackageManager;

  beforeEach(() => {
    runner = new FakeProcessRunner();
    manager = new PackageManager({ runner });
  });

  afterEach(async () => {
    await env?.cleanup();
    env = undefined;
  });

  it('unions the version probe with freeze output when freeze succeeds', async () => {
    env = await createEnvironment({ sitePackages: ['ignored-1.0'] });
    runner
      .onArg('--version', { stdoutLines: ['pip 21.3.1'] })
      .onArg('freeze', { stdoutLines: ['requests==2.28.1'] });

    expect(sorted(await manager.freeze(env.config))).toEqual(['pip==21.3.1', 'requests==2.28.1']);
  });

  it('runs --version then freeze through the located tool', async () => {
    env = await createEnvironment();
    await manager.freeze(env.config);
    expect(runner.runs.map((r) => r.args)).toEqual([
      ['-m', 'pip', '--version'],
      ['-m', 'pip', 'freeze'],
    ]);
    expect(runner.runs[0]?.options).toMatchObject({
      cwd: env.root,
      env: { PYTHONUNBUFFERED: '1' },
      output: null,
      quoteArgs: false,
    });
  });

  it('discards the version seed and scans site-packages when freeze fails', async () => {
    env = await createEnvironment({
      sitePackages: ['requests-2.28.1', 'numpy-1.23.0', 'numpy-1.23.0.dist-info'],
      files: ['Lib/site-packages/six.py'],
    });
    runner
      .onArg('--version', { stdoutLines: ['pip 21.3.1'] })
      .onArg('freeze', { exitCode: 1 });

    expect(sorted(await manager.freeze(env.config))).toEqual(['numpy', 'requests']);
  });

  it('returns an empty set when the tool fails and site-packages is missing', async () => {
    env = await createEnvironment();
    runner.onArg('--version', { exitCode: 1 }).onArg('freeze', { exitCode: 2 });
    expect(sorted(await manager.freeze(env.config))).toEqual([]);
  });

  it('skips the tool entirely when the interpreter is not runnable', async () => {
    env = await createEnvironment({ runnable: false, sitePackages: ['attrs-23.1.0'] });
    expect(sorted(await manager.freeze(env.config))).toEqual(['attrs']);
    expect(runner.runs).toHaveLength(0);
  });

  it('treats a runner error as a failed strategy', async () => {
    env = await createEnvironment({ sitePackages: ['attrs-23.1.0'] });
    runner.onArg('freeze', new PackageToolError(PackageToolErrorCode.SPAWN_FAILED, 'no exit code'));
    expect(sorted(await manager.freeze(env.config))).toEqual(['attrs']);
  });

  it('never throws for an absent tool and absent directory', async () => {
    env = await createEnvironment({ runnable: false });
    await expect(manager.freeze(env.config)).resolves.toEqual(new Set());
  });

  it('propagates cancellation', async () => {
    env = await createEnvironment();
    runner.onArg('--version', operationCanceled());
    await expect(manager.freeze(env.config)).rejects.toMatchObject({ code: PackageToolErrorCode.OPERATION_CANCELED });
  });

  it('returns equal sets on repeated calls with no change', async () => {
    env = await createEnvironment();
    runner
      .onArg('--version', { stdoutLines: ['pip 23.2 from /usr/lib/python3/site-packages/pip (python 3.11)'] })
      .onArg('freeze', { stdoutLines: ['attrs==23.1.0', '', 'six==1.16.0'] });

    const first = await manager.freeze(env.config);
    const second = await manager.freeze(env.config);
    expect(sorted(first)).toEqual(['attrs==23.1.0', 'pip==23.2', 'six==1.16.0']);
    expect(sorted(second)).toEqual(sorted(first));
    expect(second).not.toBe(first);
  });
});

describe('packageNameFromDirectory', () => {
  it('takes the leading name before a version suffix', () => {
    expect(packageNameFromDirectory('requests-2.28.1')).toBe('requests');
    expect(packageNameFromDirectory('typing_extensions-4.7.1.dist-info')).toBe('typing_extensions');
    expect(packageNameFromDirectory('Django')).toBe('Django');
  });

  it('returns null when the name does not start with a word character', () => {
    expect(packageNameFromDirectory('.cache')).toBeNull();
  });
});

describe('toolVersionPattern', () => {
  it('extracts the version after the tool name', () => {
    expect(toolVersionPattern('pip').exec('pip 21.3.1 from /x (python 3.9)')?.[1]).toBe('21.3.1');
  });

  it('escapes regex characters in the tool name', () => {
    expect(toolVersionPattern('pip.x').exec('pipax 1.0')).toBeNull();
  });
});
