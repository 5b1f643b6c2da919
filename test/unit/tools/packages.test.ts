import { defaultConfig } from '../../../src/config/loader.js';
import { PackageManager } from '../../../src/packages/manager.js';
import { ToolRegistry } from '../../../src/tools/registry.js';
import { registerPackageTools } from '../../../src/tools/packages/index.js';
import type { ServerContext } from '../../../src/tools/context.js';
import type { ToolResponse } from '../../../src/types/response.js';
import { FakeProcessRunner } from '../helpers/fake-runner.js';
import { createEnvironment, type TestEnvironment } from '../helpers/environment.js';

const BOOTSTRAP = '/opt/bootstrap/tool_bootstrap.py';

describe('package tools', () => {
  let env: TestEnvironment | undefined;
  let runner: FakeProcessRunner;
  let ctx: ServerContext;

  async function setup(opts: Parameters<typeof createEnvironment>[0] = {}): Promise<TestEnvironment> {
    env = await createEnvironment(opts);
    runner = new FakeProcessRunner();
    ctx = {
      config: defaultConfig(),
      configPath: '/tmp/config.yaml',
      firstRun: false,
      interpreters: [env.config],
      packages: new PackageManager({ runner, bootstrapScriptPath: BOOTSTRAP }),
      registry: new ToolRegistry(),
    };
    registerPackageTools(ctx);
    return env;
  }

  function call(name: string, args: unknown = {}): Promise<ToolResponse> {
    const tool = ctx.registry.get(name);
    if (!tool) throw new Error(`tool not registered: ${name}`);
    return tool.execute(args, {});
  }

  afterEach(async () => {
    await env?.cleanup();
    env = undefined;
  });

  it('registers every package tool', async () => {
    await setup();
    expect(ctx.registry.names()).toEqual([
      'interpreter_list',
      'pkg_freeze',
      'pkg_is_installed',
      'pkg_install',
      'pkg_query_install',
      'pkg_uninstall',
      'pkg_install_tool',
    ]);
    expect(ctx.registry.get('pkg_uninstall')?.metadata.mutating).toBe(true);
    expect(ctx.registry.get('pkg_freeze')?.metadata.mutating).toBe(false);
  });

  describe('interpreter_list', () => {
    it('describes each interpreter and how the tool is launched', async () => {
      const { config } = await setup();
      const response = await call('interpreter_list');

      expect(response).toMatchObject({
        status: 'success',
        tool: 'interpreter_list',
        interpreter: null,
        data: {
          config_path: '/tmp/config.yaml',
          first_run: false,
          interpreters: [
            {
              id: 'test',
              version: '3.11',
              prefix_path: config.prefixPath,
              interpreter_path: config.interpreterPath,
              runnable: true,
              tool_module_installed: false,
              tool_invocation: {
                executablePath: config.interpreterPath,
                leadingArguments: ['-m', 'pip'],
                requiresInterpreterPrefix: true,
              },
            },
          ],
        },
      });
    });
  });

  describe('pkg_freeze', () => {
    it('returns the sorted package list', async () => {
      await setup();
      runner
        .onArg('--version', { stdoutLines: ['pip 23.0 from /somewhere'] })
        .onArg('freeze', { stdoutLines: ['six==1.16.0', 'attrs==23.1.0'] });

      const response = await call('pkg_freeze');
      expect(response).toMatchObject({
        status: 'success',
        interpreter: 'test',
        data: { packages: ['attrs==23.1.0', 'pip==23.0', 'six==1.16.0'], count: 3 },
      });
    });

    it('reports an unknown interpreter id', async () => {
      await setup();
      const response = await call('pkg_freeze', { interpreter: 'nope' });
      expect(response).toMatchObject({
        status: 'error',
        error_code: 'INTERPRETER_NOT_FOUND',
        error_category: 'not_found',
        message: 'Unknown interpreter: nope',
      });
      expect(runner.runs).toHaveLength(0);
    });
  });

  describe('pkg_is_installed', () => {
    it('rejects missing arguments before running anything', async () => {
      await setup();
      const response = await call('pkg_is_installed', {});
      expect(response).toMatchObject({
        status: 'error',
        error_code: 'INVALID_ARGUMENTS',
        error_category: 'validation',
        message: 'requirement: Required',
        duration_ms: null,
      });
      expect(runner.runs).toHaveLength(0);
    });

    it('reports whether the requirement is satisfied', async () => {
      await setup();
      runner.onArg('-c', { exitCode: 1 });
      const response = await call('pkg_is_installed', { requirement: 'requests>=2.0' });
      expect(response).toMatchObject({
        status: 'success',
        data: { requirement: 'requests>=2.0', installed: false },
      });
    });
  });

  describe('pkg_install', () => {
    it('asks for confirmation when the tool must be bootstrapped first', async () => {
      await setup();
      const response = await call('pkg_install', { package: 'requests' });
      expect(response).toEqual({
        status: 'confirmation_required',
        tool: 'pkg_install',
        interpreter: 'test',
        duration_ms: null,
        prompts: ['pip is not installed in this environment. Install it now?'],
      });
      expect(runner.runs).toHaveLength(0);
    });

    it('installs and returns the collected output', async () => {
      await setup({ sitePackages: ['pip'] });
      runner.onArg('install', { stdoutLines: ['Collecting requests'] });

      const response = await call('pkg_install', { package: 'requests' });
      expect(response).toMatchObject({
        status: 'success',
        interpreter: 'test',
        data: {
          package: 'requests',
          output: ["Installing 'requests'", 'Collecting requests', "Successfully installed 'requests'"],
          output_visibility: 'activated',
        },
      });
      expect(runner.runs[0]?.options.elevate).toBe(false);
    });

    it('bootstraps and installs once confirmed', async () => {
      await setup();
      const response = await call('pkg_install', { package: 'requests', confirmed: true, elevate: true });
      expect(response.status).toBe('success');
      expect(runner.runs.map((r) => r.args)).toEqual([[BOOTSTRAP], ['-m', 'pip', 'install', 'requests']]);
      expect(runner.runs.map((r) => r.options.elevate)).toEqual([false, true]);
    });

    it('maps a failed install to TOOL_FAILED with the output attached', async () => {
      await setup({ sitePackages: ['pip'] });
      runner.onArg('install', { exitCode: 1, stderrLines: ['No matching distribution'] });

      const response = await call('pkg_install', { package: 'requests' });
      expect(response).toMatchObject({
        status: 'error',
        error_code: 'TOOL_FAILED',
        error_category: 'tool_failed',
        message: "Failed to install 'requests' (exit code 1)",
        output: ["Installing 'requests'", 'No matching distribution', "Failed to install 'requests' (exit code 1)"],
      });
    });

    it('maps a missing interpreter to NOT_RUNNABLE', async () => {
      await setup({ runnable: false });
      const response = await call('pkg_install', { package: 'requests', confirmed: true });
      expect(response).toMatchObject({
        status: 'error',
        error_code: 'NOT_RUNNABLE',
        error_category: 'not_runnable',
      });
      expect(runner.runs).toHaveLength(0);
    });
  });

  describe('pkg_query_install', () => {
    it('returns success without prompting when already installed', async () => {
      await setup();
      runner.onArg('-c', { exitCode: 0 });
      const response = await call('pkg_query_install', { package: 'requests' });
      expect(response).toMatchObject({ status: 'success', data: { package: 'requests', output: [] } });
      expect(runner.runs).toHaveLength(1);
    });

    it('asks for confirmation when the package is missing', async () => {
      await setup();
      runner.onArg('-c', { exitCode: 1 });
      const response = await call('pkg_query_install', { package: 'requests' });
      expect(response).toMatchObject({
        status: 'confirmation_required',
        prompts: ["'requests' is not installed. Install it now?"],
      });
      expect(runner.runs.map((r) => r.args[0])).toEqual(['-c']);
    });

    it('installs once confirmed', async () => {
      await setup();
      runner.onArg('-c', { exitCode: 1 });
      const response = await call('pkg_query_install', { package: 'requests', confirmed: true });
      expect(response.status).toBe('success');
      expect(runner.runs[1]?.args).toEqual(['-m', 'pip', 'install', 'requests']);
    });
  });

  describe('pkg_uninstall', () => {
    it('requires confirmation', async () => {
      await setup();
      const response = await call('pkg_uninstall', { package: 'requests' });
      expect(response).toMatchObject({
        status: 'confirmation_required',
        interpreter: 'test',
        prompts: ["Uninstall 'requests'?"],
      });
      expect(runner.runs).toHaveLength(0);
    });

    it('uninstalls once confirmed', async () => {
      await setup();
      const response = await call('pkg_uninstall', { package: 'requests', confirmed: true });
      expect(response).toMatchObject({
        status: 'success',
        data: { package: 'requests', output: ["Uninstalling 'requests'", "Successfully uninstalled 'requests'"] },
      });
      expect(runner.runs[0]?.args).toEqual(['-m', 'pip', 'uninstall', '-y', 'requests']);
    });
  });

  describe('pkg_install_tool', () => {
    it('succeeds without prompting when the tool module is present', async () => {
      await setup({ sitePackages: ['pip'] });
      const response = await call('pkg_install_tool');
      expect(response).toMatchObject({
        status: 'success',
        data: { tool: 'pip', output: [], output_visibility: 'hidden' },
      });
      expect(runner.runs).toHaveLength(0);
    });

    it('requires confirmation when the tool module is missing', async () => {
      await setup();
      const response = await call('pkg_install_tool');
      expect(response).toMatchObject({
        status: 'confirmation_required',
        prompts: ['pip is not installed in this environment. Install it now?'],
      });
    });

    it('runs the bootstrap once confirmed', async () => {
      await setup();
      const response = await call('pkg_install_tool', { confirmed: true });
      expect(response).toMatchObject({
        status: 'success',
        data: { tool: 'pip', output: ['Installing pip', 'Successfully installed pip'] },
      });
      expect(runner.runs.map((r) => r.args)).toEqual([[BOOTSTRAP]]);
    });
  });
});
