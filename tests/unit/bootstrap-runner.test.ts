import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { chmod, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { statSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { runBootstrap } from '../../src/core/bootstrap-runner.js';
import type { BootstrapEvent, BootstrapSettings } from '../../src/types/bootstrap.js';
import { createRecordingRunner } from '../helpers/recording-runner.js';

let projectDir: string;
let events: BootstrapEvent[];

function makeSettings(overrides?: Partial<BootstrapSettings>): BootstrapSettings {
  return {
    projectDir,
    poetry: { path: '/opt/poetry/bin/poetry', source: 'flag' },
    fixPermissions: false,
    quiet: false,
    dryRun: false,
    env: { PATH: '/usr/bin' },
    ...overrides,
  };
}

const report = (event: BootstrapEvent): void => {
  events.push(event);
};

describe('runBootstrap', () => {
  beforeEach(async () => {
    projectDir = await mkdtemp(join(tmpdir(), 'devboot-runner-test-'));
    await writeFile(join(projectDir, 'pyproject.toml'), '[tool.poetry]\nname = "demo"\n');
    events = [];
  });

  afterEach(async () => {
    await rm(projectDir, { recursive: true, force: true });
  });

  it('configures then syncs to the lockfile', async () => {
    await writeFile(join(projectDir, 'poetry.lock'), '# lock\n');
    const runner = createRecordingRunner();

    const outcome = await runBootstrap({ settings: makeSettings(), runner, report });

    expect(outcome.status).toBe('done');
    expect(outcome.exitCode).toBe(0);
    expect(runner.calls.map((c) => c.args)).toEqual([
      ['config', 'virtualenvs.in-project', 'true', '--local'],
      ['install', '--no-root', '--sync'],
    ]);
    expect(runner.calls.every((c) => c.command === '/opt/poetry/bin/poetry')).toBe(true);
    expect(runner.calls.every((c) => c.options.cwd === projectDir)).toBe(true);
    expect(events.some((e) => e.type === 'warning')).toBe(false);
    if (outcome.status === 'done') {
      expect(outcome.installMode).toBe('sync');
    }
  });

  it('warns before a manifest-only install when there is no lockfile', async () => {
    const order: string[] = [];
    const runner = createRecordingRunner({}, (call) => order.push(`run:${call.args[0]}`));

    const outcome = await runBootstrap({
      settings: makeSettings(),
      runner,
      report: (event) => {
        if (event.type === 'warning') order.push('warning');
      },
    });

    expect(outcome.exitCode).toBe(0);
    expect(order).toEqual(['run:config', 'warning', 'run:install']);
    expect(runner.calls[1].args).toEqual(['install', '--no-root']);
  });

  it('never installs after a failed configure and keeps its exit code', async () => {
    await writeFile(join(projectDir, 'poetry.lock'), '# lock\n');
    const runner = createRecordingRunner({ config: { exitCode: 3 } });

    const outcome = await runBootstrap({ settings: makeSettings(), runner, report });

    expect(outcome.status).toBe('aborted');
    expect(outcome.exitCode).toBe(3);
    expect(runner.calls).toHaveLength(1);
    expect(runner.calls[0].args[0]).toBe('config');
    if (outcome.status === 'aborted') {
      expect(outcome.failure.step).toBe('configure');
      expect(outcome.failure.message).toBe('configure failed with exit code 3');
    }
  });

  it('reports the install exit code when install fails', async () => {
    const runner = createRecordingRunner({ install: { exitCode: 1 } });
    const outcome = await runBootstrap({ settings: makeSettings(), runner, report });

    expect(outcome.exitCode).toBe(1);
    expect(outcome.steps.map((s) => [s.step, s.ok])).toEqual([
      ['configure', true],
      ['install', false],
    ]);
  });

  it('uses the spawn error message when the binary cannot start', async () => {
    const runner = createRecordingRunner({
      config: { exitCode: 127, spawnError: '/opt/poetry/bin/poetry: Command not found' },
    });
    const outcome = await runBootstrap({ settings: makeSettings(), runner, report });

    expect(outcome.exitCode).toBe(127);
    if (outcome.status === 'aborted') {
      expect(outcome.failure.message).toBe('/opt/poetry/bin/poetry: Command not found');
    }
  });

  it('captures output only in quiet mode', async () => {
    const failing = { config: { exitCode: 2, stdout: 'out\n', stderr: 'err\n' } };

    const loud = await runBootstrap({
      settings: makeSettings(),
      runner: createRecordingRunner(failing),
      report,
    });
    const quietRunner = createRecordingRunner(failing);
    const quiet = await runBootstrap({
      settings: makeSettings({ quiet: true }),
      runner: quietRunner,
      report,
    });

    expect(quietRunner.calls[0].options.capture).toBe(true);
    if (loud.status === 'aborted' && quiet.status === 'aborted') {
      expect(loud.failure.output).toBeUndefined();
      expect(quiet.failure.output).toBe('out\nerr\n');
    } else {
      expect.unreachable('both runs should abort');
    }
  });

  it('passes the configured environment to every invocation', async () => {
    const env = { PATH: '/custom/bin', HOME: '/home/dev' };
    const runner = createRecordingRunner();
    await runBootstrap({ settings: makeSettings({ env }), runner, report });
    expect(runner.calls.map((c) => c.options.env)).toEqual([env, env]);
  });

  it('emits events in state-machine order', async () => {
    await writeFile(join(projectDir, 'poetry.lock'), '# lock\n');
    await runBootstrap({ settings: makeSettings(), runner: createRecordingRunner(), report });

    expect(events.map((e) => (e.type === 'step' || e.type === 'command' ? `${e.type}:${e.step}` : e.type))).toEqual([
      'start',
      'step:configure',
      'command:configure',
      'step-finished',
      'step:install',
      'command:install',
      'step-finished',
      'finished',
    ]);
  });

  describe.skipIf(process.platform === 'win32')('permission fix', () => {
    it('makes the binary executable before the first invocation', async () => {
      const binary = join(projectDir, 'poetry');
      await writeFile(binary, '#!/bin/sh\n');
      await chmod(binary, 0o644);

      const modesAtCall: number[] = [];
      const runner = createRecordingRunner({}, () => {
        modesAtCall.push(statSync(binary).mode & 0o777);
      });

      const outcome = await runBootstrap({
        settings: makeSettings({ fixPermissions: true, poetry: { path: binary, source: 'flag' } }),
        runner,
        report,
      });

      expect(outcome.exitCode).toBe(0);
      expect(modesAtCall).toEqual([0o755, 0o755]);
      expect(outcome.steps[0]).toEqual({ ok: true, step: 'permissions', detail: 'mode set to 755' });
    });

    it('aborts with exit code 1 when the binary is missing', async () => {
      const runner = createRecordingRunner();
      const missing = join(projectDir, 'nope', 'poetry');

      const outcome = await runBootstrap({
        settings: makeSettings({ fixPermissions: true, poetry: { path: missing, source: 'default' } }),
        runner,
        report,
      });

      expect(outcome.status).toBe('aborted');
      expect(outcome.exitCode).toBe(1);
      expect(runner.calls).toHaveLength(0);
      if (outcome.status === 'aborted') {
        expect(outcome.failure.step).toBe('permissions');
        expect(outcome.failure.message).toContain(`Cannot make ${missing} executable`);
      }
    });

    it('skips the step when disabled', async () => {
      const runner = createRecordingRunner();
      const outcome = await runBootstrap({ settings: makeSettings(), runner, report });
      expect(outcome.steps.map((s) => s.step)).toEqual(['configure', 'install']);
    });
  });
});
