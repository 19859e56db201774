import { mkdtemp, readdir, readFile, rm } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import { afterAll, beforeAll, describe, expect, it, vi } from 'vitest';
import { BoundedOutput, CommandExecutor, buildExecutionEnv } from './executor.js';

/**
 * Members of a process group that are still running (zombies excluded).
 */
async function liveGroupMembers(pgid: number): Promise<number[]> {
  const live: number[] = [];
  for (const entry of await readdir('/proc')) {
    if (!/^\d+$/.test(entry)) continue;
    let stat: string;
    try {
      stat = await readFile(`/proc/${entry}/stat`, 'utf8');
    } catch {
      continue; // exited while scanning
    }
    const fields = stat.slice(stat.lastIndexOf(')') + 2).split(' ');
    if (Number(fields[2]) === pgid && fields[0] !== 'Z') {
      live.push(Number(entry));
    }
  }
  return live;
}

describe('BoundedOutput', () => {
  it('keeps the first bytes across chunks and flags the rest', () => {
    const buffer = new BoundedOutput(5);
    buffer.push(Buffer.from('abc'));
    buffer.push(Buffer.from('def'));
    buffer.push(Buffer.from('ghi'));

    expect(buffer.text()).toBe('abcde');
    expect(buffer.byteLength).toBe(5);
    expect(buffer.truncated).toBe(true);
  });

  it('is not truncated when the output fits exactly', () => {
    const buffer = new BoundedOutput(3);
    buffer.push(Buffer.from('abc'));
    expect(buffer.text()).toBe('abc');
    expect(buffer.truncated).toBe(false);
  });

  it('drops a multi-byte character cut by the limit', () => {
    const buffer = new BoundedOutput(5);
    buffer.push(Buffer.from('ééé'));
    expect(buffer.text()).toBe('éé');
  });
});

describe('buildExecutionEnv', () => {
  it('keeps allowlisted variables and forces non-interactive settings', () => {
    const env = buildExecutionEnv('/tmp/work', {
      PATH: '/usr/bin',
      HOME: '/home/user',
      TERM: 'xterm-256color',
      API_TOKEN: 'test-secret',
    });

    expect(env).toEqual({
      PATH: '/usr/bin',
      HOME: '/home/user',
      TERM: 'dumb',
      NO_COLOR: '1',
      CI: '1',
      PAGER: 'cat',
      GIT_PAGER: 'cat',
      GIT_TERMINAL_PROMPT: '0',
      DEBIAN_FRONTEND: 'noninteractive',
      PWD: '/tmp/work',
    });
  });

  it('falls back to a standard PATH', () => {
    expect(buildExecutionEnv('/tmp', {}).PATH).toBe('/usr/local/bin:/usr/bin:/bin');
  });
});

describe('CommandExecutor', () => {
  const executor = new CommandExecutor({ killGraceMs: 200 });
  let workspace: string;

  beforeAll(async () => {
    workspace = await mkdtemp(join(tmpdir(), 'shellgate-executor-'));
  });

  afterAll(async () => {
    await rm(workspace, { recursive: true, force: true });
  });

  it('runs in the requested directory and reports the exit status', async () => {
    const outcome = await executor.run({ command: 'pwd', cwd: workspace, maxOutputSize: 4096 });

    expect(outcome.state).toBe('completed');
    if (outcome.state !== 'completed') return;
    expect(outcome.exitCode).toBe(0);
    expect(outcome.output).toBe(`${workspace}\n`);
    expect(outcome.stderr).toBe('');
    expect(outcome.truncated).toBe(false);
  });

  it('captures stderr into the combined output and separately', async () => {
    const outcome = await executor.run({ command: 'echo oops >&2; exit 3', cwd: workspace, maxOutputSize: 4096 });

    expect(outcome.state).toBe('completed');
    if (outcome.state !== 'completed') return;
    expect(outcome.exitCode).toBe(3);
    expect(outcome.output).toBe('oops\n');
    expect(outcome.stderr).toBe('oops\n');
  });

  it('reports 128 plus the signal number when the shell is killed by a signal', async () => {
    const outcome = await executor.run({ command: 'kill -TERM $$', cwd: workspace, maxOutputSize: 4096 });

    expect(outcome.state).toBe('completed');
    if (outcome.state !== 'completed') return;
    expect(outcome.exitCode).toBe(143);
  });

  it('bounds captured output and flags truncation', async () => {
    const outcome = await executor.run({ command: "printf '%01000d' 0", cwd: workspace, maxOutputSize: 10 });

    expect(outcome.state).toBe('completed');
    expect(outcome.output).toBe('0000000000');
    expect(Buffer.byteLength(outcome.output)).toBeLessThanOrEqual(10);
    expect(outcome.truncated).toBe(true);
  });

  it('keeps draining output past the limit so the child never stalls', async () => {
    const outcome = await executor.run({
      command: 'head -c 500000 /dev/zero',
      cwd: workspace,
      maxOutputSize: 10,
    });

    expect(outcome.state).toBe('completed');
    if (outcome.state !== 'completed') return;
    expect(outcome.exitCode).toBe(0);
    expect(outcome.output).toHaveLength(10);
    expect(outcome.truncated).toBe(true);
  });

  it('does not pass the parent environment through', async () => {
    vi.stubEnv('SHELLGATE_TEST_SECRET', 'test-secret');
    try {
      const outcome = await executor.run({
        command: 'echo "[$SHELLGATE_TEST_SECRET] $TERM"',
        cwd: workspace,
        maxOutputSize: 4096,
      });
      expect(outcome.output).toBe('[] dumb\n');
    } finally {
      vi.unstubAllEnvs();
    }
  });

  it('terminates the whole process group on timeout', async () => {
    const outcome = await executor.run({
      command: 'sleep 30 & sleep 5',
      cwd: workspace,
      maxOutputSize: 4096,
      timeoutSeconds: 1,
    });

    expect(outcome.state).toBe('timed_out');
    if (outcome.state !== 'timed_out') return;
    expect(outcome.timeoutSeconds).toBe(1);
    expect(outcome.durationMs).toBeLessThan(4000);

    const pid = outcome.pid;
    expect(pid).toBeTypeOf('number');
    if (pid === undefined || process.platform !== 'linux') return;
    await vi.waitFor(async () => {
      expect(await liveGroupMembers(pid)).toEqual([]);
    });
  }, 10_000);

  it('does not fire a deadline beyond the timer range early', async () => {
    const outcome = await executor.run({
      command: 'sleep 0.2; echo done',
      cwd: workspace,
      maxOutputSize: 4096,
      timeoutSeconds: 3_000_000,
    });

    expect(outcome.state).toBe('completed');
    expect(outcome.output).toBe('done\n');
  });

  it('keeps output captured before the deadline', async () => {
    const outcome = await executor.run({
      command: 'echo started; sleep 5',
      cwd: workspace,
      maxOutputSize: 4096,
      timeoutSeconds: 0.5,
    });

    expect(outcome.state).toBe('timed_out');
    expect(outcome.output).toBe('started\n');
  }, 10_000);

  it('kills background members when the shell exits', async () => {
    const outcome = await executor.run({
      command: 'sleep 30 & echo started',
      cwd: workspace,
      maxOutputSize: 4096,
    });

    expect(outcome.state).toBe('completed');
    if (outcome.state !== 'completed') return;
    expect(outcome.exitCode).toBe(0);
    expect(outcome.output).toBe('started\n');
    expect(outcome.durationMs).toBeLessThan(5000);
  }, 10_000);

  it('reports a spawn failure for a missing working directory', async () => {
    const outcome = await executor.run({
      command: 'pwd',
      cwd: join(workspace, 'does-not-exist'),
      maxOutputSize: 4096,
    });

    expect(outcome.state).toBe('faulted');
    if (outcome.state !== 'faulted') return;
    expect(outcome.error.kind).toBe('spawn_failure');
    expect(outcome.error.message.startsWith('Failed to start command: ')).toBe(true);
    expect(outcome.durationMs).toBeUndefined();
  });

  it('reports a spawn failure for a missing shell', async () => {
    const broken = new CommandExecutor({ shell: join(workspace, 'no-such-shell') });
    const outcome = await broken.run({ command: 'pwd', cwd: workspace, maxOutputSize: 4096 });

    expect(outcome.state).toBe('faulted');
    if (outcome.state !== 'faulted') return;
    expect(outcome.error.kind).toBe('spawn_failure');
  });
});
