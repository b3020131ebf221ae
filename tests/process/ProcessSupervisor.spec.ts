/**
 * @file ProcessSupervisor.spec.ts
 * @description Tests for the process supervisor against a real child process
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as os from 'node:os';
import { fileURLToPath } from 'node:url';
import { ProcessSupervisor } from '../../src/process/ProcessSupervisor.js';
import type { ProcessExitedEvent, SupervisorEvent } from '../../src/process/types.js';
import { ProtocolClient } from '../../src/protocol/ProtocolClient.js';
import { NoopLogger } from '../../src/logging/loggerFactory.js';
import { VarietyErrorCode } from '../../src/utils/errors.js';

const ECHO_SERVER = fileURLToPath(new URL('../fixtures/echo-server.mjs', import.meta.url));

function echoServer(...flags: string[]) {
  return {
    executablePath: process.execPath,
    args: [ECHO_SERVER, ...flags],
    workingDir: os.tmpdir(),
    packageName: 'echo-server',
  };
}

function nextExit(supervisor: ProcessSupervisor, id: string): Promise<ProcessExitedEvent> {
  return new Promise((resolve) => {
    const listener = (event: SupervisorEvent): void => {
      if (event.type === 'process:exited' && event.process.id === id) {
        supervisor.off(listener);
        resolve(event);
      }
    };
    supervisor.on(listener);
  });
}

describe('ProcessSupervisor', () => {
  let supervisor: ProcessSupervisor;
  let events: SupervisorEvent[];

  beforeEach(() => {
    supervisor = new ProcessSupervisor({ startupGraceMs: 100, stopGraceMs: 1000, logger: new NoopLogger() });
    events = [];
    supervisor.on((event) => events.push(event));
  });

  afterEach(async () => {
    await supervisor.stopAll({ graceMs: 100 });
  });

  describe('spawn', () => {
    it('starts a process whose transport speaks the protocol', async () => {
      const snapshot = await supervisor.spawn(echoServer());

      expect(snapshot.status).toBe('running');
      expect(snapshot.id).toMatch(/^proc-[0-9a-f]{8}$/);
      expect(snapshot.pid).toEqual(expect.any(Number));
      expect(supervisor.isRunning(snapshot.id)).toBe(true);
      expect(supervisor.list().map((p) => p.id)).toEqual([snapshot.id]);
      expect(events.map((e) => e.type)).toEqual(['process:started']);

      const client = new ProtocolClient(supervisor.getTransport(snapshot.id), { logger: new NoopLogger() });
      const init = await client.initialize();
      expect(init.serverInfo).toEqual({ name: 'echo-server', version: '1.0.0' });
      expect((await client.listTools()).map((t) => t.name)).toEqual(['read_graph', 'echo']);
      client.close();
    });

    it('reports a missing executable path as SPAWN_NOT_FOUND', async () => {
      await expect(
        supervisor.spawn({ executablePath: '/nonexistent/bin/plugin', workingDir: os.tmpdir(), packageName: 'ghost' }),
      ).rejects.toMatchObject({ code: VarietyErrorCode.SPAWN_NOT_FOUND });
    });

    it('reports an unknown bare command as SPAWN_NOT_FOUND', async () => {
      await expect(
        supervisor.spawn({ executablePath: 'variety-no-such-command', workingDir: os.tmpdir(), packageName: 'ghost' }),
      ).rejects.toMatchObject({ code: VarietyErrorCode.SPAWN_NOT_FOUND });
      expect(supervisor.list()).toEqual([]);
    });

    it('reports a missing working directory as SPAWN_FAILED', async () => {
      await expect(
        supervisor.spawn({ ...echoServer(), workingDir: '/nonexistent/working/dir' }),
      ).rejects.toMatchObject({ code: VarietyErrorCode.SPAWN_FAILED, details: { workingDir: '/nonexistent/working/dir' } });
    });

    it('reports an exit during the startup window as SPAWN_FAILED with stderr', async () => {
      // wide window: node must boot and exit inside it even on a loaded machine
      const patient = new ProcessSupervisor({ startupGraceMs: 3000, logger: new NoopLogger() });

      await expect(patient.spawn(echoServer('--exit-immediately'))).rejects.toMatchObject({
        code: VarietyErrorCode.SPAWN_FAILED,
        details: { exitCode: 3, stderrTail: ['fatal: missing configuration'] },
      });
      expect(patient.list()).toEqual([]);
    });
  });

  describe('stop', () => {
    it('stops a process with SIGTERM and marks it stopped', async () => {
      const { id } = await supervisor.spawn(echoServer());

      const stopped = await supervisor.stop(id);

      expect(stopped?.status).toBe('stopped');
      expect(supervisor.isRunning(id)).toBe(false);
      expect(supervisor.get(id)?.status).toBe('stopped');
      expect(supervisor.list()).toEqual([]);
      const exited = events.filter((e) => e.type === 'process:exited');
      expect(exited).toHaveLength(1);
      expect(exited[0]?.process.status).toBe('stopped');
    });

    it('escalates to SIGKILL when SIGTERM is ignored', async () => {
      const { id } = await supervisor.spawn(echoServer('--ignore-sigterm'));
      const client = new ProtocolClient(supervisor.getTransport(id), { logger: new NoopLogger() });
      await client.initialize();

      const stopped = await supervisor.stop(id, { graceMs: 100 });

      expect(stopped?.status).toBe('stopped');
      expect(stopped?.signal).toBe('SIGKILL');
      expect(client.getState()).toBe('closed');
    });

    it('is idempotent and tolerates unknown ids', async () => {
      const { id } = await supervisor.spawn(echoServer());
      const [first, second] = await Promise.all([supervisor.stop(id), supervisor.stop(id)]);
      const third = await supervisor.stop(id);

      expect(first).toEqual(second);
      expect(third).toEqual(first);
      expect(await supervisor.stop('proc-unknown')).toBeUndefined();
    });

    it('refuses I/O once the process is gone', async () => {
      const { id } = await supervisor.spawn(echoServer());
      await supervisor.stop(id);

      expect(() => supervisor.getTransport(id)).toThrowError(/is not running/);
      expect(() => supervisor.send(id, '{}\n')).toThrowError(/is not running/);
    });
  });

  describe('crash detection', () => {
    it('marks an unexpected exit as crashed and fails pending calls', async () => {
      const { id } = await supervisor.spawn(echoServer());
      const client = new ProtocolClient(supervisor.getTransport(id), { logger: new NoopLogger() });
      await client.initialize();
      const exit = nextExit(supervisor, id);

      await expect(client.callTool('crash', {})).rejects.toMatchObject({ code: VarietyErrorCode.TRANSPORT_CLOSED });

      const event = await exit;
      expect(event.process.status).toBe('crashed');
      expect(event.process.exitCode).toBe(7);
      expect(supervisor.isRunning(id)).toBe(false);
    });

    it('notices a process killed from outside', async () => {
      const { id, pid } = await supervisor.spawn(echoServer());
      const exit = nextExit(supervisor, id);

      process.kill(pid ?? -1, 'SIGKILL');

      const event = await exit;
      expect(event.process.status).toBe('crashed');
      expect(event.process.signal).toBe('SIGKILL');
    });
  });

  describe('diagnostics', () => {
    it('keeps only the most recent stderr lines', async () => {
      const bounded = new ProcessSupervisor({ startupGraceMs: 100, stderrBufferLines: 3, logger: new NoopLogger() });
      const { id } = await bounded.spawn(echoServer('--stderr-lines=5'));

      await vi.waitFor(() => {
        expect(bounded.getDiagnostics(id)).toEqual(['log line 3', 'log line 4', 'log line 5']);
      });

      await bounded.stop(id);
      expect(bounded.getDiagnostics(id)).toEqual(['log line 3', 'log line 4', 'log line 5']);
    });
  });
});
