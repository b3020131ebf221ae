/**
 * @file CapabilityAcquirer.spec.ts
 * @description Tests for a single acquisition attempt through every stage
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { CapabilityAcquirer, type CapabilityAcquirerOptions } from '../../src/acquisition/CapabilityAcquirer.js';
import type { CandidateServer } from '../../src/discovery/types.js';
import type { InstalledPackage, PackageSpec } from '../../src/installer/types.js';
import type { ProcessSnapshot, SpawnRequest } from '../../src/process/types.js';
import { ProtocolClient } from '../../src/protocol/ProtocolClient.js';
import { CapabilityRouter } from '../../src/routing/CapabilityRouter.js';
import { NoopLogger } from '../../src/logging/loggerFactory.js';
import { VarietyError, VarietyErrorCode } from '../../src/utils/errors.js';
import { FakeMcpServer } from '../helpers/FakeMcpServer.js';

function candidate(packageName: string, score = 90): CandidateServer {
  return {
    packageName,
    version: 'latest',
    description: '',
    capabilities: ['memory'],
    score,
    sourceOrigin: 'curatedMapping',
  };
}

function installedFor(spec: PackageSpec): InstalledPackage {
  const installDir = `/tmp/variety-test/${spec.packageName.replace(/[@/]/g, '-')}`;
  return {
    packageName: spec.packageName,
    version: spec.version,
    installDir,
    packageDir: `${installDir}/node_modules/${spec.packageName}`,
    status: 'installed',
  };
}

describe('CapabilityAcquirer', () => {
  let server: FakeMcpServer;
  let router: CapabilityRouter;
  let candidates: CandidateServer[];

  const discovery = { discover: vi.fn(async (_capability: string) => candidates) };
  const installer = {
    install: vi.fn(async (spec: PackageSpec) => installedFor(spec)),
    uninstall: vi.fn(async (_installed: Pick<InstalledPackage, 'installDir' | 'packageName'>) => undefined),
  };
  const supervisor = {
    resolveExecutable: vi.fn(async (packageDir: string) => ({
      executablePath: process.execPath,
      args: [`${packageDir}/server.js`],
      entryFile: `${packageDir}/server.js`,
    })),
    spawn: vi.fn(
      async (request: SpawnRequest): Promise<ProcessSnapshot> => ({
        id: 'proc-1',
        packageName: request.packageName,
        executablePath: request.executablePath,
        status: 'running',
        startedAt: '2026-01-01T00:00:00.000Z',
      }),
    ),
    getTransport: vi.fn((_id: string) => server.clientEnd),
    isRunning: vi.fn((_id: string) => true),
    stop: vi.fn(async (_id: string) => undefined),
  };

  function createAcquirer(overrides: Partial<CapabilityAcquirerOptions> = {}): CapabilityAcquirer {
    return new CapabilityAcquirer({
      discovery,
      installer,
      supervisor,
      router,
      createClient: (transport) => new ProtocolClient(transport, { logger: new NoopLogger() }),
      logger: new NoopLogger(),
      ...overrides,
    });
  }

  beforeEach(() => {
    server = new FakeMcpServer();
    router = new CapabilityRouter({ logger: new NoopLogger() });
    candidates = [candidate('@modelcontextprotocol/server-memory')];
  });

  afterEach(() => {
    server.close();
    vi.clearAllMocks();
  });

  it('walks discover, install, spawn and handshake, then registers the route', async () => {
    const stages: string[] = [];
    const result = await createAcquirer().acquire({ capability: 'memory', onStage: (u) => stages.push(u.stage) });

    expect(stages).toEqual(['discovering', 'installing', 'spawning', 'handshaking']);
    expect(result).toMatchObject({
      ok: true,
      capability: 'memory',
      processId: 'proc-1',
      toolName: 'read_graph',
      candidate: {
        packageName: '@modelcontextprotocol/server-memory',
        version: 'latest',
        sourceOrigin: 'curatedMapping',
        score: 90,
      },
    });
    const packageDir = '/tmp/variety-test/-modelcontextprotocol-server-memory/node_modules/@modelcontextprotocol/server-memory';
    expect(supervisor.spawn).toHaveBeenCalledWith({
      executablePath: process.execPath,
      args: [`${packageDir}/server.js`],
      workingDir: packageDir,
      packageName: '@modelcontextprotocol/server-memory',
    });
    expect(router.resolve('memory')).toMatchObject({ processId: 'proc-1', toolName: 'read_graph' });
    await expect(router.invoke('memory', { query: 'projects' })).resolves.toEqual({
      content: [{ type: 'text', text: '{"name":"read_graph","arguments":{"query":"projects"}}' }],
    });
  });

  it('fails in discovering with DISCOVERY_EMPTY when nothing is found', async () => {
    candidates = [];
    const result = await createAcquirer().acquire({ capability: 'nonexistent_domain_xyz' });

    expect(result).toEqual({
      ok: false,
      capability: 'nonexistent_domain_xyz',
      failure: {
        stage: 'discovering',
        code: VarietyErrorCode.DISCOVERY_EMPTY,
        reason: "DISCOVERY_EMPTY: No candidate package provides 'nonexistent_domain_xyz'",
      },
      candidate: undefined,
      installed: undefined,
    });
    expect(installer.install).not.toHaveBeenCalled();
  });

  it('reports non-engine errors as INTERNAL_ERROR', async () => {
    discovery.discover.mockRejectedValueOnce(new Error('boom'));
    const result = await createAcquirer().acquire({ capability: 'memory' });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.failure).toEqual({ stage: 'discovering', code: VarietyErrorCode.INTERNAL_ERROR, reason: 'boom' });
    }
  });

  it('fails in installing when the installer does', async () => {
    installer.install.mockRejectedValueOnce(
      new VarietyError('npm exited with code 1', VarietyErrorCode.INSTALL_FAILED, { exitCode: 1 }),
    );
    const result = await createAcquirer().acquire({ capability: 'memory' });

    expect(result).toMatchObject({
      ok: false,
      failure: { stage: 'installing', code: VarietyErrorCode.INSTALL_FAILED },
      candidate: { packageName: '@modelcontextprotocol/server-memory' },
    });
    expect(supervisor.spawn).not.toHaveBeenCalled();
  });

  it('keeps the install directory after a spawn failure by default', async () => {
    supervisor.spawn.mockRejectedValueOnce(new VarietyError('exited during startup', VarietyErrorCode.SPAWN_FAILED));
    const result = await createAcquirer().acquire({ capability: 'memory' });

    expect(result).toMatchObject({ ok: false, failure: { stage: 'spawning', code: VarietyErrorCode.SPAWN_FAILED } });
    expect(installer.uninstall).not.toHaveBeenCalled();
  });

  it('removes the install directory after a spawn failure when configured', async () => {
    supervisor.spawn.mockRejectedValueOnce(new VarietyError('exited during startup', VarietyErrorCode.SPAWN_FAILED));
    await createAcquirer({ cleanupOnFailure: true }).acquire({ capability: 'memory' });

    expect(installer.uninstall).toHaveBeenCalledWith(
      installedFor({ packageName: '@modelcontextprotocol/server-memory', version: 'latest' }),
    );
  });

  it('stops the process when the handshake finds no tools', async () => {
    server.close();
    server = new FakeMcpServer([]);
    const result = await createAcquirer().acquire({ capability: 'memory' });

    expect(result).toMatchObject({ ok: false, failure: { stage: 'handshaking', code: VarietyErrorCode.NO_TOOLS } });
    expect(supervisor.stop).toHaveBeenCalledWith('proc-1');
    expect(router.capabilities()).toEqual([]);
  });

  it('does not register a process that exited after answering tools/list', async () => {
    supervisor.isRunning.mockReturnValueOnce(false);
    const result = await createAcquirer().acquire({ capability: 'memory' });

    expect(result).toMatchObject({
      ok: false,
      failure: { stage: 'handshaking', code: VarietyErrorCode.PROCESS_CRASHED },
    });
    expect(supervisor.isRunning).toHaveBeenCalledWith('proc-1');
    expect(supervisor.stop).toHaveBeenCalledWith('proc-1');
    expect(router.has('memory')).toBe(false);
  });

  it('does not register a process whose transport closed after tools/list', async () => {
    const createClient: CapabilityAcquirerOptions['createClient'] = (transport) => {
      const client = new ProtocolClient(transport, { logger: new NoopLogger() });
      const listTools = client.listTools.bind(client);
      client.listTools = async (timeoutMs) => {
        const tools = await listTools(timeoutMs);
        server.close('process exited');
        return tools;
      };
      return client;
    };

    const result = await createAcquirer({ createClient }).acquire({ capability: 'memory' });

    expect(result).toMatchObject({
      ok: false,
      failure: {
        stage: 'handshaking',
        code: VarietyErrorCode.PROCESS_CRASHED,
        reason: 'PROCESS_CRASHED: Process proc-1 exited during the handshake',
      },
    });
    expect(router.has('memory')).toBe(false);
    expect(router.capabilities()).toEqual([]);
  });

  it('fails the whole attempt with ACQUISITION_TIMEOUT in the stage it was in', async () => {
    installer.install.mockImplementationOnce(() => new Promise<InstalledPackage>(() => {}));
    const result = await createAcquirer({ attemptTimeoutMs: 30 }).acquire({ capability: 'memory' });

    expect(result).toMatchObject({
      ok: false,
      failure: { stage: 'installing', code: VarietyErrorCode.ACQUISITION_TIMEOUT },
    });
    expect(installer.uninstall).not.toHaveBeenCalled();
  });

  it('tries packages that failed before last', async () => {
    candidates = [candidate('mcp-server-first'), candidate('mcp-server-second', 80)];

    await createAcquirer().acquire({ capability: 'memory', excludePackages: new Set(['mcp-server-first']) });
    expect(installer.install).toHaveBeenLastCalledWith({ packageName: 'mcp-server-second', version: 'latest' });

    await createAcquirer().acquire({
      capability: 'memory',
      excludePackages: new Set(['mcp-server-first', 'mcp-server-second']),
    });
    expect(installer.install).toHaveBeenLastCalledWith({ packageName: 'mcp-server-first', version: 'latest' });
  });
});
