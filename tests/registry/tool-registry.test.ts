import { vi, describe, it, expect } from 'vitest';
import { z } from 'zod';

vi.mock('../../src/utils/logger.js', () => ({
  logInfo: vi.fn(),
  logWarn: vi.fn(),
  logDebug: vi.fn(),
  logError: vi.fn(),
  toLoggable: vi.fn((e: unknown) => e),
}));

import { Tool } from '../../src/tools/Tool.js';
import type { AnalysisResult } from '../../src/tools/results.js';
import { DuplicateToolError, ToolRegistryBuilder } from '../../src/registry/tool-registry.js';
import { createCodeAnalysisRegistry } from '../../src/registry/code-analysis.js';
import { createDockerControlRegistry } from '../../src/registry/docker-control.js';
import { logError } from '../../src/utils/logger.js';

const ECHO_SCHEMA = z.object({ text: z.string() }).strict();

class EchoTool extends Tool<z.infer<typeof ECHO_SCHEMA>, AnalysisResult> {
  title = 'Echo';
  description = 'Echo the input back';
  inputSchema = ECHO_SCHEMA;

  constructor(public toolName: string = 'echo') {
    super();
  }

  async handler(args: z.infer<typeof ECHO_SCHEMA>): Promise<AnalysisResult> {
    return { status: 'success', output: args.text, errors: '' };
  }
}

class ExplodingTool extends EchoTool {
  async handler(): Promise<AnalysisResult> {
    throw new Error('handler blew up');
  }
}

describe('ToolRegistryBuilder', () => {
  it('should reject a duplicate tool name', () => {
    const builder = new ToolRegistryBuilder('TestServer').register(new EchoTool());

    expect(() => builder.register(new EchoTool())).toThrow(DuplicateToolError);
    expect(() => builder.register(new EchoTool())).toThrow('Tool "echo" is already registered in TestServer');
  });

  it('should keep registration order', () => {
    const registry = new ToolRegistryBuilder('TestServer')
      .register(new EchoTool('zulu'))
      .register(new EchoTool('alpha'))
      .register(new EchoTool('mike'))
      .build();

    expect(registry.toolNames()).toEqual(['zulu', 'alpha', 'mike']);
    expect(registry.list().map((tool) => tool.toolName)).toEqual(['zulu', 'alpha', 'mike']);
  });

  it('should not let later registrations leak into a built registry', () => {
    const builder = new ToolRegistryBuilder('TestServer').register(new EchoTool('first'));
    const registry = builder.build();
    builder.register(new EchoTool('second'));

    expect(registry.toolNames()).toEqual(['first']);
    expect(registry.has('second')).toBe(false);
  });
});

describe('ToolRegistry.invoke', () => {
  const registry = new ToolRegistryBuilder('TestServer')
    .register(new EchoTool())
    .register(new ExplodingTool('explode'))
    .build();

  it('should dispatch to the named tool', async () => {
    await expect(registry.invoke('echo', { text: 'hello' })).resolves.toEqual({
      kind: 'ok',
      result: { status: 'success', output: 'hello', errors: '' },
    });
  });

  it('should return tool-not-found for an unknown name instead of throwing', async () => {
    await expect(registry.invoke('list_containers', {})).resolves.toEqual({
      kind: 'tool-not-found',
      name: 'list_containers',
      message: 'Tool list_containers not found',
    });
  });

  it('should return invalid-arguments when the input does not match the schema', async () => {
    const outcome = await registry.invoke('echo', { text: 42 });

    expect(outcome.kind).toBe('invalid-arguments');
  });

  it('should turn a fault escaping the handler into an error result', async () => {
    await expect(registry.invoke('explode', { text: 'x' })).resolves.toEqual({
      kind: 'ok',
      result: { status: 'error', message: 'handler blew up' },
    });
    expect(logError).toHaveBeenCalledWith('Tool explode raised an unexpected fault', expect.any(Error));
  });
});

describe('toolbox registries', () => {
  it('should expose the code analysis tools', () => {
    const registry = createCodeAnalysisRegistry();

    expect(registry.name).toBe('CodeAnalysisServer');
    expect(registry.toolNames()).toEqual(['run_linter', 'run_type_checker']);
  });

  it('should expose the docker control tools', () => {
    const registry = createDockerControlRegistry({ state: 'unavailable', reason: 'test' });

    expect(registry.name).toBe('DockerControlServer');
    expect(registry.toolNames()).toEqual(['list_containers', 'stop_container']);
  });

  it('should short-circuit docker tools through invoke when the daemon is unavailable', async () => {
    const registry = createDockerControlRegistry({ state: 'unavailable', reason: 'test' });

    await expect(registry.invoke('list_containers', {})).resolves.toEqual({
      kind: 'ok',
      result: [{ error: 'Docker is not running or is not installed.' }],
    });
    await expect(registry.invoke('stop_container', { container_id: 'any-id' })).resolves.toEqual({
      kind: 'ok',
      result: { error: 'Docker is not running or is not installed.' },
    });
  });
});
