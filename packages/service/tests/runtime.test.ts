import { beforeEach, describe, expect, it, vi } from 'vitest';
import { Logger, StoreUnavailableError } from '@callbridge/core';

interface PoolState {
  created: number;
  connects: number;
  ended: number;
  connectError: string | null;
}

const poolState = vi.hoisted(() => {
  const state: PoolState = { created: 0, connects: 0, ended: 0, connectError: null };
  return state;
});

vi.mock('pg', () => {
  class MockPool {
    constructor() {
      poolState.created += 1;
    }
    connect = vi.fn(async () => {
      poolState.connects += 1;
      if (poolState.connectError) throw new Error(poolState.connectError);
      return { release: vi.fn() };
    });
    query = vi.fn(async () => ({ rows: [], rowCount: 0 }));
    end = vi.fn(async () => {
      poolState.ended += 1;
    });
  }
  return { default: { Pool: MockPool }, Pool: MockPool };
});

// Imports after mocks
import { createRuntime } from '../src/runtime.js';

const database = { connectionString: 'postgres://callbridge@localhost/test' };

function quietLogger(lines: string[] = []): Logger {
  return new Logger({ level: 'debug', sink: (line) => lines.push(line) });
}

beforeEach(() => {
  poolState.created = 0;
  poolState.connects = 0;
  poolState.ended = 0;
  poolState.connectError = null;
});

describe('createRuntime', () => {
  it('leaves the database alone when files supply mappings and configs', async () => {
    const lines: string[] = [];
    const runtime = await createRuntime(
      { database, mappings: { file: 'mappings.json' }, transformations: { directory: 'configs' } },
      quietLogger(lines)
    );
    await runtime.close();

    expect(poolState).toEqual({ created: 0, connects: 0, ended: 0, connectError: null });
    expect(
      lines.some((line) =>
        line.endsWith('INFO Database configured but unused: mappings and transformation configs come from files')
      )
    ).toBe(true);
  });

  it('connects when the database backs one of the stores and ends the pool on close', async () => {
    const runtime = await createRuntime({ database, mappings: { file: 'mappings.json' } }, quietLogger());

    expect(poolState.connects).toBe(1);
    expect(poolState.ended).toBe(0);
    await runtime.close();
    expect(poolState.ended).toBe(1);
  });

  it('ends the pool when the first connection fails', async () => {
    poolState.connectError = 'connection refused';

    const failure = createRuntime({ database }, quietLogger());
    await expect(failure).rejects.toBeInstanceOf(StoreUnavailableError);
    await expect(failure).rejects.toThrow('PostgreSQL connection failed: connection refused');
    expect(poolState.created).toBe(1);
    expect(poolState.ended).toBe(1);
  });

  it('runs on built-in defaults without any store configured', async () => {
    const runtime = await createRuntime({}, quietLogger());

    expect(runtime.service.listPlatforms().map((p) => p.source)).toEqual(['ringcentral', 'ssot', 'dialpad']);
    expect(poolState.created).toBe(0);
    await runtime.close();
  });
});
