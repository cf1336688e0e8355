import { describe, it, expect } from 'vitest';
import { createConnector } from './connector-factory';
import { Verbosity } from '../../interfaces/logger';

describe('createConnector', () => {
  it('should build a local connector for local servers', () => {
    const connector = createConnector(
      {
        name: 'client',
        connection: { type: 'local', root: '/srv/instance', modsDir: 'mods' },
      },
      Verbosity.Quiet,
    );

    expect(connector.kind).toBe('local');
    expect(connector.location).toBe('/srv/instance/mods');
  });

  it('should build an ftp connector for ftp servers', () => {
    const connector = createConnector(
      {
        name: 'survival',
        connection: {
          type: 'ftp',
          host: 'ftp.example.test',
          port: 2121,
          username: 'mc',
          password: 'test-secret',
          remoteRoot: '',
          modsDir: 'mods',
          secure: false,
          timeoutMs: 30000,
          atomicWrites: true,
        },
      },
      Verbosity.Quiet,
    );

    expect(connector.kind).toBe('ftp');
    expect(connector.location).toBe('ftp://ftp.example.test:2121/mods');
    expect(connector.scanConcurrency).toBe(1);
  });
});
