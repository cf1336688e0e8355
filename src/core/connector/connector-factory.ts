import type { ModConnector, ServerConfig } from '../../interfaces/connector';
import { Verbosity } from '../../utils/logger';
import { createFtpConnector, type FtpConnectorDependencies } from './ftp-connector';
import { createLocalConnector } from './local-connector';

export function createConnector(
  config: ServerConfig,
  verbosity: number = Verbosity.Normal,
  ftpDeps: FtpConnectorDependencies = {},
): ModConnector {
  const connection = config.connection;
  switch (connection.type) {
    case 'local':
      return createLocalConnector(connection, verbosity);
    case 'ftp':
      return createFtpConnector(connection, verbosity, ftpDeps);
  }
}
