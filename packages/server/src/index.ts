/**
 * @tessera/server - WebSocket hosting for the collaboration core
 *
 * @packageDocumentation
 */

export {
  CollabServer,
  DEFAULT_SERVER_CONFIG,
  createCollabServer,
  credentialsFromRequest,
  protocolForPath,
  toWireData,
  type CollabServerConfig,
  type ServerSocket,
} from './server.js';
export {
  envFromArgs,
  loadConfig,
  parseArgs,
  type ConfigResult,
  type ParsedArgs,
  type ServerSettings,
} from './config.js';
