export { Config, loadConfig, type ClientConfig, type Environment } from "./config/environment";
export {
  AuthError,
  AuthExpiredError,
  ConnectedCarError,
  PairingError,
  ProtocolError,
  RetryAfterRefreshError,
  TransportError,
} from "./services/api/errors";
export { AxiosTransport, createAxiosTransport, createHttpClient } from "./services/api/httpClient";
export { Session, type RequestOptions, type SessionOptions } from "./services/api/Session";
export { AuthService } from "./services/api/AuthService";
export {
  AliasService,
  aliasCoverage,
  buildAliasMapping,
  parseAliasCatalog,
} from "./services/api/AliasService";
export { TelemetryService } from "./services/api/TelemetryService";
export { VehicleService } from "./services/api/VehicleService";
export {
  ConnectedCarService,
  type FetchFailure,
  type FetchSource,
  type VehicleDataResult,
} from "./services/api/ConnectedCarService";
export { PairingService } from "./services/api/PairingService";
export {
  CommandService,
  resolveDeviceKey,
  type SendCommandOptions,
} from "./services/api/CommandService";
export {
  buildTelemetryRequest,
  coerceTelemetryValue,
  decodeTelemetry,
  deviceKeyToPath,
} from "./services/telemetry/TelemetryDecoder";
export { CommandSigner, hashUserId, type SigningKeys } from "./services/crypto/CommandSigner";
export { PairingKeyManager } from "./services/crypto/PairingKeyManager";
export {
  PollController,
  computePollTransition,
  defaultPollConfig,
} from "./services/polling/PollController";
export { RefreshCoordinator } from "./services/sync/RefreshCoordinator";
export {
  FileStorage,
  MemoryStorage,
  StorageService,
  type KeyValueStorage,
} from "./services/storage/StorageService";
export { createSessionStore, type SessionStore } from "./stores/SessionStore";
export {
  canSignCommands,
  createPairingStore,
  isPaired,
  type PairingStore,
  type PairingStoreState,
} from "./stores/PairingStore";
export { CONTROL_ALIASES, type ControlAlias } from "./utils/constants";
export type * from "./types";
