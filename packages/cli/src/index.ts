export { executeCli } from './main.js';
export { parseCliArgs, USAGE } from './args.js';
export type { CliArgs, CliCommand } from './args.js';
export { loadCliEnv, DEFAULT_GATEWAY_TIMEOUT_MS } from './config/env.js';
export type { CliEnv, GatewayEnv, StateBackend } from './config/env.js';
export { HttpGatewaySender } from './senders/HttpGatewaySender.js';
export type { FetchFn, HttpGatewaySenderOptions } from './senders/HttpGatewaySender.js';
export { ExitCode, exitCodeFor } from './exitCodes.js';
export { describeCliFailure, isDebugMode } from './errors.js';
export type { CliFailure } from './errors.js';
export { openCampaign } from './composition.js';
export type { CliDeps, CliIo, SignalSource, OpenedCampaign } from './composition.js';
