export { DapnetForwarder, buildCallBody } from './dapnet-forwarder.js';
export type { DapnetGatewayConfig, DapnetCallBody, DapnetForwarderDeps } from './dapnet-forwarder.js';
