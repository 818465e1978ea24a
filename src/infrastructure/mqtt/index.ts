export { BusConnection } from './bus-connection.js';
export type { BusConnectionOptions, StateListener } from './bus-connection.js';
export { createMqttConnector } from './mqtt-client.js';
export type { BusClient, BusConnector, BrokerOptions } from './mqtt-client.js';
