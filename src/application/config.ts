import { randomBytes } from 'node:crypto';
import { z } from 'zod';
import type { Level } from 'pino';
import { ConfigurationError } from '../domain/index.js';
import { decodeChannelKey } from '../infrastructure/crypto/index.js';
import type { DapnetGatewayConfig } from '../infrastructure/gateway/index.js';
import { DEFAULT_MAX_TEXT_BYTES, DEFAULT_PROTO_PATH } from '../infrastructure/mesh/index.js';

/** Validated runtime configuration. Built once at startup by `loadConfig()`. */
export interface BridgeConfig {
  encryptionKey: Uint8Array;
  channel: string;
  mqtt: {
    url: string;
    host: string;
    port: number;
    username: string;
    password: string;
    keepaliveSeconds: number;
    clientId: string;
    topic: string;
  };
  gateway: DapnetGatewayConfig;
  reconnect: {
    maxDelayMs: number;
  };
  database: {
    file: string;
  };
  log: {
    file: string | undefined;
    level: Level;
  };
  decoder: {
    maxTextBytes: number;
    broadcastOnly: boolean;
  };
  protoPath: string;
  http: { host: string; port: number } | null;
}

const LOG_LEVELS: Record<string, Level> = {
  TRACE: 'trace',
  DEBUG: 'debug',
  INFO: 'info',
  WARN: 'warn',
  WARNING: 'warn',
  ERROR: 'error',
  CRITICAL: 'fatal',
  FATAL: 'fatal',
};

/** `LOG_FILE=none` logs to stdout only. */
const LOG_FILE_DISABLED = 'none';

function required(name: string) {
  return z
    .string({ required_error: `${name} is required` })
    .trim()
    .min(1, `${name} is required`);
}

function positiveInt(name: string, fallback: number) {
  return z.coerce
    .number({ invalid_type_error: `${name} must be a number` })
    .int(`${name} must be an integer`)
    .positive(`${name} must be greater than 0`)
    .default(fallback);
}

function port(name: string, fallback: number) {
  return z.coerce
    .number({ invalid_type_error: `${name} must be a number` })
    .int(`${name} must be an integer`)
    .min(0, `${name} must be between 0 and 65535`)
    .max(65535, `${name} must be between 0 and 65535`)
    .default(fallback);
}

function flag(name: string, fallback: boolean) {
  return z
    .enum(['true', 'false', '1', '0', 'yes', 'no'], {
      errorMap: () => ({ message: `${name} must be true or false` }),
    })
    .optional()
    .transform((value) => (value === undefined ? fallback : ['true', '1', 'yes'].includes(value)));
}

function list(name: string) {
  return required(name).transform((value, ctx): [string, ...string[]] => {
    const [first, ...rest] = value
      .split(',')
      .map((item) => item.trim())
      .filter((item) => item.length > 0);
    if (first === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${name} must list at least one value` });
      return z.NEVER;
    }
    return [first, ...rest];
  });
}

/** Empty strings count as unset, matching how .env files are usually written. */
function blankToUndefined(env: NodeJS.ProcessEnv): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') result[key] = value;
  }
  return result;
}

/**
 * Zod schema over the process environment.
 *
 * Issue messages name the variable at fault and never echo its value, so
 * they are safe to log.
 */
export const envSchema = z.object({
  ENCRYPTION_KEY: required('ENCRYPTION_KEY').transform((value, ctx) => {
    try {
      return decodeChannelKey(value);
    } catch (err: unknown) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `ENCRYPTION_KEY is invalid: ${err instanceof Error ? err.message : 'unreadable'}`,
      });
      return z.NEVER;
    }
  }),
  ROOT_TOPIC: z.string().default('msh/MY_919/2/e/'),
  CHANNEL: z.string().trim().min(1).default('LongFast'),
  MQTT_TOPIC: z.string().trim().optional(),
  MQTT_BROKER: required('MQTT_BROKER'),
  MQTT_PORT: port('MQTT_PORT', 1883).refine((value) => value > 0, 'MQTT_PORT must be between 1 and 65535'),
  MQTT_TLS: flag('MQTT_TLS', false),
  MQTT_USERNAME: required('MQTT_USERNAME'),
  MQTT_PASSWORD: required('MQTT_PASSWORD'),
  MQTT_KEEPALIVE: positiveInt('MQTT_KEEPALIVE', 60),
  MQTT_CLIENT_ID: z.string().trim().optional(),
  DAPNET_API_URL: required('DAPNET_API_URL').url('DAPNET_API_URL must be a URL'),
  /** Basic auth user; the first CALLSIGN when unset. */
  DAPNET_AUTH_CALLSIGN: z.string().trim().optional(),
  DAPNET_PASSWORD: required('DAPNET_PASSWORD'),
  CALLSIGN: list('CALLSIGN'),
  TRANSMITTER_GROUP: list('TRANSMITTER_GROUP'),
  MAX_RETRIES: positiveInt('MAX_RETRIES', 5),
  RETRY_DELAY: positiveInt('RETRY_DELAY', 5),
  API_TIMEOUT: positiveInt('API_TIMEOUT', 30),
  RECONNECT_MAX_DELAY: positiveInt('RECONNECT_MAX_DELAY', 60),
  DATABASE_FILE: z.string().trim().default('meshtastic.db'),
  LOG_FILE: z.string().trim().default('meshtastic_debug.log'),
  LOG_LEVEL: z
    .string()
    .default('INFO')
    .transform((value, ctx) => {
      const level = LOG_LEVELS[value.trim().toUpperCase()];
      if (level === undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `LOG_LEVEL must be one of ${Object.keys(LOG_LEVELS).join(', ')}`,
        });
        return z.NEVER;
      }
      return level;
    }),
  MAX_TEXT_BYTES: positiveInt('MAX_TEXT_BYTES', DEFAULT_MAX_TEXT_BYTES),
  BROADCAST_ONLY: flag('BROADCAST_ONLY', true),
  PREFIX_SENDER: flag('PREFIX_SENDER', false),
  PROTO_PATH: z.string().trim().default(DEFAULT_PROTO_PATH),
  HTTP_PORT: port('HTTP_PORT', 0),
  HTTP_HOST: z.string().trim().default('127.0.0.1'),
});

export type EnvInput = z.input<typeof envSchema>;

/** `<root>/<channel>/#`, tolerating a root topic with or without a trailing slash. */
export function subscriptionTopic(rootTopic: string, channel: string): string {
  const root = rootTopic.trim().replace(/\/+$/, '');
  return root.length > 0 ? `${root}/${channel}/#` : `${channel}/#`;
}

/**
 * Validates the environment and builds the runtime configuration.
 * Throws ConfigurationError listing every problem found.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): BridgeConfig {
  const parsed = envSchema.safeParse(blankToUndefined(env));

  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => issue.message);
    throw new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`, issues);
  }

  const e = parsed.data;
  const scheme = e.MQTT_TLS ? 'mqtts' : 'mqtt';

  return {
    encryptionKey: e.ENCRYPTION_KEY,
    channel: e.CHANNEL,
    mqtt: {
      url: `${scheme}://${e.MQTT_BROKER}:${e.MQTT_PORT}`,
      host: e.MQTT_BROKER,
      port: e.MQTT_PORT,
      username: e.MQTT_USERNAME,
      password: e.MQTT_PASSWORD,
      keepaliveSeconds: e.MQTT_KEEPALIVE,
      clientId: e.MQTT_CLIENT_ID ?? `mesh-pager-bridge-${randomBytes(4).toString('hex')}`,
      topic: e.MQTT_TOPIC ?? subscriptionTopic(e.ROOT_TOPIC, e.CHANNEL),
    },
    gateway: {
      url: e.DAPNET_API_URL,
      authCallsign: e.DAPNET_AUTH_CALLSIGN ?? e.CALLSIGN[0],
      password: e.DAPNET_PASSWORD,
      callsigns: e.CALLSIGN,
      transmitterGroups: e.TRANSMITTER_GROUP,
      timeoutMs: e.API_TIMEOUT * 1000,
      maxRetries: e.MAX_RETRIES,
      retryDelayMs: e.RETRY_DELAY * 1000,
      prefixSender: e.PREFIX_SENDER,
    },
    reconnect: {
      maxDelayMs: e.RECONNECT_MAX_DELAY * 1000,
    },
    database: {
      file: e.DATABASE_FILE,
    },
    log: {
      file: e.LOG_FILE.toLowerCase() === LOG_FILE_DISABLED ? undefined : e.LOG_FILE,
      level: e.LOG_LEVEL,
    },
    decoder: {
      maxTextBytes: e.MAX_TEXT_BYTES,
      broadcastOnly: e.BROADCAST_ONLY,
    },
    protoPath: e.PROTO_PATH,
    http: e.HTTP_PORT > 0 ? { host: e.HTTP_HOST, port: e.HTTP_PORT } : null,
  };
}

/** Startup summary with every credential and the key left out. */
export function summarizeConfig(config: BridgeConfig): Record<string, unknown> {
  return {
    broker: `${config.mqtt.host}:${config.mqtt.port}`,
    topic: config.mqtt.topic,
    mqttUser: config.mqtt.username,
    channel: config.channel,
    gatewayUrl: config.gateway.url,
    gatewayUser: config.gateway.authCallsign,
    callsigns: config.gateway.callsigns,
    transmitterGroups: config.gateway.transmitterGroups,
    database: config.database.file,
    logFile: config.log.file ?? null,
    maxRetries: config.gateway.maxRetries,
    retryDelayMs: config.gateway.retryDelayMs,
    apiTimeoutMs: config.gateway.timeoutMs,
    broadcastOnly: config.decoder.broadcastOnly,
    http: config.http,
  };
}
