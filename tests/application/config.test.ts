import { describe, it, expect } from 'vitest';
import { loadConfig, subscriptionTopic, summarizeConfig } from '../../src/application/config.js';
import { ConfigurationError } from '../../src/domain/index.js';
import { DEFAULT_CHANNEL_KEY } from '../../src/infrastructure/crypto/index.js';

const baseEnv = {
  ENCRYPTION_KEY: 'AQ==',
  MQTT_BROKER: 'broker.test',
  MQTT_USERNAME: 'test-user',
  MQTT_PASSWORD: 'test-secret',
  DAPNET_API_URL: 'http://gateway.test/calls',
  DAPNET_PASSWORD: 'test-secret',
  CALLSIGN: 'dl1abc, dl2xyz',
  TRANSMITTER_GROUP: 'dl-all',
};

function issuesFor(env: Record<string, string>): readonly string[] {
  try {
    loadConfig(env);
  } catch (err: unknown) {
    if (err instanceof ConfigurationError) return err.issues;
    throw err;
  }
  throw new Error('expected a ConfigurationError');
}

describe('subscriptionTopic', () => {
  it('joins root and channel with or without a trailing slash', () => {
    expect(subscriptionTopic('msh/MY_919/2/e/', 'LongFast')).toBe('msh/MY_919/2/e/LongFast/#');
    expect(subscriptionTopic('msh/EU_868/2/e', 'MediumSlow')).toBe('msh/EU_868/2/e/MediumSlow/#');
  });
});

describe('loadConfig', () => {
  it('applies defaults', () => {
    const config = loadConfig(baseEnv);

    expect(config.encryptionKey).toEqual(Uint8Array.from(DEFAULT_CHANNEL_KEY));
    expect(config.channel).toBe('LongFast');
    expect(config.mqtt).toMatchObject({
      url: 'mqtt://broker.test:1883',
      topic: 'msh/MY_919/2/e/LongFast/#',
      keepaliveSeconds: 60,
    });
    expect(config.mqtt.clientId).toMatch(/^mesh-pager-bridge-[0-9a-f]{8}$/);
    expect(config.gateway).toEqual({
      url: 'http://gateway.test/calls',
      authCallsign: 'dl1abc',
      password: 'test-secret',
      callsigns: ['dl1abc', 'dl2xyz'],
      transmitterGroups: ['dl-all'],
      timeoutMs: 30_000,
      maxRetries: 5,
      retryDelayMs: 5_000,
      prefixSender: false,
    });
    expect(config.reconnect.maxDelayMs).toBe(60_000);
    expect(config.database.file).toBe('meshtastic.db');
    expect(config.log).toEqual({ file: 'meshtastic_debug.log', level: 'info' });
    expect(config.decoder).toEqual({ maxTextBytes: 512, broadcastOnly: true });
    expect(config.http).toBeNull();
  });

  it('honours overrides', () => {
    const config = loadConfig({
      ...baseEnv,
      CHANNEL: 'MediumSlow',
      MQTT_PORT: '8883',
      MQTT_TLS: 'true',
      MQTT_CLIENT_ID: 'bridge-1',
      MAX_RETRIES: '3',
      RETRY_DELAY: '2',
      BROADCAST_ONLY: 'false',
      PREFIX_SENDER: 'yes',
      HTTP_PORT: '8080',
    });

    expect(config.mqtt.url).toBe('mqtts://broker.test:8883');
    expect(config.mqtt.topic).toBe('msh/MY_919/2/e/MediumSlow/#');
    expect(config.mqtt.clientId).toBe('bridge-1');
    expect(config.gateway.maxRetries).toBe(3);
    expect(config.gateway.retryDelayMs).toBe(2_000);
    expect(config.gateway.prefixSender).toBe(true);
    expect(config.decoder.broadcastOnly).toBe(false);
    expect(config.http).toEqual({ host: '127.0.0.1', port: 8080 });
  });

  it('uses MQTT_TOPIC as given', () => {
    expect(loadConfig({ ...baseEnv, MQTT_TOPIC: 'msh/+/2/e/LongFast/#' }).mqtt.topic).toBe('msh/+/2/e/LongFast/#');
  });

  it.each([
    ['WARNING', 'warn'],
    ['warn', 'warn'],
    ['CRITICAL', 'fatal'],
    ['debug', 'debug'],
  ])('maps LOG_LEVEL %s to %s', (input, level) => {
    expect(loadConfig({ ...baseEnv, LOG_LEVEL: input }).log.level).toBe(level);
  });

  it('lists every missing required variable', () => {
    const { MQTT_BROKER: _broker, DAPNET_PASSWORD: _password, ...rest } = baseEnv;

    expect(issuesFor(rest)).toEqual(['MQTT_BROKER is required', 'DAPNET_PASSWORD is required']);
  });

  it('authenticates as the first callsign unless DAPNET_AUTH_CALLSIGN is set', () => {
    expect(loadConfig({ ...baseEnv, CALLSIGN: 'dl2xyz,dl1abc' }).gateway.authCallsign).toBe('dl2xyz');
    expect(loadConfig({ ...baseEnv, DAPNET_AUTH_CALLSIGN: 'dl9zzz' }).gateway).toMatchObject({
      authCallsign: 'dl9zzz',
      callsigns: ['dl1abc', 'dl2xyz'],
    });
  });

  it('rejects a callsign list with no entries', () => {
    expect(issuesFor({ ...baseEnv, CALLSIGN: ' , ' })).toEqual(['CALLSIGN must list at least one value']);
  });

  it('turns the log file off with LOG_FILE=none', () => {
    expect(loadConfig({ ...baseEnv, LOG_FILE: 'none' }).log.file).toBeUndefined();
    expect(loadConfig({ ...baseEnv, LOG_FILE: 'NONE' }).log.file).toBeUndefined();
    expect(loadConfig({ ...baseEnv, LOG_FILE: '' }).log.file).toBe('meshtastic_debug.log');
    expect(loadConfig({ ...baseEnv, LOG_FILE: 'logs/bridge.log' }).log.file).toBe('logs/bridge.log');
  });

  it('treats blank values as missing', () => {
    expect(issuesFor({ ...baseEnv, CALLSIGN: '   ' })).toEqual(['CALLSIGN is required']);
  });

  it('rejects a key of the wrong size without echoing it', () => {
    expect(issuesFor({ ...baseEnv, ENCRYPTION_KEY: 'AAECAwQFBgc=' })).toEqual([
      'ENCRYPTION_KEY is invalid: Invalid key length: 8 bytes (expected 16 or 32)',
    ]);
  });

  it('rejects malformed numbers and flags', () => {
    expect(issuesFor({ ...baseEnv, MAX_RETRIES: 'many' })).toEqual(['MAX_RETRIES must be a number']);
    expect(issuesFor({ ...baseEnv, RETRY_DELAY: '0' })).toEqual(['RETRY_DELAY must be greater than 0']);
    expect(issuesFor({ ...baseEnv, MQTT_PORT: '70000' })).toEqual(['MQTT_PORT must be between 0 and 65535']);
    expect(issuesFor({ ...baseEnv, MQTT_TLS: 'maybe' })).toEqual(['MQTT_TLS must be true or false']);
    expect(issuesFor({ ...baseEnv, DAPNET_API_URL: 'gateway' })).toEqual(['DAPNET_API_URL must be a URL']);
  });

  it('puts the issues in the error message', () => {
    expect(() => loadConfig({ ...baseEnv, MQTT_BROKER: '' })).toThrow(
      'Invalid configuration: MQTT_BROKER is required',
    );
  });
});

describe('summarizeConfig', () => {
  it('leaves out credentials and the key', () => {
    const config = loadConfig(baseEnv);

    expect(summarizeConfig(config)).toEqual({
      broker: 'broker.test:1883',
      topic: 'msh/MY_919/2/e/LongFast/#',
      mqttUser: 'test-user',
      channel: 'LongFast',
      gatewayUrl: 'http://gateway.test/calls',
      gatewayUser: 'dl1abc',
      callsigns: ['dl1abc', 'dl2xyz'],
      transmitterGroups: ['dl-all'],
      database: 'meshtastic.db',
      logFile: 'meshtastic_debug.log',
      maxRetries: 5,
      retryDelayMs: 5_000,
      apiTimeoutMs: 30_000,
      broadcastOnly: true,
      http: null,
    });
  });
});
