import type { Logger } from 'pino';
import type { ForwardResult, MessageForwarder, TextMessage } from '../../domain/index.js';
import { AuthenticationError, GatewayTransientError, formatNodeId } from '../../domain/index.js';
import {
  BackoffPolicy,
  retryWithBackoff,
  type AttemptOutcome,
  type SleepFn,
} from '../../application/backoff.js';

/** Settings for the DAPNET `/calls` endpoint. */
export interface DapnetGatewayConfig {
  url: string;
  /** Callsign the gateway account is registered under; the Basic auth user. */
  authCallsign: string;
  password: string;
  /** Destination pager callsigns. */
  callsigns: readonly string[];
  transmitterGroups: readonly string[];
  timeoutMs: number;
  maxRetries: number;
  retryDelayMs: number;
  /** Prefix the page with the sender's node id, e.g. `!a1b2c3d4: hello`. */
  prefixSender: boolean;
}

export interface DapnetCallBody {
  text: string;
  callSignNames: string[];
  transmitterGroupNames: string[];
  emergency: boolean;
}

export interface DapnetForwarderDeps {
  fetch?: typeof fetch;
  sleep?: SleepFn;
}

type GatewayError = AuthenticationError | GatewayTransientError;

const MAX_LOGGED_BODY = 200;

export function buildCallBody(config: DapnetGatewayConfig, message: TextMessage): DapnetCallBody {
  return {
    text: config.prefixSender ? `${formatNodeId(message.fromNodeId)}: ${message.text}` : message.text,
    callSignNames: [...config.callsigns],
    transmitterGroupNames: [...config.transmitterGroups],
    emergency: false,
  };
}

async function readBodySnippet(response: Response): Promise<string> {
  try {
    return (await response.text()).slice(0, MAX_LOGGED_BODY);
  } catch (err: unknown) {
    return err instanceof Error ? `<unreadable body: ${err.message}>` : '<unreadable body>';
  }
}

/**
 * Delivers text messages to the DAPNET paging gateway.
 *
 * Each attempt is bounded by `timeoutMs`. Network errors, timeouts and
 * non-2xx answers are retried with exponential backoff
 * (`retryDelayMs * 2^attempt`) up to `maxRetries` attempts in total.
 * 401/403 is reported immediately without retrying.
 *
 * `forward()` never throws: the caller gets a ForwardResult and decides
 * what to record. If `signal` aborts mid-request or mid-backoff the result
 * is `cancelled`, on the last attempt too.
 */
export class DapnetForwarder implements MessageForwarder {
  private readonly policy: BackoffPolicy;
  private readonly authorization: string;

  constructor(
    private readonly config: DapnetGatewayConfig,
    private readonly log: Logger,
    private readonly deps: DapnetForwarderDeps = {},
  ) {
    this.policy = new BackoffPolicy({
      baseDelayMs: config.retryDelayMs,
      multiplier: 2,
      maxAttempts: config.maxRetries,
    });
    this.authorization = `Basic ${Buffer.from(`${config.authCallsign}:${config.password}`).toString('base64')}`;
  }

  async forward(message: TextMessage, signal?: AbortSignal): Promise<ForwardResult> {
    const body = JSON.stringify(buildCallBody(this.config, message));
    const sender = formatNodeId(message.fromNodeId);

    const result = await retryWithBackoff<number, GatewayError>(
      this.policy,
      (attempt) => this.attempt(body, message.packetId, sender, attempt, signal),
      {
        signal,
        sleep: this.deps.sleep,
        onRetry: ({ attempt, delayMs }) => {
          this.log.info(
            { packetId: message.packetId, attempt: attempt + 1, delayMs },
            'Retrying gateway delivery after backoff',
          );
        },
      },
    );

    if (result.ok) {
      this.log.info(
        { packetId: message.packetId, from: sender, attempts: result.attempts, status: result.value },
        'Message delivered to gateway',
      );
      return { status: 'delivered', attempts: result.attempts, httpStatus: result.value };
    }

    const error = result.error?.message ?? 'no attempt made';

    if (result.reason === 'aborted') {
      this.log.warn({ packetId: message.packetId, attempts: result.attempts }, 'Gateway delivery cancelled by shutdown');
      return { status: 'failed', reason: 'cancelled', attempts: result.attempts, error };
    }

    if (result.reason === 'fatal') {
      this.log.error(
        { packetId: message.packetId, attempts: result.attempts, err: result.error },
        'Gateway rejected credentials, not retrying',
      );
      return { status: 'failed', reason: 'authentication', attempts: result.attempts, error };
    }

    this.log.error(
      { packetId: message.packetId, attempts: result.attempts, err: result.error },
      'Gateway delivery failed after all retries',
    );
    return { status: 'failed', reason: 'retries_exhausted', attempts: result.attempts, error };
  }

  private async attempt(
    body: string,
    packetId: number,
    sender: string,
    attempt: number,
    signal: AbortSignal | undefined,
  ): Promise<AttemptOutcome<number, GatewayError>> {
    const fetchImpl = this.deps.fetch ?? fetch;
    const timeout = AbortSignal.timeout(this.config.timeoutMs);
    const requestSignal = signal ? AbortSignal.any([signal, timeout]) : timeout;

    this.log.info(
      { packetId, from: sender, attempt: attempt + 1, maxAttempts: this.config.maxRetries },
      'Sending message to gateway',
    );

    try {
      const response = await fetchImpl(this.config.url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: this.authorization,
        },
        body,
        signal: requestSignal,
      });

      if (response.ok) {
        return { done: true, value: response.status };
      }

      if (response.status === 401 || response.status === 403) {
        return { done: false, retryable: false, error: new AuthenticationError(response.status) };
      }

      const snippet = await readBodySnippet(response);
      this.log.warn(
        { packetId, attempt: attempt + 1, status: response.status, body: snippet },
        'Gateway returned non-success status',
      );
      return {
        done: false,
        retryable: true,
        error: new GatewayTransientError(`Gateway returned HTTP ${response.status}`, response.status),
      };
    } catch (err: unknown) {
      if (signal?.aborted) {
        return {
          done: false,
          retryable: false,
          error: new GatewayTransientError('Gateway request cancelled by shutdown', undefined, { cause: err }),
        };
      }

      const reason = timeout.aborted
        ? `Gateway request timed out after ${this.config.timeoutMs}ms`
        : `Gateway request failed: ${err instanceof Error ? err.message : String(err)}`;

      this.log.warn({ packetId, attempt: attempt + 1, err }, reason);
      return { done: false, retryable: true, error: new GatewayTransientError(reason, undefined, { cause: err }) };
    }
  }
}
