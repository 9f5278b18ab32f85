/**
 * Activation Verifier
 * Remote check of a scratched card code plus the rule that decides
 * whether the returned version activates the card.
 */
import {
  InvalidResponseError,
  ThresholdNotMetError,
  TransportError,
} from '../errors.js';

export const ACTIVATION_THRESHOLD = 277028;

export type VerificationResult =
  | { ok: true; value: unknown }
  | { ok: false; error: TransportError | InvalidResponseError };

export interface ActivationVerifier {
  verify(code: string, signal?: AbortSignal): Promise<VerificationResult>;
}

export type ActivationDecision =
  | { ok: true; version: number }
  | { ok: false; error: InvalidResponseError | ThresholdNotMetError };

function parseInteger(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isSafeInteger(value) ? value : null;
  }
  if (typeof value === 'string' && /^[+-]?\d+$/.test(value)) {
    const parsed = parseInt(value, 10);
    return Number.isSafeInteger(parsed) ? parsed : null;
  }
  return null;
}

/**
 * Activation succeeds only for an integer strictly above the threshold
 */
export function decideActivation(value: unknown): ActivationDecision {
  const version = parseInteger(value);
  if (version === null) {
    const shown = value === undefined || value === null ? 'null' : JSON.stringify(value);
    return { ok: false, error: new InvalidResponseError(`Activation failed (version = ${shown})`) };
  }
  if (version <= ACTIVATION_THRESHOLD) {
    return { ok: false, error: new ThresholdNotMetError(version, ACTIVATION_THRESHOLD) };
  }
  return { ok: true, version };
}

// ============================================================================
// HTTP VERIFIER
// ============================================================================

export interface HttpVerifierOptions {
  baseUrl: string;
  path: string;
  queryParam: string;
  responseField: string;
  timeoutMs: number;
  fetch?: typeof fetch;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function buildActivationUrl(options: HttpVerifierOptions, code: string): string {
  const url = new URL(options.path, options.baseUrl);
  url.searchParams.set(options.queryParam, code);
  return url.toString();
}

/**
 * GET {baseUrl}{path}?{queryParam}={code}, expecting a JSON object.
 * Single attempt; the request is aborted after timeoutMs.
 */
export function createHttpActivationVerifier(options: HttpVerifierOptions): ActivationVerifier {
  const fetchImpl = options.fetch ?? fetch;

  async function verify(code: string, signal?: AbortSignal): Promise<VerificationResult> {
    const url = buildActivationUrl(options, code);
    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, options.timeoutMs);
    const onAbort = () => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    console.log(`[Activation] Activating card with code: ${code}`);
    const startTime = Date.now();

    try {
      let response: Response;
      try {
        response = await fetchImpl(url, {
          method: 'GET',
          headers: { Accept: 'application/json' },
          signal: controller.signal
        });
      } catch (error) {
        const reason = timedOut
          ? `Activation request timed out after ${options.timeoutMs} ms`
          : `Activation request failed: ${error instanceof Error ? error.message : String(error)}`;
        console.error(`[Activation] ${reason}`);
        return { ok: false, error: new TransportError(reason, { cause: error }) };
      }

      console.log(`[Activation] Response ${response.status} in ${Date.now() - startTime}ms`);

      if (!response.ok) {
        const message = `API call failed: ${response.status} ${response.statusText}`.trim();
        console.error(`[Activation] ${message}`);
        return { ok: false, error: new InvalidResponseError(message, response.status) };
      }

      let body: unknown;
      try {
        body = await response.json();
      } catch (error) {
        if (timedOut) {
          const reason = `Activation request timed out after ${options.timeoutMs} ms`;
          console.error(`[Activation] ${reason}`);
          return { ok: false, error: new TransportError(reason, { cause: error }) };
        }
        console.error('[Activation] Response body is not valid JSON');
        return {
          ok: false,
          error: new InvalidResponseError('Activation failed: malformed response', response.status)
        };
      }

      if (!isRecord(body)) {
        console.error('[Activation] Response body is not a JSON object');
        return {
          ok: false,
          error: new InvalidResponseError('Activation failed: malformed response', response.status)
        };
      }

      console.log(`[Activation] Parsed ${options.responseField}: ${JSON.stringify(body[options.responseField])}`);
      return { ok: true, value: body[options.responseField] };
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    }
  }

  return { verify };
}
