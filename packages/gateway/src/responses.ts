import { isRestError, PipelineResponse } from '@azure/core-rest-pipeline';
import { describeError, isSpecObject, ProviderRequestError, ResourceIdentity, SpecValue, toSpecValue } from '@converge/contracts';

export function isSuccess(status: number): boolean {
  return status >= 200 && status < 300;
}

export function parseBody(response: PipelineResponse): SpecValue | undefined {
  const text = response.bodyAsText;
  if (!text) return undefined;

  try {
    return toSpecValue(JSON.parse(text));
  } catch {
    return text;
  }
}

/** `Retry-After` as seconds or as an HTTP date. */
export function parseRetryAfter(value: string | undefined, now: number = Date.now()): number | undefined {
  if (!value) return undefined;

  const seconds = Number(value);
  if (!Number.isNaN(seconds)) return seconds * 1000;

  const date = Date.parse(value);
  return Number.isNaN(date) ? undefined : Math.max(0, date - now);
}

/** ARM error envelope: `{ "error": { "code": "...", "message": "..." } }` */
function errorDetails(body: SpecValue | undefined): { code?: string; message?: string } {
  if (!isSpecObject(body) || !isSpecObject(body.error)) return {};
  const { code, message } = body.error;
  return { code: typeof code === 'string' ? code : undefined, message: typeof message === 'string' ? message : undefined };
}

export function responseError(response: PipelineResponse, identity?: ResourceIdentity): ProviderRequestError {
  const { code, message } = errorDetails(parseBody(response));
  const summary = `${response.request.method} ${response.request.url} failed with HTTP ${response.status}`;

  return new ProviderRequestError(code || message ? `${summary}: ${code ?? 'Error'} - ${message ?? ''}`.trimEnd() : summary, {
    statusCode: response.status,
    code,
    retryAfterMs: parseRetryAfter(response.headers.get('retry-after')),
    identity,
  });
}

/** Wraps transport failures; provider errors pass through. */
export function toProviderError(error: unknown, identity?: ResourceIdentity): ProviderRequestError {
  if (error instanceof ProviderRequestError) return error;

  if (isRestError(error))
    return new ProviderRequestError(error.message, {
      statusCode: error.statusCode,
      code: error.code,
      retryAfterMs: parseRetryAfter(error.response?.headers.get('retry-after')),
      identity,
      cause: error,
    });

  return new ProviderRequestError(describeError(error), { identity, cause: error });
}
