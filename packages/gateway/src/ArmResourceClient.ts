import { createHttpPoller, LongRunningOperation, LroResponse, OperationState } from '@azure/core-lro';
import { createHttpHeaders, createPipelineRequest, PipelineRequest, PipelineResponse } from '@azure/core-rest-pipeline';
import {
  ActualState,
  HttpMethod,
  ILogger,
  IProviderClient,
  isSpecObject,
  RawRequest,
  RawResponse,
  ResourceIdentity,
  silentLogger,
  SpecObject,
  SpecValue,
  WriteResult,
} from '@converge/contracts';

import { LroOperationHandle } from './LroOperationHandle';
import { isSuccess, parseBody, responseError, toProviderError } from './responses';

/** The part of an ARM service client this module needs; `ResourceManagementClient` satisfies it. */
export interface IArmPipeline {
  sendRequest(request: PipelineRequest): Promise<PipelineResponse>;
}

interface SendOptions {
  body?: SpecValue;
  headers?: Record<string, string>;
  timeoutMs?: number;
  identity?: ResourceIdentity;
}

/**
 * Resource client for one resource kind, bound to one API version.
 * Writes return a handle over the ARM long-running operation, or an immediate result when ARM finished synchronously.
 */
export class ArmResourceClient implements IProviderClient {
  constructor(
    private readonly pipeline: IArmPipeline,
    private readonly endpoint: string,
    private readonly apiVersion: () => Promise<string>,
    private readonly logger: ILogger = silentLogger
  ) {}

  async get(identity: ResourceIdentity): Promise<ActualState> {
    const response = await this.send('GET', await this.resourceUrl(identity), { identity });
    if (response.status === 404) return undefined;
    if (!isSuccess(response.status)) {
      const error = responseError(response, identity);
      if (error.isNotFound) return undefined;
      throw error;
    }

    const body = parseBody(response);
    return isSpecObject(body) ? body : undefined;
  }

  async createOrUpdate(identity: ResourceIdentity, body: SpecObject): Promise<WriteResult> {
    return this.startOperation(identity, 'PUT', await this.resourceUrl(identity), body);
  }

  async delete(identity: ResourceIdentity): Promise<WriteResult> {
    return this.startOperation(identity, 'DELETE', await this.resourceUrl(identity));
  }

  async invoke(identity: ResourceIdentity, operation: string, body?: SpecObject): Promise<WriteResult> {
    return this.startOperation(identity, 'POST', await this.resourceUrl(identity, `/${operation}`), body);
  }

  /** Sends any request below the management endpoint; the status code is left to the caller. */
  async request(request: RawRequest): Promise<RawResponse> {
    const query = { ...request.query };
    query['api-version'] ??= await this.apiVersion();

    const response = await this.send(request.method, this.url(request.path, query), {
      body: request.body,
      headers: request.headers,
      timeoutMs: request.timeoutMs,
    });
    return { status: response.status, headers: response.headers.toJSON(), body: parseBody(response) };
  }

  private async resourceUrl(identity: ResourceIdentity, suffix = ''): Promise<string> {
    return this.url(`${identity.toString()}${suffix}`, { 'api-version': await this.apiVersion() });
  }

  private url(path: string, query: Record<string, string>): string {
    const url = /^https?:\/\//i.test(path) ? new URL(path) : new URL(path.replace(/^\/+/, ''), this.endpoint.endsWith('/') ? this.endpoint : `${this.endpoint}/`);
    for (const [key, value] of Object.entries(query)) url.searchParams.set(key, value);
    return url.toString();
  }

  private async send(method: HttpMethod, url: string, options: SendOptions = {}): Promise<PipelineResponse> {
    const headers = createHttpHeaders({ accept: 'application/json', ...options.headers });
    if (options.body !== undefined) headers.set('content-type', 'application/json');

    const request = createPipelineRequest({
      url,
      method,
      headers,
      body: options.body === undefined ? undefined : JSON.stringify(options.body),
      timeout: options.timeoutMs,
    });

    this.logger.debug(`${method} ${url}`);
    try {
      return await this.pipeline.sendRequest(request);
    } catch (error) {
      throw toProviderError(error, options.identity);
    }
  }

  private async startOperation(identity: ResourceIdentity, method: HttpMethod, url: string, body?: SpecObject): Promise<WriteResult> {
    const toLroResponse = (response: PipelineResponse, requestMethod: string, requestUrl: string): LroResponse<SpecValue | undefined> => {
      const parsed = parseBody(response);
      return {
        flatResponse: parsed,
        rawResponse: { statusCode: response.status, headers: response.headers.toJSON(), body: parsed },
      };
    };

    const lro: LongRunningOperation<SpecValue | undefined> = {
      requestPath: url,
      requestMethod: method,
      sendInitialRequest: async () => {
        const response = await this.send(method, url, { body, identity });
        // Deleting something already gone is a completed delete.
        if (method === 'DELETE' && response.status === 404) return { flatResponse: undefined, rawResponse: { statusCode: 204, headers: {}, request: { method, url } } };
        if (!isSuccess(response.status)) throw responseError(response, identity);
        return toLroResponse(response, method, url);
      },
      sendPollRequest: async (path) => {
        const response = await this.send('GET', path, { identity });
        if (!isSuccess(response.status)) throw responseError(response, identity);
        return toLroResponse(response, 'GET', path);
      },
    };

    const poller = await createHttpPoller<SpecValue | undefined, OperationState<SpecValue | undefined>>(lro, { resolveOnUnsuccessful: true });
    const handle = new LroOperationHandle(identity, poller);

    if (poller.isDone() && poller.getOperationState().status === 'succeeded') return { kind: 'immediate', identity, state: handle.result() };
    return handle;
  }
}
