import { PipelinePolicy } from '@azure/core-rest-pipeline';
import https from 'node:https';

export const CONVERGE_VERSION = '1.0.0';

/** `converge/<version>`, extended by `AZURE_HTTP_USER_AGENT`. */
export function userAgentPrefix(environment: Record<string, string | undefined> = process.env): string {
  const base = `converge/${CONVERGE_VERSION}`;
  const extra = environment.AZURE_HTTP_USER_AGENT?.trim();
  return extra ? `${base} ${extra}` : base;
}

/** Sends every request through an agent that accepts any server certificate. */
export function insecureTlsPolicy(): PipelinePolicy {
  const agent = new https.Agent({ rejectUnauthorized: false });

  return {
    name: 'insecureTlsPolicy',
    sendRequest(request, next) {
      request.agent = agent;
      return next(request);
    },
  };
}
