import type { AccessToken, TokenCredential } from '@azure/identity';

const ONE_HOUR_MS = 60 * 60 * 1000;

/** Wraps a bearer token fetched elsewhere. It is handed out as-is for every scope. */
export class StaticTokenCredential implements TokenCredential {
  private readonly expiresOnTimestamp: number;

  constructor(
    private readonly token: string,
    expiresOnTimestamp?: number
  ) {
    this.expiresOnTimestamp = expiresOnTimestamp ?? Date.now() + ONE_HOUR_MS;
  }

  async getToken(): Promise<AccessToken> {
    return { token: this.token, expiresOnTimestamp: this.expiresOnTimestamp };
  }
}
