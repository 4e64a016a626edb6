// services/tokenCache.ts

export interface IssuedToken {
  accessToken: string;
  /** Lifetime in seconds as reported by the token endpoint. */
  expiresIn: number;
}

export type TokenIssuer = () => Promise<IssuedToken>;

const EXPIRY_MARGIN_MS = 30_000;

/**
 * Shared bearer token with a single in-flight refresh.
 * Callers arriving during a refresh wait for it; nobody issues a second one.
 */
export class TokenCache {
  private token: string | null = null;
  private expiresAt = 0;
  private inFlight: Promise<string> | null = null;
  private refreshes = 0;

  constructor(
    private readonly issue: TokenIssuer,
    private readonly now: () => number = Date.now
  ) {}

  get refreshCount(): number {
    return this.refreshes;
  }

  async get(): Promise<string> {
    if (this.token && this.now() < this.expiresAt) {
      return this.token;
    }
    return this.refresh();
  }

  /**
   * Drops `rejected` if it is still the cached token. A token that was
   * already replaced by another caller's refresh is left alone.
   */
  invalidate(rejected: string): void {
    if (this.token === rejected) {
      this.token = null;
      this.expiresAt = 0;
    }
  }

  private refresh(): Promise<string> {
    if (this.inFlight) return this.inFlight;

    this.inFlight = (async () => {
      try {
        const issued = await this.issue();
        this.refreshes++;
        this.token = issued.accessToken;
        this.expiresAt = this.now() + issued.expiresIn * 1000 - EXPIRY_MARGIN_MS;
        return issued.accessToken;
      } finally {
        this.inFlight = null;
      }
    })();

    return this.inFlight;
  }
}
