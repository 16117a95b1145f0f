export interface TokenProvider {
  getToken(): Promise<string>;
  /** Drops any cached credential so the next `getToken` fetches a fresh one. */
  invalidate(): void;
}
