import type { IIdentityProvider } from '../../src/providers/IIdentityProvider.js';

export class MockIdentityProvider implements IIdentityProvider {
  readonly tokens = new Map<string, string>();

  async verifyToken(token: string): Promise<string | null> {
    return this.tokens.get(token) ?? null;
  }

  // ── Test Helpers ──

  grant(token: string, userId: string): void {
    this.tokens.set(token, userId);
  }
}
