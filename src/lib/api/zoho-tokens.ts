/**
 * Zoho access tokens per CRM user, refreshed on demand.
 *
 * A token within REFRESH_MARGIN_MS of expiry is refreshed with the stored
 * refresh token and written back before use.
 */

import { logger as rootLogger, type Logger } from '@/logger';
import type { TokenProvider } from '@/lib/phonebridge/stores';
import type { RefreshedToken, ZohoOAuthClient } from './zoho';

const REFRESH_MARGIN_MS = 5 * 60 * 1000;

export interface StoredZohoToken {
  id: string;
  zohoUserId: string | null;
  accessToken: string;
  refreshToken: string;
  expiresAt: Date;
}

export interface ZohoTokenRepository {
  /** Most recently updated active token for the user, or any active token when `zohoUserId` is omitted. */
  findActive(zohoUserId?: string): Promise<StoredZohoToken | null>;
  save(id: string, refreshed: RefreshedToken): Promise<void>;
  countValid(now: Date): Promise<number>;
}

export type TokenRefresher = Pick<ZohoOAuthClient, 'refreshAccessToken'>;

export class ZohoTokenProvider implements TokenProvider {
  private readonly log: Logger;

  constructor(
    private readonly repository: ZohoTokenRepository,
    private readonly oauth: TokenRefresher,
    private readonly accountsUrl: string,
    private readonly now: () => Date = () => new Date(),
    log: Logger = rootLogger
  ) {
    this.log = log.child({ component: 'zoho-tokens' });
  }

  async getAccessToken(zohoUserId?: string): Promise<string | null> {
    let token = zohoUserId ? await this.repository.findActive(zohoUserId) : null;
    if (!token) {
      token = await this.repository.findActive();
    }
    if (!token) {
      this.log.warn({ zohoUserId }, 'No active Zoho token');
      return null;
    }

    if (token.expiresAt.getTime() - REFRESH_MARGIN_MS > this.now().getTime()) {
      return token.accessToken;
    }

    try {
      const refreshed = await this.oauth.refreshAccessToken(token.refreshToken, this.accountsUrl);
      await this.repository.save(token.id, refreshed);
      this.log.info({ zohoUserId: token.zohoUserId }, 'Zoho token refreshed');
      return refreshed.accessToken;
    } catch (error) {
      this.log.error(
        { zohoUserId: token.zohoUserId, error: error instanceof Error ? error.message : String(error) },
        'Zoho token refresh failed'
      );
      return null;
    }
  }

  countValid(): Promise<number> {
    return this.repository.countValid(this.now());
  }
}
