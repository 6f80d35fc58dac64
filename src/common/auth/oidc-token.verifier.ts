import { Injectable } from '@nestjs/common';
import { OAuth2Client, TokenPayload } from 'google-auth-library';

/** Cloud Tasks signs OIDC tokens for the origin of the target URL. */
export function oidcAudience(workerUrl: string): string {
  return new URL(workerUrl).origin;
}

/**
 * Checks Google-issued ID tokens: signature against Google's published keys,
 * expiry, issuer and audience.
 */
@Injectable()
export class OidcTokenVerifier {
  private readonly client = new OAuth2Client();

  async verify(idToken: string, audience: string): Promise<TokenPayload> {
    const ticket = await this.client.verifyIdToken({ idToken, audience });
    const payload = ticket.getPayload();
    if (!payload) {
      throw new Error('ID token carries no payload');
    }
    return payload;
  }
}
