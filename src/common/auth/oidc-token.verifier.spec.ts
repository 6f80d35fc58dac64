import { LoginTicket, OAuth2Client, TokenPayload } from 'google-auth-library';
import { oidcAudience, OidcTokenVerifier } from './oidc-token.verifier';

describe('oidcAudience', () => {
  it('should use the origin of the worker URL', () => {
    expect(oidcAudience('https://grader.example.test/internal/tasks/grade')).toBe(
      'https://grader.example.test',
    );
    expect(oidcAudience('http://localhost:8080/internal/tasks/grade')).toBe(
      'http://localhost:8080',
    );
  });
});

describe('OidcTokenVerifier', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should verify the token for the audience and return its claims', async () => {
    const payload: TokenPayload = {
      iss: 'https://accounts.google.com',
      sub: '1',
      aud: 'https://grader.example.test',
      iat: 1760000000,
      exp: 1760003600,
      email: 'tasks@test-project.iam.gserviceaccount.com',
    };
    const verifyIdToken = jest
      .spyOn(OAuth2Client.prototype, 'verifyIdToken')
      .mockImplementation(async () => new LoginTicket('test-envelope', payload));

    const result = await new OidcTokenVerifier().verify(
      'test-oidc-token',
      'https://grader.example.test',
    );

    expect(result).toBe(payload);
    expect(verifyIdToken).toHaveBeenCalledWith({
      idToken: 'test-oidc-token',
      audience: 'https://grader.example.test',
    });
  });

  it('should fail when the token has no claims', async () => {
    jest
      .spyOn(OAuth2Client.prototype, 'verifyIdToken')
      .mockImplementation(async () => new LoginTicket('test-envelope'));

    await expect(
      new OidcTokenVerifier().verify('test-oidc-token', 'https://grader.example.test'),
    ).rejects.toThrow('ID token carries no payload');
  });
});
