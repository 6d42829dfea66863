export const IDENTITY_VERIFIER = 'IDENTITY_VERIFIER';

export interface DecodedIdentity {
  uid: string;
  email?: string;
  name?: string;
}

/**
 * Verifies a bearer token issued by the external identity provider.
 * Implementations throw UnauthorizedException for anything they reject.
 */
export interface IdentityVerifier {
  verify(token: string): Promise<DecodedIdentity>;
}
