/**
 * Identity collaborator interface.
 * Token issuance lives elsewhere; this core only resolves a bearer token to a user id.
 */

export interface IIdentityProvider {
  /** Returns the user id for a valid token, null otherwise. */
  verifyToken(token: string): Promise<string | null>;
}
