export interface Identity {
  externalId: string;
  displayName: string;
}

/**
 * Supplies the signed-in user's stable external identity (OAuth subject,
 * session user, ...). Authentication itself happens outside the core.
 */
export interface IdentityProvider {
  authenticate(): Promise<Identity>;
}
