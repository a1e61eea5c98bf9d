import type { Claim, ClaimsIdentity, SlackIdentity } from './types.js';

export const ClaimTypes = {
  nameIdentifier: 'http://schemas.xmlsoap.org/ws/2005/05/identity/claims/nameidentifier',
  name: 'http://schemas.xmlsoap.org/ws/2005/05/identity/claims/name',
  teamId: 'urn:slack:teamid',
  teamName: 'urn:slack:teamname',
} as const;

export const XML_SCHEMA_STRING = 'http://www.w3.org/2001/XMLSchema#string';

/**
 * Maps a Slack identity to claims, in a fixed order. A bot installation is
 * identified by its bot user; a claim whose value is empty is left out.
 */
export function buildClaims(identity: SlackIdentity, authenticationType: string): Claim[] {
  const candidates: Array<[string, string | undefined]> = [
    [ClaimTypes.nameIdentifier, identity.botUserId || identity.userId],
    [ClaimTypes.name, identity.botUserId || identity.userName],
    [ClaimTypes.teamId, identity.teamId],
    [ClaimTypes.teamName, identity.teamName],
  ];

  return candidates.flatMap(([type, value]) =>
    value ? [{ type, value, valueType: XML_SCHEMA_STRING, issuer: authenticationType }] : []
  );
}

export function buildClaimsIdentity(
  identity: SlackIdentity,
  authenticationType: string
): ClaimsIdentity {
  return { authenticationType, claims: buildClaims(identity, authenticationType) };
}

/** Same claims under another authentication type. */
export function cloneIdentity(identity: ClaimsIdentity, authenticationType: string): ClaimsIdentity {
  return {
    authenticationType,
    claims: identity.claims.map((claim) => ({ ...claim })),
  };
}

export function findClaim(identity: ClaimsIdentity, type: string): string | undefined {
  return identity.claims.find((claim) => claim.type === type)?.value;
}
