import { describe, expect, it } from 'vitest';
import { buildClaims, ClaimTypes, cloneIdentity, findClaim, XML_SCHEMA_STRING } from './claims.js';

describe('buildClaims', () => {
  it('uses the user when no bot was installed', () => {
    const claims = buildClaims(
      { accessToken: 'xoxp-1', userId: 'U1', userName: 'ada', teamId: 'T1', teamName: 'Acme' },
      'Slack'
    );

    expect(claims).toEqual([
      { type: ClaimTypes.nameIdentifier, value: 'U1', valueType: XML_SCHEMA_STRING, issuer: 'Slack' },
      { type: ClaimTypes.name, value: 'ada', valueType: XML_SCHEMA_STRING, issuer: 'Slack' },
      { type: ClaimTypes.teamId, value: 'T1', valueType: XML_SCHEMA_STRING, issuer: 'Slack' },
      { type: ClaimTypes.teamName, value: 'Acme', valueType: XML_SCHEMA_STRING, issuer: 'Slack' },
    ]);
  });

  it('prefers the bot user for identifier and name', () => {
    const claims = buildClaims(
      { accessToken: 'xoxb-1', botUserId: 'B1', userId: 'U1', userName: 'ada', teamId: 'T1' },
      'Slack'
    );

    expect(claims.map((c) => [c.type, c.value])).toEqual([
      [ClaimTypes.nameIdentifier, 'B1'],
      [ClaimTypes.name, 'B1'],
      [ClaimTypes.teamId, 'T1'],
    ]);
  });

  it('omits claims whose value is missing or empty', () => {
    const claims = buildClaims({ accessToken: 'xoxp-1', userId: 'U1', teamName: '' }, 'Slack');

    expect(claims.map((c) => c.type)).toEqual([ClaimTypes.nameIdentifier]);
  });

  it('returns no claims for an empty identity', () => {
    expect(buildClaims({ accessToken: 'xoxp-1' }, 'Slack')).toEqual([]);
  });
});

describe('cloneIdentity', () => {
  it('keeps the claims under the new type', () => {
    const identity = {
      authenticationType: 'Slack',
      claims: buildClaims({ accessToken: 'xoxp-1', userId: 'U1' }, 'Slack'),
    };

    const clone = cloneIdentity(identity, 'Cookies');

    expect(clone.authenticationType).toBe('Cookies');
    expect(clone.claims).toEqual(identity.claims);
    expect(clone.claims[0]).not.toBe(identity.claims[0]);
    expect(findClaim(clone, ClaimTypes.nameIdentifier)).toBe('U1');
  });
});
