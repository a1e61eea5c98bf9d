import crypto from 'crypto';
import { EncryptJWT, errors, jwtDecrypt } from 'jose';
import { z } from 'zod';
import type { AuthProperties, StateDataFormat } from './types.js';

const ISSUER = 'express-slack-signin';
const PAYLOAD_CLAIM = 'dat';

export interface DataProtector {
  protect(plaintext: string): Promise<string>;
  /** Resolves to null when the input was not produced by this protector or has expired. */
  unprotect(protectedText: string): Promise<string | null>;
}

export interface DataProtectorOptions {
  /** Lifetime of a protected value, in jose's time span format (e.g. `15m`). */
  expiresIn?: string;
}

/**
 * Seals strings into a compact JWE (`dir` + `A256GCM`). The content key is an
 * HMAC of `purpose` under `secret`, and `purpose` is also the audience, so a
 * value protected for OAuth state will not unprotect as a session cookie.
 */
export function createDataProtector(
  secret: string,
  purpose: string,
  options: DataProtectorOptions = {}
): DataProtector {
  const key = crypto.createHmac('sha256', secret).update(purpose).digest();

  return {
    async protect(plaintext) {
      const jwt = new EncryptJWT({ [PAYLOAD_CLAIM]: plaintext })
        .setProtectedHeader({ alg: 'dir', enc: 'A256GCM' })
        .setIssuer(ISSUER)
        .setAudience(purpose)
        .setIssuedAt();
      if (options.expiresIn) {
        jwt.setExpirationTime(options.expiresIn);
      }
      return jwt.encrypt(key);
    },

    async unprotect(protectedText) {
      try {
        const { payload } = await jwtDecrypt(protectedText, key, {
          issuer: ISSUER,
          audience: purpose,
          keyManagementAlgorithms: ['dir'],
          contentEncryptionAlgorithms: ['A256GCM'],
        });
        const value = payload[PAYLOAD_CLAIM];
        return typeof value === 'string' ? value : null;
      } catch (error) {
        if (error instanceof errors.JOSEError) {
          return null;
        }
        throw error;
      }
    },
  };
}

const authPropertiesSchema = z.object({
  redirectUri: z.string().optional(),
  items: z.record(z.string()),
});

export function createStateDataFormat(protector: DataProtector): StateDataFormat {
  return {
    protect(properties: AuthProperties): Promise<string> {
      return protector.protect(JSON.stringify(properties));
    },

    async unprotect(state: string | undefined): Promise<AuthProperties | null> {
      if (!state) {
        return null;
      }
      const json = await protector.unprotect(state);
      if (json === null) {
        return null;
      }
      let raw: unknown;
      try {
        raw = JSON.parse(json);
      } catch {
        return null;
      }
      const parsed = authPropertiesSchema.safeParse(raw);
      if (!parsed.success) {
        return null;
      }
      const { redirectUri, items } = parsed.data;
      return redirectUri === undefined ? { items } : { redirectUri, items };
    },
  };
}
