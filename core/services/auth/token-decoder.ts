import type { Role } from '../../../types/mining';
import { AuthError, createErrorDetails, toError } from '../../errors/types';
import { tokenPayloadSchema, TokenPayload } from '../../../utils/validation/auth';

export interface DecodedToken {
  role: Role;
  /** Epoch seconds */
  expiresAt: number;
  email?: string;
  payload: TokenPayload;
}

const ROLE_ALIASES: Record<string, Role> = {
  freetrial: 'FreeTrial',
  free: 'FreeTrial',
  trial: 'FreeTrial',
  premium: 'Premium',
  pro: 'Premium',
  paid: 'Premium',
  admin: 'Admin',
  administrator: 'Admin'
};

/**
 * Maps a role or tier claim onto a tier. Absent or unrecognised claims get the most restrictive tier.
 */
export function roleFromClaim(claim: string | undefined): Role {
  if (!claim) return 'FreeTrial';
  const normalized = claim.toLowerCase().replace(/[^a-z]/g, '');
  return ROLE_ALIASES[normalized] ?? 'FreeTrial';
}

function decodeSegment(segment: string): unknown {
  const json = Buffer.from(segment, 'base64url').toString('utf8');
  return JSON.parse(json);
}

/**
 * Reads role and expiry from a JWT without verifying its signature; the API verifies it on every call.
 */
export function decodeAccessToken(token: string): DecodedToken {
  const segments = token.split('.');
  if (segments.length !== 3 || !segments[1]) {
    throw new AuthError('MalformedToken', 'Token is not a JSON Web Token');
  }

  let raw: unknown;
  try {
    raw = decodeSegment(segments[1]);
  } catch (error) {
    throw new AuthError('MalformedToken', 'Token payload is not valid JSON', toError(error), createErrorDetails(error));
  }

  const parsed = tokenPayloadSchema.safeParse(raw);
  if (!parsed.success) {
    throw new AuthError('MalformedToken', 'Token payload has no usable expiry', parsed.error, {
      issues: parsed.error.issues.map(issue => issue.message)
    });
  }

  return {
    role: roleFromClaim(parsed.data.role ?? parsed.data.tier),
    expiresAt: parsed.data.exp,
    email: parsed.data.email,
    payload: parsed.data
  };
}

