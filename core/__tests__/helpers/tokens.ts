function encodeSegment(value: unknown): string {
  return Buffer.from(JSON.stringify(value), 'utf8').toString('base64url');
}

/**
 * Builds an unsigned JWT; the core never verifies signatures
 */
export function encodeUnsignedToken(payload: Record<string, unknown>): string {
  return `${encodeSegment({ alg: 'none', typ: 'JWT' })}.${encodeSegment(payload)}.test-signature`;
}

export function makeAccessToken(options: { exp: number; role?: string; email?: string }): string {
  return encodeUnsignedToken({
    exp: options.exp,
    iat: options.exp - 3600,
    email: options.email ?? 'analyst@example.com',
    ...(options.role !== undefined ? { role: options.role } : {})
  });
}
