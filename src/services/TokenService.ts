/**
 * Bearer token issuance and validation.
 *
 * Tokens are HS256 JWTs carrying the user ID as `sub` and an `exp` of
 * issue time + session duration. Stateless: no session store, no
 * revocation; a token is good until it expires.
 *
 * validate() folds every failure (empty, malformed, bad signature, expired,
 * missing subject) into `null`. Read endpoints accept anonymous callers, so
 * a bad credential and no credential must look the same to the caller.
 */

import { SignJWT, jwtVerify } from 'jose';

const ALGORITHM = 'HS256';
const MIN_SECRET_BYTES = 32; // 256 bits

export interface TokenServiceOptions {
  secret: string;
  /** Session duration in seconds. */
  sessionTimeSeconds: number;
  /** Injectable clock. Defaults to the system clock. */
  now?: () => Date;
}

export class TokenService {
  private readonly key: Uint8Array;
  private readonly sessionTimeSeconds: number;
  private readonly now: () => Date;

  constructor(options: TokenServiceOptions) {
    this.key = new TextEncoder().encode(options.secret);
    if (this.key.byteLength < MIN_SECRET_BYTES) {
      throw new Error(`JWT secret must be at least ${MIN_SECRET_BYTES} bytes`);
    }
    if (!Number.isInteger(options.sessionTimeSeconds) || options.sessionTimeSeconds <= 0) {
      throw new Error('JWT session time must be a positive number of seconds');
    }
    this.sessionTimeSeconds = options.sessionTimeSeconds;
    this.now = options.now ?? (() => new Date());
  }

  async issue(user: { id: string }): Promise<string> {
    const issuedAt = Math.floor(this.now().getTime() / 1000);

    return new SignJWT({})
      .setProtectedHeader({ alg: ALGORITHM, typ: 'JWT' })
      .setSubject(user.id)
      .setIssuedAt(issuedAt)
      .setExpirationTime(issuedAt + this.sessionTimeSeconds)
      .sign(this.key);
  }

  /** Resolve a raw credential (scheme already stripped) to a user ID. */
  async validate(token: unknown): Promise<string | null> {
    if (typeof token !== 'string' || token.trim().length === 0) {
      return null;
    }

    try {
      const { payload } = await jwtVerify(token.trim(), this.key, {
        algorithms: [ALGORITHM],
        currentDate: this.now(),
        requiredClaims: ['exp'],
      });
      return typeof payload.sub === 'string' && payload.sub.length > 0
        ? payload.sub
        : null;
    } catch {
      return null;
    }
  }
}
