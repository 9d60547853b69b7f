import { createHash, createHmac, timingSafeEqual } from 'crypto';

/** SHA3-512 hex digest; the login page hashes with the same function before posting */
export function hashAuthMessage(message: string): string {
  return createHash('sha3-512').update(message).digest('hex');
}

/** Constant-time string comparison using HMAC to prevent timing side-channel attacks.
 *  HMAC digests are always 32 bytes, so comparison is constant-time regardless of input lengths. */
export function safeTokenCompare(a: string, b: string): boolean {
  const key = 'xunlei-launcher-credential-compare';
  const hmacA = createHmac('sha256', key).update(a).digest();
  const hmacB = createHmac('sha256', key).update(b).digest();
  return timingSafeEqual(hmacA as Uint8Array, hmacB as Uint8Array);
}

export interface Credentials {
  userHash: string;
  passwordHash: string;
}

/** Hash configured secrets once; authentication is off unless both are set */
export function resolveCredentials(user?: string, password?: string): Credentials | null {
  if (!user || !password) return null;
  return { userHash: hashAuthMessage(user), passwordHash: hashAuthMessage(password) };
}

export class AuthGate {
  constructor(private readonly credentials: Credentials | null) {}

  get enabled(): boolean {
    return this.credentials !== null;
  }

  /** Both submitted hashes must match. Always true when no credentials are configured. */
  decide(userHash: string, passwordHash: string): boolean {
    if (!this.credentials) return true;
    // both comparisons always run
    const userOk = safeTokenCompare(userHash, this.credentials.userHash);
    const passwordOk = safeTokenCompare(passwordHash, this.credentials.passwordHash);
    return userOk && passwordOk;
  }
}
