import { injectable } from 'inversify';
import crypto from 'crypto';

export interface ICryptoService {
  generateId(): string;
  generateSecureToken(length?: number): string;
  hashToken(token: string): string;
  secretsMatch(provided: string, expected: string): boolean;
}

@injectable()
export class CryptoService implements ICryptoService {
  generateId(): string {
    return crypto.randomUUID();
  }

  generateSecureToken(length: number = 32): string {
    return crypto.randomBytes(length).toString('hex');
  }

  hashToken(token: string): string {
    return crypto.createHash('sha256').update(token).digest('hex');
  }

  /**
   * Constant-time comparison. Both sides are digested first so inputs of
   * different lengths never short-circuit.
   */
  secretsMatch(provided: string, expected: string): boolean {
    if (expected.length === 0) {
      return false;
    }

    const providedDigest = crypto.createHash('sha256').update(provided).digest();
    const expectedDigest = crypto.createHash('sha256').update(expected).digest();

    return crypto.timingSafeEqual(providedDigest, expectedDigest);
  }
}
