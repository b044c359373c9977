// packages/accounts/src/password.ts
import bcrypt from 'bcryptjs';

/** bcrypt truncates silently past this many bytes */
export const BCRYPT_MAX_BYTES = 72;

export class PasswordHasher {
  private dummy?: Promise<string>;

  constructor(readonly rounds = 12) {}

  hash(password: string): Promise<string> {
    return bcrypt.hash(password, this.rounds);
  }

  verify(password: string, hashed: string): Promise<boolean> {
    return bcrypt.compare(password, hashed);
  }

  /**
   * Same work as a real verify, for lookups that found no usable account,
   * so response time does not tell whether the email is registered.
   */
  async noUserVerify(): Promise<false> {
    this.dummy ??= bcrypt.hash('no user password', this.rounds);
    await bcrypt.compare('not the password', await this.dummy);
    return false;
  }
}
