/**
 * Core Validators
 *
 * Credential-shape rules applied before anything touches the store.
 * The minimums are fixed, not configurable.
 */

import { KNOWN_ROLES } from './types.js';

export const MIN_USERNAME_LENGTH = 3;
export const MIN_PASSWORD_LENGTH = 6;

export interface RegistrationInput {
  username: string;
  email: string;
  password: string;
  roles?: readonly string[];
}

export class RegistrationValidator {
  /**
   * Collect every violated rule. An empty array means the input is acceptable.
   */
  static validate(input: RegistrationInput): string[] {
    const violations: string[] = [];

    if (!input.username || input.username.length < MIN_USERNAME_LENGTH) {
      violations.push(`Username must be at least ${MIN_USERNAME_LENGTH} characters long`);
    }

    if (!input.password || input.password.length < MIN_PASSWORD_LENGTH) {
      violations.push(`Password must be at least ${MIN_PASSWORD_LENGTH} characters long`);
    }

    for (const role of input.roles ?? []) {
      if (!KNOWN_ROLES.includes(role)) {
        violations.push(`Unknown role: ${role}`);
      }
    }

    return violations;
  }
}
