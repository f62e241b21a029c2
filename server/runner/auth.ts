import { AuthorizationError } from './errors';

/**
 * Answers "has the caller proven authority for this principal?" for the
 * duration of one operation.
 */
export interface Authorizer {
  requireAuth(principal: string): void;
}

export class GrantedAuthorizer implements Authorizer {
  private principals: Set<string>;

  constructor(principals: Iterable<string>) {
    this.principals = new Set(principals);
  }

  requireAuth(principal: string): void {
    if (!this.principals.has(principal)) {
      throw new AuthorizationError(`authorization required for ${principal}`);
    }
  }

  granted(): string[] {
    return [...this.principals];
  }
}

export const NO_AUTHORITY: Authorizer = new GrantedAuthorizer([]);

export function grant(...principals: string[]): GrantedAuthorizer {
  return new GrantedAuthorizer(principals);
}
