/**
 * Bearer-token scaffolding for tools marked requireAuth.
 *
 * Without a configured server token every token authenticates (prototype
 * mode) but only auto-approved tools are authorized. With a token, the
 * bearer must match it exactly.
 */

import { timingSafeEqual } from 'crypto';

export interface AuthenticatorOptions {
  apiToken?: string;
  autoApproveTools?: readonly string[];
}

function sameToken(a: string, b: string): boolean {
  const left = Buffer.from(a, 'utf-8');
  const right = Buffer.from(b, 'utf-8');
  return left.length === right.length && timingSafeEqual(left, right);
}

export class Authenticator {
  private readonly apiToken?: string;
  private readonly autoApproveTools: ReadonlySet<string>;

  constructor(options: AuthenticatorOptions = {}) {
    this.apiToken = options.apiToken;
    this.autoApproveTools = new Set(options.autoApproveTools ?? []);
  }

  get prototypeMode(): boolean {
    return this.apiToken === undefined;
  }

  authenticate(token: string): boolean {
    if (this.apiToken === undefined) return true;
    return sameToken(token, this.apiToken);
  }

  authorize(token: string, toolName: string): boolean {
    if (this.autoApproveTools.has(toolName)) return true;
    return this.apiToken !== undefined && this.authenticate(token);
  }
}

/**
 * Token from an `Authorization: Bearer <token>` header
 */
export function bearerToken(header: string | undefined): string | null {
  if (!header?.startsWith('Bearer ')) return null;
  const token = header.slice('Bearer '.length).trim();
  return token === '' ? null : token;
}
