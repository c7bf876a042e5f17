export interface UserIdentity {
  readonly username: string;
  readonly name: string;
  readonly email?: string;
  readonly groups: readonly string[];
}

export function identityDomain(identity: UserIdentity): string | undefined {
  const source = identity.email ?? identity.username;
  const at = source.lastIndexOf('@');
  return at >= 0 ? source.slice(at + 1).toLowerCase() : undefined;
}
