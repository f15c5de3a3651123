import type { TToken } from '../../types/api.ts'

/** Role regardless of scope: the root role for CUSTOMER tokens, the team role for TEAM tokens. */
export function effectiveRole(token: TToken): string | undefined {
  if (token.type === 'CUSTOMER') return token.role ?? undefined
  return token.team?.role ?? undefined
}

/** True when the token carries at least one team: a non-empty list or a single team. */
export function hasTeamContext(token: TToken): boolean {
  if (token.type === 'CUSTOMER') return (token.teams?.length ?? 0) > 0
  return token.team !== null && token.team !== undefined
}

export function isCustomerScoped(token: TToken): boolean {
  return token.type === 'CUSTOMER'
}
