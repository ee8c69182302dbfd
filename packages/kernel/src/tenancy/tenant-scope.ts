import type { TenantScope } from '@tessellate/types';
import { SCOPE_PATTERN } from '../config/kernel-config';

export const TENANT_KEY_PREFIX = 'tenant';

export function isValidScope(scope: unknown): scope is TenantScope {
  return typeof scope === 'string' && SCOPE_PATTERN.test(scope);
}

/** True for null, undefined and blank strings */
export function isMissingScope(scope: string | null | undefined): boolean {
  return scope === null || scope === undefined || scope.trim() === '';
}

/** `tenant:{scope}:` */
export function tenantPrefix(scope: TenantScope): string {
  return `${TENANT_KEY_PREFIX}:${scope}:`;
}
