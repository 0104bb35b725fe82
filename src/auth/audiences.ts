// Token audiences. The Fabric REST API and Azure Resource Manager need separate tokens.

export const AUDIENCES = ['fabric', 'management'] as const;

export type Audience = (typeof AUDIENCES)[number];

export const DEFAULT_AUDIENCE: Audience = 'fabric';

const AUDIENCE_RESOURCES: Record<Audience, string> = {
  fabric: 'https://api.fabric.microsoft.com',
  management: 'https://management.azure.com',
};

/**
 * OAuth scope requested for an audience (`<resource>/.default`).
 */
export function scopeFor(audience: Audience): string {
  return `${AUDIENCE_RESOURCES[audience]}/.default`;
}
