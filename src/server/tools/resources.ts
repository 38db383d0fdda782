/**
 * Read-only resources served under GET /resources/:name
 */

import type { RiskSettings } from '../../config/riskSettings';
import type { CloudProjectsListing } from '../../types/backtest';

export const RESOURCE_NAMES = ['cloud_projects', 'risk_parameters'] as const;
export type ResourceName = (typeof RESOURCE_NAMES)[number];

export interface ResourceDefinition {
  name: ResourceName;
  description: string;
}

export const RESOURCE_DEFINITIONS: readonly ResourceDefinition[] = [
  {
    name: 'cloud_projects',
    description: 'Cloud projects available to the configured account (not implemented, always empty)',
  },
  {
    name: 'risk_parameters',
    description: 'Risk limits and the symbol allow-list loaded at startup',
  },
];

export function isResourceName(name: string): name is ResourceName {
  return RESOURCE_NAMES.some((resource) => resource === name);
}

export function readResource(name: ResourceName, riskSettings: RiskSettings): CloudProjectsListing | RiskSettings {
  switch (name) {
    case 'cloud_projects':
      return {
        implemented: false,
        message: 'Cloud project listing is not implemented yet.',
        projects: [],
      };
    case 'risk_parameters':
      return riskSettings;
  }
}
