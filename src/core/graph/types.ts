import type { UnitAction } from '../actions.js';
import type { ValueMap } from '../values/types.js';

/**
 * Directed dependency from a dependent unit to the unit providing outputs.
 */
export interface DependencyEdge {
  /** Dependent unit name */
  from: string;
  /** Provider unit name */
  to: string;
  /** Disabled edges impose no ordering and contribute no outputs */
  enabled: boolean;
  /** Keep ordering but never read the provider's real outputs */
  skipOutputs: boolean;
  /** Placeholder outputs used before the provider is applied */
  mockOutputs?: ValueMap;
  /** Actions for which mockOutputs may stand in for real outputs */
  mockAllowedActions: UnitAction[];
  /** How the edge came to exist */
  origin: 'reference' | 'declared' | 'both';
}

/**
 * Graph output format.
 */
export type GraphFormat = 'mermaid' | 'graphviz' | 'json';
