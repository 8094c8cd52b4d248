/**
 * Per-unit actions the engine can run.
 */
export const UNIT_ACTIONS = ['validate', 'plan', 'apply', 'destroy', 'output'] as const;

export type UnitAction = (typeof UNIT_ACTIONS)[number];

/** Actions for which mock outputs are allowed when a dependency block does not say. */
export const DEFAULT_MOCK_ACTIONS: UnitAction[] = ['validate', 'plan'];
