/**
 * Remote state layout: one state object per unit, keyed by unit path.
 */
import * as path from 'node:path';
import { evaluateString } from '../expressions/evaluator.js';
import { configScopeValue, type ResolvedConfig } from '../config/hierarchy.js';
import type { StateSettings } from '../config/schema.js';

export interface StateLocation {
  bucket: string;
  /** `<unit path>/terraform.tfstate` */
  key: string;
  /** Lock object name, `<key>.tflock` */
  lockKey: string;
}

export const LOCK_SUFFIX = '.tflock';

export function computeStateLocation(
  unitPath: string,
  settings: StateSettings,
  config: ResolvedConfig
): StateLocation {
  const bucket = evaluateString(settings.bucket, { config: configScopeValue(config) }, 'state bucket');
  const key = path.posix.join(unitPath, settings.key_file);
  return { bucket, key, lockKey: `${key}${LOCK_SUFFIX}` };
}

/**
 * Backend block written beside each generated unit.
 */
export function backendDocument(
  location: StateLocation,
  settings: StateSettings
): Record<string, unknown> {
  return {
    terraform: {
      backend: {
        [settings.backend]: {
          ...settings.backend_config,
          bucket: location.bucket,
          key: location.key,
        },
      },
    },
  };
}

/**
 * Identity of a lock across buckets.
 */
export function lockId(location: StateLocation): string {
  return `${location.bucket}/${location.lockKey}`;
}
