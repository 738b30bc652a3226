import type { AllocationConfig, AllocationError } from '@callup/shared';
import { DEFAULT_ALLOCATION_CONFIG } from '@callup/shared';

const NUMERIC_OPTIONS = ['gkCap', 'maxHomeBase', 'maxAwayBase', 'slotTarget'] as const;
const BOOLEAN_OPTIONS = [
  'requireExactReserveFour',
  'preferGkVolunteers',
  'fillShortfallFromReserves',
] as const;

/**
 * Merge overrides onto the defaults and check every value
 */
export function resolveAllocationConfig(
  overrides: Partial<AllocationConfig> = {}
): { config: AllocationConfig; errors: AllocationError[] } {
  const config: AllocationConfig = { ...DEFAULT_ALLOCATION_CONFIG, ...overrides };
  const errors: AllocationError[] = [];

  for (const key of NUMERIC_OPTIONS) {
    const value = config[key];
    if (!Number.isInteger(value) || value < 0) {
      errors.push({
        type: 'invalid_config',
        message: `${key} must be a non-negative integer`,
        details: { option: key, value: String(value) },
      });
    }
  }

  for (const key of BOOLEAN_OPTIONS) {
    if (typeof config[key] !== 'boolean') {
      errors.push({
        type: 'invalid_config',
        message: `${key} must be true or false`,
        details: { option: key, value: String(config[key]) },
      });
    }
  }

  return { config, errors };
}

/**
 * Parse allocation overrides from string key/value pairs (query params, CLI flags).
 * Unknown keys are ignored. Numbers are kept even when malformed so validation
 * reports them; booleans must be spelled "true" or "false".
 */
export function parseConfigOverrides(
  values: Record<string, string | undefined>
): Partial<AllocationConfig> {
  const overrides: Partial<AllocationConfig> = {};

  for (const key of NUMERIC_OPTIONS) {
    const raw = values[key];
    if (raw !== undefined && raw !== '') {
      overrides[key] = Number(raw);
    }
  }

  for (const key of BOOLEAN_OPTIONS) {
    const raw = values[key];
    if (raw === 'true') overrides[key] = true;
    else if (raw === 'false') overrides[key] = false;
  }

  return overrides;
}
