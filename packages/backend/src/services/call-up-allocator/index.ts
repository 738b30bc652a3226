import type {
  AllocateRequest,
  AllocateResult,
  AllocationConfig,
  AllocationError,
} from '@callup/shared';
import { Roster } from './roster.js';
import { CallUpAllocator } from './allocator.js';
import { resolveAllocationConfig } from './config.js';
import { buildMatchSheets, buildPlayerSummaries } from './reporter.js';

export interface RunAllocationOptions {
  verbose?: boolean;
}

/**
 * Main service for allocating call-ups
 */
export function runAllocation(
  request: AllocateRequest,
  options: RunAllocationOptions = {}
): AllocateResult {
  const { config, errors: configErrors } = resolveAllocationConfig(request.config);
  if (configErrors.length > 0) {
    return failedResult('Invalid allocation options', config, configErrors);
  }

  if (request.matches.length === 0) {
    return failedResult('No matches to allocate', config, [
      { type: 'no_matches', message: 'At least one match is required' },
    ]);
  }

  let roster: Roster;
  try {
    roster = new Roster(request.players);
  } catch (error) {
    return failedResult('Invalid roster', config, [
      {
        type: 'invalid_roster',
        message: error instanceof Error ? error.message : 'Roster could not be built',
      },
    ]);
  }

  try {
    const allocator = new CallUpAllocator(roster, request.matches, config, options);
    const allocations = allocator.allocate();
    const warnings = allocator.getWarnings();
    const allocationLog = allocator.getAllocationLog();

    return {
      success: true,
      message: `Allocated ${allocations.length} matches for ${roster.size} players`,
      config,
      allocations,
      summaries: buildPlayerSummaries(roster, allocations),
      matchSheets: buildMatchSheets(roster, allocations, config.gkCap),
      warnings: warnings.length > 0 ? warnings : undefined,
      allocationLog: allocationLog.length > 0 ? allocationLog : undefined,
    };
  } catch (error) {
    console.error('runAllocation: Exception caught:', error);
    return failedResult('Allocation failed', config, [
      {
        type: 'allocation_failed',
        message: error instanceof Error ? error.message : 'Unknown error',
      },
    ]);
  }
}

function failedResult(
  message: string,
  config: AllocationConfig,
  errors: AllocationError[]
): AllocateResult {
  return {
    success: false,
    message,
    config,
    allocations: [],
    summaries: [],
    matchSheets: [],
    errors,
  };
}

export { Roster } from './roster.js';
export { CallUpAllocator } from './allocator.js';
export { resolveAllocationConfig, parseConfigOverrides } from './config.js';
export { buildPlayerSummaries, buildMatchSheets, buildMatchSheet } from './reporter.js';
