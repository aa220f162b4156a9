/**
 * =============================================================================
 * LOAD MODULE - STATUS ADJACENCY TABLE
 * =============================================================================
 *
 *   open ──accept──▶ assigned ──pickup──▶ in_transit ──deliver──▶ completed
 *     │                 │
 *     └──cancel──▶ cancelled ◀──cancel──┘
 *
 * completed and cancelled are terminal. A cancelled load never reopens.
 * =============================================================================
 */

import type { LoadStatus } from '../../shared/types/api.types';

export const LOAD_TRANSITIONS: Readonly<Record<LoadStatus, readonly LoadStatus[]>> = {
  open: ['assigned', 'cancelled'],
  assigned: ['in_transit', 'cancelled'],
  in_transit: ['completed'],
  completed: [],
  cancelled: []
};

/** Statuses in which the load is bound to a trucker */
const TRUCKER_BOUND: ReadonlySet<LoadStatus> = new Set<LoadStatus>(['assigned', 'in_transit', 'completed']);

export function isTerminal(status: LoadStatus): boolean {
  return LOAD_TRANSITIONS[status].length === 0;
}

export function canTransition(from: LoadStatus, to: LoadStatus): boolean {
  return LOAD_TRANSITIONS[from].includes(to);
}

export function requiresAssignedTrucker(status: LoadStatus): boolean {
  return TRUCKER_BOUND.has(status);
}
