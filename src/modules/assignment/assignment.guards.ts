/**
 * =============================================================================
 * ASSIGNMENT MODULE - GUARD TABLE
 * =============================================================================
 *
 * Who may fire which load event, and from which statuses. Every guard is
 * evaluated in the same order:
 *
 *   1. terminal load            → InvalidStateError (any role, admin included)
 *   2. actor not a listed party → AuthorizationError (admins pass)
 *   3. status not a legal source → InvalidStateError
 * =============================================================================
 */

import { LoadRecord } from '../../shared/database/db';
import { AuthorizationError, InvalidStateError } from '../../shared/types/error.types';
import type { Actor, LoadStatus } from '../../shared/types/api.types';
import { isTerminal } from '../load/load.state-machine';

export type LoadEvent =
  | 'accept_bid'
  | 'reject_bid'
  | 'cancel'
  | 'advance_to_in_transit'
  | 'mark_complete';

type LoadParty = 'owner' | 'assigned_trucker';

interface EventGuard {
  parties: readonly LoadParty[];
  from: readonly LoadStatus[];
  denied: string;
}

export const LOAD_EVENT_GUARDS: Readonly<Record<LoadEvent, EventGuard>> = {
  accept_bid: {
    parties: ['owner'],
    from: ['open'],
    denied: 'Only the shipper who posted this load can accept bids'
  },
  reject_bid: {
    parties: ['owner'],
    from: ['open'],
    denied: 'Only the shipper who posted this load can reject bids'
  },
  cancel: {
    parties: ['owner'],
    from: ['open', 'assigned'],
    denied: 'Only the shipper who posted this load can cancel it'
  },
  advance_to_in_transit: {
    parties: ['assigned_trucker'],
    from: ['assigned'],
    denied: 'Only the assigned trucker can mark this load in transit'
  },
  mark_complete: {
    parties: ['owner', 'assigned_trucker'],
    from: ['in_transit'],
    denied: 'Only the shipper or the assigned trucker can complete this load'
  }
};

function isParty(load: LoadRecord, actor: Actor, party: LoadParty): boolean {
  switch (party) {
    case 'owner':
      return load.shipperId === actor.userId;
    case 'assigned_trucker':
      return load.assignedTruckerId !== null && load.assignedTruckerId === actor.userId;
  }
}

export function assertNotTerminal(load: LoadRecord): void {
  if (isTerminal(load.status)) {
    throw new InvalidStateError(`Load is ${load.status}; no further changes are allowed`, {
      loadId: load.id,
      status: load.status
    });
  }
}

/**
 * Throws unless `actor` may fire `event` on `load` right now
 */
export function assertLoadEvent(load: LoadRecord, actor: Actor, event: LoadEvent): void {
  const guard = LOAD_EVENT_GUARDS[event];

  assertNotTerminal(load);

  const allowed = actor.role === 'admin' || guard.parties.some(party => isParty(load, actor, party));
  if (!allowed) {
    throw new AuthorizationError(guard.denied);
  }

  if (!guard.from.includes(load.status)) {
    throw new InvalidStateError(`Cannot ${event.replace(/_/g, ' ')} while the load is ${load.status}`, {
      loadId: load.id,
      status: load.status
    });
  }
}
