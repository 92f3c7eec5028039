/**
 * Project and invitation state machines.
 *
 * Enforces valid status transitions, producing typed errors on invalid ones.
 */

import { TypedError, invalidTransitionError } from './errors';
import { InvitationStatus, VALID_INVITATION_TRANSITIONS } from './collaboration';
import { ProjectStatus, VALID_PROJECT_TRANSITIONS } from './project';

/** Result of a state transition attempt. */
export interface TransitionResult<S> {
  success: boolean;
  newStatus?: S;
  error?: TypedError;
}

function transition<S extends string>(
  table: Record<S, S[]>,
  resourceType: string,
  current: S,
  target: S,
): TransitionResult<S> {
  const validTargets = table[current];
  if (!validTargets || !validTargets.includes(target)) {
    const error = invalidTransitionError(resourceType, current, target);
    error.details = { ...error.details, validTargets };
    return { success: false, error };
  }
  return { success: true, newStatus: target };
}

/** Attempt a project status transition. */
export function transitionProjectStatus(
  current: ProjectStatus,
  target: ProjectStatus,
): TransitionResult<ProjectStatus> {
  return transition(VALID_PROJECT_TRANSITIONS, 'project', current, target);
}

/** Attempt an invitation status transition. */
export function transitionInvitationStatus(
  current: InvitationStatus,
  target: InvitationStatus,
): TransitionResult<InvitationStatus> {
  return transition(VALID_INVITATION_TRANSITIONS, 'invitation', current, target);
}
