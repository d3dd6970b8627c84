import { TriggerContext } from './types';

/**
 * Decide whether the workflow event should trigger an update.
 *
 * @returns null when the update should run, otherwise the reason to skip
 */
export function skipReason(context: TriggerContext, branch: string): string | null {
  if (context.eventName !== 'push') {
    return `Event '${context.eventName}' is not a push, skipping`;
  }
  if (context.ref !== `refs/heads/${branch}`) {
    return `Push to '${context.ref}' is not on ${branch}, skipping`;
  }
  return null;
}
