/**
 * Process exit codes for the framevault CLI.
 */

import { CancelledError, type FramevaultError } from '../shared/errors.js';
import type { PipelineOutcome } from '../pipeline/PipelineOrchestrator.js';

export const EXIT_SUCCESS = 0;
export const EXIT_USER_ERROR = 1;
export const EXIT_SYSTEM_ERROR = 2;
export const EXIT_SIGINT = 130;

export function exitCodeForError(error: FramevaultError): number {
  if (error instanceof CancelledError) return EXIT_SIGINT;
  return error.severity === 'user' ? EXIT_USER_ERROR : EXIT_SYSTEM_ERROR;
}

/** A completed run with any failed upload exits with EXIT_USER_ERROR. */
export function exitCodeForOutcome(outcome: PipelineOutcome): number {
  if (outcome.status === 'aborted') {
    return exitCodeForError(outcome.error);
  }
  return outcome.complete ? EXIT_SUCCESS : EXIT_USER_ERROR;
}
