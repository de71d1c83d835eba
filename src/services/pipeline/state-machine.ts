/**
 * Document lifecycle state machine
 *
 * `transition` is a pure decision: it never touches storage or adapters.
 * The orchestrator performs side effects only after a decision is accepted
 * and commits the new state together with one audit entry.
 *
 * @module pipeline/state-machine
 */

import {
  TERMINAL_STATES,
  type PipelineDocument,
  type PipelineState,
} from '../../models/document.js';
import { InvalidTransitionError } from './errors.js';

export const TRANSITION_EVENTS = [
  'CLAIM',
  'START_DOWNLOAD',
  'DOWNLOADED',
  'EXTRACTED',
  'ACCEPT',
  'ROUTE_TO_REVIEW',
  'FAIL',
  'RETRY',
  'EXHAUST',
] as const;

export type TransitionEvent = (typeof TRANSITION_EVENTS)[number];

/**
 * Allowed transitions. Anything not listed is an InvalidTransitionError.
 * VALIDATING -> FAILED carries a ledger write that exhausted its retries.
 */
const TRANSITIONS: Readonly<Record<PipelineState, Partial<Record<TransitionEvent, PipelineState>>>> = {
  DISCOVERED: { CLAIM: 'CLAIMED' },
  CLAIMED: { START_DOWNLOAD: 'DOWNLOADING' },
  DOWNLOADING: { DOWNLOADED: 'EXTRACTING', FAIL: 'FAILED' },
  EXTRACTING: { EXTRACTED: 'VALIDATING', FAIL: 'FAILED' },
  VALIDATING: { ACCEPT: 'STORED', ROUTE_TO_REVIEW: 'NEEDS_REVIEW', FAIL: 'FAILED' },
  FAILED: { RETRY: 'EXTRACTING', EXHAUST: 'DEAD_LETTER' },
  STORED: {},
  NEEDS_REVIEW: {},
  DEAD_LETTER: {},
};

/**
 * Decide the next state for an event
 *
 * @throws InvalidTransitionError if the pair is not in the table
 */
export function nextState(from: PipelineState, event: TransitionEvent): PipelineState {
  const to = TRANSITIONS[from][event];
  if (to === undefined) {
    throw new InvalidTransitionError(from, event);
  }
  return to;
}

/**
 * Decide the next state of a document for an event
 *
 * @throws InvalidTransitionError if the pair is not in the table
 */
export function transition(doc: Pick<PipelineDocument, 'state'>, event: TransitionEvent): PipelineState {
  return nextState(doc.state, event);
}

/**
 * Events accepted from a state
 */
export function allowedEvents(from: PipelineState): TransitionEvent[] {
  const table = TRANSITIONS[from];
  return TRANSITION_EVENTS.filter((event) => table[event] !== undefined);
}

export function isTerminal(state: PipelineState): boolean {
  return TERMINAL_STATES.has(state);
}
