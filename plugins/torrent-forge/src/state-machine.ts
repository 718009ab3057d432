/**
 * Request State Machine
 *
 * Tracks one request through the pipeline and records its history.
 *
 * States: received -> parsed -> resolved -> searched -> matched -> built -> responded
 *
 * Fixed-hash mode goes straight from `parsed` to `built`; a search without a
 * usable candidate ends `searched -> no_match -> responded`.
 * `failed` is reachable from any state before `responded` and leads only to it.
 */

import { createLogger, type Logger } from '@torrent-forge/plugin-utils';
import type { PipelineState } from './types.js';

export const VALID_TRANSITIONS: Record<PipelineState, PipelineState[]> = {
  received:  ['parsed', 'failed'],
  parsed:    ['resolved', 'built', 'failed'],
  resolved:  ['searched', 'failed'],
  searched:  ['matched', 'no_match', 'failed'],
  matched:   ['built', 'failed'],
  no_match:  ['responded', 'failed'],
  built:     ['responded', 'failed'],
  failed:    ['responded'],
  responded: [],
};

export class RequestStateMachine {
  private current: PipelineState = 'received';
  private readonly history: PipelineState[] = ['received'];
  private readonly logger: Logger;

  constructor(logger?: Logger) {
    this.logger = logger ?? createLogger('torrent-forge:state-machine');
  }

  /**
   * @throws Error if the transition is not allowed
   */
  transition(toState: PipelineState): PipelineState {
    const fromState = this.current;
    if (!this.isValidTransition(fromState, toState)) {
      const allowed = VALID_TRANSITIONS[fromState];
      throw new Error(
        `Invalid state transition: ${fromState} -> ${toState}. ` +
        `Allowed transitions from ${fromState}: ${allowed.join(', ') || 'none'}`,
      );
    }

    this.current = toState;
    this.history.push(toState);
    this.logger.debug(`${fromState} -> ${toState}`);
    return toState;
  }

  get state(): PipelineState {
    return this.current;
  }

  /** Copy of the states visited so far, oldest first */
  getHistory(): PipelineState[] {
    return [...this.history];
  }

  isValidTransition(fromState: PipelineState, toState: PipelineState): boolean {
    return VALID_TRANSITIONS[fromState].includes(toState);
  }
}
