/**
 * Round Policy
 *
 * Decides, after each sandbox round, whether the convergence driver goes
 * round again. A round that asked for no restart ends the run whatever its
 * build result; a restart past the budget ends it as exhausted.
 */

import { MAX_ROUNDS } from './config';

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export type RoundAction = 'RETRY' | 'STOP' | 'BUDGET_EXHAUSTED';

export interface RoundDecision {
    action: RoundAction;
    reasoning: string;
}

export interface RoundState {
    round: number;
    must_restart: number;
    success: boolean;
}

/* -------------------------------------------------------------------------- */
/* Round Policy                                                               */
/* -------------------------------------------------------------------------- */

export class RoundPolicy {
    readonly maxRounds: number;

    constructor(config?: { maxRounds?: number }) {
        this.maxRounds = config?.maxRounds ?? MAX_ROUNDS;
    }

    decide(state: RoundState): RoundDecision {
        if (state.must_restart === 0) {
            return {
                action: 'STOP',
                reasoning: `Round ${state.round} needs no restart; build ${state.success ? 'succeeded' : 'failed'}`,
            };
        }

        if (state.round > this.maxRounds) {
            return {
                action: 'BUDGET_EXHAUSTED',
                reasoning: `Round ${state.round} still needs ${state.must_restart} restart(s) past the limit of ${this.maxRounds}`,
            };
        }

        return {
            action: 'RETRY',
            reasoning: `Round ${state.round} needs ${state.must_restart} restart(s)`,
        };
    }
}
