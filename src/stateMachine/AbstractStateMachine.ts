// src/stateMachine/AbstractStateMachine.ts

import type { ILogger, IProgressBar } from '../@types';
import { describeError } from '../core/errors';

interface IStateMachineOptions {
    logger: ILogger;
    verbose: boolean;
    progressBar?: IProgressBar;
}

export abstract class AbstractStateMachine<S, O extends IStateMachineOptions> {
    protected state: S;
    protected readonly options: O;
    protected stateTransitions: Array<{ state: S; handler: () => Promise<void> | void }>;

    protected constructor(initialState: S, options: O) {
        this.state = initialState;
        this.options = options;
        this.stateTransitions = [];
    }

    get currentState(): S {
        return this.state;
    }

    /**
     * Executes the state transitions defined in `stateTransitions` in order, updating the state
     * and invoking the corresponding handler. A progress bar, when given, is started with
     * `getTotalSteps()` and stopped once the run settles.
     * On error the machine moves to the error state and the error is re-thrown.
     *
     * @return {Promise<void>} Resolves when all handlers have completed.
     */
    async run(): Promise<void> {
        const { progressBar } = this.options;
        progressBar?.start(this.getTotalSteps(), 0);
        try {
            for (const transition of this.stateTransitions) {
                this.transitionTo(transition.state);
                await transition.handler.call(this);
            }
            progressBar?.increment({ state: this.getCompletionState() });
            this.transitionTo(this.getCompletionState());
        } catch (error) {
            this.transitionTo(this.getErrorState());
            this.handleError(error);
        } finally {
            progressBar?.stop();
        }
    }

    /**
     * Number of progress bar increments a successful run produces: one per transition plus completion.
     */
    protected getTotalSteps(): number {
        return this.stateTransitions.length + 1;
    }

    /**
     * Changes the state, logging the transition in verbose mode and advancing the progress bar.
     * Moving into the error state does neither.
     *
     * @param {S} nextState - The next state to transition to.
     * @return {void}
     */
    protected transitionTo(nextState: S): void {
        const { logger, progressBar, verbose } = this.options;
        if (nextState !== this.getErrorState() && nextState !== this.getCompletionState()) {
            if (verbose) {
                logger.debug(`STATE :: Transitioning from state "${this.state}" -> "${nextState}"`);
            }
            progressBar?.increment({ state: nextState });
        }
        this.state = nextState;
    }

    /**
     * Re-throws the error that moved the machine into the error state. Subclasses log
     * failures where they are detected, so this only records the failed state at debug level.
     *
     * @param {unknown} error - The error raised by a handler.
     * @return {never}
     */
    protected handleError(error: unknown): never {
        const { logger } = this.options;
        logger.debug(`${this.getErrorState()} :: run stopped: ${describeError(error)}`);
        throw error;
    }

    protected abstract getCompletionState(): S;
    protected abstract getErrorState(): S;
}
