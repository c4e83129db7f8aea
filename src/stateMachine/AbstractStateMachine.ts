// src/stateMachine/AbstractStateMachine.ts

import type { ILogger, IProgressBar } from '../@types/index.js';
import { toError } from '../errors/index.js';

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
     * Executes the state transitions defined in `stateTransitions` in order, invoking each handler.
     * Drives the progress bar when one is configured: it is started with `totalSteps()` and advanced on
     * every transition. On failure the machine moves to the error state and the error is rethrown.
     *
     * @return {Promise<void>} Resolves when all handlers have completed.
     */
    async run(): Promise<void> {
        this.options.progressBar?.start(this.totalSteps(), 0);
        try {
            for (const transition of this.stateTransitions) {
                this.transitionTo(transition.state);
                await transition.handler.call(this);
            }
            this.transitionTo(this.getCompletionState());
        } catch (error) {
            const failure = toError(error);
            this.transitionTo(this.getErrorState(), failure);
            this.handleError(failure);
        }
    }

    /**
     * Moves to the next state. Entering the error state logs the failure of the current state;
     * any other transition is traced when verbose and advances the progress bar.
     *
     * @param {S} nextState - The next state to transition to.
     * @param {Error} [error] - The failure that caused a transition to the error state.
     * @return {void}
     */
    protected transitionTo(nextState: S, error?: Error): void {
        const { logger } = this.options;
        if (nextState === this.getErrorState() && error) {
            logger.error(`Error occurred during "${String(this.state)}": ${error.message}`);
            this.state = this.getErrorState();
        } else {
            if (this.options.verbose) {
                logger.debug(`STATE :: Transitioning from state "${String(this.state)}" -> "${String(nextState)}"`);
            }
            this.options.progressBar?.increment({ state: nextState });
            this.state = nextState;
        }
    }

    /**
     * Recomputes the progress bar total, for machines that learn their amount of work while running.
     */
    protected refreshProgressTotal(): void {
        this.options.progressBar?.setTotal(this.totalSteps());
    }

    /**
     * Stops the progress bar, logs the failure and rethrows it.
     *
     * @param {Error} error - The error that aborted the run.
     * @return {never}
     */
    protected handleError(error: Error): never {
        const { logger, progressBar } = this.options;
        progressBar?.stop();
        logger.error(`${String(this.getErrorState())} failed: ${error.message}`);
        throw error;
    }

    /**
     * Number of transitions the current run is expected to make, including the final one.
     */
    protected totalSteps(): number {
        return this.stateTransitions.length + 1;
    }

    protected abstract getCompletionState(): S;
    protected abstract getErrorState(): S;
}
