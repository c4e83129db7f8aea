import type { ILogger } from '../../src/@types/index.js';

export class MockLogger implements ILogger {
    debugMessages: string[] = [];
    errorMessages: string[] = [];
    infoMessages: string[] = [];
    warnMessages: string[] = [];
    verbose: boolean;

    constructor(verbose: boolean = false) {
        this.verbose = verbose;
    }

    info(message: string): void {
        this.infoMessages.push(message);
    }
    success(_message: string): void {}
    warn(message: string): void {
        this.warnMessages.push(message);
    }
    error(message: string): void {
        this.errorMessages.push(message);
    }
    debug(message: string): void {
        if (this.verbose) {
            this.debugMessages.push(message);
        }
    }
}
