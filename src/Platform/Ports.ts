/**
 * Environment Port: System Clock
 * Epoch milliseconds. Used for handover expiry and evidence timestamps.
 */
export interface ISystemClock {
    now(): number;
}

export class SystemClock implements ISystemClock {
    now(): number {
        return Date.now();
    }
}

/**
 * Clock that only moves when told to.
 */
export class ManualClock implements ISystemClock {
    constructor(private current: number = 0) { }

    now(): number {
        return this.current;
    }

    advance(ms: number): void {
        this.current += ms;
    }

    set(ms: number): void {
        this.current = ms;
    }
}
