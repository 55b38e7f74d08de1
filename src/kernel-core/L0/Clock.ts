// src/kernel-core/L0/Clock.ts

/**
 * Environment Port: System Clock
 * Milliseconds since epoch. Vote windows and staging timeouts read time only
 * through this port.
 */
export interface ISystemClock {
    now(): number;
}

export class SystemClock implements ISystemClock {
    public now(): number {
        return Date.now();
    }
}

/**
 * Deterministic clock for replays and tests. Never moves backwards.
 */
export class ManualClock implements ISystemClock {
    constructor(private current: number = 0) { }

    public now(): number {
        return this.current;
    }

    public advance(ms: number): number {
        if (ms < 0) throw new Error('Time Violation: Backwards advance');
        this.current += ms;
        return this.current;
    }

    public set(to: number): void {
        if (to < this.current) throw new Error('Time Violation: Backwards timestamp');
        this.current = to;
    }
}
