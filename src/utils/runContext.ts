import { todayIso, utcNowIso } from '../time/windows.js';

/** Timestamps fixed once at the start of a command and shared by everything it writes. */
export interface RunContext {
    /** UTC calendar date the run is attributed to. */
    runDate: string;
    startedUtc: string;
}

export function createRunContext(now: Date = new Date()): RunContext {
    return {
        runDate: todayIso(now),
        startedUtc: utcNowIso(now),
    };
}
