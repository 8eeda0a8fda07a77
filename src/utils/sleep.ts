export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/** Base delay plus uniform jitter in [0, jitterMs). */
export function jitteredDelay(baseMs: number, jitterMs: number, random: () => number = Math.random): number {
    return Math.round(baseMs + random() * jitterMs);
}

/** Pause taken before each outbound API call. */
export interface Throttle {
    delayMs: number;
    jitterMs: number;
    sleep?: Sleep;
    random?: () => number;
}

export function pause(throttle: Throttle): Promise<void> {
    return (throttle.sleep ?? sleep)(jitteredDelay(throttle.delayMs, throttle.jitterMs, throttle.random));
}
