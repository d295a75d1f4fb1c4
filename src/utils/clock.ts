/**
 * Time source for polling loops. Injected so waits can be driven by tests.
 *
 * @license BSD-3-Clause
 */
export interface Clock {
    now(): number;
    sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
    now: () => Date.now(),
    sleep: (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms))
};
